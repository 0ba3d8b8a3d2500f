import * as fs from 'fs';
import * as path from 'path';
import { USAGE, applyCliOverrides, main, parseCliArgs } from '../src/index';
import { InventorySourceAdapter } from '../src/inventory/adapters';
import { FakeCatalog, makeConfig, removeDir, tempDir } from './helpers';

describe('parseCliArgs', () => {
  it('defaults to both passes', () => {
    expect(parseCliArgs([])).toEqual({
      ok: true,
      options: { mode: 'all', dryRun: false, fullScan: false, help: false },
    });
  });

  it('reads flags in both spellings', () => {
    expect(parseCliArgs(['--mode=install', '--dry-run', '--config', 'site.json', '--full-scan'])).toEqual({
      ok: true,
      options: { mode: 'install', configPath: 'site.json', dryRun: true, fullScan: true, help: false },
    });
  });

  it('rejects an unknown mode', () => {
    expect(parseCliArgs(['--mode', 'purge'])).toEqual({ ok: false, error: '--mode expects one of remove, install, all' });
  });

  it('does not take the next flag as a value', () => {
    expect(parseCliArgs(['--config', '--dry-run'])).toEqual({ ok: false, error: '--config expects a file path' });
  });

  it('rejects unknown arguments', () => {
    expect(parseCliArgs(['--verbose'])).toEqual({ ok: false, error: 'Unknown argument: --verbose' });
    expect(parseCliArgs(['--color=auto'])).toEqual({ ok: false, error: 'Unknown argument: --color=auto' });
  });
});

describe('applyCliOverrides', () => {
  const options = { mode: 'all' as const, dryRun: false, fullScan: false, help: false };

  it('forces a full scan', () => {
    expect(applyCliOverrides(makeConfig('/data'), { ...options, fullScan: true }).selectionPolicy).toBe('full');
  });

  it('cannot turn off a configured dry run', () => {
    const config = makeConfig('/data', { execution: { maxConcurrency: 2, dryRun: true } });
    expect(applyCliOverrides(config, options).execution).toEqual({ maxConcurrency: 2, dryRun: true });
    expect(applyCliOverrides(makeConfig('/data'), { ...options, dryRun: true }).execution.dryRun).toBe(true);
  });
});

describe('main', () => {
  let dir: string;
  let errorSpy: jest.SpyInstance;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    dir = tempDir();
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(dir);
  });

  function writeConfig(): string {
    const file = path.join(dir, 'winmaint.config.json');
    fs.writeFileSync(file, JSON.stringify({ dataDir: './data', logDir: null, auditDir: null, historyDb: null }));
    return file;
  }

  function appx(names: string[] | null): InventorySourceAdapter {
    return {
      name: 'appx',
      origin: 'OSPackage',
      collect: async () => names ? { available: true, records: names.map(Name => ({ Name })) } : { available: false, records: [] },
    };
  }

  it('prints usage for --help', async () => {
    await expect(main(['--help'])).resolves.toBe(0);
    expect(logSpy).toHaveBeenCalledWith(USAGE);
  });

  it('exits 2 on bad arguments', async () => {
    await expect(main(['--mode', 'purge'])).resolves.toBe(2);
    expect(errorSpy).toHaveBeenNthCalledWith(1, '--mode expects one of remove, install, all');
  });

  it('exits 2 when the named configuration file is missing', async () => {
    const missing = path.join(dir, 'absent.json');
    await expect(main(['--config', missing])).resolves.toBe(2);
    expect(errorSpy).toHaveBeenCalledWith(`Configuration file not found: ${missing}`);
  });

  it('exits 0 after a completed dry run', async () => {
    const deps = { adapters: [appx(['Microsoft.XboxApp'])], catalog: new FakeCatalog({}, () => false) };
    await expect(main(['--config', writeConfig(), '--mode', 'remove', '--dry-run'], deps)).resolves.toBe(0);
    expect(fs.existsSync(path.join(dir, 'data', 'snapshot-bloatware.json'))).toBe(false);
  });

  it('exits 1 when no inventory can be read', async () => {
    const deps = { adapters: [appx(null)], catalog: new FakeCatalog({}, () => false) };
    await expect(main(['--config', writeConfig()], deps)).resolves.toBe(1);
  });
});
