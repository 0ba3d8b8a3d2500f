import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../src/common/errors';
import { defaultPatternsDir, loadConfig, mergePatternLists } from '../src/config/config';
import { removeDir, tempDir } from './helpers';

const builtInBloatware: string[] = JSON.parse(
  fs.readFileSync(path.join(__dirname, '..', 'config', 'bloatware.json'), 'utf8')
).patterns;

describe('mergePatternLists', () => {
  it('keeps first occurrences, drops case-insensitive duplicates and exclusions', () => {
    expect(mergePatternLists([['A.One', 'B.Two'], ['a.one', ' C.Three ', '', 'D.Four']], ['d.four']))
      .toEqual(['A.One', 'B.Two', 'C.Three']);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = tempDir();
  });

  afterEach(() => {
    removeDir(dir);
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, 'winmaint.config.json');
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  it('finds the built-in lists beside the sources', () => {
    expect(defaultPatternsDir()).toBe(path.resolve(__dirname, '..', 'config'));
  });

  it('falls back to defaults with a warning when the default file is missing', () => {
    const cwd = process.cwd();
    process.chdir(dir);
    try {
      const { config, warnings } = loadConfig();
      expect(warnings).toEqual(['No winmaint.config.json found, using defaults']);
      expect(config.configPath).toBeNull();
      expect(config.selectionPolicy).toBe('diff');
      expect(config.execution).toEqual({ maxConcurrency: 8, dryRun: false });
      expect(config.timeouts).toEqual({ packageMs: 300000, longRunningMs: 3600000, queryMs: 60000 });
      expect(config.dataDir).toBe(path.resolve(process.cwd(), 'data'));
      expect(config.bloatwarePatterns).toEqual(builtInBloatware);
      expect(config.keepPatterns).toEqual([]);
    } finally {
      process.chdir(cwd);
    }
  });

  it('rejects an explicit path that does not exist', () => {
    expect(() => loadConfig(path.join(dir, 'absent.json'))).toThrow(ConfigError);
  });

  it('merges user settings over defaults and resolves paths against the file', () => {
    const file = writeConfig({
      dataDir: 'state',
      selectionPolicy: 'full-when-empty',
      execution: { maxConcurrency: 2 },
      sources: { PackageManagerB: false },
      patterns: {
        customBloatware: ['Contoso.Toolbar', 'microsoft.xboxapp'],
        keepApps: ['Microsoft.XboxApp'],
        customEssentialApps: ['Git.Git'],
        chocolateyNames: { 'Git.Git': 'git' },
      },
    });

    const { config, warnings } = loadConfig(file);
    expect(warnings).toEqual([]);
    expect(config.configPath).toBe(file);
    expect(config.dataDir).toBe(path.join(dir, 'state'));
    expect(config.logDir).toBe(path.join(dir, 'logs'));
    expect(config.auditDir).toBe(path.join(dir, 'data', 'audit'));
    expect(config.historyDb).toBe(path.join(dir, 'data', 'history.db'));
    expect(config.selectionPolicy).toBe('full-when-empty');
    expect(config.execution).toEqual({ maxConcurrency: 2, dryRun: false });
    expect(config.sources).toEqual({ PackageManagerB: false });

    expect(config.bloatwarePatterns).not.toContain('Microsoft.XboxApp');
    expect(config.bloatwarePatterns).not.toContain('microsoft.xboxapp');
    expect(config.bloatwarePatterns[config.bloatwarePatterns.length - 1]).toBe('Contoso.Toolbar');
    expect(config.bloatwarePatterns).toHaveLength(builtInBloatware.length);
    expect(config.keepPatterns).toEqual(['Microsoft.XboxApp']);
    expect(config.essentialAppPatterns[config.essentialAppPatterns.length - 1]).toBe('Git.Git');
    expect(config.chocolateyNames['Git.Git']).toBe('git');
    expect(config.chocolateyNames['Google.Chrome']).toBe('googlechrome');
  });

  it('allows disabling file outputs with null', () => {
    const { config } = loadConfig(writeConfig({ logDir: null, auditDir: null, historyDb: null }));
    expect(config.logDir).toBeNull();
    expect(config.auditDir).toBeNull();
    expect(config.historyDb).toBeNull();
  });

  it('keeps absolute paths as given', () => {
    const absolute = path.join(dir, 'elsewhere');
    const { config } = loadConfig(writeConfig({ dataDir: absolute }));
    expect(config.dataDir).toBe(absolute);
  });

  it('warns when dry run is switched on in the file', () => {
    const { warnings } = loadConfig(writeConfig({ execution: { dryRun: true } }));
    expect(warnings).toEqual(['Dry run enabled in configuration: no changes will be made']);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig(writeConfig({ selectionPolicy: 'sometimes' }))).toThrow(/selectionPolicy/);
    expect(() => loadConfig(writeConfig({ execution: { maxConcurrency: 0 } }))).toThrow(ConfigError);
    expect(() => loadConfig(writeConfig({ sources: { Floppy: true } }))).toThrow(ConfigError);
  });

  it('rejects unknown keys and malformed JSON', () => {
    expect(() => loadConfig(writeConfig({ dataDirectory: 'x' }))).toThrow(ConfigError);
    expect(() => loadConfig(writeConfig('{ "dataDir": '))).toThrow(/Invalid JSON/);
  });

  it('fails when a built-in list is unusable', () => {
    const patternsDir = path.join(dir, 'lists');
    fs.mkdirSync(patternsDir);
    fs.writeFileSync(path.join(patternsDir, 'bloatware.json'), '{"patterns": "not a list"}');
    const file = writeConfig({});
    expect(() => loadConfig(file, { patternsDir })).toThrow(
      `Built-in pattern list ${path.join(patternsDir, 'bloatware.json')} is unusable: patterns: Expected array, received string`
    );
  });
});
