import * as fs from 'fs';
import * as path from 'path';
import { InventoryUnavailableError } from '../src/common/errors';
import { ReconcilerConfig } from '../src/config/config';
import { Database } from '../src/core/database';
import { RunHistory } from '../src/core/run-history';
import { InventorySourceAdapter, SourceCollection } from '../src/inventory/adapters';
import { RunContextDeps, createRunContext, requirementTarget, runReconciliation } from '../src/reconcile/reconciler';
import { Origin, RawRecord } from '../src/types';
import { FakeCatalog, FakeRunner, fail, makeConfig, method, mockLogger, ok, removeDir, tempDir } from './helpers';

/** A pretend Windows machine the fake adapters read and the fake methods change. */
interface Machine {
  appx: Set<string>;
  winget: Map<string, string>;
  choco: Set<string>;
}

class MachineAdapter implements InventorySourceAdapter {
  constructor(readonly name: string, readonly origin: Origin, private read: () => RawRecord[] | null) {}

  async collect(): Promise<SourceCollection> {
    const records = this.read();
    return records ? { available: true, records } : { available: false, records: [] };
  }
}

function adaptersFor(machine: Machine): InventorySourceAdapter[] {
  return [
    new MachineAdapter('appx', 'OSPackage', () => [...machine.appx].map(Name => ({ Name }))),
    new MachineAdapter('winget', 'PackageManagerA', () => [...machine.winget].map(([Id, Name]) => ({ Id, Name }))),
    new MachineAdapter('chocolatey', 'PackageManagerB', () => [...machine.choco].map(Name => ({ Name }))),
  ];
}

function catalogFor(machine: Machine, removal: 'works' | 'broken' = 'works'): FakeCatalog {
  return new FakeCatalog({
    'remove:OSPackage': [
      method('remove-appx-package', async item => {
        if (removal === 'broken') return fail('0x80073CFA removal failed');
        machine.appx.delete(item.primaryName);
        return ok();
      }),
    ],
    'install:PackageManagerA': [
      method('winget-install', async () => fail('No package found matching input criteria.', 20)),
      method('choco-install', async item => {
        machine.choco.add(item.originMetadata.chocolateyName);
        return ok();
      }),
    ],
  }, (item, mode) => mode === 'remove'
    ? !machine.appx.has(item.primaryName)
    : machine.choco.has(item.originMetadata.chocolateyName));
}

const NOW = new Date('2026-05-01T08:00:00.000Z');

function snapshotIds(dir: string, purpose: string): string[] {
  const file: { identifiers: string[] } = JSON.parse(fs.readFileSync(path.join(dir, `snapshot-${purpose}.json`), 'utf8'));
  return [...file.identifiers].sort();
}

describe('runReconciliation', () => {
  let dir: string;
  let machine: Machine;

  beforeEach(() => {
    dir = tempDir();
    machine = {
      appx: new Set(['Microsoft.XboxApp', 'Microsoft.WindowsCalculator']),
      winget: new Map([['Google.Chrome', 'Google Chrome']]),
      choco: new Set(),
    };
  });

  afterEach(() => {
    removeDir(dir);
  });

  function context(config: ReconcilerConfig, extra: Partial<RunContextDeps> = {}) {
    return createRunContext(config, {
      logger: mockLogger(),
      runner: new FakeRunner(),
      adapters: adaptersFor(machine),
      catalog: catalogFor(machine),
      clock: () => NOW,
      runId: 'run-1',
      ...extra,
    });
  }

  it('removes matching bloatware on the first run and saves the full snapshot', async () => {
    const report = await runReconciliation(context(makeConfig(dir)), 'remove');
    const removal = report.removal;

    expect(report.requirements).toBeUndefined();
    expect(removal?.firstRun).toBe(true);
    expect(removal?.scope).toBe('full');
    expect(removal?.matches.map(m => [m.pattern, m.matchStrategy, m.matchedItem.primaryName])).toEqual([
      ['Microsoft.XboxApp', 'Exact', 'Microsoft.XboxApp'],
    ]);
    expect(removal?.outcomes.map(o => [o.item.primaryName, o.status, o.methodUsed])).toEqual([
      ['Microsoft.XboxApp', 'success', 'remove-appx-package'],
    ]);
    expect(removal?.summary.byMethod).toEqual({ 'remove-appx-package': 1 });
    expect(machine.appx.has('Microsoft.XboxApp')).toBe(false);
    expect(snapshotIds(dir, 'bloatware')).toEqual(['Google Chrome', 'Google.Chrome', 'Microsoft.WindowsCalculator', 'Microsoft.XboxApp']);
  });

  it('does nothing on the next run once the item is gone', async () => {
    await runReconciliation(context(makeConfig(dir)), 'remove');
    const second = await runReconciliation(context(makeConfig(dir)), 'remove');

    expect(second.removal?.firstRun).toBe(false);
    expect(second.removal?.newlyObserved).toBe(0);
    expect(second.removal?.previouslyObserved).toBe(1);
    expect(second.removal?.matches).toEqual([]);
    expect(second.removal?.outcomes).toEqual([]);
    expect(snapshotIds(dir, 'bloatware')).toEqual(['Google Chrome', 'Google.Chrome', 'Microsoft.WindowsCalculator']);
  });

  it('is idempotent on an unchanged machine', async () => {
    await runReconciliation(context(makeConfig(dir)), 'remove');
    await runReconciliation(context(makeConfig(dir)), 'remove');
    const before = fs.readFileSync(path.join(dir, 'snapshot-bloatware.json'), 'utf8');

    const catalog = catalogFor(machine);
    const third = await runReconciliation(context(makeConfig(dir), { catalog }), 'remove');
    expect(third.removal?.outcomes).toEqual([]);
    expect(catalog.verifyCalls).toEqual([]);
    expect(fs.readFileSync(path.join(dir, 'snapshot-bloatware.json'), 'utf8')).toBe(before);
  });

  it('acts only on newly installed items afterwards', async () => {
    await runReconciliation(context(makeConfig(dir)), 'remove');
    machine.appx.add('Microsoft.BingNews');

    const report = await runReconciliation(context(makeConfig(dir)), 'remove');
    expect(report.removal?.scope).toBe('diff');
    expect(report.removal?.selectionReason).toBe('1 new identifier(s) since last run');
    expect(report.removal?.outcomes.map(o => o.item.primaryName)).toEqual(['Microsoft.BingNews']);
    expect(machine.appx.has('Microsoft.BingNews')).toBe(false);
  });

  it('retries earlier failures only when a full scan is requested', async () => {
    const first = await runReconciliation(context(makeConfig(dir), { catalog: catalogFor(machine, 'broken') }), 'remove');
    expect(first.removal?.outcomes[0].status).toBe('failed');
    expect(first.removal?.summary.failures).toEqual([
      { item: 'Microsoft.XboxApp', origin: 'OSPackage', error: 'remove-appx-package: 0x80073CFA removal failed' },
    ]);

    const diffRun = await runReconciliation(context(makeConfig(dir)), 'remove');
    expect(diffRun.removal?.outcomes).toEqual([]);

    const fullRun = await runReconciliation(context(makeConfig(dir, { selectionPolicy: 'full' })), 'remove');
    expect(fullRun.removal?.outcomes.map(o => o.status)).toEqual(['success']);
  });

  it('never removes items on the keep list', async () => {
    machine.appx.add('Microsoft.BingNews');
    const logger = mockLogger();
    const report = await runReconciliation(
      context(makeConfig(dir, { keepPatterns: ['Microsoft.Bing*'] }), { logger }),
      'remove'
    );

    expect(report.removal?.outcomes.map(o => o.item.primaryName)).toEqual(['Microsoft.XboxApp']);
    expect(machine.appx.has('Microsoft.BingNews')).toBe(true);
    expect(logger.info).toHaveBeenCalledWith('Keeping Microsoft.BingNews', { pattern: 'Microsoft.BingNews', keepPattern: 'Microsoft.Bing*' });
  });

  it('changes nothing and keeps the snapshot in a dry run', async () => {
    const config = makeConfig(dir, { execution: { maxConcurrency: 4, dryRun: true } });
    const report = await runReconciliation(context(config), 'all');

    expect(report.removal?.outcomes.map(o => [o.status, o.methodUsed])).toEqual([['skipped', 'dry-run']]);
    expect(report.requirements?.outcomes.map(o => [o.item.primaryName, o.status])).toEqual([['VideoLAN.VLC', 'skipped']]);
    expect(report.removal?.snapshot).toBeNull();
    expect(machine.appx.has('Microsoft.XboxApp')).toBe(true);
    expect(fs.existsSync(path.join(dir, 'snapshot-bloatware.json'))).toBe(false);
  });

  it('installs missing essential apps through the fallback manager', async () => {
    const report = await runReconciliation(context(makeConfig(dir)), 'install');
    const pass = report.requirements;

    expect(report.removal).toBeUndefined();
    expect(pass?.unmetRequirements).toEqual(['VideoLAN.VLC']);
    expect(pass?.matches[0].matchedItem.originMetadata).toEqual({ packageId: 'VideoLAN.VLC', chocolateyName: 'vlc' });
    expect(pass?.outcomes[0].status).toBe('success');
    expect(pass?.outcomes[0].methodUsed).toBe('choco-install');
    expect(pass?.outcomes[0].attempts.map(a => [a.method, a.reportedSuccess])).toEqual([
      ['winget-install', false],
      ['choco-install', true],
    ]);
    expect(machine.choco.has('vlc')).toBe(true);
    expect(fs.existsSync(path.join(dir, 'snapshot-essential-apps.json'))).toBe(true);

    const again = await runReconciliation(context(makeConfig(dir)), 'install');
    expect(again.requirements?.unmetRequirements).toEqual([]);
    expect(again.requirements?.outcomes).toEqual([]);
  });

  it('does not retry a failed install until a full scan', async () => {
    const install = jest.fn(async () => fail('No package found matching input criteria.', 20));
    const catalog = () => new FakeCatalog({ 'install:PackageManagerA': [method('winget-install', install)] }, () => false);
    const config = makeConfig(dir, { essentialAppPatterns: ['Some.Missing'] });

    const first = await runReconciliation(context(config, { catalog: catalog() }), 'install');
    expect(first.requirements?.outcomes.map(o => o.status)).toEqual(['failed']);
    const file = JSON.parse(fs.readFileSync(path.join(dir, 'snapshot-essential-apps.json'), 'utf8'));
    expect(file.pendingRequirements).toEqual(['Some.Missing']);

    const second = await runReconciliation(context(config, { catalog: catalog() }), 'install');
    expect(second.requirements?.newlyObserved).toBe(0);
    expect(second.requirements?.unmetRequirements).toEqual(['Some.Missing']);
    expect(second.requirements?.deferredRequirements).toEqual(['Some.Missing']);
    expect(second.requirements?.outcomes).toEqual([]);
    expect(install).toHaveBeenCalledTimes(1);

    const full = await runReconciliation(context({ ...config, selectionPolicy: 'full' }, { catalog: catalog() }), 'install');
    expect(full.requirements?.outcomes.map(o => o.status)).toEqual(['failed']);
    expect(install).toHaveBeenCalledTimes(2);
  });

  it('ignores features and tasks when checking requirements', async () => {
    const adapters = [
      ...adaptersFor(machine),
      new MachineAdapter('features', 'WindowsFeature', () => [{ FeatureName: 'MicrosoftWindowsPowerShellV2Root' }]),
      new MachineAdapter('tasks', 'ScheduledTask', () => [
        { TaskName: 'Job1', FullPath: '\\Microsoft\\Windows\\PowerShell\\ScheduledJobs\\Job1' },
      ]),
    ];
    const config = makeConfig(dir, {
      essentialAppPatterns: ['Microsoft.PowerShell'],
      chocolateyNames: { 'Microsoft.PowerShell': 'powershell-core' },
    });

    const report = await runReconciliation(context(config, { adapters }), 'install');
    expect(report.requirements?.unmetRequirements).toEqual(['Microsoft.PowerShell']);
    expect(report.requirements?.outcomes.map(o => [o.status, o.methodUsed])).toEqual([['success', 'choco-install']]);
    expect(machine.choco.has('powershell-core')).toBe(true);
  });

  it('aborts the run when no inventory source can be read', async () => {
    const adapters = adaptersFor(machine).map(a => new MachineAdapter(a.name, a.origin, () => null));
    await expect(runReconciliation(context(makeConfig(dir), { adapters }), 'all'))
      .rejects.toThrow(new InventoryUnavailableError(['appx', 'winget', 'chocolatey']).message);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('carries on when one adapter throws', async () => {
    const logger = mockLogger();
    const exploding: InventorySourceAdapter = {
      name: 'winget',
      origin: 'PackageManagerA',
      collect: async () => {
        throw new Error('module not found');
      },
    };
    const adapters = [adaptersFor(machine)[0], exploding];

    const report = await runReconciliation(context(makeConfig(dir), { adapters, logger }), 'remove');
    expect(report.inventory).toEqual({ items: 2, availableSources: ['appx'], unavailableSources: ['winget'] });
    expect(logger.warn).toHaveBeenCalledWith('Inventory adapter threw; treating source as unavailable', { source: 'winget', error: 'module not found' });
  });

  it('reports a failing pass and still runs the other', async () => {
    const logger = mockLogger();
    logger.info.mockImplementation((message: string) => {
      if (message === 'Starting bloatware pass') throw new Error('bloatware pass exploded');
    });

    const report = await runReconciliation(context(makeConfig(dir), { logger }), 'all');
    expect(report.errors).toEqual([{ pass: 'bloatware', error: 'bloatware pass exploded' }]);
    expect(report.removal).toBeUndefined();
    expect(report.requirements?.outcomes.map(o => o.status)).toEqual(['success']);
  });

  it('writes audit artifacts and history rows', async () => {
    const logger = mockLogger();
    const db = new Database(':memory:', logger);
    const history = new RunHistory(db);
    const auditDir = path.join(dir, 'audit');

    const report = await runReconciliation(context(makeConfig(dir, { auditDir }), { history, logger }), 'all');
    expect(report.removal?.auditPath).toBe(path.join(auditDir, 'audit-bloatware-2026-05-01T08-00-00-000Z.json'));
    expect(report.requirements?.auditPath).toBe(path.join(auditDir, 'audit-essential-apps-2026-05-01T08-00-00-000Z.json'));

    const audit = JSON.parse(fs.readFileSync(path.join(auditDir, 'audit-bloatware-2026-05-01T08-00-00-000Z.json'), 'utf8'));
    expect(audit.runId).toBe('run-1');
    expect(audit.diff).toEqual({ firstRun: true, current: 4, newlyObserved: 4, previouslyObserved: 0, unchanged: 0 });
    expect(audit.snapshot).toEqual({ saved: true, path: path.join(dir, 'snapshot-bloatware.json') });

    const runs = await history.recentRuns('bloatware');
    expect(runs.map(r => [r.run_id, r.matched, r.succeeded, r.first_run])).toEqual([['run-1', 1, 1, 1]]);
    const outcomes = await history.outcomesForRun('run-1');
    expect(outcomes.map(o => [o.item_name, o.mode, o.status])).toEqual([
      ['Microsoft.XboxApp', 'remove', 'success'],
      ['VideoLAN.VLC', 'install', 'success'],
    ]);
    await db.close();
  });
});

describe('requirementTarget', () => {
  it('uses the configured Chocolatey name, matched case-insensitively', () => {
    expect(requirementTarget('videolan.vlc', { 'VideoLAN.VLC': 'vlc' }).originMetadata).toEqual({
      packageId: 'videolan.vlc',
      chocolateyName: 'vlc',
    });
  });

  it('falls back to the normalized id', () => {
    const target = requirementTarget('Git.Git', {});
    expect(target.origin).toBe('PackageManagerA');
    expect(target.originMetadata.chocolateyName).toBe('gitgit');
  });
});
