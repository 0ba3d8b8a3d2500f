// reconciler.ts - Runs the inventory -> diff -> match -> act -> report pipeline
import * as crypto from 'crypto';
import { LogSink } from '../common/logger';
import { InventoryUnavailableError } from '../common/errors';
import { ReconcilerConfig } from '../config/config';
import { RunHistory } from '../core/run-history';
import { CommandRunner } from '../execution/command-runner';
import { InventorySourceAdapter, SourceCollection, createDefaultAdapters } from '../inventory/adapters';
import { CanonicalIdentifierSet } from '../inventory/identifier-set';
import { buildIdentifierSet, normalizeInventory } from '../inventory/normalizer';
import { errorMessage } from '../security';
import {
  ActionMode,
  ActionOutcome,
  InventoryItem,
  MatchRecord,
  Origin,
  RunSummary,
  SnapshotPurpose,
  SourceBatch,
} from '../types';
import { ActionExecutor } from './action-executor';
import { ConvergenceReporter } from './convergence-reporter';
import { Selection, diffIdentifierSets, selectForMatching } from './diff-engine';
import { MethodCatalog, TableMethodCatalog } from './methods';
import { compilePatterns, findUnmatchedPatterns, matchInventory, normalizeIdentifier } from './pattern-matcher';
import { SaveResult, SnapshotFile, SnapshotStore } from './snapshot-store';

export type ReconcileMode = ActionMode | 'all';

export interface RunContextDeps {
  logger: LogSink;
  runner: CommandRunner;
  adapters?: InventorySourceAdapter[];
  catalog?: MethodCatalog;
  history?: RunHistory | null;
  signal?: AbortSignal;
  clock?: () => Date;
  runId?: string;
}

/** Everything one run needs, passed explicitly. */
export interface RunContext {
  readonly runId: string;
  readonly config: ReconcilerConfig;
  readonly logger: LogSink;
  readonly runner: CommandRunner;
  readonly adapters: readonly InventorySourceAdapter[];
  readonly catalog: MethodCatalog;
  readonly executor: ActionExecutor;
  readonly history: RunHistory | null;
  readonly signal?: AbortSignal;
  readonly clock: () => Date;
}

export interface Inventory {
  items: InventoryItem[];
  batches: SourceBatch[];
  availableSources: string[];
  unavailableSources: string[];
}

export interface PassReport {
  purpose: SnapshotPurpose;
  mode: ActionMode;
  firstRun: boolean;
  scope: 'diff' | 'full';
  selectionReason: string;
  currentIdentifiers: number;
  newlyObserved: number;
  previouslyObserved: number;
  matches: MatchRecord[];
  outcomes: ActionOutcome[];
  summary: RunSummary;
  /** null when a dry run left the snapshot untouched. */
  snapshot: SaveResult | null;
  auditPath: string | null;
  /** Install pass only: requirements no inventory item satisfied. */
  unmetRequirements?: string[];
  /** Install pass only: unmet requirements that failed before and were not retried. */
  deferredRequirements?: string[];
}

export interface ReconciliationReport {
  runId: string;
  inventory: { items: number; availableSources: string[]; unavailableSources: string[] };
  removal?: PassReport;
  requirements?: PassReport;
  errors: Array<{ pass: SnapshotPurpose; error: string }>;
}

function generateRunId(now: Date): string {
  return `run-${now.getTime()}-${crypto.randomBytes(6).toString('hex')}`;
}

export function createRunContext(config: ReconcilerConfig, deps: RunContextDeps): RunContext {
  const clock = deps.clock ?? (() => new Date());
  const catalog = deps.catalog ?? new TableMethodCatalog();
  const adapters = deps.adapters ?? createDefaultAdapters(
    { runner: deps.runner, logger: deps.logger, queryTimeoutMs: config.timeouts.queryMs },
    config.sources
  );

  return {
    runId: deps.runId ?? generateRunId(clock()),
    config,
    logger: deps.logger,
    runner: deps.runner,
    adapters,
    catalog,
    executor: new ActionExecutor({
      runner: deps.runner,
      catalog,
      logger: deps.logger,
      timeouts: config.timeouts,
      maxConcurrency: config.execution.maxConcurrency,
      dryRun: config.execution.dryRun,
    }),
    history: deps.history ?? null,
    signal: deps.signal,
    clock,
  };
}

// ===========================================
// INVENTORY
// ===========================================

async function collectFrom(ctx: RunContext, adapter: InventorySourceAdapter): Promise<SourceCollection> {
  try {
    return await adapter.collect();
  } catch (error) {
    ctx.logger.warn('Inventory adapter threw; treating source as unavailable', { source: adapter.name, error: errorMessage(error) });
    return { available: false, records: [] };
  }
}

/**
 * Query every adapter concurrently and normalize the result. Throws
 * InventoryUnavailableError when no source could be read at all.
 */
export async function collectInventory(ctx: RunContext): Promise<Inventory> {
  const collections = await Promise.all(ctx.adapters.map(adapter => collectFrom(ctx, adapter)));

  const batches: SourceBatch[] = [];
  const availableSources: string[] = [];
  const unavailableSources: string[] = [];

  ctx.adapters.forEach((adapter, index) => {
    const collection = collections[index];
    if (collection.available) {
      availableSources.push(adapter.name);
      batches.push({ source: adapter.name, origin: adapter.origin, records: collection.records });
    } else {
      unavailableSources.push(adapter.name);
    }
  });

  if (availableSources.length === 0) {
    throw new InventoryUnavailableError(unavailableSources);
  }

  const items = normalizeInventory(batches, ctx.logger);
  ctx.logger.info('Inventory collected', {
    items: items.length,
    sources: availableSources.length,
    unavailable: unavailableSources,
  });

  return { items, batches, availableSources, unavailableSources };
}

// ===========================================
// PASSES
// ===========================================

interface PassTargets {
  matches: MatchRecord[];
  unmet?: string[];
  deferred?: string[];
}

interface PassPlan {
  purpose: SnapshotPurpose;
  mode: ActionMode;
  /** Chooses targets from the selection; `all` is the whole inventory. */
  targets(selection: Selection, all: InventoryItem[], previous: SnapshotFile | null): PassTargets;
}

/**
 * Requirements to carry in the snapshot: those deferred this run plus those
 * attempted without a verified success.
 */
function pendingRequirements(targets: PassTargets, outcomes: readonly ActionOutcome[]): string[] | undefined {
  if (!targets.unmet) return undefined;
  const unconverged = outcomes.filter(outcome => outcome.status === 'failed' || outcome.status === 'partial');
  const attempted = targets.matches
    .filter(match => unconverged.some(outcome => outcome.item === match.matchedItem))
    .map(match => match.pattern);
  return [...(targets.deferred ?? []), ...attempted];
}

async function runPass(ctx: RunContext, inventory: Inventory, plan: PassPlan): Promise<PassReport> {
  const startedAt = ctx.clock();
  const store = new SnapshotStore(plan.purpose, ctx.config.dataDir, ctx.logger);
  const reporter = new ConvergenceReporter({
    store,
    logger: ctx.logger,
    auditDir: ctx.config.auditDir,
    history: ctx.history,
  });

  ctx.logger.info(`Starting ${plan.purpose} pass`, { runId: ctx.runId, mode: plan.mode });

  const current = buildIdentifierSet(inventory.items);
  const previousRecord = store.loadRecord();
  const previous = previousRecord ? new CanonicalIdentifierSet(previousRecord.identifiers) : null;
  const diff = diffIdentifierSets(current, previous);
  const selection = selectForMatching(inventory.items, diff, ctx.config.selectionPolicy);

  ctx.logger.info('Selection', {
    purpose: plan.purpose,
    scope: selection.scope,
    reason: selection.reason,
    selected: selection.items.length,
    newlyObserved: diff.newlyObserved.size,
    previouslyObserved: diff.previouslyObserved.size,
  });

  const targets = plan.targets(selection, inventory.items, previousRecord);
  const { matches, unmet, deferred } = targets;
  const outcomes = await ctx.executor.executeAll(matches, plan.mode, ctx.signal);
  const summary = reporter.summarize(outcomes);
  // dry runs leave the previous snapshot in place
  const snapshot = ctx.config.execution.dryRun
    ? null
    : reporter.persist(current, ctx.clock(), pendingRequirements(targets, outcomes));
  if (!snapshot) {
    ctx.logger.info('Dry run: snapshot not updated', { purpose: plan.purpose });
  }
  const snapshotError = snapshot && !snapshot.ok ? snapshot.error.message : undefined;
  const completedAt = ctx.clock();

  const auditPath = reporter.writeAudit({
    runId: ctx.runId,
    purpose: plan.purpose,
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    diff: {
      firstRun: diff.firstRun,
      current: current.size,
      newlyObserved: diff.newlyObserved.size,
      previouslyObserved: diff.previouslyObserved.size,
      unchanged: diff.unchanged.size,
    },
    selection: { scope: selection.scope, reason: selection.reason, items: selection.items.length },
    matches,
    outcomes,
    summary,
    snapshot: {
      saved: snapshot?.ok === true,
      path: store.filePath,
      ...(snapshotError !== undefined ? { error: snapshotError } : {}),
    },
  });

  await reporter.recordHistory({
    runId: ctx.runId,
    purpose: plan.purpose,
    startedAt: startedAt.toISOString(),
    completedAt: completedAt.toISOString(),
    firstRun: diff.firstRun,
    scope: selection.scope,
    currentIdentifiers: current.size,
    newlyObserved: diff.newlyObserved.size,
    previouslyObserved: diff.previouslyObserved.size,
    matched: matches.length,
    summary,
    snapshotSaved: snapshot?.ok === true,
    ...(snapshotError !== undefined ? { snapshotError } : {}),
    outcomes,
  });

  return {
    purpose: plan.purpose,
    mode: plan.mode,
    firstRun: diff.firstRun,
    scope: selection.scope,
    selectionReason: selection.reason,
    currentIdentifiers: current.size,
    newlyObserved: diff.newlyObserved.size,
    previouslyObserved: diff.previouslyObserved.size,
    matches,
    outcomes,
    summary,
    snapshot,
    auditPath,
    ...(unmet ? { unmetRequirements: unmet } : {}),
    ...(deferred ? { deferredRequirements: deferred } : {}),
  };
}

/**
 * Bloatware: match the selected items against the removal list, skipping
 * anything on the keep list, and remove what matched.
 */
export function runRemovalPass(ctx: RunContext, inventory: Inventory): Promise<PassReport> {
  const bloatware = compilePatterns(ctx.config.bloatwarePatterns);
  const keep = compilePatterns(ctx.config.keepPatterns);

  return runPass(ctx, inventory, {
    purpose: 'bloatware',
    mode: 'remove',
    targets: selection => {
      const matches = matchInventory(selection.items, bloatware).filter(match => {
        const kept = matchInventory([match.matchedItem], keep)[0];
        if (kept) {
          ctx.logger.info(`Keeping ${match.matchedItem.primaryName}`, { pattern: match.pattern, keepPattern: kept.pattern });
          return false;
        }
        return true;
      });
      return { matches };
    },
  });
}

function chocolateyAlias(pattern: string, chocolateyNames: Readonly<Record<string, string>>): string | null {
  const alias = Object.entries(chocolateyNames).find(([id]) => id.toLowerCase() === pattern.toLowerCase());
  return alias ? alias[1] : null;
}

/**
 * A package-manager target for a requirement nothing in the inventory
 * satisfies. The pattern is taken as the winget id.
 */
export function requirementTarget(pattern: string, chocolateyNames: Readonly<Record<string, string>>): InventoryItem {
  return Object.freeze({
    primaryName: pattern,
    alternateIdentifiers: new Set<string>(),
    origin: 'PackageManagerA' as const,
    originMetadata: Object.freeze({
      packageId: pattern,
      chocolateyName: chocolateyAlias(pattern, chocolateyNames) ?? normalizeIdentifier(pattern),
    }),
  });
}

/** Origins that hold installed software; a requirement is only met by one of these. */
const SOFTWARE_ORIGINS: ReadonlySet<Origin> = new Set<Origin>([
  'PackageManagerA',
  'PackageManagerB',
  'OSPackage',
  'ProvisionedPackage',
  'RegistryUninstall',
]);

/**
 * Essential apps: requirement satisfaction is judged against the installed
 * software in the whole inventory, not the diff, since an app that was present
 * last run may be gone. A requirement also counts as met when its Chocolatey
 * package is installed. Under a diff-scoped selection, requirements whose
 * install already failed are not retried; a full scan retries them.
 */
export function runRequirementPass(ctx: RunContext, inventory: Inventory): Promise<PassReport> {
  const required = compilePatterns(ctx.config.essentialAppPatterns);

  return runPass(ctx, inventory, {
    purpose: 'essential-apps',
    mode: 'install',
    targets: (selection, all, previous) => {
      const software = all.filter(item => SOFTWARE_ORIGINS.has(item.origin));
      const unmet = findUnmatchedPatterns(software, required).filter(pattern => {
        const alias = chocolateyAlias(pattern, ctx.config.chocolateyNames);
        return alias === null || findUnmatchedPatterns(software, [alias]).length > 0;
      });

      const failedBefore = new CanonicalIdentifierSet(previous?.pendingRequirements ?? []);
      const deferred = selection.scope === 'diff' ? unmet.filter(pattern => failedBefore.has(pattern)) : [];
      const due = unmet.filter(pattern => !deferred.includes(pattern));

      if (unmet.length > 0) {
        ctx.logger.info(`${unmet.length} essential app(s) missing`, { missing: unmet });
      }
      if (deferred.length > 0) {
        ctx.logger.info(`Not retrying ${deferred.length} essential app(s) that failed to install before`, {
          deferred,
          hint: 'run with --full-scan to retry',
        });
      }

      const matches = due.map((pattern): MatchRecord => ({
        pattern,
        matchedItem: requirementTarget(pattern, ctx.config.chocolateyNames),
        matchStrategy: 'Exact',
        matchedIdentifier: pattern,
      }));
      return { matches, unmet, deferred };
    },
  });
}

/**
 * Collect inventory once and run the requested passes. A failing pass is
 * reported and does not stop the other; an unreadable inventory aborts the run.
 */
export async function runReconciliation(ctx: RunContext, mode: ReconcileMode): Promise<ReconciliationReport> {
  const inventory = await collectInventory(ctx);
  const report: ReconciliationReport = {
    runId: ctx.runId,
    inventory: {
      items: inventory.items.length,
      availableSources: inventory.availableSources,
      unavailableSources: inventory.unavailableSources,
    },
    errors: [],
  };

  if (mode === 'remove' || mode === 'all') {
    try {
      report.removal = await runRemovalPass(ctx, inventory);
    } catch (error) {
      ctx.logger.error('Bloatware pass failed', error, { runId: ctx.runId });
      report.errors.push({ pass: 'bloatware', error: errorMessage(error) });
    }
  }

  if (mode === 'install' || mode === 'all') {
    try {
      report.requirements = await runRequirementPass(ctx, inventory);
    } catch (error) {
      ctx.logger.error('Essential apps pass failed', error, { runId: ctx.runId });
      report.errors.push({ pass: 'essential-apps', error: errorMessage(error) });
    }
  }

  return report;
}
