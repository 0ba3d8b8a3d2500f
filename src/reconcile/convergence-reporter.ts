// convergence-reporter.ts - Run summaries, snapshot persistence and audit output
import * as fs from 'fs';
import * as path from 'path';
import { LogSink } from '../common/logger';
import { RunHistory, RunHistoryEntry } from '../core/run-history';
import { CanonicalIdentifierSet } from '../inventory/identifier-set';
import { atomicWriteFileSync, errorMessage } from '../security';
import { ActionOutcome, MatchRecord, RunSummary, SnapshotPurpose } from '../types';
import { SaveResult, SnapshotStore } from './snapshot-store';

export interface AuditRecord {
  runId: string;
  purpose: SnapshotPurpose;
  startedAt: string;
  completedAt: string;
  diff: {
    firstRun: boolean;
    current: number;
    newlyObserved: number;
    previouslyObserved: number;
    unchanged: number;
  };
  selection: { scope: 'diff' | 'full'; reason: string; items: number };
  matches: MatchRecord[];
  outcomes: ActionOutcome[];
  summary: RunSummary;
  snapshot: { saved: boolean; path: string; error?: string };
}

export interface ConvergenceReporterOptions {
  store: SnapshotStore;
  logger: LogSink;
  /** Directory for JSON audit artifacts; null disables them. */
  auditDir?: string | null;
  history?: RunHistory | null;
}

export function summarizeOutcomes(outcomes: readonly ActionOutcome[]): RunSummary {
  const summary: RunSummary = {
    total: outcomes.length,
    succeeded: 0,
    partial: 0,
    failed: 0,
    skipped: 0,
    byMethod: {},
    failures: [],
  };

  for (const outcome of outcomes) {
    switch (outcome.status) {
      case 'success':
        summary.succeeded++;
        summary.byMethod[outcome.methodUsed] = (summary.byMethod[outcome.methodUsed] ?? 0) + 1;
        break;
      case 'partial':
        summary.partial++;
        break;
      case 'failed':
        summary.failed++;
        summary.failures.push({
          item: outcome.item.primaryName,
          origin: outcome.item.origin,
          error: outcome.error ?? 'unknown error',
        });
        break;
      case 'skipped':
        summary.skipped++;
        break;
    }
  }

  return summary;
}

function auditView(record: AuditRecord): unknown {
  const itemView = (item: ActionOutcome['item']) => ({
    name: item.primaryName,
    origin: item.origin,
    identifiers: [...item.alternateIdentifiers],
  });
  return {
    ...record,
    matches: record.matches.map(match => ({
      pattern: match.pattern,
      strategy: match.matchStrategy,
      identifier: match.matchedIdentifier,
      item: itemView(match.matchedItem),
    })),
    outcomes: record.outcomes.map(outcome => ({
      item: itemView(outcome.item),
      mode: outcome.mode,
      status: outcome.status,
      methodUsed: outcome.methodUsed,
      error: outcome.error,
      durationMs: outcome.durationMs,
      attempts: outcome.attempts,
    })),
  };
}

export class ConvergenceReporter {
  private store: SnapshotStore;
  private logger: LogSink;
  private auditDir: string | null;
  private history: RunHistory | null;

  constructor(options: ConvergenceReporterOptions) {
    this.store = options.store;
    this.logger = options.logger;
    this.auditDir = options.auditDir ?? null;
    this.history = options.history ?? null;
  }

  summarize(outcomes: readonly ActionOutcome[]): RunSummary {
    const summary = summarizeOutcomes(outcomes);
    this.logger.info(`Convergence summary (${this.store.purpose})`, {
      total: summary.total,
      succeeded: summary.succeeded,
      partial: summary.partial,
      failed: summary.failed,
      skipped: summary.skipped,
      byMethod: summary.byMethod,
    });
    return summary;
  }

  /**
   * Save this run's full identifier set regardless of action results. A
   * failed save is reported, never thrown; applied changes stay applied.
   */
  persist(current: CanonicalIdentifierSet, savedAt?: Date, pendingRequirements?: readonly string[]): SaveResult {
    const result = this.store.save(current, savedAt, pendingRequirements);
    if (result.ok) {
      this.logger.info('Snapshot saved', { purpose: this.store.purpose, identifiers: result.count });
    } else {
      this.logger.warn('Snapshot could not be saved; the next run will reprocess more items',
        { purpose: this.store.purpose }, result.error);
    }
    return result;
  }

  writeAudit(record: AuditRecord): string | null {
    if (!this.auditDir) return null;

    const stamp = record.completedAt.replace(/[:.]/g, '-');
    const filePath = path.join(this.auditDir, `audit-${record.purpose}-${stamp}.json`);
    try {
      fs.mkdirSync(this.auditDir, { recursive: true });
      atomicWriteFileSync(filePath, JSON.stringify(auditView(record), null, 2), 0o644);
      this.logger.debug('Audit artifact written', { path: filePath });
      return filePath;
    } catch (error) {
      this.logger.warn('Failed to write audit artifact', { path: filePath, error: errorMessage(error) });
      return null;
    }
  }

  async recordHistory(entry: RunHistoryEntry): Promise<boolean> {
    if (!this.history) return false;
    try {
      await this.history.record(entry);
      return true;
    } catch (error) {
      this.logger.warn('Failed to record run history', { runId: entry.runId, error: errorMessage(error) });
      return false;
    }
  }
}
