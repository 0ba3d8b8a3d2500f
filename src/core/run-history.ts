// run-history.ts - Reconciliation run history for reporting tools
import { Database } from './database';
import { ActionOutcome, RunSummary, SnapshotPurpose } from '../types';

export interface RunHistoryEntry {
  runId: string;
  purpose: SnapshotPurpose;
  startedAt: string;
  completedAt: string;
  firstRun: boolean;
  scope: 'diff' | 'full';
  currentIdentifiers: number;
  newlyObserved: number;
  previouslyObserved: number;
  matched: number;
  summary: RunSummary;
  snapshotSaved: boolean;
  snapshotError?: string;
  outcomes: ActionOutcome[];
}

export interface RunHistoryRow {
  run_id: string;
  purpose: string;
  started_at: string;
  completed_at: string;
  first_run: number;
  scope: string;
  current_identifiers: number;
  newly_observed: number;
  previously_observed: number;
  matched: number;
  succeeded: number;
  partial: number;
  failed: number;
  skipped: number;
  snapshot_saved: number;
  snapshot_error: string | null;
}

export interface OutcomeRow {
  run_id: string;
  item_name: string;
  origin: string;
  mode: string;
  status: string;
  method_used: string;
  attempts: number;
  error_message: string | null;
}

export class RunHistory {
  constructor(private db: Database) {}

  async record(entry: RunHistoryEntry): Promise<void> {
    await this.db.ensureInitialized();
    await this.db.run(
      `INSERT INTO reconcile_runs (
        run_id, purpose, started_at, completed_at, first_run, scope,
        current_identifiers, newly_observed, previously_observed, matched,
        succeeded, partial, failed, skipped, snapshot_saved, snapshot_error
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        entry.runId, entry.purpose, entry.startedAt, entry.completedAt, entry.firstRun ? 1 : 0, entry.scope,
        entry.currentIdentifiers, entry.newlyObserved, entry.previouslyObserved, entry.matched,
        entry.summary.succeeded, entry.summary.partial, entry.summary.failed, entry.summary.skipped,
        entry.snapshotSaved ? 1 : 0, entry.snapshotError ?? null,
      ]
    );

    for (const outcome of entry.outcomes) {
      await this.db.run(
        `INSERT INTO action_outcomes (
          run_id, purpose, item_name, origin, mode, status, method_used, attempts, duration_ms, error_message
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          entry.runId, entry.purpose, outcome.item.primaryName, outcome.item.origin, outcome.mode,
          outcome.status, outcome.methodUsed, outcome.attempts.length, outcome.durationMs, outcome.error ?? null,
        ]
      );
    }
  }

  async recentRuns(purpose: SnapshotPurpose, limit: number = 10): Promise<RunHistoryRow[]> {
    return this.db.all<RunHistoryRow>(
      `SELECT run_id, purpose, started_at, completed_at, first_run, scope, current_identifiers,
              newly_observed, previously_observed, matched, succeeded, partial, failed, skipped,
              snapshot_saved, snapshot_error
       FROM reconcile_runs WHERE purpose = ? ORDER BY id DESC LIMIT ?`,
      [purpose, limit]
    );
  }

  async outcomesForRun(runId: string): Promise<OutcomeRow[]> {
    return this.db.all<OutcomeRow>(
      `SELECT run_id, item_name, origin, mode, status, method_used, attempts, error_message
       FROM action_outcomes WHERE run_id = ? ORDER BY id`,
      [runId]
    );
  }
}
