// action-executor.ts - Drives each matched item through its ordered method chain
import { LogSink } from '../common/logger';
import { KeyedMutex, Semaphore, runPool } from '../common/concurrency';
import { ItemTerminalFailureError, MethodFailedError } from '../common/errors';
import { CanonicalIdentifierSet } from '../inventory/identifier-set';
import { identifiersOf } from '../inventory/normalizer';
import { CommandRunner, CommandResult } from '../execution/command-runner';
import { errorMessage, sanitizeErrorMessage } from '../security';
import {
  ActionMode,
  ActionOutcome,
  InventoryItem,
  MatchRecord,
  MethodAttempt,
  OutcomeStatus,
} from '../types';
import { ActionMethod, MethodCatalog, TimeoutClass, ToolLock } from './methods';

export interface TimeoutConfig {
  packageMs: number;
  longRunningMs: number;
  queryMs: number;
}

export interface ActionExecutorOptions {
  runner: CommandRunner;
  catalog: MethodCatalog;
  logger: LogSink;
  timeouts: TimeoutConfig;
  maxConcurrency?: number;
  dryRun?: boolean;
}

export const DEFAULT_MAX_CONCURRENCY = 8;

/**
 * Per item: Pending -> Attempting(k) -> Verified | Attempting(k+1) -> Terminal.
 * Only a verified state change is a success. Items are isolated from each
 * other's failures; the same canonical identifier is never acted on twice at
 * once, and each external tool runs one invocation at a time.
 */
export class ActionExecutor {
  private runner: CommandRunner;
  private catalog: MethodCatalog;
  private logger: LogSink;
  private timeouts: TimeoutConfig;
  private maxConcurrency: number;
  private dryRun: boolean;
  private identifierLocks = new KeyedMutex();
  private toolLocks: Record<ToolLock, Semaphore> = {
    winget: new Semaphore(1),
    choco: new Semaphore(1),
    dism: new Semaphore(1),
  };

  constructor(options: ActionExecutorOptions) {
    this.runner = options.runner;
    this.catalog = options.catalog;
    this.logger = options.logger;
    this.timeouts = options.timeouts;
    this.maxConcurrency = Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY);
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * Process a batch. Each distinct item is acted on at most once even when
   * several match records point at it; distinct items sharing a name (two
   * uninstall keys with one DisplayName) are each processed.
   */
  async executeAll(matches: readonly MatchRecord[], mode: ActionMode, signal?: AbortSignal): Promise<ActionOutcome[]> {
    const seen = new Set<InventoryItem>();
    const unique: MatchRecord[] = [];
    for (const match of matches) {
      if (seen.has(match.matchedItem)) {
        this.logger.debug('Duplicate match ignored', { item: match.matchedItem.primaryName, pattern: match.pattern });
        continue;
      }
      seen.add(match.matchedItem);
      unique.push(match);
    }

    return runPool(unique, this.maxConcurrency, match => this.execute(match, mode, signal));
  }

  async execute(match: MatchRecord, mode: ActionMode, signal?: AbortSignal): Promise<ActionOutcome> {
    const item = match.matchedItem;
    const startTime = Date.now();

    if (this.dryRun) {
      this.logger.info(`Dry run: would ${mode} ${item.primaryName}`, { origin: item.origin, pattern: match.pattern, strategy: match.matchStrategy });
      return this.outcome(item, mode, 'skipped', 'dry-run', [], startTime);
    }

    if (signal?.aborted) {
      return this.outcome(item, mode, 'skipped', 'none', [], startTime, 'cancelled');
    }

    const lockKeys = identifiersOf(item).map(CanonicalIdentifierSet.key);
    try {
      return await this.identifierLocks.use(lockKeys, () => this.runChain(item, mode, startTime, signal));
    } catch (error) {
      // runChain handles method errors itself; this is a bug guard for catalog code
      this.logger.error(`Unexpected failure processing ${item.primaryName}`, error);
      return this.outcome(item, mode, 'failed', 'none', [], startTime, sanitizeErrorMessage(errorMessage(error), mode));
    }
  }

  private async runChain(item: InventoryItem, mode: ActionMode, startTime: number, signal?: AbortSignal): Promise<ActionOutcome> {
    const methods = this.catalog.methodsFor(mode, item.origin).filter(method => !method.applies || method.applies(item));

    if (methods.length === 0) {
      this.logger.warn(`No ${mode} method available for ${item.primaryName}`, { origin: item.origin });
      return this.outcome(item, mode, 'skipped', 'none', [], startTime, `no ${mode} method for origin ${item.origin}`);
    }

    const attempts: MethodAttempt[] = [];

    for (const method of methods) {
      if (signal?.aborted) {
        this.logger.info(`Stopping ${item.primaryName} after cancellation`, { attempts: attempts.length });
        break;
      }

      const attempt = await this.attempt(item, mode, method);
      attempts.push(attempt);

      if (attempt.verified) {
        this.logger.info(`${mode === 'remove' ? 'Removed' : 'Installed'} ${item.primaryName} via ${method.name}`, {
          origin: item.origin,
          attempts: attempts.length,
        });
        return this.outcome(item, mode, 'success', method.name, attempts, startTime);
      }
    }

    const cancelled = signal?.aborted === true && attempts.length < methods.length;
    const lastReportedSuccess = [...attempts].reverse().find(a => a.reportedSuccess);

    if (lastReportedSuccess) {
      this.logger.warn(`${item.primaryName} only partially converged`, {
        origin: item.origin,
        methods: attempts.map(a => a.method),
      });
      return this.outcome(item, mode, 'partial', lastReportedSuccess.method, attempts, startTime,
        cancelled ? 'cancelled before verification succeeded' : 'no method could be verified');
    }

    const last = attempts[attempts.length - 1];
    if (!last) {
      return this.outcome(item, mode, 'skipped', 'none', attempts, startTime, 'cancelled');
    }

    const failure = new ItemTerminalFailureError(item.primaryName, last.error ?? `${last.method} failed`);
    this.logger.warn(`All ${mode} methods failed for ${item.primaryName}`, { origin: item.origin }, failure);
    return this.outcome(item, mode, 'failed', last.method, attempts, startTime, last.error ?? `${last.method} failed`);
  }

  private async attempt(item: InventoryItem, mode: ActionMode, method: ActionMethod): Promise<MethodAttempt> {
    const started = Date.now();
    let result: CommandResult | null = null;
    let error: string | undefined;

    try {
      result = await this.withToolLock(method.lock, () =>
        method.run(item, { runner: this.runner, timeoutMs: this.timeoutFor(method.timeout) })
      );
      if (result.exitCode !== 0) {
        const reason = result.timedOut ? 'Operation timed out' : (result.stderr || result.stdout || `exit code ${result.exitCode}`);
        error = sanitizeErrorMessage(new MethodFailedError(method.name, reason).message, method.name);
      }
    } catch (thrown) {
      error = sanitizeErrorMessage(new MethodFailedError(method.name, errorMessage(thrown)).message, method.name);
    }

    const reportedSuccess = error === undefined;
    let verified = false;
    try {
      const state = await this.catalog.verify(item, mode, { runner: this.runner, timeoutMs: this.timeouts.queryMs });
      verified = state === true;
      if (state === null) {
        this.logger.debug(`Verification inconclusive for ${item.primaryName}`, { method: method.name });
      }
    } catch (verifyError) {
      this.logger.warn(`Verification failed for ${item.primaryName}`, { method: method.name }, verifyError);
    }

    if (!verified) {
      this.logger.debug(`Method ${method.name} did not converge ${item.primaryName}`, { reportedSuccess, error });
    }

    return {
      method: method.name,
      reportedSuccess,
      verified,
      timedOut: result?.timedOut ?? false,
      durationMs: Date.now() - started,
      ...(error !== undefined ? { error } : {}),
    };
  }

  private async withToolLock<T>(lock: ToolLock | undefined, fn: () => Promise<T>): Promise<T> {
    if (!lock) return fn();
    return this.toolLocks[lock].use(fn);
  }

  private timeoutFor(timeout: TimeoutClass): number {
    switch (timeout) {
      case 'longRunning': return this.timeouts.longRunningMs;
      case 'query': return this.timeouts.queryMs;
      default: return this.timeouts.packageMs;
    }
  }

  private outcome(
    item: InventoryItem,
    mode: ActionMode,
    status: OutcomeStatus,
    methodUsed: string,
    attempts: MethodAttempt[],
    startTime: number,
    error?: string
  ): ActionOutcome {
    return {
      item,
      mode,
      status,
      success: status === 'success',
      methodUsed,
      attempts,
      durationMs: Date.now() - startTime,
      ...(error !== undefined ? { error } : {}),
    };
  }
}
