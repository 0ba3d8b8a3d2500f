// index.ts - winmaint agent entry point
import { Logger, getAgentLogger, parseLogLevel } from './common/logger';
import { ConfigError } from './common/errors';
import { ReconcilerConfig, loadConfig } from './config/config';
import { Database } from './core/database';
import { RunHistory } from './core/run-history';
import { CommandRunner, ProcessCommandRunner } from './execution/command-runner';
import { InventorySourceAdapter } from './inventory/adapters';
import { MethodCatalog } from './reconcile/methods';
import {
  PassReport,
  ReconcileMode,
  ReconciliationReport,
  createRunContext,
  runReconciliation,
} from './reconcile/reconciler';

export const USAGE = `Usage: winmaint [--mode remove|install|all] [--config <file>] [--dry-run] [--full-scan]

  --mode       remove bloatware, install essential apps, or both (default: all)
  --config     configuration file (default: ./winmaint.config.json)
  --dry-run    report what would change without running any method
  --full-scan  match every inventory item instead of only new ones`;

export interface CliOptions {
  mode: ReconcileMode;
  configPath?: string;
  dryRun: boolean;
  fullScan: boolean;
  help: boolean;
}

export type CliParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

const MODES: readonly ReconcileMode[] = ['remove', 'install', 'all'];

function isMode(value: string): value is ReconcileMode {
  return MODES.some(mode => mode === value);
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  const options: CliOptions = { mode: 'all', dryRun: false, fullScan: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const [flag, inline] = arg.startsWith('--') && arg.includes('=')
      ? [arg.slice(0, arg.indexOf('=')), arg.slice(arg.indexOf('=') + 1)]
      : [arg, undefined];

    const value = (): string | undefined => {
      if (inline !== undefined) return inline;
      const next = args[i + 1];
      if (next === undefined || next.startsWith('--')) return undefined;
      i++;
      return next;
    };

    switch (flag) {
      case '--help':
      case '-h':
        options.help = true;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--full-scan':
        options.fullScan = true;
        break;
      case '--mode': {
        const mode = value();
        if (mode === undefined || !isMode(mode)) {
          return { ok: false, error: `--mode expects one of ${MODES.join(', ')}` };
        }
        options.mode = mode;
        break;
      }
      case '--config': {
        const configPath = value();
        if (!configPath) {
          return { ok: false, error: '--config expects a file path' };
        }
        options.configPath = configPath;
        break;
      }
      default:
        return { ok: false, error: `Unknown argument: ${arg}` };
    }
  }

  return { ok: true, options };
}

/** Command-line flags win over the configuration file. */
export function applyCliOverrides(config: ReconcilerConfig, options: CliOptions): ReconcilerConfig {
  return {
    ...config,
    selectionPolicy: options.fullScan ? 'full' : config.selectionPolicy,
    execution: { ...config.execution, dryRun: config.execution.dryRun || options.dryRun },
  };
}

export interface AgentDeps {
  runner?: CommandRunner;
  adapters?: InventorySourceAdapter[];
  catalog?: MethodCatalog;
}

export class MaintenanceAgent {
  private logger: Logger;
  private db: Database | null = null;
  private history: RunHistory | null = null;
  private abortController = new AbortController();

  constructor(private config: ReconcilerConfig, private deps: AgentDeps = {}, logger?: Logger) {
    this.logger = logger ?? getAgentLogger(config.logDir, parseLogLevel(config.logLevel));

    if (config.historyDb) {
      this.db = new Database(config.historyDb, this.logger.child('database'));
      this.history = new RunHistory(this.db);
    }
  }

  async run(mode: ReconcileMode): Promise<ReconciliationReport> {
    const ctx = createRunContext(this.config, {
      logger: this.logger,
      runner: this.deps.runner ?? new ProcessCommandRunner(),
      adapters: this.deps.adapters,
      catalog: this.deps.catalog,
      history: this.history,
      signal: this.abortController.signal,
    });

    this.logger.startOperation(`reconciliation (${mode})`, {
      runId: ctx.runId,
      dryRun: this.config.execution.dryRun,
      selectionPolicy: this.config.selectionPolicy,
    });

    const report = await runReconciliation(ctx, mode);
    const passes = [report.removal, report.requirements].filter((pass): pass is PassReport => pass !== undefined);
    this.logger.endOperation(`reconciliation (${mode})`, report.errors.length === 0, {
      runId: report.runId,
      passes: passes.map(pass => ({
        purpose: pass.purpose,
        succeeded: pass.summary.succeeded,
        partial: pass.summary.partial,
        failed: pass.summary.failed,
        skipped: pass.summary.skipped,
        snapshotSaved: pass.snapshot?.ok === true,
      })),
      errors: report.errors,
    });
    return report;
  }

  /** Items not yet started are skipped; in-flight attempts finish. */
  stop(): void {
    if (!this.abortController.signal.aborted) {
      this.logger.warn('Cancellation requested, finishing in-flight actions');
      this.abortController.abort();
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      await this.db.close();
      this.db = null;
    }
  }
}

/**
 * Exit codes: 0 when the run completed (item failures included), 1 on a
 * run-level error, 2 on bad arguments or configuration.
 */
export async function main(args: readonly string[], deps: AgentDeps = {}): Promise<number> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    console.error(parsed.error);
    console.error(USAGE);
    return 2;
  }
  if (parsed.options.help) {
    console.log(USAGE);
    return 0;
  }

  let config: ReconcilerConfig;
  let warnings: string[];
  try {
    const loaded = loadConfig(parsed.options.configPath);
    config = applyCliOverrides(loaded.config, parsed.options);
    warnings = loaded.warnings;
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return 2;
    }
    throw error;
  }

  const agent = new MaintenanceAgent(config, deps);
  const logger = getAgentLogger(config.logDir, parseLogLevel(config.logLevel));
  for (const warning of warnings) {
    logger.warn(warning);
  }

  const onSignal = (): void => agent.stop();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    await agent.run(parsed.options.mode);
    return 0;
  } catch (error) {
    logger.critical('Reconciliation run failed', error);
    return 1;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await agent.close();
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error('Fatal error:', error);
      process.exitCode = 1;
    });
}
