// command-runner.ts - Subprocess execution without a shell
import { execFile, ExecFileException } from 'child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  timeoutMs: number;
  cwd?: string;
  /** Kills the child process when aborted. */
  signal?: AbortSignal;
}

export interface CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<CommandResult>;
}

const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

function exitCodeOf(error: ExecFileException): number {
  return typeof error.code === 'number' ? error.code : -1;
}

/**
 * Runs tools through execFile with argument arrays (shell: false). Resolves for
 * every outcome, including non-zero exits, spawn failures and timeouts.
 */
export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
    return new Promise(resolve => {
      execFile(
        command,
        args,
        {
          encoding: 'utf8',
          timeout: options.timeoutMs,
          cwd: options.cwd,
          signal: options.signal,
          shell: false,
          windowsHide: true,
          maxBuffer: MAX_OUTPUT_BYTES,
        },
        (error, stdout, stderr) => {
          if (!error) {
            resolve({ exitCode: 0, stdout, stderr, timedOut: false });
            return;
          }

          const timedOut = error.killed === true && error.signal === 'SIGTERM' && !options.signal?.aborted;
          resolve({
            exitCode: exitCodeOf(error),
            stdout: stdout || '',
            stderr: stderr || (timedOut ? `Operation timed out after ${options.timeoutMs}ms` : error.message),
            timedOut,
          });
        }
      );
    });
  }
}

/**
 * Execute a PowerShell script. -EncodedCommand keeps quoting out of the
 * argument list.
 */
export function runPowerShell(runner: CommandRunner, script: string, options: RunOptions): Promise<CommandResult> {
  const encodedCommand = Buffer.from(script, 'utf16le').toString('base64');

  return runner.run('powershell.exe', [
    '-NoProfile',
    '-NonInteractive',
    '-ExecutionPolicy', 'Bypass',
    '-EncodedCommand', encodedCommand
  ], options);
}

/** Quote a value for use inside a single-quoted PowerShell string. */
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function tryParseJson(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (!trimmed) return null;
  try {
    return JSON.parse(trimmed);
  } catch {
    return null;
  }
}

/** ConvertTo-Json emits a bare object for a single result. */
export function asRecordArray(data: unknown): Record<string, unknown>[] {
  const list = Array.isArray(data) ? data : data === null || data === undefined ? [] : [data];
  return list.filter((entry): entry is Record<string, unknown> =>
    typeof entry === 'object' && entry !== null && !Array.isArray(entry)
  );
}
