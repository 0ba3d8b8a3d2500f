// helpers.ts - Shared fakes for reconciliation tests
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ReconcilerConfig } from '../src/config/config';
import { CommandResult, CommandRunner, RunOptions } from '../src/execution/command-runner';
import { ActionMethod, MethodCatalog, MethodContext } from '../src/reconcile/methods';
import { ActionMode, InventoryItem, MatchRecord, Origin } from '../src/types';

export function mockLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

export function makeItem(
  origin: Origin,
  primaryName: string,
  alternates: string[] = [],
  originMetadata: Record<string, string> = {}
): InventoryItem {
  return { primaryName, alternateIdentifiers: new Set(alternates), origin, originMetadata };
}

export function exactMatch(item: InventoryItem, pattern: string = item.primaryName): MatchRecord {
  return { pattern, matchedItem: item, matchStrategy: 'Exact', matchedIdentifier: item.primaryName };
}

export function ok(stdout: string = ''): CommandResult {
  return { exitCode: 0, stdout, stderr: '', timedOut: false };
}

export function fail(stderr: string, exitCode: number = 1): CommandResult {
  return { exitCode, stdout: '', stderr, timedOut: false };
}

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

/** Decodes the script out of a runPowerShell() argument list. */
export function decodePowerShell(args: string[]): string | null {
  const index = args.indexOf('-EncodedCommand');
  if (index < 0 || index + 1 >= args.length) return null;
  return Buffer.from(args[index + 1], 'base64').toString('utf16le');
}

export class FakeRunner implements CommandRunner {
  calls: RecordedCall[] = [];

  constructor(private handler: (call: RecordedCall) => CommandResult | Promise<CommandResult> = () => ok()) {}

  async run(command: string, args: string[], options: RunOptions): Promise<CommandResult> {
    const call = { command, args, options };
    this.calls.push(call);
    return this.handler(call);
  }
}

/**
 * Method table keyed by `${mode}:${origin}`; verify answers from a callback.
 */
export class FakeCatalog implements MethodCatalog {
  verifyCalls: Array<{ item: string; mode: ActionMode }> = [];

  constructor(
    private methods: Partial<Record<string, ActionMethod[]>>,
    private verifier: (item: InventoryItem, mode: ActionMode) => boolean | null | Promise<boolean | null>
  ) {}

  methodsFor(mode: ActionMode, origin: Origin): readonly ActionMethod[] {
    return this.methods[`${mode}:${origin}`] ?? [];
  }

  async verify(item: InventoryItem, mode: ActionMode, _ctx: MethodContext): Promise<boolean | null> {
    this.verifyCalls.push({ item: item.primaryName, mode });
    return this.verifier(item, mode);
  }
}

export function method(
  name: string,
  run: (item: InventoryItem, ctx: MethodContext) => Promise<CommandResult>,
  extra: Partial<Pick<ActionMethod, 'lock' | 'timeout' | 'applies'>> = {}
): ActionMethod {
  return { name, timeout: 'package', run, ...extra };
}

export function tempDir(prefix: string = 'winmaint-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Settings with every optional output switched off. */
export function makeConfig(dataDir: string, overrides: Partial<ReconcilerConfig> = {}): ReconcilerConfig {
  return {
    configPath: null,
    dataDir,
    logDir: null,
    logLevel: 'info',
    auditDir: null,
    historyDb: null,
    selectionPolicy: 'diff',
    execution: { maxConcurrency: 4, dryRun: false },
    timeouts: { packageMs: 300, longRunningMs: 3600, queryMs: 60 },
    sources: {},
    bloatwarePatterns: ['Microsoft.XboxApp', 'Microsoft.BingNews'],
    essentialAppPatterns: ['Google.Chrome', 'VideoLAN.VLC'],
    keepPatterns: [],
    chocolateyNames: { 'VideoLAN.VLC': 'vlc' },
    ...overrides,
  };
}
