// methods.ts - Ordered removal/installation methods and state probes per origin
import {
  CommandResult,
  CommandRunner,
  psQuote,
  runPowerShell,
} from '../execution/command-runner';
import { normalizeIdentifier } from './pattern-matcher';
import { ActionMode, InventoryItem, Origin } from '../types';

/** External tools that must not run concurrently with themselves. */
export type ToolLock = 'winget' | 'choco' | 'dism';

export type TimeoutClass = 'package' | 'longRunning' | 'query';

export interface MethodContext {
  runner: CommandRunner;
  timeoutMs: number;
}

export interface ActionMethod {
  name: string;
  lock?: ToolLock;
  timeout: TimeoutClass;
  /** False when the item lacks what this method needs (e.g. no uninstall string). */
  applies?(item: InventoryItem): boolean;
  run(item: InventoryItem, ctx: MethodContext): Promise<CommandResult>;
}

export interface MethodCatalog {
  methodsFor(mode: ActionMode, origin: Origin): readonly ActionMethod[];
  /**
   * Re-query the origin's source of truth. true when the item is in the
   * target state for `mode`, null when the query could not tell.
   */
  verify(item: InventoryItem, mode: ActionMode, ctx: MethodContext): Promise<boolean | null>;
}

export type MethodTable = Record<ActionMode, Partial<Record<Origin, readonly ActionMethod[]>>>;

// ===========================================
// HELPERS
// ===========================================

function meta(item: InventoryItem, key: string): string {
  return item.originMetadata[key] ?? '';
}

function has(...keys: string[]): (item: InventoryItem) => boolean {
  return item => keys.every(key => meta(item, key) !== '');
}

function packageId(item: InventoryItem): string {
  return meta(item, 'packageId') || item.primaryName;
}

function chocolateyName(item: InventoryItem): string {
  return meta(item, 'chocolateyName') || meta(item, 'packageName') || normalizeIdentifier(item.primaryName);
}

function ps(ctx: MethodContext, script: string): Promise<CommandResult> {
  return runPowerShell(ctx.runner, script, { timeoutMs: ctx.timeoutMs });
}

/**
 * Split an uninstall string into executable and arguments without a shell.
 * MSI product uninstalls are forced to /X with quiet flags.
 */
export function parseUninstallCommand(commandLine: string): { command: string; args: string[] } | null {
  const trimmed = commandLine.trim();
  if (!trimmed) return null;

  let command: string;
  let rest: string;
  if (trimmed.startsWith('"')) {
    const end = trimmed.indexOf('"', 1);
    if (end < 0) return null;
    command = trimmed.slice(1, end);
    rest = trimmed.slice(end + 1);
  } else {
    const exeEnd = trimmed.search(/\.exe(\s|$)/i);
    const split = exeEnd >= 0 ? exeEnd + 4 : trimmed.search(/\s|$/);
    command = trimmed.slice(0, split);
    rest = trimmed.slice(split);
  }

  const args = rest.match(/"[^"]*"|\S+/g)?.map(arg => arg.replace(/^"(.*)"$/, '$1')) ?? [];

  if (/(^|\\)msiexec(\.exe)?$/i.test(command)) {
    const productArgs = args.map(arg => arg.replace(/^\/I(?=\{)/i, '/X'));
    if (productArgs.length === 1 && /^\{[0-9A-F-]+\}$/i.test(productArgs[0])) {
      productArgs.unshift('/X');
    }
    for (const flag of ['/qn', '/norestart']) {
      if (!productArgs.some(arg => arg.toLowerCase() === flag)) productArgs.push(flag);
    }
    return { command, args: productArgs };
  }

  return { command, args };
}

function runUninstallString(key: 'uninstallString' | 'quietUninstallString') {
  return async (item: InventoryItem, ctx: MethodContext): Promise<CommandResult> => {
    const parsed = parseUninstallCommand(meta(item, key));
    if (!parsed) {
      return { exitCode: -1, stdout: '', stderr: `Invalid ${key}`, timedOut: false };
    }
    return ctx.runner.run(parsed.command, parsed.args, { timeoutMs: ctx.timeoutMs });
  };
}

// ===========================================
// METHODS
// ===========================================

const wingetUninstall: ActionMethod = {
  name: 'winget-uninstall',
  lock: 'winget',
  timeout: 'package',
  run: (item, ctx) => ctx.runner.run('winget', [
    'uninstall', '--id', packageId(item), '--exact', '--silent',
    '--accept-source-agreements', '--disable-interactivity',
  ], { timeoutMs: ctx.timeoutMs }),
};

const chocoUninstall: ActionMethod = {
  name: 'choco-uninstall',
  lock: 'choco',
  timeout: 'package',
  run: (item, ctx) => ctx.runner.run('choco', [
    'uninstall', chocolateyName(item), '-y', '--no-progress', '--remove-dependencies',
  ], { timeoutMs: ctx.timeoutMs }),
};

const registryUninstallString: ActionMethod = {
  name: 'registry-uninstall-string',
  timeout: 'package',
  applies: has('uninstallString'),
  run: runUninstallString('uninstallString'),
};

const registryQuietUninstallString: ActionMethod = {
  name: 'registry-quiet-uninstall-string',
  timeout: 'package',
  applies: has('quietUninstallString'),
  run: runUninstallString('quietUninstallString'),
};

const removeAppxPackage: ActionMethod = {
  name: 'remove-appx-package',
  timeout: 'package',
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    Get-AppxPackage -AllUsers -Name ${psQuote(meta(item, 'packageName') || item.primaryName)} |
      Remove-AppxPackage -AllUsers
  `),
};

function provisionedName(item: InventoryItem): string {
  return meta(item, 'displayName') || meta(item, 'packageName') || item.primaryName;
}

const removeProvisionedPackage: ActionMethod = {
  name: 'remove-provisioned-package',
  timeout: 'package',
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    Get-AppxProvisionedPackage -Online |
      Where-Object { $_.DisplayName -eq ${psQuote(provisionedName(item))} } |
      Remove-AppxProvisionedPackage -Online -AllUsers
  `),
};

const dismRemoveProvisioned: ActionMethod = {
  name: 'dism-remove-provisioned',
  lock: 'dism',
  timeout: 'longRunning',
  applies: item => item.origin === 'ProvisionedPackage' ? has('packageName')(item) : true,
  run: async (item, ctx) => {
    let fullName = item.origin === 'ProvisionedPackage' ? meta(item, 'packageName') : '';
    if (!fullName) {
      const lookup = await runPowerShell(ctx.runner, `
        Get-AppxProvisionedPackage -Online |
          Where-Object { $_.DisplayName -eq ${psQuote(provisionedName(item))} } |
          Select-Object -ExpandProperty PackageName -First 1
      `, { timeoutMs: ctx.timeoutMs });
      fullName = lookup.stdout.trim();
      if (!fullName) {
        return { exitCode: 1, stdout: '', stderr: 'No provisioned package found', timedOut: lookup.timedOut };
      }
    }
    return ctx.runner.run('dism.exe', [
      '/Online', '/Remove-ProvisionedAppxPackage', `/PackageName:${fullName}`, '/NoRestart',
    ], { timeoutMs: ctx.timeoutMs });
  },
};

const registryAppxDeprovision: ActionMethod = {
  name: 'registry-appx-deprovision',
  timeout: 'query',
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    $family = (Get-AppxProvisionedPackage -Online | Where-Object { $_.DisplayName -eq ${psQuote(provisionedName(item))} } |
      Select-Object -First 1).PackageName -replace '_[^_]+_[^_]+_[^_]*_', '_'
    if (-not $family) { $family = ${psQuote(provisionedName(item))} }
    $key = "HKLM:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Appx\\AppxAllUserStore\\Deprovisioned\\$family"
    New-Item -Path $key -Force | Out-Null
  `),
};

const disableOptionalFeature: ActionMethod = {
  name: 'disable-optional-feature',
  timeout: 'longRunning',
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    Disable-WindowsOptionalFeature -Online -FeatureName ${psQuote(meta(item, 'featureName') || item.primaryName)} -NoRestart | Out-Null
  `),
};

const dismDisableFeature: ActionMethod = {
  name: 'dism-disable-feature',
  lock: 'dism',
  timeout: 'longRunning',
  run: (item, ctx) => ctx.runner.run('dism.exe', [
    '/Online', '/Disable-Feature', `/FeatureName:${meta(item, 'featureName') || item.primaryName}`, '/NoRestart',
  ], { timeoutMs: ctx.timeoutMs }),
};

const stopAndDisableService: ActionMethod = {
  name: 'stop-and-disable-service',
  timeout: 'query',
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    $name = ${psQuote(meta(item, 'serviceName') || item.primaryName)}
    Stop-Service -Name $name -Force -ErrorAction SilentlyContinue
    Set-Service -Name $name -StartupType Disabled
  `),
};

const scDeleteService: ActionMethod = {
  name: 'sc-delete-service',
  timeout: 'query',
  run: (item, ctx) => ctx.runner.run('sc.exe', ['delete', meta(item, 'serviceName') || item.primaryName], { timeoutMs: ctx.timeoutMs }),
};

function taskPath(item: InventoryItem): string {
  return meta(item, 'taskPath') || '\\';
}

const unregisterScheduledTask: ActionMethod = {
  name: 'unregister-scheduled-task',
  timeout: 'query',
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    Unregister-ScheduledTask -TaskName ${psQuote(meta(item, 'taskName') || item.primaryName)} -TaskPath ${psQuote(taskPath(item))} -Confirm:$false
  `),
};

const schtasksDelete: ActionMethod = {
  name: 'schtasks-delete',
  timeout: 'query',
  run: (item, ctx) => ctx.runner.run('schtasks.exe', [
    '/Delete', '/TN', `${taskPath(item)}${meta(item, 'taskName') || item.primaryName}`, '/F',
  ], { timeoutMs: ctx.timeoutMs }),
};

const deleteShortcut: ActionMethod = {
  name: 'delete-shortcut',
  timeout: 'query',
  applies: has('path'),
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    Remove-Item -LiteralPath ${psQuote(meta(item, 'path'))} -Force
  `),
};

const removeStartupRegistryValue: ActionMethod = {
  name: 'remove-startup-registry-value',
  timeout: 'query',
  applies: item => meta(item, 'kind') !== 'folder' && has('location', 'valueName')(item),
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    Remove-ItemProperty -Path ${psQuote(meta(item, 'location'))} -Name ${psQuote(meta(item, 'valueName'))} -Force
  `),
};

const deleteStartupFolderItem: ActionMethod = {
  name: 'delete-startup-folder-item',
  timeout: 'query',
  applies: item => meta(item, 'kind') === 'folder' && has('command')(item),
  run: (item, ctx) => ps(ctx, `
    $ErrorActionPreference = 'Stop'
    Remove-Item -LiteralPath ${psQuote(meta(item, 'command'))} -Force
  `),
};

const wingetInstall: ActionMethod = {
  name: 'winget-install',
  lock: 'winget',
  timeout: 'package',
  run: (item, ctx) => ctx.runner.run('winget', [
    'install', '--id', packageId(item), '--exact', '--silent',
    '--accept-package-agreements', '--accept-source-agreements', '--disable-interactivity',
  ], { timeoutMs: ctx.timeoutMs }),
};

const chocoInstall: ActionMethod = {
  name: 'choco-install',
  lock: 'choco',
  timeout: 'package',
  run: (item, ctx) => ctx.runner.run('choco', [
    'install', chocolateyName(item), '-y', '--no-progress',
  ], { timeoutMs: ctx.timeoutMs }),
};

export const WINDOWS_METHOD_TABLE: MethodTable = {
  remove: {
    PackageManagerA: [wingetUninstall, registryUninstallString],
    PackageManagerB: [chocoUninstall, registryUninstallString],
    OSPackage: [removeAppxPackage, removeProvisionedPackage, dismRemoveProvisioned],
    ProvisionedPackage: [removeProvisionedPackage, dismRemoveProvisioned, registryAppxDeprovision],
    RegistryUninstall: [registryQuietUninstallString, registryUninstallString, wingetUninstall],
    WindowsFeature: [disableOptionalFeature, dismDisableFeature],
    Service: [stopAndDisableService, scDeleteService],
    ScheduledTask: [unregisterScheduledTask, schtasksDelete],
    StartMenuShortcut: [deleteShortcut],
    StartupEntry: [removeStartupRegistryValue, deleteStartupFolderItem],
  },
  install: {
    PackageManagerA: [wingetInstall, chocoInstall],
    PackageManagerB: [chocoInstall, wingetInstall],
  },
};

// ===========================================
// PROBES
// ===========================================

export type Probe = (item: InventoryItem, ctx: MethodContext) => Promise<boolean | null>;

/** Runs a script that prints PRESENT or ABSENT. */
function psPresence(script: (item: InventoryItem) => string): Probe {
  return async (item, ctx) => {
    const result = await runPowerShell(ctx.runner, script(item), { timeoutMs: ctx.timeoutMs });
    const output = result.stdout.trim().toUpperCase();
    if (output.endsWith('ABSENT')) return false;
    if (output.endsWith('PRESENT')) return true;
    return null;
  };
}

function presenceScript(test: string): string {
  return `if (${test}) { 'PRESENT' } else { 'ABSENT' }`;
}

const wingetPresent: Probe = async (item, ctx) => {
  const result = await ctx.runner.run('winget', [
    'list', '--id', packageId(item), '--exact', '--accept-source-agreements', '--disable-interactivity',
  ], { timeoutMs: ctx.timeoutMs });
  if (result.timedOut) return null;
  return result.exitCode === 0 && result.stdout.toLowerCase().includes(packageId(item).toLowerCase());
};

const chocoPresent: Probe = async (item, ctx) => {
  const name = chocolateyName(item);
  const result = await ctx.runner.run('choco', ['list', '--limit-output', '--exact', name], { timeoutMs: ctx.timeoutMs });
  if (result.timedOut) return null;
  if (result.exitCode !== 0) return null;
  return result.stdout
    .split(/\r?\n/)
    .some(line => line.trim().toLowerCase().startsWith(`${name.toLowerCase()}|`));
};

const PRESENCE_PROBES: Record<Origin, Probe> = {
  PackageManagerA: wingetPresent,
  PackageManagerB: chocoPresent,
  OSPackage: psPresence(item => presenceScript(
    `Get-AppxPackage -AllUsers -Name ${psQuote(meta(item, 'packageName') || item.primaryName)}`
  )),
  ProvisionedPackage: psPresence(item => presenceScript(
    `Get-AppxProvisionedPackage -Online | Where-Object { $_.DisplayName -eq ${psQuote(provisionedName(item))} }`
  )),
  RegistryUninstall: psPresence(item => presenceScript(
    meta(item, 'keyPath')
      ? `Test-Path -LiteralPath ${psQuote(`Registry::${meta(item, 'keyPath')}`)}`
      : `Get-ItemProperty 'HKLM:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*','HKLM:\\SOFTWARE\\WOW6432Node\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*' -ErrorAction SilentlyContinue | Where-Object { $_.DisplayName -eq ${psQuote(item.primaryName)} }`
  )),
  WindowsFeature: psPresence(item => presenceScript(
    `(Get-WindowsOptionalFeature -Online -FeatureName ${psQuote(meta(item, 'featureName') || item.primaryName)}).State -eq 'Enabled'`
  )),
  Service: psPresence(item => presenceScript(
    `($svc = Get-Service -Name ${psQuote(meta(item, 'serviceName') || item.primaryName)} -ErrorAction SilentlyContinue) -and $svc.StartType -ne 'Disabled'`
  )),
  ScheduledTask: psPresence(item => presenceScript(
    `Get-ScheduledTask -TaskName ${psQuote(meta(item, 'taskName') || item.primaryName)} -TaskPath ${psQuote(taskPath(item))} -ErrorAction SilentlyContinue`
  )),
  StartMenuShortcut: psPresence(item => presenceScript(
    `Test-Path -LiteralPath ${psQuote(meta(item, 'path'))}`
  )),
  StartupEntry: psPresence(item => presenceScript(
    meta(item, 'kind') === 'folder'
      ? `Test-Path -LiteralPath ${psQuote(meta(item, 'command'))}`
      : `(Get-ItemProperty -Path ${psQuote(meta(item, 'location'))} -ErrorAction SilentlyContinue).PSObject.Properties.Name -contains ${psQuote(meta(item, 'valueName'))}`
  )),
};

/**
 * Catalog over a method table. Install targets count as present when either
 * package manager reports them, since the fallback may have used the other one.
 */
export class TableMethodCatalog implements MethodCatalog {
  constructor(
    private table: MethodTable = WINDOWS_METHOD_TABLE,
    private probes: Record<Origin, Probe> = PRESENCE_PROBES
  ) {}

  methodsFor(mode: ActionMode, origin: Origin): readonly ActionMethod[] {
    return this.table[mode][origin] ?? [];
  }

  async verify(item: InventoryItem, mode: ActionMode, ctx: MethodContext): Promise<boolean | null> {
    if (mode === 'remove') {
      const present = await this.probes[item.origin](item, ctx);
      return present === null ? null : !present;
    }

    const primary = await this.probes[item.origin](item, ctx);
    if (primary === true) return true;
    if (item.origin === 'PackageManagerA' || item.origin === 'PackageManagerB') {
      const other = item.origin === 'PackageManagerA' ? this.probes.PackageManagerB : this.probes.PackageManagerA;
      const secondary = await other(item, ctx);
      if (secondary === true) return true;
      if (primary === null && secondary === null) return null;
      return false;
    }
    return primary;
  }
}
