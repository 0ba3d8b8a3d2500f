// adapters.ts - Read-only inventory sources, one per origin
import { LogSink } from '../common/logger';
import { SourceUnavailableError } from '../common/errors';
import {
  CommandResult,
  CommandRunner,
  asRecordArray,
  runPowerShell,
  tryParseJson,
} from '../execution/command-runner';
import { Origin, RawRecord } from '../types';

export interface SourceCollection {
  available: boolean;
  records: RawRecord[];
}

/**
 * One origin of installed software. collect() never rejects for an
 * unavailable source; it returns { available: false, records: [] }.
 */
export interface InventorySourceAdapter {
  readonly name: string;
  readonly origin: Origin;
  collect(): Promise<SourceCollection>;
}

export interface AdapterDeps {
  runner: CommandRunner;
  logger: LogSink;
  queryTimeoutMs: number;
}

const UNAVAILABLE: SourceCollection = { available: false, records: [] };

abstract class CommandInventoryAdapter implements InventorySourceAdapter {
  abstract readonly name: string;
  abstract readonly origin: Origin;

  constructor(protected deps: AdapterDeps) {}

  protected abstract query(): Promise<CommandResult>;

  protected parse(stdout: string): RawRecord[] {
    return asRecordArray(tryParseJson(stdout));
  }

  async collect(): Promise<SourceCollection> {
    try {
      const result = await this.query();
      if (result.exitCode !== 0) {
        const reason = result.timedOut ? 'query timed out' : `exit code ${result.exitCode}`;
        this.deps.logger.warn('Inventory source unavailable', {
          source: this.name,
          stderr: result.stderr.trim().slice(0, 500),
        }, new SourceUnavailableError(this.name, reason));
        return UNAVAILABLE;
      }
      const records = this.parse(result.stdout);
      this.deps.logger.debug('Inventory source collected', { source: this.name, records: records.length });
      return { available: true, records };
    } catch (error) {
      this.deps.logger.warn('Inventory source failed', { source: this.name },
        new SourceUnavailableError(this.name, 'query threw', { cause: error }));
      return UNAVAILABLE;
    }
  }
}

abstract class PowerShellInventoryAdapter extends CommandInventoryAdapter {
  protected abstract readonly script: string;

  protected query(): Promise<CommandResult> {
    return runPowerShell(this.deps.runner, this.script, { timeoutMs: this.deps.queryTimeoutMs });
  }
}

export class WingetAdapter extends PowerShellInventoryAdapter {
  readonly name = 'winget';
  readonly origin = 'PackageManagerA' as const;
  protected readonly script = `
    $ErrorActionPreference = 'Stop'
    Import-Module Microsoft.WinGet.Client
    Get-WinGetPackage | ForEach-Object {
      [PSCustomObject]@{
        Name = $_.Name
        Id = $_.Id
        Source = $_.Source
        InstalledVersion = $_.InstalledVersion
      }
    } | ConvertTo-Json -Compress
  `;
}

export class ChocolateyAdapter extends CommandInventoryAdapter {
  readonly name = 'chocolatey';
  readonly origin = 'PackageManagerB' as const;

  protected query(): Promise<CommandResult> {
    return this.deps.runner.run('choco', ['list', '--limit-output'], { timeoutMs: this.deps.queryTimeoutMs });
  }

  /** `name|version` per line */
  protected parse(stdout: string): RawRecord[] {
    return stdout
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.includes('|'))
      .map(line => {
        const [name, version] = line.split('|');
        return { Name: name, Version: version };
      });
  }
}

export class AppxPackageAdapter extends PowerShellInventoryAdapter {
  readonly name = 'appx';
  readonly origin = 'OSPackage' as const;
  protected readonly script = `
    $ErrorActionPreference = 'Stop'
    Get-AppxPackage -AllUsers | Where-Object { -not $_.IsFramework } | ForEach-Object {
      [PSCustomObject]@{
        Name = $_.Name
        PackageFullName = $_.PackageFullName
        PackageFamilyName = $_.PackageFamilyName
        Publisher = $_.Publisher
      }
    } | ConvertTo-Json -Compress
  `;
}

export class ProvisionedPackageAdapter extends PowerShellInventoryAdapter {
  readonly name = 'appx-provisioned';
  readonly origin = 'ProvisionedPackage' as const;
  protected readonly script = `
    $ErrorActionPreference = 'Stop'
    Get-AppxProvisionedPackage -Online | ForEach-Object {
      [PSCustomObject]@{ DisplayName = $_.DisplayName; PackageName = $_.PackageName }
    } | ConvertTo-Json -Compress
  `;
}

export class RegistryUninstallAdapter extends PowerShellInventoryAdapter {
  readonly name = 'registry-uninstall';
  readonly origin = 'RegistryUninstall' as const;
  protected readonly script = `
    $paths = @(
      'HKLM:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*',
      'HKLM:\\SOFTWARE\\WOW6432Node\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*',
      'HKCU:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*'
    )
    $paths | ForEach-Object {
      Get-ItemProperty $_ -ErrorAction SilentlyContinue | Where-Object { $_.DisplayName -and $_.SystemComponent -ne 1 }
    } | ForEach-Object {
      [PSCustomObject]@{
        DisplayName = $_.DisplayName
        Publisher = $_.Publisher
        KeyName = $_.PSChildName
        KeyPath = ($_.PSPath -replace '^Microsoft.PowerShell.Core\\\\Registry::', '')
        UninstallString = $_.UninstallString
        QuietUninstallString = $_.QuietUninstallString
      }
    } | ConvertTo-Json -Compress
  `;
}

export class WindowsFeatureAdapter extends PowerShellInventoryAdapter {
  readonly name = 'optional-features';
  readonly origin = 'WindowsFeature' as const;
  protected readonly script = `
    $ErrorActionPreference = 'Stop'
    Get-WindowsOptionalFeature -Online | Where-Object { $_.State -eq 'Enabled' } | ForEach-Object {
      [PSCustomObject]@{ FeatureName = $_.FeatureName }
    } | ConvertTo-Json -Compress
  `;
}

export class ServiceAdapter extends PowerShellInventoryAdapter {
  readonly name = 'services';
  readonly origin = 'Service' as const;
  protected readonly script = `
    $ErrorActionPreference = 'Stop'
    Get-Service | ForEach-Object {
      [PSCustomObject]@{ Name = $_.Name; DisplayName = $_.DisplayName; StartType = [string]$_.StartType }
    } | ConvertTo-Json -Compress
  `;
}

export class ScheduledTaskAdapter extends PowerShellInventoryAdapter {
  readonly name = 'scheduled-tasks';
  readonly origin = 'ScheduledTask' as const;
  protected readonly script = `
    $ErrorActionPreference = 'Stop'
    Get-ScheduledTask | ForEach-Object {
      [PSCustomObject]@{ TaskName = $_.TaskName; TaskPath = $_.TaskPath; FullPath = $_.TaskPath + $_.TaskName }
    } | ConvertTo-Json -Compress
  `;
}

export class StartMenuShortcutAdapter extends PowerShellInventoryAdapter {
  readonly name = 'start-menu';
  readonly origin = 'StartMenuShortcut' as const;
  protected readonly script = `
    $roots = @(
      "$env:ProgramData\\Microsoft\\Windows\\Start Menu\\Programs",
      "$env:APPDATA\\Microsoft\\Windows\\Start Menu\\Programs"
    )
    $shell = New-Object -ComObject WScript.Shell
    $roots | Where-Object { Test-Path $_ } | ForEach-Object {
      Get-ChildItem -Path $_ -Filter *.lnk -Recurse -ErrorAction SilentlyContinue
    } | ForEach-Object {
      [PSCustomObject]@{ Name = $_.BaseName; FullName = $_.FullName; Target = $shell.CreateShortcut($_.FullName).TargetPath }
    } | ConvertTo-Json -Compress
  `;
}

export class StartupEntryAdapter extends PowerShellInventoryAdapter {
  readonly name = 'startup';
  readonly origin = 'StartupEntry' as const;
  protected readonly script = `
    $keys = @(
      'HKLM:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Run',
      'HKCU:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Run'
    )
    $entries = @()
    foreach ($key in $keys) {
      $props = Get-ItemProperty -Path $key -ErrorAction SilentlyContinue
      if ($props) {
        $props.PSObject.Properties | Where-Object { $_.Name -notlike 'PS*' } | ForEach-Object {
          $entries += [PSCustomObject]@{ Name = $_.Name; Command = [string]$_.Value; Location = $key; Kind = 'registry' }
        }
      }
    }
    $folders = @(
      [Environment]::GetFolderPath('Startup'),
      [Environment]::GetFolderPath('CommonStartup')
    )
    foreach ($folder in $folders) {
      Get-ChildItem -Path $folder -ErrorAction SilentlyContinue | ForEach-Object {
        $entries += [PSCustomObject]@{ Name = $_.BaseName; Command = $_.FullName; Location = $folder; Kind = 'folder' }
      }
    }
    $entries | ConvertTo-Json -Compress
  `;
}

export function createDefaultAdapters(deps: AdapterDeps, enabled: Partial<Record<Origin, boolean>> = {}): InventorySourceAdapter[] {
  const adapters: InventorySourceAdapter[] = [
    new WingetAdapter(deps),
    new ChocolateyAdapter(deps),
    new AppxPackageAdapter(deps),
    new ProvisionedPackageAdapter(deps),
    new RegistryUninstallAdapter(deps),
    new WindowsFeatureAdapter(deps),
    new ServiceAdapter(deps),
    new ScheduledTaskAdapter(deps),
    new StartMenuShortcutAdapter(deps),
    new StartupEntryAdapter(deps),
  ];
  return adapters.filter(adapter => enabled[adapter.origin] !== false);
}
