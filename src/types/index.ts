// Type definitions

export const ORIGINS = [
  'PackageManagerA',
  'PackageManagerB',
  'OSPackage',
  'ProvisionedPackage',
  'RegistryUninstall',
  'WindowsFeature',
  'Service',
  'ScheduledTask',
  'StartMenuShortcut',
  'StartupEntry',
] as const;

/**
 * Where an inventory item was observed. PackageManagerA is winget,
 * PackageManagerB is Chocolatey, OSPackage is a per-user Appx package.
 */
export type Origin = typeof ORIGINS[number];

export type RawRecord = Record<string, unknown>;

export interface SourceBatch {
  source: string;
  origin: Origin;
  records: RawRecord[];
}

export interface InventoryItem {
  readonly primaryName: string;
  readonly alternateIdentifiers: ReadonlySet<string>;
  readonly origin: Origin;
  readonly originMetadata: Readonly<Record<string, string>>;
}

export type SnapshotPurpose = 'bloatware' | 'essential-apps';

export type ActionMode = 'remove' | 'install';

export type MatchStrategy = 'Exact' | 'Normalized' | 'PartialPublisher';

export interface MatchRecord {
  pattern: string;
  matchedItem: InventoryItem;
  matchStrategy: MatchStrategy;
  /** The identifier of the item that satisfied the pattern. */
  matchedIdentifier: string;
}

export type OutcomeStatus = 'success' | 'partial' | 'failed' | 'skipped';

export interface MethodAttempt {
  method: string;
  reportedSuccess: boolean;
  verified: boolean;
  timedOut: boolean;
  durationMs: number;
  error?: string;
}

export interface ActionOutcome {
  item: InventoryItem;
  mode: ActionMode;
  status: OutcomeStatus;
  success: boolean;
  methodUsed: string;
  error?: string;
  attempts: MethodAttempt[];
  durationMs: number;
}

export interface RunSummary {
  total: number;
  succeeded: number;
  partial: number;
  failed: number;
  skipped: number;
  byMethod: Record<string, number>;
  failures: Array<{ item: string; origin: Origin; error: string }>;
}

export type SelectionPolicy = 'diff' | 'full' | 'full-when-empty';
