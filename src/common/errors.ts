// errors.ts - Error taxonomy for reconciliation runs

export type ReconcileErrorCode =
  | 'SOURCE_UNAVAILABLE'
  | 'SNAPSHOT_CORRUPT'
  | 'METHOD_FAILED'
  | 'ITEM_TERMINAL_FAILURE'
  | 'PERSISTENCE_FAILURE'
  | 'INVENTORY_UNAVAILABLE'
  | 'CONFIG_INVALID';

export class ReconcileError extends Error {
  readonly code: ReconcileErrorCode;

  constructor(code: ReconcileErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An inventory adapter could not run. Recovered as an empty contribution. */
export class SourceUnavailableError extends ReconcileError {
  constructor(readonly source: string, message: string, options?: { cause?: unknown }) {
    super('SOURCE_UNAVAILABLE', `${source}: ${message}`, options);
  }
}

/** A snapshot file exists but cannot be used. Recovered as "no previous snapshot". */
export class SnapshotCorruptError extends ReconcileError {
  constructor(readonly filePath: string, message: string) {
    super('SNAPSHOT_CORRUPT', `${filePath}: ${message}`);
  }
}

/** One removal/install method attempt failed. Recovered by the next method. */
export class MethodFailedError extends ReconcileError {
  constructor(readonly method: string, message: string, options?: { cause?: unknown }) {
    super('METHOD_FAILED', `${method}: ${message}`, options);
  }
}

/** Every method for one item was exhausted. Reported in the summary. */
export class ItemTerminalFailureError extends ReconcileError {
  constructor(readonly item: string, message: string) {
    super('ITEM_TERMINAL_FAILURE', `${item}: ${message}`);
  }
}

/** The snapshot write failed. Reported as a run-level warning. */
export class PersistenceFailureError extends ReconcileError {
  constructor(readonly filePath: string, message: string, options?: { cause?: unknown }) {
    super('PERSISTENCE_FAILURE', `${filePath}: ${message}`, options);
  }
}

/** Every inventory source failed; nothing can be verified. Escapes the run. */
export class InventoryUnavailableError extends ReconcileError {
  constructor(readonly sources: string[]) {
    super('INVENTORY_UNAVAILABLE', `No inventory source could be read (${sources.join(', ') || 'none enabled'})`);
  }
}

export class ConfigError extends ReconcileError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG_INVALID', message, options);
  }
}
