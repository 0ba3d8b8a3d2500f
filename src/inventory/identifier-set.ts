// identifier-set.ts - Case-insensitive identifier set shared by the snapshot store and diff engine

/**
 * Set of identifier strings compared case-insensitively. The first casing seen
 * for an identifier is the one returned by values().
 */
export class CanonicalIdentifierSet implements Iterable<string> {
  private entries: Map<string, string> = new Map();

  constructor(values: Iterable<string> = []) {
    for (const value of values) {
      this.add(value);
    }
  }

  static key(value: string): string {
    return value.trim().toLowerCase();
  }

  add(value: string): this {
    const trimmed = value.trim();
    if (!trimmed) return this;
    const key = CanonicalIdentifierSet.key(trimmed);
    if (!this.entries.has(key)) {
      this.entries.set(key, trimmed);
    }
    return this;
  }

  has(value: string): boolean {
    return this.entries.has(CanonicalIdentifierSet.key(value));
  }

  get size(): number {
    return this.entries.size;
  }

  values(): string[] {
    return [...this.entries.values()];
  }

  /** Sorted output so that persisted snapshots are stable between runs. */
  toSortedArray(): string[] {
    return this.values().sort((a, b) => a.localeCompare(b));
  }

  equals(other: CanonicalIdentifierSet): boolean {
    if (other.size !== this.size) return false;
    for (const key of this.entries.keys()) {
      if (!other.entries.has(key)) return false;
    }
    return true;
  }

  [Symbol.iterator](): Iterator<string> {
    return this.entries.values();
  }
}
