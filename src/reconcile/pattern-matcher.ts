// pattern-matcher.ts - Matches inventory items against bloatware / essential-app pattern lists
import { identifiersOf } from '../inventory/normalizer';
import { InventoryItem, MatchRecord, MatchStrategy } from '../types';

/** Publisher or app-name fragments shorter than this never produce a partial match. */
const MIN_PARTIAL_LENGTH = 2;

export function normalizeIdentifier(value: string): string {
  return value.replace(/[.\-_\s]+/g, '').toLowerCase();
}

function escapeRegex(value: string): string {
  return value.replace(/[|\\{}()[\]^$+?.]/g, '\\$&');
}

function globToRegex(glob: string): RegExp {
  return new RegExp(`^${glob.split('*').map(escapeRegex).join('.*')}$`, 'i');
}

export interface CompiledPattern {
  pattern: string;
  lower: string;
  normalized: string;
  exactGlob: RegExp | null;
  normalizedGlob: RegExp | null;
  partial: { publisher: string; app: string } | null;
}

export function compilePattern(pattern: string): CompiledPattern {
  const trimmed = pattern.trim();
  const isGlob = trimmed.includes('*');

  let partial: CompiledPattern['partial'] = null;
  const dot = trimmed.indexOf('.');
  if (dot > 0) {
    const publisher = normalizeIdentifier(trimmed.slice(0, dot).replace(/\*/g, ''));
    const app = normalizeIdentifier(trimmed.slice(dot + 1).replace(/\*/g, ''));
    if (publisher.length >= MIN_PARTIAL_LENGTH && app.length >= MIN_PARTIAL_LENGTH) {
      partial = { publisher, app };
    }
  }

  return {
    pattern: trimmed,
    lower: trimmed.toLowerCase(),
    normalized: normalizeIdentifier(trimmed),
    exactGlob: isGlob ? globToRegex(trimmed) : null,
    normalizedGlob: isGlob ? globToRegex(normalizeIdentifier(trimmed)) : null,
    partial,
  };
}

export function compilePatterns(patterns: readonly string[]): CompiledPattern[] {
  return patterns.filter(p => p.trim().length > 0).map(compilePattern);
}

/** Lookup tables for one item, built once per matching pass. */
interface ItemIndex {
  item: InventoryItem;
  byLower: Map<string, string>;
  byNormalized: Map<string, string>;
}

function indexItem(item: InventoryItem): ItemIndex {
  const byLower = new Map<string, string>();
  const byNormalized = new Map<string, string>();
  for (const id of identifiersOf(item)) {
    const lower = id.toLowerCase();
    if (!byLower.has(lower)) byLower.set(lower, id);
    const normalized = normalizeIdentifier(id);
    if (normalized && !byNormalized.has(normalized)) byNormalized.set(normalized, id);
  }
  return { item, byLower, byNormalized };
}

function findByRegex(index: Map<string, string>, regex: RegExp): string | null {
  for (const [key, original] of index) {
    if (regex.test(key)) return original;
  }
  return null;
}

/**
 * Strategies run in precedence order; the first hit wins for the pair.
 */
function matchPattern(
  compiled: CompiledPattern,
  index: ItemIndex
): { strategy: MatchStrategy; identifier: string } | null {
  const exact = compiled.exactGlob
    ? findByRegex(index.byLower, compiled.exactGlob)
    : index.byLower.get(compiled.lower) ?? null;
  if (exact !== null) {
    return { strategy: 'Exact', identifier: exact };
  }

  if (compiled.normalized) {
    const normalized = compiled.normalizedGlob
      ? findByRegex(index.byNormalized, compiled.normalizedGlob)
      : index.byNormalized.get(compiled.normalized) ?? null;
    if (normalized !== null) {
      return { strategy: 'Normalized', identifier: normalized };
    }
  }

  if (compiled.partial) {
    const { publisher, app } = compiled.partial;
    for (const [key, original] of index.byNormalized) {
      if (key.includes(publisher) && key.includes(app)) {
        return { strategy: 'PartialPublisher', identifier: original };
      }
    }
  }

  return null;
}

/**
 * One record per matched item: the first pattern in list order that matches
 * through any strategy. Items without identifiers are skipped.
 */
export function matchInventory(
  items: readonly InventoryItem[],
  patterns: readonly string[] | readonly CompiledPattern[]
): MatchRecord[] {
  const compiled = toCompiled(patterns);
  if (compiled.length === 0) return [];

  const matches: MatchRecord[] = [];
  for (const item of items) {
    const index = indexItem(item);
    if (index.byLower.size === 0) continue;

    for (const pattern of compiled) {
      const hit = matchPattern(pattern, index);
      if (hit) {
        matches.push({
          pattern: pattern.pattern,
          matchedItem: item,
          matchStrategy: hit.strategy,
          matchedIdentifier: hit.identifier,
        });
        break;
      }
    }
  }
  return matches;
}

/** Patterns that no item satisfies, in list order. */
export function findUnmatchedPatterns(
  items: readonly InventoryItem[],
  patterns: readonly string[] | readonly CompiledPattern[]
): string[] {
  const indexes = items.map(indexItem).filter(index => index.byLower.size > 0);
  return toCompiled(patterns)
    .filter(pattern => !indexes.some(index => matchPattern(pattern, index) !== null))
    .map(pattern => pattern.pattern);
}

function toCompiled(patterns: readonly string[] | readonly CompiledPattern[]): CompiledPattern[] {
  const compiled: CompiledPattern[] = [];
  for (const pattern of patterns) {
    if (typeof pattern === 'string') {
      if (pattern.trim()) compiled.push(compilePattern(pattern));
    } else {
      compiled.push(pattern);
    }
  }
  return compiled;
}
