// diff-engine.ts - Set difference between this run's identifiers and the previous snapshot
import { CanonicalIdentifierSet } from '../inventory/identifier-set';
import { identifiersOf } from '../inventory/normalizer';
import { InventoryItem, SelectionPolicy } from '../types';

export interface DiffResult {
  /** In current but not in the previous snapshot. */
  newlyObserved: CanonicalIdentifierSet;
  /** In the previous snapshot but gone from current. */
  previouslyObserved: CanonicalIdentifierSet;
  /** In both. */
  unchanged: CanonicalIdentifierSet;
  firstRun: boolean;
}

/**
 * Linear in |current| + |previous|. Reports sets only; whether an empty
 * result should widen to a full scan is decided by selectForMatching().
 */
export function diffIdentifierSets(
  current: CanonicalIdentifierSet,
  previous: CanonicalIdentifierSet | null
): DiffResult {
  if (!previous) {
    return {
      newlyObserved: new CanonicalIdentifierSet(current),
      previouslyObserved: new CanonicalIdentifierSet(),
      unchanged: new CanonicalIdentifierSet(),
      firstRun: true,
    };
  }

  const newlyObserved = new CanonicalIdentifierSet();
  const unchanged = new CanonicalIdentifierSet();
  for (const id of current) {
    if (previous.has(id)) {
      unchanged.add(id);
    } else {
      newlyObserved.add(id);
    }
  }

  const previouslyObserved = new CanonicalIdentifierSet();
  for (const id of previous) {
    if (!current.has(id)) {
      previouslyObserved.add(id);
    }
  }

  return { newlyObserved, previouslyObserved, unchanged, firstRun: false };
}

export interface Selection {
  items: InventoryItem[];
  scope: 'diff' | 'full';
  reason: string;
}

/**
 * The one place where the diff narrows what the pattern matcher sees.
 * `full-when-empty` widens to every item when an existing snapshot
 * produced nothing new.
 */
export function selectForMatching(
  items: InventoryItem[],
  diff: DiffResult,
  policy: SelectionPolicy
): Selection {
  if (policy === 'full') {
    return { items, scope: 'full', reason: 'full scan requested' };
  }

  if (diff.firstRun) {
    return { items, scope: 'full', reason: 'no previous snapshot' };
  }

  if (diff.newlyObserved.size === 0 && policy === 'full-when-empty') {
    return { items, scope: 'full', reason: 'no new identifiers since last run; rechecking everything' };
  }

  const selected = items.filter(item => identifiersOf(item).some(id => diff.newlyObserved.has(id)));
  return { items: selected, scope: 'diff', reason: `${diff.newlyObserved.size} new identifier(s) since last run` };
}
