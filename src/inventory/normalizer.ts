// normalizer.ts - Turns raw adapter records into InventoryItems
import { LogSink } from '../common/logger';
import { InventoryItem, Origin, RawRecord, SourceBatch } from '../types';
import { CanonicalIdentifierSet } from './identifier-set';

interface ExtractionRule {
  /** Display-name fields, most specific first. */
  nameFields: string[];
  /** Other fields that re-identify the entity. */
  idFields: string[];
  /** originMetadata key -> raw field */
  metadata: Record<string, string>;
}

const EXTRACTION_RULES: Record<Origin, ExtractionRule> = {
  PackageManagerA: {
    nameFields: ['Name'],
    idFields: ['Id'],
    metadata: { packageId: 'Id', source: 'Source', version: 'InstalledVersion' },
  },
  PackageManagerB: {
    nameFields: ['Title', 'Name'],
    idFields: ['Name'],
    metadata: { packageName: 'Name', version: 'Version' },
  },
  OSPackage: {
    nameFields: ['Name'],
    idFields: ['PackageFamilyName', 'PackageFullName'],
    metadata: {
      packageName: 'Name',
      packageFullName: 'PackageFullName',
      packageFamilyName: 'PackageFamilyName',
      publisher: 'Publisher',
    },
  },
  ProvisionedPackage: {
    nameFields: ['DisplayName'],
    idFields: ['PackageName'],
    metadata: { displayName: 'DisplayName', packageName: 'PackageName' },
  },
  RegistryUninstall: {
    nameFields: ['DisplayName'],
    idFields: ['KeyName'],
    metadata: {
      keyName: 'KeyName',
      keyPath: 'KeyPath',
      publisher: 'Publisher',
      uninstallString: 'UninstallString',
      quietUninstallString: 'QuietUninstallString',
    },
  },
  WindowsFeature: {
    nameFields: ['DisplayName', 'FeatureName'],
    idFields: ['FeatureName'],
    metadata: { featureName: 'FeatureName' },
  },
  Service: {
    nameFields: ['DisplayName', 'Name'],
    idFields: ['Name'],
    metadata: { serviceName: 'Name', startType: 'StartType' },
  },
  ScheduledTask: {
    nameFields: ['TaskName'],
    idFields: ['FullPath'],
    metadata: { taskName: 'TaskName', taskPath: 'TaskPath' },
  },
  StartMenuShortcut: {
    nameFields: ['Name'],
    idFields: ['FullName'],
    metadata: { path: 'FullName', target: 'Target' },
  },
  StartupEntry: {
    nameFields: ['Name'],
    idFields: [],
    metadata: { valueName: 'Name', location: 'Location', command: 'Command', kind: 'Kind' },
  },
};

function fieldString(record: RawRecord, field: string): string {
  const value = record[field];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return '';
}

/**
 * Build one item from a raw record, or null when the record has no usable identifier.
 */
export function normalizeRecord(origin: Origin, record: RawRecord): InventoryItem | null {
  const rule = EXTRACTION_RULES[origin];

  const names = rule.nameFields.map(field => fieldString(record, field)).filter(Boolean);
  const ids = rule.idFields.map(field => fieldString(record, field)).filter(Boolean);

  let primaryName = names[0] ?? '';
  const candidates = [...names.slice(1), ...ids];
  if (!primaryName && candidates.length > 0) {
    primaryName = candidates.shift() ?? '';
  }
  if (!primaryName) {
    return null;
  }

  const seen = new CanonicalIdentifierSet([primaryName]);
  const alternateIdentifiers = new Set<string>();
  for (const candidate of candidates) {
    if (!seen.has(candidate)) {
      seen.add(candidate);
      alternateIdentifiers.add(candidate);
    }
  }

  const originMetadata: Record<string, string> = {};
  for (const [key, field] of Object.entries(rule.metadata)) {
    const value = fieldString(record, field);
    if (value) originMetadata[key] = value;
  }

  return Object.freeze({
    primaryName,
    alternateIdentifiers,
    origin,
    originMetadata: Object.freeze(originMetadata),
  });
}

/**
 * Merge every adapter's records into one item list. Records describing the
 * same entity from different origins stay separate items.
 */
export function normalizeInventory(batches: SourceBatch[], logger: LogSink): InventoryItem[] {
  const items: InventoryItem[] = [];
  let skipped = 0;

  for (const batch of batches) {
    for (const record of batch.records) {
      const item = normalizeRecord(batch.origin, record);
      if (item) {
        items.push(item);
      } else {
        skipped++;
        logger.debug('Skipped inventory record without identifiers', { source: batch.source, origin: batch.origin });
      }
    }
  }

  if (skipped > 0) {
    logger.info(`Skipped ${skipped} inventory record(s) with no identifying fields`);
  }

  return items;
}

export function identifiersOf(item: InventoryItem): string[] {
  const ids = item.primaryName ? [item.primaryName] : [];
  return [...ids, ...item.alternateIdentifiers];
}

export function buildIdentifierSet(items: InventoryItem[]): CanonicalIdentifierSet {
  const set = new CanonicalIdentifierSet();
  for (const item of items) {
    for (const id of identifiersOf(item)) {
      set.add(id);
    }
  }
  return set;
}
