// config.ts - Agent configuration, read once at startup
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../common/errors';
import { safeReadJSONFile } from '../security';
import { ORIGINS } from '../types';

export const DEFAULT_CONFIG_FILE = 'winmaint.config.json';

const BLOATWARE_FILE = 'bloatware.json';
const ESSENTIAL_APPS_FILE = 'essential-apps.json';

const PatternList = z.array(z.string().trim().min(1));

const ConfigFileSchema = z.object({
  dataDir: z.string().min(1).default('./data'),
  logDir: z.string().min(1).nullable().default('./logs'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'critical']).default('info'),
  auditDir: z.string().min(1).nullable().default('./data/audit'),
  historyDb: z.string().min(1).nullable().default('./data/history.db'),
  selectionPolicy: z.enum(['diff', 'full', 'full-when-empty']).default('diff'),
  execution: z.object({
    maxConcurrency: z.number().int().min(1).max(64).default(8),
    dryRun: z.boolean().default(false),
  }).strict().default({}),
  timeouts: z.object({
    packageMs: z.number().int().positive().default(300_000),
    longRunningMs: z.number().int().positive().default(3_600_000),
    queryMs: z.number().int().positive().default(60_000),
  }).strict().default({}),
  sources: z.record(z.enum(ORIGINS), z.boolean()).default({}),
  patterns: z.object({
    customBloatware: PatternList.default([]),
    customEssentialApps: PatternList.default([]),
    keepApps: PatternList.default([]),
    chocolateyNames: z.record(z.string(), z.string().trim().min(1)).default({}),
  }).strict().default({}),
}).strict();

const BuiltInListSchema = z.object({
  patterns: PatternList,
  chocolateyNames: z.record(z.string(), z.string().trim().min(1)).default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ReconcilerConfig extends Omit<ConfigFile, 'patterns'> {
  /** The file the settings came from, or null when defaults were used. */
  configPath: string | null;
  bloatwarePatterns: string[];
  essentialAppPatterns: string[];
  /** Allow-list: matching items are never removed. */
  keepPatterns: string[];
  /** winget package id -> Chocolatey package name */
  chocolateyNames: Record<string, string>;
}

export interface LoadedConfig {
  config: ReconcilerConfig;
  /** Non-fatal problems, logged once a logger exists. */
  warnings: string[];
}

export interface LoadConfigOptions {
  /** Directory holding bloatware.json and essential-apps.json. */
  patternsDir?: string;
}

/**
 * Built-in lists ship in config/ at the package root. Compiled code runs one
 * directory deeper (dist/src/config), so both layouts are checked.
 */
export function defaultPatternsDir(): string {
  const candidates = [
    path.resolve(__dirname, '..', '..', 'config'),
    path.resolve(__dirname, '..', '..', '..', 'config'),
  ];
  return candidates.find(dir => fs.existsSync(path.join(dir, BLOATWARE_FILE))) ?? candidates[0];
}

/**
 * Concatenate lists in order, dropping case-insensitive duplicates and any
 * entry that also appears in `exclude`.
 */
export function mergePatternLists(lists: ReadonlyArray<readonly string[]>, exclude: readonly string[] = []): string[] {
  const seen = new Set(exclude.map(p => p.trim().toLowerCase()));
  const merged: string[] = [];
  for (const list of lists) {
    for (const raw of list) {
      const pattern = raw.trim();
      const key = pattern.toLowerCase();
      if (!pattern || seen.has(key)) continue;
      seen.add(key);
      merged.push(pattern);
    }
  }
  return merged;
}

function readBuiltInList(dir: string, fileName: string): z.infer<typeof BuiltInListSchema> {
  const filePath = path.join(dir, fileName);
  const result = safeReadJSONFile(filePath, BuiltInListSchema);
  if (!result.success) {
    throw new ConfigError(`Built-in pattern list ${filePath} is unusable: ${result.error}`);
  }
  return result.data;
}

function resolveFrom(baseDir: string, value: string): string {
  return path.isAbsolute(value) ? value : path.resolve(baseDir, value);
}

/**
 * Load `winmaint.config.json` (or `configPath`) over the defaults. Relative
 * paths inside the file resolve against the file's own directory. A missing
 * default file is not an error; a missing explicit file or an invalid one is.
 */
export function loadConfig(configPath?: string, options: LoadConfigOptions = {}): LoadedConfig {
  const warnings: string[] = [];
  const filePath = path.resolve(configPath ?? DEFAULT_CONFIG_FILE);

  let file: ConfigFile;
  let source: string | null = null;

  if (fs.existsSync(filePath)) {
    const result = safeReadJSONFile(filePath, ConfigFileSchema);
    if (!result.success) {
      throw new ConfigError(`Invalid configuration in ${filePath}: ${result.error}`);
    }
    file = result.data;
    source = filePath;
  } else if (configPath !== undefined) {
    throw new ConfigError(`Configuration file not found: ${filePath}`);
  } else {
    warnings.push(`No ${DEFAULT_CONFIG_FILE} found, using defaults`);
    file = ConfigFileSchema.parse({});
  }

  const baseDir = source ? path.dirname(source) : process.cwd();
  const patternsDir = options.patternsDir ?? defaultPatternsDir();
  const bloatware = readBuiltInList(patternsDir, BLOATWARE_FILE);
  const essentialApps = readBuiltInList(patternsDir, ESSENTIAL_APPS_FILE);
  const { patterns, ...rest } = file;

  const keepPatterns = mergePatternLists([patterns.keepApps]);
  const config: ReconcilerConfig = {
    ...rest,
    configPath: source,
    dataDir: resolveFrom(baseDir, rest.dataDir),
    logDir: rest.logDir === null ? null : resolveFrom(baseDir, rest.logDir),
    auditDir: rest.auditDir === null ? null : resolveFrom(baseDir, rest.auditDir),
    historyDb: rest.historyDb === null ? null : resolveFrom(baseDir, rest.historyDb),
    bloatwarePatterns: mergePatternLists([bloatware.patterns, patterns.customBloatware], keepPatterns),
    essentialAppPatterns: mergePatternLists([essentialApps.patterns, patterns.customEssentialApps]),
    keepPatterns,
    chocolateyNames: { ...essentialApps.chocolateyNames, ...patterns.chocolateyNames },
  };

  if (config.execution.dryRun) {
    warnings.push('Dry run enabled in configuration: no changes will be made');
  }

  return { config, warnings };
}
