import { z } from 'zod';
import {
  DEFAULT_DB_PATH,
  DEFAULT_MAX_HIERARCHY_DEPTH,
  DEFAULT_MAX_PATH_LENGTH,
  EXTRACTION_DEFAULT_MAX_CHARS,
  EXTRACTION_DEFAULT_MAX_PAGES,
} from './constants';

export const ExtractionStrategySchema = z.enum(['full', 'first_n_pages', 'char_limit']);
export type ExtractionStrategy = z.infer<typeof ExtractionStrategySchema>;

export const ExtractionConfigSchema = z.object({
  strategy: ExtractionStrategySchema,
  maxPages: z.number().int().positive(),
  maxChars: z.number().int().positive(),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

export const SettingsSchema = z.object({
  /** Naming style name; validated when the style is resolved, not here. */
  namingStyle: z.string(),
  maxHierarchyDepth: z.number().int().positive(),
  maxPathLength: z.number().int().positive(),
  /** Optional JSON/YAML taxonomy override. */
  taxonomyFile: z.string().nullable(),
  /** Strict: unknown category/doctype fails. Fallback: it becomes "other". */
  taxonomyStrictMode: z.boolean(),
  dbPath: z.string(),
  extraction: ExtractionConfigSchema,
});

export type Settings = z.infer<typeof SettingsSchema>;

const PositiveIntSchema = z.coerce.number().int().positive();

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const parsed = PositiveIntSchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[Settings] Ignoring ${name}=${JSON.stringify(raw)} (expected a positive integer), using ${fallback}`);
    return fallback;
  }
  return parsed.data;
}

function readBoolean(env: NodeJS.ProcessEnv, name: string, fallback: boolean): boolean {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  if (['1', 'true', 'yes', 'on'].includes(raw)) return true;
  if (['0', 'false', 'no', 'off'].includes(raw)) return false;
  console.warn(`[Settings] Ignoring ${name}=${JSON.stringify(raw)} (expected true/false), using ${fallback}`);
  return fallback;
}

function readExtractionStrategy(env: NodeJS.ProcessEnv): ExtractionStrategy {
  const raw = env.DOCPATH_EXTRACTION_STRATEGY?.trim().toLowerCase();
  if (!raw) return 'first_n_pages';
  const parsed = ExtractionStrategySchema.safeParse(raw);
  if (!parsed.success) {
    console.warn(`[Settings] Unknown extraction strategy '${raw}', using first_n_pages`);
    return 'first_n_pages';
  }
  return parsed.data;
}

/**
 * Read settings from environment variables. Missing values take their defaults.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return SettingsSchema.parse({
    namingStyle: env.DOCPATH_NAMING_STYLE?.trim() || 'descriptive',
    maxHierarchyDepth: readPositiveInt(env, 'DOCPATH_MAX_HIERARCHY_DEPTH', DEFAULT_MAX_HIERARCHY_DEPTH),
    maxPathLength: readPositiveInt(env, 'DOCPATH_MAX_PATH_LENGTH', DEFAULT_MAX_PATH_LENGTH),
    taxonomyFile: env.DOCPATH_TAXONOMY_FILE?.trim() || null,
    taxonomyStrictMode: readBoolean(env, 'DOCPATH_TAXONOMY_STRICT', true),
    dbPath: env.DOCPATH_DB_PATH?.trim() || DEFAULT_DB_PATH,
    extraction: {
      strategy: readExtractionStrategy(env),
      maxPages: readPositiveInt(env, 'DOCPATH_EXTRACTION_MAX_PAGES', EXTRACTION_DEFAULT_MAX_PAGES),
      maxChars: readPositiveInt(env, 'DOCPATH_EXTRACTION_MAX_CHARS', EXTRACTION_DEFAULT_MAX_CHARS),
    },
  });
}

let activeSettings: Readonly<Settings> | null = null;

/**
 * Process-wide settings, read from the environment on first access.
 */
export function getSettings(): Readonly<Settings> {
  if (!activeSettings) {
    activeSettings = Object.freeze(loadSettings());
  }
  return activeSettings;
}

/**
 * Replace the process-wide settings with `overrides` applied on top of the current value.
 * The previous object is never mutated.
 */
export function configureSettings(overrides: Partial<Settings>): Readonly<Settings> {
  const next = SettingsSchema.parse({ ...getSettings(), ...overrides });
  activeSettings = Object.freeze(next);
  return activeSettings;
}

export function resetSettings(): void {
  activeSettings = null;
}
