/**
 * Configuration constants for the path builder, taxonomy and agents.
 * Values that users may override at run time are read by ./settings; these are their defaults.
 */

// ============================================================================
// PATH STRUCTURE
// ============================================================================

/** Maximum number of folder segments in a directory path. */
export const DEFAULT_MAX_HIERARCHY_DEPTH = 5;

/** Maximum length of directoryPath + filename, in characters. */
export const DEFAULT_MAX_PATH_LENGTH = 200;

/**
 * Vendor names that mean "we don't know who issued this document".
 * A path is never built for one of these.
 */
export const RESERVED_VENDOR_NAMES: ReadonlySet<string> = new Set([
  'unknown',
  'n/a',
  'na',
  'none',
  'generic',
]);

// ============================================================================
// TAXONOMY
// ============================================================================

/** Bundled taxonomy used when no override is configured. */
export const DEFAULT_TAXONOMY_NAME = 'household';

/** Category/doctype slug substituted for unresolved values in fallback mode. */
export const FALLBACK_TAXONOMY_SLUG = 'other';

// ============================================================================
// EXTRACTION
// ============================================================================

export const EXTRACTION_DEFAULT_MAX_PAGES = 3; // first_n_pages strategy
export const EXTRACTION_DEFAULT_MAX_CHARS = 10000; // char_limit strategy
export const EXTRACTION_MAX_FILE_SIZE_BYTES = 50 * 1024 * 1024; // 50MB
export const EXTRACTION_TIMEOUT_MS = 60000;

// ============================================================================
// API & TIMEOUT SETTINGS
// ============================================================================

export const API_DEFAULT_TIMEOUT_MS = 180000; // 3 minutes
export const API_DEFAULT_MAX_TOKENS = 2000; // metadata answers are small JSON objects

// ============================================================================
// CACHE
// ============================================================================

export const DEFAULT_DB_PATH = 'docpath-cache.db';
