/**
 * Deterministic path builder.
 *
 * Turns canonical metadata into Domain/Category/Doctypes/ + filename using the configured
 * naming style, then enforces the structural rules every style shares:
 * - no periods in folder names
 * - at most `maxHierarchyDepth` folders
 * - exactly one period in the filename (the extension separator)
 * - at most `maxPathLength` characters overall, shortening only the subject to get there
 *
 * Pure: same input and options always give the same PathMetadata.
 */
import { getSettings } from '../config/settings';
import { RESERVED_VENDOR_NAMES } from '../config/constants';
import { PathBuildError } from '../errors';
import { getNamingStyle } from '../naming/registry';
import type { CanonicalMetadata, NamingStyle } from '../naming/types';

export type PathMetadata = {
  /** Folders joined by "/", with a trailing "/" (e.g. "Financial/Banking/Statements/"). */
  readonly directoryPath: string;
  /** Basename + extension (e.g. "statement_chase_checking_20240115.pdf"). */
  readonly filename: string;
  /** directoryPath + filename */
  readonly fullPath: string;
};

export type BuildPathInput = {
  domain: string;
  category: string;
  doctype: string;
  vendorName: string;
  subject?: string | null;
  /** YYYY, YYYYMM or YYYYMMDD; empty when the document has no usable date. */
  date?: string | null;
  /** Including the leading period, e.g. ".pdf". Case is preserved. */
  fileExtension: string;
  version?: string | null;
};

export type PathBuilderOptions = {
  namingStyle: string;
  maxHierarchyDepth: number;
  maxPathLength: number;
};

function clean(value: string | null | undefined): string {
  return (value ?? '').trim().toLowerCase();
}

export function toCanonicalMetadata(input: BuildPathInput): CanonicalMetadata {
  const version = clean(input.version);
  return Object.freeze({
    domain: clean(input.domain),
    category: clean(input.category),
    doctype: clean(input.doctype),
    vendorName: clean(input.vendorName),
    subject: clean(input.subject),
    date: clean(input.date),
    ...(version ? { version } : {}),
  });
}

export function assertKnownVendor(vendorName: string): void {
  if (!vendorName || RESERVED_VENDOR_NAMES.has(vendorName)) {
    throw new PathBuildError(
      'invalid_vendor',
      `Cannot build path with unknown vendor (got: '${vendorName}'). ` +
        'A specific vendor must be determined from the document content.',
      { value: vendorName, reserved: [...RESERVED_VENDOR_NAMES] }
    );
  }
}

function folderSegments(directoryPath: string): string[] {
  return directoryPath.replace(/\/+$/, '').split('/');
}

export function assertNoPeriodsInFolders(directoryPath: string): void {
  for (const folder of folderSegments(directoryPath)) {
    if (folder.includes('.')) {
      throw new PathBuildError(
        'period_in_folder',
        `Folder name '${folder}' contains a period. Folder names must not contain periods.`,
        { value: folder }
      );
    }
  }
}

export function assertHierarchyDepth(directoryPath: string, maxDepth: number): void {
  const depth = folderSegments(directoryPath).length;
  if (depth > maxDepth) {
    throw new PathBuildError(
      'depth_exceeded',
      `Directory hierarchy depth (${depth}) exceeds maximum allowed (${maxDepth}).`,
      { actual: depth, limit: maxDepth }
    );
  }
}

export function assertSinglePeriod(filename: string): void {
  const periods = filename.split('.').length - 1;
  if (periods !== 1) {
    throw new PathBuildError(
      'invalid_filename',
      `Filename '${filename}' must contain exactly one period (the extension separator), found ${periods}.`,
      { value: filename, actual: periods }
    );
  }
}

/**
 * Shorten the subject by `overflow` characters, dropping separators left dangling at the cut.
 * A cut that leaves nothing drops the subject (and its separator) entirely.
 * Returns null when there is no subject to shorten.
 */
function truncateSubject(metadata: CanonicalMetadata, overflow: number): CanonicalMetadata | null {
  if (!metadata.subject) return null;
  const keep = Math.max(metadata.subject.length - overflow, 0);
  const subject = metadata.subject.slice(0, keep).replace(/[_-]+$/, '');
  return Object.freeze({ ...metadata, subject });
}

function pathTooLong(fullPath: string, maxPathLength: number): PathBuildError {
  return new PathBuildError(
    'path_too_long',
    `Path too long: ${fullPath.length} chars. Maximum allowed: ${maxPathLength} chars. Path: ${fullPath}`,
    { actual: fullPath.length, limit: maxPathLength, value: fullPath }
  );
}

function composeFilename(style: NamingStyle, metadata: CanonicalMetadata, extension: string): string {
  const filename = style.filename(metadata, extension);
  assertSinglePeriod(filename);
  return filename;
}

/**
 * Build the directory path and filename for a classified document.
 *
 * Options default to the process settings (naming style, depth and length limits).
 * Throws PathBuildError or UnknownNamingStyleError; never returns a partial result.
 */
export function buildPath(input: BuildPathInput, options: Partial<PathBuilderOptions> = {}): PathMetadata {
  const settings = getSettings();
  const namingStyle = options.namingStyle ?? settings.namingStyle;
  const maxHierarchyDepth = options.maxHierarchyDepth ?? settings.maxHierarchyDepth;
  const maxPathLength = options.maxPathLength ?? settings.maxPathLength;

  const metadata = toCanonicalMetadata(input);
  const extension = input.fileExtension.trim();

  assertKnownVendor(metadata.vendorName);

  const style = getNamingStyle(namingStyle);

  const directoryPath = `${style.folderComponents(metadata).join('/')}/`;
  assertNoPeriodsInFolders(directoryPath);
  assertHierarchyDepth(directoryPath, maxHierarchyDepth);

  let filename = composeFilename(style, metadata, extension);
  let fullPath = `${directoryPath}${filename}`;

  if (fullPath.length > maxPathLength) {
    // One retry with a shorter subject; everything else is kept verbatim.
    const shortened = truncateSubject(metadata, fullPath.length - maxPathLength);
    if (!shortened) {
      throw pathTooLong(fullPath, maxPathLength);
    }
    filename = composeFilename(style, shortened, extension);
    fullPath = `${directoryPath}${filename}`;
    if (fullPath.length > maxPathLength) {
      throw pathTooLong(fullPath, maxPathLength);
    }
  }

  return Object.freeze({ directoryPath, filename, fullPath });
}
