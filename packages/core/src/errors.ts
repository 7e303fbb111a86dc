/**
 * Error types raised by docpath.
 *
 * Resolver lookups never throw (absence is reported as `undefined`); everything that
 * does throw carries enough context in `details` for the caller to decide what to do.
 */

export type ErrorDetails = Record<string, unknown>;

export class DocpathError extends Error {
  readonly details: ErrorDetails | undefined;

  constructor(message: string, details?: ErrorDetails) {
    super(message);
    this.name = this.constructor.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type PathBuildErrorCode =
  | 'invalid_vendor'
  | 'missing_field'
  | 'invalid_characters'
  | 'invalid_date'
  | 'invalid_version'
  | 'period_in_folder'
  | 'depth_exceeded'
  | 'invalid_filename'
  | 'path_too_long';

/** Raised by naming styles and the path builder when metadata cannot become a valid path. */
export class PathBuildError extends DocpathError {
  readonly code: PathBuildErrorCode;

  constructor(code: PathBuildErrorCode, message: string, details?: ErrorDetails) {
    super(message, details);
    this.code = code;
  }
}

export class UnknownNamingStyleError extends DocpathError {
  readonly allowed: readonly string[];

  constructor(requested: string, allowed: readonly string[]) {
    super(`Unknown naming style '${requested}'. Allowed: ${allowed.join(', ')}`, { requested });
    this.allowed = allowed;
  }
}

/** Strict-mode rejection of domain/category/doctype values outside the taxonomy. */
export class TaxonomyValidationError extends DocpathError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[], filename?: string) {
    const suffix = filename ? ` for '${filename}'` : '';
    super(`Taxonomy validation failed: ${problems.join('; ')}${suffix}`, { filename });
    this.problems = problems;
  }
}

/** The model answered, but not with something we can use. */
export class LLMResponseError extends DocpathError {}
