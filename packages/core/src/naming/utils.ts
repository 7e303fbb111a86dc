import { PathBuildError } from '../errors';

/** Allowed characters for every emitted component; case-insensitive so Title_Case folders pass. */
export const ALLOWED_CHARACTERS = /^[a-z0-9_-]+$/i;

/** YYYY, YYYYMM or YYYYMMDD. */
export const DATE_PATTERN = /^\d{4}(\d{2}(\d{2})?)?$/;

/** vNN, final or draft. */
export const VERSION_PATTERN = /^(v\d{2}|final|draft)$/;

const IRREGULAR_PLURALS: Record<string, string> = {
  policy: 'Policies',
  '1099': '1099s',
  '1040': '1040s',
  w2: 'W2s',
};

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * home_improvement → Home_Improvement
 */
export function toTitleCase(text: string): string {
  if (!text) return text;
  return text
    .split('_')
    .filter((word) => word.length > 0)
    .map(capitalize)
    .join('_');
}

/**
 * Plural, title-cased form of a doctype for its container folder:
 * receipt → Receipts, lab_results → Lab_Results, box → Boxes, policy → Policies.
 */
export function pluralizeDoctype(doctype: string): string {
  const irregular = IRREGULAR_PLURALS[doctype.toLowerCase()];
  if (irregular) return irregular;

  const formatted = toTitleCase(doctype);

  // Already plural (Accounts, Lab_Results) unless it is an -ss/-es/-xs/-zs word
  if (formatted.endsWith('s') && !/(ss|es|xs|zs)$/.test(formatted)) {
    return formatted;
  }
  if (formatted.length > 1 && formatted.endsWith('y') && !'aeiou'.includes(formatted.charAt(formatted.length - 2))) {
    return formatted.slice(0, -1) + 'ies';
  }
  if (/(s|x|z|ch|sh)$/.test(formatted)) {
    return formatted + 'es';
  }
  return formatted + 's';
}

/**
 * Throw unless every character of `text` is allowed by `pattern`.
 */
export function ensureAllowed(text: string, pattern: RegExp, field: string): void {
  if (pattern.test(text)) return;

  const invalid = [...new Set([...text].filter((c) => !/[a-z0-9_-]/i.test(c)))];
  const listed = invalid.map((c) => JSON.stringify(c)).join(', ');
  throw new PathBuildError(
    'invalid_characters',
    `Invalid characters in ${field}: ${listed || '(empty)'}. ` +
      'Only a-z, 0-9, underscores (_), and hyphens (-) are allowed.',
    { field, value: text, invalid, pattern: pattern.source }
  );
}

/**
 * Throw unless `value` is non-empty.
 */
export function requireField(value: string, field: string, style: string): void {
  if (!value) {
    throw new PathBuildError('missing_field', `Missing required field '${field}' for ${style} style`, {
      field,
      style,
    });
  }
}

export function ensureDate(date: string, style: string): void {
  if (!DATE_PATTERN.test(date)) {
    throw new PathBuildError(
      'invalid_date',
      `Invalid date format for ${style} style: '${date}' (expected YYYY, YYYYMM or YYYYMMDD)`,
      { value: date, pattern: DATE_PATTERN.source }
    );
  }
}

/**
 * Domain/Category/Doctypes folders shared by the built-in styles.
 */
export function classificationFolders(
  metadata: { domain: string; category: string; doctype: string },
  pattern: RegExp,
  style: string
): string[] {
  requireField(metadata.domain, 'domain', style);
  requireField(metadata.category, 'category', style);
  requireField(metadata.doctype, 'doctype', style);

  const domain = toTitleCase(metadata.domain);
  const category = toTitleCase(metadata.category);
  const doctype = pluralizeDoctype(metadata.doctype);
  ensureAllowed(domain, pattern, 'domain');
  ensureAllowed(category, pattern, 'category');
  ensureAllowed(doctype, pattern, 'doctype');
  return [domain, category, doctype];
}
