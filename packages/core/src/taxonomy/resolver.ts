/**
 * Taxonomy resolution: raw strings → canonical slugs.
 *
 * Lookups return `undefined` when nothing matches and never throw. Turning an unresolved
 * value into an error (strict mode) or into "other" (fallback mode) is the caller's call.
 */
import { getSettings } from '../config/settings';
import { DEFAULT_TAXONOMY_NAME } from '../config/constants';
import { loadTaxonomy, tryLoadTaxonomy } from './loader';
import { normalizeToken } from './tokens';
import type { TaxonomyVocabulary } from './types';

let activeTaxonomy: TaxonomyVocabulary | null = null;

/**
 * The process-wide vocabulary. Built on first access from the configured override file,
 * or the bundled default when no override is configured or it cannot be loaded.
 */
export function getActiveTaxonomy(): TaxonomyVocabulary {
  if (!activeTaxonomy) {
    const { taxonomyFile } = getSettings();
    const override = taxonomyFile ? tryLoadTaxonomy(taxonomyFile) : null;
    activeTaxonomy = override ?? loadTaxonomy(DEFAULT_TAXONOMY_NAME);
  }
  return activeTaxonomy;
}

/**
 * Swap in a different vocabulary (or load one by bundled name / path, which may throw).
 */
export function setActiveTaxonomy(source: TaxonomyVocabulary | string): TaxonomyVocabulary {
  const next = typeof source === 'string' ? loadTaxonomy(source) : source;
  activeTaxonomy = next;
  return next;
}

/** Forget the active vocabulary so the next access rebuilds it. */
export function resetTaxonomy(): void {
  activeTaxonomy = null;
}

export function resolveDomain(
  raw: string,
  taxonomy: TaxonomyVocabulary = getActiveTaxonomy()
): string | undefined {
  const token = normalizeToken(raw);
  if (!token) return undefined;

  if (taxonomy.domainNames.has(token)) return token;

  const alias = taxonomy.domainAliases.get(token);
  if (alias && taxonomy.domainNames.has(alias)) return alias;

  return undefined;
}

/**
 * Categories are scoped to a domain. The domain is resolved first; if that fails its
 * normalized token is used as-is, so alias tables keyed on that spelling still apply.
 */
export function resolveCategory(
  domain: string,
  rawCategory: string,
  taxonomy: TaxonomyVocabulary = getActiveTaxonomy()
): string | undefined {
  const dom = resolveDomain(domain, taxonomy) ?? normalizeToken(domain);
  if (!dom) return undefined;

  const token = normalizeToken(rawCategory);
  if (!token) return undefined;

  const categories = taxonomy.categoryNames.get(dom);
  if (!categories) return undefined;

  if (categories.has(token)) return token;

  const alias = taxonomy.categoryAliases.get(dom)?.get(token);
  if (alias && categories.has(alias)) return alias;

  return undefined;
}

export function resolveDoctype(
  raw: string,
  taxonomy: TaxonomyVocabulary = getActiveTaxonomy()
): string | undefined {
  const token = normalizeToken(raw);
  if (!token) return undefined;

  if (taxonomy.doctypeNames.has(token)) return token;

  const alias = taxonomy.doctypeAliases.get(token);
  if (alias && taxonomy.doctypeNames.has(alias)) return alias;

  return undefined;
}
