/**
 * Classification pipeline
 *
 * 1. ClassificationAgent  -> raw metadata
 * 2. StandardsAgent       -> normalized metadata
 * 3. Taxonomy canonicalization (strict or fallback)
 * 4. buildPath            -> directory + filename (deterministic, no model call)
 */
import * as path from 'path';
import type { CanonicalTaxonomy, NormalizedMetadata, RawMetadata } from '../contracts';
import { FALLBACK_TAXONOMY_SLUG, RESERVED_VENDOR_NAMES } from '../config/constants';
import { getSettings } from '../config/settings';
import { PathBuildError, TaxonomyValidationError } from '../errors';
import { buildPath, type PathBuilderOptions, type PathMetadata } from '../path';
import { getActiveTaxonomy, resolveCategory, resolveDoctype, resolveDomain } from '../taxonomy';
import type { TaxonomyVocabulary } from '../taxonomy';
import type { MetadataClassifier } from './classification-agent';
import type { MetadataStandardizer } from './standards-agent';

export type CanonicalizeOptions = {
  /** Unknown category/doctype fails when true, becomes "other" when false. */
  strictMode: boolean;
  /** Used in error messages. */
  filename?: string;
};

/**
 * Map normalized domain/category/doctype onto the vocabulary.
 *
 * The domain must always resolve: it is the top-level partition and fallback mode
 * never creates new branches. In strict mode every unresolved field is collected into
 * a single TaxonomyValidationError.
 */
export function canonicalizeTaxonomy(
  normalized: Pick<NormalizedMetadata, 'domain' | 'category' | 'doctype'>,
  options: CanonicalizeOptions,
  taxonomy: TaxonomyVocabulary = getActiveTaxonomy()
): CanonicalTaxonomy {
  const domain = resolveDomain(normalized.domain, taxonomy);
  if (!domain) {
    throw new TaxonomyValidationError([`unknown domain '${normalized.domain}'`], options.filename);
  }

  let category = resolveCategory(domain, normalized.category, taxonomy);
  let doctype = resolveDoctype(normalized.doctype, taxonomy);
  const problems: string[] = [];

  if (category === undefined) {
    if (options.strictMode) {
      problems.push(`unknown category '${normalized.category}' for domain '${domain}'`);
    } else {
      console.warn(
        `[Pipeline] Taxonomy fallback: mapping unknown category '${normalized.category}' in domain '${domain}' to '${FALLBACK_TAXONOMY_SLUG}'`
      );
      category = FALLBACK_TAXONOMY_SLUG;
    }
  }

  if (doctype === undefined) {
    if (options.strictMode) {
      problems.push(`unknown doctype '${normalized.doctype}'`);
    } else {
      console.warn(
        `[Pipeline] Taxonomy fallback: mapping unknown doctype '${normalized.doctype}' to '${FALLBACK_TAXONOMY_SLUG}'`
      );
      doctype = FALLBACK_TAXONOMY_SLUG;
    }
  }

  if (problems.length > 0 || category === undefined || doctype === undefined) {
    throw new TaxonomyValidationError(problems, options.filename);
  }

  return { domain, category, doctype };
}

export type PipelineDependencies = {
  classifier: MetadataClassifier;
  standardizer: MetadataStandardizer;
  /** Defaults to the taxonomyStrictMode setting. */
  strictMode?: boolean;
  /** Defaults to the active taxonomy. */
  taxonomy?: TaxonomyVocabulary;
  pathOptions?: Partial<PathBuilderOptions>;
};

export type PipelineResult = {
  raw: RawMetadata;
  normalized: NormalizedMetadata;
  canonical: CanonicalTaxonomy;
  path: PathMetadata;
};

function isReservedVendor(vendorName: string): boolean {
  const vendor = vendorName.trim().toLowerCase();
  return !vendor || RESERVED_VENDOR_NAMES.has(vendor);
}

/**
 * Run one document's text through both agents and build its suggested path.
 * The extension of `filename` becomes the extension of the suggested name.
 */
export async function processDocument(
  content: string,
  filename: string,
  deps: PipelineDependencies
): Promise<PipelineResult> {
  const pipelineStart = Date.now();
  console.log(`[Pipeline] Starting pipeline for: ${filename} (${content.length} chars)`);

  try {
    console.log(`[Pipeline] Step 1/2: classification`);
    const raw = await deps.classifier.classify(content, filename);

    console.log(`[Pipeline] Step 2/2: standardization`);
    const normalized = await deps.standardizer.standardize(raw);

    if (isReservedVendor(normalized.vendorName)) {
      throw new PathBuildError(
        'invalid_vendor',
        `Standards agent failed to determine vendor for ${filename}. Got vendorName: '${normalized.vendorName}'.`,
        { filename, vendorName: normalized.vendorName }
      );
    }

    const canonical = canonicalizeTaxonomy(
      normalized,
      { strictMode: deps.strictMode ?? getSettings().taxonomyStrictMode, filename },
      deps.taxonomy
    );

    const before = [normalized.domain, normalized.category, normalized.doctype].join('/');
    const after = [canonical.domain, canonical.category, canonical.doctype].join('/');
    if (before.toLowerCase() !== after) {
      console.log(`[Pipeline] Taxonomy canonicalization: ${before} -> ${after}`);
    }

    const suggested = buildPath(
      {
        ...canonical,
        vendorName: normalized.vendorName,
        subject: normalized.subject,
        date: normalized.date,
        fileExtension: path.extname(filename),
        version: normalized.version ?? undefined,
      },
      deps.pathOptions
    );

    console.log(`[Pipeline] Complete for ${filename} (${Date.now() - pipelineStart}ms): ${suggested.fullPath}`);
    return { raw, normalized, canonical, path: suggested };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Pipeline] Failed for ${filename} after ${Date.now() - pipelineStart}ms: ${message}`);
    throw error;
  }
}
