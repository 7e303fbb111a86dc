import * as path from 'path';
import type { ClassificationFailure, ClassificationResult } from '../contracts';
import { getSettings } from '../config/settings';
import { ClassificationCache, hashFile, type CachedClassification } from '../db';
import { DocpathError } from '../errors';
import type { ExtractorManager } from '../extractors/extractor-manager';
import { getNamingStyle } from '../naming';
import type { PathBuilderOptions } from '../path';
import { getActiveTaxonomy, taxonomyFingerprint, type TaxonomyVocabulary } from '../taxonomy';
import type { MetadataClassifier } from './classification-agent';
import { processDocument } from './pipeline';
import type { MetadataStandardizer } from './standards-agent';

export type ClassificationOrchestratorOptions = {
  extractor: Pick<ExtractorManager, 'extract'>;
  classifier: MetadataClassifier;
  standardizer: MetadataStandardizer;
  /** null disables caching */
  cache?: ClassificationCache | null;
  strictMode?: boolean;
  taxonomy?: TaxonomyVocabulary;
  pathOptions?: Partial<PathBuilderOptions>;
};

export type NamingPolicy = {
  strictMode: boolean;
  taxonomy: TaxonomyVocabulary;
  maxHierarchyDepth: number;
  maxPathLength: number;
};

/**
 * Cache key for the settings besides the naming style that decide a suggested path,
 * e.g. "strict|household@1.0#3f9a0c1b2d4e|depth=5|length=200".
 */
export function describeNamingPolicy(policy: NamingPolicy): string {
  const { taxonomy } = policy;
  return [
    policy.strictMode ? 'strict' : 'fallback',
    `${taxonomy.name}@${taxonomy.version}#${taxonomyFingerprint(taxonomy)}`,
    `depth=${policy.maxHierarchyDepth}`,
    `length=${policy.maxPathLength}`,
  ].join('|');
}

export type BatchClassification = {
  results: ClassificationResult[];
  failures: ClassificationFailure[];
};

function toResult(original: string, entry: CachedClassification): ClassificationResult {
  return {
    original,
    suggestedPath: entry.directoryPath,
    suggestedName: entry.filename,
    fullPath: entry.fullPath,
    metadata: {
      domain: entry.domain,
      category: entry.category,
      vendor: entry.vendor,
      date: entry.date,
      doctype: entry.doctype,
      subject: entry.subject,
    },
  };
}

/**
 * Classification Orchestrator
 *
 * Chains, per file:
 * 1. Content hash, naming style and naming policy -> cache lookup (a hit skips everything below)
 * 2. Extractors (raw text)
 * 3. Pipeline (classification -> standardization -> taxonomy -> path)
 * 4. Cache store
 */
export class ClassificationOrchestrator {
  private options: ClassificationOrchestratorOptions;
  private strictMode: boolean;
  private taxonomy: TaxonomyVocabulary;
  private pathOptions: PathBuilderOptions;
  private namingPolicy: string;

  constructor(options: ClassificationOrchestratorOptions) {
    const settings = getSettings();
    this.options = options;
    this.strictMode = options.strictMode ?? settings.taxonomyStrictMode;
    this.taxonomy = options.taxonomy ?? getActiveTaxonomy();
    this.pathOptions = {
      // Resolved once so an unknown style fails before any file is read
      namingStyle: getNamingStyle(options.pathOptions?.namingStyle ?? settings.namingStyle).name,
      maxHierarchyDepth: options.pathOptions?.maxHierarchyDepth ?? settings.maxHierarchyDepth,
      maxPathLength: options.pathOptions?.maxPathLength ?? settings.maxPathLength,
    };
    this.namingPolicy = describeNamingPolicy({
      strictMode: this.strictMode,
      taxonomy: this.taxonomy,
      maxHierarchyDepth: this.pathOptions.maxHierarchyDepth,
      maxPathLength: this.pathOptions.maxPathLength,
    });
  }

  async classifyFile(filePath: string): Promise<ClassificationResult> {
    const cache = this.options.cache ?? null;
    const fileHash = await hashFile(filePath);

    const cached = cache?.get(fileHash, this.pathOptions.namingStyle, this.namingPolicy);
    if (cached) {
      console.log(`[Orchestrator] Cache hit for ${filePath}`);
      return toResult(filePath, cached);
    }

    const extraction = await this.options.extractor.extract(filePath, path.extname(filePath));
    if (!extraction.success || !extraction.content) {
      throw new DocpathError(`Extraction failed for ${filePath}: ${extraction.error ?? 'no content'}`, {
        filePath,
        extractorVersion: extraction.extractorVersion,
      });
    }

    const text = extraction.content.extractedText;
    if (!text.trim()) {
      throw new DocpathError(`No text could be extracted from ${filePath}`, { filePath });
    }

    const result = await processDocument(text, path.basename(filePath), {
      classifier: this.options.classifier,
      standardizer: this.options.standardizer,
      strictMode: this.strictMode,
      taxonomy: this.taxonomy,
      pathOptions: this.pathOptions,
    });

    const version = result.normalized.version?.trim().toLowerCase() || null;
    const entry: CachedClassification = {
      fileHash,
      namingStyle: this.pathOptions.namingStyle,
      namingPolicy: this.namingPolicy,
      domain: result.canonical.domain,
      category: result.canonical.category,
      doctype: result.canonical.doctype,
      vendor: result.normalized.vendorName.trim().toLowerCase(),
      date: result.normalized.date.trim(),
      subject: result.normalized.subject.trim().toLowerCase(),
      version,
      directoryPath: result.path.directoryPath,
      filename: result.path.filename,
      fullPath: result.path.fullPath,
      originalPath: filePath,
      createdAt: Date.now(),
    };
    cache?.put(entry);

    return toResult(filePath, entry);
  }

  /**
   * Classify files one after another. A failing file is reported and the batch continues.
   */
  async classifyFiles(filePaths: string[]): Promise<BatchClassification> {
    const results: ClassificationResult[] = [];
    const failures: ClassificationFailure[] = [];

    for (const filePath of filePaths) {
      try {
        results.push(await this.classifyFile(filePath));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[Orchestrator] Failed to classify ${filePath}: ${message}`);
        failures.push({ file: filePath, error: message });
      }
    }

    console.log(`[Orchestrator] Classified ${results.length} of ${filePaths.length} files (${failures.length} failed)`);
    return { results, failures };
  }
}
