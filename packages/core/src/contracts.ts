import { z } from 'zod';

// ============================================================================
// Classification Agent output
// ============================================================================

export const RawMetadataSchema = z.object({
  domain: z.string(), // e.g. "Financial"
  category: z.string(), // e.g. "Banking"
  doctype: z.string(), // e.g. "statement"
  vendorRaw: z.string(), // as printed, e.g. "Bank of America"
  dateRaw: z.string(), // most relevant date, any format
  subjectRaw: z.string(), // e.g. "wire transfer"
  accountTypes: z.array(z.string()).nullable().optional(),
});

export type RawMetadata = z.infer<typeof RawMetadataSchema>;

// ============================================================================
// Standards Agent output
// ============================================================================

export const NormalizedMetadataSchema = z.object({
  domain: z.string(),
  category: z.string(),
  doctype: z.string(),
  vendorName: z.string(), // lowercase slug, never "unknown"
  date: z.string(), // YYYY, YYYYMM or YYYYMMDD, or ""
  subject: z.string(), // 1-3 words, lowercase slug
  version: z.string().nullable().optional(), // vNN | final | draft
});

export type NormalizedMetadata = z.infer<typeof NormalizedMetadataSchema>;

// ============================================================================
// Taxonomy-canonical domain/category/doctype
// ============================================================================

export const CanonicalTaxonomySchema = z.object({
  domain: z.string(),
  category: z.string(),
  doctype: z.string(),
});

export type CanonicalTaxonomy = z.infer<typeof CanonicalTaxonomySchema>;

// ============================================================================
// Output records
// ============================================================================

export const ClassificationMetadataSchema = z.object({
  domain: z.string(),
  category: z.string(),
  vendor: z.string(),
  date: z.string(),
  doctype: z.string(),
  subject: z.string(),
});

export type ClassificationMetadata = z.infer<typeof ClassificationMetadataSchema>;

export const ClassificationResultSchema = z.object({
  original: z.string(), // path of the classified file
  suggestedPath: z.string(), // directory path, trailing "/"
  suggestedName: z.string(), // filename with extension
  fullPath: z.string(),
  metadata: ClassificationMetadataSchema,
});

export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;

export const ClassificationFailureSchema = z.object({
  file: z.string(),
  error: z.string(),
});

export type ClassificationFailure = z.infer<typeof ClassificationFailureSchema>;
