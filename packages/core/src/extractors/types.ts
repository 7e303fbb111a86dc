/**
 * Types for content extraction system
 */
import type { ExtractionConfig } from '../config/settings';

export type ContentType = 'text' | 'pdf';

export interface ExtractedContent {
  contentType: ContentType;
  extractedText: string;
  metadata?: Record<string, string | number | boolean | null>; // page count, truncation, PDF info
}

export interface ExtractionResult {
  success: boolean;
  content: ExtractedContent | null;
  error?: string;
  extractorVersion: string;
}

export interface Extractor {
  readonly id: string;
  readonly version: string;
  readonly supportedExtensions: string[];

  canExtract(extension: string): boolean;
  extract(filePath: string, extension: string, config: ExtractionConfig): Promise<ExtractionResult>;
}
