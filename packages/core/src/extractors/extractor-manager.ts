import { TextExtractor } from './text-extractor';
import { PDFExtractor } from './pdf-extractor';
import type { Extractor, ExtractionResult } from './types';
import { getSettings, type ExtractionConfig } from '../config/settings';

/**
 * ExtractorManager - manages all extractors and routes files to appropriate extractor
 */
export class ExtractorManager {
  private extractors: Extractor[];
  private config: ExtractionConfig;

  constructor(config: ExtractionConfig = getSettings().extraction, extractors?: Extractor[]) {
    this.config = config;
    this.extractors = extractors ?? [new TextExtractor(), new PDFExtractor()];
  }

  /**
   * Find the appropriate extractor for a file extension
   */
  findExtractor(extension: string): Extractor | null {
    for (const extractor of this.extractors) {
      if (extractor.canExtract(extension)) {
        return extractor;
      }
    }
    return null;
  }

  /**
   * Extract content from a file
   */
  async extract(filePath: string, extension: string): Promise<ExtractionResult> {
    const extractor = this.findExtractor(extension);

    if (!extractor) {
      return {
        success: false,
        content: null,
        error: `No extractor found for extension: ${extension}`,
        extractorVersion: 'none',
      };
    }

    return await extractor.extract(filePath, extension, this.config);
  }

  /**
   * Get all supported extensions
   */
  getSupportedExtensions(): string[] {
    const extensions = new Set<string>();
    for (const extractor of this.extractors) {
      for (const ext of extractor.supportedExtensions) {
        extensions.add(ext);
      }
    }
    return Array.from(extensions);
  }
}
