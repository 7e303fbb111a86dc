import * as fs from 'fs';
import type { ExtractionConfig } from '../config/settings';
import type { Extractor, ExtractionResult } from './types';
import { checkFileSize, normalizeExtension, truncateToCharLimit, withTimeout } from './extractor-utils';

/**
 * Text Extractor - reads plain text and markdown
 * Supports: .txt, .md
 *
 * Text has no pages, so every strategy except `full` keeps the first `maxChars` characters.
 */
export class TextExtractor implements Extractor {
  readonly id = 'text-extractor';
  readonly version = '1.0.0';

  readonly supportedExtensions = ['txt', 'md'];

  canExtract(extension: string): boolean {
    return this.supportedExtensions.includes(normalizeExtension(extension));
  }

  async extract(filePath: string, extension: string, config: ExtractionConfig): Promise<ExtractionResult> {
    try {
      const tooLarge = await checkFileSize(filePath, this.version);
      if (tooLarge) return tooLarge;

      const rawText = await withTimeout(fs.promises.readFile(filePath, 'utf-8'), filePath);
      const extractedText = config.strategy === 'full' ? rawText : truncateToCharLimit(rawText, config.maxChars);

      return {
        success: true,
        content: {
          contentType: 'text',
          extractedText,
          metadata: {
            extension: normalizeExtension(extension),
            originalLength: rawText.length,
            truncated: extractedText.length !== rawText.length,
          },
        },
        extractorVersion: this.version,
      };
    } catch (error) {
      return {
        success: false,
        content: null,
        error: error instanceof Error ? error.message : 'Unknown error',
        extractorVersion: this.version,
      };
    }
  }
}
