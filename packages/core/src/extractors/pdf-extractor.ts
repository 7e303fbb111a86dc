import * as fs from 'fs';
import type { ExtractionConfig } from '../config/settings';
import type { Extractor, ExtractionResult } from './types';
import { checkFileSize, normalizeExtension, truncateToCharLimit, withTimeout } from './extractor-utils';

/**
 * PDF Extractor - extracts text from PDF files
 * Supports: .pdf
 *
 * `full` reads every page, `first_n_pages` the first `maxPages`, and `char_limit`
 * the first `maxPages` cut to `maxChars` characters.
 */
export class PDFExtractor implements Extractor {
  readonly id = 'pdf-extractor';
  readonly version = '1.0.0';

  readonly supportedExtensions = ['pdf'];

  canExtract(extension: string): boolean {
    return this.supportedExtensions.includes(normalizeExtension(extension));
  }

  async extract(filePath: string, _extension: string, config: ExtractionConfig): Promise<ExtractionResult> {
    try {
      const tooLarge = await checkFileSize(filePath, this.version);
      if (tooLarge) return tooLarge;

      const dataBuffer = await withTimeout(fs.promises.readFile(filePath), filePath);

      // Loaded on first use so that nothing pays for pdf.js until a PDF shows up
      const { default: pdf } = await import('pdf-parse');
      const pdfData = await withTimeout(
        pdf(dataBuffer, config.strategy === 'full' ? {} : { max: config.maxPages }),
        filePath
      );

      const rawText = pdfData.text || '';
      const extractedText =
        config.strategy === 'char_limit' ? truncateToCharLimit(rawText, config.maxChars) : rawText;

      if (!rawText.trim()) {
        console.warn(`[PDFExtractor] No text layer in ${filePath} (scanned PDF?)`);
      }

      return {
        success: true,
        content: {
          contentType: 'pdf',
          extractedText,
          metadata: {
            pages: pdfData.numpages,
            pagesRead: config.strategy === 'full' ? pdfData.numpages : Math.min(config.maxPages, pdfData.numpages),
            title: typeof pdfData.info?.Title === 'string' ? pdfData.info.Title : null,
            author: typeof pdfData.info?.Author === 'string' ? pdfData.info.Author : null,
            isImageBased: rawText.trim().length === 0,
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
