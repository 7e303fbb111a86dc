/**
 * Utility functions for extractors
 */
import * as fs from 'fs';
import { EXTRACTION_MAX_FILE_SIZE_BYTES, EXTRACTION_TIMEOUT_MS } from '../config/constants';
import type { ExtractionResult } from './types';

/**
 * Cut text to at most `maxChars` characters.
 */
export function truncateToCharLimit(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return text.slice(0, maxChars);
}

/**
 * Normalize an extension for lookup: no leading period, lowercase.
 */
export function normalizeExtension(extension: string): string {
  return extension.trim().replace(/^\./, '').toLowerCase();
}

/**
 * An unsuccessful ExtractionResult for files over the size limit, or null when the file is small enough.
 */
export async function checkFileSize(filePath: string, extractorVersion: string): Promise<ExtractionResult | null> {
  const stats = await fs.promises.stat(filePath);
  if (stats.size > EXTRACTION_MAX_FILE_SIZE_BYTES) {
    return {
      success: false,
      content: null,
      error: `File too large (${Math.round(stats.size / 1024 / 1024)}MB), skipping`,
      extractorVersion,
    };
  }
  return null;
}

/**
 * Execute an extraction with timeout protection
 * Notifies via console.warn if extraction takes > 10 seconds
 * Throws timeout error if extraction takes > 60 seconds
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  filePath: string,
  timeoutMs: number = EXTRACTION_TIMEOUT_MS,
  warningMs: number = 10000
): Promise<T> {
  const startTime = Date.now();

  const warningTimer = setTimeout(() => {
    const elapsed = Date.now() - startTime;
    console.warn(
      `[Extractor] Extraction taking longer than expected: ${filePath} (${Math.round(elapsed / 1000)}s elapsed)`
    );
  }, warningMs);

  let timeoutTimer: NodeJS.Timeout | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutTimer = setTimeout(() => {
      reject(new Error(`Extraction timeout after ${timeoutMs}ms: ${filePath}`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(warningTimer);
    clearTimeout(timeoutTimer);
  }
}
