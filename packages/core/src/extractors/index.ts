export type { ContentType, ExtractedContent, ExtractionResult, Extractor } from './types';
export { TextExtractor } from './text-extractor';
export { PDFExtractor } from './pdf-extractor';
export { ExtractorManager } from './extractor-manager';
export { truncateToCharLimit, normalizeExtension, withTimeout } from './extractor-utils';
