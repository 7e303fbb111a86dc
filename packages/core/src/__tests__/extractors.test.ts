import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ExtractionConfig } from '../config/settings';
import { ExtractorManager, PDFExtractor, TextExtractor } from '../extractors';
import { normalizeExtension, truncateToCharLimit, withTimeout } from '../extractors/extractor-utils';

const pdfParse = vi.hoisted(() => vi.fn());

vi.mock('pdf-parse', () => ({ default: pdfParse }));

const firstPages: ExtractionConfig = { strategy: 'first_n_pages', maxPages: 2, maxChars: 10 };

let dir: string;

function writeFixture(name: string, content: string): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, content);
  return filePath;
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docpath-extract-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
  pdfParse.mockReset();
});

describe('extractor utils', () => {
  it('normalizes extensions', () => {
    expect(normalizeExtension('.PDF')).toBe('pdf');
    expect(normalizeExtension(' md ')).toBe('md');
  });

  it('truncates only long text', () => {
    expect(truncateToCharLimit('short', 10)).toBe('short');
    expect(truncateToCharLimit('0123456789abc', 10)).toBe('0123456789');
  });

  it('rejects work that outlives the timeout', async () => {
    await expect(withTimeout(new Promise<string>(() => undefined), 'slow.pdf', 5, 1000)).rejects.toThrow(
      'Extraction timeout after 5ms: slow.pdf'
    );
  });
});

describe('TextExtractor', () => {
  const extractor = new TextExtractor();

  it('accepts txt and md in any case', () => {
    expect(extractor.canExtract('.TXT')).toBe(true);
    expect(extractor.canExtract('md')).toBe(true);
    expect(extractor.canExtract('.pdf')).toBe(false);
  });

  it('cuts text to maxChars unless the strategy is full', async () => {
    const filePath = writeFixture('note.txt', 'Chase checking statement');

    const limited = await extractor.extract(filePath, '.txt', firstPages);
    const full = await extractor.extract(filePath, '.txt', { ...firstPages, strategy: 'full' });

    expect(limited).toEqual({
      success: true,
      content: {
        contentType: 'text',
        extractedText: 'Chase chec',
        metadata: { extension: 'txt', originalLength: 24, truncated: true },
      },
      extractorVersion: '1.0.0',
    });
    expect(full.content?.extractedText).toBe('Chase checking statement');
    expect(full.content?.metadata?.truncated).toBe(false);
  });

  it('reports a missing file as a failed result', async () => {
    const result = await extractor.extract(path.join(dir, 'missing.txt'), '.txt', firstPages);

    expect(result.success).toBe(false);
    expect(result.content).toBeNull();
    expect(result.error).toContain('ENOENT');
  });
});

describe('PDFExtractor', () => {
  const extractor = new PDFExtractor();

  it('reads the first pages with pdf-parse', async () => {
    pdfParse.mockResolvedValue({ text: 'Statement period January 2024', numpages: 5, info: { Title: 'Statement' } });
    const filePath = writeFixture('statement.pdf', '%PDF-1.4');

    const result = await extractor.extract(filePath, '.pdf', firstPages);

    expect(pdfParse).toHaveBeenCalledWith(Buffer.from('%PDF-1.4'), { max: 2 });
    expect(result.content).toEqual({
      contentType: 'pdf',
      extractedText: 'Statement period January 2024',
      metadata: { pages: 5, pagesRead: 2, title: 'Statement', author: null, isImageBased: false, truncated: false },
    });
  });

  it('reads every page for the full strategy', async () => {
    pdfParse.mockResolvedValue({ text: 'all pages', numpages: 5, info: {} });
    const filePath = writeFixture('statement.pdf', '%PDF-1.4');

    const result = await extractor.extract(filePath, '.pdf', { ...firstPages, strategy: 'full' });

    expect(pdfParse).toHaveBeenCalledWith(Buffer.from('%PDF-1.4'), {});
    expect(result.content?.metadata?.pagesRead).toBe(5);
  });

  it('cuts to maxChars for the char_limit strategy', async () => {
    pdfParse.mockResolvedValue({ text: 'Statement period January 2024', numpages: 1, info: {} });
    const filePath = writeFixture('statement.pdf', '%PDF-1.4');

    const result = await extractor.extract(filePath, '.pdf', { ...firstPages, strategy: 'char_limit' });

    expect(result.content?.extractedText).toBe('Statement ');
    expect(result.content?.metadata?.truncated).toBe(true);
  });

  it('flags scans without a text layer', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    pdfParse.mockResolvedValue({ text: '  ', numpages: 1, info: {} });
    const filePath = writeFixture('scan.pdf', '%PDF-1.4');

    const result = await extractor.extract(filePath, '.pdf', firstPages);

    expect(result.success).toBe(true);
    expect(result.content?.metadata?.isImageBased).toBe(true);
    expect(warn).toHaveBeenCalledWith(`[PDFExtractor] No text layer in ${filePath} (scanned PDF?)`);
  });

  it('turns parser errors into a failed result', async () => {
    pdfParse.mockRejectedValue(new Error('Invalid PDF structure'));
    const filePath = writeFixture('broken.pdf', 'not a pdf');

    const result = await extractor.extract(filePath, '.pdf', firstPages);

    expect(result).toEqual({
      success: false,
      content: null,
      error: 'Invalid PDF structure',
      extractorVersion: '1.0.0',
    });
  });
});

describe('ExtractorManager', () => {
  const manager = new ExtractorManager(firstPages);

  it('lists the supported extensions', () => {
    expect(manager.getSupportedExtensions()).toEqual(['txt', 'md', 'pdf']);
  });

  it('routes by extension', async () => {
    const filePath = writeFixture('README.md', '# Notes');

    const result = await manager.extract(filePath, '.md');

    expect(result.content?.extractedText).toBe('# Notes');
  });

  it('reports extensions nobody handles', async () => {
    expect(manager.findExtractor('.docx')).toBeNull();
    await expect(manager.extract('/scans/letter.docx', '.docx')).resolves.toEqual({
      success: false,
      content: null,
      error: 'No extractor found for extension: .docx',
      extractorVersion: 'none',
    });
  });
});
