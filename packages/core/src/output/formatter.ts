/**
 * Structured output for classification results: newline-delimited JSON, CSV or TSV,
 * one record per line so results can be piped into other tools.
 */
import { z } from 'zod';
import type { ClassificationResult } from '../contracts';

export const OutputFormatSchema = z.enum(['json', 'csv', 'tsv']);
export type OutputFormat = z.infer<typeof OutputFormatSchema>;

export const OUTPUT_COLUMNS = [
  'original',
  'suggested_path',
  'suggested_name',
  'full_path',
  'domain',
  'category',
  'vendor',
  'date',
  'doctype',
  'subject',
] as const;

type OutputColumn = (typeof OUTPUT_COLUMNS)[number];

function toRow(result: ClassificationResult): Record<OutputColumn, string> {
  return {
    original: result.original,
    suggested_path: result.suggestedPath,
    suggested_name: result.suggestedName,
    full_path: result.fullPath,
    domain: result.metadata.domain,
    category: result.metadata.category,
    vendor: result.metadata.vendor,
    date: result.metadata.date,
    doctype: result.metadata.doctype,
    subject: result.metadata.subject,
  };
}

/** RFC 4180: quote fields containing a comma, quote or line break; double embedded quotes. */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** TSV has no quoting, so tabs and line breaks become spaces. */
export function escapeTsvField(value: string): string {
  return value.replace(/[\t\r\n]/g, ' ');
}

export class OutputFormatter {
  constructor(readonly format: OutputFormat = 'json') {}

  formatSingle(result: ClassificationResult): string {
    return this.formatBatch([result], false);
  }

  /**
   * Format a batch. The header row (CSV/TSV only) is included by default;
   * an empty batch is an empty string.
   */
  formatBatch(results: ClassificationResult[], includeHeader = true): string {
    if (results.length === 0) return '';

    switch (this.format) {
      case 'json':
        return results.map((result) => this.toJson(result)).join('\n');
      case 'csv':
        return this.toDelimited(results, ',', escapeCsvField, includeHeader);
      case 'tsv':
        return this.toDelimited(results, '\t', escapeTsvField, includeHeader);
    }
  }

  toJson(result: ClassificationResult): string {
    const row = toRow(result);
    return JSON.stringify({
      original: row.original,
      suggested_path: row.suggested_path,
      suggested_name: row.suggested_name,
      full_path: row.full_path,
      metadata: {
        domain: row.domain,
        category: row.category,
        vendor: row.vendor,
        date: row.date,
        doctype: row.doctype,
        subject: row.subject,
      },
    });
  }

  private toDelimited(
    results: ClassificationResult[],
    delimiter: string,
    escape: (value: string) => string,
    includeHeader: boolean
  ): string {
    const lines: string[] = [];
    if (includeHeader) {
      lines.push(OUTPUT_COLUMNS.join(delimiter));
    }
    for (const result of results) {
      const row = toRow(result);
      lines.push(OUTPUT_COLUMNS.map((column) => escape(row[column])).join(delimiter));
    }
    return lines.join('\n');
  }
}
