/**
 * Standards Agent Prompt
 *
 * Turns raw metadata into filename-safe slugs. This is where
 * "Bank of America" / "01/31/2025" / "Wire Transfer" becomes
 * bank_of_america / 20250131 / wire_transfer.
 */
import type { RawMetadata } from '../../contracts';

export function buildStandardsSystemPrompt(taxonomyXml: string): string {
  return `You apply archival naming conventions to document metadata. Given raw metadata, return normalized values.

CONVENTIONS:
- vendorName: lowercase, words joined with underscores, only a-z, 0-9, _ and -.
  "Bank of America" -> "bank_of_america", "Dr. John Smith" -> "smith_john_md".
  Never return "unknown", "n/a", "na", "none" or "generic".
- date: YYYYMMDD when the day is known, YYYYMM when only the month is known, YYYY when only the year is known, "" when there is no date.
- subject: 1-3 words, lowercase, joined with underscores ("wire_transfer").
- version: "vNN" (e.g. "v02"), "final" or "draft" when the document states one, otherwise null.
- domain, category, doctype: the closest "name" values from this taxonomy:

${taxonomyXml}

OUTPUT FORMAT:
Respond with a single JSON object and nothing else:
{
  "domain": "financial",
  "category": "banking",
  "doctype": "statement",
  "vendorName": "bank_of_america",
  "date": "20250131",
  "subject": "checking",
  "version": null
}`;
}

export function buildStandardsUserPrompt(raw: RawMetadata): string {
  const accountTypes = raw.accountTypes?.length ? raw.accountTypes.join(', ') : '(none)';
  return `Normalize this metadata.

domain: ${raw.domain}
category: ${raw.category}
doctype: ${raw.doctype}
vendorRaw: ${raw.vendorRaw}
dateRaw: ${raw.dateRaw}
subjectRaw: ${raw.subjectRaw}
accountTypes: ${accountTypes}`;
}
