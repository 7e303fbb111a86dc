/**
 * Classification Agent Prompt
 *
 * Reads the document text and reports raw semantic metadata. No normalization
 * happens here: vendor names and dates are returned as printed.
 */

export function buildClassificationSystemPrompt(taxonomyXml: string): string {
  return `You are a document archivist. You read household and business documents and identify what they are.

For each document determine:
1. domain - the broad area the document belongs to
2. category - the area within that domain
3. doctype - the kind of document (statement, receipt, invoice, policy, ...)
4. vendorRaw - the organization or person that issued the document, exactly as printed
5. dateRaw - the single most relevant date (statement period end, invoice date, signing date), in whatever format it appears
6. subjectRaw - a short phrase describing what the document is about (e.g. "checking account", "wire transfer")
7. accountTypes - account types mentioned in the document, if any

Choose domain, category and doctype from this taxonomy. Use the "name" attribute values:

${taxonomyXml}

RULES:
- Never invent a vendor. If the issuer is genuinely not named, use the most specific organization you can find in the text.
- Prefer the date the document refers to over the date it was printed.
- Keep subjectRaw under six words.

OUTPUT FORMAT:
Respond with a single JSON object and nothing else:
{
  "domain": "financial",
  "category": "banking",
  "doctype": "statement",
  "vendorRaw": "Bank of America",
  "dateRaw": "January 31, 2025",
  "subjectRaw": "checking account",
  "accountTypes": ["checking"]
}`;
}

export function buildClassificationUserPrompt(filename: string, content: string): string {
  return `Classify this document.

FILENAME: ${filename}

CONTENT:
${content}`;
}
