import { getActiveTaxonomy } from './resolver';
import type { TaxonomyVocabulary } from './types';

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Render the vocabulary as the <taxonomy> fragment injected into agent prompts.
 */
export function generateTaxonomyXml(taxonomy: TaxonomyVocabulary = getActiveTaxonomy()): string {
  const lines = ['<taxonomy>', '  <domains>'];

  for (const domain of taxonomy.domains) {
    lines.push(
      domain.description
        ? `    <domain name="${domain.name}" description="${escapeXml(domain.description)}">`
        : `    <domain name="${domain.name}">`
    );
    for (const category of domain.categories) {
      lines.push(
        category.description
          ? `      <category name="${category.name}">${escapeXml(category.description)}</category>`
          : `      <category name="${category.name}"/>`
      );
    }
    lines.push('    </domain>');
  }

  lines.push('  </domains>', '', '  <doctypes>');

  for (const doctype of taxonomy.doctypes) {
    lines.push(
      doctype.description
        ? `    <doctype name="${doctype.name}">${escapeXml(doctype.description)}</doctype>`
        : `    <doctype name="${doctype.name}"/>`
    );
  }

  lines.push('  </doctypes>', '</taxonomy>');
  return lines.join('\n');
}
