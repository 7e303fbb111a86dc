import * as crypto from 'crypto';
import type { TaxonomyVocabulary } from './types';

function sortedEntries<V>(map: ReadonlyMap<string, V>): Array<[string, V]> {
  return [...map.entries()].sort(([a], [b]) => a.localeCompare(b));
}

/**
 * Short content hash of a vocabulary: every canonical name and alias, but not the
 * descriptions. Two files that resolve tokens the same way share a fingerprint.
 */
export function taxonomyFingerprint(taxonomy: TaxonomyVocabulary): string {
  const content = JSON.stringify({
    domains: taxonomy.domains.map((domain) => [domain.name, domain.categories.map((category) => category.name)]),
    doctypes: taxonomy.doctypes.map((doctype) => doctype.name),
    domainAliases: sortedEntries(taxonomy.domainAliases),
    categoryAliases: sortedEntries(taxonomy.categoryAliases).map(([domain, aliases]) => [domain, sortedEntries(aliases)]),
    doctypeAliases: sortedEntries(taxonomy.doctypeAliases),
  });
  return crypto.createHash('sha1').update(content).digest('hex').slice(0, 12);
}
