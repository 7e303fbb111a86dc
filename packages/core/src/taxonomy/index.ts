export type { CategoryInfo, DomainInfo, DoctypeInfo, TaxonomyVocabulary } from './types';
export { normalizeToken } from './tokens';
export {
  TaxonomyFileSchema,
  buildTaxonomy,
  loadTaxonomy,
  tryLoadTaxonomy,
  listAvailableTaxonomies,
} from './loader';
export type { TaxonomyFile } from './loader';
export {
  getActiveTaxonomy,
  setActiveTaxonomy,
  resetTaxonomy,
  resolveDomain,
  resolveCategory,
  resolveDoctype,
} from './resolver';
export { generateTaxonomyXml } from './prompt';
export { taxonomyFingerprint } from './fingerprint';
