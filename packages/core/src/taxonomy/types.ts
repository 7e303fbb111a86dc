export type CategoryInfo = {
  readonly name: string;
  readonly description: string;
};

export type DomainInfo = {
  readonly name: string;
  readonly description: string;
  readonly categories: readonly CategoryInfo[];
};

export type DoctypeInfo = {
  readonly name: string;
  readonly description: string;
};

/**
 * Canonical vocabulary for the directory hierarchy.
 *
 * Built once (bundled default or an override file) and never mutated afterwards.
 * Replacing the active taxonomy swaps the whole object.
 */
export type TaxonomyVocabulary = {
  readonly name: string;
  readonly version: string;
  readonly description: string;

  /** Structured entries, in file order (used for prompt generation). */
  readonly domains: readonly DomainInfo[];
  readonly doctypes: readonly DoctypeInfo[];

  /** Flat lookups derived from `domains` / `doctypes`. */
  readonly domainNames: ReadonlySet<string>;
  readonly categoryNames: ReadonlyMap<string, ReadonlySet<string>>;
  readonly doctypeNames: ReadonlySet<string>;

  /** alias → canonical domain */
  readonly domainAliases: ReadonlyMap<string, string>;
  /** canonical domain → (category alias → canonical category) */
  readonly categoryAliases: ReadonlyMap<string, ReadonlyMap<string, string>>;
  /** alias → canonical doctype */
  readonly doctypeAliases: ReadonlyMap<string, string>;
};
