/**
 * Taxonomy loading.
 *
 * A taxonomy is either one of the bundled files under packages/core/taxonomies (looked up
 * by name) or a JSON/YAML file on disk. Both go through TaxonomyFileSchema and
 * buildTaxonomy, which normalizes every name with normalizeToken.
 */
import * as fs from 'fs';
import * as path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import householdTaxonomy from '../../taxonomies/household.json';
import { normalizeToken } from './tokens';
import type { CategoryInfo, DoctypeInfo, DomainInfo, TaxonomyVocabulary } from './types';

const NamedEntrySchema = z.union([
  z.string(),
  z.object({
    name: z.string(),
    description: z.string().optional(),
  }),
]);

const DomainEntrySchema = z.union([
  z.string(),
  z.object({
    name: z.string(),
    description: z.string().optional(),
    categories: z.array(NamedEntrySchema).optional(),
  }),
]);

export const TaxonomyFileSchema = z.object({
  name: z.string().optional(),
  version: z.union([z.string(), z.number()]).optional(),
  description: z.string().optional(),
  domains: z.array(DomainEntrySchema),
  /** Flat per-domain category lists, merged into the matching domain. */
  categories: z.record(z.array(NamedEntrySchema)).optional(),
  doctypes: z.array(NamedEntrySchema),
  aliases: z
    .object({
      domains: z.record(z.string()).optional(),
      categories: z
        .array(
          z.object({
            domain: z.string(),
            alias: z.string(),
            canonical: z.string(),
          })
        )
        .optional(),
      doctypes: z.record(z.string()).optional(),
    })
    .optional(),
});

export type TaxonomyFile = z.infer<typeof TaxonomyFileSchema>;

type NamedEntry = z.infer<typeof NamedEntrySchema>;

const BUNDLED_TAXONOMIES: Record<string, unknown> = {
  household: householdTaxonomy,
};

function toInfo(entry: NamedEntry): { name: string; description: string } {
  if (typeof entry === 'string') {
    return { name: normalizeToken(entry), description: '' };
  }
  return { name: normalizeToken(entry.name), description: entry.description ?? '' };
}

function addAlias(target: Map<string, string>, alias: string, canonical: string): void {
  const from = normalizeToken(alias);
  const to = normalizeToken(canonical);
  if (from && to) {
    target.set(from, to);
  }
}

/**
 * Build an immutable vocabulary from parsed taxonomy data.
 */
export function buildTaxonomy(data: TaxonomyFile, defaultName: string): TaxonomyVocabulary {
  const categoryNames = new Map<string, Set<string>>();
  const categoryInfos = new Map<string, CategoryInfo[]>();
  const domainOrder: Array<{ name: string; description: string }> = [];

  const addCategory = (domain: string, entry: NamedEntry) => {
    const info = toInfo(entry);
    const names = categoryNames.get(domain);
    const infos = categoryInfos.get(domain);
    if (!info.name || !names || !infos || names.has(info.name)) return;
    names.add(info.name);
    infos.push(info);
  };

  for (const entry of data.domains) {
    const info = toInfo(entry);
    if (!info.name || categoryNames.has(info.name)) continue;
    domainOrder.push(info);
    categoryNames.set(info.name, new Set());
    categoryInfos.set(info.name, []);
    if (typeof entry !== 'string') {
      for (const category of entry.categories ?? []) {
        addCategory(info.name, category);
      }
    }
  }

  for (const [rawDomain, categories] of Object.entries(data.categories ?? {})) {
    const domain = normalizeToken(rawDomain);
    for (const category of categories) {
      addCategory(domain, category);
    }
  }

  const domains: DomainInfo[] = domainOrder.map((d) => ({
    name: d.name,
    description: d.description,
    categories: Object.freeze(categoryInfos.get(d.name) ?? []),
  }));

  const doctypes: DoctypeInfo[] = [];
  const doctypeNames = new Set<string>();
  for (const entry of data.doctypes) {
    const info = toInfo(entry);
    if (!info.name || doctypeNames.has(info.name)) continue;
    doctypeNames.add(info.name);
    doctypes.push(info);
  }

  const domainAliases = new Map<string, string>();
  for (const [alias, canonical] of Object.entries(data.aliases?.domains ?? {})) {
    addAlias(domainAliases, alias, canonical);
  }

  const categoryAliases = new Map<string, Map<string, string>>();
  for (const entry of data.aliases?.categories ?? []) {
    const domain = normalizeToken(entry.domain);
    if (!domain) continue;
    const table = categoryAliases.get(domain) ?? new Map<string, string>();
    addAlias(table, entry.alias, entry.canonical);
    categoryAliases.set(domain, table);
  }

  const doctypeAliases = new Map<string, string>();
  for (const [alias, canonical] of Object.entries(data.aliases?.doctypes ?? {})) {
    addAlias(doctypeAliases, alias, canonical);
  }

  return Object.freeze({
    name: data.name ?? defaultName,
    version: data.version === undefined ? '1.0' : String(data.version),
    description: data.description ?? '',
    domains: Object.freeze(domains),
    doctypes: Object.freeze(doctypes),
    domainNames: new Set(categoryNames.keys()),
    categoryNames,
    doctypeNames,
    domainAliases,
    categoryAliases,
    doctypeAliases,
  });
}

/**
 * Parse file contents by extension. `.json` is JSON; `.yaml`/`.yml` is YAML.
 */
function parseTaxonomyText(text: string, filePath: string): unknown {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.json') {
    return JSON.parse(text);
  }
  if (ext === '.yaml' || ext === '.yml') {
    return yaml.load(text);
  }
  throw new Error(`Unsupported taxonomy file type '${ext || '(none)'}': ${filePath} (expected .json, .yaml or .yml)`);
}

/**
 * Load a taxonomy by bundled name (e.g. "household") or by file path.
 * Throws if the file is missing, unreadable or does not match TaxonomyFileSchema.
 */
export function loadTaxonomy(nameOrPath: string): TaxonomyVocabulary {
  const bundled = BUNDLED_TAXONOMIES[nameOrPath];
  if (bundled !== undefined) {
    return buildTaxonomy(TaxonomyFileSchema.parse(bundled), nameOrPath);
  }

  if (!fs.existsSync(nameOrPath)) {
    throw new Error(
      `Taxonomy file not found: ${nameOrPath} (bundled taxonomies: ${listAvailableTaxonomies().join(', ')})`
    );
  }

  const text = fs.readFileSync(nameOrPath, 'utf8');
  const parsed = TaxonomyFileSchema.safeParse(parseTaxonomyText(text, nameOrPath));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid taxonomy file ${nameOrPath}: ${issues}`);
  }

  const vocabulary = buildTaxonomy(parsed.data, path.basename(nameOrPath, path.extname(nameOrPath)));
  console.log(
    `[Taxonomy] Loaded '${vocabulary.name}' v${vocabulary.version} from ${nameOrPath}: ` +
      `${vocabulary.domainNames.size} domains, ${vocabulary.doctypeNames.size} doctypes`
  );
  return vocabulary;
}

/**
 * Like loadTaxonomy, but any failure returns null so the caller can keep its defaults.
 */
export function tryLoadTaxonomy(nameOrPath: string): TaxonomyVocabulary | null {
  try {
    return loadTaxonomy(nameOrPath);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`[Taxonomy] Could not load taxonomy override, using built-in defaults: ${message}`);
    return null;
  }
}

export function listAvailableTaxonomies(): string[] {
  return Object.keys(BUNDLED_TAXONOMIES).sort();
}
