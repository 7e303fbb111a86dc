import { afterEach, describe, expect, it, vi } from 'vitest';
import { buildTaxonomy, loadTaxonomy } from '../taxonomy/loader';
import {
  getActiveTaxonomy,
  resetTaxonomy,
  resolveCategory,
  resolveDoctype,
  resolveDomain,
  setActiveTaxonomy,
} from '../taxonomy/resolver';
import { normalizeToken } from '../taxonomy/tokens';

const household = loadTaxonomy('household');

describe('normalizeToken', () => {
  it('trims, lowercases and turns spaces and hyphens into underscores', () => {
    expect(normalizeToken('  Home Improvement ')).toBe('home_improvement');
    expect(normalizeToken('Lab-Results')).toBe('lab_results');
    expect(normalizeToken('W-2')).toBe('w_2');
  });

  it('normalizes empty and blank input to an empty token', () => {
    expect(normalizeToken('')).toBe('');
    expect(normalizeToken('   ')).toBe('');
    expect(normalizeToken(undefined)).toBe('');
  });
});

describe('resolveDomain', () => {
  it('matches canonical domains regardless of case and whitespace', () => {
    expect(resolveDomain('financial', household)).toBe('financial');
    expect(resolveDomain('  Financial ', household)).toBe('financial');
  });

  it('resolves an uppercase alias to its canonical domain', () => {
    expect(resolveDomain('FINANCES', household)).toBe('financial');
    expect(resolveDomain('Health Care', household)).toBeUndefined();
    expect(resolveDomain('healthcare', household)).toBe('medical');
  });

  it('returns undefined for unknown or empty input', () => {
    expect(resolveDomain('astrology', household)).toBeUndefined();
    expect(resolveDomain('', household)).toBeUndefined();
  });
});

describe('resolveCategory', () => {
  it('resolves categories under an alias-spelled domain', () => {
    expect(resolveCategory('Finances', 'Banking', household)).toBe('banking');
    expect(resolveCategory('Finances', 'checking', household)).toBe('banking');
  });

  it('scopes categories and their aliases to the domain', () => {
    expect(resolveCategory('insurance', 'medical', household)).toBe('health');
    expect(resolveCategory('medical', 'medical', household)).toBeUndefined();
    expect(resolveCategory('property', 'repairs', household)).toBe('maintenance');
    expect(resolveCategory('vehicle', 'repairs', household)).toBeUndefined();
    expect(resolveCategory('vehicle', 'Maintenance', household)).toBe('maintenance');
  });

  it('returns undefined for unknown categories and unknown domains', () => {
    expect(resolveCategory('financial', 'unknown_category', household)).toBeUndefined();
    expect(resolveCategory('astrology', 'banking', household)).toBeUndefined();
    expect(resolveCategory('financial', '', household)).toBeUndefined();
  });

  it('normalizes multi-word categories', () => {
    expect(resolveCategory('property', 'Home Improvement', household)).toBe('home_improvement');
    expect(resolveCategory('property', 'renovation', household)).toBe('home_improvement');
  });
});

describe('resolveDoctype', () => {
  it('matches canonical doctypes and aliases', () => {
    expect(resolveDoctype('Statement', household)).toBe('statement');
    expect(resolveDoctype('Lab Results', household)).toBe('lab_results');
    expect(resolveDoctype('W-2', household)).toBe('w2');
    expect(resolveDoctype('EOB', household)).toBe('explanation_of_benefits');
  });

  it('returns undefined for unknown doctypes', () => {
    expect(resolveDoctype('spaceship_manifest', household)).toBeUndefined();
    expect(resolveDoctype('  ', household)).toBeUndefined();
  });
});

describe('alias closure of the bundled taxonomy', () => {
  it('resolves every domain alias to its canonical domain', () => {
    expect(household.domainAliases.size).toBeGreaterThan(0);
    for (const [alias, canonical] of household.domainAliases) {
      expect(resolveDomain(alias, household)).toBe(canonical);
    }
  });

  it('resolves every category alias within its domain', () => {
    expect(household.categoryAliases.size).toBeGreaterThan(0);
    for (const [domain, table] of household.categoryAliases) {
      for (const [alias, canonical] of table) {
        expect(resolveCategory(domain, alias, household)).toBe(canonical);
      }
    }
  });

  it('resolves every doctype alias to its canonical doctype', () => {
    expect(household.doctypeAliases.size).toBeGreaterThan(0);
    for (const [alias, canonical] of household.doctypeAliases) {
      expect(resolveDoctype(alias, household)).toBe(canonical);
    }
  });
});

describe('alias targets', () => {
  const custom = buildTaxonomy(
    {
      domains: ['alpha'],
      doctypes: ['memo'],
      aliases: {
        domains: { beta: 'gamma' },
        doctypes: { note: 'memo', letter: 'missing' },
      },
    },
    'custom'
  );

  it('ignores aliases whose target is not canonical', () => {
    expect(resolveDomain('beta', custom)).toBeUndefined();
    expect(resolveDoctype('letter', custom)).toBeUndefined();
    expect(resolveDoctype('note', custom)).toBe('memo');
  });
});

describe('active taxonomy', () => {
  afterEach(() => {
    resetTaxonomy();
    vi.restoreAllMocks();
  });

  it('uses the active vocabulary when none is passed', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    setActiveTaxonomy(buildTaxonomy({ domains: ['alpha'], doctypes: ['memo'] }, 'custom'));

    expect(log).not.toHaveBeenCalled();

    expect(getActiveTaxonomy().name).toBe('custom');
    expect(resolveDomain('Alpha')).toBe('alpha');
    expect(resolveDomain('financial')).toBeUndefined();
    expect(resolveDoctype('memo')).toBe('memo');
  });

  it('swaps the whole vocabulary without touching the previous one', () => {
    const first = setActiveTaxonomy('household');
    const second = setActiveTaxonomy(buildTaxonomy({ domains: ['alpha'], doctypes: ['memo'] }, 'custom'));

    expect(getActiveTaxonomy()).toBe(second);
    expect(first.domainNames.has('financial')).toBe(true);
    expect(Object.isFrozen(first)).toBe(true);
  });
});
