import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterAll, afterEach, beforeAll, describe, expect, it, vi } from 'vitest';
import { configureSettings, resetSettings } from '../config/settings';
import { listAvailableTaxonomies, loadTaxonomy, tryLoadTaxonomy } from '../taxonomy/loader';
import { getActiveTaxonomy, resetTaxonomy, resolveDomain } from '../taxonomy/resolver';

let tmpDir: string;

function writeFixture(name: string, contents: string): string {
  const filePath = path.join(tmpDir, name);
  fs.writeFileSync(filePath, contents, 'utf8');
  return filePath;
}

const officeTaxonomy = {
  name: 'office',
  version: 2,
  domains: [{ name: 'Business Admin', categories: ['Vendors', 'purchase-orders'] }],
  categories: { 'business admin': ['payroll'] },
  doctypes: ['Memo', { name: 'Purchase Order', description: 'PO' }],
  aliases: { domains: { biz: 'business_admin' } },
};

beforeAll(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'docpath-taxonomy-'));
});

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

afterEach(() => {
  resetSettings();
  resetTaxonomy();
  vi.restoreAllMocks();
});

describe('bundled taxonomy', () => {
  it('loads household by name', () => {
    const taxonomy = loadTaxonomy('household');

    expect(taxonomy.name).toBe('household');
    expect(taxonomy.version).toBe('1.0');
    expect(taxonomy.domainNames.size).toBe(9);
    expect(taxonomy.doctypeNames.size).toBe(29);
    expect(taxonomy.categoryNames.get('property')?.has('home_improvement')).toBe(true);
    expect(Object.isFrozen(taxonomy)).toBe(true);
  });

  it('lists bundled names', () => {
    expect(listAvailableTaxonomies()).toEqual(['household']);
  });
});

describe('taxonomy files', () => {
  it('loads JSON, normalizing names and merging flat category lists', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const file = writeFixture('office.json', JSON.stringify(officeTaxonomy));

    const taxonomy = loadTaxonomy(file);

    expect(taxonomy.name).toBe('office');
    expect(taxonomy.version).toBe('2');
    expect([...taxonomy.domainNames]).toEqual(['business_admin']);
    expect([...(taxonomy.categoryNames.get('business_admin') ?? [])]).toEqual([
      'vendors',
      'purchase_orders',
      'payroll',
    ]);
    expect(taxonomy.doctypes).toEqual([
      { name: 'memo', description: '' },
      { name: 'purchase_order', description: 'PO' },
    ]);
    expect(resolveDomain('Biz', taxonomy)).toBe('business_admin');
  });

  it('loads YAML and names the taxonomy after the file when it has no name', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const file = writeFixture(
      'garden-taxonomy.yaml',
      ['domains:', '  - name: garden', '    categories: [plants, tools]', 'doctypes: [receipt, manual]', ''].join('\n')
    );

    const taxonomy = loadTaxonomy(file);

    expect(taxonomy.name).toBe('garden-taxonomy');
    expect(taxonomy.version).toBe('1.0');
    expect([...(taxonomy.categoryNames.get('garden') ?? [])]).toEqual(['plants', 'tools']);
    expect([...taxonomy.doctypeNames]).toEqual(['receipt', 'manual']);
  });

  it('throws for missing, invalid and unsupported files', () => {
    const invalid = writeFixture('invalid.json', JSON.stringify({ domains: 'nope', doctypes: [] }));
    const unsupported = writeFixture('taxonomy.txt', 'domains: []');

    expect(() => loadTaxonomy(path.join(tmpDir, 'missing.json'))).toThrow(/Taxonomy file not found/);
    expect(() => loadTaxonomy(invalid)).toThrow(/Invalid taxonomy file/);
    expect(() => loadTaxonomy(unsupported)).toThrow("Unsupported taxonomy file type '.txt'");
  });

  it('tryLoadTaxonomy returns null and warns instead of throwing', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const broken = writeFixture('broken.json', '{ "domains": [');

    expect(tryLoadTaxonomy(path.join(tmpDir, 'missing.yaml'))).toBeNull();
    expect(tryLoadTaxonomy(broken)).toBeNull();
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn.mock.calls[0]?.[0]).toContain('[Taxonomy] Could not load taxonomy override, using built-in defaults');
  });
});

describe('configured override', () => {
  it('becomes the active taxonomy when it loads', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const file = writeFixture('override.json', JSON.stringify(officeTaxonomy));
    configureSettings({ taxonomyFile: file });

    expect(getActiveTaxonomy().name).toBe('office');
  });

  it('falls back to the bundled default when it cannot be loaded', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    configureSettings({ taxonomyFile: path.join(tmpDir, 'does-not-exist.json') });

    const taxonomy = getActiveTaxonomy();

    expect(taxonomy.name).toBe('household');
    expect(resolveDomain('FINANCES')).toBe('financial');
  });
});
