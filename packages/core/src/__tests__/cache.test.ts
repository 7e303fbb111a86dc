import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ClassificationCache, hashFile, type CachedClassification } from '../db';

const POLICY = 'strict|household@1.0#000000000000|depth=5|length=200';

const entry: CachedClassification = {
  fileHash: 'a9993e364706816aba3e25717850c26c9cd0d89d',
  namingStyle: 'descriptive',
  namingPolicy: POLICY,
  domain: 'financial',
  category: 'banking',
  doctype: 'statement',
  vendor: 'chase',
  date: '20240115',
  subject: 'checking',
  version: null,
  directoryPath: 'Financial/Banking/Statements/',
  filename: 'statement_chase_checking_20240115.pdf',
  fullPath: 'Financial/Banking/Statements/statement_chase_checking_20240115.pdf',
  originalPath: '/scans/january.pdf',
  createdAt: 1705312800000,
};

let cache: ClassificationCache;

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  cache = new ClassificationCache(':memory:');
});

afterEach(() => {
  cache.close();
  vi.restoreAllMocks();
});

describe('ClassificationCache', () => {
  it('stores and returns an entry', () => {
    cache.put(entry);

    expect(cache.get(entry.fileHash, 'descriptive', POLICY)).toEqual(entry);
    expect(cache.count()).toBe(1);
  });

  it('keys entries by naming style', () => {
    cache.put(entry);
    cache.put({ ...entry, namingStyle: 'compact', filename: 'chase_20240115.pdf', fullPath: 'Financial/Banking/Statements/chase_20240115.pdf' });

    expect(cache.get(entry.fileHash, 'compact', POLICY)?.filename).toBe('chase_20240115.pdf');
    expect(cache.get(entry.fileHash, 'descriptive', POLICY)?.filename).toBe('statement_chase_checking_20240115.pdf');
    expect(cache.count()).toBe(2);
  });

  it('keys entries by naming policy', () => {
    const fallback = 'fallback|household@1.0#000000000000|depth=5|length=200';
    cache.put(entry);
    cache.put({ ...entry, namingPolicy: fallback, category: 'other', fullPath: 'Financial/Other/Statements/statement_chase_checking_20240115.pdf' });

    expect(cache.get(entry.fileHash, 'descriptive', POLICY)?.category).toBe('banking');
    expect(cache.get(entry.fileHash, 'descriptive', fallback)?.category).toBe('other');
    expect(cache.get(entry.fileHash, 'descriptive', 'strict|household@1.0#000000000000|depth=5|length=40')).toBeNull();
    expect(cache.count()).toBe(2);
  });

  it('returns null on a miss', () => {
    cache.put(entry);

    expect(cache.get('0000', 'descriptive', POLICY)).toBeNull();
    expect(cache.get(entry.fileHash, 'compact', POLICY)).toBeNull();
  });

  it('replaces an existing entry', () => {
    cache.put(entry);
    cache.put({ ...entry, subject: 'savings', version: 'v02' });

    const stored = cache.get(entry.fileHash, 'descriptive', POLICY);
    expect(stored?.subject).toBe('savings');
    expect(stored?.version).toBe('v02');
    expect(cache.count()).toBe(1);
  });

  it('fills in the creation time', () => {
    const before = Date.now();

    cache.put({ ...entry, createdAt: undefined });

    expect(cache.get(entry.fileHash, 'descriptive', POLICY)?.createdAt).toBeGreaterThanOrEqual(before);
  });

  it('deletes every style of a file', () => {
    cache.put(entry);
    cache.put({ ...entry, namingStyle: 'compact' });
    cache.put({ ...entry, fileHash: 'ffff' });

    expect(cache.delete(entry.fileHash)).toBe(2);
    expect(cache.count()).toBe(1);
  });

  it('clears everything', () => {
    cache.put(entry);
    cache.clear();

    expect(cache.count()).toBe(0);
  });

  it('refuses to work once closed', () => {
    cache.close();

    expect(() => cache.get(entry.fileHash, 'descriptive', POLICY)).toThrow('Classification cache is closed');
  });
});

describe('ClassificationCache on disk', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docpath-cache-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the parent directory and keeps entries across connections', () => {
    const dbPath = path.join(dir, 'nested', 'cache.db');
    const first = new ClassificationCache(dbPath);
    first.put(entry);
    first.close();

    const second = new ClassificationCache(dbPath);
    try {
      expect(second.get(entry.fileHash, 'descriptive', POLICY)).toEqual(entry);
    } finally {
      second.close();
    }
  });
});

describe('hashFile', () => {
  it('hashes the file contents', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'docpath-hash-'));
    try {
      const a = path.join(dir, 'a.txt');
      const b = path.join(dir, 'renamed.md');
      fs.writeFileSync(a, 'abc');
      fs.writeFileSync(b, 'abc');

      expect(await hashFile(a)).toBe('a9993e364706816aba3e25717850c26c9cd0d89d');
      expect(await hashFile(b)).toBe(await hashFile(a));
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
