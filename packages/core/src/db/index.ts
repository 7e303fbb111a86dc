import * as path from 'path';
import * as fs from 'fs';
import * as crypto from 'crypto';
import Database from 'better-sqlite3';
import { runMigrations } from './migrations';

/**
 * A stored classification. Keyed by file content hash, naming style and naming policy,
 * so a renamed or moved file still hits while a change of style, taxonomy, strictness
 * or path limits never returns a stale path.
 */
export type CachedClassification = {
  fileHash: string;
  namingStyle: string;
  /** Everything besides the style that shapes the path; see describeNamingPolicy. */
  namingPolicy: string;
  domain: string;
  category: string;
  doctype: string;
  vendor: string;
  date: string;
  subject: string;
  version: string | null;
  directoryPath: string;
  filename: string;
  fullPath: string;
  /** Path of the file when it was classified. */
  originalPath: string | null;
  createdAt: number;
};

type ClassificationRow = {
  file_hash: string;
  naming_style: string;
  naming_policy: string;
  domain: string;
  category: string;
  doctype: string;
  vendor: string;
  date: string;
  subject: string;
  version: string | null;
  directory_path: string;
  filename: string;
  full_path: string;
  original_path: string | null;
  created_at: number;
};

function fromRow(row: ClassificationRow): CachedClassification {
  return {
    fileHash: row.file_hash,
    namingStyle: row.naming_style,
    namingPolicy: row.naming_policy,
    domain: row.domain,
    category: row.category,
    doctype: row.doctype,
    vendor: row.vendor,
    date: row.date,
    subject: row.subject,
    version: row.version,
    directoryPath: row.directory_path,
    filename: row.filename,
    fullPath: row.full_path,
    originalPath: row.original_path,
    createdAt: row.created_at,
  };
}

/**
 * SHA-1 of the file's bytes, hex encoded.
 */
export async function hashFile(filePath: string): Promise<string> {
  const data = await fs.promises.readFile(filePath);
  return crypto.createHash('sha1').update(data).digest('hex');
}

export class ClassificationCache {
  private db: InstanceType<typeof Database> | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
    this.init();
  }

  private init(): void {
    if (this.dbPath !== ':memory:') {
      // Ensure directory exists
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    this.db.pragma('journal_mode = WAL');

    runMigrations(this.db);
  }

  private ensureReady(): InstanceType<typeof Database> {
    if (!this.db) {
      throw new Error('Classification cache is closed');
    }
    return this.db;
  }

  get(fileHash: string, namingStyle: string, namingPolicy: string): CachedClassification | null {
    const db = this.ensureReady();
    const row = db
      .prepare<[string, string, string], ClassificationRow>(`
        SELECT file_hash, naming_style, naming_policy, domain, category, doctype, vendor, date, subject,
               version, directory_path, filename, full_path, original_path, created_at
        FROM classifications
        WHERE file_hash = ? AND naming_style = ? AND naming_policy = ?
      `)
      .get(fileHash, namingStyle, namingPolicy);
    return row ? fromRow(row) : null;
  }

  /**
   * Insert or replace the entry for (fileHash, namingStyle, namingPolicy).
   */
  put(entry: Omit<CachedClassification, 'createdAt'> & { createdAt?: number }): void {
    const db = this.ensureReady();
    db.prepare(`
      INSERT OR REPLACE INTO classifications (
        file_hash, naming_style, naming_policy, domain, category, doctype, vendor, date, subject, version,
        directory_path, filename, full_path, original_path, created_at
      ) VALUES (
        @fileHash, @namingStyle, @namingPolicy, @domain, @category, @doctype, @vendor, @date, @subject, @version,
        @directoryPath, @filename, @fullPath, @originalPath, @createdAt
      )
    `).run({
      fileHash: entry.fileHash,
      namingStyle: entry.namingStyle,
      namingPolicy: entry.namingPolicy,
      domain: entry.domain,
      category: entry.category,
      doctype: entry.doctype,
      vendor: entry.vendor,
      date: entry.date,
      subject: entry.subject,
      version: entry.version,
      directoryPath: entry.directoryPath,
      filename: entry.filename,
      fullPath: entry.fullPath,
      originalPath: entry.originalPath,
      createdAt: entry.createdAt ?? Date.now(),
    });
  }

  /**
   * Remove every entry for a file, whatever the naming style and policy. Returns the number of rows removed.
   */
  delete(fileHash: string): number {
    const db = this.ensureReady();
    return db.prepare(`DELETE FROM classifications WHERE file_hash = ?`).run(fileHash).changes;
  }

  clear(): void {
    const db = this.ensureReady();
    db.prepare(`DELETE FROM classifications`).run();
    console.log('[ClassificationCache] Cleared all entries');
  }

  count(): number {
    const db = this.ensureReady();
    const row = db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM classifications`).get();
    return row?.total ?? 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
