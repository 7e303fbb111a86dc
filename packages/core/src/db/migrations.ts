import Database from 'better-sqlite3';

interface Migration {
  version: number;
  name: string;
  up: (db: InstanceType<typeof Database>) => void;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      // Classifications table - one suggested path per file content and naming style
      db.prepare(`
        CREATE TABLE IF NOT EXISTS classifications (
          file_hash TEXT NOT NULL,
          naming_style TEXT NOT NULL,
          domain TEXT NOT NULL,
          category TEXT NOT NULL,
          doctype TEXT NOT NULL,
          vendor TEXT NOT NULL,
          date TEXT NOT NULL,
          subject TEXT NOT NULL,
          directory_path TEXT NOT NULL,
          filename TEXT NOT NULL,
          full_path TEXT NOT NULL,
          created_at INTEGER NOT NULL,
          PRIMARY KEY (file_hash, naming_style)
        )
      `).run();
    },
  },
  {
    version: 2,
    name: 'add_version_and_original_path',
    up: (db) => {
      db.prepare(`ALTER TABLE classifications ADD COLUMN version TEXT`).run();
      db.prepare(`ALTER TABLE classifications ADD COLUMN original_path TEXT`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_classifications_created_at ON classifications(created_at)`).run();
    },
  },
  {
    version: 3,
    name: 'key_by_naming_policy',
    up: (db) => {
      // SQLite cannot change a primary key in place. Rows written before this migration
      // have no recorded policy, so they are dropped rather than copied.
      db.prepare(`DROP INDEX IF EXISTS idx_classifications_created_at`).run();
      db.prepare(`DROP TABLE classifications`).run();
      db.prepare(`
        CREATE TABLE classifications (
          file_hash TEXT NOT NULL,
          naming_style TEXT NOT NULL,
          naming_policy TEXT NOT NULL,
          domain TEXT NOT NULL,
          category TEXT NOT NULL,
          doctype TEXT NOT NULL,
          vendor TEXT NOT NULL,
          date TEXT NOT NULL,
          subject TEXT NOT NULL,
          version TEXT,
          directory_path TEXT NOT NULL,
          filename TEXT NOT NULL,
          full_path TEXT NOT NULL,
          original_path TEXT,
          created_at INTEGER NOT NULL,
          PRIMARY KEY (file_hash, naming_style, naming_policy)
        )
      `).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_classifications_created_at ON classifications(created_at)`).run();
    },
  },
];

export function runMigrations(db: InstanceType<typeof Database>): void {
  // Ensure schema_migrations table exists
  db.prepare(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `).run();

  // Get applied migrations
  const applied = new Set<number>();
  const rows = db.prepare<[], { version: number }>(`SELECT version FROM schema_migrations`).all();
  for (const row of rows) {
    applied.add(row.version);
  }

  // Apply pending migrations, each in its own transaction
  for (const migration of migrations) {
    if (!applied.has(migration.version)) {
      console.log(`[ClassificationCache] Applying migration ${migration.version}: ${migration.name}`);
      db.transaction(() => {
        migration.up(db);
        db.prepare(`
          INSERT INTO schema_migrations (version, name, applied_at)
          VALUES (?, ?, ?)
        `).run(migration.version, migration.name, Date.now());
      })();
    }
  }
}
