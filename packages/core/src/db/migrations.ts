import type Database from 'better-sqlite3';

interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial_schema',
    up: (db) => {
      // Documents table - one row per processed document
      db.prepare(`
        CREATE TABLE IF NOT EXISTS documents (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          source_file TEXT NOT NULL,
          processed_at TEXT NOT NULL,
          pdf_title TEXT,
          pdf_author TEXT,
          pdf_filename TEXT,
          pdf_pages INTEGER,
          pdf_filepath TEXT,
          title TEXT,
          authors TEXT,
          year_published INTEGER,
          journal TEXT,
          bibtex_citation TEXT,
          document_type TEXT,
          sample_size TEXT,
          method TEXT,
          prediction_model INTEGER,
          key_takeaways TEXT,
          word_count INTEGER,
          primary_category TEXT,
          categories_json TEXT,
          key_findings_json TEXT,
          created_at INTEGER NOT NULL
        )
      `).run();

      db.prepare(`CREATE INDEX IF NOT EXISTS idx_documents_primary_category ON documents(primary_category)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_documents_year_published ON documents(year_published)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_documents_journal ON documents(journal)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_documents_authors ON documents(authors)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_documents_processed_at ON documents(processed_at)`).run();

      db.prepare(`
        CREATE TABLE IF NOT EXISTS keywords (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          document_id INTEGER NOT NULL,
          keyword TEXT NOT NULL,
          FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
        )
      `).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_keywords_keyword ON keywords(keyword)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_keywords_document_id ON keywords(document_id)`).run();
    },
  },
  {
    version: 2,
    name: 'add_findings_and_category_scores',
    up: (db) => {
      db.prepare(`
        CREATE TABLE IF NOT EXISTS key_findings (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          document_id INTEGER NOT NULL,
          finding_name TEXT NOT NULL,
          finding_description TEXT NOT NULL,
          FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
        )
      `).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_key_findings_document_id ON key_findings(document_id)`).run();

      db.prepare(`
        CREATE TABLE IF NOT EXISTS category_scores (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          document_id INTEGER NOT NULL,
          category TEXT NOT NULL,
          score REAL NOT NULL CHECK (score >= 0 AND score <= 1),
          FOREIGN KEY (document_id) REFERENCES documents(id) ON DELETE CASCADE
        )
      `).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_category_scores_category ON category_scores(category)`).run();
      db.prepare(`CREATE INDEX IF NOT EXISTS idx_category_scores_document_id ON category_scores(document_id)`).run();
    },
  },
];

export const LATEST_SCHEMA_VERSION = migrations[migrations.length - 1].version;

export function runMigrations(db: Database.Database): void {
  db.prepare(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at INTEGER NOT NULL
    )
  `).run();

  const applied = new Set<number>();
  for (const row of db.prepare<[], { version: number }>(`SELECT version FROM schema_migrations`).all()) {
    applied.add(row.version);
  }

  for (const migration of migrations) {
    if (!applied.has(migration.version)) {
      console.log(`[DatabaseManager] Applying migration ${migration.version}: ${migration.name}`);
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
