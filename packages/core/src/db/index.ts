import * as path from 'path';
import * as fs from 'fs';
import Database from 'better-sqlite3';
import { PipelineError, errorMessage } from '../errors';
import type { DocumentMetadata } from '../extractors/types';
import {
  type Summary,
  isPredictionModel,
  keyFindings,
  publicationYear,
  summaryCategories,
  summaryField,
  summaryText,
} from '../summary';
import type { ScoreVector } from '../taxonomy';
import { LATEST_SCHEMA_VERSION, runMigrations } from './migrations';

/**
 * Everything persisted for one processed document.
 */
export interface NewDocument {
  sourceFile: string;
  processedAt: string;
  metadata: DocumentMetadata;
  summary: Summary;
  keywords: readonly string[];
  primaryCategory: string;
  categoryScores: ScoreVector;
  wordCount: number;
}

export interface DocumentSearch {
  /** Matched against title and key takeaways */
  query?: string;
  category?: string;
  yearFrom?: number;
  yearTo?: number;
  author?: string;
  journal?: string;
  limit?: number;
}

export interface DocumentSummaryRow {
  id: number;
  title: string | null;
  authors: string | null;
  year_published: number | null;
  journal: string | null;
  primary_category: string | null;
  key_takeaways: string | null;
  processed_at: string;
  word_count: number | null;
  source_file: string;
  keywords: string[];
}

export interface StoredDocument {
  id: number;
  source_file: string;
  processed_at: string;
  pdf_title: string | null;
  pdf_author: string | null;
  pdf_filename: string | null;
  pdf_pages: number | null;
  pdf_filepath: string | null;
  title: string | null;
  authors: string | null;
  year_published: number | null;
  journal: string | null;
  bibtex_citation: string | null;
  document_type: string | null;
  sample_size: string | null;
  method: string | null;
  prediction_model: boolean | null;
  key_takeaways: string | null;
  word_count: number | null;
  primary_category: string | null;
  keywords: string[];
  category_scores: Record<string, number>;
  key_findings: Array<{ name: string; description: string }>;
}

export interface DatabaseStatistics {
  totalDocuments: number;
  byCategory: Array<{ category: string; count: number }>;
  byYear: Array<{ year: number; count: number }>;
  topJournals: Array<{ journal: string; count: number }>;
}

type DocumentRow = Omit<StoredDocument, 'prediction_model' | 'keywords' | 'category_scores' | 'key_findings'> & {
  prediction_model: number | null;
};

type SearchRow = Omit<DocumentSummaryRow, 'keywords'> & { keywords: string | null };

const DEFAULT_SEARCH_LIMIT = 50;
const STATISTICS_LIMIT = 10;

/** Scores are stored with four decimals, inside the CHECK range. */
function storedScore(score: number): number {
  return Math.round(Math.min(1, Math.max(0, score)) * 10000) / 10000;
}

export class DatabaseManager {
  private db: Database.Database | null = null;
  private dbPath: string;

  /**
   * @param dbPath file path, or ':memory:' for a private in-memory database
   */
  constructor(dbPath: string) {
    this.dbPath = dbPath;
    this.init();
  }

  private init(): void {
    try {
      if (this.dbPath !== ':memory:') {
        const dir = path.dirname(this.dbPath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }

      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');

      runMigrations(this.db);
    } catch (error) {
      throw new PipelineError('DATABASE_ERROR', `Could not open database at ${this.dbPath}: ${errorMessage(error)}`, {
        dbPath: this.dbPath,
      });
    }
  }

  private ensureReady(): Database.Database {
    if (!this.db) {
      throw new PipelineError('DATABASE_ERROR', 'Database not initialized');
    }
    return this.db;
  }

  // ============================================================================
  // Documents
  // ============================================================================

  /**
   * Insert a document with its keywords, category scores and key findings in one transaction.
   * Returns the new document id.
   */
  async insertDocument(doc: NewDocument): Promise<number> {
    const db = this.ensureReady();
    const structured = doc.summary.kind === 'structured';
    const findings = keyFindings(doc.summary);
    const predictionModel = isPredictionModel(doc.summary);

    const insertDocument = db.prepare(`
      INSERT INTO documents (
        source_file, processed_at, pdf_title, pdf_author, pdf_filename,
        pdf_pages, pdf_filepath, title, authors, year_published, journal,
        bibtex_citation, document_type, sample_size, method, prediction_model,
        key_takeaways, word_count, primary_category, categories_json, key_findings_json, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertKeyword = db.prepare(`INSERT INTO keywords (document_id, keyword) VALUES (?, ?)`);
    const insertScore = db.prepare(`INSERT INTO category_scores (document_id, category, score) VALUES (?, ?, ?)`);
    const insertFinding = db.prepare(`
      INSERT INTO key_findings (document_id, finding_name, finding_description) VALUES (?, ?, ?)
    `);

    const insert = db.transaction((): number => {
      const info = insertDocument.run(
        doc.sourceFile,
        doc.processedAt,
        doc.metadata.title ?? null,
        doc.metadata.author ?? null,
        doc.metadata.filename,
        doc.metadata.pages ?? null,
        doc.metadata.filepath,
        summaryField(doc.summary, 'Title') ?? null,
        summaryField(doc.summary, 'Author(s)') ?? null,
        publicationYear(doc.summary),
        summaryField(doc.summary, 'Journal') ?? null,
        summaryField(doc.summary, 'BibTeX Citation') ?? null,
        summaryField(doc.summary, 'Type') ?? null,
        summaryField(doc.summary, 'Sample Size') ?? null,
        summaryField(doc.summary, 'Method') ?? null,
        predictionModel === null ? null : predictionModel ? 1 : 0,
        structured ? (summaryField(doc.summary, 'Key Takeaways') ?? null) : summaryText(doc.summary),
        doc.wordCount,
        doc.primaryCategory,
        JSON.stringify(summaryCategories(doc.summary)),
        JSON.stringify(Object.fromEntries(findings)),
        Date.now(),
      );
      const documentId = Number(info.lastInsertRowid);

      for (const keyword of doc.keywords) {
        insertKeyword.run(documentId, keyword);
      }
      for (const [category, score] of Object.entries(doc.categoryScores)) {
        insertScore.run(documentId, category, storedScore(score));
      }
      for (const [name, description] of findings) {
        insertFinding.run(documentId, name, description);
      }
      return documentId;
    });

    try {
      const id = insert();
      console.log(`[DatabaseManager] Document inserted with ID: ${id}`);
      return id;
    } catch (error) {
      throw new PipelineError('DATABASE_ERROR', `Error inserting document: ${errorMessage(error)}`, {
        sourceFile: doc.sourceFile,
      });
    }
  }

  /**
   * Documents matching every given filter, most recently processed first.
   * Text filters are case-insensitive substring matches.
   */
  async searchDocuments(search: DocumentSearch = {}): Promise<DocumentSummaryRow[]> {
    const db = this.ensureReady();
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (search.query) {
      conditions.push(`(COALESCE(d.title, '') || ' ' || COALESCE(d.key_takeaways, '')) LIKE ?`);
      params.push(`%${search.query}%`);
    }
    if (search.category) {
      conditions.push('d.primary_category = ?');
      params.push(search.category);
    }
    if (search.yearFrom !== undefined) {
      conditions.push('d.year_published >= ?');
      params.push(search.yearFrom);
    }
    if (search.yearTo !== undefined) {
      conditions.push('d.year_published <= ?');
      params.push(search.yearTo);
    }
    if (search.author) {
      conditions.push('d.authors LIKE ?');
      params.push(`%${search.author}%`);
    }
    if (search.journal) {
      conditions.push('d.journal LIKE ?');
      params.push(`%${search.journal}%`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(search.limit ?? DEFAULT_SEARCH_LIMIT);

    const rows = db
      .prepare<Array<string | number>, SearchRow>(`
        SELECT
          d.id, d.title, d.authors, d.year_published, d.journal,
          d.primary_category, d.key_takeaways, d.processed_at,
          d.word_count, d.source_file,
          (SELECT json_group_array(keyword) FROM (
            SELECT DISTINCT k.keyword FROM keywords k WHERE k.document_id = d.id ORDER BY k.keyword
          )) AS keywords
        FROM documents d
        ${where}
        ORDER BY d.processed_at DESC, d.id DESC
        LIMIT ?
      `)
      .all(...params);

    return rows.map((row) => ({ ...row, keywords: parseStringArray(row.keywords) }));
  }

  async getStatistics(): Promise<DatabaseStatistics> {
    const db = this.ensureReady();

    const total = db.prepare<[], { count: number }>(`SELECT COUNT(*) AS count FROM documents`).get();

    const byCategory = db
      .prepare<[], { category: string | null; count: number }>(`
        SELECT primary_category AS category, COUNT(*) AS count
        FROM documents
        GROUP BY primary_category
        ORDER BY count DESC, category
      `)
      .all();

    const byYear = db
      .prepare<[number], { year: number; count: number }>(`
        SELECT year_published AS year, COUNT(*) AS count
        FROM documents
        WHERE year_published IS NOT NULL
        GROUP BY year_published
        ORDER BY year_published DESC
        LIMIT ?
      `)
      .all(STATISTICS_LIMIT);

    const topJournals = db
      .prepare<[number], { journal: string; count: number }>(`
        SELECT journal, COUNT(*) AS count
        FROM documents
        WHERE journal IS NOT NULL AND journal != 'Not specified'
        GROUP BY journal
        ORDER BY count DESC, journal
        LIMIT ?
      `)
      .all(STATISTICS_LIMIT);

    return {
      totalDocuments: total?.count ?? 0,
      byCategory: byCategory.map((row) => ({ category: row.category ?? 'unknown', count: row.count })),
      byYear,
      topJournals,
    };
  }

  async getDocumentById(id: number): Promise<StoredDocument | undefined> {
    const db = this.ensureReady();
    const row = db.prepare<[number], DocumentRow>(`
      SELECT
        id, source_file, processed_at, pdf_title, pdf_author, pdf_filename, pdf_pages, pdf_filepath,
        title, authors, year_published, journal, bibtex_citation, document_type, sample_size,
        method, prediction_model, key_takeaways, word_count, primary_category
      FROM documents
      WHERE id = ?
    `).get(id);

    if (!row) {
      return undefined;
    }

    const keywords = db
      .prepare<[number], { keyword: string }>(`SELECT keyword FROM keywords WHERE document_id = ? ORDER BY id`)
      .all(id)
      .map((k) => k.keyword);

    const categoryScores: Record<string, number> = {};
    for (const score of db
      .prepare<[number], { category: string; score: number }>(
        `SELECT category, score FROM category_scores WHERE document_id = ? ORDER BY id`,
      )
      .all(id)) {
      categoryScores[score.category] = score.score;
    }

    const findings = db
      .prepare<[number], { name: string; description: string }>(`
        SELECT finding_name AS name, finding_description AS description
        FROM key_findings WHERE document_id = ? ORDER BY id
      `)
      .all(id);

    return {
      ...row,
      prediction_model: row.prediction_model === null ? null : row.prediction_model === 1,
      keywords,
      category_scores: categoryScores,
      key_findings: findings,
    };
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      console.log('[DatabaseManager] Database connection closed');
    }
  }
}

function parseStringArray(json: string | null): string[] {
  if (!json) return [];
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === 'string') : [];
}

export { runMigrations, LATEST_SCHEMA_VERSION };
