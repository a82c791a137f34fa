/**
 * Output artifacts for one processed document.
 */
import { randomBytes } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { PipelineError, errorMessage } from '../errors';
import { serializeSummary } from '../summary';
import type { ProcessedDocument } from './types';

export interface SummaryRecord {
  source_file: string;
  processed_at: string;
  pdf_metadata: ProcessedDocument['metadata'];
  structured_summary: Record<string, unknown> | string;
  extracted_keywords: string[];
  categorization: {
    primary_category: string;
    category_scores: Record<string, number>;
  };
  document_stats: {
    word_count: number;
    processing_timestamp: string;
  };
}

type RecordSource = Pick<
  ProcessedDocument,
  'sourceFile' | 'processedAt' | 'metadata' | 'summary' | 'keywords' | 'categorization' | 'wordCount'
>;

export function toSummaryRecord(doc: RecordSource): SummaryRecord {
  return {
    source_file: doc.sourceFile,
    processed_at: doc.processedAt,
    pdf_metadata: doc.metadata,
    structured_summary: serializeSummary(doc.summary),
    extracted_keywords: doc.keywords,
    categorization: {
      primary_category: doc.categorization.primaryCategory,
      category_scores: { ...doc.categorization.scores },
    },
    document_stats: {
      word_count: doc.wordCount,
      processing_timestamp: doc.processedAt,
    },
  };
}

export function summaryPaths(outputDir: string, filenameBase: string): { summary: string; simple: string } {
  return {
    summary: path.join(outputDir, `${filenameBase}_summary.json`),
    simple: path.join(outputDir, `${filenameBase}_simple.json`),
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * `source_file` of the summary record at `recordPath`: undefined when there is no record,
 * null when a file exists there that is not a readable record.
 */
export async function readRecordSource(recordPath: string): Promise<string | null | undefined> {
  let content: string;
  try {
    content = await fs.promises.readFile(recordPath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }

  try {
    const data: unknown = JSON.parse(content);
    if (typeof data === 'object' && data !== null && 'source_file' in data && typeof data.source_file === 'string') {
      return data.source_file;
    }
  } catch (error) {
    console.warn(`[Pipeline] Unreadable record at ${recordPath}: ${errorMessage(error)}`);
  }
  return null;
}

export interface JsonArtifact {
  path: string;
  data: unknown;
}

/**
 * Write pretty-printed JSON files as a unit: every file goes to a temp path first and
 * is renamed into place only after all temp files were written.
 */
export async function writeJsonArtifacts(artifacts: readonly JsonArtifact[]): Promise<void> {
  const staged = artifacts.map((artifact, index) => ({
    ...artifact,
    tempPath: `${artifact.path}.${randomBytes(6).toString('hex')}.${index}.tmp`,
  }));

  try {
    for (const artifact of staged) {
      await fs.promises.mkdir(path.dirname(artifact.path), { recursive: true });
      await fs.promises.writeFile(artifact.tempPath, `${JSON.stringify(artifact.data, null, 2)}\n`, 'utf8');
    }
    for (const artifact of staged) {
      await fs.promises.rename(artifact.tempPath, artifact.path);
    }
  } catch (error) {
    await Promise.allSettled(staged.map((artifact) => fs.promises.rm(artifact.tempPath, { force: true })));
    const target = staged.map((artifact) => artifact.path).join(', ');
    throw new PipelineError('OUTPUT_WRITE_FAILED', `Could not write ${target}: ${errorMessage(error)}`, {
      paths: staged.map((artifact) => artifact.path),
    });
  }
}
