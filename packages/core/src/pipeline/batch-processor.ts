import * as fs from 'fs';
import * as path from 'path';
import type { WorkerPool } from '../agents/worker-pool';
import { PipelineError } from '../errors';
import type { DocumentProcessor } from './document-processor';
import type { BatchResult, ProcessedDocument, ProcessingOptions } from './types';

/**
 * Files in `dir` (not recursive) whose extension is in `extensions`, sorted by name.
 */
export async function findDocuments(dir: string, extensions: readonly string[]): Promise<string[]> {
  const wanted = new Set(extensions.map((ext) => ext.toLowerCase().replace(/^\./, '')));
  const entries = await fs.promises.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && wanted.has(path.extname(entry.name).slice(1).toLowerCase()))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * BatchProcessor - runs documents through a shared WorkerPool
 *
 * Documents are independent: one failure is recorded and the rest continue.
 * Results keep input order regardless of completion order.
 */
export class BatchProcessor {
  constructor(
    private readonly processor: DocumentProcessor,
    private readonly workerPool: WorkerPool,
  ) {}

  async processAll(filePaths: readonly string[], options: ProcessingOptions = {}): Promise<BatchResult> {
    const startTime = Date.now();
    console.log(`[Pipeline] Batch of ${filePaths.length} documents (${this.workerPool.getStats().max} workers)`);

    const settled = await Promise.allSettled(
      filePaths.map((filePath) => this.workerPool.execute(() => this.processor.process(filePath, options))),
    );

    const result: BatchResult = { processed: [], failed: [] };
    settled.forEach((outcome, index) => {
      const filePath = filePaths[index];
      if (outcome.status === 'rejected') {
        result.failed.push({ filePath, error: PipelineError.fromUnknown(outcome.reason) });
      } else if (outcome.value.ok) {
        result.processed.push(outcome.value.value);
      } else {
        result.failed.push({ filePath, error: outcome.value.error });
      }
    });

    console.log(
      `[Pipeline] Batch finished in ${Date.now() - startTime}ms: ${result.processed.length} processed, ${result.failed.length} failed`,
    );
    return result;
  }
}

/**
 * Primary-category counts, most frequent first (ties by category name).
 */
export function categoryDistribution(docs: readonly ProcessedDocument[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const doc of docs) {
    const category = doc.categorization.primaryCategory;
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }
  return [...counts.entries()].sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]));
}
