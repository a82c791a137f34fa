import { LLMClient, createLLMClient } from '../agents/llm-client';
import { SummaryAgent } from '../agents/summary-agent';
import { WorkerPool } from '../agents/worker-pool';
import { TextCategorizer } from '../categorizer/text-categorizer';
import type { AppConfig } from '../config';
import { DatabaseManager } from '../db';
import { ExtractorManager } from '../extractors/extractor-manager';
import { type Taxonomy, loadTaxonomy } from '../taxonomy';
import { BatchProcessor } from './batch-processor';
import { DocumentProcessor } from './document-processor';

export interface Pipeline {
  config: AppConfig;
  taxonomy: Taxonomy;
  client: LLMClient;
  agent: SummaryAgent;
  extractors: ExtractorManager;
  categorizer: TextCategorizer;
  store: DatabaseManager | null;
  processor: DocumentProcessor;
  batch: BatchProcessor;
  close(): Promise<void>;
}

/**
 * Wire every component from configuration. The database opens only when DATABASE_PATH is set.
 */
export function createPipeline(config: AppConfig): Pipeline {
  const taxonomy = loadTaxonomy(config.taxonomyPath);
  const client = createLLMClient(config);
  const workerPool = new WorkerPool(config.concurrency);
  const agent = new SummaryAgent(client, taxonomy, { timeoutMs: config.apiTimeoutMs });
  const extractors = new ExtractorManager();
  const categorizer = new TextCategorizer(taxonomy, { threshold: config.categoryThreshold });
  const store = config.databasePath ? new DatabaseManager(config.databasePath) : null;

  const processor = new DocumentProcessor({
    source: extractors,
    agent,
    categorizer,
    outputDir: config.outputDir,
    store,
    maxChunkSize: config.maxChunkSize,
  });

  return {
    config,
    taxonomy,
    client,
    agent,
    extractors,
    categorizer,
    store,
    processor,
    batch: new BatchProcessor(processor, workerPool),
    async close() {
      workerPool.shutdown();
      await store?.close();
    },
  };
}
