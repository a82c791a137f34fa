/**
 * DocumentProcessor
 *
 * One document, start to finish:
 *   extraction → summary → keywords → model category scores → fusion → filename → artifacts → storage
 *
 * Only extraction and artifact writing can fail a document. Every LLM step degrades
 * (failed summary, no LLM keywords, fallback scores) and a storage error is logged
 * without discarding the written artifacts.
 */
import * as path from 'path';
import type { TextCategorizer } from '../categorizer/text-categorizer';
import { DEFAULT_MAX_CHUNK_SIZE, LLM_KEYWORD_COUNT } from '../constants';
import { PipelineError, errorMessage } from '../errors';
import { chunkText } from '../extractors/extractor-utils';
import { deriveFilename, filenameCandidates } from '../naming';
import { type Result, err, ok } from '../result';
import type { ScoreVector } from '../taxonomy';
import { readRecordSource, summaryPaths, toSummaryRecord, writeJsonArtifacts, type JsonArtifact } from './record';
import type { DocumentAgent, DocumentSource, DocumentStore, ProcessedDocument, ProcessingOptions } from './types';

export interface DocumentProcessorDeps {
  source: DocumentSource;
  agent: DocumentAgent;
  categorizer: TextCategorizer;
  outputDir: string;
  store?: DocumentStore | null;
  /** Only the first chunk of this many characters is sent to the model */
  maxChunkSize?: number;
  now?: () => Date;
}

/**
 * Merge keyword lists, earlier lists first, dropping repeats.
 */
export function mergeKeywords(...lists: ReadonlyArray<readonly string[]>): string[] {
  const seen = new Set<string>();
  const merged: string[] = [];
  for (const list of lists) {
    for (const keyword of list) {
      if (!seen.has(keyword)) {
        seen.add(keyword);
        merged.push(keyword);
      }
    }
  }
  return merged;
}

export class DocumentProcessor {
  private readonly source: DocumentSource;
  private readonly agent: DocumentAgent;
  private readonly categorizer: TextCategorizer;
  private readonly outputDir: string;
  private readonly store: DocumentStore | null;
  private readonly maxChunkSize: number;
  private readonly now: () => Date;
  /** Output names taken during this run, by source path */
  private readonly claimed = new Map<string, string>();

  constructor(deps: DocumentProcessorDeps) {
    this.source = deps.source;
    this.agent = deps.agent;
    this.categorizer = deps.categorizer;
    this.outputDir = deps.outputDir;
    this.store = deps.store ?? null;
    this.maxChunkSize = deps.maxChunkSize ?? DEFAULT_MAX_CHUNK_SIZE;
    this.now = deps.now ?? (() => new Date());
  }

  async process(filePath: string, options: ProcessingOptions = {}): Promise<Result<ProcessedDocument, PipelineError>> {
    const useLlmKeywords = options.useLlmKeywords ?? true;
    const sourceFile = path.basename(filePath);
    console.log(`[Pipeline] Processing: ${sourceFile}`);

    const extraction = await this.source.extract(filePath);
    if (!extraction.ok) {
      console.error(`[Pipeline] Error extracting ${sourceFile}: ${extraction.error.message}`);
      return err(extraction.error);
    }
    const { text, metadata, wordCount } = extraction.value;
    const modelText = chunkText(text, this.maxChunkSize)[0] ?? text;

    console.log('[Pipeline] Generating structured summary...');
    const summary = await this.agent.generateSummary(modelText);
    if (summary.kind === 'failed') {
      console.warn(`[Pipeline] Failed to generate summary: ${summary.reason}`);
    } else if (summary.kind === 'raw') {
      console.warn('[Pipeline] Summary is not structured, keeping raw text');
    }

    console.log('[Pipeline] Extracting keywords...');
    const statisticalKeywords = this.categorizer.extractKeywords(text);
    const llmKeywords = useLlmKeywords ? await this.agent.extractKeywords(modelText, LLM_KEYWORD_COUNT) : [];
    const keywords = mergeKeywords(llmKeywords, statisticalKeywords);

    console.log('[Pipeline] Categorizing content...');
    let modelScores: ScoreVector | undefined;
    if (llmKeywords.length > 0) {
      modelScores = await this.agent.categorize(modelText, llmKeywords);
    }
    const categorization = this.categorizer.categorize({ text, keywords, modelScores });

    const identifier = path.basename(filePath, path.extname(filePath));
    const sourcePath = path.resolve(filePath);
    const processedAt = this.now().toISOString();

    let filenameBase: string;
    try {
      filenameBase = await this.claimFilename(deriveFilename(summary, identifier), identifier, sourceFile, sourcePath);
    } catch (error) {
      const failure = PipelineError.fromUnknown(error, 'OUTPUT_WRITE_FAILED');
      console.error(`[Pipeline] ${failure.message}`);
      return err(failure);
    }
    const paths = summaryPaths(this.outputDir, filenameBase);

    const doc: ProcessedDocument = {
      sourceFile,
      sourcePath,
      processedAt,
      metadata,
      summary,
      keywords,
      categorization,
      wordCount,
      filenameBase,
      outputPath: paths.summary,
      simplePath: summary.kind === 'structured' ? paths.simple : undefined,
    };

    const artifacts: JsonArtifact[] = [{ path: paths.summary, data: toSummaryRecord(doc) }];
    if (summary.kind === 'structured') {
      artifacts.push({ path: paths.simple, data: summary.fields });
    }

    try {
      await writeJsonArtifacts(artifacts);
    } catch (error) {
      const failure = PipelineError.fromUnknown(error, 'OUTPUT_WRITE_FAILED');
      console.error(`[Pipeline] ${failure.message}`);
      return err(failure);
    }
    console.log(`[Pipeline] JSON summary saved: ${paths.summary}`);

    if (this.store) {
      try {
        doc.documentId = await this.store.insertDocument({
          sourceFile,
          processedAt,
          metadata,
          summary,
          keywords,
          primaryCategory: categorization.primaryCategory,
          categoryScores: categorization.scores,
          wordCount,
        });
      } catch (error) {
        console.error(`[Pipeline] Could not store ${sourceFile}: ${errorMessage(error)}`);
      }
    }

    return ok(doc);
  }

  /**
   * First candidate name not owned by another document, either earlier in this run
   * or by a record already on disk. The same source always gets its own name back.
   */
  private async claimFilename(base: string, identifier: string, sourceFile: string, sourcePath: string): Promise<string> {
    for (const candidate of filenameCandidates(base, identifier)) {
      const claimant = this.claimed.get(candidate);
      if (claimant !== undefined && claimant !== sourcePath) continue;

      this.claimed.set(candidate, sourcePath);
      const owner = await readRecordSource(summaryPaths(this.outputDir, candidate).summary);
      if (owner === undefined || owner === sourceFile) {
        if (candidate !== base) console.log(`[Pipeline] ${base} is taken, using ${candidate}`);
        return candidate;
      }
      if (claimant === undefined) this.claimed.delete(candidate);
    }
    throw new PipelineError('OUTPUT_WRITE_FAILED', `No free output name for ${base}`);
  }
}
