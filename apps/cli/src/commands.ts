import * as fs from 'fs';
import * as path from 'path';
import {
  type AppConfig,
  DatabaseManager,
  type Pipeline,
  PipelineError,
  categoryDistribution,
  createPipeline,
  findDocuments,
  getProviderDisplayName,
  loadConfig,
  maskSecret,
  setEnvValue,
  withModel,
  writeCategoryReport,
} from '@paper-sieve/core';
import { type ParsedArgs, UsageError, intFlag, stringFlag } from './args';
import {
  bold,
  cyan,
  dim,
  formatDistribution,
  formatExample,
  formatResultsTable,
  formatSearchResults,
  formatStatistics,
  formatSummary,
  green,
  red,
  yellow,
} from './format';

export interface CommandContext {
  args: ParsedArgs;
  env: NodeJS.ProcessEnv;
  /** `.env` file used by `config` */
  envPath: string;
  print: (line?: string) => void;
}

export type Command = (ctx: CommandContext) => Promise<number>;

const EXAMPLE_PREVIEW_COUNT = 3;

function requirePositional(ctx: CommandContext, name: string): string {
  const value = ctx.args.positionals[0];
  if (!value) {
    throw new UsageError(`Missing <${name}> argument`);
  }
  return value;
}

function printLines(ctx: CommandContext, lines: readonly string[]): void {
  for (const line of lines) ctx.print(line);
}

/**
 * The configured model must be installed before documents are sent to it.
 */
async function checkBackend(ctx: CommandContext, pipeline: Pipeline): Promise<boolean> {
  if (await pipeline.client.isModelAvailable()) {
    return true;
  }
  const model = pipeline.client.getModel();
  ctx.print(red(`Error: Model '${model}' not available`));
  if (pipeline.config.provider === 'ollama') {
    ctx.print('Make sure Ollama is running and the model is installed:');
    ctx.print(`  ollama pull ${model}`);
  }
  return false;
}

function openPipeline(ctx: CommandContext): Pipeline {
  const config = withModel(loadConfig(ctx.env), stringFlag(ctx.args.flags, 'model'));
  return createPipeline(config);
}

// ─── process ─────────────────────────────────────────────────────────────────

export const processCommand: Command = async (ctx) => {
  const filePath = requirePositional(ctx, 'file');
  if (!fs.existsSync(filePath)) {
    throw new UsageError(`File not found: ${filePath}`);
  }

  const pipeline = openPipeline(ctx);
  try {
    if (!(await checkBackend(ctx, pipeline))) return 1;

    const result = await pipeline.processor.process(filePath, {
      useLlmKeywords: ctx.args.flags['no-llm-keywords'] !== true,
    });
    if (!result.ok) {
      ctx.print(red(`Failed to process ${path.basename(filePath)}: ${result.error.message}`));
      return 1;
    }

    printLines(ctx, formatResultsTable([result.value]));
    ctx.print();
    printLines(ctx, formatSummary(result.value.summary));
    ctx.print();
    ctx.print(`${green('JSON summary saved:')} ${result.value.outputPath}`);
    if (result.value.simplePath) {
      ctx.print(`${green('Simple format saved:')} ${result.value.simplePath}`);
    }
    return 0;
  } finally {
    await pipeline.close();
  }
};

// ─── batch ───────────────────────────────────────────────────────────────────

export const batchCommand: Command = async (ctx) => {
  const directory = requirePositional(ctx, 'directory');
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    throw new UsageError(`Not a directory: ${directory}`);
  }

  const pipeline = openPipeline(ctx);
  try {
    const files = await findDocuments(directory, pipeline.extractors.getSupportedExtensions());
    if (files.length === 0) {
      ctx.print(red(`No supported documents found in ${directory}`));
      return 1;
    }
    ctx.print(`Found ${files.length} documents`);

    if (!(await checkBackend(ctx, pipeline))) return 1;

    const { processed, failed } = await pipeline.batch.processAll(files, {
      useLlmKeywords: ctx.args.flags['no-llm-keywords'] !== true,
    });

    for (const failure of failed) {
      ctx.print(red(`✗ ${path.basename(failure.filePath)}: ${failure.error.message}`));
    }
    if (processed.length === 0) {
      ctx.print(red('No documents were successfully processed'));
      return 1;
    }

    printLines(ctx, formatResultsTable(processed));
    ctx.print();
    printLines(ctx, formatDistribution(categoryDistribution(processed)));

    if (ctx.args.flags.report === true) {
      const reportPath = await writeCategoryReport(processed, pipeline.config.outputDir);
      if (reportPath) ctx.print(`${cyan('Report created:')} ${reportPath}`);
    }
    return failed.length > 0 ? 1 : 0;
  } finally {
    await pipeline.close();
  }
};

// ─── setup / models ──────────────────────────────────────────────────────────

function describeConfig(ctx: CommandContext, config: AppConfig): void {
  ctx.print(`${dim('Provider:')} ${getProviderDisplayName(config.provider)}`);
  if (config.provider === 'ollama') ctx.print(`${dim('Host:')} ${config.ollamaHost}`);
  const key = config.provider === 'openai' ? config.openaiApiKey : config.provider === 'openrouter' ? config.openrouterApiKey : undefined;
  if (key) ctx.print(`${dim('API key:')} ${maskSecret(key)}`);
}

export const setupCommand: Command = async (ctx) => {
  ctx.print(bold('paper-sieve setup'));
  ctx.print();

  const pipeline = openPipeline(ctx);
  try {
    describeConfig(ctx, pipeline.config);

    let models: string[];
    try {
      models = await pipeline.client.listModels();
    } catch (error) {
      ctx.print(`${red('✗')} LLM backend not reachable: ${error instanceof Error ? error.message : String(error)}`);
      if (pipeline.config.provider === 'ollama') ctx.print('  Start it with: ollama serve');
      return 1;
    }
    ctx.print(`${green('✓')} LLM backend is reachable (${models.length} models)`);

    const model = pipeline.client.getModel();
    if (models.some((name) => name === model || name.includes(model))) {
      ctx.print(`${green('✓')} Model '${model}' is available`);
    } else {
      ctx.print(`${yellow('!')} Model '${model}' not found`);
      if (pipeline.config.provider === 'ollama') ctx.print(`  Install with: ollama pull ${model}`);
    }

    const outputDir = pipeline.config.outputDir;
    if (fs.existsSync(outputDir)) {
      ctx.print(`${green('✓')} Output directory: ${outputDir}`);
    } else {
      ctx.print(`${yellow('!')} Creating output directory: ${outputDir}`);
      fs.mkdirSync(outputDir, { recursive: true });
    }

    if (pipeline.store) {
      ctx.print(`${green('✓')} Database: ${pipeline.config.databasePath}`);
    } else {
      ctx.print(dim('  Database disabled (set DATABASE_PATH to enable search and stats)'));
    }

    ctx.print();
    ctx.print(bold(green('Setup complete!')));
    ctx.print();
    ctx.print('Example usage:');
    ctx.print('  paper-sieve process document.pdf');
    ctx.print('  paper-sieve batch ./papers --report');
    return 0;
  } finally {
    await pipeline.close();
  }
};

export const modelsCommand: Command = async (ctx) => {
  const pipeline = openPipeline(ctx);
  try {
    ctx.print(bold(`Available ${getProviderDisplayName(pipeline.config.provider)} models:`));
    const models = await pipeline.client.listModels();
    if (models.length === 0) {
      ctx.print(yellow('No models installed'));
      if (pipeline.config.provider === 'ollama') ctx.print('Install a model: ollama pull mistral');
      return 0;
    }
    for (const model of models.sort()) {
      ctx.print(`  ${model}`);
    }
    return 0;
  } catch (error) {
    ctx.print(`${red('Error listing models:')} ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  } finally {
    await pipeline.close();
  }
};

// ─── show-examples ───────────────────────────────────────────────────────────

export const showExamplesCommand: Command = async (ctx) => {
  const directory = requirePositional(ctx, 'examples_dir');
  if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
    throw new UsageError(`Not a directory: ${directory}`);
  }

  const files = await findDocuments(directory, ['json']);
  if (files.length === 0) {
    ctx.print(red(`No JSON files found in ${directory}`));
    return 1;
  }

  ctx.print(bold(`Found ${files.length} example files:`));
  for (const file of files.slice(0, EXAMPLE_PREVIEW_COUNT)) {
    ctx.print();
    ctx.print(cyan(`File: ${path.basename(file)}`));
    try {
      const data: unknown = JSON.parse(await fs.promises.readFile(file, 'utf8'));
      if (typeof data !== 'object' || data === null || Array.isArray(data)) {
        ctx.print(red(`${path.basename(file)} does not contain a JSON object`));
        continue;
      }
      printLines(ctx, formatExample({ ...data }));
    } catch (error) {
      ctx.print(red(`Error reading ${path.basename(file)}: ${error instanceof Error ? error.message : String(error)}`));
    }
  }
  return 0;
};

// ─── config ──────────────────────────────────────────────────────────────────

export const configCommand: Command = async (ctx) => {
  const key = stringFlag(ctx.args.flags, 'key');
  const value = ctx.args.flags.value;
  if (!key || typeof value !== 'string') {
    throw new UsageError('config requires --key <KEY> and --value <VALUE>');
  }
  const envKey = setEnvValue(ctx.envPath, key, value);
  ctx.print(green(`Set ${envKey}=${value}`));
  return 0;
};

// ─── search / stats ──────────────────────────────────────────────────────────

function openDatabase(ctx: CommandContext): DatabaseManager {
  const config = loadConfig(ctx.env);
  if (!config.databasePath) {
    throw new PipelineError('CONFIGURATION_ERROR', 'DATABASE_PATH is not set; search and stats need a database');
  }
  return new DatabaseManager(config.databasePath);
}

export const searchCommand: Command = async (ctx) => {
  const flags = ctx.args.flags;
  const db = openDatabase(ctx);
  try {
    const rows = await db.searchDocuments({
      query: stringFlag(flags, 'query'),
      category: stringFlag(flags, 'category'),
      author: stringFlag(flags, 'author'),
      journal: stringFlag(flags, 'journal'),
      yearFrom: intFlag(flags, 'year-from'),
      yearTo: intFlag(flags, 'year-to'),
      limit: intFlag(flags, 'limit'),
    });
    if (rows.length === 0) {
      ctx.print(yellow('No matching documents'));
      return 0;
    }
    printLines(ctx, formatSearchResults(rows));
    return 0;
  } finally {
    await db.close();
  }
};

export const statsCommand: Command = async (ctx) => {
  const db = openDatabase(ctx);
  try {
    printLines(ctx, formatStatistics(await db.getStatistics()));
    return 0;
  } finally {
    await db.close();
  }
};

// ─── help ────────────────────────────────────────────────────────────────────

export const HELP_TEXT = `Usage: paper-sieve <command> [options]

Commands:
  process <file>          Summarize, keyword and categorize one document
      -m, --model <name>      Model to use
      --no-llm-keywords       Skip LLM keywords and model category scores
  batch <directory>       Process every supported document in a directory
      -m, --model <name>      Model to use
      --no-llm-keywords       Skip LLM keywords and model category scores
      -r, --report            Write a markdown report grouped by category
  setup                   Check the LLM backend, model and output directory
  models                  List models offered by the LLM backend
  show-examples <dir>     Preview the JSON files in a directory
  config --key K --value V
                          Set a value in .env
  search                  Search stored documents
      --query, --category, --author, --journal, --year-from, --year-to, --limit
  stats                   Statistics over stored documents
  help                    Show this help`;

export const helpCommand: Command = async (ctx) => {
  ctx.print(HELP_TEXT);
  return 0;
};

export const COMMANDS: Readonly<Record<string, Command>> = {
  process: processCommand,
  batch: batchCommand,
  setup: setupCommand,
  models: modelsCommand,
  'show-examples': showExamplesCommand,
  config: configCommand,
  search: searchCommand,
  stats: statsCommand,
  help: helpCommand,
};
