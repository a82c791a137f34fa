#!/usr/bin/env tsx
import * as path from 'path';
import { ConfigError, PipelineError, errorMessage, loadEnvFile } from '@paper-sieve/core';
import { UsageError, parseArgs } from './args';
import { COMMANDS, type CommandContext, HELP_TEXT } from './commands';
import { red } from './format';

export interface RunOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  print?: (line?: string) => void;
}

/**
 * Run one CLI invocation and return its exit code.
 */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<number> {
  const print = options.print ?? ((line = '') => console.log(line));
  const args = parseArgs(argv);

  if (args.command === undefined || args.flags.help === true) {
    print(HELP_TEXT);
    return args.command === undefined && args.flags.help !== true ? 1 : 0;
  }

  const command = COMMANDS[args.command];
  if (!command) {
    print(red(`Unknown command: ${args.command}`));
    print(HELP_TEXT);
    return 1;
  }

  const ctx: CommandContext = {
    args,
    env: options.env ?? process.env,
    envPath: path.join(options.cwd ?? process.cwd(), '.env'),
    print,
  };

  try {
    return await command(ctx);
  } catch (error) {
    if (error instanceof UsageError) {
      print(red(`Error: ${error.message}`));
      print(`Run 'paper-sieve help' for usage.`);
    } else if (error instanceof ConfigError) {
      print(red(`Configuration error: ${error.message}`));
    } else if (error instanceof PipelineError) {
      print(red(`Error [${error.category}]: ${error.message}`));
    } else {
      print(red(`Unexpected error: ${errorMessage(error)}`));
    }
    return 1;
  }
}

async function main(): Promise<void> {
  loadEnvFile(path.join(process.cwd(), '.env'));
  process.exitCode = await run(process.argv.slice(2));
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(errorMessage(error));
    process.exitCode = 1;
  });
}
