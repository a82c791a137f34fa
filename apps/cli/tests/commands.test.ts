import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { HELP_TEXT } from '../src/commands';
import { stripAnsi } from '../src/format';
import { run } from '../src/index';

describe('paper-sieve CLI', () => {
  let dir: string;
  let output: string[];

  const invoke = (argv: string[], env: NodeJS.ProcessEnv = {}): Promise<number> =>
    run(argv, { env, cwd: dir, print: (line = '') => output.push(stripAnsi(line)) });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'cli-'));
    output = [];
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prints help', async () => {
    expect(await invoke(['help'])).toBe(0);
    expect(output).toEqual([HELP_TEXT]);
    expect(await invoke(['process', '--help'])).toBe(0);
  });

  it('fails without a command', async () => {
    expect(await invoke([])).toBe(1);
  });

  it('rejects unknown commands', async () => {
    expect(await invoke(['summarise'])).toBe(1);
    expect(output[0]).toBe('Unknown command: summarise');
  });

  it('reports a missing input file as a usage error', async () => {
    expect(await invoke(['process', path.join(dir, 'missing.pdf')])).toBe(1);
    expect(output[0]).toBe(`Error: File not found: ${path.join(dir, 'missing.pdf')}`);
  });

  it('writes config values into .env in the working directory', async () => {
    expect(await invoke(['config', '--key', 'llm_model', '--value', 'phi3'])).toBe(0);
    expect(output).toEqual(['Set LLM_MODEL=phi3']);
    expect(fs.readFileSync(path.join(dir, '.env'), 'utf8')).toBe('LLM_MODEL=phi3\n');
  });

  it('requires both --key and --value for config', async () => {
    expect(await invoke(['config', '--key', 'LLM_MODEL'])).toBe(1);
    expect(output[0]).toBe('Error: config requires --key <KEY> and --value <VALUE>');
  });

  it('reports invalid configuration', async () => {
    expect(await invoke(['stats'], { CONCURRENCY: '0' })).toBe(1);
    expect(output[0]).toMatch(/^Configuration error: CONCURRENCY: /);
  });

  it('needs a database for stats', async () => {
    expect(await invoke(['stats'])).toBe(1);
    expect(output[0]).toBe(
      'Error [CONFIGURATION_ERROR]: DATABASE_PATH is not set; search and stats need a database'
    );
  });

  it('prints statistics of an empty database', async () => {
    const env = { DATABASE_PATH: path.join(dir, 'db', 'documents.db') };
    expect(await invoke(['stats'], env)).toBe(0);
    expect(output).toEqual(['Total documents: 0']);

    output = [];
    expect(await invoke(['search', '--query', 'tides'], env)).toBe(0);
    expect(output).toEqual(['No matching documents']);
  });

  it('validates integer search flags', async () => {
    const env = { DATABASE_PATH: path.join(dir, 'documents.db') };
    expect(await invoke(['search', '--year-from', 'soon'], env)).toBe(1);
    expect(output[0]).toBe('Error: --year-from expects an integer, got "soon"');
  });

  it('previews example JSON files', async () => {
    fs.writeFileSync(path.join(dir, 'a.json'), JSON.stringify({ Title: 'Tides', 'Key Findings': { Mixing: 'yes' } }));
    fs.writeFileSync(path.join(dir, 'b.json'), '[1, 2]');
    fs.writeFileSync(path.join(dir, 'notes.txt'), 'ignored');

    expect(await invoke(['show-examples', dir])).toBe(0);
    expect(output).toEqual([
      'Found 2 example files:',
      '',
      'File: a.json',
      'Title: Tides',
      'Key Findings:',
      '  • Mixing: yes',
      '',
      'File: b.json',
      'b.json does not contain a JSON object',
    ]);
  });

  it('fails when a directory has no example files', async () => {
    expect(await invoke(['show-examples', dir])).toBe(1);
    expect(output).toEqual([`No JSON files found in ${dir}`]);
  });
});
