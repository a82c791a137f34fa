import * as fs from 'fs';
import * as dotenv from 'dotenv';
import { ConfigError } from '../errors';

/**
 * Load a `.env` file into process.env when it exists. Existing variables win.
 * Returns whether a file was loaded.
 */
export function loadEnvFile(envPath: string): boolean {
  if (!fs.existsSync(envPath)) {
    return false;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    console.warn(`[Config] Could not load ${envPath}: ${result.error.message}`);
    return false;
  }
  console.log(`[Config] Loaded .env from: ${envPath}`);
  return true;
}

/**
 * Set one key in a `.env` file, keeping every other entry. The key is upper-cased.
 */
export function setEnvValue(envPath: string, key: string, value: string): string {
  const envKey = key.trim().toUpperCase();
  if (!/^[A-Z_][A-Z0-9_]*$/.test(envKey)) {
    throw new ConfigError(key, 'not a valid environment variable name');
  }

  const config = fs.existsSync(envPath) ? dotenv.parse(fs.readFileSync(envPath, 'utf8')) : {};
  config[envKey] = value;

  const content = Object.entries(config)
    .map(([entryKey, entryValue]) => `${entryKey}=${entryValue}`)
    .join('\n');

  fs.writeFileSync(envPath, `${content}\n`, { encoding: 'utf8', mode: 0o600 });
  return envKey;
}

export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '*'.repeat(secret.length);
  }
  return `${secret.slice(0, 4)}…${secret.slice(-4)}`;
}
