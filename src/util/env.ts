import dotenv from 'dotenv';
import path from 'node:path';
import { LogLevel, parseLogLevel } from './logger.js';

const OUTPUT_FORMATS = ['text', 'json'] as const;

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export type CliConfig = {
  logLevel: LogLevel;
  format: OutputFormat;
};

type Env = Record<string, string | undefined>;

let envLoaded = false;

function loadEnv(): void {
  if (envLoaded) {
    return;
  }

  const envPath = path.resolve(process.cwd(), '.env');
  dotenv.config({ path: envPath });
  envLoaded = true;
}

export function ensureEnvLoaded(): void {
  loadEnv();
}

export function parseOutputFormat(value?: string): OutputFormat {
  const normalized = value?.trim().toLowerCase();
  return OUTPUT_FORMATS.find((format) => format === normalized) ?? 'text';
}

/**
 * Reads the CLI settings. `LOG_LEVEL` picks the logger level and
 * `ADDRSPEC_FORMAT` the default output format (`text` or `json`).
 */
export function loadConfig(env: Env = process.env): CliConfig {
  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    format: parseOutputFormat(env.ADDRSPEC_FORMAT),
  };
}
