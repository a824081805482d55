import chalk from 'chalk';
import { loadConfig } from '../config.js';
import type { CouncilConfig } from '../config-schema.js';
import { ConfigError } from '../errors.js';

export class CLIError extends Error {
  constructor(message: string, public exitCode: number = 1) {
    super(message);
    this.name = 'CLIError';
  }
}

export async function readStdin(timeoutMs = 5000): Promise<string> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    const timer = setTimeout(() => {
      process.stdin.destroy();
      resolve(Buffer.concat(chunks).toString('utf-8'));
    }, timeoutMs);
    process.stdin.on('data', (chunk: Buffer) => {
      chunks.push(chunk);
    });
    process.stdin.on('end', () => {
      clearTimeout(timer);
      resolve(Buffer.concat(chunks).toString('utf-8'));
    });
    process.stdin.on('error', () => {
      clearTimeout(timer);
      resolve('');
    });
  });
}

/** Comma-separated list → trimmed, non-empty entries. Order and duplicates kept. */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export function parseSeconds(value: string, flag: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new CLIError(chalk.red(`Invalid ${flag}: "${value}". Must be a positive number of seconds.`));
  }
  return seconds;
}

/** loadConfig with config problems turned into exit code 2. */
export async function loadCliConfig(path?: string): Promise<CouncilConfig> {
  try {
    return await loadConfig(path);
  } catch (err) {
    if (err instanceof ConfigError) throw new CLIError(chalk.red(err.message), 2);
    throw err;
  }
}
