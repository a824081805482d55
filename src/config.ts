import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { parse } from 'yaml';
import { CouncilConfigSchema, type CouncilConfig } from './config-schema.js';
import type { DeliberationConfig } from './council.js';
import { ConfigError, errorMessage } from './errors.js';

export const CONFIG_DIR = join(homedir(), '.fact-council');
export const CONFIG_PATH = join(CONFIG_DIR, 'config.yaml');
export const LOCAL_CONFIG_FILE = 'council.yaml';

export const DEFAULT_CONFIG: CouncilConfig = CouncilConfigSchema.parse({});

/** Validate raw config data; every zod issue is listed on the ConfigError. */
export function parseConfig(data: unknown, source = 'config'): CouncilConfig {
  const result = CouncilConfigSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ConfigError(`Invalid ${source}`, issues);
  }
  return result.data;
}

/**
 * Explicit path, then ./council.yaml, then ~/.fact-council/config.yaml.
 * Built-in defaults when none exists.
 */
export function resolveConfigPath(explicit?: string, cwd = process.cwd()): string | null {
  if (explicit) return explicit;
  const local = join(cwd, LOCAL_CONFIG_FILE);
  if (existsSync(local)) return local;
  return existsSync(CONFIG_PATH) ? CONFIG_PATH : null;
}

export async function loadConfig(explicit?: string, cwd?: string): Promise<CouncilConfig> {
  const path = resolveConfigPath(explicit, cwd);
  if (!path) return parseConfig({}, 'defaults');

  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read ${path}: ${errorMessage(err)}`);
  }

  let data: unknown;
  try {
    data = parse(raw);
  } catch (err) {
    throw new ConfigError(`${path} is not valid YAML: ${errorMessage(err)}`);
  }
  return parseConfig(data, path);
}

export function toDeliberationConfig(config: CouncilConfig): DeliberationConfig {
  return {
    councilModels: config.councilModels,
    chairmanModel: config.chairmanModel,
    factCheck: config.factCheck,
    streaming: config.streaming,
    timeoutMs: config.timeoutSeconds * 1000,
    titleModel: config.titleModel,
    classifyErrors: config.classifyErrors,
  };
}
