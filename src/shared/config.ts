import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getFeedmarkDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const IDENTITY_SCHEME_VERSIONS = ['sha1-v1', 'sha256-v1'] as const;

export const ConfigSchema = z.object({
  db: z
    .object({
      path: z.string().default('~/.feedmark/feedmark.db'),
    })
    .default({}),

  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(15000),
      user_agent: z.string().default('feedmark/0.1'),
      concurrency: z.number().int().positive().default(8),
    })
    .default({}),

  identity: z
    .object({
      scheme: z.enum(IDENTITY_SCHEME_VERSIONS).default('sha1-v1'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

export function getDefaultConfigPath(): string {
  return path.join(getFeedmarkDir(), 'config.yaml');
}

/**
 * The config file in effect: `FEEDMARK_CONFIG` when set, else the default location.
 */
export function getConfigPath(): string {
  const envConfigPath = process.env['FEEDMARK_CONFIG'];
  return envConfigPath ? resolvePath(envConfigPath) : getDefaultConfigPath();
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('feedmark', {
    searchPlaces: ['feedmark.config.yaml', 'feedmark.config.yml', '.feedmarkrc.yaml', '.feedmarkrc.yml'],
  });

  const configPath = getConfigPath();

  let rawConfig: Record<string, unknown> = {};

  if (process.env['FEEDMARK_CONFIG'] && !fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }
  if (fs.existsSync(configPath)) {
    rawConfig = toRecord((await explorer.load(configPath))?.config);
  } else {
    logger.debug('No config file found, using defaults');
  }

  const envDbPath = process.env['FEEDMARK_DB'];
  if (envDbPath) {
    rawConfig['db'] = { ...toRecord(rawConfig['db']), path: envDbPath };
  }

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

function toRecord(value: unknown): Record<string, unknown> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
