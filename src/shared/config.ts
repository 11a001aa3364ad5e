import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getSermonkeeperDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/119.0.0.0 Safari/537.36';

const PageSelectorsSchema = z
  .object({
    item: z.string().default('div.fusion-post-timeline'),
    title: z.string().default('h2.entry-title'),
    category: z.string().default('a[rel="category tag"]'),
    audio: z.string().default('audio.wp-audio-shortcode source'),
  })
  .default({});

export const ConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().positive().default(5060),
      host: z.string().default('0.0.0.0'),
      public_url: z.string().url().optional(),
    })
    .default({}),

  api: z
    .object({
      key: z.string().default(''),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.sermonkeeper/sermons.db'),
    })
    .default({}),

  audio_dir: z.string().default('~/.sermonkeeper/audiofiles'),

  source: z
    .object({
      kind: z.enum(['page', 'feed']).default('page'),
      page: z
        .object({
          base_url: z.string().url().default('https://tcfky.com/sermons/page/'),
          max_pages: z.number().int().positive().default(37),
          selectors: PageSelectorsSchema,
        })
        .default({}),
      feed: z
        .object({
          url: z.string().default(''),
        })
        .default({}),
    })
    .default({}),

  http: z
    .object({
      user_agent: z.string().default(BROWSER_USER_AGENT),
      fetch_timeout_ms: z.number().int().positive().default(30000),
      download_timeout_ms: z.number().int().positive().default(600000),
    })
    .default({}),

  schedule: z
    .object({
      ingest_cron: z.string().default('*/20 * * * *'),
      run_on_start: z.boolean().default(false),
      lock_ttl_ms: z.number().int().positive().default(1800000),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type PageSelectors = Config['source']['page']['selectors'];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = raw[key];
  const next = isRecord(existing) ? existing : {};
  raw[key] = next;
  return next;
}

/**
 * Apply environment overrides on top of the file config. Env wins.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const apiKey = env['SERMONKEEPER_API_KEY'] ?? env['API_KEY'];
  if (apiKey) section(rawConfig, 'api')['key'] = apiKey;

  const dbPath = env['DB_PATH'];
  if (dbPath) section(rawConfig, 'db')['path'] = dbPath;

  const audioDir = env['AUDIO_DIR'];
  if (audioDir) rawConfig['audio_dir'] = audioDir;

  const feedUrl = env['SERMONKEEPER_FEED_URL'];
  if (feedUrl) {
    const source = section(rawConfig, 'source');
    section(source, 'feed')['url'] = feedUrl;
  }

  return rawConfig;
}

export function parseConfig(rawConfig: Record<string, unknown>): Config {
  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }
  return parsed.data;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('sermonkeeper', {
    searchPlaces: [
      'sermonkeeper.config.yaml',
      'sermonkeeper.config.yml',
      '.sermonkeeperrc.yaml',
      '.sermonkeeperrc.yml',
    ],
  });

  const envConfigPath = process.env['SERMONKEEPER_CONFIG'];
  const defaultConfigPath = path.join(getSermonkeeperDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = isRecord(result?.config) ? result.config : {};
  } else {
    const searched = await explorer.search();
    if (searched && isRecord(searched.config)) {
      rawConfig = searched.config;
    } else if (fs.existsSync(defaultConfigPath)) {
      const result = await explorer.load(defaultConfigPath);
      rawConfig = isRecord(result?.config) ? result.config : {};
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  cachedConfig = parseConfig(applyEnvOverrides(rawConfig));
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
