import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';
import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError, errorMessage } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './logger.js';
import { REVIEW_DIMENSIONS, type ReviewConfig } from './types.js';

export const CONFIG_MODULE_NAME = 'codereview';
export const INIT_CONFIG_FILE = '.codereviewrc.json';

export const DEFAULT_CONFIG: ReviewConfig = {
  apiBaseUrl: 'https://generativelanguage.googleapis.com',
  model: 'gemini-2.5-flash',
  temperature: 0.2,
  maxOutputTokens: 8192,
  timeout: 120000, // 2 minutes
  maxChars: 12000,
  chunkSize: 4000,
  maxFiles: 10,
  maxFileSize: 500000, // 500KB
  includePatterns: ['\\.(py|js|jsx|ts|tsx|java|c|cc|cpp|h|hpp|cs|go|rs|rb|php|kt|swift|scala)$'],
  excludePatterns: [
    'node_modules/',
    '(^|/)dist/',
    '(^|/)build/',
    '(^|/)coverage/',
    '(^|/)tests?/',
    '\\.min\\.(js|css)$',
    'package-lock\\.json$',
    'yarn\\.lock$',
    'pnpm-lock\\.yaml$',
  ],
  dimensions: [...REVIEW_DIMENSIONS],
};

const fileConfigSchema = z
  .object({
    apiBaseUrl: z.string().url(),
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
    maxOutputTokens: z.number().int().positive(),
    timeout: z.number().int().positive(),
    maxChars: z.number().int().positive(),
    chunkSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
    maxFileSize: z.number().int().positive(),
    includePatterns: z.array(z.string()),
    excludePatterns: z.array(z.string()),
    dimensions: z.array(z.enum(REVIEW_DIMENSIONS)).min(1),
  })
  .partial();

const blankToUndefined = (value: unknown) => (value === '' ? undefined : value);

const envSchema = z.object({
  GEMINI_API_KEY: z.preprocess(blankToUndefined, z.string().min(1).optional()),
  GEMINI_MODEL: z.preprocess(blankToUndefined, z.string().min(1).optional()),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('info')),
});

export interface AppConfig extends ReviewConfig {
  apiKey?: string;
  logLevel: LogLevel;
  source?: string; // path of the rc file, when one was found
}

export interface LoadConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  model?: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function assertPatterns(patterns: string[], key: string): void {
  for (const pattern of patterns) {
    try {
      new RegExp(pattern);
    } catch (error) {
      throw new ConfigError(`Invalid pattern in ${key}: ${pattern} (${errorMessage(error)})`);
    }
  }
}

export async function loadConfig(options: LoadConfigOptions = {}): Promise<AppConfig> {
  const cwd = options.cwd ?? process.cwd();
  const explorer = cosmiconfig(CONFIG_MODULE_NAME);

  let result: CosmiconfigResult;
  try {
    result = options.configPath
      ? await explorer.load(path.resolve(cwd, options.configPath))
      : await explorer.search(cwd);
  } catch (error) {
    throw new ConfigError(`Configuration loading error: ${errorMessage(error)}`, { cause: error });
  }

  const parsedFile = fileConfigSchema.safeParse(result?.config ?? {});
  if (!parsedFile.success) {
    throw new ConfigError(
      `Invalid configuration${result ? ` in ${result.filepath}` : ''}: ${formatIssues(parsedFile.error)}`
    );
  }

  const parsedEnv = envSchema.safeParse(options.env ?? process.env);
  if (!parsedEnv.success) {
    throw new ConfigError(`Invalid environment variables: ${formatIssues(parsedEnv.error)}`);
  }

  const config: AppConfig = {
    ...DEFAULT_CONFIG,
    ...parsedFile.data,
    apiKey: parsedEnv.data.GEMINI_API_KEY,
    logLevel: parsedEnv.data.LOG_LEVEL,
    source: result?.filepath,
  };

  if (parsedEnv.data.GEMINI_MODEL) config.model = parsedEnv.data.GEMINI_MODEL;
  if (options.model) config.model = options.model;

  assertPatterns(config.includePatterns, 'includePatterns');
  assertPatterns(config.excludePatterns, 'excludePatterns');

  return config;
}

export function requireApiKey(config: AppConfig): string {
  if (!config.apiKey) {
    throw new ConfigError('GEMINI_API_KEY is not set. Export it or put it in a .env file.');
  }
  return config.apiKey;
}

/** The resolved configuration, safe to print. */
export function describeConfig(config: AppConfig): Record<string, unknown> {
  const { apiKey, ...rest } = config;
  return {
    ...rest,
    apiKey: apiKey ? `${apiKey.slice(0, 4)}…` : '(not set)',
  };
}

/** Writes the defaults to `.codereviewrc.json`; returns false if the file already exists. */
export async function initConfig(cwd: string): Promise<{ created: boolean; path: string }> {
  const configPath = path.join(cwd, INIT_CONFIG_FILE);
  try {
    await fs.writeFile(configPath, JSON.stringify(DEFAULT_CONFIG, null, 2) + '\n', { flag: 'wx' });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      return { created: false, path: configPath };
    }
    throw new ConfigError(`Cannot write ${configPath}: ${errorMessage(error)}`, { cause: error });
  }
  return { created: true, path: configPath };
}
