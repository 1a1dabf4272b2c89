import * as dotenv from 'dotenv';
import { cleanEnv, str } from 'envalid';
import type { Stats } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { parseDate } from './lib/dates.js';
import { ConfigError } from './lib/errors.js';
import { isRecord } from './lib/guards.js';
import { LOG_LEVELS, type LogLevel } from './lib/logger.js';
import type { ScraperConfig } from './types/news.js';

dotenv.config();

export const env = cleanEnv(process.env, {
  NODE_ENV: str({ choices: ['development', 'production', 'test'], default: 'production' }),
  CONFIG_PATH: str({ default: 'config.json' }),
  API_TOKEN: str({ default: '' }),
  LOG_LEVEL: str({ choices: ['', 'debug', 'info', 'warn', 'error'], default: '' }),
});

export interface ConfigEnvironment {
  API_TOKEN?: string;
  LOG_LEVEL?: string;
}

export const DEFAULT_BASE_URL = 'https://www.prothomalo.com/api/v1/advanced-search';

// Keys may be written as { "description": "...", "value": ... }; null means unset.
const unwrapEntries = (input: unknown): unknown => {
  if (!isRecord(input)) return input;
  return Object.fromEntries(
    Object.entries(input).map(([key, entry]) => {
      const value = isRecord(entry) && 'value' in entry ? entry.value : entry;
      return [key, value ?? undefined];
    })
  );
};

const dateString = z.string().transform((value, ctx) => {
  const date = parseDate(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected DD-MM-YYYY, got "${value}"` });
    return z.NEVER;
  }
  return date;
});

/** Numeric levels follow the 10/20/30/40/50 scale. */
export const toLogLevel = (value: LogLevel | number): LogLevel => {
  if (typeof value === 'string') return value;
  if (value <= 10) return 'debug';
  if (value <= 20) return 'info';
  if (value <= 30) return 'warn';
  return 'error';
};

const logLevelSchema = z
  .union([z.enum(['debug', 'info', 'warn', 'error']), z.number().int().nonnegative()])
  .transform(toLogLevel);

const configFileSchema = z
  .object({
    base_url: z.string().url().default(DEFAULT_BASE_URL),
    output_directory: z.string().min(1),
    output_format: z.enum(['csv', 'jsonl']).default('csv'),
    start_date: dateString,
    end_date: dateString.optional(),
    threshold: z.coerce.number().int().positive().default(1),
    limit: z.number().int().min(1).max(100).default(50),
    max_articles: z.number().int().positive().optional(),
    max_attempts: z.number().int().positive().default(3),
    backoff_base_ms: z.number().int().nonnegative().default(1000),
    request_timeout_ms: z.number().int().positive().default(10000),
    min_sleep_time: z.number().nonnegative().default(0),
    max_sleep_time: z.number().nonnegative().default(0),
    on_error: z.enum(['skip', 'abort']).default('skip'),
    max_errors: z.number().int().nonnegative().default(10),
    dedupe: z.boolean().default(true),
    auth_token: z.string().min(1).optional(),
    log_level: logLevelSchema.default('info'),
    log_directory: z.string().min(1).optional(),
  })
  .superRefine((config, ctx) => {
    if (config.min_sleep_time > config.max_sleep_time) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['max_sleep_time'],
        message: 'must not be less than min_sleep_time',
      });
    }
    if (config.end_date && config.start_date >= config.end_date) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_date'],
        message: 'must be after start_date',
      });
    }
  });

export const configSchema = z.preprocess(unwrapEntries, configFileSchema);

const formatIssues = (error: z.ZodError): string =>
  error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');

async function assertDirectory(dir: string, key: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await stat(dir);
  } catch (error) {
    throw new ConfigError(`${key} ${dir} doesn't exist!`, { cause: error });
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(`${key} ${dir} is not a directory`);
  }
}

/**
 * Reads and validates the JSON configuration file.
 * Relative directories are resolved against the file's own directory.
 * Throws ConfigError; nothing here touches the network.
 */
export async function loadConfig(
  configPath: string,
  environment: ConfigEnvironment = env
): Promise<ScraperConfig> {
  if (path.extname(configPath).toLowerCase() !== '.json') {
    throw new ConfigError(`Config file at ${configPath} is not a json file`);
  }

  let text: string;
  try {
    text = await readFile(configPath, 'utf8');
  } catch (error) {
    throw new ConfigError(`Config file not found at ${configPath}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file at ${configPath} is not valid JSON`, { cause: error });
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configPath}: ${formatIssues(parsed.error)}`);
  }
  const data = parsed.data;

  const baseDir = path.dirname(path.resolve(configPath));
  const outputDirectory = path.resolve(baseDir, data.output_directory);
  await assertDirectory(outputDirectory, 'Output path');

  const logDirectory = data.log_directory ? path.resolve(baseDir, data.log_directory) : null;
  if (logDirectory) await assertDirectory(logDirectory, 'Log directory');

  return Object.freeze({
    baseUrl: data.base_url,
    outputDirectory,
    outputFormat: data.output_format,
    startDate: data.start_date,
    endDate: data.end_date ?? null,
    thresholdDays: data.threshold,
    limit: data.limit,
    maxArticles: data.max_articles ?? null,
    maxAttempts: data.max_attempts,
    backoffBaseMs: data.backoff_base_ms,
    requestTimeoutMs: data.request_timeout_ms,
    minSleepSeconds: data.min_sleep_time,
    maxSleepSeconds: data.max_sleep_time,
    onError: data.on_error,
    maxErrors: data.max_errors,
    dedupe: data.dedupe,
    authToken: environment.API_TOKEN || data.auth_token || null,
    logLevel: LOG_LEVELS.find(level => level === environment.LOG_LEVEL) ?? data.log_level,
    logDirectory,
  });
}
