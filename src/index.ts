#!/usr/bin/env node
import path from 'node:path';
import { env, loadConfig } from './config.js';
import { logFileName } from './lib/dates.js';
import { ConfigError } from './lib/errors.js';
import Logger from './lib/logger.js';
import { Scraper, type ScraperDeps } from './services/scraper.js';
import type { ScraperConfig } from './types/news.js';

const configSummary = (config: ScraperConfig) => ({
  baseUrl: config.baseUrl,
  outputDirectory: config.outputDirectory,
  outputFormat: config.outputFormat,
  limit: config.limit,
  maxArticles: config.maxArticles,
  onError: config.onError,
  dedupe: config.dedupe,
});

/** Resolves to the process exit code. */
export async function main(configPath: string = env.CONFIG_PATH, deps: ScraperDeps = {}): Promise<number> {
  let config: ScraperConfig;
  try {
    config = await loadConfig(configPath);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    Logger.error(error.message);
    return 1;
  }

  Logger.configure({
    level: config.logLevel,
    filePath: config.logDirectory ? path.join(config.logDirectory, logFileName(new Date())) : null,
  });
  Logger.info(`Scraping from ${config.baseUrl}`, configSummary(config));

  const summary = await new Scraper(config, deps).run();
  return summary.state === 'done' ? 0 : 1;
}

if (require.main === module) {
  main().then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      Logger.error('Unexpected failure', error);
      process.exitCode = 1;
    }
  );
}
