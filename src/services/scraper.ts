import { type DateWindow, dateWindows, formatWindow } from '../lib/dates.js';
import { RequestError, ScrapeAbortedError, errorMessage } from '../lib/errors.js';
import { delay } from '../lib/fetcher.js';
import Logger from '../lib/logger.js';
import type { Article, ScraperConfig, SearchPage } from '../types/news.js';
import { processStories } from './processor.js';
import { type PageSource, Requester } from './requester.js';
import { type Sink, createSink } from './saver.js';

export type ScraperState = 'idle' | 'fetching' | 'parsing' | 'persisting' | 'done' | 'failed';

export interface RunSummary {
  state: ScraperState;
  windows: number;
  requests: number;
  failedPages: number;
  /** Raw stories returned by the API. */
  fetched: number;
  rejected: number;
  duplicates: number;
  saved: number;
  startedAt: Date;
  finishedAt: Date | null;
  error?: { name: string; message: string };
}

export interface ScraperDeps {
  source?: PageSource;
  sink?: Sink;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  random?: () => number;
}

export class Scraper {
  private state: ScraperState = 'idle';
  private readonly seen = new Set<string>();
  private readonly source: PageSource;
  private readonly sink: Sink;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;
  private readonly random: () => number;

  constructor(private readonly config: ScraperConfig, deps: ScraperDeps = {}) {
    this.source = deps.source ?? new Requester(config);
    this.sink = deps.sink ?? createSink(config.outputFormat, config.outputDirectory);
    this.sleep = deps.sleep ?? delay;
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
  }

  get currentState(): ScraperState {
    return this.state;
  }

  private transition(next: ScraperState) {
    if (next === this.state) return;
    Logger.debug(`State ${this.state} -> ${next}`);
    this.state = next;
  }

  /** Runs to completion; failures are reported in the summary rather than thrown. */
  async run(): Promise<RunSummary> {
    const summary: RunSummary = {
      state: this.state,
      windows: 0,
      requests: 0,
      failedPages: 0,
      fetched: 0,
      rejected: 0,
      duplicates: 0,
      saved: 0,
      startedAt: this.now(),
      finishedAt: null,
    };

    try {
      if (this.config.dedupe) {
        for (const id of await this.sink.existingIds()) this.seen.add(id);
      }

      const end = this.config.endDate ?? this.now();
      for (const window of dateWindows(this.config.startDate, end, this.config.thresholdDays)) {
        summary.windows++;
        Logger.info(`Working date range: ${formatWindow(window)}`);
        await this.scrapeWindow(window, summary);
        if (this.reachedMax(summary)) {
          Logger.info(`Reached max_articles (${this.config.maxArticles}). Stopping.`);
          break;
        }
      }
      this.transition('done');
    } catch (error) {
      this.transition('failed');
      summary.error = {
        name: error instanceof Error ? error.name : 'Error',
        message: errorMessage(error),
      };
      Logger.error('Scrape failed', error);
    }

    summary.state = this.state;
    summary.finishedAt = this.now();
    Logger.info(`Total scraped: ${summary.saved}`, {
      state: summary.state,
      windows: summary.windows,
      requests: summary.requests,
      failedPages: summary.failedPages,
      fetched: summary.fetched,
      rejected: summary.rejected,
      duplicates: summary.duplicates,
    });
    return summary;
  }

  private async scrapeWindow(window: DateWindow, summary: RunSummary): Promise<void> {
    const { limit } = this.config;
    for (let offset = 0; !this.reachedMax(summary); offset += limit) {
      if (summary.requests > 0) await this.politePause();

      const page = await this.fetchPage(window, offset, summary);
      if (!page) continue;

      if (page.total === 0 || page.items.length === 0) {
        Logger.info('response total is 0. Moving to next date range.', { offset });
        return;
      }

      await this.handlePage(page, window, summary);

      if (offset + limit >= page.total) return;
    }
  }

  /** Returns null when the page failed and the error policy allows skipping it. */
  private async fetchPage(
    window: DateWindow,
    offset: number,
    summary: RunSummary
  ): Promise<SearchPage | null> {
    this.transition('fetching');
    summary.requests++;
    try {
      return await this.source.fetchPage(window, offset);
    } catch (error) {
      if (!(error instanceof RequestError)) throw error;

      summary.failedPages++;
      Logger.warn(`Page failed in ${formatWindow(window)}`, { offset, error: error.message });

      if (this.config.onError === 'abort') {
        throw new ScrapeAbortedError(`Request at offset ${offset} failed: ${error.message}`, { cause: error });
      }
      if (summary.failedPages > this.config.maxErrors) {
        throw new ScrapeAbortedError(
          `${summary.failedPages} failed pages exceed max_errors (${this.config.maxErrors})`,
          { cause: error }
        );
      }
      return null;
    }
  }

  private async handlePage(page: SearchPage, window: DateWindow, summary: RunSummary) {
    summary.fetched += page.items.length;

    this.transition('parsing');
    const { articles, rejected } = processStories(page.items);
    summary.rejected += rejected;
    if (rejected > 0) Logger.debug(`Rejected ${rejected} incomplete articles`);

    const batch = this.takeRemaining(this.dropDuplicates(articles, summary), summary);

    this.transition('persisting');
    await this.sink.write(batch, window.start);
    summary.saved += batch.length;
  }

  private dropDuplicates(articles: Article[], summary: RunSummary): Article[] {
    if (!this.config.dedupe) return articles;
    return articles.filter(article => {
      if (this.seen.has(article.id)) {
        summary.duplicates++;
        return false;
      }
      this.seen.add(article.id);
      return true;
    });
  }

  private takeRemaining(articles: Article[], summary: RunSummary): Article[] {
    if (this.config.maxArticles === null) return articles;
    return articles.slice(0, Math.max(0, this.config.maxArticles - summary.saved));
  }

  private reachedMax(summary: RunSummary): boolean {
    return this.config.maxArticles !== null && summary.saved >= this.config.maxArticles;
  }

  /** Random pause in [min_sleep_time, max_sleep_time] seconds. */
  private async politePause() {
    const { minSleepSeconds: min, maxSleepSeconds: max } = this.config;
    if (max <= 0) return;
    const seconds = min + this.random() * (max - min);
    Logger.debug(`Sleeping for ${seconds.toFixed(1)} seconds`);
    await this.sleep(Math.round(seconds * 1000));
  }
}
