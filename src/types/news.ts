import type { LogLevel } from '../lib/logger.js';

export type OutputFormat = 'csv' | 'jsonl';
export type ErrorPolicy = 'skip' | 'abort';

/** One story as returned by the search API. Fields are kebab-case. */
export type RawStory = Record<string, unknown>;

export interface SearchPage {
  total: number;
  items: RawStory[];
}

export interface Article {
  id: string;
  headline: string;
  subheadline: string | null;
  summary: string | null;
  content: string;
  mainAuthor: string | null;
  authors: string | null;
  url: string | null;
  readTime: number;
  seoDescription: string | null;
  seoTags: string | null;
  tags: string | null;
  sections: string | null;
  wordCount: number;
  // unix seconds
  publishedAt: number;
  firstPublishedAt: number;
  lastPublishedAt: number;
  createdAt: number;
  updatedAt: number;
  contentUpdatedAt: number;
}

export interface ScraperConfig {
  baseUrl: string;
  outputDirectory: string;
  outputFormat: OutputFormat;
  startDate: Date;
  endDate: Date | null;
  thresholdDays: number;
  limit: number;
  maxArticles: number | null;
  maxAttempts: number;
  backoffBaseMs: number;
  requestTimeoutMs: number;
  minSleepSeconds: number;
  maxSleepSeconds: number;
  onError: ErrorPolicy;
  maxErrors: number;
  dedupe: boolean;
  authToken: string | null;
  logLevel: LogLevel;
  logDirectory: string | null;
}
