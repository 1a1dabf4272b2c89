import { parse } from 'csv-parse/sync';
import { stringify } from 'csv-stringify/sync';
import { appendFile, readdir, readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { PersistenceError, errorMessage } from '../lib/errors.js';
import { isRecord } from '../lib/guards.js';
import Logger from '../lib/logger.js';
import type { Article, OutputFormat } from '../types/news.js';

/** Output columns, in order, and the article field each one holds. */
export const COLUMNS = [
  ['text_id', 'id'],
  ['text_headline', 'headline'],
  ['text_subheadline', 'subheadline'],
  ['text_summary', 'summary'],
  ['text_content', 'content'],
  ['text_main_author', 'mainAuthor'],
  ['text_authors', 'authors'],
  ['text_url', 'url'],
  ['int_read_time', 'readTime'],
  ['text_seo_description', 'seoDescription'],
  ['text_seo_tags', 'seoTags'],
  ['text_tags', 'tags'],
  ['text_sections', 'sections'],
  ['int_word_count', 'wordCount'],
  ['date_published', 'publishedAt'],
  ['date_first_published_at', 'firstPublishedAt'],
  ['date_last_published_at', 'lastPublishedAt'],
  ['date_created_at', 'createdAt'],
  ['date_updated_at', 'updatedAt'],
  ['date_content_updated_at', 'contentUpdatedAt'],
] as const satisfies readonly (readonly [string, keyof Article])[];

export type ArticleRow = Record<string, string | number | null>;

export const COLUMN_NAMES: string[] = COLUMNS.map(([column]) => column);

export const toRow = (article: Article): ArticleRow =>
  Object.fromEntries(COLUMNS.map(([column, field]) => [column, article[field]] as const));

/** Where fetched articles are persisted. */
export interface Sink {
  readonly format: OutputFormat;
  filePathFor(windowStart: Date): string;
  /** Appends the articles and returns the file written to. */
  write(articles: Article[], windowStart: Date): Promise<string>;
  /** Ids already present in the output directory. */
  existingIds(): Promise<Set<string>>;
}

/** A file that is missing or has zero bytes still needs a CSV header. */
const isMissingOrEmpty = async (filePath: string): Promise<boolean> => {
  try {
    return (await stat(filePath)).size === 0;
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') return true;
    throw error;
  }
};

abstract class FileSink implements Sink {
  abstract readonly format: OutputFormat;

  constructor(protected readonly directory: string) {}

  /** One file per year of publication window, e.g. 2021.csv */
  filePathFor(windowStart: Date): string {
    return path.join(this.directory, `${windowStart.getUTCFullYear()}.${this.format}`);
  }

  async write(articles: Article[], windowStart: Date): Promise<string> {
    const filePath = this.filePathFor(windowStart);
    if (articles.length === 0) return filePath;
    try {
      const withHeader = await isMissingOrEmpty(filePath);
      await appendFile(filePath, this.serialize(articles, withHeader), 'utf8');
    } catch (error) {
      throw new PersistenceError(`Failed to write ${filePath}: ${errorMessage(error)}`, { cause: error });
    }
    Logger.info(`Saved to file: ${filePath}`, { count: articles.length });
    return filePath;
  }

  async existingIds(): Promise<Set<string>> {
    const ids = new Set<string>();
    try {
      const entries = await readdir(this.directory);
      for (const entry of entries.filter(name => name.endsWith(`.${this.format}`)).sort()) {
        const content = await readFile(path.join(this.directory, entry), 'utf8');
        for (const id of this.readIds(content, entry)) ids.add(id);
      }
    } catch (error) {
      throw new PersistenceError(`Failed to read existing output in ${this.directory}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    Logger.debug(`Found ${ids.size} existing article ids`);
    return ids;
  }

  protected abstract serialize(articles: Article[], withHeader: boolean): string;

  protected abstract readIds(content: string, fileName: string): string[];
}

export class CsvSink extends FileSink {
  readonly format = 'csv';

  protected serialize(articles: Article[], withHeader: boolean): string {
    return stringify(articles.map(toRow), { header: withHeader, columns: COLUMN_NAMES });
  }

  protected readIds(content: string): string[] {
    const rows: unknown = parse(content, { columns: true, skip_empty_lines: true });
    if (!Array.isArray(rows)) return [];
    return rows
      .filter(isRecord)
      .map(row => row.text_id)
      .filter((id): id is string => typeof id === 'string' && id.length > 0);
  }
}

export class JsonlSink extends FileSink {
  readonly format = 'jsonl';

  protected serialize(articles: Article[]): string {
    return articles.map(article => `${JSON.stringify(article)}\n`).join('');
  }

  protected readIds(content: string, fileName: string): string[] {
    const ids: string[] = [];
    content.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch (error) {
        Logger.warn(`Skipping unreadable line ${index + 1} of ${fileName}`, { error: errorMessage(error) });
        return;
      }
      if (isRecord(record) && typeof record.id === 'string') ids.push(record.id);
    });
    return ids;
  }
}

export function createSink(format: OutputFormat, directory: string): Sink {
  switch (format) {
    case 'csv':
      return new CsvSink(directory);
    case 'jsonl':
      return new JsonlSink(directory);
  }
}
