import * as cheerio from 'cheerio';
import { isPresent, isRecord } from '../lib/guards.js';
import Logger from '../lib/logger.js';
import type { Article, RawStory } from '../types/news.js';

const BLOCK_TAGS = 'p, br, div, li, ul, ol, h1, h2, h3, h4, h5, h6, blockquote';

/**
 * Extracts the text of an HTML fragment, decoding entities and dropping
 * comments, and collapses whitespace.
 * Block-level tags become a space so paragraphs don't run together.
 */
export function cleanText(html: string): string {
  const $ = cheerio.load(html, null, false);
  $(BLOCK_TAGS).before(' ').after(' ');
  return (
    $.root()
      .text()
      // zero-width space and BOM; ZWJ/ZWNJ are meaningful in Bengali script
      .replace(/[\u200B\uFEFF]/g, '')
      .replace(/\s+/g, ' ')
      .trim()
  );
}

const asRecords = (value: unknown): Record<string, unknown>[] =>
  Array.isArray(value) ? value.filter(isRecord) : [];

const asText = (value: unknown): string | null => {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : null;
};

const asInt = (value: unknown): number => {
  const n = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(n) ? Math.trunc(n) : 0;
};

/** API timestamps are unix milliseconds. */
export const toUnixSeconds = (value: unknown): number => Math.trunc(asInt(value) / 1000);

const joinList = (values: (string | null)[]): string | null => {
  const present = values.filter(isPresent);
  return present.length ? present.join(',') : null;
};

const joinNames = (value: unknown): string | null =>
  joinList(asRecords(value).map(entry => asText(entry.name)));

const contentText = (story: RawStory): string =>
  asRecords(story.cards)
    .flatMap(card => asRecords(card['story-elements']))
    .filter(element => element.type === 'text' && typeof element.text === 'string')
    .map(element => cleanText(String(element.text)))
    .filter(text => text.length > 0)
    .join(' ');

const seoFields = (story: RawStory) => {
  const seo: Record<string, unknown> = isRecord(story.seo) ? story.seo : {};
  const keywords = seo['meta-keywords'];
  return {
    seoDescription: asText(seo['meta-description']),
    seoTags: Array.isArray(keywords) ? joinList(keywords.map(asText)) : asText(keywords),
  };
};

export function parseStory(story: RawStory): Article {
  return {
    id: asText(story.id) ?? '',
    headline: cleanText(asText(story.headline) ?? ''),
    subheadline: asText(story.subheadline),
    summary: asText(story.summary),
    content: contentText(story),
    mainAuthor: asText(story['author-name']),
    authors: joinNames(story.authors),
    url: asText(story.url),
    readTime: asInt(story['read-time']),
    ...seoFields(story),
    tags: joinNames(story.tags),
    sections: joinNames(story.sections),
    wordCount: asInt(story['word-count']),
    publishedAt: toUnixSeconds(story['published-at']),
    firstPublishedAt: toUnixSeconds(story['first-published-at']),
    lastPublishedAt: toUnixSeconds(story['last-published-at']),
    createdAt: toUnixSeconds(story['created-at']),
    updatedAt: toUnixSeconds(story['updated-at']),
    contentUpdatedAt: toUnixSeconds(story['content-updated-at']),
  };
}

/** An article is kept only with a non-empty id, headline and content. */
export const isAcceptable = (article: Article): boolean =>
  article.id.length > 0 && article.headline.length > 0 && article.content.length > 0;

export interface ProcessResult {
  articles: Article[];
  rejected: number;
}

export function processStories(items: RawStory[]): ProcessResult {
  Logger.debug(`Raw unprocessed items: ${items.length}`);
  const articles = items.map(parseStory).filter(isAcceptable);
  Logger.debug(`Filtered processed items: ${articles.length}`);
  return { articles, rejected: items.length - articles.length };
}
