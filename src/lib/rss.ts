import { createHash } from 'node:crypto';
import { XMLParser } from 'fast-xml-parser';
import { createLogger } from './log';
import type { Article, FeedResult, FeedSource, FetchSummary } from './types';

const FEED_FETCH_TIMEOUT_MS = 15_000;
const FEED_CONCURRENCY = 10;
const FEED_RETRIES = 1;
const RETRY_DELAY_MS = 1_000;
const SUMMARY_MAX_CHARS = 500;

const log = createLogger('rss');

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  textNodeName: '#text',
  isArray: (name) => ['item', 'entry'].includes(name),
  trimValues: true,
  parseTagValue: false,
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  return value === undefined || value === null ? [] : [value];
}

/** Text content of a parsed element, whether it came back as a scalar or as a node with attributes */
function textOf(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return textOf(value[0]);
  if (isNode(value)) return textOf(value['#text']);
  return '';
}

export function stripHtml(html: string): string {
  if (!html) return '';
  return html
    .replace(/<(script|style)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<[^>]*>/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&nbsp;/g, ' ')
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCharCode(parseInt(code, 10)))
    .replace(/\s+/g, ' ')
    .trim();
}

function parseDate(dateStr: string): Date | null {
  if (!dateStr) return null;
  const d = new Date(dateStr);
  return isNaN(d.getTime()) ? null : d;
}

export function articleId(url: string, fallback: string): string {
  return createHash('sha1').update(url || fallback).digest('hex').slice(0, 12);
}

interface RawEntry {
  title: string;
  link: string;
  summary: string;
  published: string;
}

function toArticle(entry: RawEntry, source: FeedSource): Article | null {
  const publishedAt = parseDate(entry.published);
  const title = stripHtml(entry.title);
  if (!publishedAt || (!title && !entry.link)) return null;

  return {
    id: articleId(entry.link, `${source.name}:${title}`),
    title,
    summary: stripHtml(entry.summary).slice(0, SUMMARY_MAX_CHARS),
    url: entry.link,
    sourceName: source.name,
    category: source.category,
    topics: source.topics,
    publishedAt,
  };
}

function atomLink(value: unknown): string {
  const links = asArray(value);
  const nodes = links.filter(isNode);
  if (nodes.length === 0) return textOf(links[0]);
  const alt = nodes.find(l => l['@_rel'] === 'alternate') ?? nodes[0];
  return textOf(alt['@_href']);
}

function parseAtomEntry(entry: XmlNode): RawEntry {
  return {
    title: textOf(entry.title),
    link: atomLink(entry.link),
    summary: textOf(entry.summary) || textOf(entry.content),
    published: textOf(entry.published) || textOf(entry.updated),
  };
}

function parseRssItem(item: XmlNode): RawEntry {
  return {
    title: textOf(item.title),
    link: textOf(item.link) || textOf(item.guid),
    summary: textOf(item.description) || textOf(item['content:encoded']),
    published: textOf(item.pubDate) || textOf(item['dc:date']) || textOf(item.date),
  };
}

/** Parse RSS 2.0, RDF or Atom into articles published at or after `cutoff`; throws on any other document */
export function parseFeedXml(xml: string, source: FeedSource, cutoff: Date = new Date(0)): Article[] {
  const parsed: unknown = parser.parse(xml);
  if (!isNode(parsed)) throw new Error('not an RSS/Atom/RDF document');

  let raw: RawEntry[] = [];
  const feed = parsed.feed;
  const channel = isNode(parsed.rss) ? parsed.rss.channel : undefined;
  const rdf = parsed['rdf:RDF'];

  if (isNode(feed)) {
    raw = asArray(feed.entry).filter(isNode).map(parseAtomEntry);
  } else if (isNode(channel)) {
    raw = asArray(channel.item).filter(isNode).map(parseRssItem);
  } else if (isNode(rdf)) {
    raw = asArray(rdf.item).filter(isNode).map(parseRssItem);
  } else {
    throw new Error('not an RSS/Atom/RDF document');
  }

  const articles: Article[] = [];
  for (const entry of raw) {
    const article = toArticle(entry, source);
    if (article && article.publishedAt.getTime() >= cutoff.getTime()) {
      articles.push(article);
    }
  }
  return articles;
}

async function fetchXml(url: string): Promise<string> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), FEED_FETCH_TIMEOUT_MS);
  try {
    const response = await fetch(url, {
      signal: controller.signal,
      headers: {
        'User-Agent': 'ContentScout/1.0 (RSS Reader)',
        'Accept': 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
      },
    });
    if (!response.ok) throw new Error(`HTTP ${response.status}`);
    return await response.text();
  } finally {
    clearTimeout(timeout);
  }
}

function describeError(error: unknown): string {
  const msg = error instanceof Error ? error.message : String(error);
  return msg.includes('abort') ? 'timeout' : msg;
}

export interface FetchOptions {
  retryDelayMs?: number;
}

export async function fetchFeed(source: FeedSource, cutoff: Date, options: FetchOptions = {}): Promise<{ articles: Article[]; result: FeedResult }> {
  const retryDelayMs = options.retryDelayMs ?? RETRY_DELAY_MS;
  let lastError = '';

  for (let attempt = 0; attempt <= FEED_RETRIES; attempt++) {
    if (attempt > 0) {
      await new Promise(resolve => setTimeout(resolve, retryDelayMs));
    }
    try {
      const xml = await fetchXml(source.feedUrl);
      const articles = parseFeedXml(xml, source, cutoff);
      return { articles, result: { name: source.name, ok: true, count: articles.length } };
    } catch (error) {
      lastError = describeError(error);
    }
  }

  log.warn(`x ${source.name}: ${lastError}`);
  return { articles: [], result: { name: source.name, ok: false, count: 0, error: lastError } };
}

/** Fetch every feed in batches; a failed feed is reported and skipped */
export async function fetchAllFeeds(sources: readonly FeedSource[], lookbackDays: number, options: FetchOptions & { now?: Date } = {}): Promise<FetchSummary> {
  const now = options.now ?? new Date();
  const cutoff = new Date(now.getTime() - lookbackDays * 24 * 60 * 60 * 1000);
  const articles: Article[] = [];
  const results: FeedResult[] = [];
  const seen = new Set<string>();

  for (let i = 0; i < sources.length; i += FEED_CONCURRENCY) {
    const batch = sources.slice(i, i + FEED_CONCURRENCY);
    const settled = await Promise.allSettled(batch.map(source => fetchFeed(source, cutoff, options)));

    settled.forEach((outcome, j) => {
      if (outcome.status === 'rejected') {
        results.push({ name: batch[j].name, ok: false, count: 0, error: describeError(outcome.reason) });
        return;
      }
      results.push(outcome.value.result);
      for (const article of outcome.value.articles) {
        if (seen.has(article.id)) continue;
        seen.add(article.id);
        articles.push(article);
      }
    });

    const progress = Math.min(i + FEED_CONCURRENCY, sources.length);
    const failed = results.filter(r => !r.ok).length;
    log.info(`Progress: ${progress}/${sources.length} feeds (${results.length - failed} ok, ${failed} failed)`);
  }

  const failCount = results.filter(r => !r.ok).length;
  const successCount = results.length - failCount;
  log.info(`Fetched ${articles.length} articles from ${successCount} feeds (${failCount} failed)`);
  return { articles, results, successCount, failCount };
}
