import { eng } from 'stopword';
import type { Article, KeywordOptions } from './types';

// Feed filler words the stock English list keeps
const FEED_STOPWORDS = ['new', 'just', 'now', 'via', 'read', 'more', 'post', 'says', 'one', 'also', 'get', 'will', 'can', 'continue', 'reading'];

export const DEFAULT_KEYWORD_OPTIONS: KeywordOptions = { minLength: 3, extraStopwords: [] };

const BASE_STOPWORDS: ReadonlySet<string> = new Set([...eng, ...FEED_STOPWORDS]);

// One stopword set per options object, built on first use
const stopwordCache = new WeakMap<KeywordOptions, ReadonlySet<string>>();

function stopwordsFor(options: KeywordOptions): ReadonlySet<string> {
  if (options.extraStopwords.length === 0) return BASE_STOPWORDS;
  let stopwords = stopwordCache.get(options);
  if (!stopwords) {
    stopwords = new Set([...BASE_STOPWORDS, ...options.extraStopwords.map(w => w.toLowerCase())]);
    stopwordCache.set(options, stopwords);
  }
  return stopwords;
}

export function extractKeywords(text: string, options: KeywordOptions = DEFAULT_KEYWORD_OPTIONS): Set<string> {
  if (!text || !text.trim()) return new Set();

  const stopwords = stopwordsFor(options);
  return new Set(
    text
      .toLowerCase()
      .split(/[^a-z0-9]+/)
      .filter(t => t.length >= options.minLength && /[a-z]/.test(t) && !stopwords.has(t)),
  );
}

export function articleKeywords(article: Article, options: KeywordOptions = DEFAULT_KEYWORD_OPTIONS): Set<string> {
  return extractKeywords(`${article.title} ${article.summary}`, options);
}
