import { createAmazonBedrock } from '@ai-sdk/amazon-bedrock';
import { generateText } from 'ai';
import { createLogger } from './log';
import type { SuggestedCluster } from './types';

const MODEL_ID = process.env.SCOUT_MODEL_ID ?? 'anthropic.claude-3-5-haiku-20241022-v1:0';
const SAMPLE_TITLES = 5;
const MAX_HEADLINE_CHARS = 120;

const log = createLogger('ai');

export type CompleteFn = (prompt: string) => Promise<string>;

interface HeadlineResult {
  results: Array<{
    index: number;
    headline: string;
  }>;
}

async function callLLM(prompt: string): Promise<string> {
  const bedrock = createAmazonBedrock({ region: process.env.AWS_REGION ?? 'us-east-1' });
  const { text } = await generateText({
    model: bedrock(MODEL_ID),
    prompt,
    maxOutputTokens: 2048,
    temperature: 0.3,
  });
  return text;
}

export function parseJsonResponse(text: string): unknown {
  let jsonText = text.trim();
  if (jsonText.startsWith('```')) {
    jsonText = jsonText.replace(/^```(?:json)?\n?/, '').replace(/\n?```$/, '');
  }
  return JSON.parse(jsonText);
}

function isHeadlineResult(value: unknown): value is HeadlineResult {
  if (typeof value !== 'object' || value === null || !('results' in value)) return false;
  return Array.isArray(value.results);
}

export function buildHeadlinePrompt(clusters: readonly SuggestedCluster[]): string {
  const list = clusters.map((c, i) => {
    const titles = c.articles.slice(0, SAMPLE_TITLES).map(a => `  - [${a.sourceName}] ${a.title}`).join('\n');
    return `Index ${i}: keywords: ${[...c.keywords].slice(0, 8).join(', ')}\n${titles}`;
  }).join('\n\n---\n\n');

  return `You are helping a technical blogger pick what to write about this week.

Each topic below is a group of related news articles. For every topic, write one
blog-post headline (max ${MAX_HEADLINE_CHARS} characters) that names the shared story, not a single article.
Be concrete: keep product names, numbers and versions. No clickbait, no trailing period.

## Topics

${list}

Respond with JSON only, no markdown fences:
{
  "results": [
    { "index": 0, "headline": "..." }
  ]
}`;
}

/**
 * Replace each cluster's headline with one written by the model. Any failure
 * leaves the original headlines in place.
 */
export async function writeHeadlines(clusters: SuggestedCluster[], complete: CompleteFn = callLLM): Promise<SuggestedCluster[]> {
  if (clusters.length === 0) return clusters;
  log.info(`Writing headlines for ${clusters.length} clusters`);

  try {
    const parsed = parseJsonResponse(await complete(buildHeadlinePrompt(clusters)));
    if (!isHeadlineResult(parsed)) throw new Error('response has no results array');

    const headlines = new Map<number, string>();
    for (const r of parsed.results) {
      if (typeof r.index !== 'number' || typeof r.headline !== 'string') continue;
      const headline = r.headline.trim().slice(0, MAX_HEADLINE_CHARS);
      if (headline) headlines.set(r.index, headline);
    }

    return clusters.map((c, i) => ({ ...c, headline: headlines.get(i) ?? c.headline }));
  } catch (error) {
    log.warn(`Headline generation failed: ${error instanceof Error ? error.message : error}`);
    return clusters;
  }
}
