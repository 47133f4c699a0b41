import { clusterTerms } from './score';
import type { AngleRule, ScoredCluster, SuggestedCluster } from './types';

const VOICE_TERMS = ['voip', 'telecom', 'vcon', 'voice', 'ucaas'];
const AI_TERMS = ['ai', 'llm', 'llms', 'ai-agents', 'agents', 'ml'];

export const DEFAULT_ANGLE_RULES: AngleRule[] = [
  { match: VOICE_TERMS, requires: ['ai'], angle: 'Connect {keyword} to AI-powered voice intelligence in telecom' },
  { match: VOICE_TERMS, angle: 'How {keyword} impacts the VoIP/UCaaS industry' },
  { match: AI_TERMS, requires: ['dev-tools'], angle: 'Developer perspective on {keyword}: practical applications and tooling' },
  { match: AI_TERMS, angle: 'Bridge the {keyword} news with voice and telecom applications' },
  { match: ['security', 'vulnerability', 'privacy', 'breach'], angle: 'What {keyword} means for security teams right now' },
  { match: ['open-source', 'release', 'dev-tools'], angle: 'Hands-on with {keyword}: what changed and whether to adopt it' },
];

export const FALLBACK_ANGLE = 'Industry implications of {keyword}: practical takeaways for technical leaders';

export interface AngleOptions {
  topN: number;
  maxAngles: number;
  rules: readonly AngleRule[];
}

/** Keyword shared by the most members; alphabetical on ties */
export function dominantKeyword(cluster: Pick<ScoredCluster, 'keywordCounts'>): string {
  let best = '';
  let bestCount = 0;
  for (const [keyword, count] of cluster.keywordCounts) {
    if (count > bestCount || (count === bestCount && keyword < best)) {
      best = keyword;
      bestCount = count;
    }
  }
  return best;
}

function fillTemplate(template: string, keyword: string, topic: string): string {
  return template.replaceAll('{keyword}', keyword).replaceAll('{topic}', topic);
}

export function anglesFor(cluster: ScoredCluster, rules: readonly AngleRule[], maxAngles: number): string[] {
  const terms = clusterTerms(cluster);
  const keyword = dominantKeyword(cluster);
  const angles: string[] = [];

  for (const rule of rules) {
    if (angles.length >= maxAngles) break;
    const topic = rule.match.map(t => t.toLowerCase()).find(t => terms.has(t));
    if (!topic) continue;
    if (rule.requires && !rule.requires.every(t => terms.has(t.toLowerCase()))) continue;

    const angle = fillTemplate(rule.angle, keyword, topic);
    if (!angles.includes(angle)) angles.push(angle);
  }

  if (angles.length === 0) {
    angles.push(fillTemplate(FALLBACK_ANGLE, keyword, keyword));
  }
  return angles;
}

function headlineFor(cluster: ScoredCluster, keyword: string): string {
  const seed = cluster.articles[0];
  if (seed && seed.title) return seed.title;
  return keyword.charAt(0).toUpperCase() + keyword.slice(1);
}

/** Attach rank, headline and angles to the top clusters of a ranked list */
export function suggestAngles(ranked: readonly ScoredCluster[], options: AngleOptions): SuggestedCluster[] {
  return ranked.slice(0, options.topN).map((cluster, i) => {
    const keyword = dominantKeyword(cluster);
    return {
      ...cluster,
      rank: i + 1,
      dominantKeyword: keyword,
      headline: headlineFor(cluster, keyword),
      angles: anglesFor(cluster, options.rules, options.maxAngles),
    };
  });
}
