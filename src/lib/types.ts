export type SimilarityMeasure = 'jaccard' | 'overlap';
export type DiversityMode = 'count' | 'ratio';
export type VolumeMode = 'linear' | 'log';

export interface FeedSource {
  name: string;
  feedUrl: string;
  category: string;
  topics: string[];
}

export interface Article {
  id: string;
  title: string;
  summary: string;
  url: string;
  sourceName: string;
  category: string;
  topics: string[];
  publishedAt: Date;
}

export interface ScoringConfig {
  topicWeights: Record<string, number>;
  diversityBonusFactor: number;
  volumeFactor: number;
  diversityMode: DiversityMode;
  volumeMode: VolumeMode;
  similarity: SimilarityMeasure;
  threshold: number;
  lookbackDays: number;
}

export interface AngleRule {
  match: string[];
  requires?: string[];
  angle: string;
}

export interface KeywordOptions {
  minLength: number;
  extraStopwords: string[];
}

export interface ScoutConfig {
  sources: FeedSource[];
  scoring: ScoringConfig;
  keywords: KeywordOptions;
  topN: number;
  maxAngles: number;
  angles: AngleRule[];
}

export interface Cluster {
  keywords: Set<string>;
  articles: Article[];
  /** Number of member keyword sets each keyword appears in */
  keywordCounts: Map<string, number>;
}

export interface ScoreBreakdown {
  topicWeight: number;
  diversity: number;
  volume: number;
  matchedTerms: string[];
}

export interface ScoredCluster {
  keywords: ReadonlySet<string>;
  articles: readonly Article[];
  keywordCounts: ReadonlyMap<string, number>;
  score: number;
  breakdown: ScoreBreakdown;
}

export interface SuggestedCluster extends ScoredCluster {
  rank: number;
  dominantKeyword: string;
  headline: string;
  angles: string[];
}

export interface AnalysisResult {
  totalArticles: number;
  clusteredArticles: number;
  clusters: SuggestedCluster[];
}

export interface FeedResult {
  name: string;
  ok: boolean;
  count: number;
  error?: string;
}

export interface FetchSummary {
  articles: Article[];
  results: FeedResult[];
  successCount: number;
  failCount: number;
}

export interface ClusterReport {
  rank: number;
  score: number;
  headline: string;
  keywords: string[];
  article_count: number;
  sources: string[];
  topics: string[];
  sample_titles: string[];
  suggested_angles: string[];
  score_breakdown: {
    topic_weight: number;
    diversity: number;
    volume: number;
    matched_terms: string[];
  };
}

export interface JsonReport {
  generated_at: string;
  lookback_days: number;
  total_articles: number;
  no_data: boolean;
  feeds: { total: number; ok: number; failed: number };
  clusters: ClusterReport[];
}
