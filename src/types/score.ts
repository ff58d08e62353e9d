/** Integer confidence in [0, 10]. */
export type Score = number;

export type AggregationPolicy = 'majority' | 'average';

export interface EndpointConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
}

export interface ScoringConfig {
  ensemble: boolean;
  aggregation: AggregationPolicy;
  ensembleSize: number;
  thinkingEnabled: boolean;
  endpoint: EndpointConfig;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

export interface InferenceClient {
  complete(prompt: string): Promise<string>;
}

export interface ParsedScore {
  score: Score;
  fallback: boolean;
}

export interface ScoreResult {
  score: Score;
  /** Per-call parsed scores, in the order the calls were issued. */
  samples: Score[];
  fallbacks: number;
}

/** A SQL-style value passed positionally to LM_SCORE. */
export type ScoreArg = string | number | boolean | null | undefined;

export type LmScoreFn = (...args: ScoreArg[]) => Promise<ScoreResult>;
