import { logger as rootLogger, Logger } from '../lib/logger';
import { PreconditionError } from '../lib/errors';
import { InferenceClient, Score, ScoreResult, ScoringConfig } from '../types/score';
import { buildPrompt } from './prompt';
import { createInferenceClient } from './inference';
import { parseScoreDetailed } from './parser';
import { aggregateScores } from './aggregate';

export function validateScoringInput(contentParts: readonly unknown[], question: unknown, config: ScoringConfig) {
  if (contentParts.length === 0) {
    throw new PreconditionError('at least one content part is required');
  }
  contentParts.forEach((part, i) => {
    if (typeof part !== 'string') throw new PreconditionError(`content part ${i} must be a string`);
  });
  if (typeof question !== 'string') {
    throw new PreconditionError('question must be a string');
  }
  if (config.ensemble && (!Number.isInteger(config.ensembleSize) || config.ensembleSize < 1)) {
    throw new PreconditionError(`ensembleSize must be a positive integer, got ${config.ensembleSize}`);
  }
}

/**
 * Scores content against a yes/no question.
 *
 * The prompt is built once and reused for every ensemble member. Members are
 * issued one after another; a reply without a number falls back to 5 for that
 * member only. Endpoint failures are not caught here.
 */
export async function scoreContentDetailed(
  contentParts: readonly string[],
  question: string,
  config: ScoringConfig,
  client: InferenceClient = createInferenceClient(config),
  log: Logger = rootLogger
): Promise<ScoreResult> {
  validateScoringInput(contentParts, question, config);
  const prompt = buildPrompt(contentParts, question);
  const calls = config.ensemble ? config.ensembleSize : 1;
  const callLog = log.child({ model: config.endpoint.model, calls });

  const samples: Score[] = [];
  let fallbacks = 0;
  for (let i = 0; i < calls; i++) {
    const raw = await client.complete(prompt);
    const parsed = parseScoreDetailed(raw);
    if (parsed.fallback) {
      fallbacks++;
      callLog.debug({ member: i, responsePreview: raw.slice(0, 200) }, 'no score in response, using fallback');
    }
    samples.push(parsed.score);
  }

  const score = config.ensemble ? aggregateScores(samples, config.aggregation) : samples[0];
  callLog.debug({ samples, fallbacks, score, aggregation: config.ensemble ? config.aggregation : null }, 'scored');
  return { score, samples, fallbacks };
}

export async function scoreContent(
  contentParts: readonly string[],
  question: string,
  config: ScoringConfig,
  client?: InferenceClient
): Promise<Score> {
  const result = await scoreContentDetailed(contentParts, question, config, client);
  return result.score;
}

export default scoreContent;
