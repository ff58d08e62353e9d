import { PreconditionError } from '../lib/errors';
import { logger as rootLogger, Logger } from '../lib/logger';
import { InferenceClient, LmScoreFn, ScoreArg, ScoringConfig } from '../types/score';
import { createInferenceClient } from './inference';
import { scoreContentDetailed } from './scoring';

export interface LmScoreArgs {
  contentParts: string[];
  question: string;
}

/**
 * Splits positional LM_SCORE arguments into content and question.
 * The last argument is the question; NULL content values contribute nothing.
 */
export function splitArgs(args: readonly ScoreArg[]): LmScoreArgs {
  if (args.length < 2) {
    throw new PreconditionError(`LM_SCORE requires at least 2 arguments (content, question), got ${args.length}`);
  }
  const question = args[args.length - 1];
  if (typeof question !== 'string') {
    throw new PreconditionError('LM_SCORE question (last argument) must be a string');
  }
  const contentParts: string[] = [];
  for (const part of args.slice(0, -1)) {
    if (part === null || part === undefined) continue;
    if (typeof part === 'string' || typeof part === 'number' || typeof part === 'boolean') {
      contentParts.push(String(part));
      continue;
    }
    throw new PreconditionError(`LM_SCORE content must be text, number or boolean, got ${typeof part}`);
  }
  if (contentParts.length === 0) {
    throw new PreconditionError('LM_SCORE content is empty');
  }
  return { contentParts, question };
}

/** Binds a scoring configuration into the variadic LM_SCORE function. */
export function createLmScore(
  config: ScoringConfig,
  client: InferenceClient = createInferenceClient(config),
  log: Logger = rootLogger
): LmScoreFn {
  return async (...args) => {
    const { contentParts, question } = splitArgs(args);
    return scoreContentDetailed(contentParts, question, config, client, log);
  };
}

export default createLmScore;
