import { ParsedScore, Score } from '../types/score';

export const MIN_SCORE = 0;
export const MAX_SCORE = 10;
/** "Uncertain": used when a reply carries no number at all. */
export const FALLBACK_SCORE = 5;

const THINK_OPEN = '<think>';
const THINK_CLOSE = '</think>';
// a leading '-' is a sign only when it does not follow a word character ("Q-3" reads as 3)
const INTEGER_TOKEN = /(?<!\w)-\d+|\d+/;

export function clampScore(n: number): Score {
  if (n < MIN_SCORE) return MIN_SCORE;
  if (n > MAX_SCORE) return MAX_SCORE;
  return n;
}

/** Drops deliberation text so only the final answer is scanned. */
export function stripDeliberation(raw: string) {
  let out = raw;
  const closeAt = out.lastIndexOf(THINK_CLOSE);
  if (closeAt !== -1) out = out.slice(closeAt + THINK_CLOSE.length);
  // unterminated block: the model ran out of tokens mid-thought
  const openAt = out.indexOf(THINK_OPEN);
  if (openAt !== -1) out = out.slice(0, openAt);
  return out;
}

export function parseScoreDetailed(raw: string | null | undefined): ParsedScore {
  const answer = stripDeliberation(raw ?? '');
  const match = INTEGER_TOKEN.exec(answer);
  if (!match) return { score: FALLBACK_SCORE, fallback: true };
  return { score: clampScore(Number(match[0])), fallback: false };
}

export function parseScore(raw: string | null | undefined): Score {
  return parseScoreDetailed(raw).score;
}

export default parseScore;
