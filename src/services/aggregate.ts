import { PreconditionError } from '../lib/errors';
import { AggregationPolicy, Score } from '../types/score';
import { clampScore } from './parser';

export function averageScore(scores: readonly Score[]): Score {
  const mean = scores.reduce((sum, s) => sum + s, 0) / scores.length;
  // round half up: 4.5 -> 5
  return clampScore(Math.floor(mean + 0.5));
}

/** Most frequent score; ties go to the smallest tied value. */
export function majorityScore(scores: readonly Score[]): Score {
  const counts = new Map<Score, number>();
  for (const s of scores) counts.set(s, (counts.get(s) ?? 0) + 1);
  let best = scores[0];
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount || (count === bestCount && value < best)) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export function aggregateScores(scores: readonly Score[], policy: AggregationPolicy): Score {
  if (scores.length === 0) throw new PreconditionError('aggregateScores requires at least one score');
  if (scores.length === 1) return scores[0];
  switch (policy) {
    case 'average':
      return averageScore(scores);
    case 'majority':
      return majorityScore(scores);
  }
}

export default aggregateScores;
