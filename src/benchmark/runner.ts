import { LmScoreError } from '../lib/errors';
import { logger as rootLogger, Logger } from '../lib/logger';
import { LmScoreFn, Score } from '../types/score';
import { Dataset, Row, Suite, suiteRows } from './dataset';

export interface BenchmarkRow {
  label: string;
  values: Row;
  score: Score | null;
  samples: Score[];
  fallbacks: number;
  judgeScore?: Score | null;
  error?: string;
}

export interface SuiteReport {
  suite: Suite;
  rows: BenchmarkRow[];
}

export interface BenchmarkTotals {
  rows: number;
  scored: number;
  errors: number;
  calls: number;
  fallbacks: number;
  /** Mean |score - judgeScore| over rows both scored; null without a judge. */
  meanAbsDiff: number | null;
  elapsedMs: number;
}

export interface BenchmarkReport {
  suites: SuiteReport[];
  totals: BenchmarkTotals;
}

export interface BenchmarkOptions {
  dataset: Dataset;
  lmScore: LmScoreFn;
  judge?: LmScoreFn;
  full?: boolean;
  onSuite?: (suite: Suite, index: number) => void;
  onRow?: (row: BenchmarkRow, suite: Suite) => void;
  now?: () => number;
  log?: Logger;
}

export function selectSuites(dataset: Dataset, full: boolean): Suite[] {
  return full ? dataset.suites : dataset.suites.filter((s) => s.quick);
}

function labelOf(row: Row, suite: Suite) {
  return suite.labelFields.map((f) => String(row[f] ?? '')).join(' | ');
}

function pick(row: Row, fields: string[]): Row {
  const out: Row = {};
  for (const f of fields) out[f] = row[f] ?? null;
  return out;
}

/**
 * Runs every selected suite row by row, one LM_SCORE call after another.
 * A row whose call fails is reported with its error and the run goes on.
 */
export async function runBenchmark(opts: BenchmarkOptions): Promise<BenchmarkReport> {
  const { dataset, lmScore, judge, full = false, onSuite, onRow, now = Date.now, log = rootLogger } = opts;
  const started = now();
  const suites = selectSuites(dataset, full);
  const reports: SuiteReport[] = [];
  const diffs: number[] = [];
  const totals: BenchmarkTotals = { rows: 0, scored: 0, errors: 0, calls: 0, fallbacks: 0, meanAbsDiff: null, elapsedMs: 0 };

  for (const [index, suite] of suites.entries()) {
    onSuite?.(suite, index);
    const rows: BenchmarkRow[] = [];
    for (const row of suiteRows(dataset, suite)) {
      const args = suite.fields.map((f) => row[f] ?? null);
      const result: BenchmarkRow = {
        label: labelOf(row, suite),
        values: pick(row, suite.labelFields),
        score: null,
        samples: [],
        fallbacks: 0
      };
      try {
        const scored = await lmScore(...args, suite.question);
        result.score = scored.score;
        result.samples = scored.samples;
        result.fallbacks = scored.fallbacks;
      } catch (err) {
        if (!(err instanceof LmScoreError)) throw err;
        result.error = `${err.code}: ${err.message}`;
        log.warn({ table: suite.table, label: result.label, err: err.message }, 'benchmark row failed');
      }

      if (judge && result.score !== null) {
        try {
          result.judgeScore = (await judge(...args, suite.question)).score;
          diffs.push(Math.abs(result.score - result.judgeScore));
        } catch (err) {
          if (!(err instanceof LmScoreError)) throw err;
          result.judgeScore = null;
          log.warn({ table: suite.table, label: result.label, err: err.message }, 'judge call failed');
        }
      }

      totals.rows++;
      totals.calls += result.samples.length;
      totals.fallbacks += result.fallbacks;
      if (result.error) totals.errors++;
      else totals.scored++;
      rows.push(result);
      onRow?.(result, suite);
    }
    reports.push({ suite, rows });
  }

  totals.meanAbsDiff = diffs.length ? diffs.reduce((a, b) => a + b, 0) / diffs.length : null;
  totals.elapsedMs = now() - started;
  log.info({ ...totals, suites: suites.length }, 'benchmark finished');
  return { suites: reports, totals };
}

export default runBenchmark;
