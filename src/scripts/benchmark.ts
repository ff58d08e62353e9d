#!/usr/bin/env node

/**
 * Runs LM_SCORE over the sample company dataset and prints each score.
 *
 * Usage:
 *   npm run build && npm run benchmark -- [--full] [--data path/to/dataset.json]
 *
 * Without --full only the email suites run. Set JUDGE_MODEL (and optionally
 * JUDGE_BASE_URL / JUDGE_API_KEY) to score every row with a second model and
 * report how far the two disagree.
 */

import '../config';
import path from 'path';
import { Command } from 'commander';
import { loadJudgeConfig, loadScoringConfig } from '../config/llm';
import { createLmScore } from '../services/lmScore';
import { DEFAULT_DATASET_PATH, loadDataset } from '../benchmark/dataset';
import { BenchmarkReport, runBenchmark, selectSuites } from '../benchmark/runner';
import { logger } from '../lib/logger';

const RULE = '='.repeat(80);
const THIN_RULE = '-'.repeat(80);

function printSummary(report: BenchmarkReport) {
  const { totals } = report;
  console.log(`\n${RULE}`);
  console.log('Evaluation Complete!');
  console.log(`  Rows: ${totals.rows} (scored ${totals.scored}, errors ${totals.errors})`);
  console.log(`  Inference calls: ${totals.calls}, parse fallbacks: ${totals.fallbacks}`);
  if (totals.meanAbsDiff !== null) {
    console.log(`  Mean |score - judge|: ${totals.meanAbsDiff.toFixed(2)}`);
  }
  console.log(`  Elapsed: ${(totals.elapsedMs / 1000).toFixed(1)}s`);
  console.log(RULE);
}

async function main() {
  const program = new Command();
  program
    .name('lm-score-benchmark')
    .description('Score the sample company dataset with LM_SCORE')
    .option('--full', 'run every suite, not only the email suites', false)
    .option('--data <path>', 'dataset JSON file', DEFAULT_DATASET_PATH)
    .parse(process.argv);

  const opts = program.opts<{ full: boolean; data: string }>();
  const dataset = loadDataset(path.resolve(opts.data));
  const scoringConfig = loadScoringConfig();
  const judgeConfig = loadJudgeConfig(scoringConfig);
  const suites = selectSuites(dataset, opts.full);

  console.log(RULE);
  console.log(`LM_SCORE Evaluation on ${path.basename(opts.data)}`);
  console.log(RULE);

  const report = await runBenchmark({
    dataset,
    full: opts.full,
    lmScore: createLmScore(scoringConfig),
    judge: judgeConfig ? createLmScore(judgeConfig) : undefined,
    onSuite: (suite) => {
      const sameTable = suites.filter((s) => s.table === suite.table);
      const position = sameTable.indexOf(suite) + 1;
      console.log(`\n[${suite.table.toUpperCase()} - Question ${position}/${sameTable.length}] ${suite.question}`);
      console.log(THIN_RULE);
    },
    onRow: (row) => {
      for (const [field, value] of Object.entries(row.values)) console.log(`${field}: ${value ?? ''}`);
      if (row.error) console.log(`Error: ${row.error}`);
      else console.log(`Score: ${row.score}/10`);
      if (row.judgeScore !== undefined) console.log(`Judge: ${row.judgeScore ?? 'n/a'}/10`);
      console.log(THIN_RULE);
    }
  });

  printSummary(report);
}

main().catch((err) => {
  logger.error({ err }, 'benchmark failed');
  process.exit(1);
});
