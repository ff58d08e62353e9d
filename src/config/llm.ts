import { z } from 'zod';
import { ConfigError } from '../lib/errors';
import { ScoringConfig } from '../types/score';

export const DEFAULT_BASE_URL = 'http://localhost:8080/v1';
export const DEFAULT_MODEL = 'mlx-community/DeepSeek-R1-Distill-Qwen-7B-4bit';
export const DEFAULT_ENSEMBLE_SIZE = 3;

const TRUE_VALUES = ['true', 't', '1', 'yes', 'y'];
const FALSE_VALUES = ['false', 'f', '0', 'no', 'n'];

function blankToUndefined(v: string | undefined) {
  return v === undefined || v.trim() === '' ? undefined : v.trim();
}

function flag(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((raw, ctx) => {
      const v = blankToUndefined(raw)?.toLowerCase();
      if (v === undefined) return fallback;
      if (TRUE_VALUES.includes(v)) return true;
      if (FALSE_VALUES.includes(v)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected true or false, got "${raw}"` });
      return z.NEVER;
    });
}

function text(fallback: string) {
  return z.string().optional().transform((v) => blankToUndefined(v) ?? fallback);
}

function int(fallback: number, min: number) {
  return z.string().optional().transform(blankToUndefined).pipe(z.coerce.number().int().min(min).default(fallback));
}

const llmEnvSchema = z.object({
  LLM_BASE_URL: z.string().optional().transform(blankToUndefined).pipe(z.string().url().default(DEFAULT_BASE_URL)),
  LLM_API_KEY: text('local'),
  LLM_MODEL: text(DEFAULT_MODEL),
  LLM_TIMEOUT_MS: int(60000, 1),
  LLM_MAX_TOKENS: int(2000, 1),
  LLM_TEMPERATURE: z.string().optional().transform(blankToUndefined).pipe(z.coerce.number().min(0).max(2).default(0.7)),
  ENSEMBLE: flag(false),
  AGGREGATION: z
    .string()
    .optional()
    .transform((v) => blankToUndefined(v)?.toLowerCase())
    .pipe(z.enum(['majority', 'average']).default('majority')),
  ENSEMBLE_SIZE: int(DEFAULT_ENSEMBLE_SIZE, 1),
  THINKING: flag(false)
});

const judgeEnvSchema = z.object({
  JUDGE_BASE_URL: z.string().optional().transform(blankToUndefined).pipe(z.string().url().optional()),
  JUDGE_API_KEY: text('local'),
  JUDGE_MODEL: z.string().optional().transform(blankToUndefined)
});

function parseEnv<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv, what: string): z.infer<T> {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`invalid ${what} configuration: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

/** Builds the scoring configuration once, at process start. */
export function loadScoringConfig(env: NodeJS.ProcessEnv = process.env): ScoringConfig {
  const e = parseEnv(llmEnvSchema, env, 'LLM');
  return {
    ensemble: e.ENSEMBLE,
    aggregation: e.AGGREGATION,
    ensembleSize: e.ENSEMBLE_SIZE,
    thinkingEnabled: e.THINKING,
    endpoint: { baseUrl: e.LLM_BASE_URL, apiKey: e.LLM_API_KEY, model: e.LLM_MODEL },
    timeoutMs: e.LLM_TIMEOUT_MS,
    maxTokens: e.LLM_MAX_TOKENS,
    temperature: e.LLM_TEMPERATURE
  };
}

/**
 * Judge service used by the benchmark only. Returns null when no judge is configured.
 * The judge is single-shot at temperature 0 and gets no thinking prefill, since it is
 * usually a hosted model rather than the local one.
 */
export function loadJudgeConfig(base: ScoringConfig, env: NodeJS.ProcessEnv = process.env): ScoringConfig | null {
  const e = parseEnv(judgeEnvSchema, env, 'judge');
  if (!e.JUDGE_BASE_URL && !e.JUDGE_MODEL) return null;
  if (!e.JUDGE_MODEL) {
    throw new ConfigError('invalid judge configuration: JUDGE_MODEL is required when JUDGE_BASE_URL is set', [
      'JUDGE_MODEL: Required'
    ]);
  }
  return {
    ...base,
    ensemble: false,
    thinkingEnabled: true,
    temperature: 0,
    endpoint: {
      baseUrl: e.JUDGE_BASE_URL ?? base.endpoint.baseUrl,
      apiKey: e.JUDGE_API_KEY,
      model: e.JUDGE_MODEL
    }
  };
}
