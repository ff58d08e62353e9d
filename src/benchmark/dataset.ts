import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigError } from '../lib/errors';

export const DEFAULT_DATASET_PATH = path.resolve(__dirname, '../../data/company.json');

export const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const suiteSchema = z.object({
  table: z.string().min(1),
  labelFields: z.array(z.string()).min(1),
  fields: z.array(z.string()).min(1),
  question: z.string().min(1),
  offset: z.number().int().min(0).default(0),
  limit: z.number().int().positive().optional(),
  quick: z.boolean().default(false)
});

export const datasetSchema = z
  .object({
    tables: z.record(z.array(z.record(cellSchema))),
    suites: z.array(suiteSchema)
  })
  .superRefine((ds, ctx) => {
    ds.suites.forEach((suite, i) => {
      if (!ds.tables[suite.table]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['suites', i, 'table'], message: `unknown table "${suite.table}"` });
      }
    });
  });

export type Cell = z.infer<typeof cellSchema>;
export type Row = Record<string, Cell>;
export type Suite = z.infer<typeof suiteSchema>;
export type Dataset = z.infer<typeof datasetSchema>;

export function parseDataset(input: unknown): Dataset {
  const parsed = datasetSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigError(`invalid benchmark dataset: ${issues.join('; ')}`, issues);
  }
  return parsed.data;
}

export function loadDataset(file: string = DEFAULT_DATASET_PATH): Dataset {
  const raw = fs.readFileSync(file, 'utf8');
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`benchmark dataset ${file} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseDataset(json);
}

export function suiteRows(dataset: Dataset, suite: Suite): Row[] {
  const rows = dataset.tables[suite.table] ?? [];
  const end = suite.limit === undefined ? undefined : suite.offset + suite.limit;
  return rows.slice(suite.offset, end);
}
