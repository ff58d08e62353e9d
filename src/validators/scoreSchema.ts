import { z } from 'zod';

export const scoreArgSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const scoreRequestSchema = z.object({
  args: z.array(scoreArgSchema).max(64)
});

export type ScoreRequest = z.infer<typeof scoreRequestSchema>;
