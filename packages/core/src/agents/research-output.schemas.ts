import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

export const SatisfactionJudgmentSchema = z.object({
  reasons: z.array(z.string().min(1)).min(3),
  isSatisfactory: z.boolean(),
  improvementInstructions: z.string().nullish(),
});

export type SatisfactionJudgment = z.infer<typeof SatisfactionJudgmentSchema>;

export const SatisfactionJudgmentJsonSchema = zodToJsonSchema(SatisfactionJudgmentSchema, {
  name: 'SatisfactionJudgment',
  $refStrategy: 'none',
});
