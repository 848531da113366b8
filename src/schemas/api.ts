import { z } from 'zod';
import { AnalyzerOptionsSchema } from './config.js';

export const AnalyzeRequestSchema = AnalyzerOptionsSchema.extend({
  url: z.string().url(),
});

export const ResolveRequestSchema = AnalyzeRequestSchema;

export const UsageFeedbackSchema = z.object({
  success: z.boolean(),
});

export const SessionParamsSchema = z.object({
  index: z.coerce.number().int().min(0),
});

export type AnalyzeRequest = z.infer<typeof AnalyzeRequestSchema>;
export type ResolveRequest = z.infer<typeof ResolveRequestSchema>;
export type UsageFeedback = z.infer<typeof UsageFeedbackSchema>;
