import { z } from 'zod';

export const ExtractionModeSchema = z.enum(['article', 'product', 'forum', 'list_page', 'documentation', 'generic']);

// pg returns NUMERIC/REAL as numbers or strings depending on the column type, so coerce
export const ProfileRowSchema = z.object({
  id: z.string(),
  domain: z.string(),
  pattern: z.string().nullable(),
  main_content_selector: z.string().nullable(),
  title_selector: z.string().nullable(),
  comments_selector: z.string().nullable(),
  extraction_mode: ExtractionModeSchema,
  confidence: z.coerce.number(),
  use_count: z.coerce.number(),
  success_rate: z.coerce.number(),
  created_at: z.coerce.date(),
  last_used: z.coerce.date(),
  notes: z.string().nullable(),
});

export const ProfileStatsRowSchema = z.object({
  total_profiles: z.coerce.number(),
  total_uses: z.coerce.number(),
  avg_confidence: z.coerce.number(),
  avg_success_rate: z.coerce.number(),
});

export const TableExistsRowSchema = z.object({
  table_name: z.string(),
});

export type ProfileRow = z.infer<typeof ProfileRowSchema>;
export type ProfileStatsRow = z.infer<typeof ProfileStatsRowSchema>;
