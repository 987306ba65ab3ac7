// engine/trends/schema.ts — Validation of cached trend and tech-debt reports

import { z } from 'zod';

const ActivityEntrySchema = z.object({ name: z.string(), count: z.number().int().nonnegative() });

const FileActivitySchema = z.object({
  modules: z.array(ActivityEntrySchema),
  files: z.array(ActivityEntrySchema),
});

export const TrendStatisticsSchema = z.object({
  repository: z.string(),
  windowSize: z.number().int().nonnegative(),
  commits: z.array(
    z.object({
      sha: z.string(),
      subject: z.string(),
      category: z.enum(['feature', 'fix', 'perf', 'refactor', 'docs', 'test', 'other', 'unclassified']),
    }),
  ),
  categories: z.object({
    feature: z.number(),
    fix: z.number(),
    perf: z.number(),
    refactor: z.number(),
    docs: z.number(),
    test: z.number(),
    other: z.number(),
  }),
  classified: z.number().int().nonnegative(),
  unclassified: z.number().int().nonnegative(),
  activity: FileActivitySchema,
});

export const TrendReportSchema = z.object({
  statistics: TrendStatisticsSchema,
  narrative: z.string().nullable(),
});

export type TrendReport = z.infer<typeof TrendReportSchema>;

export const TechDebtReportSchema = z.object({
  commit: z.string(),
  windowSize: z.number().int().nonnegative(),
  activity: FileActivitySchema,
  markdown: z.string(),
  droppedItems: z.array(z.string()),
});

export type TechDebtReport = z.infer<typeof TechDebtReportSchema>;
