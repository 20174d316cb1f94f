import { z } from 'zod';

// ============================================================================
// METRICS
// ============================================================================

export const METRIC_NAMES = [
  'activity',
  'diversity',
  'community',
  'documentation',
  'code_quality',
] as const;

export type MetricName = typeof METRIC_NAMES[number];

export type MetricSet = Readonly<Record<MetricName, number>>;

// ============================================================================
// SOURCE RECORDS
// ============================================================================

// Only the fields the engine reads; the API returns many more and zod strips them.

export const profileSchema = z.object({
  followers: z.number().int().nonnegative().default(0),
  following: z.number().int().nonnegative().default(0),
  avatar_url: z.string().nullish().transform(v => v ?? ''),
});

export const repositorySchema = z.object({
  language: z.string().nullish().transform(v => v ?? null),
  topics: z.array(z.string()).nullish().transform(v => v ?? []),
  forks_count: z.number().int().nonnegative(),
  fork: z.boolean(),
  has_wiki: z.boolean(),
  description: z.string().nullish().transform(v => v ?? null),
  has_issues: z.boolean(),
  stargazers_count: z.number().int().nonnegative(),
  size: z.number().int().nonnegative(),
  updated_at: z.string(),
});

export const eventSchema = z.object({
  created_at: z.string(),
  type: z.string().nullish(),
});

export type ProfileRecord = Readonly<z.infer<typeof profileSchema>>;
export type RepositoryRecord = Readonly<z.infer<typeof repositorySchema>>;
export type EventRecord = Readonly<z.infer<typeof eventSchema>>;

// ============================================================================
// RESULT
// ============================================================================

export interface ResultBundle {
  /** Composite score in [0, 10], two decimals */
  score: number;
  metrics: MetricSet;
  strengths: string[];
  weaknesses: string[];
  recommendations: string[];
  appreciation: string;
  avatar_url: string;
}
