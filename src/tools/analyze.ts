import { z } from 'zod';
import { analyze, analyzeRecords } from '../analyzer.js';
import { resolveSettings, type Settings } from '../config.js';
import { AnalysisError, toError } from '../errors.js';
import type { DataSource } from '../github.js';
import { parseTimestamp } from '../timestamps.js';
import {
  eventSchema,
  profileSchema,
  repositorySchema,
  type ResultBundle,
} from '../types.js';

// Tool: devscore_analyze_profile - fetch and score a GitHub user
export const analyzeProfileSchema = z.object({
  username: z.string().min(1).describe('GitHub username to analyze'),
  token: z.string().optional().describe('GitHub token; falls back to GITHUB_TOKEN or ~/.devscore/config.json'),
});

export type AnalyzeProfileInput = z.infer<typeof analyzeProfileSchema>;

export interface ToolContext {
  source?: DataSource;
  configDir?: string;
  env?: NodeJS.ProcessEnv;
  now?: Date;
}

export async function analyzeProfile(input: AnalyzeProfileInput, context: ToolContext = {}): Promise<ResultBundle> {
  let settings: Settings;
  try {
    settings = resolveSettings(
      { token: input.token },
      { configDir: context.configDir, env: context.env }
    );
  } catch (error) {
    throw new AnalysisError(toError(error));
  }

  return analyze(input.username, {
    credential: settings.token,
    timeoutMs: settings.timeoutMs,
    baseUrl: settings.apiBaseUrl,
    source: context.source,
    now: context.now,
  });
}

// Tool: devscore_score_records - score records the caller already has
export const scoreRecordsSchema = z.object({
  profile: profileSchema.describe('User profile (followers, following, avatar_url)'),
  repositories: z.array(repositorySchema).describe('Repository records as returned by GET /users/{user}/repos'),
  events: z.array(eventSchema).default([]).describe('Public events as returned by GET /users/{user}/events'),
  now: z.string().optional().describe('Reference time (ISO 8601); defaults to now'),
});

export type ScoreRecordsInput = z.input<typeof scoreRecordsSchema>;

export function scoreRecords(input: ScoreRecordsInput): ResultBundle {
  const { profile, repositories, events, now } = scoreRecordsSchema.parse(input);
  const reference = now ? parseTimestamp(now, 'now') : new Date();
  return analyzeRecords(profile, repositories, events, reference);
}
