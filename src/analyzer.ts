/**
 * Profile analysis
 *
 * analyze() fetches a user's records and scores them; analyzeRecords() is the
 * synchronous engine underneath, usable on records obtained any other way.
 */

import { SCORING_CONFIG } from './config.js';
import { AnalysisError, PreconditionError, toError } from './errors.js';
import {
  getAppreciation,
  getRecommendations,
  getStrengths,
  getWeaknesses,
} from './feedback.js';
import { GitHubDataSource, type DataSource } from './github.js';
import { logger } from './logger.js';
import { calculateMetrics, composeScore, METRIC_REGISTRY, type MetricRegistry } from './score.js';
import { daysBefore } from './timestamps.js';
import type { EventRecord, ProfileRecord, RepositoryRecord, ResultBundle } from './types.js';

export interface AnalyzeOptions {
  /** Opaque API credential, sent as a bearer token */
  credential?: string;
  /** Defaults to a GitHubDataSource built from credential/timeoutMs/baseUrl */
  source?: DataSource;
  /** Reference time for recency windows; defaults to the current time */
  now?: Date;
  timeoutMs?: number;
  baseUrl?: string;
  registry?: MetricRegistry;
}

// GitHub login: alphanumerics and single inner hyphens, at most 39 characters
const USERNAME_PATTERN = /^[a-z\d](?:[a-z\d]|-(?=[a-z\d])){0,38}$/i;

export function isValidUsername(username: string): boolean {
  return USERNAME_PATTERN.test(username);
}

/**
 * Score already-fetched records.
 * Throws PreconditionError when there are no repositories.
 */
export function analyzeRecords(
  profile: ProfileRecord,
  repositories: readonly RepositoryRecord[],
  events: readonly EventRecord[],
  now: Date,
  registry: MetricRegistry = METRIC_REGISTRY
): ResultBundle {
  if (repositories.length === 0) {
    throw new PreconditionError('No repositories found for this user');
  }

  const metrics = calculateMetrics({ profile, repositories, events, now }, registry);
  const score = composeScore(metrics, registry);

  return {
    score,
    metrics,
    strengths: getStrengths(metrics),
    weaknesses: getWeaknesses(metrics),
    recommendations: getRecommendations(metrics),
    appreciation: getAppreciation(score),
    avatar_url: profile.avatar_url,
  };
}

/**
 * Fetch and score a user's public profile.
 * Every failure is rethrown as AnalysisError with the original as `cause`.
 */
export async function analyze(username: string, options: AnalyzeOptions = {}): Promise<ResultBundle> {
  const login = username.trim();
  const now = options.now ?? new Date();

  try {
    if (!isValidUsername(login)) {
      throw new PreconditionError(`Invalid GitHub username: ${JSON.stringify(username)}`);
    }

    const source = options.source ?? new GitHubDataSource({
      credential: options.credential,
      timeoutMs: options.timeoutMs,
      baseUrl: options.baseUrl,
    });

    logger.info('Analyzing profile', { username: login, authenticated: Boolean(options.credential) });

    const since = daysBefore(now, SCORING_CONFIG.eventLookbackDays);
    const [profile, repositories, events] = await Promise.all([
      source.fetchProfile(login),
      source.fetchRepositories(login),
      source.fetchRecentEvents(login, since),
    ]);

    logger.debug('Fetched records', { repositories: repositories.length, events: events.length });

    const result = analyzeRecords(profile, repositories, events, now, options.registry);
    logger.debug('Analysis complete', { username: login, score: result.score });
    return result;
  } catch (error) {
    const cause = toError(error);
    logger.debug('Analysis failed', { username: login, error: cause.message });
    throw new AnalysisError(cause);
  }
}
