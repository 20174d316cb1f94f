/**
 * Metric engine
 *
 * Five pure functions, each mapping the fetched records to a value in [0, 1].
 * Time-dependent metrics take `now` explicitly so a run is reproducible.
 */

import { SCORING_CONFIG } from './config.js';
import { isWithinDays } from './timestamps.js';
import type { EventRecord, ProfileRecord, RepositoryRecord } from './types.js';

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}

/** min(count / target, 1), or 0 when the target is 0 */
function saturate(count: number, target: number): number {
  return target > 0 ? Math.min(count / target, 1) : 0;
}

function countWhere<T>(items: readonly T[], predicate: (item: T) => boolean): number {
  let count = 0;
  for (const item of items) {
    if (predicate(item)) count++;
  }
  return count;
}

// ============================================================================
// ACTIVITY
// ============================================================================

/**
 * Blend of short-horizon velocity (events in the last 30 days) and
 * medium-horizon upkeep (repositories updated in the last 90 days).
 * A user with no events at all scores 0 regardless of repository updates.
 */
export function calculateActivity(
  events: readonly EventRecord[],
  repositories: readonly RepositoryRecord[],
  now: Date
): number {
  if (events.length === 0) return 0;
  const cfg = SCORING_CONFIG.activity;

  const recentEvents = countWhere(events, e =>
    isWithinDays(e.created_at, 'event.created_at', now, cfg.recentEventDays));
  const recentRepos = countWhere(repositories, r =>
    isWithinDays(r.updated_at, 'repository.updated_at', now, cfg.recentRepoDays));

  const eventScore = saturate(recentEvents, cfg.eventTarget);
  const repoScore = saturate(recentRepos, repositories.length);

  return clamp01(cfg.eventWeight * eventScore + cfg.repoWeight * repoScore);
}

// ============================================================================
// DIVERSITY
// ============================================================================

export function calculateDiversity(repositories: readonly RepositoryRecord[]): number {
  if (repositories.length === 0) return 0;
  const cfg = SCORING_CONFIG.diversity;

  const languages = new Set<string>();
  const topics = new Set<string>();
  for (const repo of repositories) {
    if (repo.language) languages.add(repo.language);
    for (const topic of repo.topics) topics.add(topic);
  }

  const languageScore = saturate(languages.size, cfg.languageTarget);
  const topicScore = saturate(topics.size, cfg.topicTarget);

  return clamp01(cfg.languageWeight * languageScore + cfg.topicWeight * topicScore);
}

// ============================================================================
// COMMUNITY
// ============================================================================

export function calculateCommunity(
  profile: ProfileRecord,
  repositories: readonly RepositoryRecord[]
): number {
  const cfg = SCORING_CONFIG.community;
  const repoCount = repositories.length;

  const totalForks = repositories.reduce((sum, r) => sum + r.forks_count, 0);
  // Forked repositories stand in for collaboration on other people's projects
  const collaborations = countWhere(repositories, r => r.fork);

  const followerScore = saturate(profile.followers, cfg.followerTarget);
  const followingScore = saturate(profile.following, cfg.followingTarget);
  const forkScore = saturate(totalForks, repoCount * cfg.forksPerRepoTarget);
  const collabScore = saturate(collaborations, repoCount);

  return clamp01(
    cfg.followerWeight * followerScore +
    cfg.followingWeight * followingScore +
    cfg.forkWeight * forkScore +
    cfg.collaborationWeight * collabScore
  );
}

// ============================================================================
// DOCUMENTATION
// ============================================================================

/**
 * A non-empty description is counted as a README signal. This is a proxy:
 * no repository contents are inspected.
 */
export function calculateDocumentation(repositories: readonly RepositoryRecord[]): number {
  if (repositories.length === 0) return 0;
  const cfg = SCORING_CONFIG.documentation;
  const total = repositories.length;

  const wikiCount = countWhere(repositories, r => r.has_wiki);
  const descriptionCount = countWhere(repositories, r =>
    r.description !== null && r.description.length > cfg.descriptionMinLength);
  const readmeCount = countWhere(repositories, r => Boolean(r.description));

  return clamp01(
    cfg.readmeWeight * (readmeCount / total) +
    cfg.wikiWeight * (wikiCount / total) +
    cfg.descriptionWeight * (descriptionCount / total)
  );
}

// ============================================================================
// CODE QUALITY
// ============================================================================

export function repositorySizeCredit(size: number): number {
  const cfg = SCORING_CONFIG.codeQuality;
  if (size < cfg.smallRepoSize) return 1;
  if (size < cfg.mediumRepoSize) return cfg.mediumRepoCredit;
  return 0;
}

export function calculateCodeQuality(repositories: readonly RepositoryRecord[]): number {
  if (repositories.length === 0) return 0;
  const cfg = SCORING_CONFIG.codeQuality;
  const total = repositories.length;

  const totalStars = repositories.reduce((sum, r) => sum + r.stargazers_count, 0);
  const starScore = saturate(totalStars / total, cfg.starsPerRepoTarget);
  const issueScore = countWhere(repositories, r => r.has_issues) / total;
  const sizeScore = repositories.reduce((sum, r) => sum + repositorySizeCredit(r.size), 0) / total;

  return clamp01(
    cfg.starWeight * starScore +
    cfg.issueWeight * issueScore +
    cfg.sizeWeight * sizeScore
  );
}
