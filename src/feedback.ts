import { SCORING_CONFIG } from './config.js';
import { METRIC_NAMES, type MetricName, type MetricSet } from './types.js';

export const NO_STRENGTHS = 'No significant strengths identified';
export const NO_WEAKNESSES = 'No significant weaknesses identified';
export const WELL_BALANCED = "Keep doing what you're doing! Your profile is well-balanced";

export const RECOMMENDATIONS: Record<MetricName, string> = {
  activity: 'Increase your activity by making regular commits and repository updates',
  diversity: 'Expand your skill set by working with different programming languages',
  community: 'Engage more with the community by contributing to other projects and following developers',
  documentation: 'Improve documentation by adding README files, wikis, and clear descriptions',
  code_quality: 'Focus on code quality by creating smaller, focused repositories with good issue tracking',
};

export const APPRECIATION = {
  outstanding: 'Outstanding GitHub Profile!',
  great: 'Great GitHub Profile!',
  good: 'Good Start! Keep Improving!',
  beginning: 'Your GitHub Journey Has Just Begun!',
} as const;

/** "code_quality" -> "code quality" */
export function metricLabel(name: MetricName): string {
  return name.replace(/_/g, ' ');
}

/** Whole percent; exact halves round to the even neighbour (72.5 -> 72) */
export function formatPercent(value: number): string {
  const scaled = value * 100;
  const floor = Math.floor(scaled);
  const rounded = scaled - floor === 0.5
    ? (floor % 2 === 0 ? floor : floor + 1)
    : Math.round(scaled);
  return `${rounded}%`;
}

export function getStrengths(metrics: MetricSet): string[] {
  const { strengthThreshold } = SCORING_CONFIG.feedback;
  const strengths = METRIC_NAMES
    .filter(name => metrics[name] >= strengthThreshold)
    .map(name => `Strong ${metricLabel(name)} (${formatPercent(metrics[name])})`);
  return strengths.length > 0 ? strengths : [NO_STRENGTHS];
}

export function getWeaknesses(metrics: MetricSet): string[] {
  const { weaknessThreshold } = SCORING_CONFIG.feedback;
  const weaknesses = METRIC_NAMES
    .filter(name => metrics[name] <= weaknessThreshold)
    .map(name => `Weak ${metricLabel(name)} (${formatPercent(metrics[name])})`);
  return weaknesses.length > 0 ? weaknesses : [NO_WEAKNESSES];
}

// Evaluated independently of strengths and weaknesses
export function getRecommendations(metrics: MetricSet): string[] {
  const { recommendationThreshold } = SCORING_CONFIG.feedback;
  const recommendations = METRIC_NAMES
    .filter(name => metrics[name] < recommendationThreshold)
    .map(name => RECOMMENDATIONS[name]);
  return recommendations.length > 0 ? recommendations : [WELL_BALANCED];
}

export function getAppreciation(score: number): string {
  const tiers = SCORING_CONFIG.appreciation;
  if (score >= tiers.outstanding) return APPRECIATION.outstanding;
  if (score >= tiers.great) return APPRECIATION.great;
  if (score >= tiers.good) return APPRECIATION.good;
  return APPRECIATION.beginning;
}
