import { SCORING_CONFIG } from './config.js';
import { ConfigError } from './errors.js';
import {
  calculateActivity,
  calculateCodeQuality,
  calculateCommunity,
  calculateDiversity,
  calculateDocumentation,
  clamp01,
} from './metrics.js';
import {
  METRIC_NAMES,
  type EventRecord,
  type MetricName,
  type MetricSet,
  type ProfileRecord,
  type RepositoryRecord,
} from './types.js';

export interface MetricInputs {
  profile: ProfileRecord;
  repositories: readonly RepositoryRecord[];
  events: readonly EventRecord[];
  now: Date;
}

export interface MetricDefinition {
  compute: (inputs: MetricInputs) => number;
  weight: number;
}

export type MetricRegistry = Readonly<Record<MetricName, Readonly<MetricDefinition>>>;

const WEIGHT_TOLERANCE = 1e-9;

/**
 * Build a registry of metric definitions.
 * Throws ConfigError unless every weight is non-negative and they sum to 1.0.
 */
export function defineMetricRegistry(definitions: Record<MetricName, MetricDefinition>): MetricRegistry {
  let total = 0;
  for (const name of METRIC_NAMES) {
    const { weight } = definitions[name];
    if (!Number.isFinite(weight) || weight < 0) {
      throw new ConfigError(`Weight for ${name} must be a non-negative number, got ${weight}`);
    }
    total += weight;
  }
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigError(`Metric weights must sum to 1.0, got ${total}`);
  }
  return Object.freeze({ ...definitions });
}

const { weights } = SCORING_CONFIG;

export const METRIC_REGISTRY: MetricRegistry = defineMetricRegistry({
  activity: {
    compute: ({ events, repositories, now }) => calculateActivity(events, repositories, now),
    weight: weights.activity,
  },
  diversity: {
    compute: ({ repositories }) => calculateDiversity(repositories),
    weight: weights.diversity,
  },
  community: {
    compute: ({ profile, repositories }) => calculateCommunity(profile, repositories),
    weight: weights.community,
  },
  documentation: {
    compute: ({ repositories }) => calculateDocumentation(repositories),
    weight: weights.documentation,
  },
  code_quality: {
    compute: ({ repositories }) => calculateCodeQuality(repositories),
    weight: weights.code_quality,
  },
});

export function calculateMetrics(inputs: MetricInputs, registry: MetricRegistry = METRIC_REGISTRY): MetricSet {
  const compute = (name: MetricName): number => clamp01(registry[name].compute(inputs));
  return Object.freeze({
    activity: compute('activity'),
    diversity: compute('diversity'),
    community: compute('community'),
    documentation: compute('documentation'),
    code_quality: compute('code_quality'),
  });
}

export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

/** Weighted sum of the metrics scaled to [0, 10], two decimals */
export function composeScore(metrics: MetricSet, registry: MetricRegistry = METRIC_REGISTRY): number {
  let total = 0;
  for (const name of METRIC_NAMES) {
    total += metrics[name] * registry[name].weight;
  }
  return roundTo2(Math.min(Math.max(total * 10, 0), 10));
}
