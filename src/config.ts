import { existsSync, readFileSync, mkdirSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';
import writeFileAtomic from 'write-file-atomic';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

// ============================================================================
// SCORING CONSTANTS
// ============================================================================

/**
 * Every threshold, target and weight the engine uses.
 * Targets are the value at which a sub-score saturates at 1.0.
 */
export const SCORING_CONFIG = {
  activity: {
    recentEventDays: 30,
    recentRepoDays: 90,
    eventTarget: 30,
    eventWeight: 0.6,
    repoWeight: 0.4,
  },
  diversity: {
    languageTarget: 5,
    topicTarget: 10,
    languageWeight: 0.7,
    topicWeight: 0.3,
  },
  community: {
    followerTarget: 100,
    followingTarget: 50,
    forksPerRepoTarget: 5,
    followerWeight: 0.3,
    followingWeight: 0.2,
    forkWeight: 0.3,
    collaborationWeight: 0.2,
  },
  documentation: {
    descriptionMinLength: 20,
    readmeWeight: 0.5,
    wikiWeight: 0.3,
    descriptionWeight: 0.2,
  },
  codeQuality: {
    starsPerRepoTarget: 10,
    smallRepoSize: 1000,
    mediumRepoSize: 5000,
    mediumRepoCredit: 0.5,
    starWeight: 0.4,
    issueWeight: 0.3,
    sizeWeight: 0.3,
  },
  // Composite weights; must sum to 1.0
  weights: {
    activity: 0.3,
    diversity: 0.2,
    community: 0.2,
    documentation: 0.15,
    code_quality: 0.15,
  },
  feedback: {
    strengthThreshold: 0.7,
    weaknessThreshold: 0.3,
    recommendationThreshold: 0.4,
  },
  appreciation: {
    outstanding: 8,
    great: 6,
    good: 4,
  },
  // How far back the event stream is requested
  eventLookbackDays: 180,
} as const;

// ============================================================================
// RUNTIME SETTINGS
// ============================================================================

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_API_BASE_URL = 'https://api.github.com';

const CONFIG_DIR = join(homedir(), '.devscore');
const CONFIG_FILE = 'config.json';

export const configFileSchema = z.object({
  token: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
  apiBaseUrl: z.string().url().optional(),
});

export type DevscoreConfig = z.infer<typeof configFileSchema>;

export interface Settings {
  token?: string;
  timeoutMs: number;
  apiBaseUrl: string;
}

export function getConfigPath(configDir: string = CONFIG_DIR): string {
  return join(configDir, CONFIG_FILE);
}

export function loadConfig(configDir: string = CONFIG_DIR): DevscoreConfig {
  const path = getConfigPath(configDir);
  if (!existsSync(path)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read ${path}: ${error instanceof Error ? error.message : String(error)}`, { cause: error });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`Invalid ${path}: ${issue.path.join('.') || '(root)'} ${issue.message}`);
  }
  return parsed.data;
}

export function saveConfig(config: DevscoreConfig, configDir: string = CONFIG_DIR): void {
  if (!existsSync(configDir)) {
    mkdirSync(configDir, { recursive: true });
  }
  writeFileAtomic.sync(getConfigPath(configDir), JSON.stringify(config, null, 2) + '\n', { mode: 0o600 });
  logger.debug('Config saved', { path: getConfigPath(configDir) });
}

export function setToken(token: string, configDir: string = CONFIG_DIR): void {
  const config = loadConfig(configDir);
  saveConfig({ ...config, token }, configDir);
}

function envTimeout(env: NodeJS.ProcessEnv): number | undefined {
  const raw = env.DEVSCORE_TIMEOUT_MS;
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`DEVSCORE_TIMEOUT_MS must be a positive integer, got ${JSON.stringify(raw)}`);
  }
  return value;
}

/**
 * Resolve settings: explicit overrides, then environment, then config file,
 * then defaults.
 */
export function resolveSettings(
  overrides: Partial<Settings> = {},
  options: { configDir?: string; env?: NodeJS.ProcessEnv } = {}
): Settings {
  const env = options.env ?? process.env;
  const file = loadConfig(options.configDir);

  return {
    token: overrides.token || env.GITHUB_TOKEN || file.token || undefined,
    timeoutMs: overrides.timeoutMs ?? envTimeout(env) ?? file.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    apiBaseUrl: overrides.apiBaseUrl || env.DEVSCORE_API_URL || file.apiBaseUrl || DEFAULT_API_BASE_URL,
  };
}

/** Mask a token for display: first 4 characters, rest hidden */
export function maskToken(token: string): string {
  if (token.length <= 8) return '*'.repeat(token.length);
  return `${token.slice(0, 4)}${'*'.repeat(token.length - 4)}`;
}
