/**
 * GitHub data source
 *
 * Fetches the three collections the engine scores: the user profile, their
 * repositories and their recent public events. Each request has its own
 * timeout and is never retried; any failure becomes a FetchError.
 */

import { z } from 'zod';
import { DEFAULT_API_BASE_URL, DEFAULT_TIMEOUT_MS } from './config.js';
import { FetchError } from './errors.js';
import { logger } from './logger.js';
import { parseTimestamp } from './timestamps.js';
import {
  eventSchema,
  profileSchema,
  repositorySchema,
  type EventRecord,
  type ProfileRecord,
  type RepositoryRecord,
} from './types.js';

export interface DataSource {
  fetchProfile(username: string): Promise<ProfileRecord>;
  fetchRepositories(username: string): Promise<RepositoryRecord[]>;
  fetchRecentEvents(username: string, since: Date): Promise<EventRecord[]>;
}

export type FetchFn = typeof fetch;

export interface GitHubDataSourceOptions {
  /** Sent as a bearer token when present */
  credential?: string;
  timeoutMs?: number;
  baseUrl?: string;
  fetchFn?: FetchFn;
}

const PAGE_SIZE = 100;

export class GitHubDataSource implements DataSource {
  private readonly credential?: string;
  private readonly timeoutMs: number;
  private readonly baseUrl: string;
  private readonly fetchFn: FetchFn;

  constructor(options: GitHubDataSourceOptions = {}) {
    this.credential = options.credential || undefined;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.baseUrl = (options.baseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, '');
    this.fetchFn = options.fetchFn ?? fetch;
  }

  async fetchProfile(username: string): Promise<ProfileRecord> {
    return this.request(`/users/${encodeURIComponent(username)}`, profileSchema, 'profile');
  }

  async fetchRepositories(username: string): Promise<RepositoryRecord[]> {
    return this.request(
      `/users/${encodeURIComponent(username)}/repos?per_page=${PAGE_SIZE}`,
      z.array(repositorySchema),
      'repositories'
    );
  }

  async fetchRecentEvents(username: string, since: Date): Promise<EventRecord[]> {
    const query = new URLSearchParams({ per_page: String(PAGE_SIZE), since: since.toISOString() });
    const events = await this.request(
      `/users/${encodeURIComponent(username)}/events?${query.toString()}`,
      z.array(eventSchema),
      'events'
    );
    // The events endpoint ignores `since`; apply it here
    return events.filter(e => parseTimestamp(e.created_at, 'event.created_at').getTime() >= since.getTime());
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'Accept': 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
      'User-Agent': 'devscore',
    };
    if (this.credential) {
      headers['Authorization'] = `Bearer ${this.credential}`;
    }
    return headers;
  }

  private async request<S extends z.ZodTypeAny>(path: string, schema: S, label: string): Promise<z.infer<S>> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    logger.request('GET', url);

    try {
      const body = await this.send(url, controller, label, path);
      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
        throw new FetchError(`Failed to fetch ${label}: unexpected response${where}: ${issue.message}`, {
          endpoint: path,
        });
      }
      return parsed.data;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /** Perform the request and read the JSON body; the abort timer covers both */
  private async send(url: string, controller: AbortController, label: string, path: string): Promise<unknown> {
    const fail = (reason: string, status?: number, cause?: unknown): FetchError =>
      new FetchError(`Failed to fetch ${label}: ${reason}`, { endpoint: path, status, cause });
    const timedOut = (): string => `request timed out after ${this.timeoutMs}ms`;

    let response: Response;
    try {
      response = await this.fetchFn(url, { headers: this.headers(), signal: controller.signal });
    } catch (error) {
      if (controller.signal.aborted) throw fail(timedOut(), undefined, error);
      throw fail(error instanceof Error ? error.message : String(error), undefined, error);
    }

    if (!response.ok) {
      throw fail(`${response.status} ${response.statusText}`.trimEnd(), response.status);
    }

    try {
      const body: unknown = await response.json();
      logger.debug(`Fetched ${label}`, { status: response.status });
      return body;
    } catch (error) {
      if (controller.signal.aborted) throw fail(timedOut(), response.status, error);
      throw fail('response was not valid JSON', response.status, error);
    }
  }
}
