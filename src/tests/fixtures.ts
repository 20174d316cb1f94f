/**
 * Shared record builders and a fake data source for tests
 */
import assert from 'node:assert';
import type { DataSource } from '../github.js';
import type { EventRecord, ProfileRecord, RepositoryRecord } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const NOW = new Date('2026-01-15T12:00:00.000Z');

export function daysAgo(days: number, now: Date = NOW): string {
  return new Date(now.getTime() - days * DAY_MS).toISOString();
}

export function makeProfile(overrides: Partial<ProfileRecord> = {}): ProfileRecord {
  return { followers: 0, following: 0, avatar_url: '', ...overrides };
}

export function makeRepo(overrides: Partial<RepositoryRecord> = {}): RepositoryRecord {
  return {
    language: null,
    topics: [],
    forks_count: 0,
    fork: false,
    has_wiki: false,
    description: null,
    has_issues: false,
    stargazers_count: 0,
    size: 0,
    updated_at: daysAgo(365),
    ...overrides,
  };
}

export function makeEvent(ageInDays: number, type = 'PushEvent'): EventRecord {
  return { created_at: daysAgo(ageInDays), type };
}

export function makeEvents(count: number, ageInDays: number): EventRecord[] {
  return Array.from({ length: count }, () => makeEvent(ageInDays));
}

export function assertClose(actual: number, expected: number, epsilon = 1e-9): void {
  assert.ok(
    Math.abs(actual - expected) < epsilon,
    `expected ${actual} to be within ${epsilon} of ${expected}`
  );
}

export interface FakeRecords {
  profile?: ProfileRecord;
  repositories?: RepositoryRecord[];
  events?: EventRecord[];
  error?: Error;
}

export class FakeDataSource implements DataSource {
  readonly calls: string[] = [];
  since?: Date;

  constructor(private readonly records: FakeRecords = {}) {}

  async fetchProfile(username: string): Promise<ProfileRecord> {
    this.calls.push(`profile:${username}`);
    if (this.records.error) throw this.records.error;
    return this.records.profile ?? makeProfile();
  }

  async fetchRepositories(username: string): Promise<RepositoryRecord[]> {
    this.calls.push(`repositories:${username}`);
    return this.records.repositories ?? [];
  }

  async fetchRecentEvents(username: string, since: Date): Promise<EventRecord[]> {
    this.calls.push(`events:${username}`);
    this.since = since;
    return this.records.events ?? [];
  }
}
