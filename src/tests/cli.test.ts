import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { mkdtempSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

import { formatReport, parseAnalyzeArgs, progressBar, runCLI } from '../cli.js';
import { analyzeRecords } from '../analyzer.js';
import { loadConfig } from '../config.js';
import { FakeDataSource, NOW, daysAgo, makeProfile, makeRepo } from './fixtures.js';

const lonelyGoRepo = makeRepo({ language: 'Go', size: 500, updated_at: daysAgo(200) });

describe('CLI', () => {
  describe('parseAnalyzeArgs', () => {
    it('reads the username and flags', () => {
      assert.deepStrictEqual(parseAnalyzeArgs(['octocat', '--json', '--token', 'test-secret']), {
        username: 'octocat',
        json: true,
        token: 'test-secret',
      });
    });

    it('accepts --token=value', () => {
      assert.deepStrictEqual(parseAnalyzeArgs(['--token=test-secret', 'octocat']), {
        username: 'octocat',
        json: false,
        token: 'test-secret',
      });
    });

    it('leaves the username undefined when missing', () => {
      assert.deepStrictEqual(parseAnalyzeArgs(['--json']), { json: true });
    });
  });

  describe('progressBar', () => {
    it('fills proportionally', () => {
      assert.strictEqual(progressBar(0.5, 10), '█████░░░░░');
      assert.strictEqual(progressBar(0, 4), '░░░░');
      assert.strictEqual(progressBar(1, 4), '████');
    });
  });

  describe('formatReport', () => {
    const result = analyzeRecords(
      makeProfile({ avatar_url: 'https://avatars.example.test/u/1' }),
      [lonelyGoRepo],
      [],
      NOW
    );
    const lines = formatReport('octocat', result).split('\n');

    it('prints the score and appreciation', () => {
      assert.strictEqual(lines[1], '  Profile report for octocat');
      assert.strictEqual(lines[3], '  Score: 0.73/10');
      assert.strictEqual(lines[4], '  Your GitHub Journey Has Just Begun!');
    });

    it('prints one bar per metric', () => {
      assert.strictEqual(lines[6], '  Metrics');
      assert.strictEqual(lines[7], '    Activity       ' + '░'.repeat(20) + '   0%');
      assert.strictEqual(lines[8], '    Diversity      ' + '█'.repeat(3) + '░'.repeat(17) + '  14%');
      assert.strictEqual(lines[11], '    Code Quality   ' + '█'.repeat(6) + '░'.repeat(14) + '  30%');
    });

    it('lists feedback and the avatar URL', () => {
      assert.ok(lines.includes('    - No significant strengths identified'));
      assert.ok(lines.includes('    - Weak code quality (30%)'));
      assert.strictEqual(lines[lines.length - 2], '  Avatar: https://avatars.example.test/u/1');
    });
  });

  describe('runCLI', () => {
    let configDir: string;

    beforeEach(() => {
      configDir = mkdtempSync(join(tmpdir(), 'devscore-cli-test-'));
    });

    afterEach(() => {
      mock.restoreAll();
      rmSync(configDir, { recursive: true, force: true });
    });

    it('prints the result as JSON', async () => {
      const log = mock.method(console, 'log', () => {});
      mock.method(console, 'error', () => {});
      const source = new FakeDataSource({ repositories: [lonelyGoRepo] });

      const outcome = await runCLI(['analyze', 'octocat', '--json'], { source, configDir, env: {}, now: NOW });

      assert.strictEqual(outcome, 'handled');
      assert.strictEqual(log.mock.callCount(), 1);
      const printed = JSON.parse(String(log.mock.calls[0].arguments[0]));
      assert.strictEqual(printed.score, 0.73);
      assert.deepStrictEqual(printed.metrics, JSON.parse(JSON.stringify(analyzeRecords(makeProfile(), [lonelyGoRepo], [], NOW).metrics)));
    });

    it('treats a bare username as analyze', async () => {
      mock.method(console, 'log', () => {});
      mock.method(console, 'error', () => {});
      const source = new FakeDataSource({ repositories: [lonelyGoRepo] });

      const outcome = await runCLI(['octocat'], { source, configDir, env: {}, now: NOW, color: false });

      assert.strictEqual(outcome, 'handled');
      assert.ok(source.calls.includes('profile:octocat'));
    });

    it('reports analysis failures on stderr', async () => {
      mock.method(console, 'log', () => {});
      const error = mock.method(console, 'error', () => {});
      const source = new FakeDataSource({ repositories: [] });

      const outcome = await runCLI(['analyze', 'octocat'], { source, configDir, env: {}, now: NOW });

      assert.strictEqual(outcome, 'failed');
      const messages = error.mock.calls.map(call => String(call.arguments[0]));
      assert.ok(messages.some(m => m.includes('Analysis failed: No repositories found for this user')));
    });

    it('requires a username', async () => {
      mock.method(console, 'log', () => {});
      assert.strictEqual(await runCLI(['analyze'], { configDir }), 'failed');
    });

    it('hands the server command back to the caller', async () => {
      assert.strictEqual(await runCLI(['server']), 'server');
    });

    it('saves a token with config set-token', async () => {
      mock.method(console, 'log', () => {});
      assert.strictEqual(await runCLI(['config', 'set-token', 'test-secret'], { configDir }), 'handled');
      assert.strictEqual(loadConfig(configDir).token, 'test-secret');
    });

    it('prints the package version', async () => {
      const log = mock.method(console, 'log', () => {});
      assert.strictEqual(await runCLI(['version']), 'handled');
      assert.match(String(log.mock.calls[0].arguments[0]), /^\d+\.\d+\.\d+/);
    });

    it('rejects unknown options', async () => {
      mock.method(console, 'log', () => {});
      assert.strictEqual(await runCLI(['--bogus']), 'failed');
    });
  });
});
