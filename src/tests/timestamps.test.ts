import { describe, it } from 'node:test';
import assert from 'node:assert';

import { daysBefore, isWithinDays, parseTimestamp } from '../timestamps.js';
import { TimestampError } from '../errors.js';

describe('Timestamps', () => {
  describe('parseTimestamp', () => {
    it('parses UTC timestamps as returned by the API', () => {
      assert.strictEqual(parseTimestamp('2024-03-01T10:20:30Z', 'f').toISOString(), '2024-03-01T10:20:30.000Z');
    });

    it('treats a missing zone designator as UTC', () => {
      assert.strictEqual(parseTimestamp('2024-03-01T10:20:30', 'f').toISOString(), '2024-03-01T10:20:30.000Z');
    });

    it('applies positive and negative offsets', () => {
      assert.strictEqual(parseTimestamp('2024-03-01T12:20:30+02:00', 'f').toISOString(), '2024-03-01T10:20:30.000Z');
      assert.strictEqual(parseTimestamp('2024-03-01T04:50:30-05:30', 'f').toISOString(), '2024-03-01T10:20:30.000Z');
    });

    it('keeps fractional seconds', () => {
      assert.strictEqual(parseTimestamp('2024-03-01T10:20:30.5Z', 'f').toISOString(), '2024-03-01T10:20:30.500Z');
    });

    it('rejects text that is not a timestamp', () => {
      assert.throws(() => parseTimestamp('yesterday', 'event.created_at'), (error: unknown) => {
        assert.ok(error instanceof TimestampError);
        assert.strictEqual(error.field, 'event.created_at');
        assert.strictEqual(error.value, 'yesterday');
        assert.strictEqual(error.message, 'Malformed timestamp in event.created_at: "yesterday"');
        return true;
      });
    });

    it('rejects impossible dates instead of rolling them over', () => {
      assert.throws(() => parseTimestamp('2024-02-30T00:00:00Z', 'f'), TimestampError);
      assert.throws(() => parseTimestamp('2024-13-01T00:00:00Z', 'f'), TimestampError);
    });

    it('rejects out-of-range times', () => {
      assert.throws(() => parseTimestamp('2024-03-01T24:00:00Z', 'f'), TimestampError);
      assert.throws(() => parseTimestamp('2024-03-01T10:60:00Z', 'f'), TimestampError);
    });

    it('rejects empty strings', () => {
      assert.throws(() => parseTimestamp('', 'f'), TimestampError);
    });
  });

  describe('daysBefore', () => {
    it('subtracts whole days', () => {
      const now = new Date('2026-01-31T00:00:00.000Z');
      assert.strictEqual(daysBefore(now, 30).toISOString(), '2026-01-01T00:00:00.000Z');
    });
  });

  describe('isWithinDays', () => {
    const now = new Date('2026-01-31T00:00:00.000Z');

    it('excludes a timestamp exactly on the window edge', () => {
      assert.strictEqual(isWithinDays('2026-01-01T00:00:00Z', 'f', now, 30), false);
    });

    it('includes a timestamp just inside the window', () => {
      assert.strictEqual(isWithinDays('2026-01-01T00:00:00.001Z', 'f', now, 30), true);
    });
  });
});
