import { describe, it, expect } from 'vitest';
import { BATCH, OUTCOME_STATUS, TIMEOUTS, VERIFICATION } from './constants';

describe('Constants', () => {
  describe('VERIFICATION', () => {
    it('should reject invalid, disabled and unknown by default', () => {
      expect([...VERIFICATION.FORBIDDEN_STATUSES]).toEqual(['invalid', 'disabled', 'unknown']);
    });

    it('should pause 300ms between probes', () => {
      expect(VERIFICATION.INTER_REQUEST_DELAY_MS).toBe(300);
      expect(VERIFICATION.MIN_INTERVAL_MS).toBeGreaterThan(0);
    });

    it('should retry at least once', () => {
      expect(VERIFICATION.RETRY_ATTEMPTS).toBeGreaterThanOrEqual(1);
    });
  });

  describe('OUTCOME_STATUS', () => {
    it('should not collide with provider statuses', () => {
      const outcomes: string[] = Object.values(OUTCOME_STATUS);
      for (const status of VERIFICATION.FORBIDDEN_STATUSES) {
        expect(outcomes).not.toContain(status);
      }
    });
  });

  describe('BATCH', () => {
    it('should keep default concurrency within the maximum', () => {
      expect(BATCH.DEFAULT_CONCURRENCY).toBeGreaterThanOrEqual(1);
      expect(BATCH.DEFAULT_CONCURRENCY).toBeLessThanOrEqual(BATCH.MAX_CONCURRENCY);
    });

    it('should accept more CSV rows than JSON contacts', () => {
      expect(BATCH.MAX_ROWS).toBeGreaterThan(BATCH.MAX_JSON_CONTACTS);
    });
  });

  describe('TIMEOUTS', () => {
    it('should allow 30 seconds per verification', () => {
      expect(TIMEOUTS.VERIFIER).toBe(30000);
    });
  });
});
