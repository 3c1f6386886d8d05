/**
 * Safety Guard Tests
 *
 * Tests for the per-session range, movement, failure and duration limits.
 */

import { SafetyGuard } from '../safety-guard.js';
import type { SafetyBounds } from '../types.js';

const bounds: SafetyBounds = {
  maxDeltaPerMove: 100,
  maxConsecutiveFailures: 3,
  maxAttempts: 10,
  maxSessionDurationMs: 5000,
  allowedRange: { min: 0, max: 2000 }
};

describe('SafetyGuard', () => {
  const guard = new SafetyGuard();

  describe('checkCoordinate', () => {
    it('should accept coordinates on the range edges', () => {
      expect(guard.checkCoordinate({ x: 0, y: 2000 }, bounds)).toEqual({ ok: true });
    });

    it('should reject coordinates outside the range', () => {
      const check = guard.checkCoordinate({ x: 10000, y: 10000 }, bounds);
      expect(check.ok).toBe(false);
      if (check.ok) return;
      expect(check.violation.code).toBe('COORDINATE_OUT_OF_RANGE');
      expect(check.violation.message).toBe('coordinate (10000, 10000) outside allowed range [0, 2000]');
    });

    it('should reject a single axis out of range', () => {
      expect(guard.checkCoordinate({ x: 5, y: -1 }, bounds).ok).toBe(false);
    });
  });

  describe('checkMovement', () => {
    it('should accept a move exactly at the limit', () => {
      expect(guard.checkMovement({ dx: 60, dy: 80, mode: 'coarse', attempt: 1 }, bounds).ok).toBe(true);
    });

    it('should reject a move over the limit', () => {
      const check = guard.checkMovement({ dx: 71, dy: 71, mode: 'coarse', attempt: 1 }, bounds);
      expect(check.ok).toBe(false);
      if (check.ok) return;
      expect(check.violation.code).toBe('MOVEMENT_TOO_LARGE');
      expect(check.violation.message).toBe('movement (71, 71) exceeds 100px per move');
    });

    it('should reject a non-finite move', () => {
      expect(guard.checkMovement({ dx: NaN, dy: 0, mode: 'fine', attempt: 1 }, bounds).ok).toBe(false);
    });
  });

  describe('checkFailures', () => {
    it('should allow failures up to the limit', () => {
      expect(guard.checkFailures(3, bounds).ok).toBe(true);
    });

    it('should reject failures beyond the limit', () => {
      const check = guard.checkFailures(4, bounds);
      expect(check.ok).toBe(false);
      if (check.ok) return;
      expect(check.violation.code).toBe('FAILURE_LIMIT');
    });
  });

  describe('checkElapsed', () => {
    it('should allow the session up to its duration limit', () => {
      expect(guard.checkElapsed(5000, bounds).ok).toBe(true);
    });

    it('should reject a session past its duration limit', () => {
      const check = guard.checkElapsed(5001, bounds);
      expect(check.ok).toBe(false);
      if (check.ok) return;
      expect(check.violation).toMatchObject({ code: 'SESSION_TIMEOUT', message: 'session ran 5001ms (limit 5000ms)' });
    });
  });
});
