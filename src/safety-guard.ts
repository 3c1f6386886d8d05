import type { MovementPlan, Point, SafetyBounds, SafetyCheck } from './types.js';

const OK: SafetyCheck = { ok: true };

/**
 * Every check is against the session's read-only bounds. A failed check is
 * final for the session: the scanner stops issuing input and reports it.
 */
export class SafetyGuard {
  checkCoordinate(coord: Point, bounds: SafetyBounds): SafetyCheck {
    const { min, max } = bounds.allowedRange;
    if (coord.x < min || coord.x > max || coord.y < min || coord.y > max) {
      return {
        ok: false,
        violation: {
          code: 'COORDINATE_OUT_OF_RANGE',
          message: `coordinate (${coord.x}, ${coord.y}) outside allowed range [${min}, ${max}]`,
          details: { x: coord.x, y: coord.y, min, max }
        }
      };
    }
    return OK;
  }

  checkMovement(plan: MovementPlan, bounds: SafetyBounds): SafetyCheck {
    const magnitude = Math.hypot(plan.dx, plan.dy);
    if (!Number.isFinite(magnitude) || magnitude > bounds.maxDeltaPerMove) {
      return {
        ok: false,
        violation: {
          code: 'MOVEMENT_TOO_LARGE',
          message: `movement (${plan.dx}, ${plan.dy}) exceeds ${bounds.maxDeltaPerMove}px per move`,
          details: { dx: plan.dx, dy: plan.dy, magnitude, maxDeltaPerMove: bounds.maxDeltaPerMove }
        }
      };
    }
    return OK;
  }

  checkFailures(consecutiveFailures: number, bounds: SafetyBounds): SafetyCheck {
    if (consecutiveFailures > bounds.maxConsecutiveFailures) {
      return {
        ok: false,
        violation: {
          code: 'FAILURE_LIMIT',
          message: `${consecutiveFailures} consecutive failures (limit ${bounds.maxConsecutiveFailures})`,
          details: { consecutiveFailures, maxConsecutiveFailures: bounds.maxConsecutiveFailures }
        }
      };
    }
    return OK;
  }

  checkElapsed(elapsedMs: number, bounds: SafetyBounds): SafetyCheck {
    if (elapsedMs > bounds.maxSessionDurationMs) {
      return {
        ok: false,
        violation: {
          code: 'SESSION_TIMEOUT',
          message: `session ran ${elapsedMs}ms (limit ${bounds.maxSessionDurationMs}ms)`,
          details: { elapsedMs, maxSessionDurationMs: bounds.maxSessionDurationMs }
        }
      };
    }
    return OK;
  }
}
