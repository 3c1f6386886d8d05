import type { PlannerConfig } from './config.js';
import type { MovementPlan, PlanOutcome, Point, SafetyBounds } from './types.js';

export function distanceBetween(a: Point, b: Point): number {
  return Math.hypot(b.x - a.x, b.y - a.y);
}

/**
 * Converts the remaining map distance into one relative pointer movement.
 *
 * Far from the target (beyond `coarseThreshold` map units) the step is as
 * long as the coarse step size allows, capped at `maxDeltaPerMove`. Close to
 * it the step shrinks with the distance (`fineDamping`), never exceeding the
 * fine step size, so the readout settles instead of oscillating. Components
 * are truncated toward zero, which keeps the rounded vector within the cap;
 * a step that truncates to nothing becomes a one-pixel nudge on the
 * dominant axis.
 */
export class CorrectionPlanner {
  constructor(private readonly config: PlannerConfig) {}

  plan(current: Point, target: Point, bounds: SafetyBounds, attempt: number): PlanOutcome {
    const distance = distanceBetween(current, target);
    if (distance <= this.config.epsilon) {
      return { converged: true, distance };
    }

    const screenX = (target.x - current.x) * this.config.pixelsPerUnit;
    const screenY = (target.y - current.y) * this.config.pixelsPerUnit;
    const screenDistance = Math.hypot(screenX, screenY);

    const coarse = distance > this.config.coarseThreshold;
    const step = coarse
      ? Math.min(screenDistance, this.config.coarseStepSize, bounds.maxDeltaPerMove)
      : Math.min(screenDistance * this.config.fineDamping, this.config.fineStepSize, bounds.maxDeltaPerMove);

    const scale = step / screenDistance;
    let dx = Math.trunc(screenX * scale);
    let dy = Math.trunc(screenY * scale);

    if (dx === 0 && dy === 0) {
      if (Math.abs(screenX) >= Math.abs(screenY)) {
        dx = Math.sign(screenX);
      } else {
        dy = Math.sign(screenY);
      }
    }

    const plan: MovementPlan = {
      // avoid -0 in plans
      dx: dx + 0,
      dy: dy + 0,
      mode: coarse ? 'coarse' : 'fine',
      attempt
    };
    return { converged: false, distance, plan };
  }
}
