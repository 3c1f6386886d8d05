import { mouse, straightTo, Button, Point as ScreenPoint } from '@nut-tree-fork/nut-js';
import type { PointerConfig } from './config.js';
import { InputError } from './errors.js';
import type { Logger } from './logger.js';
import type { Point, PointerDevice, Region } from './types.js';

/** Distance in pixels the pointer keeps from the window edges. */
export const EDGE_MARGIN = 50;

/**
 * Relative pointer movement inside the game window. Every move starts from
 * the window centre so the map is grabbed on the map itself, and the end
 * point is clamped to the window less EDGE_MARGIN. In `drag` mode the map is
 * grabbed and dragged by the vector; in `move` mode the pointer just travels
 * by it.
 */
export class MouseController implements PointerDevice {
  constructor(
    private readonly config: PointerConfig,
    private readonly logger: Logger
  ) {
    mouse.config.mouseSpeed = config.speed;
  }

  async moveBy(vector: Point, within: Region): Promise<void> {
    try {
      const start = centreOf(within);
      const wanted = { x: start.x + vector.x, y: start.y + vector.y };
      const end = clampToRegion(wanted, within, EDGE_MARGIN);
      if (end.x !== wanted.x || end.y !== wanted.y) {
        this.logger.warn('Pointer target clamped to the window', { wanted, end, window: within });
      }

      await mouse.setPosition(new ScreenPoint(start.x, start.y));
      if (this.config.mode === 'drag') {
        await mouse.pressButton(Button.LEFT);
        try {
          await mouse.move(straightTo(new ScreenPoint(end.x, end.y)));
        } finally {
          await mouse.releaseButton(Button.LEFT);
        }
      } else {
        await mouse.move(straightTo(new ScreenPoint(end.x, end.y)));
      }

      this.logger.debug('Pointer moved', { mode: this.config.mode, from: start, to: end, vector });
    } catch (error) {
      throw new InputError(
        `Failed to move pointer by (${vector.x}, ${vector.y}): ${error instanceof Error ? error.message : String(error)}`,
        error
      );
    }
  }
}

export function centreOf(region: Region): Point {
  return {
    x: Math.round(region.x + region.width / 2),
    y: Math.round(region.y + region.height / 2)
  };
}

/**
 * Keeps `point` inside `region` shrunk by `margin` on every side. A region
 * narrower than twice the margin collapses onto its centre line.
 */
export function clampToRegion(point: Point, region: Region, margin: number): Point {
  const centre = centreOf(region);
  return {
    x: clampAxis(point.x, region.x + margin, region.x + region.width - margin, centre.x),
    y: clampAxis(point.y, region.y + margin, region.y + region.height - margin, centre.y)
  };
}

function clampAxis(value: number, low: number, high: number, centre: number): number {
  if (low > high) return centre;
  return Math.min(Math.max(value, low), high);
}
