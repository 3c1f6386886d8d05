import { getWindows, type Window } from '@nut-tree-fork/nut-js';
import { WindowNotFoundError } from './errors.js';
import type { Logger } from './logger.js';
import type { Region, WindowHandle, WindowLocator } from './types.js';

export const MIN_WINDOW_WIDTH = 500;
export const MIN_WINDOW_HEIGHT = 300;

function matches(title: string, pattern: string | RegExp): boolean {
  return typeof pattern === 'string' ? title.includes(pattern) : pattern.test(title);
}

/**
 * Finds the game window by title, focuses it and reports its screen bounds.
 * Holds on to the most recently found window only.
 */
export class WindowManager implements WindowLocator {
  private readonly windows = new Map<number, Window>();
  private nextId = 1;

  constructor(private readonly logger: Logger) {}

  private async listWindows(): Promise<Array<{ window: Window; title: string }>> {
    const windows = await getWindows();
    const listed: Array<{ window: Window; title: string }> = [];
    for (const window of windows) {
      try {
        const title = (await window.title).trim();
        if (title) {
          listed.push({ window, title });
        }
      } catch (error) {
        // Windows can close while being enumerated
        this.logger.debug('Skipping window without readable title', {
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }
    return listed;
  }

  private resolve(handle: WindowHandle): Window {
    const window = this.windows.get(handle.id);
    if (!window) {
      throw new WindowNotFoundError(handle.title);
    }
    return window;
  }

  async findWindow(titlePattern: string | RegExp): Promise<WindowHandle> {
    const windows = await this.listWindows();
    const match = windows.find(({ title }) => matches(title, titlePattern));

    if (!match) {
      const available = windows.map(({ title }) => title);
      this.logger.error('Game window not found', { titlePattern: String(titlePattern), available: available.slice(0, 10) });
      throw new WindowNotFoundError(titlePattern, available);
    }

    await match.window.focus();
    const region = await match.window.region;
    if (region.width < MIN_WINDOW_WIDTH || region.height < MIN_WINDOW_HEIGHT) {
      throw new WindowNotFoundError(titlePattern, [`${match.title} (too small: ${region.width}x${region.height})`]);
    }

    // Only the latest lookup stays resolvable; earlier handles read as invalid
    const id = this.nextId++;
    this.windows.clear();
    this.windows.set(id, match.window);
    this.logger.info('Found window', { title: match.title, id, bounds: region });
    return { id, title: match.title };
  }

  async getRegion(handle: WindowHandle): Promise<Region> {
    const region = await this.resolve(handle).region;
    return {
      x: Math.round(region.left),
      y: Math.round(region.top),
      width: Math.round(region.width),
      height: Math.round(region.height)
    };
  }

  /** A closed window no longer reports its title. */
  async isWindowValid(handle: WindowHandle): Promise<boolean> {
    const window = this.windows.get(handle.id);
    if (!window) return false;
    try {
      return (await window.title).trim() === handle.title;
    } catch {
      this.windows.delete(handle.id);
      return false;
    }
  }
}
