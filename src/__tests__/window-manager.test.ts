/**
 * Window Manager Tests
 *
 * Tests for title matching, the minimum window size and handle validity,
 * against a stubbed window list.
 */

import { WindowNotFoundError } from '../errors.js';
import { WindowManager } from '../window-manager.js';
import { silentLogger } from './helpers/fakes.js';

class MockWindow {
  closed = false;
  focus = jest.fn(async () => undefined);

  constructor(
    private readonly name: string,
    private readonly bounds = { left: 10.4, top: 20, width: 1280, height: 720 }
  ) {}

  get title(): Promise<string> {
    return this.closed ? Promise.reject(new Error('window closed')) : Promise.resolve(this.name);
  }

  get region(): Promise<{ left: number; top: number; width: number; height: number }> {
    return Promise.resolve(this.bounds);
  }
}

let mockWindows: MockWindow[] = [];

jest.mock('@nut-tree-fork/nut-js', () => ({
  getWindows: async () => mockWindows
}));

describe('WindowManager', () => {
  let game: MockWindow;

  beforeEach(() => {
    game = new MockWindow('Test Game - Map');
    mockWindows = [new MockWindow('Terminal'), new MockWindow('  '), game];
  });

  it('should find and focus the first window whose title matches', async () => {
    const windows = new WindowManager(silentLogger());

    const handle = await windows.findWindow('Test Game');

    expect(handle).toEqual({ id: 1, title: 'Test Game - Map' });
    expect(game.focus).toHaveBeenCalledTimes(1);
    expect(await windows.getRegion(handle)).toEqual({ x: 10, y: 20, width: 1280, height: 720 });
  });

  it('should match a regular expression', async () => {
    const handle = await new WindowManager(silentLogger()).findWindow(/^test game/i);
    expect(handle.title).toBe('Test Game - Map');
  });

  it('should list the available titles when nothing matches', async () => {
    const lookup = new WindowManager(silentLogger()).findWindow('Other Game');

    await expect(lookup).rejects.toThrow(WindowNotFoundError);
    await expect(lookup).rejects.toThrow(
      'Could not find window with title matching Other Game (available: Terminal, Test Game - Map)'
    );
  });

  it('should refuse a window below the minimum size', async () => {
    mockWindows = [new MockWindow('Test Game', { left: 0, top: 0, width: 400, height: 720 })];

    await expect(new WindowManager(silentLogger()).findWindow('Test Game')).rejects.toThrow(
      'Could not find window with title matching Test Game (available: Test Game (too small: 400x720))'
    );
  });

  it('should keep only the latest handle resolvable', async () => {
    const windows = new WindowManager(silentLogger());

    const first = await windows.findWindow('Test Game');
    const second = await windows.findWindow('Test Game');

    expect(second.id).toBe(2);
    expect(await windows.isWindowValid(first)).toBe(false);
    expect(await windows.isWindowValid(second)).toBe(true);
    await expect(windows.getRegion(first)).rejects.toThrow(WindowNotFoundError);
  });

  it('should report a closed window as invalid', async () => {
    const windows = new WindowManager(silentLogger());
    const handle = await windows.findWindow('Test Game');

    game.closed = true;

    expect(await windows.isWindowValid(handle)).toBe(false);
    await expect(windows.getRegion(handle)).rejects.toThrow(WindowNotFoundError);
  });
});
