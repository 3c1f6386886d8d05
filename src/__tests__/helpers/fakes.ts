/**
 * In-process stand-ins for the window, screen, pointer and recognizer.
 *
 * SimulatedMap is the shared world: the pointer fake moves it, the OCR fake
 * reads it back as readout text.
 */

import { loadConfig, type OcrConfig, type ScannerConfig, type ScannerConfigOverrides } from '../../config.js';
import { RecognitionUnavailableError, WindowNotFoundError } from '../../errors.js';
import { Logger } from '../../logger.js';
import { OcrEngine } from '../../ocr-engine.js';
import type {
  Clock,
  Frame,
  FrameSource,
  OcrResult,
  Point,
  PointerDevice,
  PreprocessedImage,
  Region,
  Result,
  WindowHandle,
  WindowLocator
} from '../../types.js';

export const FRAME_WIDTH = 8;
export const FRAME_HEIGHT = 4;

export function silentLogger(): Logger {
  return new Logger({ logFile: null, console: false });
}

/** Small-frame scanner config; `overrides` are applied on top. */
export function testConfig(overrides: ScannerConfigOverrides = {}): ScannerConfig {
  return loadConfig(
    {},
    {
      readoutRegion: { x: 0, y: 0, width: FRAME_WIDTH, height: FRAME_HEIGHT },
      preprocess: { minHeight: FRAME_HEIGHT },
      settleDelayMs: 10,
      logFile: null,
      ...overrides,
      safety: { maxDeltaPerMove: 100, maxConsecutiveFailures: 3, ...overrides.safety }
    }
  );
}

/** Left half black, right half white. */
export function splitFrame(width = FRAME_WIDTH, height = FRAME_HEIGHT): Frame {
  const data = Buffer.alloc(width * height * 3);
  for (let y = 0; y < height; y++) {
    for (let x = width / 2; x < width; x++) {
      data.fill(255, (y * width + x) * 3, (y * width + x) * 3 + 3);
    }
  }
  return { width, height, channels: 3, data, capturedAt: 0 };
}

export class SimulatedMap {
  position: Point;

  constructor(start: Point) {
    this.position = { ...start };
  }
}

export class FakeClock implements Clock {
  time = 0;
  readonly sleeps: number[] = [];

  now(): number {
    return this.time;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.time += ms;
  }
}

export class FakeWindow implements WindowLocator {
  findCalls = 0;
  validityChecks = 0;
  valid = true;
  missing = false;
  /** Answers for upcoming validity checks, one per call; `valid` once empty. */
  readonly validity: boolean[] = [];

  async findWindow(titlePattern: string | RegExp): Promise<WindowHandle> {
    this.findCalls++;
    if (this.missing) {
      throw new WindowNotFoundError(titlePattern, ['Some Other Window']);
    }
    return { id: this.findCalls, title: 'Test Game' };
  }

  async getRegion(): Promise<Region> {
    return { x: 0, y: 0, width: FRAME_WIDTH, height: FRAME_HEIGHT };
  }

  async isWindowValid(): Promise<boolean> {
    this.validityChecks++;
    return this.validity.shift() ?? this.valid;
  }
}

export class FakeCapture implements FrameSource {
  calls = 0;
  /** Number of upcoming captures that throw. */
  failures = 0;

  constructor(private readonly frame: Frame = splitFrame()) {}

  async capture(): Promise<Frame> {
    this.calls++;
    if (this.failures > 0) {
      this.failures--;
      throw new Error('screen grab failed');
    }
    return this.frame;
  }
}

export class FakePointer implements PointerDevice {
  readonly moves: Point[] = [];
  readonly regions: Region[] = [];
  error: Error | null = null;
  onMove: ((vector: Point) => void) | null = null;

  constructor(private readonly map: SimulatedMap) {}

  async moveBy(vector: Point, within: Region): Promise<void> {
    if (this.error) throw this.error;
    this.moves.push({ ...vector });
    this.regions.push({ ...within });
    this.map.position = { x: this.map.position.x + vector.x, y: this.map.position.y + vector.y };
    this.onMove?.(vector);
  }
}

type Reading = OcrResult | RecognitionUnavailableError;

/**
 * Reads the simulated map as `"x, y"`. `script` entries, when present, are
 * returned first, one per call.
 */
export class FakeOcrEngine extends OcrEngine {
  calls = 0;
  confidence = 0.95;
  readonly script: Reading[] = [];
  readonly images: PreprocessedImage[] = [];

  constructor(
    config: OcrConfig,
    private readonly map: SimulatedMap
  ) {
    super(config);
  }

  async recognize(image: PreprocessedImage): Promise<Result<OcrResult, RecognitionUnavailableError>> {
    this.calls++;
    this.images.push(image);
    const next = this.script.shift();
    if (next instanceof RecognitionUnavailableError) {
      return { ok: false, error: next };
    }
    if (next) {
      return { ok: true, value: next };
    }
    const { x, y } = this.map.position;
    return {
      ok: true,
      value: [{ text: `${x}, ${y}`, confidence: this.confidence, bounds: { x: 0, y: 0, width: 8, height: 4 } }]
    };
  }
}

export function garbage(text = '~~ ##'): OcrResult {
  return reading(text, 0.9);
}

export function reading(text: string, confidence = 0.95): OcrResult {
  return [{ text, confidence, bounds: { x: 0, y: 0, width: 8, height: 4 } }];
}
