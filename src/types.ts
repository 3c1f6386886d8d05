import type { ScannerError } from './errors.js';

export interface Point {
  x: number;
  y: number;
}

export interface Region {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * Raw pixels of one capture. Interleaved, 8 bits per channel, row-major.
 * Nothing downstream writes to `data`.
 */
export interface Frame {
  readonly width: number;
  readonly height: number;
  readonly channels: 1 | 2 | 3 | 4;
  readonly data: Buffer;
  readonly capturedAt: number;
}

export interface PreprocessedImage {
  readonly width: number;
  readonly height: number;
  readonly channels: 1 | 2 | 3 | 4;
  readonly data: Buffer;
  /** Region of the originating frame the image was cut from. */
  readonly source: Readonly<Region>;
  /** Upscale factor applied after cropping. */
  readonly scale: number;
}

export interface OcrCandidate {
  text: string;
  /** 0..1 */
  confidence: number;
  bounds: Region;
}

/** Candidates in the recognizer's own ranking order. */
export type OcrResult = readonly OcrCandidate[];

export interface Coordinate extends Point {
  readonly confidence: number;
  readonly text: string;
}

export type TargetCoordinate = Readonly<Point>;

export type MovementMode = 'coarse' | 'fine';

export interface MovementPlan {
  dx: number;
  dy: number;
  mode: MovementMode;
  attempt: number;
}

export type PlanOutcome =
  | { converged: true; distance: number }
  | { converged: false; distance: number; plan: MovementPlan };

export interface SafetyBounds {
  readonly maxDeltaPerMove: number;
  readonly maxConsecutiveFailures: number;
  readonly maxAttempts: number;
  readonly maxSessionDurationMs: number;
  readonly allowedRange: Readonly<{ min: number; max: number }>;
}

export type Result<T, E = ScannerError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type SafetyViolationCode =
  | 'COORDINATE_OUT_OF_RANGE'
  | 'MOVEMENT_TOO_LARGE'
  | 'FAILURE_LIMIT'
  | 'SESSION_TIMEOUT';

export interface SafetyViolation {
  code: SafetyViolationCode;
  message: string;
  details?: Record<string, unknown>;
}

export type SafetyCheck = { ok: true } | { ok: false; violation: SafetyViolation };

export type ScanState =
  | 'Idle'
  | 'Capturing'
  | 'Extracting'
  | 'Validating'
  | 'Correcting'
  | 'Converged'
  | 'Exhausted'
  | 'Aborted';

export type AbortCode =
  | 'CANCELLED'
  | 'SESSION_ACTIVE'
  | 'WINDOW_NOT_FOUND'
  | 'WINDOW_LOST'
  | 'CAPTURE_FAILURES'
  | 'EXTRACTION_FAILURES'
  | 'INVALID_REGION'
  | 'INPUT_FAILED'
  | 'INTERNAL_ERROR'
  | SafetyViolationCode;

interface SessionProgress {
  attempts: number;
  elapsedMs: number;
  lastCoordinate: Coordinate | null;
  bestCoordinate: Coordinate | null;
}

export type SessionResult =
  | ({ outcome: 'Converged'; coordinate: Coordinate } & SessionProgress)
  | ({ outcome: 'Exhausted' } & SessionProgress)
  | ({ outcome: 'Aborted'; code: AbortCode; reason: string } & SessionProgress);

// External collaborators

export interface WindowHandle {
  id: number;
  title: string;
}

export interface WindowLocator {
  findWindow(titlePattern: string | RegExp): Promise<WindowHandle>;
  getRegion(handle: WindowHandle): Promise<Region>;
  isWindowValid(handle: WindowHandle): Promise<boolean>;
}

export interface FrameSource {
  capture(handle: WindowHandle, region: Region): Promise<Frame>;
}

export interface PointerDevice {
  /** Moves by `vector` starting from the centre of `within` (screen pixels), never leaving it. */
  moveBy(vector: Point, within: Region): Promise<void>;
}

export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
