import { toSafetyBounds, validateConfig, type ScannerConfig } from './config.js';
import { CorrectionPlanner, distanceBetween } from './correction-planner.js';
import {
  InvalidRegionError,
  RecognitionUnavailableError,
  toError,
  type ScannerError,
  type ScannerErrorCode
} from './errors.js';
import { ImagePreprocessor } from './image-preprocessor.js';
import type { Logger } from './logger.js';
import type { OcrEngine } from './ocr-engine.js';
import { SafetyGuard } from './safety-guard.js';
import { backoffDelay, systemClock } from './timing.js';
import type {
  AbortCode,
  Clock,
  Coordinate,
  Frame,
  FrameSource,
  PointerDevice,
  Region,
  Result,
  SafetyBounds,
  SafetyViolation,
  ScanState,
  SessionResult,
  TargetCoordinate,
  WindowHandle,
  WindowLocator
} from './types.js';

export interface MapScannerOptions {
  config: ScannerConfig;
  logger: Logger;
  window: WindowLocator;
  capture: FrameSource;
  pointer: PointerDevice;
  ocr: OcrEngine;
  preprocessor?: ImagePreprocessor;
  planner?: CorrectionPlanner;
  guard?: SafetyGuard;
  clock?: Clock;
}

export interface ScanOptions {
  /** Checked between steps; an aborted signal ends the session without further input. */
  signal?: AbortSignal;
}

export interface ReadoutFailure {
  code: AbortCode | ScannerErrorCode;
  message: string;
}

export const ABORT_REASONS: Record<Exclude<AbortCode, SafetyViolation['code']>, string> = {
  CANCELLED: 'scan cancelled',
  SESSION_ACTIVE: 'another scan session is active',
  WINDOW_NOT_FOUND: 'game window not found',
  WINDOW_LOST: 'game window lost',
  CAPTURE_FAILURES: 'capture failure limit exceeded',
  EXTRACTION_FAILURES: 'extraction failure limit exceeded',
  INVALID_REGION: 'readout region outside captured frame',
  INPUT_FAILED: 'pointer input failed',
  INTERNAL_ERROR: 'unexpected scanner error'
};

class ScanSession {
  state: ScanState = 'Idle';
  attempts = 0;
  captureFailures = 0;
  extractionFailures = 0;
  handle: WindowHandle | null = null;
  region: Region | null = null;
  lastCoordinate: Coordinate | null = null;
  bestCoordinate: Coordinate | null = null;
  private bestDistance = Infinity;

  constructor(
    readonly target: TargetCoordinate,
    readonly startedAt: number
  ) {}

  record(coordinate: Coordinate): void {
    this.lastCoordinate = coordinate;
    const distance = distanceBetween(coordinate, this.target);
    if (distance < this.bestDistance) {
      this.bestDistance = distance;
      this.bestCoordinate = coordinate;
    }
  }
}

type Extraction = Result<Coordinate, ScannerError>;

interface Capture {
  frame: Frame;
  /** Window region the frame was taken from, in screen pixels. */
  region: Region;
}

/**
 * Drives one scan session at a time:
 * Idle -> Capturing -> Extracting -> Validating -> Correcting -> Capturing ...
 * until Converged, Exhausted or Aborted.
 *
 * `scan` never rejects; every failure ends up in the returned SessionResult.
 */
export class MapScanner {
  readonly bounds: SafetyBounds;
  private readonly config: ScannerConfig;
  private readonly logger: Logger;
  private readonly window: WindowLocator;
  private readonly capture: FrameSource;
  private readonly pointer: PointerDevice;
  private readonly ocr: OcrEngine;
  private readonly preprocessor: ImagePreprocessor;
  private readonly planner: CorrectionPlanner;
  private readonly guard: SafetyGuard;
  private readonly clock: Clock;
  private active = false;

  constructor(options: MapScannerOptions) {
    this.config = validateConfig(options.config);
    this.bounds = toSafetyBounds(this.config);
    this.logger = options.logger;
    this.window = options.window;
    this.capture = options.capture;
    this.pointer = options.pointer;
    this.ocr = options.ocr;
    this.preprocessor = options.preprocessor ?? new ImagePreprocessor(this.config.preprocess);
    this.planner = options.planner ?? new CorrectionPlanner(this.config.planner);
    this.guard = options.guard ?? new SafetyGuard();
    this.clock = options.clock ?? systemClock;
  }

  isActive(): boolean {
    return this.active;
  }

  async scan(target: TargetCoordinate, options: ScanOptions = {}): Promise<SessionResult> {
    const session = new ScanSession(Object.freeze({ x: target.x, y: target.y }), this.clock.now());

    if (this.active) {
      this.logger.warn('Scan rejected: another session is active', { target });
      return this.abort(session, 'SESSION_ACTIVE', ABORT_REASONS.SESSION_ACTIVE);
    }

    this.active = true;
    this.logger.logSessionEvent('scan started', { target, bounds: this.bounds });
    try {
      return await this.run(session, options.signal);
    } catch (error) {
      const err = toError(error);
      this.logger.error('Scan loop failed unexpectedly', { state: session.state }, err);
      return this.abort(session, 'INTERNAL_ERROR', `${ABORT_REASONS.INTERNAL_ERROR}: ${err.message}`);
    } finally {
      this.active = false;
    }
  }

  /**
   * One capture and readout without moving the pointer. Useful for checking
   * the readout region and OCR settings against the live window.
   */
  async readCoordinate(): Promise<Result<Coordinate, ReadoutFailure>> {
    if (this.active) {
      return { ok: false, error: { code: 'SESSION_ACTIVE', message: ABORT_REASONS.SESSION_ACTIVE } };
    }

    this.active = true;
    try {
      let handle: WindowHandle;
      let region: Region;
      try {
        handle = await this.window.findWindow(this.config.windowTitle);
        region = await this.window.getRegion(handle);
      } catch (error) {
        return { ok: false, error: { code: 'WINDOW_NOT_FOUND', message: errorMessage(error) } };
      }

      let frame: Frame;
      try {
        frame = await this.capture.capture(handle, region);
      } catch (error) {
        return { ok: false, error: { code: 'CAPTURE_FAILED', message: errorMessage(error) } };
      }

      const readout = await this.extract(frame);
      if (!readout.ok) {
        return { ok: false, error: { code: readout.error.code, message: readout.error.message } };
      }

      const check = this.guard.checkCoordinate(readout.value, this.bounds);
      if (!check.ok) {
        return { ok: false, error: { code: check.violation.code, message: check.violation.message } };
      }

      this.logger.info('Readout', { x: readout.value.x, y: readout.value.y, confidence: readout.value.confidence });
      return readout;
    } finally {
      this.active = false;
    }
  }

  private async run(session: ScanSession, signal?: AbortSignal): Promise<SessionResult> {
    const { x, y } = session.target;
    if (!Number.isFinite(x) || !Number.isFinite(y) || !this.guard.checkCoordinate(session.target, this.bounds).ok) {
      return this.abort(
        session,
        'COORDINATE_OUT_OF_RANGE',
        `target (${x}, ${y}) outside allowed range [${this.bounds.allowedRange.min}, ${this.bounds.allowedRange.max}]`
      );
    }

    try {
      session.handle = await this.window.findWindow(this.config.windowTitle);
      session.region = await this.window.getRegion(session.handle);
    } catch (error) {
      this.logger.error('Window lookup failed', { windowTitle: this.config.windowTitle, error: errorMessage(error) });
      return this.abort(session, 'WINDOW_NOT_FOUND', ABORT_REASONS.WINDOW_NOT_FOUND);
    }

    while (true) {
      if (signal?.aborted) {
        return this.abort(session, 'CANCELLED', ABORT_REASONS.CANCELLED);
      }
      const elapsed = this.guard.checkElapsed(this.elapsed(session), this.bounds);
      if (!elapsed.ok) {
        return this.abortForViolation(session, elapsed.violation);
      }
      if (session.handle && !(await this.windowStillValid(session.handle))) {
        this.logger.error('Game window closed or changed during the scan', { handle: session.handle });
        return this.abort(session, 'WINDOW_LOST', ABORT_REASONS.WINDOW_LOST);
      }

      this.transition(session, 'Capturing');
      const captured = await this.captureFrame(session);
      if (!captured.ok) {
        session.captureFailures++;
        this.logger.warn('Capture failed', { failures: session.captureFailures, error: captured.error.message });
        if (!this.guard.checkFailures(session.captureFailures, this.bounds).ok) {
          return this.abort(session, 'CAPTURE_FAILURES', ABORT_REASONS.CAPTURE_FAILURES);
        }
        await this.clock.sleep(backoffDelay(this.config.backoff, session.captureFailures), signal);
        continue;
      }
      session.captureFailures = 0;
      const { frame, region } = captured.value;

      if (signal?.aborted) {
        return this.abort(session, 'CANCELLED', ABORT_REASONS.CANCELLED);
      }

      this.transition(session, 'Extracting');
      const readout = await this.extract(frame);
      if (!readout.ok) {
        if (readout.error instanceof InvalidRegionError) {
          this.logger.error('Readout region does not fit the captured window', {
            readoutRegion: this.config.readoutRegion,
            frame: { width: frame.width, height: frame.height }
          });
          return this.abort(session, 'INVALID_REGION', ABORT_REASONS.INVALID_REGION);
        }

        session.extractionFailures++;
        this.logger.warn('Readout extraction failed', {
          failures: session.extractionFailures,
          code: readout.error.code,
          error: readout.error.message
        });
        if (!this.guard.checkFailures(session.extractionFailures, this.bounds).ok) {
          return this.abort(session, 'EXTRACTION_FAILURES', ABORT_REASONS.EXTRACTION_FAILURES);
        }
        // Re-capture: a stale frame is the usual culprit
        await this.clock.sleep(backoffDelay(this.config.backoff, session.extractionFailures), signal);
        continue;
      }
      session.extractionFailures = 0;
      const coordinate = readout.value;

      this.transition(session, 'Validating', { x: coordinate.x, y: coordinate.y, confidence: coordinate.confidence });
      const valid = this.guard.checkCoordinate(coordinate, this.bounds);
      if (!valid.ok) {
        return this.abortForViolation(session, valid.violation);
      }
      session.record(coordinate);

      this.transition(session, 'Correcting');
      const outcome = this.planner.plan(coordinate, session.target, this.bounds, session.attempts + 1);
      if (outcome.converged) {
        return this.finish(session, { outcome: 'Converged', coordinate });
      }

      if (session.attempts >= this.bounds.maxAttempts) {
        return this.finish(session, { outcome: 'Exhausted' });
      }

      const movement = this.guard.checkMovement(outcome.plan, this.bounds);
      if (!movement.ok) {
        return this.abortForViolation(session, movement.violation);
      }

      if (signal?.aborted) {
        return this.abort(session, 'CANCELLED', ABORT_REASONS.CANCELLED);
      }

      try {
        await this.pointer.moveBy({ x: outcome.plan.dx, y: outcome.plan.dy }, region);
      } catch (error) {
        this.logger.error('Pointer movement failed', { plan: outcome.plan, error: errorMessage(error) });
        return this.abort(session, 'INPUT_FAILED', ABORT_REASONS.INPUT_FAILED);
      }
      session.attempts++;
      this.logger.debug('Correction issued', { ...outcome.plan, distance: outcome.distance });

      await this.clock.sleep(this.config.settleDelayMs, signal);
    }
  }

  private async captureFrame(session: ScanSession): Promise<Result<Capture, Error>> {
    try {
      let handle = session.handle;
      let region = session.region;
      if (!handle || !region) {
        handle = await this.window.findWindow(this.config.windowTitle);
        region = await this.window.getRegion(handle);
        session.handle = handle;
        session.region = region;
        this.logger.info('Window re-acquired', { handle, region });
      }
      return { ok: true, value: { frame: await this.capture.capture(handle, region), region } };
    } catch (error) {
      const err = toError(error);
      if (session.handle && !(await this.windowStillValid(session.handle))) {
        this.logger.warn('Window handle no longer valid', { handle: session.handle });
        session.handle = null;
        session.region = null;
      }
      return { ok: false, error: err };
    }
  }

  private async windowStillValid(handle: WindowHandle): Promise<boolean> {
    try {
      return await this.window.isWindowValid(handle);
    } catch (error) {
      this.logger.debug('Window validity check failed', { error: errorMessage(error) });
      return false;
    }
  }

  private async extract(frame: Frame): Promise<Extraction> {
    try {
      const prepared = await this.preprocessor.prepare(frame, this.config.readoutRegion);
      if (!prepared.ok) return prepared;

      const recognized = await this.ocr.recognize(prepared.value);
      if (!recognized.ok) return recognized;

      return this.ocr.parseCoordinate(recognized.value);
    } catch (error) {
      return { ok: false, error: new RecognitionUnavailableError('Readout extraction failed', error) };
    }
  }

  private transition(session: ScanSession, next: ScanState, details?: Record<string, unknown>): void {
    this.logger.logStateTransition(session.state, next, { attempt: session.attempts, ...details });
    session.state = next;
  }

  private elapsed(session: ScanSession): number {
    return this.clock.now() - session.startedAt;
  }

  private abortForViolation(session: ScanSession, violation: SafetyViolation): SessionResult {
    this.logger.error(`Safety violation: ${violation.message}`, { code: violation.code, ...violation.details });
    return this.abort(session, violation.code, violation.message);
  }

  private abort(session: ScanSession, code: AbortCode, reason: string): SessionResult {
    return this.finish(session, { outcome: 'Aborted', code, reason });
  }

  private finish(
    session: ScanSession,
    end:
      | { outcome: 'Converged'; coordinate: Coordinate }
      | { outcome: 'Exhausted' }
      | { outcome: 'Aborted'; code: AbortCode; reason: string }
  ): SessionResult {
    this.transition(session, end.outcome);
    const progress = {
      attempts: session.attempts,
      elapsedMs: this.elapsed(session),
      lastCoordinate: session.lastCoordinate,
      bestCoordinate: session.bestCoordinate
    };
    const result: SessionResult = { ...end, ...progress };

    this.logger.logSessionEvent(`scan ${end.outcome.toLowerCase()}`, {
      target: session.target,
      attempts: progress.attempts,
      elapsedMs: progress.elapsedMs,
      ...(end.outcome === 'Aborted' ? { code: end.code, reason: end.reason } : {}),
      last: progress.lastCoordinate ? { x: progress.lastCoordinate.x, y: progress.lastCoordinate.y } : null
    });
    return result;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
