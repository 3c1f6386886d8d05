export type ScannerErrorCode =
  | 'CONFIGURATION'
  | 'INVALID_REGION'
  | 'RECOGNITION_UNAVAILABLE'
  | 'COORDINATE_PARSE'
  | 'LOW_CONFIDENCE'
  | 'WINDOW_NOT_FOUND'
  | 'CAPTURE_FAILED'
  | 'INPUT_FAILED';

export class ScannerError extends Error {
  readonly code: ScannerErrorCode;

  constructor(code: ScannerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends ScannerError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('CONFIGURATION', `Invalid scanner configuration:\n- ${problems.join('\n- ')}`);
    this.problems = problems;
  }
}

export class InvalidRegionError extends ScannerError {
  constructor(message: string) {
    super('INVALID_REGION', message);
  }
}

export class RecognitionUnavailableError extends ScannerError {
  constructor(message: string, cause?: unknown) {
    super('RECOGNITION_UNAVAILABLE', message, { cause });
  }
}

export class CoordinateParseError extends ScannerError {
  readonly candidates: string[];

  constructor(candidates: string[]) {
    super(
      'COORDINATE_PARSE',
      candidates.length === 0
        ? 'No text recognized in readout region'
        : `No coordinate found in: ${candidates.map((c) => JSON.stringify(c)).join(', ')}`
    );
    this.candidates = candidates;
  }
}

export class LowConfidenceError extends ScannerError {
  readonly text: string;
  readonly confidence: number;
  readonly threshold: number;

  constructor(text: string, confidence: number, threshold: number) {
    super(
      'LOW_CONFIDENCE',
      `Coordinate "${text}" read with confidence ${confidence.toFixed(2)} (< ${threshold.toFixed(2)})`
    );
    this.text = text;
    this.confidence = confidence;
    this.threshold = threshold;
  }
}

export class WindowNotFoundError extends ScannerError {
  constructor(pattern: string | RegExp, available: string[] = []) {
    const sample = available.slice(0, 10).join(', ');
    super(
      'WINDOW_NOT_FOUND',
      `Could not find window with title matching ${String(pattern)}${sample ? ` (available: ${sample})` : ''}`
    );
  }
}

export class CaptureError extends ScannerError {
  constructor(message: string, cause?: unknown) {
    super('CAPTURE_FAILED', message, { cause });
  }
}

export class InputError extends ScannerError {
  constructor(message: string, cause?: unknown) {
    super('INPUT_FAILED', message, { cause });
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
