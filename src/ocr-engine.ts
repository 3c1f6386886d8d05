import type { OcrConfig } from './config.js';
import { CoordinateParseError, LowConfidenceError, RecognitionUnavailableError } from './errors.js';
import type { Coordinate, OcrCandidate, OcrResult, Point, PreprocessedImage, Region, Result } from './types.js';

/** Two signed integers of up to six digits separated by a comma. */
export const COORDINATE_PATTERN = /^\s*(-?\d{1,6})\s*,\s*(-?\d{1,6})\s*$/;

export type ParseError = CoordinateParseError | LowConfidenceError;

function toInt(digits: string): number {
  const value = parseInt(digits, 10);
  // "-0" reads as 0
  return value === 0 ? 0 : value;
}

export function matchCoordinate(text: string): Point | null {
  const match = COORDINATE_PATTERN.exec(text);
  if (!match) return null;
  return { x: toInt(match[1]), y: toInt(match[2]) };
}

function centerDistance(bounds: Region, point: Point): number {
  const cx = bounds.x + bounds.width / 2;
  const cy = bounds.y + bounds.height / 2;
  return Math.hypot(cx - point.x, cy - point.y);
}

/**
 * Candidates by descending confidence. Equal confidences go to the candidate
 * nearest the expected readout location, then to the recognizer's order.
 */
export function rankCandidates(result: OcrResult, expectedLocation?: Point): OcrCandidate[] {
  return result
    .map((candidate, index) => ({
      candidate,
      index,
      distance: expectedLocation ? centerDistance(candidate.bounds, expectedLocation) : 0
    }))
    .sort((a, b) => b.candidate.confidence - a.candidate.confidence || a.distance - b.distance || a.index - b.index)
    .map(({ candidate }) => candidate);
}

/**
 * A text recognizer plus the coordinate readout grammar. Implementations
 * supply `recognize`; they are picked when the scanner is built.
 */
export abstract class OcrEngine {
  constructor(protected readonly config: OcrConfig) {}

  abstract recognize(image: PreprocessedImage): Promise<Result<OcrResult, RecognitionUnavailableError>>;

  /** Releases recognizer resources. */
  async terminate(): Promise<void> {}

  parseCoordinate(result: OcrResult): Result<Coordinate, ParseError> {
    for (const candidate of rankCandidates(result, this.config.expectedLocation)) {
      const point = matchCoordinate(candidate.text);
      if (!point) continue;

      if (candidate.confidence < this.config.confidenceThreshold) {
        return {
          ok: false,
          error: new LowConfidenceError(candidate.text.trim(), candidate.confidence, this.config.confidenceThreshold)
        };
      }

      return {
        ok: true,
        value: { x: point.x, y: point.y, confidence: candidate.confidence, text: candidate.text.trim() }
      };
    }

    return { ok: false, error: new CoordinateParseError(result.map((candidate) => candidate.text)) };
  }
}
