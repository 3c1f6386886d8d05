import * as fs from 'fs';
import { ConfigurationError } from './errors.js';
import { LogLevel, parseLogLevel, defaultLogFile } from './logger.js';
import type { Point, Region, SafetyBounds } from './types.js';

export type BackoffStrategy = 'fixed' | 'exponential';
export type PointerMode = 'drag' | 'move';

export interface OcrConfig {
  /** Minimum confidence (0..1) for an accepted readout. */
  confidenceThreshold: number;
  language: string;
  /** Directory holding `<language>.traineddata`; the recognizer fetches it when unset. */
  langPath?: string;
  /** Where the readout usually sits, relative to the readout region. Breaks confidence ties. */
  expectedLocation?: Point;
}

export interface PreprocessConfig {
  threshold: number;
  /** Game overlays render light text on dark terrain; the recognizer wants the opposite. */
  invert: boolean;
  minHeight: number;
  maxScale: number;
}

export interface PlannerConfig {
  epsilon: number;
  coarseThreshold: number;
  coarseStepSize: number;
  fineStepSize: number;
  fineDamping: number;
  /** Screen pixels per map unit. Negative values flip the drag direction. */
  pixelsPerUnit: number;
}

export interface SafetyConfig {
  maxDeltaPerMove: number;
  maxConsecutiveFailures: number;
  maxAttempts: number;
  maxSessionDurationMs: number;
  allowedRange: { min: number; max: number };
}

export interface BackoffConfig {
  strategy: BackoffStrategy;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

export interface PointerConfig {
  mode: PointerMode;
  /** Pixels per second. */
  speed: number;
}

export interface ScannerConfig {
  windowTitle: string;
  /** Coordinate readout, relative to the window's client area. */
  readoutRegion: Region;
  ocr: OcrConfig;
  preprocess: PreprocessConfig;
  planner: PlannerConfig;
  safety: SafetyConfig;
  backoff: BackoffConfig;
  pointer: PointerConfig;
  settleDelayMs: number;
  logLevel: LogLevel;
  logFile: string | null;
}

export type ScannerConfigOverrides = {
  [K in keyof ScannerConfig]?: ScannerConfig[K] extends Region | Point | string | number | null
    ? ScannerConfig[K]
    : Partial<ScannerConfig[K]>;
};

export const DEFAULT_CONFIG: ScannerConfig = {
  windowTitle: 'Last War-Survival Game',
  readoutRegion: { x: 0, y: 0, width: 240, height: 40 },
  ocr: {
    confidenceThreshold: 0.6,
    language: 'eng'
  },
  preprocess: {
    threshold: 128,
    invert: true,
    minHeight: 48,
    maxScale: 4
  },
  planner: {
    epsilon: 2,
    coarseThreshold: 50,
    coarseStepSize: 400,
    fineStepSize: 40,
    fineDamping: 0.8,
    pixelsPerUnit: 1
  },
  safety: {
    maxDeltaPerMove: 450,
    maxConsecutiveFailures: 5,
    maxAttempts: 50,
    maxSessionDurationMs: 120_000,
    allowedRange: { min: 0, max: 2000 }
  },
  backoff: {
    strategy: 'exponential',
    initialDelayMs: 100,
    maxDelayMs: 2000,
    multiplier: 2
  },
  pointer: {
    mode: 'drag',
    speed: 1500
  },
  settleDelayMs: 500,
  logLevel: LogLevel.INFO,
  logFile: defaultLogFile()
};

type Env = Record<string, string | undefined>;

const SECTIONS = ['readoutRegion', 'ocr', 'preprocess', 'planner', 'safety', 'backoff', 'pointer'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Only the shape is checked here; field values go through validateConfig after merging
function isOverrides(value: unknown): value is ScannerConfigOverrides {
  if (!isRecord(value)) return false;
  return SECTIONS.every((section) => value[section] === undefined || isRecord(value[section]));
}

function readConfigFile(file: string): ScannerConfigOverrides {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (error) {
    throw new ConfigurationError([`cannot read config file ${file}: ${error instanceof Error ? error.message : String(error)}`]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError([`config file ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  if (!isOverrides(parsed)) {
    throw new ConfigurationError([`config file ${file} must contain a JSON object whose sections are objects`]);
  }
  return parsed;
}

function envNumber(env: Env, key: string, problems: string[]): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    problems.push(`${key} must be a number (got "${raw}")`);
    return undefined;
  }
  return value;
}

function envOverrides(env: Env): ScannerConfigOverrides {
  const problems: string[] = [];
  const num = (key: string) => envNumber(env, key, problems);

  const overrides: ScannerConfigOverrides = {
    ocr: {
      confidenceThreshold: num('MAP_SCANNER_OCR_CONFIDENCE'),
      language: env.MAP_SCANNER_OCR_LANGUAGE,
      langPath: env.MAP_SCANNER_OCR_LANG_PATH
    },
    planner: {
      epsilon: num('MAP_SCANNER_EPSILON'),
      coarseThreshold: num('MAP_SCANNER_COARSE_THRESHOLD'),
      coarseStepSize: num('MAP_SCANNER_COARSE_STEP'),
      fineStepSize: num('MAP_SCANNER_FINE_STEP'),
      pixelsPerUnit: num('MAP_SCANNER_PIXELS_PER_UNIT')
    },
    safety: {
      maxDeltaPerMove: num('MAP_SCANNER_MAX_DELTA'),
      maxConsecutiveFailures: num('MAP_SCANNER_MAX_FAILURES'),
      maxAttempts: num('MAP_SCANNER_MAX_ATTEMPTS'),
      maxSessionDurationMs: num('MAP_SCANNER_MAX_DURATION_MS')
    },
    settleDelayMs: num('MAP_SCANNER_SETTLE_MS')
  };

  if (env.MAP_SCANNER_WINDOW) {
    overrides.windowTitle = env.MAP_SCANNER_WINDOW;
  }

  const rangeMin = num('MAP_SCANNER_RANGE_MIN');
  const rangeMax = num('MAP_SCANNER_RANGE_MAX');
  if (rangeMin !== undefined || rangeMax !== undefined) {
    overrides.safety = {
      ...overrides.safety,
      allowedRange: {
        min: rangeMin ?? DEFAULT_CONFIG.safety.allowedRange.min,
        max: rangeMax ?? DEFAULT_CONFIG.safety.allowedRange.max
      }
    };
  }

  const strategy = env.MAP_SCANNER_BACKOFF;
  if (strategy) {
    if (strategy === 'fixed' || strategy === 'exponential') {
      overrides.backoff = { strategy };
    } else {
      problems.push(`MAP_SCANNER_BACKOFF must be "fixed" or "exponential" (got "${strategy}")`);
    }
  }

  if (env.MAP_SCANNER_LOG_LEVEL) {
    const level = parseLogLevel(env.MAP_SCANNER_LOG_LEVEL);
    if (level === undefined) {
      problems.push(`MAP_SCANNER_LOG_LEVEL is not a log level (got "${env.MAP_SCANNER_LOG_LEVEL}")`);
    } else {
      overrides.logLevel = level;
    }
  }

  if (env.MAP_SCANNER_LOG_FILE !== undefined) {
    overrides.logFile = env.MAP_SCANNER_LOG_FILE === '' ? null : env.MAP_SCANNER_LOG_FILE;
  }

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return overrides;
}

function mergeSection<T extends object>(base: T, partial: Partial<T> | undefined): T {
  const merged = { ...base };
  if (!partial) return merged;
  for (const key in partial) {
    const value = partial[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}

export function mergeConfig(base: ScannerConfig, overrides: ScannerConfigOverrides): ScannerConfig {
  return {
    windowTitle: overrides.windowTitle ?? base.windowTitle,
    readoutRegion: overrides.readoutRegion ?? base.readoutRegion,
    ocr: mergeSection(base.ocr, overrides.ocr),
    preprocess: mergeSection(base.preprocess, overrides.preprocess),
    planner: mergeSection(base.planner, overrides.planner),
    safety: mergeSection(base.safety, overrides.safety),
    backoff: mergeSection(base.backoff, overrides.backoff),
    pointer: mergeSection(base.pointer, overrides.pointer),
    settleDelayMs: overrides.settleDelayMs ?? base.settleDelayMs,
    logLevel: overrides.logLevel ?? base.logLevel,
    logFile: overrides.logFile === undefined ? base.logFile : overrides.logFile
  };
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

export function validateConfig(config: ScannerConfig): ScannerConfig {
  const problems: string[] = [];

  const positive = (name: string, value: unknown) => {
    if (!isFiniteNumber(value) || value <= 0) problems.push(`${name} must be a positive number`);
  };
  const nonNegative = (name: string, value: unknown) => {
    if (!isFiniteNumber(value) || value < 0) problems.push(`${name} must be a non-negative number`);
  };
  const integer = (name: string, value: unknown, min: number) => {
    if (!Number.isInteger(value) || (typeof value === 'number' && value < min)) {
      problems.push(`${name} must be an integer >= ${min}`);
    }
  };
  const unit = (name: string, value: unknown, allowZero: boolean) => {
    if (!isFiniteNumber(value) || value > 1 || value < 0 || (!allowZero && value === 0)) {
      problems.push(`${name} must be within ${allowZero ? '[0, 1]' : '(0, 1]'}`);
    }
  };

  if (typeof config.windowTitle !== 'string' || config.windowTitle.trim() === '') {
    problems.push('windowTitle must be a non-empty string');
  }

  const region = config.readoutRegion;
  if (typeof region !== 'object' || region === null) {
    problems.push('readoutRegion is required');
  } else {
    integer('readoutRegion.x', region.x, 0);
    integer('readoutRegion.y', region.y, 0);
    integer('readoutRegion.width', region.width, 1);
    integer('readoutRegion.height', region.height, 1);
  }

  unit('ocr.confidenceThreshold', config.ocr.confidenceThreshold, true);
  if (typeof config.ocr.language !== 'string' || config.ocr.language === '') {
    problems.push('ocr.language must be a non-empty string');
  }
  const prior = config.ocr.expectedLocation;
  if (prior !== undefined && (!isFiniteNumber(prior.x) || !isFiniteNumber(prior.y))) {
    problems.push('ocr.expectedLocation must have numeric x and y');
  }

  integer('preprocess.threshold', config.preprocess.threshold, 0);
  if (config.preprocess.threshold > 255) problems.push('preprocess.threshold must be <= 255');
  if (typeof config.preprocess.invert !== 'boolean') problems.push('preprocess.invert must be a boolean');
  integer('preprocess.minHeight', config.preprocess.minHeight, 1);
  integer('preprocess.maxScale', config.preprocess.maxScale, 1);

  nonNegative('planner.epsilon', config.planner.epsilon);
  positive('planner.coarseThreshold', config.planner.coarseThreshold);
  positive('planner.coarseStepSize', config.planner.coarseStepSize);
  positive('planner.fineStepSize', config.planner.fineStepSize);
  unit('planner.fineDamping', config.planner.fineDamping, false);
  if (!isFiniteNumber(config.planner.pixelsPerUnit) || config.planner.pixelsPerUnit === 0) {
    problems.push('planner.pixelsPerUnit must be a non-zero number');
  }
  if (isFiniteNumber(config.planner.epsilon) && config.planner.epsilon >= config.planner.coarseThreshold) {
    problems.push('planner.epsilon must be smaller than planner.coarseThreshold');
  }

  if (!isFiniteNumber(config.safety.maxDeltaPerMove) || config.safety.maxDeltaPerMove < 1) {
    problems.push('safety.maxDeltaPerMove must be at least 1 pixel');
  }
  integer('safety.maxConsecutiveFailures', config.safety.maxConsecutiveFailures, 0);
  integer('safety.maxAttempts', config.safety.maxAttempts, 1);
  positive('safety.maxSessionDurationMs', config.safety.maxSessionDurationMs);
  const range = config.safety.allowedRange;
  if (typeof range !== 'object' || range === null || !isFiniteNumber(range.min) || !isFiniteNumber(range.max)) {
    problems.push('safety.allowedRange must have numeric min and max');
  } else if (range.min > range.max) {
    problems.push('safety.allowedRange.min must not exceed safety.allowedRange.max');
  }

  if (config.backoff.strategy !== 'fixed' && config.backoff.strategy !== 'exponential') {
    problems.push('backoff.strategy must be "fixed" or "exponential"');
  }
  nonNegative('backoff.initialDelayMs', config.backoff.initialDelayMs);
  nonNegative('backoff.maxDelayMs', config.backoff.maxDelayMs);
  if (!isFiniteNumber(config.backoff.multiplier) || config.backoff.multiplier < 1) {
    problems.push('backoff.multiplier must be >= 1');
  }

  if (config.pointer.mode !== 'drag' && config.pointer.mode !== 'move') {
    problems.push('pointer.mode must be "drag" or "move"');
  }
  positive('pointer.speed', config.pointer.speed);
  nonNegative('settleDelayMs', config.settleDelayMs);

  if (problems.length > 0) {
    throw new ConfigurationError(problems);
  }
  return config;
}

/**
 * Builds the scanner configuration from defaults, the JSON file named by
 * `MAP_SCANNER_CONFIG`, `MAP_SCANNER_*` variables and explicit overrides,
 * in that order of precedence (last wins).
 */
export function loadConfig(env: Env = process.env, overrides: ScannerConfigOverrides = {}): ScannerConfig {
  let config = DEFAULT_CONFIG;

  if (env.MAP_SCANNER_CONFIG) {
    config = mergeConfig(config, readConfigFile(env.MAP_SCANNER_CONFIG));
  }
  config = mergeConfig(config, envOverrides(env));
  config = mergeConfig(config, overrides);

  return validateConfig(config);
}

export function toSafetyBounds(config: ScannerConfig): SafetyBounds {
  return Object.freeze({
    maxDeltaPerMove: config.safety.maxDeltaPerMove,
    maxConsecutiveFailures: config.safety.maxConsecutiveFailures,
    maxAttempts: config.safety.maxAttempts,
    maxSessionDurationMs: config.safety.maxSessionDurationMs,
    allowedRange: Object.freeze({ ...config.safety.allowedRange })
  });
}
