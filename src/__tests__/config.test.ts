/**
 * Configuration Tests
 *
 * Tests for defaults, the JSON config file, MAP_SCANNER_* variables and validation.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CONFIG, loadConfig, mergeConfig, toSafetyBounds, validateConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { LogLevel } from '../logger.js';

function problemsOf(load: () => unknown): string[] {
  try {
    load();
  } catch (error) {
    if (error instanceof ConfigurationError) return error.problems;
    throw error;
  }
  throw new Error('expected a ConfigurationError');
}

describe('Scanner configuration', () => {
  let tmpDir: string;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'map-scanner-config-'));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('loadConfig', () => {
    it('should return the defaults for an empty environment', () => {
      expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('should read numeric overrides from the environment', () => {
      const config = loadConfig({ MAP_SCANNER_MAX_DELTA: '300', MAP_SCANNER_OCR_CONFIDENCE: '0.75' });
      expect(config.safety).toEqual({ ...DEFAULT_CONFIG.safety, maxDeltaPerMove: 300 });
      expect(config.ocr.confidenceThreshold).toBe(0.75);
    });

    it('should ignore blank variables', () => {
      expect(loadConfig({ MAP_SCANNER_MAX_DELTA: '  ' }).safety.maxDeltaPerMove).toBe(450);
    });

    it('should build the allowed range from either bound', () => {
      expect(loadConfig({ MAP_SCANNER_RANGE_MAX: '5000' }).safety.allowedRange).toEqual({ min: 0, max: 5000 });
    });

    it('should read the window title, backoff strategy and log settings', () => {
      const config = loadConfig({
        MAP_SCANNER_WINDOW: 'Test Window',
        MAP_SCANNER_BACKOFF: 'fixed',
        MAP_SCANNER_LOG_LEVEL: 'debug',
        MAP_SCANNER_LOG_FILE: ''
      });
      expect(config.windowTitle).toBe('Test Window');
      expect(config.backoff).toEqual({ ...DEFAULT_CONFIG.backoff, strategy: 'fixed' });
      expect(config.logLevel).toBe(LogLevel.DEBUG);
      expect(config.logFile).toBeNull();
    });

    it('should report every malformed variable at once', () => {
      expect(
        problemsOf(() =>
          loadConfig({ MAP_SCANNER_MAX_DELTA: 'abc', MAP_SCANNER_BACKOFF: 'linear', MAP_SCANNER_LOG_LEVEL: 'loud' })
        )
      ).toEqual([
        'MAP_SCANNER_MAX_DELTA must be a number (got "abc")',
        'MAP_SCANNER_BACKOFF must be "fixed" or "exponential" (got "linear")',
        'MAP_SCANNER_LOG_LEVEL is not a log level (got "loud")'
      ]);
    });

    it('should let explicit overrides win over the environment', () => {
      const config = loadConfig({ MAP_SCANNER_MAX_ATTEMPTS: '10' }, { safety: { maxAttempts: 20 } });
      expect(config.safety.maxAttempts).toBe(20);
    });

    it('should merge the JSON config file under the environment', () => {
      const file = path.join(tmpDir, 'scanner.json');
      fs.writeFileSync(file, JSON.stringify({ windowTitle: 'File Window', safety: { maxAttempts: 7, maxDeltaPerMove: 200 } }));

      const config = loadConfig({ MAP_SCANNER_CONFIG: file, MAP_SCANNER_MAX_DELTA: '150' });

      expect(config.windowTitle).toBe('File Window');
      expect(config.safety.maxAttempts).toBe(7);
      expect(config.safety.maxDeltaPerMove).toBe(150);
      expect(config.safety.maxConsecutiveFailures).toBe(5);
    });

    it('should reject a config file that is not JSON', () => {
      const file = path.join(tmpDir, 'broken.json');
      fs.writeFileSync(file, '{ not json');
      const problems = problemsOf(() => loadConfig({ MAP_SCANNER_CONFIG: file }));
      expect(problems).toHaveLength(1);
      expect(problems[0]).toContain('is not valid JSON');
    });

    it('should reject a config file whose sections are not objects', () => {
      const file = path.join(tmpDir, 'flat.json');
      fs.writeFileSync(file, JSON.stringify({ safety: 3 }));
      expect(problemsOf(() => loadConfig({ MAP_SCANNER_CONFIG: file }))).toEqual([
        `config file ${file} must contain a JSON object whose sections are objects`
      ]);
    });

    it('should reject a missing config file', () => {
      const file = path.join(tmpDir, 'missing.json');
      const problems = problemsOf(() => loadConfig({ MAP_SCANNER_CONFIG: file }));
      expect(problems[0]).toContain(`cannot read config file ${file}`);
    });
  });

  describe('validateConfig', () => {
    it('should accept the defaults', () => {
      expect(validateConfig(DEFAULT_CONFIG)).toBe(DEFAULT_CONFIG);
    });

    it('should collect every problem', () => {
      const config = mergeConfig(DEFAULT_CONFIG, {
        planner: { epsilon: 60 },
        safety: { maxAttempts: 0, allowedRange: { min: 10, max: 5 } },
        ocr: { confidenceThreshold: 1.5 }
      });
      expect(problemsOf(() => validateConfig(config))).toEqual([
        'ocr.confidenceThreshold must be within [0, 1]',
        'planner.epsilon must be smaller than planner.coarseThreshold',
        'safety.maxAttempts must be an integer >= 1',
        'safety.allowedRange.min must not exceed safety.allowedRange.max'
      ]);
    });

    it('should reject a fractional readout region', () => {
      const config = mergeConfig(DEFAULT_CONFIG, { readoutRegion: { x: 0, y: 0, width: 10.5, height: 4 } });
      expect(problemsOf(() => validateConfig(config))).toEqual(['readoutRegion.width must be an integer >= 1']);
    });
  });

  describe('toSafetyBounds', () => {
    it('should produce frozen bounds', () => {
      const safety = toSafetyBounds(DEFAULT_CONFIG);
      expect(safety).toEqual(DEFAULT_CONFIG.safety);
      expect(Object.isFrozen(safety)).toBe(true);
      expect(Object.isFrozen(safety.allowedRange)).toBe(true);
    });
  });

  it('should carry problems in the error message', () => {
    const error = new ConfigurationError(['a is wrong', 'b is wrong']);
    expect(error.message).toBe('Invalid scanner configuration:\n- a is wrong\n- b is wrong');
    expect(error.code).toBe('CONFIGURATION');
    expect(error.name).toBe('ConfigurationError');
  });
});
