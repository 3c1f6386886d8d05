#!/usr/bin/env node

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import { loadConfig, type ScannerConfig } from './config.js';
import { toError } from './errors.js';
import { Logger, LogLevel, setupGlobalErrorHandlers } from './logger.js';
import { MapScanner } from './map-scanner.js';
import { MouseController } from './mouse-controller.js';
import { ScreenCapture } from './screen-capture.js';
import { TesseractOcrEngine } from './tesseract-engine.js';
import { formatSessionResult, parseTarget, text } from './tool-results.js';
import type { SessionResult, TargetCoordinate } from './types.js';
import { WindowManager } from './window-manager.js';

export const SERVER_NAME = 'map-coordinate-scanner';
export const SERVER_VERSION = '0.1.0';

class MapScannerServer {
  private server: Server;
  private scanner: MapScanner;
  private ocr: TesseractOcrEngine;
  private controller: AbortController | null = null;
  private activeScan: Promise<SessionResult> | null = null;

  constructor(
    private readonly config: ScannerConfig,
    private readonly logger: Logger
  ) {
    this.ocr = new TesseractOcrEngine(config.ocr, logger);
    this.scanner = new MapScanner({
      config,
      logger,
      window: new WindowManager(logger),
      capture: new ScreenCapture(logger),
      pointer: new MouseController(config.pointer, logger),
      ocr: this.ocr,
    });

    this.server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      { capabilities: { tools: {} } }
    );

    this.setupToolHandlers();

    logger.info('MapScannerServer initialized', {
      serverName: SERVER_NAME,
      version: SERVER_VERSION,
      windowTitle: config.windowTitle,
    });
  }

  private setupToolHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: [
          {
            name: 'scanToCoordinate',
            description: 'Drag the map until the on-screen coordinate readout shows the target. Returns the session outcome (Converged, Exhausted or Aborted).',
            inputSchema: {
              type: 'object',
              properties: {
                x: {
                  type: 'number',
                  description: 'Target map X coordinate',
                },
                y: {
                  type: 'number',
                  description: 'Target map Y coordinate',
                },
              },
              required: ['x', 'y'],
            },
          },
          {
            name: 'readCoordinate',
            description: 'Capture the game window once and read the current map coordinate without moving the pointer.',
            inputSchema: {
              type: 'object',
              properties: {},
            },
          },
          {
            name: 'cancelScan',
            description: 'Cancel the running scan. No further input is issued once the scanner notices.',
            inputSchema: {
              type: 'object',
              properties: {},
            },
          },
          {
            name: 'getScannerConfig',
            description: 'Show the effective scanner configuration and safety bounds.',
            inputSchema: {
              type: 'object',
              properties: {},
            },
          },
        ],
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        this.logger.debug(`Tool called: ${name}`, { args });

        let result: CallToolResult;
        switch (name) {
          case 'scanToCoordinate':
            result = await this.scanToCoordinate(parseTarget(args));
            break;
          case 'readCoordinate':
            result = await this.readCoordinate();
            break;
          case 'cancelScan':
            result = this.cancelScan();
            break;
          case 'getScannerConfig':
            result = text(JSON.stringify({ config: this.config, bounds: this.scanner.bounds }, null, 2));
            break;
          default:
            throw new Error(`Unknown tool: ${name}`);
        }

        this.logger.logToolExecution(name, args, result);
        return result;
      } catch (error) {
        const err = toError(error);
        this.logger.logToolExecution(name, args, null, err);
        return text(`Error: ${err.message}`, true);
      }
    });
  }

  private async scanToCoordinate(target: TargetCoordinate): Promise<CallToolResult> {
    const controller = new AbortController();
    const owner = !this.scanner.isActive();
    const scan = this.scanner.scan(target, { signal: controller.signal });
    if (owner) {
      this.controller = controller;
      this.activeScan = scan;
    }
    try {
      const result = await scan;
      return text(formatSessionResult(result), result.outcome === 'Aborted');
    } finally {
      if (owner) {
        this.controller = null;
        this.activeScan = null;
      }
    }
  }

  private async readCoordinate(): Promise<CallToolResult> {
    const readout = await this.scanner.readCoordinate();
    if (!readout.ok) {
      return text(`Readout failed [${readout.error.code}]: ${readout.error.message}`, true);
    }
    const { x, y, confidence, text: raw } = readout.value;
    return text(`Current coordinate: (${x}, ${y})\nConfidence: ${confidence.toFixed(2)}\nRecognized text: "${raw}"`);
  }

  private cancelScan(): CallToolResult {
    if (!this.controller) {
      return text('No scan is running');
    }
    this.controller.abort();
    this.logger.info('Scan cancellation requested');
    return text('Cancellation requested');
  }

  async run() {
    try {
      this.logger.info('Starting MapScannerServer');
      const transport = new StdioServerTransport();
      await this.server.connect(transport);
      this.logger.info('MapScannerServer connected to stdio transport');
      console.error('Map coordinate scanner MCP server running on stdio');
    } catch (error) {
      const err = toError(error);
      this.logger.error('Failed to start MapScannerServer', { error: err.message }, err);
      throw error;
    }
  }

  /** Cancels any running scan and waits for it, so no button is left pressed. */
  async close() {
    this.controller?.abort();
    if (this.activeScan) {
      const result = await this.activeScan;
      this.logger.info('Scan stopped for shutdown', { outcome: result.outcome, attempts: result.attempts });
    }
    await this.ocr.terminate();
    await this.server.close();
  }
}

function main() {
  let config: ScannerConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error('Map coordinate scanner failed to load its configuration:', error instanceof Error ? error.message : error);
    process.exit(1);
  }

  const logger = new Logger({ level: config.logLevel, logFile: config.logFile });
  if (logger.getLogLevel() === LogLevel.DEBUG) {
    logger.debug('Effective configuration', { config });
  }

  const server = new MapScannerServer(config, logger);
  setupGlobalErrorHandlers(logger, () => server.close());
  process.stdin.on('close', () => {
    server.close().catch((error) => {
      logger.error('Failed to shut down cleanly', {}, toError(error));
    });
  });

  server.run().catch((error) => {
    logger.logCrash(toError(error), {
      context: 'MapScannerServer startup'
    });
    console.error('Map coordinate scanner MCP server failed to start:', error);
    process.exit(1);
  });
}

if (require.main === module) {
  main();
}
