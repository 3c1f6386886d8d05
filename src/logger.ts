import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4
}

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  stack?: string;
  pid: number;
  hostname: string;
  sessionId: string;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** JSON-lines log file. `null` disables file output. */
  logFile?: string | null;
  /** Echo entries to stderr. */
  console?: boolean;
}

export function defaultLogFile(): string {
  return path.join(os.homedir(), '.map-scanner', 'map_scanner.log');
}

const LEVEL_NAMES: Record<string, LogLevel | undefined> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  WARNING: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
  FATAL: LogLevel.FATAL
};

export function parseLogLevel(raw: string): LogLevel | undefined {
  return LEVEL_NAMES[raw.trim().toUpperCase()];
}

export class Logger {
  private logFile: string | null;
  private sessionId: string;
  private logLevel: LogLevel;
  private toConsole: boolean;
  private isInitialized: boolean = false;

  constructor(options: LoggerOptions = {}) {
    this.sessionId = this.generateSessionId();
    this.logLevel = options.level ?? LogLevel.INFO;
    this.toConsole = options.console ?? true;
    this.logFile = options.logFile === undefined ? defaultLogFile() : options.logFile;
    this.initializeLogFile();
  }

  private generateSessionId(): string {
    return `session_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }

  private initializeLogFile(): void {
    if (!this.logFile) {
      return;
    }

    try {
      fs.mkdirSync(path.dirname(this.logFile), { recursive: true });

      const sessionStart = {
        timestamp: new Date().toISOString(),
        level: 'SESSION_START',
        message: 'Map scanner session started',
        sessionId: this.sessionId,
        pid: process.pid,
        hostname: os.hostname(),
        nodeVersion: process.version,
        platform: process.platform,
        arch: process.arch,
        cwd: process.cwd()
      };

      fs.appendFileSync(this.logFile, JSON.stringify(sessionStart) + '\n');
      this.isInitialized = true;

      if (this.toConsole) {
        console.error(`[MAP-SCANNER] Session started: ${this.sessionId}`);
        console.error(`[MAP-SCANNER] Log file: ${this.logFile}`);
      }
    } catch (error) {
      // Fall back to stderr only
      console.error('[MAP-SCANNER] Failed to initialize log file:', error);
      this.isInitialized = false;
    }
  }

  private writeLog(entry: LogEntry): void {
    try {
      if (this.isInitialized && this.logFile) {
        fs.appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
      }
    } catch (error) {
      console.error('[MAP-SCANNER] Log write failed:', error);
    }

    if (this.toConsole) {
      const levelName = LogLevel[entry.level];
      const contextStr = entry.context ? ` | Context: ${JSON.stringify(entry.context)}` : '';
      const stackStr = entry.stack ? `\nStack: ${entry.stack}` : '';

      console.error(`[MAP-SCANNER ${levelName}] ${entry.message}${contextStr}${stackStr}`);
    }
  }

  private createLogEntry(level: LogLevel, message: string, context?: LogContext, error?: Error): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
      stack: error?.stack,
      pid: process.pid,
      hostname: os.hostname(),
      sessionId: this.sessionId
    };
  }

  public debug(message: string, context?: LogContext): void {
    if (this.logLevel <= LogLevel.DEBUG) {
      this.writeLog(this.createLogEntry(LogLevel.DEBUG, message, context));
    }
  }

  public info(message: string, context?: LogContext): void {
    if (this.logLevel <= LogLevel.INFO) {
      this.writeLog(this.createLogEntry(LogLevel.INFO, message, context));
    }
  }

  public warn(message: string, context?: LogContext): void {
    if (this.logLevel <= LogLevel.WARN) {
      this.writeLog(this.createLogEntry(LogLevel.WARN, message, context));
    }
  }

  public error(message: string, context?: LogContext, error?: Error): void {
    if (this.logLevel <= LogLevel.ERROR) {
      this.writeLog(this.createLogEntry(LogLevel.ERROR, message, context, error));
    }
  }

  public fatal(message: string, context?: LogContext, error?: Error): void {
    this.writeLog(this.createLogEntry(LogLevel.FATAL, message, context, error));
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.info(`Log level changed to ${LogLevel[level]}`);
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public getLogFile(): string | null {
    return this.logFile;
  }

  public getSessionId(): string {
    return this.sessionId;
  }

  public logToolExecution(toolName: string, args: unknown, result?: unknown, error?: Error): void {
    const context = {
      tool: toolName,
      args,
      result,
      error: error?.message
    };

    if (error) {
      this.error(`Tool execution failed: ${toolName}`, context, error);
    } else {
      this.info(`Tool executed successfully: ${toolName}`, context);
    }
  }

  public logSessionEvent(event: string, details?: LogContext): void {
    this.info(`Scan event: ${event}`, details);
  }

  public logStateTransition(from: string, to: string, details?: LogContext): void {
    this.debug(`State ${from} -> ${to}`, details);
  }

  public logCrash(error: Error, context?: LogContext): void {
    const crashContext = {
      ...context,
      memoryUsage: process.memoryUsage(),
      uptime: process.uptime(),
      nodeVersion: process.version,
      platform: process.platform,
      arch: process.arch
    };

    this.fatal('CRASH DETECTED', crashContext, error);
  }

  public logSessionEnd(): void {
    const sessionEnd = {
      timestamp: new Date().toISOString(),
      level: 'SESSION_END',
      message: 'Map scanner session ended',
      sessionId: this.sessionId,
      pid: process.pid,
      uptime: process.uptime()
    };

    try {
      if (this.isInitialized && this.logFile) {
        fs.appendFileSync(this.logFile, JSON.stringify(sessionEnd) + '\n');
      }
      if (this.toConsole) {
        console.error(`[MAP-SCANNER] Session ended: ${this.sessionId}`);
      }
    } catch (error) {
      console.error('[MAP-SCANNER] Failed to log session end:', error);
    }
  }
}

/** Cleanup run on SIGINT or SIGTERM before the process exits. */
export type ShutdownHook = () => Promise<void>;

/**
 * Runs `onShutdown` and closes the log session. Resolves to the exit code:
 * 0 after a clean shutdown, 1 when the hook failed.
 */
export async function gracefulShutdown(logger: Logger, signal: string, onShutdown?: ShutdownHook): Promise<number> {
  logger.info(`Received ${signal}, shutting down gracefully`);
  let code = 0;
  if (onShutdown) {
    try {
      await onShutdown();
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Shutdown hook failed', { signal }, err);
      code = 1;
    }
  }
  logger.logSessionEnd();
  return code;
}

export function setupGlobalErrorHandlers(logger: Logger, onShutdown?: ShutdownHook): void {
  process.on('uncaughtException', (error: Error) => {
    logger.logCrash(error, { type: 'uncaughtException' });

    // Give the log a moment to flush
    setTimeout(() => {
      process.exit(1);
    }, 1000);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logger.logCrash(error, { type: 'unhandledRejection' });

    setTimeout(() => {
      process.exit(1);
    }, 1000);
  });

  process.on('warning', (warning: Error) => {
    logger.warn(`Process warning: ${warning.name}`, {
      message: warning.message,
      stack: warning.stack
    });
  });

  let shuttingDown = false;
  const onSignal = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      // Second signal: stop waiting for the hook
      logger.warn(`Received ${signal} again, exiting immediately`);
      process.exit(1);
    }
    shuttingDown = true;
    void gracefulShutdown(logger, signal, onShutdown).then((code) => process.exit(code));
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  process.on('exit', (code: number) => {
    logger.info(`Process exiting with code: ${code}`);
  });

  logger.info('Global error handlers initialized');
}
