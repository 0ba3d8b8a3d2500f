// logger.ts - Component logging for the winmaint agent
import * as fs from 'fs';
import * as path from 'path';
import { sanitizeLogData } from '../security';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  CRITICAL = 4
}

/**
 * The subset of the logger that reconciliation components depend on.
 * Tests hand in plain objects of jest.fn() here.
 */
export interface LogSink {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown, error?: unknown): void;
  error(message: string, error?: unknown, data?: unknown): void;
}

export function parseLogLevel(name: string): LogLevel {
  switch (name.toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'warn': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'critical': return LogLevel.CRITICAL;
    default: return LogLevel.INFO;
  }
}

function describeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

export class Logger implements LogSink {
  private logFile: string | null;
  private component: string;
  private minLevel: LogLevel;
  private maxFileSize: number = 10 * 1024 * 1024; // 10MB
  private maxFiles: number = 5;

  /**
   * @param logDir directory for `<component>.log`; null logs to the console only
   */
  constructor(component: string, logDir: string | null, minLevel: LogLevel = LogLevel.INFO) {
    this.component = component;
    this.minLevel = minLevel;
    this.logFile = null;

    if (logDir) {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }
      this.logFile = path.join(logDir, `${component}.log`);
      this.rotateLogsIfNeeded();
    }
  }

  /** Logger for a sub-component writing to its own file in the same directory. */
  child(component: string): Logger {
    const logDir = this.logFile ? path.dirname(this.logFile) : null;
    return new Logger(`${this.component}.${component}`, logDir, this.minLevel);
  }

  private rotateLogsIfNeeded(): void {
    if (!this.logFile) return;
    try {
      if (!fs.existsSync(this.logFile)) {
        return;
      }

      const stats = fs.statSync(this.logFile);

      if (stats.size >= this.maxFileSize) {
        for (let i = this.maxFiles - 1; i > 0; i--) {
          const oldFile = `${this.logFile}.${i}`;
          const newFile = `${this.logFile}.${i + 1}`;

          if (fs.existsSync(oldFile)) {
            if (i === this.maxFiles - 1) {
              fs.unlinkSync(oldFile); // Delete oldest
            } else {
              fs.renameSync(oldFile, newFile);
            }
          }
        }

        fs.renameSync(this.logFile, `${this.logFile}.1`);
      }
    } catch (error) {
      console.error('Error rotating logs:', error);
    }
  }

  formatMessage(level: LogLevel, message: string, data?: unknown, error?: unknown): string {
    const timestamp = new Date().toISOString();
    const levelName = LogLevel[level];

    const sanitizedMessage = String(sanitizeLogData(message));
    let logLine = `[${timestamp}] [${levelName}] [${this.component}] ${sanitizedMessage}`;

    if (data !== undefined) {
      const sanitizedData = sanitizeLogData(data);
      logLine += `\n  Data: ${JSON.stringify(sanitizedData, null, 2)}`;
    }

    if (error !== undefined) {
      const { message: errorMessage, stack } = describeError(error);
      logLine += `\n  Error: ${String(sanitizeLogData(errorMessage))}`;
      if (stack && level >= LogLevel.ERROR) {
        // Stack traces only for ERROR and above
        logLine += `\n  Stack: ${String(sanitizeLogData(stack))}`;
      }
    }

    return logLine + '\n';
  }

  private writeLog(level: LogLevel, message: string, data?: unknown, error?: unknown): void {
    if (level < this.minLevel) {
      return;
    }

    const logMessage = this.formatMessage(level, message, data, error);

    if (level >= LogLevel.WARN) {
      console.error(logMessage.trim());
    } else {
      console.log(logMessage.trim());
    }

    if (!this.logFile) return;
    try {
      fs.appendFileSync(this.logFile, logMessage);
      this.rotateLogsIfNeeded();
    } catch (err) {
      console.error('Failed to write log:', err);
    }
  }

  public debug(message: string, data?: unknown): void {
    this.writeLog(LogLevel.DEBUG, message, data);
  }

  public info(message: string, data?: unknown): void {
    this.writeLog(LogLevel.INFO, message, data);
  }

  public warn(message: string, data?: unknown, error?: unknown): void {
    this.writeLog(LogLevel.WARN, message, data, error);
  }

  public error(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.ERROR, message, data, error);
  }

  public critical(message: string, error?: unknown, data?: unknown): void {
    this.writeLog(LogLevel.CRITICAL, message, data, error);
  }

  public startOperation(operation: string, context?: unknown): void {
    this.info(`Starting: ${operation}`, context);
  }

  public endOperation(operation: string, success: boolean, result?: unknown): void {
    if (success) {
      this.info(`Completed: ${operation}`, result);
    } else {
      this.error(`Failed: ${operation}`, undefined, result);
    }
  }
}

let agentLogger: Logger | null = null;

export function getAgentLogger(logDir: string | null, level: LogLevel = LogLevel.INFO): Logger {
  if (!agentLogger) {
    agentLogger = new Logger('agent', logDir, level);
  }
  return agentLogger;
}

export default Logger;
