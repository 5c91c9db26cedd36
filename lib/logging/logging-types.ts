// Log levels, ordered from most to least verbose in LOG_LEVEL_ORDER
export enum LogLevel {
  TRACE = "TRACE",
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

export const LOG_LEVEL_ORDER: readonly LogLevel[] = [
  LogLevel.TRACE,
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

export enum LogDestination {
  CONSOLE = "CONSOLE",
  FILE = "FILE",
}

// Structured log entry
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  workflowId: string;
  stepNumber: number;
  functionName: string;
  message: string;
  metadata?: Record<string, unknown>;
  destinations: LogDestination[];
  sensitiveDataScrubbed: boolean;
}

/**
 * The slice of the workflow logger that processing code depends on.
 */
export interface CmsLogger {
  logDebug(functionName: string, message: string, metadata?: Record<string, unknown>): void;
  logInfo(functionName: string, message: string, metadata?: Record<string, unknown>): void;
  logWarn(functionName: string, message: string, metadata?: Record<string, unknown>): void;
  logError(functionName: string, message: string, metadata?: Record<string, unknown>): void;
}
