import { randomUUID } from "crypto";
import * as path from "path";
import { FileLogWriter, FileLogWriterImpl } from "./file-log-writer";
import { LogConfigManager } from "./log-config";
import {
  CmsLogger,
  LogDestination,
  LogEntry,
  LogLevel,
  LOG_LEVEL_ORDER,
} from "./logging-types";

export { LogLevel, LogDestination } from "./logging-types";
export type { LogEntry, CmsLogger } from "./logging-types";

// --- Structured logging for problem-list runs ---

export interface WorkflowLoggerConfig {
  enableFileLogging: boolean;
  enableConsoleLogging: boolean;
  logDirectory: string;
  logLevel: LogLevel;
  runLabel?: string;
}

export class WorkflowLogger implements CmsLogger {
  private workflowId: string;
  private workflowStepCounter: number;
  private entries: LogEntry[];
  private config: WorkflowLoggerConfig;

  private fileWriter?: FileLogWriter;
  private fileLoggingEnabled: boolean;
  private logFilePath?: string;
  private pendingFileWork: Promise<void>;

  constructor(
    initialWorkflowId?: string,
    config?: Partial<WorkflowLoggerConfig>,
  ) {
    this.workflowId = initialWorkflowId || randomUUID();
    this.workflowStepCounter = 0;
    this.entries = [];

    const globalConfig = LogConfigManager.getConfig();
    this.config = {
      enableFileLogging: config?.enableFileLogging ?? globalConfig.fileLoggingEnabled,
      enableConsoleLogging: config?.enableConsoleLogging ?? true,
      logDirectory: config?.logDirectory ?? globalConfig.logDirectory,
      logLevel: config?.logLevel ?? globalConfig.logLevel,
      runLabel: config?.runLabel,
    };

    this.fileLoggingEnabled = this.config.enableFileLogging;
    this.pendingFileWork = this.fileLoggingEnabled
      ? this.initializeFileLogging(globalConfig.customLogPath)
      : Promise.resolve();
  }

  public getFullLog(): LogEntry[] {
    return [...this.entries];
  }

  public getLogFilePath(): string | undefined {
    return this.logFilePath;
  }

  private incrementStep(): number {
    return ++this.workflowStepCounter;
  }

  private createLogEntry(
    level: LogLevel,
    functionName: string,
    message: string,
    metadata?: Record<string, unknown>,
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      workflowId: this.workflowId,
      stepNumber: this.incrementStep(),
      functionName,
      message: scrubSensitiveData(message),
      metadata: metadata ? scrubSensitiveDataFromObject(metadata) : undefined,
      destinations: this.fileLoggingEnabled
        ? [LogDestination.CONSOLE, LogDestination.FILE]
        : [LogDestination.CONSOLE],
      sensitiveDataScrubbed: true,
    };
  }

  private writeStructuredLog(entry: LogEntry): void {
    if (!this.shouldLogLevel(entry.level)) {
      return;
    }

    this.entries.push(entry);

    if (this.config.enableConsoleLogging) {
      const formattedMessage = `[${entry.timestamp}] [${entry.level}] [WF:${entry.workflowId}] [Step:${entry.stepNumber}] [${entry.functionName}] ${entry.message}`;
      const args = entry.metadata ? [formattedMessage, entry.metadata] : [formattedMessage];

      switch (entry.level) {
        case LogLevel.ERROR:
          console.error(...args);
          break;
        case LogLevel.WARN:
          console.warn(...args);
          break;
        case LogLevel.DEBUG:
        case LogLevel.TRACE:
          console.debug(...args);
          break;
        default:
          console.log(...args);
      }
    }

    if (this.fileLoggingEnabled) {
      this.pendingFileWork = this.pendingFileWork.then(() => {
        this.fileWriter?.writeEntry(entry);
      });
    }
  }

  // Convenience logging functions
  public logTrace(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.TRACE, functionName, message, metadata));
  }

  public logDebug(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.DEBUG, functionName, message, metadata));
  }

  public logInfo(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.INFO, functionName, message, metadata));
  }

  public logWarn(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.WARN, functionName, message, metadata));
  }

  public logError(functionName: string, message: string, metadata?: Record<string, unknown>): void {
    this.writeStructuredLog(this.createLogEntry(LogLevel.ERROR, functionName, message, metadata));
  }

  /**
   * Writes any buffered entries to the log file and releases the writer.
   */
  public async close(): Promise<void> {
    await this.pendingFileWork;
    if (this.fileWriter) {
      await this.fileWriter.close();
      this.fileWriter = undefined;
    }
  }

  private async initializeFileLogging(customLogPath?: string): Promise<void> {
    this.fileWriter = new FileLogWriterImpl();
    this.logFilePath = customLogPath || this.generateLogFilePath();

    const initialized = await this.fileWriter.initialize(this.logFilePath);
    if (!initialized) {
      this.fileLoggingEnabled = false;
      this.fileWriter = undefined;
      console.warn("[WorkflowLogger] File logging initialization failed, falling back to console only");
    }
  }

  private generateLogFilePath(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, "-").replace("Z", "");
    const label = sanitizeFileName(this.config.runLabel || this.workflowId);
    return path.join(this.config.logDirectory, `cmsify-${timestamp}-${label}.log`);
  }

  private shouldLogLevel(level: LogLevel): boolean {
    return LOG_LEVEL_ORDER.indexOf(level) >= LOG_LEVEL_ORDER.indexOf(this.config.logLevel);
  }
}

function sanitizeFileName(fileName: string): string {
  return fileName.replace(/[^a-zA-Z0-9\-_]/g, "-").substring(0, 50);
}

/**
 * Masks identifiers that should never reach a log line.
 */
export function scrubSensitiveData(text: string): string {
  return text
    .replace(/\b\d{3}-\d{2}-\d{4}\b/g, "[SSN-REDACTED]")
    .replace(/\b\d{4}\s?\d{4}\s?\d{4}\s?\d{4}\b/g, "[CARD-REDACTED]")
    .replace(/\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g, "[EMAIL-REDACTED]")
    .replace(/\b\d{10,}\b/g, "[PHONE-REDACTED]");
}

export function scrubSensitiveDataFromObject(
  obj: Record<string, unknown>,
  visited: WeakSet<object> = new WeakSet(),
): Record<string, unknown> {
  visited.add(obj);
  const scrubbed: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    const lowerKey = key.toLowerCase();
    if (lowerKey.includes("ssn") || ["password", "token", "mrn"].includes(lowerKey)) {
      scrubbed[key] = "[REDACTED]";
    } else {
      scrubbed[key] = scrubValue(value, visited);
    }
  }
  return scrubbed;
}

function scrubValue(value: unknown, visited: WeakSet<object>): unknown {
  if (typeof value === "string") {
    return scrubSensitiveData(value);
  }
  if (value instanceof Error) {
    return { name: value.name, message: scrubSensitiveData(value.message) };
  }
  if (typeof value === "object" && value !== null) {
    if (visited.has(value)) {
      return "[CIRCULAR-REFERENCE]";
    }
    if (Array.isArray(value)) {
      visited.add(value);
      return value.map((item) => scrubValue(item, visited));
    }
    return scrubSensitiveDataFromObject(toRecord(value), visited);
  }
  return value;
}

function toRecord(value: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value));
}
