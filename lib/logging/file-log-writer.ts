/**
 * File Log Writer
 *
 * Buffers log entries and appends them to a log file on flush. A write
 * failure disables the writer; console logging is unaffected.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LogEntry } from './logging-types';

export interface FileLogWriter {
  initialize(logFilePath: string): Promise<boolean>;
  writeEntry(entry: LogEntry): void;
  flush(): Promise<void>;
  close(): Promise<void>;
  isHealthy(): boolean;
}

export class FileLogWriterImpl implements FileLogWriter {
  private isInitialized: boolean = false;
  private hasErrors: boolean = false;
  private writeQueue: LogEntry[] = [];
  private logFilePath?: string;

  /**
   * Prepares the target file, creating its directory and writing a header.
   */
  async initialize(logFilePath: string): Promise<boolean> {
    try {
      this.logFilePath = logFilePath;
      await fs.promises.mkdir(path.dirname(logFilePath), { recursive: true, mode: 0o755 });
      await fs.promises.appendFile(logFilePath, this.formatHeader(), 'utf8');

      this.isInitialized = true;
      this.hasErrors = false;
      return true;
    } catch (error) {
      this.handleWriteError(error);
      return false;
    }
  }

  /**
   * Queues an entry; it reaches the file on the next flush.
   */
  writeEntry(entry: LogEntry): void {
    if (!this.isInitialized || this.hasErrors) {
      return;
    }
    this.writeQueue.push(entry);
  }

  async flush(): Promise<void> {
    if (!this.isInitialized || this.hasErrors || !this.logFilePath || this.writeQueue.length === 0) {
      return;
    }

    const pending = this.writeQueue;
    this.writeQueue = [];

    try {
      await fs.promises.appendFile(
        this.logFilePath,
        pending.map((entry) => this.formatLogEntry(entry)).join(''),
        'utf8',
      );
    } catch (error) {
      this.handleWriteError(error);
    }
  }

  async close(): Promise<void> {
    await this.flush();
    this.isInitialized = false;
  }

  isHealthy(): boolean {
    return this.isInitialized && !this.hasErrors;
  }

  getLogFilePath(): string | undefined {
    return this.logFilePath;
  }

  private formatLogEntry(entry: LogEntry): string {
    let logLine = `[${entry.timestamp}] [${entry.level}] [WF:${entry.workflowId}] [Step:${entry.stepNumber}] [${entry.functionName}] ${entry.message}`;

    if (entry.metadata) {
      logLine += ` ${JSON.stringify(entry.metadata)}`;
    }

    return logLine + '\n';
  }

  private formatHeader(): string {
    return `=== CMS PROBLEM LIST LOG ===
Start Time: ${new Date().toISOString()}
Log Format Version: 1.0
============================

`;
  }

  private handleWriteError(error: unknown): void {
    console.warn(
      `[FileLogWriter] Disabling file logging: ${error instanceof Error ? error.message : 'Unknown error'}`,
    );
    this.hasErrors = true;
    this.writeQueue = [];
  }
}
