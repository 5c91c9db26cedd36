/**
 * Log Configuration Management
 *
 * Reads logging settings from environment variables with fallback defaults.
 * CMS_CUSTOM_LOG_PATH, when set, names the log file outright and takes
 * precedence over CMS_LOG_DIRECTORY.
 */

import { LogLevel } from './logging-types';

export interface LogConfig {
  fileLoggingEnabled: boolean;
  logDirectory: string;
  logLevel: LogLevel;
  customLogPath?: string;
}

export class LogConfigManager {
  private static config: LogConfig | null = null;

  /**
   * Gets the current log configuration, initializing it if necessary.
   */
  static getConfig(): LogConfig {
    if (!this.config) {
      this.config = this.loadConfig();
    }
    return this.config;
  }

  private static loadConfig(): LogConfig {
    return {
      fileLoggingEnabled: this.parseBoolean(process.env.CMS_FILE_LOGGING_ENABLED, false),
      logDirectory: process.env.CMS_LOG_DIRECTORY || 'logs/',
      logLevel: this.parseLogLevel(process.env.CMS_LOG_LEVEL, LogLevel.INFO),
      customLogPath: process.env.CMS_CUSTOM_LOG_PATH,
    };
  }

  static getLogLevel(): LogLevel {
    return this.getConfig().logLevel;
  }

  /**
   * Resets the configuration cache (useful for testing).
   */
  static resetConfig(): void {
    this.config = null;
  }

  static parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
  }

  static parseLogLevel(value: string | undefined, defaultValue: LogLevel): LogLevel {
    if (!value) return defaultValue;

    const upperValue = value.toUpperCase();
    const match = Object.values(LogLevel).find((level) => level === upperValue);
    return match ?? defaultValue;
  }
}
