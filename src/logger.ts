// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Logger
 *
 * Level-aware logging utilities for diagnostic output.
 * Provides graduated verbosity: NORMAL → VERBOSE → DEBUG → TRACE
 */

import chalk from 'chalk';

/**
 * Log levels for graduated verbosity.
 */
export enum LogLevel {
  /** Normal output - only essential information */
  NORMAL = 0,
  /** Verbose - files loaded and their dependencies */
  VERBOSE = 1,
  /** Debug - directive resolution steps */
  DEBUG = 2,
  /** Trace - merged trees and substitution details */
  TRACE = 3,
}

/**
 * Parse log level from CLI options.
 */
export function parseLogLevel(options: {
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}): LogLevel {
  if (options.trace) return LogLevel.TRACE;
  if (options.debug) return LogLevel.DEBUG;
  if (options.verbose) return LogLevel.VERBOSE;
  return LogLevel.NORMAL;
}

/**
 * Centralized logger with level-aware output.
 */
class Logger {
  private level: LogLevel = LogLevel.NORMAL;

  /**
   * Set the current log level.
   */
  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Get the current log level.
   */
  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Check if a specific level is enabled.
   */
  isLevelEnabled(level: LogLevel): boolean {
    return this.level >= level;
  }

  // ============================================
  // Level-aware logging methods
  // ============================================

  /**
   * Log at VERBOSE level (shows at VERBOSE, DEBUG, TRACE).
   */
  verbose(message: string): void {
    if (this.level >= LogLevel.VERBOSE) {
      console.log(chalk.dim(message));
    }
  }

  /**
   * Log at DEBUG level (shows at DEBUG, TRACE).
   */
  debug(message: string): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.dim(`[Debug] ${message}`));
    }
  }

  /**
   * Log at TRACE level (shows only at TRACE).
   */
  trace(message: string): void {
    if (this.level >= LogLevel.TRACE) {
      console.log(chalk.gray(`[Trace] ${message}`));
    }
  }

  // ============================================
  // Formatted output helpers
  // ============================================

  /**
   * Log a loaded configuration file at VERBOSE level.
   */
  configLoaded(path: string, dependencyCount: number): void {
    if (this.level >= LogLevel.VERBOSE) {
      const deps = dependencyCount === 1 ? '1 file' : `${dependencyCount} files`;
      console.log(chalk.green(`✓ ${path}`) + chalk.dim(` (${deps})`));
    }
  }

  /**
   * Log a directive being resolved at DEBUG level.
   */
  directive(kind: string, detail: string): void {
    if (this.level >= LogLevel.DEBUG) {
      console.log(chalk.dim(`[Config] ${kind} ${detail}`));
    }
  }

  /**
   * Print each recorded substitution error.
   */
  substitutionReport(errors: readonly Error[]): void {
    if (errors.length === 0) return;
    console.error(chalk.red(`${errors.length} substitution error(s):`));
    for (const error of errors) {
      console.error(chalk.red(`  • ${this.sanitize(error.message)}`));
    }
  }

  /**
   * Sanitize a string for safe terminal output.
   */
  private sanitize(str: string): string {
    return str
      .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '') // Remove control chars except \t, \n, \r
      .replace(/\r?\n/g, '\\n')
      .replace(/\t/g, '\\t');
  }

  /**
   * Log an error with optional stack trace at DEBUG level.
   */
  error(message: string, error?: Error): void {
    console.error(chalk.red(`Error: ${message}`));
    if (error && this.level >= LogLevel.DEBUG) {
      console.error(chalk.dim(error.stack || 'No stack trace available'));
    }
  }

  /**
   * Log a warning.
   */
  warn(message: string): void {
    console.warn(chalk.yellow(`Warning: ${message}`));
  }

  /**
   * Log an info message.
   */
  info(message: string): void {
    console.log(chalk.blue(`Info: ${message}`));
  }
}

/**
 * Singleton logger instance for global use.
 */
export const logger = new Logger();
