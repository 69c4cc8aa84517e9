// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Environment-driven defaults.
 *
 * Every getter reads the environment at call time so tests can override
 * values per case. Explicit options passed to the loader always win.
 */

import { delimiter } from 'node:path';
import { LogLevel } from './logger.js';

/** Directive rounds allowed per node before the loader gives up. */
export const DEFAULT_MAX_DIRECTIVE_ROUNDS = 20;

/**
 * Include search roots: the current directory, then any LAYERCONF_PATH entries.
 */
export function getSearchPath(): string[] {
  const extra = (process.env.LAYERCONF_PATH ?? '')
    .split(delimiter)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
  return ['.', ...extra];
}

export function getMaxDirectiveRounds(): number {
  const raw = process.env.LAYERCONF_MAX_DIRECTIVE_ROUNDS;
  if (!raw) return DEFAULT_MAX_DIRECTIVE_ROUNDS;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_MAX_DIRECTIVE_ROUNDS;
}

/**
 * Log level from LAYERCONF_LOG_LEVEL, if set to a known name.
 */
export function getEnvLogLevel(): LogLevel | undefined {
  switch ((process.env.LAYERCONF_LOG_LEVEL ?? '').toLowerCase()) {
    case 'normal':
      return LogLevel.NORMAL;
    case 'verbose':
      return LogLevel.VERBOSE;
    case 'debug':
      return LogLevel.DEBUG;
    case 'trace':
      return LogLevel.TRACE;
    default:
      return undefined;
  }
}
