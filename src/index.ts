// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * layerconf
 *
 * Layered YAML configuration (`_include`, `_use`, `_flatten`) and lazy
 * `{name.attr}` substitutions over the assembled tree.
 */

export * from './config/index.js';
export * from './substitutions/index.js';
export {
  SUBSTITUTION_ERROR_KINDS,
  ConfigError,
  ConfigReferenceError,
  SubstitutionError,
  CyclicSubstitutionError,
  SubstitutionErrorList,
  configErrorLocation,
} from './errors.js';
export type { SubstitutionErrorKind } from './errors.js';
export { logger, LogLevel, parseLogLevel } from './logger.js';
export { DEFAULT_MAX_DIRECTIVE_ROUNDS, getSearchPath, getMaxDirectiveRounds, getEnvLogLevel } from './settings.js';
export { VERSION } from './version.js';
