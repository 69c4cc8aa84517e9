// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Module
 *
 * This module assembles configuration trees from YAML files. The
 * implementation is split across multiple files:
 *
 * - types.ts       - Type definitions (ConfigNode, LoadOptions, etc.)
 * - loader.ts      - File I/O and `_include` / `_use` resolution
 * - search-path.ts - `_include` specifier lookup
 * - merger.ts      - Tree merging and flattening
 * - nested.ts      - One-file-per-section loading
 * - utils.ts       - Utility functions
 */

export type {
  ConfigScalar,
  ConfigNode,
  ConfigMapping,
  LoadOptions,
  LoadResult,
} from './types.js';
export { DIRECTIVE_KEYS, DEFAULT_FLATTEN_SEPARATOR } from './types.js';

export { loadConfig, parseConfig } from './loader.js';

export { resolveInclude, candidatePaths, resolvePackageRoot } from './search-path.js';
export type { IncludeContext } from './search-path.js';

export { mergeNodes, mergeMappings, mergeAll, flattenSubsections } from './merger.js';

export { loadNested } from './nested.js';
export type { NestedLoadOptions, NestedLoadResult, SectionNamer } from './nested.js';

export { isConfigMapping, lookupDotted } from './utils.js';
