// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Types
 */

export type ConfigScalar = string | number | boolean | null;

/**
 * A node of a configuration tree.
 */
export type ConfigNode = ConfigScalar | ConfigNode[] | ConfigMapping;

/**
 * An ordered mapping of keys to nodes. Insertion order is significant.
 */
export interface ConfigMapping {
  [key: string]: ConfigNode;
}

/**
 * Reserved keys that steer tree assembly instead of holding data.
 */
export const DIRECTIVE_KEYS = {
  include: '_include',
  use: '_use',
  flatten: '_flatten',
  flattenSeparator: '_flatten_sep',
} as const;

export const DEFAULT_FLATTEN_SEPARATOR = '__';

/**
 * Options for {@link loadConfig}.
 */
export interface LoadOptions {
  /**
   * Trees used to resolve `_use` references, searched in order.
   * `null` disables `_use` processing altogether.
   */
  useSources?: ConfigMapping[] | null;
  /** Process `_include` directives (default true) */
  includes?: boolean;
  /**
   * Let nested sections `_use` content of the tree being loaded
   * (its enclosing mappings), in addition to `useSources` (default true).
   */
  selfRefs?: boolean;
  /** If set, each included file records its own path under this key */
  includePath?: string;
  /** Include search roots; defaults to the settings search path */
  searchPath?: readonly string[];
  /** Name of the file used in messages (defaults to its basename) */
  name?: string;
  /** Location of this tree inside a larger one, used in messages */
  location?: string;
}

/**
 * A loaded, directive-free tree and the files it was assembled from.
 */
export interface LoadResult<T extends ConfigNode = ConfigMapping> {
  config: T;
  dependencies: Set<string>;
}
