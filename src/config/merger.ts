// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Merger
 *
 * Functions for merging configuration trees.
 * Priority: later layers > earlier layers. Neither input is modified;
 * subtrees that only one side has are shared by reference.
 */

import type { ConfigMapping, ConfigNode } from './types.js';
import { isConfigMapping, setEntry } from './utils.js';

/**
 * Merge `override` on top of `base`.
 *
 * Mappings merge key by key, recursively. Sequences and scalars in
 * `override` replace whatever `base` holds.
 */
export function mergeNodes(base: ConfigNode, override: ConfigNode): ConfigNode {
  if (isConfigMapping(base) && isConfigMapping(override)) {
    return mergeMappings(base, override);
  }
  return override;
}

export function mergeMappings(base: ConfigMapping, override: ConfigMapping): ConfigMapping {
  const result: ConfigMapping = { ...base };
  for (const [key, value] of Object.entries(override)) {
    setEntry(result, key, Object.prototype.hasOwnProperty.call(base, key) ? mergeNodes(base[key], value) : value);
  }
  return result;
}

/**
 * Merge a list of mappings in order (later entries override earlier ones).
 */
export function mergeAll(layers: readonly ConfigMapping[]): ConfigMapping {
  return layers.reduce<ConfigMapping>((merged, layer) => mergeMappings(merged, layer), {});
}

/**
 * Flatten subsections into prefixed keys.
 *
 * ```yaml
 * a:
 *   b: 1
 *   c: 2
 * ```
 * becomes `{ a__b: 1, a__c: 2 }` at depth 1. Scalar keys keep their place;
 * flattened keys follow them.
 */
export function flattenSubsections(
  mapping: ConfigMapping,
  depth: number = 1,
  separator: string = '__'
): ConfigMapping {
  const result: ConfigMapping = {};
  const subsections: Array<[string, ConfigMapping]> = [];

  for (const [key, value] of Object.entries(mapping)) {
    if (isConfigMapping(value)) {
      subsections.push([key, value]);
    } else {
      setEntry(result, key, value);
    }
  }

  for (const [name, subsection] of subsections) {
    const inner = depth > 1 ? flattenSubsections(subsection, depth - 1, separator) : subsection;
    for (const [key, value] of Object.entries(inner)) {
      setEntry(result, `${name}${separator}${key}`, value);
    }
  }
  return result;
}
