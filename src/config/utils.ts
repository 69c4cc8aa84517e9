// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Tree helpers shared by the loader and the merger.
 */

import type { ConfigMapping, ConfigNode } from './types.js';

export function isConfigMapping(value: unknown): value is ConfigMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a key as an own data property. Plain assignment would treat
 * `__proto__` as the prototype setter and drop the key.
 */
export function setEntry(mapping: ConfigMapping, key: string, value: ConfigNode): void {
  Object.defineProperty(mapping, key, { value, writable: true, enumerable: true, configurable: true });
}

/**
 * Check that a parsed document only holds values a configuration tree may
 * contain. js-yaml can produce dates for unquoted timestamps; these become
 * ISO strings.
 */
export function toConfigNode(value: unknown): ConfigNode {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return value.map((item) => toConfigNode(item));
  if (typeof value === 'object') {
    const mapping: ConfigMapping = {};
    for (const [key, item] of Object.entries(value)) {
      setEntry(mapping, key, toConfigNode(item));
    }
    return mapping;
  }
  return String(value);
}

/**
 * Look up a dotted name ("a.b.c") by key descent, trying each source in
 * order. Returns undefined when no source has it.
 */
export function lookupDotted(
  name: string,
  sources: readonly ConfigMapping[]
): ConfigNode | undefined {
  const path = name.split('.');
  for (const source of sources) {
    let current: ConfigNode | undefined = source;
    for (const key of path) {
      if (!isConfigMapping(current) || !Object.prototype.hasOwnProperty.call(current, key)) {
        current = undefined;
        break;
      }
      current = current[key];
    }
    if (current !== undefined && current !== null) {
      return current;
    }
  }
  return undefined;
}

/**
 * Copy of a mapping without the given keys.
 */
export function omitKeys(mapping: ConfigMapping, keys: readonly string[]): ConfigMapping {
  const result: ConfigMapping = {};
  for (const [key, value] of Object.entries(mapping)) {
    if (!keys.includes(key)) {
      setEntry(result, key, value);
    }
  }
  return result;
}

/**
 * Normalize a directive value to a list of strings, or null if malformed.
 */
export function toStringList(value: ConfigNode): string[] | null {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  return null;
}
