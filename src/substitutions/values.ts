// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { Placeholder } from './placeholder.js';

/**
 * True for object literals and parsed YAML/JSON mappings; false for arrays,
 * class instances (namespaces, errors, placeholders) and null.
 */
export function isPlainMapping(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Text inserted for a value with no format spec.
 */
export function toDisplayString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Placeholder) return value.text;
  if (value instanceof Error) return value.message;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Text inserted for a `!r` conversion: strings are quoted.
 */
export function toReprString(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value);
  return toDisplayString(value);
}

/**
 * Short type name for messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  if (typeof value === 'object') {
    return isPlainMapping(value) ? 'mapping' : value.constructor.name;
  }
  return typeof value;
}
