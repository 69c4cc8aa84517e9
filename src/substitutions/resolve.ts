// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { SubstitutionContext } from './context.js';
import { Namespace } from './namespace.js';
import { Placeholder } from './placeholder.js';

/**
 * Substitute every value of a namespace within `context` and return the
 * result as plain data. Strings inside lists and mappings are substituted
 * too; placeholders become their text.
 */
export function resolveNamespace(namespace: Namespace, context: SubstitutionContext): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const key of namespace.keys()) {
    const value = namespace.get(key, { context });
    if (value instanceof Namespace) {
      result[key] = resolveNamespace(value, context);
    } else if (value instanceof Placeholder) {
      result[key] = value.text;
    } else if (typeof value === 'string' || namespace.noSubstitution || namespace.props(key)?.mutable === false) {
      // strings were substituted by the lookup itself
      result[key] = value;
    } else {
      result[key] = context.evaluate(value, [...namespace.path, key], { policy: namespace.props(key)?.forgiving });
    }
  }
  return result;
}
