// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Substitution sessions
 *
 * A session makes a context current for the duration of a callback. Inside
 * it, namespace lookups substitute their values; once the callback settles
 * the context is closed and refuses further evaluation.
 */

import { activeContext } from './active.js';
import { SubstitutionContext } from './context.js';
import { forgivingPolicy } from './forgiveness.js';
import type { Namespace } from './namespace.js';
import type { ForgivingOptions, SubstitutionOptions } from './types.js';

export { currentSubstitutionContext } from './active.js';

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

/**
 * Run `body` with a new substitution context over `namespace`.
 *
 * Sessions nest: the innermost one is current. If `body` returns a promise
 * the session stays open until it settles.
 */
export function substitutionsFrom<T>(
  namespace: Namespace | null,
  options: SubstitutionOptions,
  body: (context: SubstitutionContext) => T
): T {
  const context = new SubstitutionContext(namespace, options);
  let result: T;
  try {
    result = activeContext.run(context, body, context);
  } catch (error) {
    context.close();
    throw error;
  }
  if (isPromiseLike(result)) {
    void Promise.resolve(result).then(
      () => context.close(),
      () => context.close()
    );
    return result;
  }
  context.close();
  return result;
}

/**
 * Like {@link substitutionsFrom}, forgiving every kind of failure except
 * cyclic substitutions. The default empty `forgive` string replaces failed
 * templates with nothing; `true` inserts a generic marker.
 */
export function forgivingSubstitutionsFrom<T>(
  namespace: Namespace | null,
  options: ForgivingOptions,
  body: (context: SubstitutionContext) => T
): T {
  const { forgive = '', ...rest } = options;
  return substitutionsFrom(namespace, { ...rest, forgive: forgivingPolicy(forgive) }, body);
}
