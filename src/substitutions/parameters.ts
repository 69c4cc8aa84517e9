// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Parameter substitution: resolve a flat map of named parameters (such as
 * one step's inputs) against a namespace, one field at a time.
 */

import { SubstitutionErrorList, type SubstitutionError } from '../errors.js';
import { logger } from '../logger.js';
import type { Namespace } from './namespace.js';
import { substitutionsFrom } from './session.js';

/**
 * Stands in for a parameter whose substitution failed when the caller
 * asked to defer errors.
 */
export class Unresolved {
  constructor(
    public readonly errors: readonly SubstitutionError[],
    public readonly template?: unknown
  ) {}

  toString(): string {
    return `Unresolved(${this.errors.map((error) => error.message).join('; ')})`;
  }
}

export interface ParameterOptions {
  /** Prefix of each parameter's location in messages */
  fqname?: string;
  /** Names passed through untouched */
  skip?: Iterable<string>;
  /** Replace failed parameters with {@link Unresolved} instead of throwing */
  ignoreErrors?: boolean;
}

/**
 * Substitute every parameter. Errors are collected across all parameters
 * before {@link SubstitutionErrorList} is thrown.
 */
export function substituteParameters(
  params: Readonly<Record<string, unknown>>,
  namespace: Namespace,
  options: ParameterOptions = {}
): Record<string, unknown> {
  const skip = new Set(options.skip ?? []);
  const resolved: Record<string, unknown> = {};
  const errors: SubstitutionError[] = [];

  substitutionsFrom(namespace, { raiseErrors: false }, (context) => {
    for (const [name, value] of Object.entries(params)) {
      if (skip.has(name)) {
        resolved[name] = value;
        continue;
      }
      const location = options.fqname ? [options.fqname, name] : [name];
      const result = context.evaluate(value, location);
      const failures = context.takeErrors();
      if (failures.length === 0) {
        resolved[name] = result;
      } else if (options.ignoreErrors) {
        resolved[name] = new Unresolved(failures, value);
      } else {
        resolved[name] = result;
        errors.push(...failures);
      }
    }
  });

  if (errors.length > 0) {
    logger.substitutionReport(errors);
    throw new SubstitutionErrorList(errors);
  }
  return resolved;
}

/**
 * Separate deferred failures from resolved values.
 */
export function splitUnresolved(params: Readonly<Record<string, unknown>>): {
  resolved: Record<string, unknown>;
  unresolved: Record<string, Unresolved>;
} {
  const resolved: Record<string, unknown> = {};
  const unresolved: Record<string, Unresolved> = {};
  for (const [name, value] of Object.entries(params)) {
    if (value instanceof Unresolved) {
      unresolved[name] = value;
    } else {
      resolved[name] = value;
    }
  }
  return { resolved, unresolved };
}
