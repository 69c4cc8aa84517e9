// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { SUBSTITUTION_ERROR_KINDS, type SubstitutionErrorKind } from '../errors.js';
import { parseTemplate } from './template.js';
import type { ForgivenessPolicy } from './types.js';

export type ForgivenessAction = { type: 'fail' } | { type: 'generic' } | { type: 'template'; template: string };

/**
 * Decide what a policy says about one kind of failure.
 */
export function forgivenessAction(policy: ForgivenessPolicy, kind: SubstitutionErrorKind): ForgivenessAction {
  const rule = policy[kind];
  if (rule === true) return { type: 'generic' };
  if (typeof rule === 'string') return { type: 'template', template: rule };
  return { type: 'fail' };
}

/**
 * Policy forgiving every kind of failure except cyclic substitutions.
 */
export function forgivingPolicy(rule: true | string): ForgivenessPolicy {
  const policy: ForgivenessPolicy = {};
  for (const kind of SUBSTITUTION_ERROR_KINDS) {
    if (kind !== 'CyclicSubstitution') {
      policy[kind] = rule;
    }
  }
  return policy;
}

/**
 * Throws a BadFormat error if a template rule does not parse.
 */
export function validatePolicy(policy: ForgivenessPolicy): void {
  for (const rule of Object.values(policy)) {
    if (typeof rule === 'string') {
      parseTemplate(rule);
    }
  }
}
