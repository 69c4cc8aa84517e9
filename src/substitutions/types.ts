// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import type { SubstitutionError, SubstitutionErrorKind } from '../errors.js';
import type { SubstitutionContext } from './context.js';

/**
 * What to do about one kind of substitution failure:
 *
 * - `true`: insert a generic `(Kind: message)` marker
 * - a template string: insert it, formatted with `name`, `value`, `target`
 *   and `exc` (the error)
 * - `null` or `false`: the failure is not forgiven
 */
export type ForgivenessRule = true | false | string | null;

export type ForgivenessPolicy = Partial<Record<SubstitutionErrorKind, ForgivenessRule>>;

/**
 * Behaviour of a namespace lookup that finds nothing.
 */
export type MissingBehavior = 'key' | 'attribute' | { default: unknown };

export type LookupResult =
  | { status: 'found'; value: unknown }
  | { status: 'missing'; name: string }
  | { status: 'failed'; error: SubstitutionError };

/**
 * Per-entry properties recorded when a value is added to a namespace.
 */
export interface EntryProps {
  /** When false, the entry and everything below it is never substituted */
  mutable: boolean;
  /** Layered over the context policy while this entry is evaluated */
  forgiving: ForgivenessPolicy;
}

export interface SubstitutionOptions {
  /** Throw on the first unforgiven failure instead of recording it */
  raiseErrors?: boolean;
  forgive?: ForgivenessPolicy;
}

export interface ForgivingOptions extends Omit<SubstitutionOptions, 'forgive'> {
  /** Text for failed templates, or `true` for a generic marker (default '') */
  forgive?: true | string;
}

export interface EvaluateOptions {
  /** Descend into lists and mappings (default true) */
  recursive?: boolean;
  /** Layered over the current policy for this evaluation */
  policy?: ForgivenessPolicy;
}

export interface GetOptions {
  /** Defaults to the session active on the current async call chain */
  context?: SubstitutionContext | null;
  /** Defaults to `{ default: undefined }` */
  missing?: MissingBehavior;
}
