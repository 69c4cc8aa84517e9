// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Substitutions Module
 *
 * Lazy `{name.attr}` templates resolved against a namespace tree:
 *
 * - namespace.ts   - Namespace tree and lookups
 * - context.ts     - Template evaluation, cycle detection, error record
 * - session.ts     - Scoped sessions
 * - template.ts    - Template grammar
 * - format-spec.ts - `:spec` formatting
 * - forgiveness.ts - Forgiveness policies
 * - parameters.ts  - Per-parameter substitution with deferred failures
 * - resolve.ts     - Whole-namespace resolution
 */

export { Namespace } from './namespace.js';
export type { NamespaceOptions, AddOptions } from './namespace.js';

export { SubstitutionContext } from './context.js';

export { substitutionsFrom, forgivingSubstitutionsFrom, currentSubstitutionContext } from './session.js';

export { parseTemplate, parseField, renderTemplate, formatTemplate } from './template.js';
export type { TemplateToken, TemplateField, FieldAccessor, FieldResolver } from './template.js';

export { formatValue, parseFormatSpec } from './format-spec.js';
export type { FormatSpec, Alignment } from './format-spec.js';

export { forgivenessAction, forgivingPolicy } from './forgiveness.js';
export type { ForgivenessAction } from './forgiveness.js';

export { Placeholder } from './placeholder.js';

export { substituteParameters, splitUnresolved, Unresolved } from './parameters.js';
export type { ParameterOptions } from './parameters.js';

export { resolveNamespace } from './resolve.js';

export type {
  ForgivenessRule,
  ForgivenessPolicy,
  MissingBehavior,
  LookupResult,
  EntryProps,
  SubstitutionOptions,
  ForgivingOptions,
  EvaluateOptions,
  GetOptions,
} from './types.js';
