// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Error taxonomy
 *
 * Config errors are always fatal: a configuration that cannot be assembled
 * must not be used. Substitution errors are recoverable through the active
 * forgiveness policy, or collected and reported in bulk.
 */

/**
 * Kinds of substitution failure. Forgiveness policies are keyed by these.
 */
export type SubstitutionErrorKind =
  | 'MissingKey'
  | 'MissingAttribute'
  | 'TypeMismatch'
  | 'BadFormat'
  | 'Substitution'
  | 'CyclicSubstitution';

export const SUBSTITUTION_ERROR_KINDS: readonly SubstitutionErrorKind[] = [
  'MissingKey',
  'MissingAttribute',
  'TypeMismatch',
  'BadFormat',
  'Substitution',
  'CyclicSubstitution',
];

/**
 * Prefix used by every config error message.
 */
export function configErrorLocation(location: string | undefined, source: string): string {
  return `config error at ${location || 'top level'} in ${source}`;
}

/**
 * Fatal error raised while assembling a configuration tree.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly location?: string,
    public readonly directive?: string,
    public readonly searched: readonly string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static malformedDirective(
    source: string,
    location: string | undefined,
    directive: string,
    expected: string
  ): ConfigError {
    return new ConfigError(
      `${configErrorLocation(location, source)}: ${directive}: ${expected}`,
      source,
      location,
      directive
    );
  }

  static includeNotFound(
    source: string,
    location: string | undefined,
    specifier: string,
    searched: readonly string[]
  ): ConfigError {
    const where = searched.length > 0 ? ` (searched ${searched.join(', ')})` : '';
    return new ConfigError(
      `${configErrorLocation(location, source)}: _include ${specifier} not found${where}`,
      source,
      location,
      '_include',
      searched
    );
  }

  static moduleNotFound(
    source: string,
    location: string | undefined,
    specifier: string,
    moduleName: string,
    reason: string
  ): ConfigError {
    return new ConfigError(
      `${configErrorLocation(location, source)}: _include ${specifier}: can't locate package ${moduleName} (${reason})`,
      source,
      location,
      '_include'
    );
  }

  static recursionLimit(source: string, location: string | undefined, limit: number): ConfigError {
    return new ConfigError(
      `${configErrorLocation(location, source)}: recursion limit of ${limit} exceeded, check your _use and _include statements`,
      source,
      location
    );
  }

  static parseFailure(source: string, reason: string): ConfigError {
    return new ConfigError(`config error in ${source}: ${reason}`, source);
  }
}

/**
 * A `_use` reference that does not name any section of the available sources.
 */
export class ConfigReferenceError extends ConfigError {
  constructor(
    source: string,
    location: string | undefined,
    public readonly reference: string
  ) {
    super(
      `${configErrorLocation(location, source)}: _use: unknown key ${reference}`,
      source,
      location,
      '_use'
    );
    this.name = 'ConfigReferenceError';
  }
}

/**
 * Failure to substitute a `{...}` template.
 *
 * `target` is the dotted lookup that failed; `location` is the dotted
 * location of the value being substituted, and `template` its raw text.
 */
export class SubstitutionError extends Error {
  constructor(
    message: string,
    public readonly kind: SubstitutionErrorKind = 'Substitution',
    public readonly target?: string,
    public readonly template?: string,
    public readonly location?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'SubstitutionError';
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static missingKey(name: string, target?: string): SubstitutionError {
    return new SubstitutionError(`'${name}'`, 'MissingKey', target);
  }

  static missingAttribute(name: string, target?: string): SubstitutionError {
    return new SubstitutionError(`'${name}'`, 'MissingAttribute', target);
  }

  static typeMismatch(detail: string, target?: string): SubstitutionError {
    return new SubstitutionError(detail, 'TypeMismatch', target);
  }

  static badFormat(detail: string, target?: string): SubstitutionError {
    return new SubstitutionError(detail, 'BadFormat', target);
  }

  static outsideSession(): SubstitutionError {
    return new SubstitutionError('substitution invoked outside of its session');
  }
}

/**
 * A template that (directly or through other entries) refers back to a
 * location that is still being substituted.
 */
export class CyclicSubstitutionError extends SubstitutionError {
  constructor(
    public readonly location: string,
    public readonly otherLocation: string,
    message?: string,
    template?: string,
    options?: ErrorOptions
  ) {
    super(message ?? `'{${location}}' is a cyclic substitution`, 'CyclicSubstitution', location, template, location, options);
    this.name = 'CyclicSubstitutionError';
  }
}

/**
 * Bulk report of substitution errors recorded during one session.
 */
export class SubstitutionErrorList extends Error {
  constructor(public readonly errors: readonly SubstitutionError[]) {
    super(`${errors.length} substitution error(s)`);
    this.name = 'SubstitutionErrorList';
    Object.setPrototypeOf(this, SubstitutionErrorList.prototype);
  }

  /**
   * Summary line followed by one line per error.
   */
  describe(): string {
    return [this.message, ...this.errors.map((error) => `  ${error.message}`)].join('\n');
  }
}
