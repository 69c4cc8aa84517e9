// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Substitution context
 *
 * Holds the namespace, forgiveness policy and error record of one session,
 * and evaluates templates against it. Each evaluation pushes a frame; a
 * frame records the chain of names its current field has looked up so far.
 * A lookup chain equal to one already in progress lower in the stack is a
 * cycle.
 */

import { CyclicSubstitutionError, SubstitutionError } from '../errors.js';
import { forgivenessAction, validatePolicy } from './forgiveness.js';
import { Namespace } from './namespace.js';
import { Placeholder } from './placeholder.js';
import { formatTemplate, parseTemplate, renderTemplate, type FieldAccessor, type TemplateField } from './template.js';
import type { EvaluateOptions, ForgivenessPolicy, SubstitutionOptions } from './types.js';
import { describeType, isPlainMapping } from './values.js';

interface EvaluationFrame {
  /** Names looked up so far by the field being rendered */
  inProgress: string[];
  /** Location of the value this frame is evaluating */
  origin: readonly string[];
  policy: ForgivenessPolicy;
}

function toSubstitutionError(error: unknown): SubstitutionError {
  if (error instanceof SubstitutionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new SubstitutionError(message, 'Substitution', undefined, undefined, undefined, { cause: error });
}

function sameChain(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

function isEvaluable(value: unknown): boolean {
  return typeof value === 'string' || Array.isArray(value) || isPlainMapping(value);
}

export class SubstitutionContext {
  readonly raiseErrors: boolean;
  readonly policy: ForgivenessPolicy;
  /** Unforgiven failures, in the order they occurred */
  errors: SubstitutionError[] = [];
  /** Locations whose templates were replaced by forgiveness text */
  forgiven: string[] = [];

  private readonly frames: EvaluationFrame[] = [];
  private active = true;

  constructor(
    readonly namespace: Namespace | null,
    options: SubstitutionOptions = {}
  ) {
    this.raiseErrors = options.raiseErrors ?? false;
    this.policy = options.forgive ?? {};
    validatePolicy(this.policy);
  }

  get isActive(): boolean {
    return this.active;
  }

  /** Number of evaluations in progress */
  get depth(): number {
    return this.frames.length;
  }

  close(): void {
    this.active = false;
  }

  /**
   * Return the recorded errors and start a fresh record.
   */
  takeErrors(): SubstitutionError[] {
    const errors = this.errors;
    this.errors = [];
    return errors;
  }

  /**
   * Substitute templates in a string, or in every string of a list or
   * mapping. Containers are copied only where something changed. Other
   * values are returned as they are.
   */
  evaluate(value: string, location?: readonly string[], options?: EvaluateOptions): string;
  evaluate(value: unknown, location?: readonly string[], options?: EvaluateOptions): unknown;
  evaluate(value: unknown, location: readonly string[] = [], options: EvaluateOptions = {}): unknown {
    if (!this.active) {
      throw SubstitutionError.outsideSession();
    }
    if (this.namespace === null || !isEvaluable(value)) {
      return value;
    }
    if (options.recursive === false && typeof value !== 'string') {
      return value;
    }

    this.frames.push({
      inProgress: [],
      origin: [...location],
      policy: { ...this.currentPolicy(), ...options.policy },
    });
    try {
      return this.evaluateElement(value, location);
    } finally {
      this.frames.pop();
    }
  }

  /**
   * Evaluate a namespace entry's value as part of a lookup.
   * @internal
   */
  evaluateEntry(value: unknown, location: readonly string[], policy: ForgivenessPolicy): unknown {
    return this.evaluate(value, location, { recursive: false, policy });
  }

  /**
   * Record a name looked up by the field being rendered. Returns the cycle
   * error when the chain so far is already being evaluated further down.
   * @internal
   */
  trackLookup(name: string): CyclicSubstitutionError | undefined {
    const top = this.frames.at(-1);
    if (!top) {
      return undefined;
    }
    top.inProgress.push(name);
    for (const frame of this.frames.slice(0, -1)) {
      if (sameChain(frame.inProgress, top.inProgress)) {
        return new CyclicSubstitutionError(top.origin.join('.'), frame.origin.join('.'));
      }
    }
    return undefined;
  }

  /**
   * Placeholder for a failed lookup, if the current policy forgives it.
   * @internal
   */
  forgiveLookup(error: SubstitutionError, key: string, raw: unknown): Placeholder | undefined {
    const action = forgivenessAction(this.currentPolicy(), error.kind);
    switch (action.type) {
      case 'generic':
        return new Placeholder(`(${error.kind}: ${error.message})`);
      case 'template':
        return new Placeholder(
          formatTemplate(action.template, {
            name: this.currentChain(),
            value: raw ?? null,
            target: key,
            exc: error,
          })
        );
      case 'fail':
        return undefined;
    }
  }

  private currentPolicy(): ForgivenessPolicy {
    return this.frames.at(-1)?.policy ?? this.policy;
  }

  private currentChain(): string {
    return (this.frames.at(-1)?.inProgress ?? []).join('.');
  }

  private evaluateElement(value: unknown, location: readonly string[]): unknown {
    if (typeof value === 'string') {
      return value.includes('{') ? this.evaluateString(value, location) : value;
    }
    if (Array.isArray(value)) {
      let result = value;
      value.forEach((element: unknown, index) => {
        const evaluated = this.evaluateElement(element, [...location, String(index)]);
        if (evaluated !== element) {
          if (result === value) result = [...value];
          result[index] = evaluated;
        }
      });
      return result;
    }
    if (isPlainMapping(value)) {
      let result = value;
      for (const [key, element] of Object.entries(value)) {
        const evaluated = this.evaluateElement(element, [...location, key]);
        if (evaluated !== element) {
          if (result === value) result = { ...value };
          result[key] = evaluated;
        }
      }
      return result;
    }
    return value;
  }

  /**
   * Render one template. Escaped braces are resolved from the template's
   * own text only; inserted values are never scanned again.
   */
  private evaluateString(template: string, location: readonly string[]): string {
    try {
      return renderTemplate(parseTemplate(template), (field) => this.resolveField(field));
    } catch (error) {
      return this.handleFailure(toSubstitutionError(error), template, location.join('.'));
    }
  }

  private resolveField(field: TemplateField): unknown {
    const namespace = this.namespace;
    const top = this.frames.at(-1);
    if (!namespace || !top) {
      throw SubstitutionError.outsideSession();
    }
    top.inProgress = [];
    let value = namespace.get(field.root, { context: this, missing: 'key' });
    for (const accessor of field.accessors) {
      value = this.access(value, accessor, top);
    }
    return value;
  }

  private access(value: unknown, accessor: FieldAccessor, frame: EvaluationFrame): unknown {
    const { kind, name } = accessor;
    if (value instanceof Placeholder) {
      return value;
    }
    if (value instanceof Namespace) {
      return value.get(name, { context: this, missing: kind === 'attribute' ? 'attribute' : 'key' });
    }

    // plain data is never substituted; the chain only feeds messages
    frame.inProgress.push(name);
    const target = frame.inProgress.join('.');
    const miss = () =>
      kind === 'attribute' ? SubstitutionError.missingAttribute(name, target) : SubstitutionError.missingKey(name, target);

    if (Array.isArray(value)) {
      if (kind === 'attribute') throw miss();
      if (!/^\d+$/.test(name)) {
        throw SubstitutionError.typeMismatch(`list indices must be integers, not '${name}'`, target);
      }
      const index = Number(name);
      if (index >= value.length) throw miss();
      return value[index];
    }
    if (isPlainMapping(value)) {
      if (!Object.prototype.hasOwnProperty.call(value, name)) throw miss();
      return value[name];
    }
    if (kind === 'attribute') throw miss();
    throw SubstitutionError.typeMismatch(`'${describeType(value)}' object is not subscriptable`, target);
  }

  private handleFailure(error: SubstitutionError, template: string, name: string): string {
    const action = forgivenessAction(this.currentPolicy(), error.kind);
    const target = this.currentChain();

    if (action.type === 'template') {
      this.forgiven.push(name);
      return formatTemplate(action.template, { name, value: template, target, exc: error });
    }
    if (action.type === 'generic') {
      this.forgiven.push(name);
      return `(${error.message})`;
    }

    const report = this.report(error, template, name, target);
    this.errors.push(report);
    if (this.raiseErrors) {
      throw report;
    }
    return '';
  }

  /**
   * Build the recorded error for a failure inside `template`. A failure
   * that is itself a report from a nested template is described by its
   * original cause.
   */
  private report(error: SubstitutionError, template: string, name: string, target: string): SubstitutionError {
    const cause = error.template !== undefined && error.cause instanceof SubstitutionError ? error.cause : error;
    const where = name ? `${name}='${template}'` : `'${template}'`;

    if (cause instanceof CyclicSubstitutionError) {
      return new CyclicSubstitutionError(
        cause.location,
        cause.otherLocation,
        `{${target}}: ${cause.message}, in ${where}`,
        template,
        { cause }
      );
    }
    const message =
      cause.kind === 'MissingKey' || cause.kind === 'MissingAttribute'
        ? `{${target}} unresolved, in ${where}`
        : `${cause.kind} at {${target}}: ${cause.message}, in ${where}`;
    return new SubstitutionError(message, cause.kind, target, template, name, { cause });
  }
}
