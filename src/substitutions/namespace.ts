// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Substitution namespace
 *
 * A tree of named values that `{name.attr}` templates are resolved
 * against. Mappings added to a namespace become child namespaces. String
 * values are substituted lazily, each time they are looked up inside an
 * open session, unless the entry (or an ancestor) was added with
 * `mutable: false`.
 */

import { SubstitutionError } from '../errors.js';
import { currentSubstitutionContext } from './active.js';
import type { SubstitutionContext } from './context.js';
import { Placeholder } from './placeholder.js';
import type { EntryProps, ForgivenessPolicy, GetOptions, LookupResult } from './types.js';
import { isPlainMapping, toDisplayString } from './values.js';

export interface NamespaceOptions {
  /** Location of this namespace within its root, for messages */
  path?: readonly string[];
  /** Never substitute anything in this namespace or below it */
  noSubstitution?: boolean;
}

export interface AddOptions {
  mutable?: boolean;
  forgiving?: ForgivenessPolicy;
}

interface NamespaceEntry {
  value: unknown;
  props: EntryProps;
}

export class Namespace {
  readonly path: readonly string[];
  readonly noSubstitution: boolean;
  private readonly table = new Map<string, NamespaceEntry>();

  constructor(values: Readonly<Record<string, unknown>> = {}, options: NamespaceOptions = {}) {
    this.path = options.path ?? [];
    this.noSubstitution = options.noSubstitution ?? false;
    for (const [key, value] of Object.entries(values)) {
      this.add(key, value);
    }
  }

  get size(): number {
    return this.table.size;
  }

  /**
   * Add (or replace) an entry. Mappings are wrapped as child namespaces;
   * `mutable: false` protects the whole subtree from substitution.
   */
  add(key: string, value: unknown, options: AddOptions = {}): this {
    const mutable = options.mutable ?? true;
    const protect = this.noSubstitution || !mutable;
    const childPath = [...this.path, key];

    let stored = value;
    if (isPlainMapping(value)) {
      stored = new Namespace(value, { path: childPath, noSubstitution: protect });
    } else if (value instanceof Namespace && protect && !value.noSubstitution) {
      stored = value.protectedCopy(childPath);
    }
    this.table.set(key, { value: stored, props: { mutable, forgiving: options.forgiving ?? {} } });
    return this;
  }

  /**
   * Replace an entry's value, keeping its properties.
   */
  set(key: string, value: unknown): this {
    const existing = this.table.get(key);
    return this.add(key, value, existing?.props);
  }

  has(key: string): boolean {
    return this.table.has(key);
  }

  keys(): string[] {
    return [...this.table.keys()];
  }

  /**
   * Raw, unsubstituted values.
   */
  *entries(): IterableIterator<[string, unknown]> {
    for (const [key, entry] of this.table) {
      yield [key, entry.value];
    }
  }

  raw(key: string): unknown {
    return this.table.get(key)?.value;
  }

  props(key: string): EntryProps | undefined {
    return this.table.get(key)?.props;
  }

  /**
   * Look up one entry and substitute its value within `context`.
   *
   * A miss is reported as such; a failure while substituting the value
   * (when the context raises) is returned rather than thrown.
   */
  lookup(key: string, context: SubstitutionContext | null): LookupResult {
    const cycle = context?.trackLookup(key);
    if (cycle) {
      return { status: 'failed', error: cycle };
    }
    const entry = this.table.get(key);
    if (!entry) {
      return { status: 'missing', name: key };
    }
    if (!context || this.noSubstitution || !entry.props.mutable) {
      return { status: 'found', value: entry.value };
    }
    try {
      return { status: 'found', value: context.evaluateEntry(entry.value, [...this.path, key], entry.props.forgiving) };
    } catch (error) {
      if (error instanceof SubstitutionError) {
        return { status: 'failed', error };
      }
      throw error;
    }
  }

  /**
   * Substituted value of an entry. Outside a session the raw value is
   * returned.
   */
  get(key: string, options: GetOptions = {}): unknown {
    const context = options.context === undefined ? currentSubstitutionContext() : options.context;
    const missing = options.missing ?? { default: undefined };
    const result = this.lookup(key, context);

    switch (result.status) {
      case 'found':
        return result.value;
      case 'missing': {
        if (typeof missing === 'object') return missing.default;
        const error =
          missing === 'attribute'
            ? SubstitutionError.missingAttribute(key, this.dotted(key))
            : SubstitutionError.missingKey(key, this.dotted(key));
        return this.fail(error, key, context);
      }
      case 'failed':
        return this.fail(result.error, key, context);
    }
  }

  private fail(error: SubstitutionError, key: string, context: SubstitutionContext | null): Placeholder {
    const placeholder = context?.forgiveLookup(error, key, this.raw(key));
    if (placeholder) {
      return placeholder;
    }
    throw error;
  }

  private dotted(key: string): string {
    return [...this.path, key].join('.');
  }

  /**
   * Recursively merge another namespace or mapping into this one. Child
   * namespaces are copied before being merged into.
   */
  merge(other: Namespace | Readonly<Record<string, unknown>>): this {
    const pairs = other instanceof Namespace ? [...other.entries()] : Object.entries(other);
    for (const [key, value] of pairs) {
      const entry = this.table.get(key);
      if (entry && entry.value instanceof Namespace && (value instanceof Namespace || isPlainMapping(value))) {
        this.table.set(key, { value: entry.value.copy().merge(value), props: entry.props });
      } else {
        this.add(key, value);
      }
    }
    return this;
  }

  /**
   * Shallow copy: entries are shared, the entry table is not.
   */
  copy(): Namespace {
    const clone = new Namespace({}, { path: this.path, noSubstitution: this.noSubstitution });
    for (const [key, entry] of this.table) {
      clone.table.set(key, entry);
    }
    return clone;
  }

  private protectedCopy(path: readonly string[]): Namespace {
    const clone = new Namespace({}, { path, noSubstitution: true });
    for (const [key, entry] of this.table) {
      const value = entry.value instanceof Namespace ? entry.value.protectedCopy([...path, key]) : entry.value;
      clone.table.set(key, { value, props: entry.props });
    }
    return clone;
  }

  /**
   * Raw values as plain data, child namespaces included.
   */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of this.table) {
      result[key] = entry.value instanceof Namespace ? entry.value.toObject() : entry.value;
    }
    return result;
  }

  toJSON(): Record<string, unknown> {
    return this.toObject();
  }

  /**
   * Indented listing of the raw tree. Names that start or end with `_`
   * are skipped.
   */
  dump(prefix = ''): string[] {
    const lines: string[] = [];
    for (const [key, entry] of this.table) {
      if (key.startsWith('_') || key.endsWith('_')) continue;
      if (entry.value instanceof Namespace) {
        lines.push(`${prefix}${key}:`);
        lines.push(...entry.value.dump(`${prefix}  `));
      } else if (entry.value instanceof Error) {
        lines.push(`${prefix}${key}: ERR: ${entry.value.message}`);
      } else {
        lines.push(`${prefix}${key}: ${toDisplayString(entry.value)}`);
      }
    }
    return lines;
  }
}
