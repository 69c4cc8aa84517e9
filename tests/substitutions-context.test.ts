// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { Namespace } from '../src/substitutions/namespace.js';
import { forgivingSubstitutionsFrom, substitutionsFrom } from '../src/substitutions/session.js';
import { CyclicSubstitutionError, SubstitutionError } from '../src/errors.js';

/**
 * x is protected data; foo and bar refer to it and to each other.
 * foo.d/bar.d and bar.e are cycles; bar.c and bar.c1 refer to missing names.
 */
function buildNamespace(): Namespace {
  const ns = new Namespace();
  ns.add('x', { a: 1, c: 3 }, { mutable: false });
  ns.add('foo', {
    a: '{x.a}-{x.c}',
    b: '{foo.a}{{}}',
    d: '{bar.d}',
  });
  ns.add('bar', {
    a: 1,
    b: '{foo.b}',
    c: '{foo.x} deliberately unresolved',
    c1: '{foo.x.y.z} deliberately unresolved',
    d: '{foo.d}',
    e: '{bar.e}',
  });
  return ns;
}

describe('Substitutions - SubstitutionContext', () => {
  describe('evaluate', () => {
    it('resolves references through other templates', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(context.evaluate('{bar.a}')).toBe('1');
        expect(context.evaluate('{foo.a}')).toBe('1-3');
        expect(context.evaluate('{bar.b}')).toBe('1-3{}');
      });
    });

    it('evaluates lists and mappings element-wise', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(context.evaluate(['{x.a}-{x.c}', '{foo.a}{{}}'])).toEqual(['1-3', '1-3{}']);
        expect(context.evaluate({ a: '{x.a}', b: ['{x.c}', 5] })).toEqual({ a: '1', b: ['3', 5] });
      });
    });

    it('returns unchanged containers and other values as they are', () => {
      const ns = buildNamespace();
      const list = ['plain', { k: 'text' }];
      const error = new Error('kept');

      substitutionsFrom(ns, {}, (context) => {
        expect(context.evaluate(list)).toBe(list);
        expect(context.evaluate(5)).toBe(5);
        expect(context.evaluate(error)).toBe(error);
        expect(context.evaluate(['{x.a}'], [], { recursive: false })).toEqual(['{x.a}']);
      });
    });

    it('copies only the containers that changed', () => {
      const ns = buildNamespace();
      const untouched = { k: 'text' };
      const input = { changed: '{x.a}', untouched };

      const output = substitutionsFrom(ns, {}, (context) => context.evaluate(input));

      expect(output).toEqual({ changed: '1', untouched: { k: 'text' } });
      expect(output).not.toBe(input);
      expect(input.changed).toBe('{x.a}');
      const kept = typeof output === 'object' && output !== null && 'untouched' in output ? output.untouched : undefined;
      expect(kept).toBe(untouched);
    });

    it('turns escaped braces into single braces', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, {}, (context) => {
        expect(context.evaluate('{{}}')).toBe('{}');
        expect(context.evaluate('{{literal}}')).toBe('{literal}');
        expect(context.evaluate('{{{x.a}}}')).toBe('{1}');
      });
    });

    it('inserts protected values without substituting them', () => {
      const ns = buildNamespace();
      ns.add('raw', { t: '{x.a}' }, { mutable: false });

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(context.evaluate('{raw.t}')).toBe('{x.a}');
      });
    });

    it('keeps escaped braces inside protected values', () => {
      const ns = buildNamespace();
      ns.add('raw', { t: '{{keep}}' }, { mutable: false });

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(context.evaluate('{raw.t}')).toBe('{{keep}}');
        expect(context.evaluate('<{raw.t}>')).toBe('<{{keep}}>');
      });
    });

    it('keeps escaped braces inside plain list values', () => {
      const ns = buildNamespace();
      ns.add('list', ['{{keep}}']);

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(context.evaluate('{list[0]}')).toBe('{{keep}}');
      });
    });

    it('applies conversions and format specs', () => {
      const ns = new Namespace({ n: 3, name: 'ab', w: 5 });

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(context.evaluate('{n:03d}')).toBe('003');
        expect(context.evaluate('{name!r}')).toBe('"ab"');
        expect(context.evaluate('{name:>{w}}')).toBe('   ab');
      });
    });

    it('indexes lists and namespaces', () => {
      const ns = buildNamespace();
      ns.add('list', ['a', { deep: 'b' }]);

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(context.evaluate('{list[0]}')).toBe('a');
        expect(context.evaluate('{list[1].deep}')).toBe('b');
        expect(context.evaluate('{foo[a]}')).toBe('1-3');
      });
    });

    it('does nothing without a namespace', () => {
      substitutionsFrom(null, {}, (context) => {
        expect(context.evaluate('{anything}')).toBe('{anything}');
      });
    });
  });

  describe('error recording', () => {
    it('records a failure and yields an empty string', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, {}, (context) => {
        expect(context.evaluate('{bar.c}')).toBe('');
        expect(context.errors).toHaveLength(1);
        expect(context.errors[0]).toMatchObject({
          message: "{foo.x} unresolved, in bar.c='{foo.x} deliberately unresolved'",
          kind: 'MissingAttribute',
          target: 'foo.x',
          location: 'bar.c',
          template: '{foo.x} deliberately unresolved',
        });
      });
    });

    it('records cycles and format errors', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, {}, (context) => {
        context.evaluate('{bar.d}');
        context.evaluate('{bar.e}');
        context.evaluate('{foo.a:02d}');

        expect(context.errors).toHaveLength(3);
        expect(context.errors[0]).toBeInstanceOf(CyclicSubstitutionError);
        expect(context.errors[1]).toMatchObject({
          message: "{bar.e}: '{bar.e}' is a cyclic substitution, in bar.e='{bar.e}'",
          location: 'bar.e',
          otherLocation: '',
        });
        expect(context.errors[2]).toMatchObject({
          message: "BadFormat at {foo.a}: Unknown format code 'd' for object of type 'str', in '{foo.a:02d}'",
          kind: 'BadFormat',
        });
      });
    });

    it('reports list misses and bad indexes', () => {
      const ns = new Namespace({ list: ['a'], n: 3 });

      substitutionsFrom(ns, {}, (context) => {
        context.evaluate('{list[5]}');
        context.evaluate('{list.x}');
        context.evaluate('{n[0]}');

        expect(context.errors.map((error) => error.kind)).toEqual(['MissingKey', 'MissingAttribute', 'TypeMismatch']);
        expect(context.errors[0].message).toBe("{list.5} unresolved, in '{list[5]}'");
        expect(context.errors[2].message).toBe(
          "TypeMismatch at {n.0}: 'number' object is not subscriptable, in '{n[0]}'"
        );
      });
    });

    it('records failures raised while formatting a value', () => {
      const ns = new Namespace({ n: 0x110000, s: 'ab' });

      substitutionsFrom(ns, {}, (context) => {
        expect(context.evaluate('{n:c}')).toBe('');
        expect(context.evaluate('{s:>9999999999}')).toBe('');

        expect(context.errors).toHaveLength(2);
        expect(context.errors[0]).toMatchObject({
          message: "Substitution at {n}: 'c' argument not in range(0x110000), in '{n:c}'",
          kind: 'Substitution',
          target: 'n',
        });
        expect(context.errors[1].kind).toBe('Substitution');
        expect(context.errors[1].message).toMatch(/^Substitution at \{s\}: /);
      });
    });

    it('throws a substitution error for a value that cannot be formatted', () => {
      const ns = new Namespace({ s: 'ab' });

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(() => context.evaluate('{s:>9999999999}')).toThrow(SubstitutionError);
      });
    });

    it('throws when raising errors', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(() => context.evaluate('{bar.c}')).toThrow("{bar.c} unresolved, in '{bar.c}'");
      });
    });

    it('throws a cyclic error naming the location twice', () => {
      const ns = new Namespace({ a: { value: '{a.value}' } });

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        let caught: unknown;
        try {
          context.evaluate('{a.value}');
        } catch (error) {
          caught = error;
        }
        expect(caught).toBeInstanceOf(CyclicSubstitutionError);
        expect(caught).toMatchObject({
          message: "{a.value}: '{a.value}' is a cyclic substitution, in '{a.value}'",
          location: 'a.value',
          otherLocation: '',
        });
      });
    });

    it('detects mutual cycles', () => {
      const ns = new Namespace({ a: { e: '{a.f}', f: '{a.e}' } });

      substitutionsFrom(ns, { raiseErrors: true }, (context) => {
        expect(() => context.evaluate('{a.e}')).toThrow(CyclicSubstitutionError);
        expect(() => context.evaluate('{a.f}')).toThrow(CyclicSubstitutionError);
      });
    });

    it('refuses to evaluate after the session has ended', () => {
      const ns = buildNamespace();
      const context = substitutionsFrom(ns, {}, (ctx) => ctx);

      expect(context.isActive).toBe(false);
      expect(() => context.evaluate('{x.a}')).toThrow(SubstitutionError);
      expect(() => context.evaluate('{x.a}')).toThrow('substitution invoked outside of its session');
    });

    it('hands recorded errors over once', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, {}, (context) => {
        context.evaluate('{nothing}');
        expect(context.takeErrors()).toHaveLength(1);
        expect(context.errors).toEqual([]);
      });
    });
  });

  describe('forgiveness', () => {
    it('replaces failed lookups with a placeholder template', () => {
      const ns = buildNamespace();

      forgivingSubstitutionsFrom(ns, { forgive: 'XX' }, (context) => {
        expect(context.evaluate('{bar.c}')).toBe('XX deliberately unresolved');
        expect(context.evaluate('{bar.c1}')).toBe('XX deliberately unresolved');
        expect(context.evaluate('{nothing}')).toBe('XX');
        expect(context.evaluate('{bug.x} {bug.y}')).toBe('XX XX');
        expect(context.errors).toEqual([]);
        expect(context.forgiven).toEqual([]);
      });
    });

    it('inserts a generic marker when forgiving with true', () => {
      const ns = buildNamespace();

      forgivingSubstitutionsFrom(ns, { forgive: true }, (context) => {
        expect(context.evaluate('{nothing}')).toBe("(MissingKey: 'nothing')");
        expect(context.evaluate('{nothing.more}')).toBe("(MissingKey: 'nothing')");
      });
    });

    it('inserts nothing when forgiving with an empty string', () => {
      const ns = buildNamespace();

      forgivingSubstitutionsFrom(ns, { forgive: '' }, (context) => {
        expect(context.evaluate('a{nothing}b')).toBe('ab');
        expect(context.errors).toEqual([]);
      });
    });

    it('inserts nothing by default', () => {
      const ns = buildNamespace();

      forgivingSubstitutionsFrom(ns, {}, (context) => {
        expect(context.evaluate('a{nothing}b')).toBe('ab');
        expect(context.errors).toEqual([]);
      });
    });

    it('forgives templates whose value cannot be formatted', () => {
      const ns = new Namespace({ n: 0x110000 });

      forgivingSubstitutionsFrom(ns, { forgive: 'XX' }, (context) => {
        expect(context.evaluate('{n:c}', ['p'])).toBe('XX');
        expect(context.forgiven).toEqual(['p']);
        expect(context.errors).toEqual([]);
      });
    });

    it('never forgives cycles', () => {
      const ns = buildNamespace();

      forgivingSubstitutionsFrom(ns, { forgive: 'XX' }, (context) => {
        expect(context.evaluate('{bar.e}')).toBe('');
        expect(context.errors).toHaveLength(1);
      });
    });

    it('formats templates with the failed target', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, { forgive: { MissingKey: '[{target}]' } }, (context) => {
        expect(context.evaluate('{nothing}')).toBe('[nothing]');
      });
    });

    it('forgives whole templates and records where', () => {
      const ns = buildNamespace();

      substitutionsFrom(ns, { forgive: { BadFormat: true } }, (context) => {
        expect(context.evaluate('{foo.a:02d}', ['p'])).toBe("(Unknown format code 'd' for object of type 'str')");
        expect(context.forgiven).toEqual(['p']);
      });

      substitutionsFrom(ns, { forgive: { BadFormat: '<{name}: {exc}>' } }, (context) => {
        expect(context.evaluate('{foo.a:02d}', ['p'])).toBe("<p: Unknown format code 'd' for object of type 'str'>");
      });
    });

    it('layers per-entry policies over the session policy', () => {
      const ns = buildNamespace();
      ns.add('soft', 'soft {nothing}', { forgiving: { MissingKey: '?' } });

      substitutionsFrom(ns, {}, (context) => {
        expect(context.evaluate('{soft}')).toBe('soft ?');
        expect(context.evaluate('{nothing}')).toBe('');
        expect(context.errors).toHaveLength(1);
      });
    });

    it('rejects a policy template that does not parse', () => {
      expect(() => substitutionsFrom(null, { forgive: { MissingKey: '{' } }, () => undefined)).toThrow(
        "expected '}' before end of string"
      );
    });
  });
});
