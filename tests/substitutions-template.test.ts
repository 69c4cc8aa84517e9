// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect } from 'vitest';
import { formatTemplate, parseField, parseTemplate } from '../src/substitutions/template.js';
import { SubstitutionError } from '../src/errors.js';

describe('Substitutions - template grammar', () => {
  describe('parseTemplate', () => {
    it('splits literals, escaped braces and fields', () => {
      expect(parseTemplate('a{{b}}{c.d[0]!r:>5} tail')).toEqual([
        { type: 'literal', text: 'a{b}' },
        {
          type: 'field',
          field: {
            source: 'c.d[0]!r:>5',
            root: 'c',
            accessors: [
              { kind: 'attribute', name: 'd' },
              { kind: 'index', name: '0' },
            ],
            conversion: 'r',
            spec: '>5',
          },
        },
        { type: 'literal', text: ' tail' },
      ]);
    });

    it('keeps nested fields inside the spec', () => {
      const [token] = parseTemplate('{value:>{width}}');
      expect(token).toMatchObject({ type: 'field', field: { root: 'value', spec: '>{width}' } });
    });

    it('returns no tokens for an empty template', () => {
      expect(parseTemplate('')).toEqual([]);
    });

    it('rejects an unterminated field', () => {
      expect(() => parseTemplate('abc {def')).toThrow("expected '}' before end of string");
    });

    it('rejects a stray closing brace', () => {
      expect(() => parseTemplate('a}b')).toThrow("Single '}' encountered in format string");
    });

    it('classifies grammar errors as BadFormat', () => {
      let caught: unknown;
      try {
        parseTemplate('{');
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(SubstitutionError);
      expect(caught).toMatchObject({ kind: 'BadFormat' });
    });
  });

  describe('parseField', () => {
    it('parses a bare name', () => {
      expect(parseField('name')).toEqual({
        source: 'name',
        root: 'name',
        accessors: [],
        conversion: undefined,
        spec: '',
      });
    });

    it('allows colons and dots inside brackets', () => {
      expect(parseField('map[a.b:c]:s')).toMatchObject({
        root: 'map',
        accessors: [{ kind: 'index', name: 'a.b:c' }],
        spec: 's',
      });
    });

    it('rejects positional fields', () => {
      expect(() => parseField('')).toThrow('Format string contains positional fields');
    });

    it('rejects an empty attribute', () => {
      expect(() => parseField('a.')).toThrow('Empty attribute in format string');
    });

    it('rejects an unclosed index', () => {
      expect(() => parseField('a[0')).toThrow("Missing ']' in format string");
    });

    it('rejects text after an index', () => {
      expect(() => parseField('a[0]b')).toThrow("Only '.' or '[' may follow ']' in format field specifier");
    });

    it('rejects unknown conversions', () => {
      expect(() => parseField('a!x')).toThrow('Unknown conversion specifier x');
      expect(() => parseField('a!rx')).toThrow("expected ':' after conversion specifier");
    });
  });

  describe('formatTemplate', () => {
    it('formats against a plain record', () => {
      expect(formatTemplate('{name}={value:>4}', { name: 'n', value: 7 })).toBe('n=   7');
    });

    it('renders errors as their message', () => {
      expect(formatTemplate('[{exc}]', { exc: new Error('boom') })).toBe('[boom]');
    });

    it('reports an unknown name', () => {
      expect(() => formatTemplate('{other}', { name: 'n' })).toThrow("'other'");
    });
  });
});
