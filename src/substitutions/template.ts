// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Template strings
 *
 * A template is literal text with `{field}` markers. `{{` and `}}` stand
 * for literal braces. A field is
 *
 *   name(.attribute | [key])*(!s | !r)?(:spec)?
 *
 * and the spec may itself contain fields, as in `{value:>{width}}`.
 */

import { SubstitutionError } from '../errors.js';
import { formatValue } from './format-spec.js';
import { toDisplayString, toReprString } from './values.js';

export interface FieldAccessor {
  kind: 'attribute' | 'index';
  name: string;
}

export interface TemplateField {
  /** Raw text between the braces */
  source: string;
  root: string;
  accessors: FieldAccessor[];
  conversion?: 's' | 'r';
  /** Raw spec text; may contain nested fields */
  spec: string;
}

export type TemplateToken = { type: 'literal'; text: string } | { type: 'field'; field: TemplateField };

/**
 * Supplies the value of a field's `name.attr[key]` chain.
 */
export type FieldResolver = (field: TemplateField) => unknown;

function parseFieldName(text: string): Pick<TemplateField, 'root' | 'accessors'> {
  const rootEnd = text.search(/[.[]/);
  const root = rootEnd < 0 ? text : text.slice(0, rootEnd);
  if (root === '') {
    throw SubstitutionError.badFormat('Format string contains positional fields');
  }

  const accessors: FieldAccessor[] = [];
  let i = rootEnd < 0 ? text.length : rootEnd;
  while (i < text.length) {
    if (text[i] === '.') {
      const end = text.slice(i + 1).search(/[.[]/);
      const name = end < 0 ? text.slice(i + 1) : text.slice(i + 1, i + 1 + end);
      if (name === '') {
        throw SubstitutionError.badFormat('Empty attribute in format string');
      }
      accessors.push({ kind: 'attribute', name });
      i += 1 + name.length;
    } else if (text[i] === '[') {
      const close = text.indexOf(']', i);
      if (close < 0) {
        throw SubstitutionError.badFormat("Missing ']' in format string");
      }
      accessors.push({ kind: 'index', name: text.slice(i + 1, close) });
      i = close + 1;
      if (i < text.length && text[i] !== '.' && text[i] !== '[') {
        throw SubstitutionError.badFormat("Only '.' or '[' may follow ']' in format field specifier");
      }
    } else {
      throw SubstitutionError.badFormat("Only '.' or '[' may follow ']' in format field specifier");
    }
  }
  return { root, accessors };
}

/**
 * Split a field's text into name, conversion and spec.
 */
export function parseField(source: string): TemplateField {
  // the name runs up to the first '!' or ':' outside brackets
  let end = 0;
  while (end < source.length && source[end] !== '!' && source[end] !== ':') {
    if (source[end] === '[') {
      const close = source.indexOf(']', end);
      end = close < 0 ? source.length : close + 1;
    } else {
      end += 1;
    }
  }
  const name = source.slice(0, end);
  let rest = source.slice(end);

  let conversion: 's' | 'r' | undefined;
  if (rest.startsWith('!')) {
    const code = rest[1];
    if (code !== 's' && code !== 'r') {
      throw SubstitutionError.badFormat(
        code === undefined ? 'end of string while looking for conversion specifier' : `Unknown conversion specifier ${code}`
      );
    }
    conversion = code;
    rest = rest.slice(2);
    if (rest !== '' && !rest.startsWith(':')) {
      throw SubstitutionError.badFormat("expected ':' after conversion specifier");
    }
  }

  return {
    source,
    ...parseFieldName(name),
    conversion,
    spec: rest.startsWith(':') ? rest.slice(1) : '',
  };
}

/**
 * Tokenize a template into literals and fields.
 */
export function parseTemplate(text: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let literal = '';
  let i = 0;

  while (i < text.length) {
    const ch = text[i];
    if (ch === '{') {
      if (text[i + 1] === '{') {
        literal += '{';
        i += 2;
        continue;
      }
      let depth = 1;
      let j = i + 1;
      while (j < text.length && depth > 0) {
        if (text[j] === '{') depth += 1;
        else if (text[j] === '}') depth -= 1;
        j += 1;
      }
      if (depth > 0) {
        throw SubstitutionError.badFormat("expected '}' before end of string");
      }
      if (literal) {
        tokens.push({ type: 'literal', text: literal });
        literal = '';
      }
      tokens.push({ type: 'field', field: parseField(text.slice(i + 1, j - 1)) });
      i = j;
    } else if (ch === '}') {
      if (text[i + 1] !== '}') {
        throw SubstitutionError.badFormat("Single '}' encountered in format string");
      }
      literal += '}';
      i += 2;
    } else {
      literal += ch;
      i += 1;
    }
  }
  if (literal) {
    tokens.push({ type: 'literal', text: literal });
  }
  return tokens;
}

/**
 * Render parsed tokens, resolving each field (and any field inside its
 * spec) through `resolve`.
 */
export function renderTemplate(tokens: readonly TemplateToken[], resolve: FieldResolver): string {
  let output = '';
  for (const token of tokens) {
    if (token.type === 'literal') {
      output += token.text;
      continue;
    }
    const { field } = token;
    let value = resolve(field);
    if (field.conversion === 's') value = toDisplayString(value);
    if (field.conversion === 'r') value = toReprString(value);
    const spec = field.spec.includes('{') ? renderTemplate(parseTemplate(field.spec), resolve) : field.spec;
    output += formatValue(value, spec);
  }
  return output;
}

/**
 * Format a template against a plain record of values.
 */
export function formatTemplate(template: string, values: Readonly<Record<string, unknown>>): string {
  return renderTemplate(parseTemplate(template), (field) => {
    if (!Object.prototype.hasOwnProperty.call(values, field.root)) {
      throw SubstitutionError.missingKey(field.root, field.source);
    }
    if (field.accessors.length > 0) {
      throw SubstitutionError.missingAttribute(field.accessors[0].name, field.source);
    }
    return values[field.root];
  });
}
