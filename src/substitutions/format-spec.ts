// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Format specs
 *
 * The part of a field after the colon, as in `{run.niter:03d}`:
 *
 *   [[fill]align][sign][#][0][width][grouping][.precision][type]
 *
 * Integer types are b c d o x X n; float types are e E f F g G %; strings
 * take s. With no type, integers format as d and other numbers as their
 * shortest representation (or g when a precision is given).
 */

import { SubstitutionError } from '../errors.js';
import { Placeholder } from './placeholder.js';
import { describeType, toDisplayString } from './values.js';

export type Alignment = '<' | '>' | '=' | '^';

export interface FormatSpec {
  fill: string;
  align?: Alignment;
  sign?: '+' | '-' | ' ';
  alternate: boolean;
  zeroPad: boolean;
  width?: number;
  grouping?: ',' | '_';
  precision?: number;
  type?: string;
}

const SPEC_PATTERN = /^(?:([\s\S])?([<>=^]))?([-+ ])?(#)?(0)?(\d+)?([,_])?(?:\.(\d+))?([bcdeEfFgGnosxX%])?$/;

const INTEGER_TYPES = new Set(['b', 'c', 'd', 'o', 'x', 'X']);
const FLOAT_TYPES = new Set(['e', 'E', 'f', 'F', 'g', 'G', '%']);
const RADIX_PREFIX: Record<string, string> = { b: '0b', o: '0o', x: '0x', X: '0X' };
const MAX_CODE_POINT = 0x10ffff;

function isAlignment(value: string | undefined): value is Alignment {
  return value === '<' || value === '>' || value === '=' || value === '^';
}

function isSign(value: string | undefined): value is '+' | '-' | ' ' {
  return value === '+' || value === '-' || value === ' ';
}

export function parseFormatSpec(spec: string): FormatSpec {
  const match = SPEC_PATTERN.exec(spec);
  if (!match) {
    throw SubstitutionError.badFormat(`Invalid format specifier '${spec}'`);
  }
  const [, fill, align, sign, alternate, zero, width, grouping, precision, type] = match;
  return {
    fill: fill ?? ' ',
    align: isAlignment(align) ? align : undefined,
    sign: isSign(sign) ? sign : undefined,
    alternate: alternate !== undefined,
    zeroPad: zero !== undefined,
    width: width !== undefined ? Number(width) : undefined,
    grouping: grouping === ',' || grouping === '_' ? grouping : undefined,
    precision: precision !== undefined ? Number(precision) : undefined,
    type,
  };
}

function pad(body: string, spec: FormatSpec, defaultAlign: Alignment, prefix = ''): string {
  let fill = spec.fill;
  let align = spec.align ?? defaultAlign;
  if (spec.zeroPad && spec.align === undefined) {
    fill = '0';
    if (defaultAlign === '>') align = '=';
  }
  const width = spec.width ?? 0;
  const length = [...prefix].length + [...body].length;
  if (length >= width) return prefix + body;

  const padding = width - length;
  switch (align) {
    case '<':
      return prefix + body + fill.repeat(padding);
    case '^': {
      const left = Math.floor(padding / 2);
      return fill.repeat(left) + prefix + body + fill.repeat(padding - left);
    }
    case '=':
      return prefix + fill.repeat(padding) + body;
    default:
      return fill.repeat(padding) + prefix + body;
  }
}

function group(digits: string, separator: string, size: number): string {
  const parts: string[] = [];
  for (let end = digits.length; end > 0; end -= size) {
    parts.unshift(digits.slice(Math.max(0, end - size), end));
  }
  return parts.join(separator);
}

function groupIntegerPart(body: string, separator: string): string {
  const match = /^(\d+)(.*)$/s.exec(body);
  if (!match) return body;
  return group(match[1], separator, 3) + match[2];
}

/**
 * Exact decimal expansion of a finite, non-negative double, as
 * `digits / 10 ** scale`.
 */
function exactDecimal(value: number): { digits: bigint; scale: number } {
  let mantissa = value;
  let scale = 0;
  while (!Number.isInteger(mantissa)) {
    mantissa *= 2;
    scale += 1;
  }
  return { digits: BigInt(mantissa) * 5n ** BigInt(scale), scale };
}

function roundHalfEven(numerator: bigint, divisor: bigint): bigint {
  const quotient = numerator / divisor;
  const twice = (numerator % divisor) * 2n;
  if (twice > divisor || (twice === divisor && quotient % 2n === 1n)) {
    return quotient + 1n;
  }
  return quotient;
}

// Digits come from the exact expansion at any precision; ties round to even
function fixed(value: number, precision: number): string {
  const { digits, scale } = exactDecimal(value);
  const scaled =
    precision >= scale
      ? digits * 10n ** BigInt(precision - scale)
      : roundHalfEven(digits, 10n ** BigInt(scale - precision));
  const text = scaled.toString().padStart(precision + 1, '0');
  return precision === 0 ? text : `${text.slice(0, -precision)}.${text.slice(-precision)}`;
}

function scientific(value: number, precision: number): { mantissa: string; exponent: number } {
  const wanted = precision + 1;
  if (value === 0) {
    return { mantissa: precision > 0 ? `0.${'0'.repeat(precision)}` : '0', exponent: 0 };
  }
  const { digits, scale } = exactDecimal(value);
  const length = digits.toString().length;
  let exponent = length - 1 - scale;
  let text = (
    length > wanted ? roundHalfEven(digits, 10n ** BigInt(length - wanted)) : digits * 10n ** BigInt(wanted - length)
  ).toString();
  if (text.length > wanted) {
    // rounding carried into a new leading digit
    exponent += 1;
    text = text.slice(0, wanted);
  }
  return { mantissa: precision > 0 ? `${text[0]}.${text.slice(1)}` : text, exponent };
}

function exponential(value: number, precision: number): string {
  const { mantissa, exponent } = scientific(value, precision);
  const sign = exponent < 0 ? '-' : '+';
  return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, '0')}`;
}

function stripTrailingZeros(body: string): string {
  const [mantissa, exponent] = body.split('e');
  const stripped = mantissa.includes('.') ? mantissa.replace(/\.?0+$/, '') : mantissa;
  return exponent === undefined ? stripped : `${stripped}e${exponent}`;
}

function general(value: number, precision: number, alternate: boolean): string {
  const significant = precision === 0 ? 1 : precision;
  const { exponent } = scientific(value, significant - 1);
  const body =
    exponent >= -4 && exponent < significant ? fixed(value, significant - 1 - exponent) : exponential(value, significant - 1);
  return alternate ? body : stripTrailingZeros(body);
}

function formatInteger(magnitude: number, type: string, spec: FormatSpec): { body: string; prefix: string } {
  if (spec.precision !== undefined) {
    throw SubstitutionError.badFormat('Precision not allowed in integer format specifier');
  }
  if (spec.grouping === ',' && type !== 'd') {
    throw SubstitutionError.badFormat(`Cannot specify ',' with '${type}'.`);
  }

  let body: string;
  switch (type) {
    case 'b':
      body = magnitude.toString(2);
      break;
    case 'o':
      body = magnitude.toString(8);
      break;
    case 'x':
      body = magnitude.toString(16);
      break;
    case 'X':
      body = magnitude.toString(16).toUpperCase();
      break;
    case 'c':
      if (magnitude > MAX_CODE_POINT) {
        throw new SubstitutionError(`'c' argument not in range(0x110000)`);
      }
      return { body: String.fromCodePoint(magnitude), prefix: '' };
    default:
      body = magnitude.toFixed(0);
  }
  if (spec.grouping) {
    body = group(body, spec.grouping, type === 'd' ? 3 : 4);
  }
  return { body, prefix: spec.alternate ? RADIX_PREFIX[type] ?? '' : '' };
}

function formatFloat(magnitude: number, type: string | undefined, spec: FormatSpec): string {
  if (!Number.isFinite(magnitude)) {
    const body = Number.isNaN(magnitude) ? 'nan' : 'inf';
    return type === 'E' || type === 'F' || type === 'G' ? body.toUpperCase() : body;
  }

  let body: string;
  switch (type) {
    case 'f':
    case 'F':
      body = fixed(magnitude, spec.precision ?? 6);
      if (spec.alternate && !body.includes('.')) body += '.';
      break;
    case 'e':
      body = exponential(magnitude, spec.precision ?? 6);
      break;
    case 'E':
      body = exponential(magnitude, spec.precision ?? 6).toUpperCase();
      break;
    case 'g':
      body = general(magnitude, spec.precision ?? 6, spec.alternate);
      break;
    case 'G':
      body = general(magnitude, spec.precision ?? 6, spec.alternate).toUpperCase();
      break;
    case '%':
      body = `${fixed(magnitude * 100, spec.precision ?? 6)}%`;
      break;
    default:
      body = spec.precision === undefined ? String(magnitude) : general(magnitude, spec.precision, spec.alternate);
  }
  return spec.grouping ? groupIntegerPart(body, spec.grouping) : body;
}

function formatNumber(value: number, spec: FormatSpec): string {
  let type = spec.type;
  if (type === 'n') type = undefined;
  if (type === 's') {
    throw SubstitutionError.badFormat(`Unknown format code 's' for object of type 'number'`);
  }

  const integral = Number.isInteger(value);
  const negative = value < 0 || Object.is(value, -0);
  const sign = negative ? '-' : spec.sign === '+' ? '+' : spec.sign === ' ' ? ' ' : '';
  const magnitude = Math.abs(value);

  const asInteger =
    (type !== undefined && INTEGER_TYPES.has(type)) || (type === undefined && integral && spec.precision === undefined);
  if (asInteger) {
    if (!integral) {
      throw SubstitutionError.badFormat(`Unknown format code '${type ?? 'd'}' for object of type 'float'`);
    }
    const { body, prefix } = formatInteger(magnitude, type ?? 'd', spec);
    return pad(body, spec, '>', sign + prefix);
  }

  if (type !== undefined && !FLOAT_TYPES.has(type)) {
    throw SubstitutionError.badFormat(`Unknown format code '${type}' for object of type 'float'`);
  }
  return pad(formatFloat(magnitude, type, spec), spec, '>', sign);
}

function formatText(text: string, spec: FormatSpec): string {
  if (spec.type !== undefined && spec.type !== 's') {
    throw SubstitutionError.badFormat(`Unknown format code '${spec.type}' for object of type 'str'`);
  }
  if (spec.sign !== undefined) {
    throw SubstitutionError.badFormat('Sign not allowed in string format specifier');
  }
  if (spec.alternate) {
    throw SubstitutionError.badFormat('Alternate form (#) not allowed in string format specifier');
  }
  if (spec.grouping !== undefined) {
    throw SubstitutionError.badFormat(`Cannot specify '${spec.grouping}' with 's'.`);
  }
  if (spec.align === '=') {
    throw SubstitutionError.badFormat("'=' alignment not allowed in string format specifier");
  }
  const body = spec.precision === undefined ? text : [...text].slice(0, spec.precision).join('');
  return pad(body, spec, '<');
}

/**
 * Format a looked-up value according to a format spec.
 *
 * Booleans format as text, or as 0/1 under a numeric type. Mappings, lists,
 * namespaces and null accept only an empty spec.
 */
export function formatValue(value: unknown, spec: string): string {
  if (spec === '') {
    return toDisplayString(value);
  }
  const parsed = parseFormatSpec(spec);

  if (typeof value === 'number') {
    return formatNumber(value, parsed);
  }
  if (typeof value === 'boolean') {
    const numeric = parsed.type !== undefined && (INTEGER_TYPES.has(parsed.type) || FLOAT_TYPES.has(parsed.type));
    return numeric ? formatNumber(value ? 1 : 0, parsed) : formatText(String(value), parsed);
  }
  if (typeof value === 'string' || value instanceof Placeholder) {
    return formatText(toDisplayString(value), parsed);
  }
  throw SubstitutionError.typeMismatch(`unsupported format string passed to ${describeType(value)}`);
}
