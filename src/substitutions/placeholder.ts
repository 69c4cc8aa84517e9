// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Text standing in for a forgiven lookup.
 *
 * Any further attribute or key access on a placeholder yields the same
 * placeholder, so `{missing.a.b}` renders as one placeholder.
 */
export class Placeholder {
  constructor(public readonly text: string) {}

  toString(): string {
    return this.text;
  }

  toJSON(): string {
    return this.text;
  }
}
