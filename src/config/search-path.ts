// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Include search path
 *
 * Turns an `_include` specifier into a file path. Three forms are accepted:
 *
 * - `(package-name)relative/path`: relative to an installed package's root
 * - `/absolute/path.yml`
 * - `relative/path.yml`: tried next to the including file, then under
 *   each search root in order
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { createRequire } from 'node:module';
import { ConfigError } from '../errors.js';

const PACKAGE_SPECIFIER = /^\((.+)\)(.+)$/;

/**
 * Where a specifier is being resolved from, for lookups and messages.
 */
export interface IncludeContext {
  /** Path of the file containing the `_include` */
  referrer: string;
  /** Search roots tried after the referrer's directory */
  searchPath: readonly string[];
  /** Name of the including file, for messages */
  source: string;
  /** Location of the directive inside the tree, for messages */
  location?: string;
}

/**
 * Candidate paths for a bare relative specifier, in lookup order.
 */
export function candidatePaths(
  specifier: string,
  referrer: string,
  searchPath: readonly string[]
): string[] {
  const roots = [path.dirname(referrer), ...searchPath];
  const candidates: string[] = [];
  for (const root of roots) {
    const candidate = path.resolve(root, specifier);
    if (!candidates.includes(candidate)) {
      candidates.push(candidate);
    }
  }
  return candidates;
}

/**
 * Root directory of an installed package, as seen from `fromFile`.
 * Throws the underlying resolution error if the package can't be found.
 */
export function resolvePackageRoot(packageName: string, fromFile: string): string {
  const requireFrom = createRequire(path.resolve(fromFile));
  try {
    return path.dirname(requireFrom.resolve(`${packageName}/package.json`));
  } catch {
    // Packages whose "exports" hide package.json: fall back to the entry point's directory
    return path.dirname(requireFrom.resolve(packageName));
  }
}

/**
 * Resolve an include specifier to an existing file.
 */
export function resolveInclude(specifier: string, context: IncludeContext): string {
  const { referrer, searchPath, source, location } = context;

  if (!specifier) {
    throw ConfigError.malformedDirective(source, location, '_include', 'empty _include specifier');
  }

  const match = PACKAGE_SPECIFIER.exec(specifier);
  if (match) {
    const [, packageName, relativePath] = match;
    let root: string;
    try {
      root = resolvePackageRoot(packageName, referrer);
    } catch (error) {
      const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
      throw ConfigError.moduleNotFound(source, location, specifier, packageName, reason);
    }
    const filename = path.join(root, relativePath);
    if (!fs.existsSync(filename)) {
      throw ConfigError.includeNotFound(source, location, specifier, [filename]);
    }
    return filename;
  }

  if (path.isAbsolute(specifier)) {
    if (!fs.existsSync(specifier)) {
      throw ConfigError.includeNotFound(source, location, specifier, [specifier]);
    }
    return specifier;
  }

  const candidates = candidatePaths(specifier, referrer, searchPath);
  const found = candidates.find((candidate) => fs.existsSync(candidate));
  if (!found) {
    throw ConfigError.includeNotFound(source, location, specifier, candidates);
  }
  return found;
}
