// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Configuration Loader
 *
 * Reads a YAML configuration file and resolves its directives:
 *
 * - `_include`: merge other files under this section (the section wins)
 * - `_use`: merge other sections of the available trees (the section wins)
 * - `_flatten` / `_flatten_sep`: flatten included or used subsections
 *
 * Directives are resolved repeatedly at each node until none remain, then
 * the loader descends into the node's children.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import yaml from 'js-yaml';
import { logger } from '../logger.js';
import { ConfigError, ConfigReferenceError } from '../errors.js';
import { getMaxDirectiveRounds, getSearchPath } from '../settings.js';
import { flattenSubsections, mergeAll, mergeMappings } from './merger.js';
import { resolveInclude } from './search-path.js';
import {
  DEFAULT_FLATTEN_SEPARATOR,
  DIRECTIVE_KEYS,
  type ConfigMapping,
  type ConfigNode,
  type LoadOptions,
  type LoadResult,
} from './types.js';
import { isConfigMapping, lookupDotted, omitKeys, setEntry, toConfigNode, toStringList } from './utils.js';

/**
 * Settings shared by every node of one file.
 */
interface ResolveState {
  filePath: string;
  name: string;
  includes: boolean;
  selfRefs: boolean;
  includePath?: string;
  searchPath: readonly string[];
  maxRounds: number;
  /** Nesting of includes and `_use` bases above the current node */
  depth: number;
  dependencies: Set<string>;
}

function nested(state: ResolveState, overrides: Partial<ResolveState> = {}): ResolveState {
  return { ...state, ...overrides, depth: state.depth + 1 };
}

function childLocation(location: string | undefined, key: string): string {
  return location ? `${location}.${key}` : key;
}

/**
 * Parse YAML text into a mapping. An empty document is an empty mapping.
 */
export function parseConfig(content: string, source: string): ConfigMapping {
  let parsed: unknown;
  try {
    parsed = yaml.load(content, { filename: source });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw ConfigError.parseFailure(source, message);
  }
  const node = toConfigNode(parsed);
  if (node === null) return {};
  if (!isConfigMapping(node)) {
    throw ConfigError.parseFailure(source, 'top level must be a mapping');
  }
  return node;
}

function readFlatten(
  conf: ConfigMapping,
  location: string | undefined,
  state: ResolveState
): { depth: number; separator: string } {
  const depth = conf[DIRECTIVE_KEYS.flatten] ?? 0;
  const separator = conf[DIRECTIVE_KEYS.flattenSeparator] ?? DEFAULT_FLATTEN_SEPARATOR;
  if (typeof depth !== 'number' || !Number.isInteger(depth) || depth < 0) {
    throw ConfigError.malformedDirective(state.name, location, DIRECTIVE_KEYS.flatten, 'must be a non-negative integer');
  }
  if (typeof separator !== 'string') {
    throw ConfigError.malformedDirective(state.name, location, DIRECTIVE_KEYS.flattenSeparator, 'must be a string');
  }
  return { depth, separator };
}

function readDirective(
  conf: ConfigMapping,
  key: string,
  location: string | undefined,
  state: ResolveState
): string[] {
  const value = conf[key];
  if (value === null || (Array.isArray(value) && value.length === 0)) {
    return [];
  }
  const list = toStringList(value);
  if (!list) {
    throw ConfigError.malformedDirective(state.name, location, key, 'must be a string or a list of strings');
  }
  return list;
}

function loadIncludes(
  specifiers: readonly string[],
  location: string | undefined,
  flatten: { depth: number; separator: string },
  state: ResolveState
): ConfigMapping {
  let accumulated: ConfigMapping = {};
  for (const specifier of specifiers) {
    const filename = resolveInclude(specifier, {
      referrer: state.filePath,
      searchPath: state.searchPath,
      source: state.name,
      location,
    });
    logger.directive(DIRECTIVE_KEYS.include, `${specifier} → ${filename}`);

    // _use statements in included files are resolved by the includer
    let included = loadFile(filename, location, null, nested(state, {
      filePath: filename,
      name: `${filename}, included from ${state.name}`,
      includes: true,
    }));
    if (state.includePath !== undefined) {
      included = { ...included, [state.includePath]: filename };
    }
    if (flatten.depth > 0) {
      included = flattenSubsections(included, flatten.depth, flatten.separator);
    }
    accumulated = mergeMappings(accumulated, included);
  }
  return accumulated;
}

function lookupSections(
  references: readonly string[],
  sources: readonly ConfigMapping[],
  location: string | undefined,
  state: ResolveState
): ConfigMapping[] {
  return references.map((reference) => {
    const section = lookupDotted(reference, sources);
    if (section === undefined) {
      throw new ConfigReferenceError(state.name, location, reference);
    }
    if (!isConfigMapping(section)) {
      throw ConfigError.malformedDirective(
        state.name,
        location,
        DIRECTIVE_KEYS.use,
        `${reference} does not refer to a section`
      );
    }
    return section;
  });
}

function resolveMapping(
  node: ConfigMapping,
  location: string | undefined,
  useSources: readonly ConfigMapping[] | null,
  state: ResolveState
): ConfigMapping {
  // cyclic chains never settle; each link adds a level of nesting
  if (state.depth > state.maxRounds) {
    throw ConfigError.recursionLimit(state.name, location, state.maxRounds);
  }
  const flatten = readFlatten(node, location, state);
  let conf = omitKeys(node, [DIRECTIVE_KEYS.flatten, DIRECTIVE_KEYS.flattenSeparator]);

  let rounds = 0;
  let updated = true;
  while (updated) {
    updated = false;
    rounds += 1;
    if (rounds > state.maxRounds) {
      throw ConfigError.recursionLimit(state.name, location, state.maxRounds);
    }

    if (state.includes && DIRECTIVE_KEYS.include in conf) {
      const specifiers = readDirective(conf, DIRECTIVE_KEYS.include, location, state);
      conf = omitKeys(conf, [DIRECTIVE_KEYS.include]);
      updated = true;
      if (specifiers.length > 0) {
        // this section overrides anything it includes
        conf = mergeMappings(loadIncludes(specifiers, location, flatten, state), conf);
      }
    }

    if (useSources !== null && DIRECTIVE_KEYS.use in conf) {
      const references = readDirective(conf, DIRECTIVE_KEYS.use, location, state);
      conf = omitKeys(conf, [DIRECTIVE_KEYS.use]);
      updated = true;
      if (references.length > 0) {
        logger.directive(DIRECTIVE_KEYS.use, `${references.join(', ')} at ${location || 'top level'}`);
        const sections = lookupSections(references, useSources, location, state);
        const sources = state.selfRefs ? [conf, ...useSources] : useSources;
        // resolve references within the merged base before flattening it
        let base = resolveMapping(
          mergeAll(sections),
          childLocation(location, DIRECTIVE_KEYS.use),
          sources,
          nested(state)
        );
        if (flatten.depth > 0) {
          base = flattenSubsections(base, flatten.depth, flatten.separator);
        }
        conf = mergeMappings(base, conf);
      }
    }
  }

  const childSources = useSources !== null && state.selfRefs ? [conf, ...useSources] : useSources;
  let result = conf;
  for (const [key, value] of Object.entries(conf)) {
    if (isConfigMapping(value) || Array.isArray(value)) {
      const resolved = resolveNode(value, childLocation(location, key), childSources, state);
      if (resolved !== value) {
        if (result === conf) result = { ...conf };
        setEntry(result, key, resolved);
      }
    }
  }
  return result;
}

function resolveSequence(
  node: ConfigNode[],
  location: string | undefined,
  useSources: readonly ConfigMapping[] | null,
  state: ResolveState
): ConfigNode[] {
  let result = node;
  node.forEach((value, index) => {
    if (isConfigMapping(value) || Array.isArray(value)) {
      const resolved = resolveNode(value, `${location ?? ''}[${index}]`, useSources, state);
      if (resolved !== value) {
        if (result === node) result = [...node];
        result[index] = resolved;
      }
    }
  });
  return result;
}

function resolveNode(
  node: ConfigNode,
  location: string | undefined,
  useSources: readonly ConfigMapping[] | null,
  state: ResolveState
): ConfigNode {
  if (isConfigMapping(node)) return resolveMapping(node, location, useSources, state);
  if (Array.isArray(node)) return resolveSequence(node, location, useSources, state);
  return node;
}

function loadFile(
  filePath: string,
  location: string | undefined,
  useSources: readonly ConfigMapping[] | null,
  state: ResolveState
): ConfigMapping {
  const absolute = path.resolve(filePath);
  let content: string;
  try {
    content = fs.readFileSync(absolute, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw ConfigError.parseFailure(state.name, `can't read ${absolute}: ${message}`);
  }
  state.dependencies.add(absolute);
  logger.trace(`read ${absolute}`);

  return resolveMapping(parseConfig(content, state.name), location, useSources, state);
}

/**
 * Load a configuration file and resolve its `_include` and `_use` directives.
 *
 * @param filePath - YAML (or JSON) file to load
 * @returns the merged, directive-free tree and the absolute paths of every
 *   file it was assembled from
 * @throws {ConfigError} on malformed directives, missing files, unknown
 *   `_use` references, or directive chains that do not settle
 */
export function loadConfig(filePath: string, options: LoadOptions = {}): LoadResult {
  const state: ResolveState = {
    filePath,
    name: options.name ?? path.basename(filePath),
    includes: options.includes ?? true,
    selfRefs: options.selfRefs ?? true,
    includePath: options.includePath,
    searchPath: options.searchPath ?? getSearchPath(),
    maxRounds: getMaxDirectiveRounds(),
    depth: 0,
    dependencies: new Set<string>(),
  };
  const useSources = options.useSources === undefined ? [] : options.useSources;

  const config = loadFile(filePath, options.location, useSources, state);
  logger.configLoaded(filePath, state.dependencies.size);
  return { config, dependencies: state.dependencies };
}
