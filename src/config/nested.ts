// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Nested configuration: one file per subsection.
 */

import * as path from 'node:path';
import { ConfigError } from '../errors.js';
import { loadConfig } from './loader.js';
import type { ConfigMapping, LoadOptions } from './types.js';

/**
 * How a subsection is named: by the file's basename (default), by the
 * value of one of its fields, or by a callback.
 */
export type SectionNamer = string | ((section: ConfigMapping, filePath: string) => string);

export interface NestedLoadOptions extends Pick<LoadOptions, 'useSources' | 'location' | 'includePath' | 'searchPath'> {
  nameAttr?: SectionNamer;
}

export interface NestedLoadResult {
  sections: Record<string, ConfigMapping>;
  dependencies: Set<string>;
}

function sectionName(section: ConfigMapping, filePath: string, nameAttr: SectionNamer | undefined): string {
  if (nameAttr === undefined) {
    return path.basename(filePath, path.extname(filePath));
  }
  if (typeof nameAttr === 'function') {
    return nameAttr(section, filePath);
  }
  const value = section[nameAttr];
  if (value === undefined || value === null) {
    throw new ConfigError(`${filePath} does not contain a '${nameAttr}' field`, filePath);
  }
  return String(value);
}

/**
 * Load each file as a subsection. Later files with the same section name
 * replace earlier ones.
 */
export function loadNested(files: readonly string[], options: NestedLoadOptions = {}): NestedLoadResult {
  const sections: Record<string, ConfigMapping> = {};
  const dependencies = new Set<string>();

  for (const filePath of files) {
    const loaded = loadConfig(filePath, {
      useSources: options.useSources,
      location: options.location,
      includePath: options.includePath,
      searchPath: options.searchPath,
    });
    let section = loaded.config;
    if (options.includePath !== undefined) {
      section = { ...section, [options.includePath]: filePath };
    }
    sections[sectionName(section, filePath, options.nameAttr)] = section;
    for (const dependency of loaded.dependencies) {
      dependencies.add(dependency);
    }
  }

  return { sections, dependencies };
}
