// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Command-line front end: load a configuration file, optionally substitute
 * its templates against itself, and print the result.
 */

import { Command, CommanderError } from 'commander';
import yaml from 'js-yaml';
import { loadConfig } from '../config/index.js';
import { ConfigError } from '../errors.js';
import { LogLevel, logger, parseLogLevel } from '../logger.js';
import { getEnvLogLevel, getSearchPath } from '../settings.js';
import {
  Namespace,
  forgivingSubstitutionsFrom,
  resolveNamespace,
  substitutionsFrom,
  type SubstitutionContext,
} from '../substitutions/index.js';
import { VERSION } from '../version.js';

/**
 * Where the CLI writes its results. Diagnostics go through the logger.
 */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

interface CliOptions {
  includeDir: string[];
  includes: boolean;
  use: boolean;
  resolve?: boolean;
  forgive?: string | boolean;
  deps?: boolean;
  list?: boolean;
  json?: boolean;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
}

const defaultIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function createProgram(io: CliIO): Command {
  return new Command()
    .name('layerconf')
    .description('Assemble a layered YAML configuration and print it')
    .version(VERSION, '-v, --version', 'Output the current version')
    .argument('<file>', 'Configuration file to load')
    .option('-I, --include-dir <dir>', 'Extra directory to search for _include files (repeatable)', collect, [])
    .option('--no-includes', 'Leave _include directives unprocessed')
    .option('--no-use', 'Leave _use directives unprocessed')
    .option('--resolve', 'Substitute {...} templates against the loaded configuration')
    .option('--forgive [placeholder]', 'With --resolve, replace failed templates instead of failing')
    .option('--deps', 'Print the files the configuration was assembled from')
    .option('--list', 'Print an indented listing instead of YAML')
    .option('--json', 'Print JSON instead of YAML')
    .option('--verbose', 'Show files as they are loaded')
    .option('--debug', 'Show directive resolution')
    .option('--trace', 'Show every file read')
    .exitOverride()
    .configureOutput({ writeOut: io.stdout, writeErr: io.stderr });
}

function resolveTemplates(config: Record<string, unknown>, options: CliOptions): {
  data: Record<string, unknown>;
  context: SubstitutionContext;
} {
  const namespace = new Namespace(config);
  const body = (context: SubstitutionContext) => ({ data: resolveNamespace(namespace, context), context });
  if (options.forgive !== undefined && options.forgive !== false) {
    return forgivingSubstitutionsFrom(namespace, { forgive: options.forgive }, body);
  }
  return substitutionsFrom(namespace, {}, body);
}

function render(data: Record<string, unknown>, options: CliOptions): string {
  if (options.list) {
    return `${new Namespace(data).dump().join('\n')}\n`;
  }
  if (options.json) {
    return `${JSON.stringify(data, null, 2)}\n`;
  }
  return yaml.dump(data, { lineWidth: -1, noRefs: true });
}

/**
 * Run the CLI and return its exit status.
 */
export function runCli(argv: readonly string[], io: CliIO = defaultIO): number {
  const program = createProgram(io);
  try {
    program.parse([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const [file] = program.args;
  // flags win over LAYERCONF_LOG_LEVEL
  const level = parseLogLevel(options);
  logger.setLevel(level === LogLevel.NORMAL ? getEnvLogLevel() ?? level : level);

  let loaded: ReturnType<typeof loadConfig>;
  try {
    loaded = loadConfig(file, {
      includes: options.includes,
      useSources: options.use ? [] : null,
      searchPath: [...getSearchPath(), ...options.includeDir],
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error(error.message, error);
      return 1;
    }
    throw error;
  }

  if (options.deps) {
    io.stdout([...loaded.dependencies].map((dependency) => `${dependency}\n`).join(''));
    return 0;
  }

  let data: Record<string, unknown> = loaded.config;
  if (options.resolve) {
    const resolved = resolveTemplates(loaded.config, options);
    if (resolved.context.errors.length > 0) {
      logger.substitutionReport(resolved.context.errors);
      return 1;
    }
    if (resolved.context.forgiven.length > 0) {
      logger.debug(`forgiven: ${resolved.context.forgiven.join(', ')}`);
    }
    data = resolved.data;
  }

  io.stdout(render(data, options));
  return 0;
}
