// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { candidatePaths, resolveInclude, resolvePackageRoot } from '../src/config/search-path.js';
import { ConfigError } from '../src/errors.js';
import { getSearchPath } from '../src/settings.js';

describe('Config - include search path', () => {
  let tempDir: string;
  let referrer: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'layerconf-search-'));
    referrer = path.join(tempDir, 'main.yml');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('lists the referrer directory first and drops duplicates', () => {
    const roots = [tempDir, '/etc/layerconf'];

    expect(candidatePaths('x.yml', referrer, roots)).toEqual([
      path.join(tempDir, 'x.yml'),
      path.resolve('/etc/layerconf', 'x.yml'),
    ]);
  });

  it('prefers the referrer directory over search roots', () => {
    const other = path.join(tempDir, 'other');
    fs.mkdirSync(other);
    fs.writeFileSync(path.join(tempDir, 'x.yml'), 'a: 1\n');
    fs.writeFileSync(path.join(other, 'x.yml'), 'a: 2\n');

    const found = resolveInclude('x.yml', { referrer, searchPath: [other], source: 'main.yml' });
    expect(found).toBe(path.join(tempDir, 'x.yml'));
  });

  it('accepts absolute paths', () => {
    const absolute = path.join(tempDir, 'abs.yml');
    fs.writeFileSync(absolute, 'a: 1\n');

    expect(resolveInclude(absolute, { referrer: '/elsewhere/main.yml', searchPath: [], source: 'main.yml' })).toBe(
      absolute
    );
  });

  it('rejects an empty specifier', () => {
    expect(() => resolveInclude('', { referrer, searchPath: [], source: 'main.yml', location: 'sec' })).toThrow(
      'config error at sec in main.yml: _include: empty _include specifier'
    );
  });

  it('carries the searched locations on the error', () => {
    let caught: unknown;
    try {
      resolveInclude('gone.yml', { referrer, searchPath: [], source: 'main.yml' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught).toMatchObject({ directive: '_include', searched: [path.join(tempDir, 'gone.yml')] });
  });

  it('finds an installed package root', () => {
    const pkgDir = path.join(tempDir, 'node_modules', 'cfg-pkg');
    fs.mkdirSync(pkgDir, { recursive: true });
    fs.writeFileSync(path.join(pkgDir, 'package.json'), '{"name": "cfg-pkg", "version": "0.0.1"}\n');

    expect(resolvePackageRoot('cfg-pkg', referrer)).toBe(pkgDir);
  });

  it('reports a missing file inside a package', () => {
    const pkgDir = path.join(tempDir, 'node_modules', 'cfg-pkg');
    fs.mkdirSync(pkgDir, { recursive: true });
    fs.writeFileSync(path.join(pkgDir, 'package.json'), '{"name": "cfg-pkg", "version": "0.0.1"}\n');

    expect(() => resolveInclude('(cfg-pkg)missing.yml', { referrer, searchPath: [], source: 'main.yml' })).toThrow(
      `config error at top level in main.yml: _include (cfg-pkg)missing.yml not found (searched ${path.join(pkgDir, 'missing.yml')})`
    );
  });
});

describe('Settings - search path', () => {
  afterEach(() => {
    delete process.env.LAYERCONF_PATH;
  });

  it('defaults to the current directory', () => {
    expect(getSearchPath()).toEqual(['.']);
  });

  it('appends LAYERCONF_PATH entries', () => {
    process.env.LAYERCONF_PATH = ['/opt/a', '', '/opt/b'].join(path.delimiter);

    expect(getSearchPath()).toEqual(['.', '/opt/a', '/opt/b']);
  });
});
