/**
 * End-to-end tests for the reloc CLI, run in process
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, realpathSync, rmSync, symlinkSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runCli } from '../app/cli/run.js';
import { resetDebugLogger } from '../shared/utils/debug.js';
import { LogManager } from '../shared/ui/index.js';

const ANSI = /\x1b\[[0-9;]*m/g;

describe('reloc CLI', () => {
  let base: string;
  let projectDir: string;
  let exe: string;
  let env: Record<string, string>;
  let stdout: string[];

  function writeProjectConfig(content: string): void {
    mkdirSync(join(projectDir, '.reloc'), { recursive: true });
    writeFileSync(join(projectDir, '.reloc', 'config.yaml'), content);
  }

  function run(...args: string[]): Promise<number> {
    return runCli({ argv: ['node', exe, ...args], env, cwd: projectDir });
  }

  function lines(): string[] {
    return stdout.join('').replace(ANSI, '').split('\n').filter((line) => line.length > 0);
  }

  beforeEach(() => {
    resetDebugLogger();
    LogManager.resetInstance();

    base = realpathSync(mkdtempSync(join(tmpdir(), 'reloc-cli-')));
    mkdirSync(join(base, 'opt', 'aclocal', 'bin'), { recursive: true });
    mkdirSync(join(base, 'opt', 'aclocal', 'res', 'aclocal-1.16'), { recursive: true });
    writeFileSync(join(base, 'opt', 'aclocal', 'bin', 'aclocal'), '#!/bin/sh\n');
    writeFileSync(join(base, 'opt', 'aclocal', 'res', 'aclocal-1.16', 'init.m4'), 'dnl init\n');
    mkdirSync(join(base, 'usr', 'bin'), { recursive: true });
    exe = join(base, 'usr', 'bin', 'aclocal');
    symlinkSync(join(base, 'opt', 'aclocal', 'bin', 'aclocal'), exe);
    mkdirSync(join(base, 'extra'), { recursive: true });

    projectDir = join(base, 'project');
    mkdirSync(projectDir, { recursive: true });
    writeProjectConfig('package: aclocal\napi_version: "1.16"\n');
    env = { RELOC_CONFIG_DIR: join(base, 'global') };

    stdout = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    resetDebugLogger();
    rmSync(base, { recursive: true, force: true });
  });

  it('should print the bundled root resolved through the symlinked executable', async () => {
    const code = await run('root');

    expect(code).toBe(0);
    expect(lines()).toEqual([join(base, 'opt', 'aclocal', 'res', 'aclocal-1.16')]);
  });

  it('should print the libdir override as the root', async () => {
    env.ACLOCAL_LIBDIR = '/custom/path';

    expect(await run('root')).toBe(0);
    expect(lines()).toEqual(['/custom/path']);
  });

  it('should print the search path by layer', async () => {
    env.ACLOCAL_EXTRA_INCLUDES = `${join(base, 'extra')}:${join(base, 'missing')}`;

    const code = await run('-I', 'inc', 'path', '--layers');

    expect(code).toBe(0);
    expect(lines()).toEqual([
      `user\t${join(projectDir, 'inc')}`,
      `bundled\t${join(base, 'opt', 'aclocal', 'res', 'aclocal-1.16')}`,
      `extra\t${join(base, 'extra')}`,
    ]);
  });

  it('should find a bundled resource', async () => {
    expect(await run('find', 'init.m4')).toBe(0);
    expect(lines()).toEqual([join(base, 'opt', 'aclocal', 'res', 'aclocal-1.16', 'init.m4')]);
  });

  it('should prefer a user include over the bundled resource', async () => {
    mkdirSync(join(projectDir, 'm4'), { recursive: true });
    writeFileSync(join(projectDir, 'm4', 'init.m4'), 'dnl local\n');

    expect(await run('--include', 'm4', 'find', 'init.m4')).toBe(0);
    expect(lines()).toEqual([join(projectDir, 'm4', 'init.m4')]);
  });

  it('should exit with 4 when a resource is missing', async () => {
    expect(await run('find', 'absent.m4')).toBe(4);
    expect(lines()).toEqual([]);
  });

  it('should list resources filtered by extension', async () => {
    writeFileSync(join(base, 'opt', 'aclocal', 'res', 'aclocal-1.16', 'README'), 'docs\n');

    expect(await run('list', '--ext', '.m4')).toBe(0);
    expect(lines()).toEqual([join(base, 'opt', 'aclocal', 'res', 'aclocal-1.16', 'init.m4')]);
  });

  it('should show the tool environment', async () => {
    env.ACLOCAL_LIBDIR = '/custom/path';

    expect(await run('env')).toBe(0);
    expect(lines()).toEqual([
      'ACLOCAL_LIBDIR: /custom/path',
      'ACLOCAL_UNINSTALLED: (unset)',
      'ACLOCAL_EXTRA_INCLUDES: (unset)',
    ]);
  });

  it('should exit with 2 when the executable path is not absolute', async () => {
    expect(await run('--exe', 'bin/aclocal', 'root')).toBe(2);
  });

  it('should exit with 3 when the config is invalid', async () => {
    writeProjectConfig('package: aclocal\n');

    expect(await run('root')).toBe(3);
  });

  it('should exit with 3 when no trace tool is configured', async () => {
    expect(await run('trace', '--help-me')).toBe(3);
  });

  it('should not fail when the trace companion is missing', async () => {
    writeProjectConfig([
      'package: aclocal',
      'api_version: "1.16"',
      'trace_tool:',
      '  env_var: AUTOM4TE',
      '  companion: autom4te',
    ].join('\n'));
    env.AUTOM4TE = join(base, 'no-such-autom4te');

    expect(await run('trace', '--trace=AC_INIT')).toBe(0);
    expect(lines()).toEqual([]);
  });

  it('should print the version', async () => {
    expect(await run('--version')).toBe(0);
    expect(lines()).toEqual(['0.3.0']);
  });
});
