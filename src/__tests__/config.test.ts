/**
 * Tests for config loading (global + project + env layers)
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig, readConfigFile } from '../infra/config/index.js';
import { ConfigError } from '../shared/utils/error.js';

describe('loadConfig', () => {
  let base: string;
  let globalDir: string;
  let projectDir: string;
  let env: Record<string, string>;

  function writeGlobal(content: string): void {
    mkdirSync(globalDir, { recursive: true });
    writeFileSync(join(globalDir, 'config.yaml'), content);
  }

  function writeProject(content: string): void {
    mkdirSync(join(projectDir, '.reloc'), { recursive: true });
    writeFileSync(join(projectDir, '.reloc', 'config.yaml'), content);
  }

  beforeEach(() => {
    base = mkdtempSync(join(tmpdir(), 'reloc-config-'));
    globalDir = join(base, 'global');
    projectDir = join(base, 'project');
    mkdirSync(projectDir, { recursive: true });
    env = { RELOC_CONFIG_DIR: globalDir };
  });

  afterEach(() => {
    rmSync(base, { recursive: true, force: true });
  });

  it('should merge global and project files', () => {
    writeGlobal([
      'package: aclocal',
      'api_version: "1.16"',
      'system_dirs:',
      '  - /usr/share/aclocal',
      'log_level: warn',
    ].join('\n'));
    writeProject([
      'includes:',
      '  - m4',
      'development_dirs:',
      '  - lib',
      'trace_tool:',
      '  env_var: AUTOM4TE',
      '  companion: autom4te',
    ].join('\n'));

    const config = loadConfig({ projectDir, env });

    expect(config).toEqual({
      tool: { packageName: 'aclocal', apiVersion: '1.16', envPrefix: 'ACLOCAL' },
      resourceOffset: '../res',
      includes: [join(projectDir, 'm4')],
      systemDirs: ['/usr/share/aclocal'],
      developmentDirs: [join(projectDir, 'lib')],
      traceTool: { envVar: 'AUTOM4TE', companion: 'autom4te' },
      logLevel: 'warn',
      debug: undefined,
      verbose: false,
    });
  });

  it('should let project keys replace global keys', () => {
    writeGlobal('package: aclocal\napi_version: "1.15"\nincludes: [/global/m4]\n');
    writeProject('api_version: "1.16"\nincludes: [/project/m4]\n');

    const config = loadConfig({ projectDir, env });

    expect(config.tool.apiVersion).toBe('1.16');
    expect(config.includes).toEqual(['/project/m4']);
  });

  it('should apply RELOC_* environment overrides last', () => {
    writeProject('package: aclocal\napi_version: "1.16"\n');
    env.RELOC_API_VERSION = '1.17';
    env.RELOC_INCLUDES = '["/abs/m4"]';
    env.RELOC_DEBUG_ENABLED = 'true';

    const config = loadConfig({ projectDir, env });

    expect(config.tool.apiVersion).toBe('1.17');
    expect(config.includes).toEqual(['/abs/m4']);
    expect(config.debug).toEqual({ enabled: true, logFile: undefined });
  });

  it('should load from environment alone', () => {
    env.RELOC_PACKAGE = 'my-tool';
    env.RELOC_API_VERSION = '2';

    const config = loadConfig({ projectDir, env });

    expect(config.tool).toEqual({ packageName: 'my-tool', apiVersion: '2', envPrefix: 'MY_TOOL' });
  });

  it('should honor an explicit env prefix and resource offset', () => {
    writeProject('package: aclocal\napi_version: "1.16"\nenv_prefix: AUTOMAKE\nresource_offset: ../share\n');

    const config = loadConfig({ projectDir, env });

    expect(config.tool.envPrefix).toBe('AUTOMAKE');
    expect(config.resourceOffset).toBe('../share');
  });

  it('should require package', () => {
    writeProject('api_version: "1.16"\n');

    expect(() => loadConfig({ projectDir, env })).toThrow(ConfigError);
    expect(() => loadConfig({ projectDir, env })).toThrow("Missing required config key 'package'");
  });

  it('should require api_version', () => {
    writeProject('package: aclocal\n');

    expect(() => loadConfig({ projectDir, env })).toThrow("Missing required config key 'api_version'");
  });

  it('should name the invalid key and file', () => {
    writeProject('package: aclocal\napi_version: "1.16"\nlog_level: loud\n');
    const configPath = join(projectDir, '.reloc', 'config.yaml');

    expect(() => loadConfig({ projectDir, env })).toThrow(/^Invalid config key 'log_level': /);
    expect(() => loadConfig({ projectDir, env })).toThrow(`(${configPath})`);
  });

  it('should reject a lowercase env prefix', () => {
    writeProject('package: aclocal\napi_version: "1.16"\nenv_prefix: aclocal\n');

    expect(() => loadConfig({ projectDir, env })).toThrow(/Invalid config key 'env_prefix'/);
  });

  it('should reject unknown keys', () => {
    writeProject('package: aclocal\napi_version: "1.16"\nunknown_key: 1\n');

    expect(() => loadConfig({ projectDir, env })).toThrow(/unknown_key/);
  });

  it('should reject an invalid boolean override', () => {
    writeProject('package: aclocal\napi_version: "1.16"\n');
    env.RELOC_VERBOSE = 'maybe';

    expect(() => loadConfig({ projectDir, env })).toThrow('RELOC_VERBOSE must be one of: true, false (environment)');
  });
});

describe('readConfigFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'reloc-config-file-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return an empty record for a missing file', () => {
    expect(readConfigFile(join(dir, 'absent.yaml'))).toEqual({});
  });

  it('should return an empty record for an empty file', () => {
    const path = join(dir, 'empty.yaml');
    writeFileSync(path, '');

    expect(readConfigFile(path)).toEqual({});
  });

  it('should reject a YAML sequence', () => {
    const path = join(dir, 'list.yaml');
    writeFileSync(path, '- a\n- b\n');

    expect(() => readConfigFile(path)).toThrow(`Config must be a YAML mapping (${path})`);
  });

  it('should report YAML syntax errors as config errors', () => {
    const path = join(dir, 'broken.yaml');
    writeFileSync(path, 'package: [unclosed\n');

    expect(() => readConfigFile(path)).toThrow(ConfigError);
  });
});
