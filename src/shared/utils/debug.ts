/**
 * Debug log for reloc.
 *
 * Each entry is one line: time, level, component, message, then the
 * entry's fields as `key=value` pairs. Values are JSON, so directory lists
 * read as `searchPath=["/a","/b"]`. Lines go to a log file when
 * `debug.enabled` is set and to stderr under --verbose.
 */

import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/index.js';
import { CONFIG_DIR_NAME } from '../constants.js';

type DebugLevel = 'DEBUG' | 'INFO' | 'ERROR';

/** Structured context attached to a log entry */
export type LogFields = Readonly<Record<string, unknown>>;

/** Scoped logger returned by createLogger */
export interface ComponentLogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

function renderValue(value: unknown): string {
  if (typeof value === 'string') return value;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return '[unserializable]';
  }
}

function formatFields(fields: LogFields | undefined): string {
  if (!fields) return '';
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => ` ${key}=${renderValue(value)}`)
    .join('');
}

function defaultLogFile(projectDir: string): string {
  const stamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  return join(projectDir, CONFIG_DIR_NAME, 'logs', `debug-${stamp}.log`);
}

/**
 * Process-wide sink behind every component logger.
 * Configured once by the CLI's preAction hook.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private logFile: string | null = null;
  private verbose = false;
  private configured = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  /** Open the log file when enabled; later calls are ignored */
  configure(config: DebugConfig | undefined, projectDir: string): void {
    if (this.configured) return;
    this.configured = true;
    if (!config?.enabled) return;

    const file = config.logFile ?? defaultLogFile(projectDir);
    mkdirSync(dirname(file), { recursive: true });
    writeFileSync(file, `# reloc debug log started ${new Date().toISOString()} in ${projectDir}\n`, 'utf-8');
    this.logFile = file;
  }

  setVerbose(enabled: boolean): void {
    this.verbose = enabled;
  }

  reset(): void {
    this.logFile = null;
    this.verbose = false;
    this.configured = false;
  }

  write(level: DebugLevel, component: string, message: string, fields?: LogFields): void {
    if (!this.verbose && !this.logFile) return;

    const time = new Date().toISOString();
    const line = `${level} [${component}] ${message}${formatFields(fields)}`;

    if (this.verbose) {
      process.stderr.write(`${time.slice(11, 23)} ${line}\n`);
    }
    if (!this.logFile) return;

    try {
      appendFileSync(this.logFile, `${time} ${line}\n`, 'utf-8');
    } catch (err) {
      // Stop file logging after the first failed write
      process.stderr.write(`reloc: debug log disabled: ${err instanceof Error ? err.message : String(err)}\n`);
      this.logFile = null;
    }
  }
}

export function initDebugLogger(config: DebugConfig | undefined, projectDir: string): void {
  DebugLogger.getInstance().configure(config, projectDir);
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerbose(enabled);
}

export function resetDebugLogger(): void {
  DebugLogger.getInstance().reset();
}

export function createLogger(component: string): ComponentLogger {
  const sink = (level: DebugLevel) => (message: string, fields?: LogFields) =>
    DebugLogger.getInstance().write(level, component, message, fields);
  return { debug: sink('DEBUG'), info: sink('INFO'), error: sink('ERROR') };
}
