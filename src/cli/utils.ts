/**
 * CLI Utilities
 *
 * Shared utilities for the iwslt CLI commands.
 */

import { readFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { createLogger } from '../lib/logger.js';
import { getExitCodeForKind, isTypedError } from '../lib/errors.js';
import {
  type CliConfig,
  safeValidateCliConfig,
  formatValidationError,
} from '../lib/config-schema.js';

/** Module-level logger (uses provider for DI support) */
const getLog = () => createLogger('cli');

/** ANSI color codes */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

/** Color output helpers */
export const color = {
  bold: (s: string) => `${colors.bold}${s}${colors.reset}`,
  dim: (s: string) => `${colors.dim}${s}${colors.reset}`,
  red: (s: string) => `${colors.red}${s}${colors.reset}`,
  green: (s: string) => `${colors.green}${s}${colors.reset}`,
  cyan: (s: string) => `${colors.cyan}${s}${colors.reset}`,
  gray: (s: string) => `${colors.gray}${s}${colors.reset}`,
  success: (s: string) => `${colors.green}${colors.bold}${s}${colors.reset}`,
  error: (s: string) => `${colors.red}${colors.bold}${s}${colors.reset}`,
};

/** Strip ANSI codes from string */
export function stripAnsi(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

/** Progress bar configuration */
export interface ProgressBarConfig {
  /** Total units to process */
  total: number;
  /** Bar width in characters */
  width?: number;
  /** Format string: :bar :percent :current :total */
  format?: string;
  /** Stream to write to */
  stream?: NodeJS.WritableStream;
}

/**
 * Create a single-line progress bar
 */
export function createProgressBar(config: ProgressBarConfig): {
  update: (current: number, tokens?: Record<string, string | number>) => void;
} {
  const {
    total,
    width = 40,
    format = '  :bar :percent',
    stream = process.stderr,
  } = config;

  function render(current: number, tokens: Record<string, string | number> = {}): void {
    const percent = total > 0 ? Math.min(current / total, 1) : 0;
    const filled = Math.round(width * percent);
    const bar = color.green('█'.repeat(filled)) + color.gray('░'.repeat(width - filled));

    let output = format
      .replace(':bar', bar)
      .replace(':percent', `${(percent * 100).toFixed(1)}%`.padStart(6))
      .replace(':current', String(current))
      .replace(':total', String(total));

    for (const [key, value] of Object.entries(tokens)) {
      output = output.replace(`:${key}`, String(value));
    }

    stream.write(`\r${output}\x1b[K`);
  }

  return { update: render };
}

/**
 * Spinner for indeterminate progress
 */
export function createSpinner(message: string, stream: NodeJS.WritableStream = process.stderr): {
  success: (msg: string) => void;
  fail: (msg: string) => void;
} {
  const frames = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  let frameIndex = 0;

  function render(): void {
    const frame = color.cyan(frames[frameIndex] ?? '⠋');
    stream.write(`\r${frame} ${message}\x1b[K`);
    frameIndex = (frameIndex + 1) % frames.length;
  }

  const interval = setInterval(render, 80);
  render();

  return {
    success(msg: string) {
      clearInterval(interval);
      stream.write(`\r${color.green('✓')} ${msg}\x1b[K\n`);
    },
    fail(msg: string) {
      clearInterval(interval);
      stream.write(`\r${color.red('✗')} ${msg}\x1b[K\n`);
    },
  };
}

/**
 * Format bytes as human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  const value = bytes / Math.pow(1024, i);
  return `${value.toFixed(i === 0 ? 0 : 1)} ${units[i] ?? 'B'}`;
}

/**
 * Format number with commas
 */
export function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Format rows as an aligned, indented table
 */
export function formatTable(
  rows: Record<string, unknown>[],
  columns?: string[],
  options: { padding?: number; header?: boolean } = {}
): string {
  if (rows.length === 0) return '';

  const { padding = 2, header = true } = options;
  const firstRow = rows[0];
  const cols = columns ?? (firstRow ? Object.keys(firstRow) : []);

  const widths: Record<string, number> = {};
  for (const col of cols) {
    widths[col] = col.length;
    for (const row of rows) {
      const stripped = stripAnsi(String(row[col] ?? ''));
      widths[col] = Math.max(widths[col] ?? 0, stripped.length);
    }
  }

  const lines: string[] = [];
  const pad = ' '.repeat(padding);

  if (header) {
    lines.push(`    ${cols.map((col) => color.bold(col.padEnd(widths[col] ?? 0))).join(pad)}`);
    lines.push(`    ${cols.map((col) => color.dim('─'.repeat(widths[col] ?? 0))).join(pad)}`);
  }

  for (const row of rows) {
    const rowLine = cols
      .map((col) => {
        const value = String(row[col] ?? '');
        const padLength = (widths[col] ?? 0) - stripAnsi(value).length;
        return value + ' '.repeat(Math.max(0, padLength));
      })
      .join(pad);
    lines.push(`    ${rowLine}`);
  }

  return lines.join('\n');
}

export type { CliConfig } from '../lib/config-schema.js';

/**
 * Read one JSON rc file
 *
 * @returns The parsed object, or null when the file does not exist
 */
async function readRcFile(path: string): Promise<Record<string, unknown> | null> {
  let data: string;
  try {
    data = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }

  const parsed: unknown = JSON.parse(data);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`Invalid configuration in ${path}: expected a JSON object`);
  }
  return { ...parsed };
}

/**
 * Load configuration from .iwsltrc files and the environment
 *
 * Configuration is merged from (in order of precedence):
 * 1. Environment variables (highest priority)
 * 2. .iwsltrc in current directory
 * 3. .iwsltrc in home directory (lowest priority)
 *
 * @throws {Error} If a file is not a JSON object or validation fails
 */
export async function loadConfig(): Promise<CliConfig> {
  const config: Record<string, unknown> = {};

  const configPaths = [join(homedir(), '.iwsltrc'), join(process.cwd(), '.iwsltrc')];
  for (const configPath of configPaths) {
    const parsed = await readRcFile(configPath);
    if (parsed) {
      getLog().debug('Loaded configuration file', { path: configPath });
      Object.assign(config, parsed);
    }
  }

  const envDataDir = process.env['IWSLT_DATA_DIR'];
  if (envDataDir) {
    config['dataDir'] = envDataDir;
  }
  const envYear = process.env['IWSLT_YEAR'];
  if (envYear) {
    config['year'] = envYear;
  }
  const envLangpair = process.env['IWSLT_LANGPAIR'];
  if (envLangpair) {
    config['langpair'] = envLangpair;
  }
  const envArchiveUrl = process.env['IWSLT_ARCHIVE_URL'];
  if (envArchiveUrl) {
    config['archiveBaseUrl'] = envArchiveUrl;
  }
  const envMaxRetries = process.env['IWSLT_MAX_RETRIES'];
  if (envMaxRetries) {
    config['maxRetries'] = Number(envMaxRetries);
  }

  const result = safeValidateCliConfig(config);
  if (!result.success) {
    throw new Error(`Invalid configuration:\n${formatValidationError(result.error)}`);
  }

  return result.data;
}

/**
 * Parse a non-negative integer option
 *
 * @throws {Error} If the value is not a whole number >= 0
 */
export function parseCount(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new Error(`--${name} must be a non-negative integer, got "${value}"`);
  }
  return n;
}

/**
 * Resolve path relative to cwd or absolute, expanding a leading ~
 */
export function resolvePath(p: string): string {
  if (p.startsWith('~')) {
    return join(homedir(), p.slice(1));
  }
  return resolve(process.cwd(), p);
}

/**
 * Print error message and exit
 */
export function fatal(message: string, exitCode = 1): never {
  getLog().error(message, undefined, 'fatal');
  console.error(`\n${color.error('Error:')} ${message}\n`);
  process.exit(exitCode);
}

/**
 * Report a failed command and exit with the code of its error kind
 */
export function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  fatal(message, isTypedError(error) ? getExitCodeForKind(error.kind) : 1);
}
