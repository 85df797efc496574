/**
 * Runtime configuration
 *
 * Resolved from defaults, then an optional JSON settings file, then
 * environment variables.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ValidationError, toErrorMessage } from './errors.js';
import { isLogLevel } from './logging.js';
import type { LogLevel } from './logging.js';
import { REPORT_FORMATS } from './report.js';
import type { ReportFormat } from './types.js';

export interface DatmatchConfig {
  /** Directory holding the DAT sources loaded at startup */
  databaseDir: string;
  logLevel: LogLevel;
  /** Default for directory scans */
  recursive: boolean;
  reportFormat: ReportFormat;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;

  /** JSON file with any subset of {@link DatmatchConfig}. Ignored when missing */
  settingsPath?: string;

  /** Base for relative paths. Defaults to the working directory */
  cwd?: string;
}

export const DEFAULT_CONFIG: Readonly<DatmatchConfig> = Object.freeze({
  databaseDir: 'data',
  logLevel: 'info',
  recursive: false,
  reportFormat: 'json',
});

function isReportFormat(value: unknown): value is ReportFormat {
  return typeof value === 'string' && REPORT_FORMATS.some((format) => format === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function readSettings(settingsPath: string): Promise<Record<string, unknown>> {
  let text: string;
  try {
    text = await readFile(settingsPath, 'utf-8');
  } catch (error) {
    if (isRecord(error) && error.code === 'ENOENT') {
      return {};
    }
    throw new ValidationError(`Cannot read settings ${settingsPath}: ${toErrorMessage(error)}`, settingsPath);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ValidationError(`Invalid JSON in ${settingsPath}: ${toErrorMessage(error)}`, settingsPath);
  }

  if (!isRecord(parsed)) {
    throw new ValidationError(`Settings in ${settingsPath} must be a JSON object`, settingsPath);
  }
  return parsed;
}

function applySettings(config: DatmatchConfig, settings: Record<string, unknown>, origin: string): void {
  const { databaseDir, logLevel, recursive, reportFormat } = settings;

  if (databaseDir !== undefined) {
    if (typeof databaseDir !== 'string' || !databaseDir) {
      throw new ValidationError(`${origin}: databaseDir must be a non-empty string`);
    }
    config.databaseDir = databaseDir;
  }

  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ValidationError(`${origin}: invalid log level ${JSON.stringify(logLevel)}`);
    }
    config.logLevel = logLevel;
  }

  if (recursive !== undefined) {
    if (typeof recursive !== 'boolean') {
      throw new ValidationError(`${origin}: recursive must be true or false`);
    }
    config.recursive = recursive;
  }

  if (reportFormat !== undefined) {
    if (!isReportFormat(reportFormat)) {
      throw new ValidationError(`${origin}: invalid report format ${JSON.stringify(reportFormat)}`);
    }
    config.reportFormat = reportFormat;
  }
}

/**
 * @throws ValidationError on an unreadable settings file or an invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<DatmatchConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const config: DatmatchConfig = { ...DEFAULT_CONFIG };

  if (options.settingsPath) {
    applySettings(config, await readSettings(options.settingsPath), options.settingsPath);
  }

  applySettings(
    config,
    {
      databaseDir: env.DATMATCH_DATABASE_DIR || undefined,
      logLevel: env.LOG_LEVEL || undefined,
    },
    'environment'
  );

  config.databaseDir = resolve(cwd, config.databaseDir);
  return config;
}
