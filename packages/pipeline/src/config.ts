import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import type { LogLevel, ToolCommand } from '@revloop/core';
import {
  DEFAULT_EXCLUDED_DIRS,
  DEFAULT_EXTENSION,
  DEFAULT_MAX_ITERATIONS,
  createLogger,
  errorMessage,
  isLogLevel,
} from '@revloop/core';
import { DEFAULT_ANALYSIS_COMMAND, DEFAULT_TEST_COMMAND } from '@revloop/checkers';

const log = createLogger('Config');

export const CONFIG_FILE_NAME = 'revloop.config.json';

export interface RevloopConfig {
  /** Every file the pipeline reads, writes or checks must live under this directory */
  sandboxRoot: string;
  /** Mutate/Validate cycles per item before giving up */
  maxIterations: number;
  /** Pause between stages, e.g. to respect a reasoning service's rate limit */
  stageDelayMs: number;
  /** Items processed in parallel */
  concurrency: number;
  extension: string;
  excludedDirs: string[];
  analysisCommand: ToolCommand;
  testCommand: ToolCommand;
  /** Where experiment_data.json is written */
  logDir: string;
  logLevel: LogLevel;
}

export interface LoadConfigOptions {
  /** Defaults to ./revloop.config.json when it exists */
  configPath?: string;
  /** Environment overrides; nothing is read from process.env implicitly */
  env?: Record<string, string | undefined>;
  /** Base for relative defaults */
  cwd?: string;
}

export function defaultConfig(cwd: string = process.cwd()): RevloopConfig {
  return {
    sandboxRoot: resolve(cwd, 'sandbox'),
    maxIterations: DEFAULT_MAX_ITERATIONS,
    stageDelayMs: 0,
    concurrency: 1,
    extension: DEFAULT_EXTENSION,
    excludedDirs: [...DEFAULT_EXCLUDED_DIRS],
    analysisCommand: { ...DEFAULT_ANALYSIS_COMMAND, args: [...DEFAULT_ANALYSIS_COMMAND.args] },
    testCommand: { ...DEFAULT_TEST_COMMAND, args: [...DEFAULT_TEST_COMMAND.args] },
    logDir: resolve(cwd, 'logs'),
    logLevel: 'info',
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function integerAtLeast(value: unknown, min: number): number | undefined {
  const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
  return typeof n === 'number' && Number.isInteger(n) && n >= min ? n : undefined;
}

function toolCommand(value: unknown): ToolCommand | undefined {
  if (!isRecord(value)) return undefined;
  const { executable, args, timeoutSeconds } = value;
  if (typeof executable !== 'string' || executable === '') return undefined;
  if (!isStringArray(args)) return undefined;
  if (typeof timeoutSeconds !== 'number' || !(timeoutSeconds > 0)) return undefined;
  return { executable, args, timeoutSeconds };
}

/**
 * Apply the recognised fields of `source` onto `config`. Unknown fields are
 * ignored; invalid values keep the current value and log a warning.
 */
function applyOverrides(config: RevloopConfig, source: Record<string, unknown>, baseDir: string, origin: string): void {
  const warn = (field: string) => log.warn(`Ignoring invalid ${field} from ${origin}`);

  const paths = ['sandboxRoot', 'logDir'] as const;
  for (const field of paths) {
    const value = source[field];
    if (value === undefined) continue;
    if (typeof value === 'string' && value !== '') {
      config[field] = isAbsolute(value) ? value : resolve(baseDir, value);
    } else {
      warn(field);
    }
  }

  const integers = [
    ['maxIterations', 1],
    ['stageDelayMs', 0],
    ['concurrency', 1],
  ] as const;
  for (const [field, min] of integers) {
    if (source[field] === undefined) continue;
    const value = integerAtLeast(source[field], min);
    if (value === undefined) warn(field);
    else config[field] = value;
  }

  if (source.extension !== undefined) {
    const { extension } = source;
    if (typeof extension === 'string' && extension.startsWith('.')) config.extension = extension;
    else warn('extension');
  }

  if (source.excludedDirs !== undefined) {
    if (isStringArray(source.excludedDirs)) config.excludedDirs = source.excludedDirs;
    else warn('excludedDirs');
  }

  const commands = ['analysisCommand', 'testCommand'] as const;
  for (const field of commands) {
    if (source[field] === undefined) continue;
    const command = toolCommand(source[field]);
    if (command) config[field] = command;
    else warn(field);
  }

  if (source.logLevel !== undefined) {
    const { logLevel } = source;
    if (typeof logLevel === 'string' && isLogLevel(logLevel)) config.logLevel = logLevel;
    else warn('logLevel');
  }
}

/**
 * Priority: environment overrides > config file > defaults.
 * Relative paths in the file resolve against the file's directory.
 */
export function loadConfig(options: LoadConfigOptions = {}): RevloopConfig {
  const cwd = options.cwd ?? process.cwd();
  const config = defaultConfig(cwd);

  const configPath = options.configPath ? resolve(cwd, options.configPath) : resolve(cwd, CONFIG_FILE_NAME);
  if (existsSync(configPath)) {
    try {
      const parsed: unknown = JSON.parse(readFileSync(configPath, 'utf-8'));
      if (isRecord(parsed)) {
        applyOverrides(config, parsed, dirname(configPath), configPath);
        log.info(`Loaded config from ${configPath}`);
      } else {
        log.warn(`Config at ${configPath} is not an object, using defaults`);
      }
    } catch (error) {
      log.warn(`Failed to parse config at ${configPath}, using defaults: ${errorMessage(error)}`);
    }
  } else if (options.configPath) {
    log.warn(`Config file not found: ${configPath}, using defaults`);
  } else {
    log.debug('No config file found, using defaults');
  }

  const env = options.env ?? {};
  const envOverrides: Record<string, unknown> = {};
  if (env.REVLOOP_SANDBOX_ROOT) envOverrides.sandboxRoot = env.REVLOOP_SANDBOX_ROOT;
  if (env.REVLOOP_MAX_ITERATIONS) envOverrides.maxIterations = env.REVLOOP_MAX_ITERATIONS;
  if (env.REVLOOP_CONCURRENCY) envOverrides.concurrency = env.REVLOOP_CONCURRENCY;
  if (env.REVLOOP_STAGE_DELAY_MS) envOverrides.stageDelayMs = env.REVLOOP_STAGE_DELAY_MS;
  if (env.REVLOOP_LOG_LEVEL) envOverrides.logLevel = env.REVLOOP_LOG_LEVEL;
  applyOverrides(config, envOverrides, cwd, 'environment');

  return config;
}
