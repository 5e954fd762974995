import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { LogEntry } from '@revloop/core';
import { addLogTransport } from '@revloop/core';
import { CONFIG_FILE_NAME, defaultConfig, loadConfig } from '../config.js';

describe('loadConfig()', () => {
  let dir: string;
  let warnings: string[];
  let removeTransport: () => void;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'revloop-config-'));
    warnings = [];
    removeTransport = addLogTransport((entry: LogEntry) => {
      if (entry.level === 'warn') warnings.push(entry.message);
    });
  });

  afterEach(async () => {
    removeTransport();
    await rm(dir, { recursive: true, force: true });
  });

  it('should return defaults when there is no config file', () => {
    const config = loadConfig({ cwd: dir });

    expect(config).toEqual(defaultConfig(dir));
    expect(config.sandboxRoot).toBe(join(dir, 'sandbox'));
    expect(config.maxIterations).toBe(10);
    expect(config.concurrency).toBe(1);
    expect(config.extension).toBe('.py');
    expect(config.testCommand.timeoutSeconds).toBe(60);
    expect(warnings).toEqual([]);
  });

  it('should read revloop.config.json and resolve paths against its directory', async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), JSON.stringify({
      sandboxRoot: 'work',
      logDir: '/var/log/revloop',
      maxIterations: 3,
      stageDelayMs: 250,
      excludedDirs: ['build'],
      testCommand: { executable: 'pytest', args: ['-q'], timeoutSeconds: 5 },
      logLevel: 'debug',
    }));

    const config = loadConfig({ cwd: dir });

    expect(config.sandboxRoot).toBe(join(dir, 'work'));
    expect(config.logDir).toBe('/var/log/revloop');
    expect(config.maxIterations).toBe(3);
    expect(config.stageDelayMs).toBe(250);
    expect(config.excludedDirs).toEqual(['build']);
    expect(config.testCommand).toEqual({ executable: 'pytest', args: ['-q'], timeoutSeconds: 5 });
    expect(config.logLevel).toBe('debug');
  });

  it('should keep defaults for invalid values and warn', async () => {
    const configPath = join(dir, 'custom.json');
    await writeFile(configPath, JSON.stringify({
      maxIterations: 0,
      concurrency: 1.5,
      extension: 'py',
      analysisCommand: { executable: 'pylint' },
      logLevel: 'verbose',
    }));

    const config = loadConfig({ cwd: dir, configPath });

    expect(config.maxIterations).toBe(10);
    expect(config.concurrency).toBe(1);
    expect(config.extension).toBe('.py');
    expect(config.analysisCommand.executable).toBe('python3');
    expect(config.logLevel).toBe('info');
    expect(warnings).toEqual([
      `Ignoring invalid maxIterations from ${configPath}`,
      `Ignoring invalid concurrency from ${configPath}`,
      `Ignoring invalid extension from ${configPath}`,
      `Ignoring invalid analysisCommand from ${configPath}`,
      `Ignoring invalid logLevel from ${configPath}`,
    ]);
  });

  it('should fall back to defaults when the file is not valid JSON', async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), '{ not json');

    const config = loadConfig({ cwd: dir });

    expect(config).toEqual(defaultConfig(dir));
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain('Failed to parse config at');
  });

  it('should warn about an explicit config path that does not exist', () => {
    const config = loadConfig({ cwd: dir, configPath: 'missing.json' });

    expect(config).toEqual(defaultConfig(dir));
    expect(warnings).toEqual([`Config file not found: ${join(dir, 'missing.json')}, using defaults`]);
  });

  it('should let environment overrides win over the file', async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), JSON.stringify({ maxIterations: 3, sandboxRoot: 'work' }));

    const config = loadConfig({
      cwd: dir,
      env: {
        REVLOOP_SANDBOX_ROOT: 'elsewhere',
        REVLOOP_MAX_ITERATIONS: '5',
        REVLOOP_LOG_LEVEL: 'warn',
      },
    });

    expect(config.sandboxRoot).toBe(join(dir, 'elsewhere'));
    expect(config.maxIterations).toBe(5);
    expect(config.logLevel).toBe('warn');
  });

  it('should ignore a malformed environment override', () => {
    const config = loadConfig({ cwd: dir, env: { REVLOOP_MAX_ITERATIONS: 'lots' } });

    expect(config.maxIterations).toBe(10);
    expect(warnings).toEqual(['Ignoring invalid maxIterations from environment']);
  });

  it('should not read process.env implicitly', () => {
    const previous = process.env.REVLOOP_MAX_ITERATIONS;
    process.env.REVLOOP_MAX_ITERATIONS = '2';
    try {
      expect(loadConfig({ cwd: dir }).maxIterations).toBe(10);
    } finally {
      if (previous === undefined) delete process.env.REVLOOP_MAX_ITERATIONS;
      else process.env.REVLOOP_MAX_ITERATIONS = previous;
    }
  });
});
