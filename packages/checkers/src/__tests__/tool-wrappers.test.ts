import { describe, it, expect, vi } from 'vitest';
import type { IProcessRunner, ToolInvocationResult } from '@revloop/core';
import { StaticAnalyzer } from '../static-analyzer.js';
import { TestSuiteRunner } from '../test-suite-runner.js';
import { DEFAULT_ANALYSIS_COMMAND, DEFAULT_TEST_COMMAND } from '../commands.js';

function fakeRunner(result: Partial<ToolInvocationResult>) {
  const run = vi.fn<IProcessRunner['run']>().mockResolvedValue({
    executed: true,
    rawOutput: '',
    exitCode: 0,
    durationMs: 5,
    ...result,
  });
  const runner: IProcessRunner = { run };
  return { runner, run };
}

describe('StaticAnalyzer', () => {
  it('runs the configured command against the path and parses the output', async () => {
    const { runner, run } = fakeRunner({
      rawOutput: '[]\nYour code has been rated at 8.25/10\n',
      exitCode: 16,
    });
    const analyzer = new StaticAnalyzer(runner);

    const outcome = await analyzer.analyze('/s/calc.py');

    expect(run).toHaveBeenCalledWith({ ...DEFAULT_ANALYSIS_COMMAND, target: '/s/calc.py', signal: undefined });
    expect(outcome).toEqual({
      score: 8.25,
      violations: [],
      rawOutput: '[]\nYour code has been rated at 8.25/10\n',
    });
  });

  it('returns failure-shaped defaults when the tool could not run', async () => {
    const { runner } = fakeRunner({ executed: false, executionError: 'timed out', exitCode: null, rawOutput: 'partial' });
    const outcome = await new StaticAnalyzer(runner).analyze('/s/calc.py');
    expect(outcome).toEqual({
      score: 0,
      violations: [],
      rawOutput: 'partial',
      executionError: 'timed out',
    });
  });

  it('uses a custom command and forwards the abort signal', async () => {
    const { runner, run } = fakeRunner({});
    const signal = new AbortController().signal;
    const command = { executable: 'ruff', args: ['check'], timeoutSeconds: 5 };
    await new StaticAnalyzer(runner, command).analyze('/s/a.py', signal);
    expect(run).toHaveBeenCalledWith({ ...command, target: '/s/a.py', signal });
  });
});

describe('TestSuiteRunner', () => {
  it('parses the runner output with the exit code', async () => {
    const { runner, run } = fakeRunner({ rawOutput: '3 passed in 0.02s\n', exitCode: 0 });
    const outcome = await new TestSuiteRunner(runner).run('/s/test_calc.py');

    expect(run).toHaveBeenCalledWith({ ...DEFAULT_TEST_COMMAND, target: '/s/test_calc.py', signal: undefined });
    expect(outcome.allPassed).toBe(true);
    expect(outcome.collected).toBe(3);
  });

  it('reports zero collected tests when the tool could not run', async () => {
    const { runner } = fakeRunner({ executed: false, executionError: 'target not found', exitCode: null });
    const outcome = await new TestSuiteRunner(runner).run('/s/test_missing.py');
    expect(outcome).toEqual({
      collected: 0,
      passedCount: 0,
      failedCount: 0,
      allPassed: false,
      failureExcerpts: [],
      rawOutput: '',
      executionError: 'target not found',
    });
  });
});
