import type { IProcessRunner, ITestSuiteRunner, TestOutcome, ToolCommand } from '@revloop/core';
import { createLogger } from '@revloop/core';
import { parseTestOutput } from './test-parser.js';
import { DEFAULT_TEST_COMMAND } from './commands.js';

const log = createLogger('TestSuiteRunner');

export class TestSuiteRunner implements ITestSuiteRunner {
  constructor(
    private readonly runner: IProcessRunner,
    private readonly command: ToolCommand = DEFAULT_TEST_COMMAND,
  ) {}

  async run(testPath: string, signal?: AbortSignal): Promise<TestOutcome> {
    const result = await this.runner.run({ ...this.command, target: testPath, signal });

    if (!result.executed) {
      log.warn(`Tests did not run: ${result.executionError ?? 'unknown error'}`, undefined, testPath);
      return {
        collected: 0,
        passedCount: 0,
        failedCount: 0,
        allPassed: false,
        failureExcerpts: [],
        rawOutput: result.rawOutput,
        executionError: result.executionError,
      };
    }

    const outcome = parseTestOutput(result.rawOutput, result.exitCode);
    log.debug(
      `${outcome.passedCount} passed, ${outcome.failedCount} failed (exit ${result.exitCode ?? 'none'})`,
      undefined,
      testPath,
    );
    return outcome;
  }
}
