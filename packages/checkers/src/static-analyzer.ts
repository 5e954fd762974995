import type { AnalysisOutcome, IProcessRunner, IStaticAnalyzer, ToolCommand } from '@revloop/core';
import { createLogger } from '@revloop/core';
import { parseAnalysisOutput } from './analysis-parser.js';
import { DEFAULT_ANALYSIS_COMMAND } from './commands.js';

const log = createLogger('StaticAnalyzer');

export class StaticAnalyzer implements IStaticAnalyzer {
  constructor(
    private readonly runner: IProcessRunner,
    private readonly command: ToolCommand = DEFAULT_ANALYSIS_COMMAND,
  ) {}

  async analyze(path: string, signal?: AbortSignal): Promise<AnalysisOutcome> {
    const result = await this.runner.run({ ...this.command, target: path, signal });

    if (!result.executed) {
      log.warn(`Analysis did not run: ${result.executionError ?? 'unknown error'}`, undefined, path);
      return {
        score: 0,
        violations: [],
        rawOutput: result.rawOutput,
        executionError: result.executionError,
      };
    }

    const { score, violations } = parseAnalysisOutput(result.rawOutput);
    log.debug(`Score ${score}/10, ${violations.length} violation(s)`, undefined, path);
    return { score, violations, rawOutput: result.rawOutput };
  }
}
