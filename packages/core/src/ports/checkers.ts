import type { AnalysisOutcome, TestOutcome } from '../models/tool-result.js';

export interface IStaticAnalyzer {
  analyze(path: string, signal?: AbortSignal): Promise<AnalysisOutcome>;
}

export interface ITestSuiteRunner {
  run(testPath: string, signal?: AbortSignal): Promise<TestOutcome>;
}
