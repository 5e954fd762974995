export { parseAnalysisOutput, parseScore, parseViolations } from './analysis-parser.js';
export type { ParsedAnalysis } from './analysis-parser.js';
export { parseTestOutput, extractFailureBlocks } from './test-parser.js';
export { StaticAnalyzer } from './static-analyzer.js';
export { TestSuiteRunner } from './test-suite-runner.js';
export { DEFAULT_ANALYSIS_COMMAND, DEFAULT_TEST_COMMAND } from './commands.js';
