import type { ToolCommand } from '@revloop/core';

/** pylint with machine-readable violations and the score line */
export const DEFAULT_ANALYSIS_COMMAND: ToolCommand = {
  executable: 'python3',
  args: ['-m', 'pylint', '--output-format=json', '--score=yes'],
  timeoutSeconds: 30,
};

/** pytest in verbose mode with short tracebacks */
export const DEFAULT_TEST_COMMAND: ToolCommand = {
  executable: 'python3',
  args: ['-m', 'pytest', '-v', '--tb=short', '--no-header'],
  timeoutSeconds: 60,
};
