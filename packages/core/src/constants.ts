export const DEFAULT_MAX_ITERATIONS = 10;

export const DEFAULT_EXTENSION = '.py';

/** Directory names never descended into when discovering work items */
export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  '.git',
  '.venv',
  'venv',
  '__pycache__',
  'node_modules',
];

/** Basename prefix that marks a validation item (generated test file) */
export const VALIDATION_PREFIX = 'test_';

export const TIMEOUT_MARKER = '\nTimeout reached.';

export const ANALYSIS_ERROR_PREFIX = 'ERROR: Analysis failed - ';
