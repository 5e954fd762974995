/**
 * Value objects produced by the checker tools. Constructed once by the call
 * site that ran the tool and never mutated afterwards.
 */

export interface ToolInvocationResult {
  /** False only when the runner itself faulted (no spawn, timeout, abort) */
  readonly executed: boolean;
  /** stdout followed by stderr */
  readonly rawOutput: string;
  /** Set only when `executed` is false */
  readonly executionError?: string;
  /** Exit code of the tool; null when it did not exit on its own */
  readonly exitCode: number | null;
  readonly durationMs: number;
}

export interface Violation {
  readonly symbol: string;
  readonly message: string;
  readonly messageId?: string;
  readonly type?: string;
  readonly path?: string;
  readonly module?: string;
  readonly obj?: string;
  readonly line?: number;
  readonly column?: number;
}

export interface AnalysisOutcome {
  /** Tool quality score out of 10; 0 when unknown */
  readonly score: number;
  readonly violations: readonly Violation[];
  readonly rawOutput: string;
  readonly executionError?: string;
}

export interface TestOutcome {
  /** passedCount + failedCount; 0 means nothing was collected */
  readonly collected: number;
  readonly passedCount: number;
  readonly failedCount: number;
  readonly allPassed: boolean;
  /** One text block per failing test, at most MAX_FAILURE_EXCERPTS */
  readonly failureExcerpts: readonly string[];
  readonly rawOutput: string;
  readonly executionError?: string;
}

export const MAX_FAILURE_EXCERPTS = 5;
