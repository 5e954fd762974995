/**
 * Domain model for one work item moving through the
 * analyze → mutate → validate loop.
 */

export type RevisionStatus =
  | 'in_progress'
  | 'success'
  | 'retry'
  | 'max_iterations'
  | 'abandoned';

export type TerminalRevisionStatus = Extract<RevisionStatus, 'success' | 'max_iterations' | 'abandoned'>;

export type RevisionStage = 'analyze' | 'mutate' | 'validate';

export interface RevisionState {
  /** Canonical path of the item under revision */
  readonly itemId: string;
  readonly originalContent: string;
  /** Analyze output for the current content */
  findings: string | null;
  currentContent: string;
  /** Validate output; null until Validate has run */
  validationSummary: string | null;
  /** Starts at 1, bumped once per retry transition */
  iteration: number;
  status: RevisionStatus;
}

export function isTerminalStatus(status: RevisionStatus): status is TerminalRevisionStatus {
  return status === 'success' || status === 'max_iterations' || status === 'abandoned';
}

export type BatchItemStatus = TerminalRevisionStatus | 'error' | 'skipped';

export interface BatchItemResult {
  readonly itemId: string;
  readonly status: BatchItemStatus;
  readonly iterations: number;
  readonly reason?: string;
  readonly error?: string;
}

export interface BatchReport {
  readonly items: readonly BatchItemResult[];
  readonly counts: Readonly<Record<BatchItemStatus, number>>;
  readonly total: number;
}
