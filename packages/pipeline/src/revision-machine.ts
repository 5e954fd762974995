import { setTimeout as sleep } from 'node:timers/promises';
import type {
  IConfinedFileStore,
  IEventBus,
  RevisionCollaborators,
  RevisionStage,
  RevisionState,
  RevisionStatus,
  StageCompletedEvent,
  StageStartedEvent,
  StatusChangedEvent,
  TestOutcome,
} from '@revloop/core';
import {
  ANALYSIS_ERROR_PREFIX,
  ConfigError,
  DEFAULT_MAX_ITERATIONS,
  Events,
  createLogger,
  errorMessage,
  isTerminalStatus,
} from '@revloop/core';

const log = createLogger('RevisionMachine');

/** Raw output shown in a summary when tests could not be collected */
const COLLECTION_OUTPUT_LIMIT = 500;

export interface RevisionMachineOptions {
  /** Mutate/Validate cycles allowed per item */
  maxIterations?: number;
  /** Pause between consecutive stages */
  stageDelayMs?: number;
}

export interface RevisionRunOptions {
  /** Checked before every stage; an aborted signal abandons the item */
  signal?: AbortSignal;
}

export function createRevisionState(itemId: string, content: string): RevisionState {
  return {
    itemId,
    originalContent: content,
    findings: null,
    currentContent: content,
    validationSummary: null,
    iteration: 1,
    status: 'in_progress',
  };
}

/** `retry` while below the ceiling, `max_iterations` once it is reached */
export function retryOrStop(iteration: number, maxIterations: number): RevisionStatus {
  return iteration < maxIterations ? 'retry' : 'max_iterations';
}

/** Zero collected tests counts as a failed validation, never as success. */
export function decideStatus(outcome: TestOutcome, iteration: number, maxIterations: number): RevisionStatus {
  if (outcome.collected === 0) return retryOrStop(iteration, maxIterations);
  if (outcome.allPassed) return 'success';
  return retryOrStop(iteration, maxIterations);
}

export function summarizeValidation(outcome: TestOutcome): string {
  if (outcome.collected === 0) {
    if (outcome.executionError) {
      return `No tests collected - validation did not run: ${outcome.executionError}`;
    }
    const raw = outcome.rawOutput.toLowerCase();
    if (raw.includes('import') || raw.includes('modulenotfounderror')) {
      return 'IMPORT ERROR - Check test file imports match source file function names:\n'
        + outcome.rawOutput.slice(0, COLLECTION_OUTPUT_LIMIT);
    }
    return 'No tests collected - possible import error';
  }

  if (outcome.allPassed) {
    return `All ${outcome.collected} tests passed`;
  }

  if (outcome.failedCount === 0) {
    return `Test run exited unsuccessfully with ${outcome.passedCount} passing test(s):\n`
      + outcome.rawOutput.slice(-COLLECTION_OUTPUT_LIMIT);
  }

  return `Failed ${outcome.failedCount}/${outcome.collected} tests:\n${outcome.failureExcerpts.join('\n')}`;
}

/**
 * Drives one work item through Analyze → Mutate → Validate, looping back to
 * Mutate on `retry` until validation passes or the ceiling is reached.
 *
 * Stage faults never abort the loop. A failed Analyze leaves an error marker
 * as the findings; a failed Validate counts as a failed validation.
 * No per-item state is held here, so one instance may run several items
 * concurrently.
 */
export class RevisionMachine {
  readonly maxIterations: number;
  private readonly stageDelayMs: number;

  constructor(
    private readonly collaborators: RevisionCollaborators,
    private readonly store: IConfinedFileStore,
    private readonly eventBus: IEventBus,
    options: RevisionMachineOptions = {},
  ) {
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.stageDelayMs = options.stageDelayMs ?? 0;
    if (!Number.isInteger(this.maxIterations) || this.maxIterations < 1) {
      throw new ConfigError(`maxIterations must be a positive integer, got ${this.maxIterations}`);
    }
  }

  async run(itemId: string, content: string, options: RevisionRunOptions = {}): Promise<RevisionState> {
    const { signal } = options;
    const state = createRevisionState(itemId, content);
    log.info(`Revision started (max ${this.maxIterations} iterations)`, undefined, itemId);

    if (await this.cancelled(state, signal, false)) return this.finish(state);
    await this.analyze(state);

    while (!isTerminalStatus(state.status)) {
      if (await this.cancelled(state, signal)) break;
      await this.mutate(state);

      if (await this.cancelled(state, signal)) break;
      this.setStatus(state, await this.validate(state));

      if (state.status === 'retry') {
        state.iteration += 1;
        log.info(`Retrying (iteration ${state.iteration}/${this.maxIterations})`, undefined, itemId);
      }
    }

    return this.finish(state);
  }

  private async analyze(state: RevisionState): Promise<void> {
    this.stageStarted(state, 'analyze');
    try {
      state.findings = await this.collaborators.analyze(state.itemId, state.currentContent);
      this.stageCompleted(state, 'analyze');
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Analyze failed: ${message}`, undefined, state.itemId);
      state.findings = `${ANALYSIS_ERROR_PREFIX}${message}`;
      this.stageCompleted(state, 'analyze', message);
    }
    this.setStatus(state, 'in_progress');
  }

  private async mutate(state: RevisionState): Promise<void> {
    this.stageStarted(state, 'mutate');
    // Every attempt rewrites the original; the latest validation summary is the feedback
    try {
      const next = await this.collaborators.mutate(
        state.itemId,
        state.originalContent,
        state.findings ?? '',
        state.validationSummary,
      );
      const written = await this.store.write(state.itemId, next);
      if (written.ok) {
        state.currentContent = next;
        this.stageCompleted(state, 'mutate');
      } else {
        log.warn(`Mutation not committed: ${written.error}`, undefined, state.itemId);
        this.stageCompleted(state, 'mutate', written.error);
      }
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Mutate failed, keeping previous content: ${message}`, undefined, state.itemId);
      this.stageCompleted(state, 'mutate', message);
    }
    this.setStatus(state, 'in_progress');
  }

  private async validate(state: RevisionState): Promise<RevisionStatus> {
    this.stageStarted(state, 'validate');
    try {
      const outcome = await this.collaborators.validate(
        state.itemId,
        state.currentContent,
        state.findings ?? '',
      );
      state.validationSummary = summarizeValidation(outcome);
      this.stageCompleted(state, 'validate');
      log.info(
        `Validation: ${outcome.passedCount} passed, ${outcome.failedCount} failed`,
        undefined,
        state.itemId,
      );
      return decideStatus(outcome, state.iteration, this.maxIterations);
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Validate failed: ${message}`, undefined, state.itemId);
      state.validationSummary = `Test execution error: ${message}`;
      this.stageCompleted(state, 'validate', message);
      return retryOrStop(state.iteration, this.maxIterations);
    }
  }

  /**
   * Stage boundary: waits out the configured delay, then abandons the item
   * if cancellation was requested.
   */
  private async cancelled(state: RevisionState, signal: AbortSignal | undefined, pause = true): Promise<boolean> {
    if (pause && this.stageDelayMs > 0 && !signal?.aborted) {
      try {
        await sleep(this.stageDelayMs, undefined, { signal });
      } catch (error) {
        if (!signal?.aborted) throw error;
      }
    }
    if (!signal?.aborted) return false;

    log.warn(`Cancelled at iteration ${state.iteration}`, undefined, state.itemId);
    this.setStatus(state, 'abandoned');
    return true;
  }

  private setStatus(state: RevisionState, status: RevisionStatus): void {
    if (state.status === status) return;
    const event: StatusChangedEvent = {
      itemId: state.itemId,
      status,
      previousStatus: state.status,
      iteration: state.iteration,
    };
    state.status = status;
    this.eventBus.emit(Events.STATUS_CHANGED, event);
  }

  private stageStarted(state: RevisionState, stage: RevisionStage): void {
    const event: StageStartedEvent = { itemId: state.itemId, stage, iteration: state.iteration };
    this.eventBus.emit(Events.STAGE_STARTED, event);
  }

  private stageCompleted(state: RevisionState, stage: RevisionStage, error?: string): void {
    const event: StageCompletedEvent = {
      itemId: state.itemId,
      stage,
      iteration: state.iteration,
      ok: error === undefined,
      error,
    };
    this.eventBus.emit(Events.STAGE_COMPLETED, event);
  }

  private finish(state: RevisionState): RevisionState {
    log.info(`Revision finished: ${state.status} (iterations: ${state.iteration})`, undefined, state.itemId);
    this.eventBus.emit(Events.REVISION_FINISHED, { state: { ...state } });
    return state;
  }
}
