import type {
  ExperimentAction,
  ExperimentActor,
  ExperimentDetailValue,
  IConfinedFileStore,
  IExperimentLog,
  IReasoningClient,
  IRevisionUnitRepository,
  IStaticAnalyzer,
  ITestSuiteRunner,
  RevisionCollaborators,
  TestOutcome,
} from '@revloop/core';
import { createLogger, errorMessage } from '@revloop/core';
import { extractCodeBlock } from './code-block.js';

const log = createLogger('Collaborators');

export interface ToolBackedCollaboratorDeps {
  reasoning: IReasoningClient;
  analyzer: IStaticAnalyzer;
  testRunner: ITestSuiteRunner;
  store: IConfinedFileStore;
  repository: IRevisionUnitRepository;
  experimentLog: IExperimentLog;
}

/**
 * Analyze/Mutate/Validate backed by the checker tools and an external
 * reasoning service. Every reasoning call and test run is recorded in the
 * experiment log. Errors propagate to the revision machine, which owns the
 * fallback behaviour.
 */
export class ToolBackedCollaborators implements RevisionCollaborators {
  /**
   * Mutate calls per item in the current run, used to label experiment
   * entries. Analyze opens every run, so it resets the count; the count then
   * matches the machine's iteration.
   */
  private readonly attempts = new Map<string, number>();

  constructor(private readonly deps: ToolBackedCollaboratorDeps) {}

  async analyze(itemId: string, content: string): Promise<string> {
    this.attempts.delete(itemId);
    const analysis = await this.deps.analyzer.analyze(itemId);
    const details: Record<string, ExperimentDetailValue> = {
      model: this.deps.reasoning.name,
      analysis_score: analysis.score,
      violations: analysis.violations.length,
    };

    try {
      const findings = await this.deps.reasoning.complete({ stage: 'analyze', itemId, content, analysis });
      this.record(itemId, 'analyzer', 'analysis', 'success', { ...details, output_response: findings });
      return findings;
    } catch (error) {
      this.record(itemId, 'analyzer', 'analysis', 'failure', { ...details, error: errorMessage(error) });
      throw error;
    }
  }

  async mutate(
    itemId: string,
    content: string,
    findings: string,
    priorValidationSummary: string | null,
  ): Promise<string> {
    const attempt = (this.attempts.get(itemId) ?? 0) + 1;
    this.attempts.set(itemId, attempt);
    const details: Record<string, ExperimentDetailValue> = {
      model: this.deps.reasoning.name,
      had_test_failures: priorValidationSummary !== null,
    };

    try {
      const reply = await this.deps.reasoning.complete({
        stage: 'mutate',
        itemId,
        content,
        findings,
        priorValidationSummary,
      });
      const code = extractCodeBlock(reply);
      if (code === '') {
        throw new Error('Reasoning service returned no content');
      }
      this.record(itemId, 'mutator', 'fix', 'success', { ...details, output_response: reply }, attempt);
      return code;
    } catch (error) {
      this.record(itemId, 'mutator', 'fix', 'failure', { ...details, error: errorMessage(error) }, attempt);
      throw error;
    }
  }

  async validate(itemId: string, content: string, findings: string): Promise<TestOutcome> {
    const testPath = this.deps.repository.validationPathFor(itemId);
    const attempt = this.attempts.get(itemId);

    if (!(await this.deps.store.exists(testPath))) {
      await this.generateTests(itemId, content, findings, testPath, attempt);
    }

    const outcome = await this.deps.testRunner.run(testPath);
    this.record(
      itemId,
      'validator',
      'debug',
      outcome.allPassed ? 'success' : 'failure',
      {
        test_file: testPath,
        passed: outcome.allPassed,
        total_tests: outcome.collected,
        passed_tests: outcome.passedCount,
        failed_tests: outcome.failedCount,
        execution_error: outcome.executionError ?? null,
      },
      attempt,
    );
    return outcome;
  }

  /** A generation fault is logged; validation still runs against whatever exists. */
  private async generateTests(
    itemId: string,
    content: string,
    findings: string,
    testPath: string,
    attempt: number | undefined,
  ): Promise<void> {
    const details: Record<string, ExperimentDetailValue> = {
      model: this.deps.reasoning.name,
      test_file: testPath,
    };
    try {
      const reply = await this.deps.reasoning.complete({
        stage: 'generate-tests',
        itemId,
        content,
        findings,
        testPath,
      });
      const written = await this.deps.store.write(testPath, extractCodeBlock(reply));
      if (!written.ok) {
        throw new Error(written.error);
      }
      log.info(`Validation tests generated at ${testPath}`, undefined, itemId);
      this.record(itemId, 'validator', 'generation', 'success', { ...details, output_response: reply }, attempt);
    } catch (error) {
      const message = errorMessage(error);
      log.error(`Test generation failed: ${message}`, undefined, itemId);
      this.record(itemId, 'validator', 'generation', 'failure', { ...details, error: message }, attempt);
    }
  }

  private record(
    itemId: string,
    actor: ExperimentActor,
    action: ExperimentAction,
    status: 'success' | 'failure',
    details: Record<string, ExperimentDetailValue>,
    iteration?: number,
  ): void {
    this.deps.experimentLog.record({ itemId, actor, action, status, iteration, details });
  }
}

export function createToolBackedCollaborators(deps: ToolBackedCollaboratorDeps): ToolBackedCollaborators {
  return new ToolBackedCollaborators(deps);
}
