import type { AnalysisOutcome, TestOutcome } from '../models/tool-result.js';

/**
 * The three stage calls the revision loop drives. Their content is opaque to
 * the loop; a thrown error is treated as a stage fault.
 */
export interface RevisionCollaborators {
  analyze(itemId: string, content: string): Promise<string>;
  mutate(
    itemId: string,
    content: string,
    findings: string,
    priorValidationSummary: string | null,
  ): Promise<string>;
  validate(itemId: string, content: string, findings: string): Promise<TestOutcome>;
}

export type ReasoningRequest =
  | { stage: 'analyze'; itemId: string; content: string; analysis: AnalysisOutcome }
  | {
      stage: 'mutate';
      itemId: string;
      content: string;
      findings: string;
      priorValidationSummary: string | null;
    }
  | { stage: 'generate-tests'; itemId: string; content: string; findings: string; testPath: string };

/** External reasoning service; prompt assembly and provider choice live behind it */
export interface IReasoningClient {
  readonly name: string;
  complete(request: ReasoningRequest): Promise<string>;
}
