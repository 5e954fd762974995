export type ExperimentActor = 'analyzer' | 'mutator' | 'validator';

export type ExperimentAction = 'analysis' | 'fix' | 'generation' | 'debug';

export type ExperimentDetailValue = string | number | boolean | null;

/** One recorded collaborator interaction. */
export interface ExperimentEntry {
  id: string;
  timestamp: string;
  itemId: string;
  actor: ExperimentActor;
  action: ExperimentAction;
  status: 'success' | 'failure';
  iteration?: number;
  details: Record<string, ExperimentDetailValue>;
}

export type NewExperimentEntry = Omit<ExperimentEntry, 'id' | 'timestamp'>;
