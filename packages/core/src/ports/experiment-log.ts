import type { ExperimentEntry, NewExperimentEntry } from '../models/experiment.js';

export interface IExperimentLog {
  record(entry: NewExperimentEntry): ExperimentEntry;
  entries(): ExperimentEntry[];
  /** Write pending entries now */
  flush(): Promise<void>;
}
