import type { ToolInvocationResult } from '../models/tool-result.js';

/** Confines every path the pipeline touches to a single root directory */
export interface IPathGuard {
  readonly root: string;
  /** Resolve `path` to an absolute path inside the root, or throw SandboxViolation */
  validate(path: string): string;
  contains(path: string): boolean;
}

export type WriteOutcome =
  | { ok: true; path: string }
  | { ok: false; kind: 'sandbox' | 'io'; error: string };

/** Text file access through the path guard */
export interface IConfinedFileStore {
  /** Empty string on any failure; the cause goes to the log */
  read(path: string): Promise<string>;
  write(path: string, content: string): Promise<WriteOutcome>;
  exists(path: string): Promise<boolean>;
}

export interface ToolCommand {
  executable: string;
  args: string[];
  timeoutSeconds: number;
}

export interface RunRequest extends ToolCommand {
  /** File the tool operates on; appended as the last argument */
  target: string;
  signal?: AbortSignal;
}

/** Runs an external checker tool against a confined file */
export interface IProcessRunner {
  run(request: RunRequest): Promise<ToolInvocationResult>;
}

/** Discovers work items under a root */
export interface IRevisionUnitRepository {
  list(root: string): Promise<string[]>;
  listSources(root: string): Promise<string[]>;
  isValidationItem(path: string): boolean;
  validationPathFor(sourcePath: string): string;
}
