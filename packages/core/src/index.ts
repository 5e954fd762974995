// Models
export type {
  RevisionStatus,
  TerminalRevisionStatus,
  RevisionStage,
  RevisionState,
  BatchItemStatus,
  BatchItemResult,
  BatchReport,
} from './models/revision.js';
export { isTerminalStatus } from './models/revision.js';
export type {
  ToolInvocationResult,
  Violation,
  AnalysisOutcome,
  TestOutcome,
} from './models/tool-result.js';
export { MAX_FAILURE_EXCERPTS } from './models/tool-result.js';
export type {
  ExperimentActor,
  ExperimentAction,
  ExperimentDetailValue,
  ExperimentEntry,
  NewExperimentEntry,
} from './models/experiment.js';

// Ports
export type {
  IPathGuard,
  IConfinedFileStore,
  IProcessRunner,
  IRevisionUnitRepository,
  RunRequest,
  ToolCommand,
  WriteOutcome,
} from './ports/sandbox.js';
export type { IStaticAnalyzer, ITestSuiteRunner } from './ports/checkers.js';
export type {
  RevisionCollaborators,
  IReasoningClient,
  ReasoningRequest,
} from './ports/collaborators.js';
export type { IExperimentLog } from './ports/experiment-log.js';
export type { IEventBus, EventHandler } from './ports/event-bus.js';

// Events
export { Events } from './events/index.js';
export type {
  EventName,
  StageStartedEvent,
  StageCompletedEvent,
  StatusChangedEvent,
  RevisionFinishedEvent,
  BatchItemFinishedEvent,
  BatchCompletedEvent,
} from './events/index.js';

// Errors
export { RevloopError, SandboxViolation, ConfigError, errorMessage } from './errors.js';

// Logger
export type { LogLevel, LogEntry, LogTransport, Logger } from './logger.js';
export {
  createLogger,
  addLogTransport,
  setLogLevel,
  isLogLevel,
  consoleTransport,
  redactSecrets,
} from './logger.js';

// Constants
export {
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_EXTENSION,
  DEFAULT_EXCLUDED_DIRS,
  VALIDATION_PREFIX,
  TIMEOUT_MARKER,
  ANALYSIS_ERROR_PREFIX,
} from './constants.js';
