export { RevisionMachine, createRevisionState, decideStatus, retryOrStop, summarizeValidation } from './revision-machine.js';
export type { RevisionMachineOptions, RevisionRunOptions } from './revision-machine.js';
export { BatchRunner, summarizeBatch } from './batch-runner.js';
export type { BatchRunOptions } from './batch-runner.js';
export { ToolBackedCollaborators, createToolBackedCollaborators } from './collaborators.js';
export type { ToolBackedCollaboratorDeps } from './collaborators.js';
export { extractCodeBlock } from './code-block.js';
export { FileExperimentLog, EXPERIMENT_LOG_FILE } from './stores/file-experiment-log.js';
export { loadConfig, defaultConfig, CONFIG_FILE_NAME } from './config.js';
export type { RevloopConfig, LoadConfigOptions } from './config.js';
export { createPipeline } from './pipeline.js';
export type { Pipeline, PipelineOverrides, PipelineRunOptions } from './pipeline.js';
