import type {
  BatchReport,
  IConfinedFileStore,
  IEventBus,
  IExperimentLog,
  IProcessRunner,
  IReasoningClient,
  IRevisionUnitRepository,
  IStaticAnalyzer,
  ITestSuiteRunner,
  RevisionCollaborators,
} from '@revloop/core';
import { createLogger, setLogLevel } from '@revloop/core';
import { EventBus } from '@revloop/eventbus';
import { ConfinedFileStore, PathGuard, ProcessRunner, RevisionUnitRepository } from '@revloop/sandbox';
import { StaticAnalyzer, TestSuiteRunner } from '@revloop/checkers';
import { BatchRunner } from './batch-runner.js';
import { createToolBackedCollaborators } from './collaborators.js';
import type { RevloopConfig } from './config.js';
import { RevisionMachine } from './revision-machine.js';
import { FileExperimentLog } from './stores/file-experiment-log.js';

const log = createLogger('Pipeline');

/** Replaces individual parts of the default wiring, mostly for tests */
export interface PipelineOverrides {
  runner?: IProcessRunner;
  analyzer?: IStaticAnalyzer;
  testRunner?: ITestSuiteRunner;
  experimentLog?: IExperimentLog;
  eventBus?: IEventBus;
  collaborators?: RevisionCollaborators;
}

export interface PipelineRunOptions {
  /** Directory to scan; defaults to the sandbox root */
  root?: string;
  signal?: AbortSignal;
}

export interface Pipeline {
  readonly config: RevloopConfig;
  readonly eventBus: IEventBus;
  readonly store: IConfinedFileStore;
  readonly repository: IRevisionUnitRepository;
  readonly experimentLog: IExperimentLog;
  readonly machine: RevisionMachine;
  /** Source files under `root` (validation artifacts excluded) */
  discover(root?: string): Promise<string[]>;
  runBatch(itemIds: readonly string[], options?: { signal?: AbortSignal }): Promise<BatchReport>;
  /** Discover, revise every item, then flush the experiment log */
  run(options?: PipelineRunOptions): Promise<BatchReport>;
}

/**
 * Composition root. Every component is constructed here from explicit
 * configuration; nothing below reads the environment.
 */
export async function createPipeline(
  config: RevloopConfig,
  reasoning: IReasoningClient,
  overrides: PipelineOverrides = {},
): Promise<Pipeline> {
  setLogLevel(config.logLevel);

  const guard = new PathGuard(config.sandboxRoot);
  const store = new ConfinedFileStore(guard);
  const runner = overrides.runner ?? new ProcessRunner(guard);
  const repository = new RevisionUnitRepository(guard, {
    extension: config.extension,
    excludedDirs: config.excludedDirs,
  });
  const analyzer = overrides.analyzer ?? new StaticAnalyzer(runner, config.analysisCommand);
  const testRunner = overrides.testRunner ?? new TestSuiteRunner(runner, config.testCommand);
  const eventBus = overrides.eventBus ?? new EventBus();

  let experimentLog: IExperimentLog;
  if (overrides.experimentLog) {
    experimentLog = overrides.experimentLog;
  } else {
    const fileLog = new FileExperimentLog(config.logDir);
    const previous = await fileLog.load();
    if (previous > 0) log.info(`Appending to ${previous} existing experiment entries`);
    experimentLog = fileLog;
  }

  const collaborators = overrides.collaborators ?? createToolBackedCollaborators({
    reasoning,
    analyzer,
    testRunner,
    store,
    repository,
    experimentLog,
  });
  const machine = new RevisionMachine(collaborators, store, eventBus, {
    maxIterations: config.maxIterations,
    stageDelayMs: config.stageDelayMs,
  });
  const batch = new BatchRunner(machine, store, eventBus, config.concurrency);

  log.info(`Pipeline ready (sandbox: ${guard.root}, reasoning: ${reasoning.name})`);

  const discover = (root?: string) => repository.listSources(root ?? guard.root);
  const runBatch = (itemIds: readonly string[], options: { signal?: AbortSignal } = {}) =>
    batch.run(itemIds, options);

  return {
    config,
    eventBus,
    store,
    repository,
    experimentLog,
    machine,
    discover,
    runBatch,
    async run(options: PipelineRunOptions = {}): Promise<BatchReport> {
      const items = await discover(options.root);
      log.info(`Found ${items.length} item(s) to revise`);
      try {
        return await runBatch(items, { signal: options.signal });
      } finally {
        await experimentLog.flush();
      }
    },
  };
}
