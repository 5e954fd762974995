import type {
  BatchItemResult,
  BatchReport,
  RevisionStage,
  RevisionState,
  RevisionStatus,
} from '../models/revision.js';

export interface StageStartedEvent {
  itemId: string;
  stage: RevisionStage;
  iteration: number;
}

export interface StageCompletedEvent {
  itemId: string;
  stage: RevisionStage;
  iteration: number;
  ok: boolean;
  error?: string;
}

export interface StatusChangedEvent {
  itemId: string;
  status: RevisionStatus;
  previousStatus: RevisionStatus;
  iteration: number;
}

export interface RevisionFinishedEvent {
  state: Readonly<RevisionState>;
}

export interface BatchItemFinishedEvent {
  result: BatchItemResult;
}

export interface BatchCompletedEvent {
  report: BatchReport;
}

export const Events = {
  STAGE_STARTED: 'revision:stageStarted',
  STAGE_COMPLETED: 'revision:stageCompleted',
  STATUS_CHANGED: 'revision:statusChanged',
  REVISION_FINISHED: 'revision:finished',
  BATCH_ITEM_FINISHED: 'batch:itemFinished',
  BATCH_COMPLETED: 'batch:completed',
} as const;

export type EventName = (typeof Events)[keyof typeof Events];
