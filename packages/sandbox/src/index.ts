export { PathGuard } from './path-guard.js';
export { ConfinedFileStore } from './confined-file-store.js';
export { ProcessRunner } from './process-runner.js';
export { RevisionUnitRepository } from './unit-repository.js';
export type { RevisionUnitRepositoryOptions } from './unit-repository.js';
