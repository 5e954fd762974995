import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core',
  'packages/eventbus',
  'packages/sandbox',
  'packages/checkers',
  'packages/pipeline',
]);
