import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core',
  'packages/search',
  'packages/analysis',
  'packages/cli',
]);
