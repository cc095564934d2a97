/**
 * Workspace-level Vitest config for @kbchat/retrieval-core
 *
 * WHY: `vitest run` from inside this directory can't see the root include
 *      patterns, which are relative to the repo root.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    passWithNoTests: false,
  },
});
