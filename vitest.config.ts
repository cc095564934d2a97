/**
 * FILE PURPOSE: Root Vitest config for the monorepo
 *
 * WHY: `npm test` at the root must cover every workspace in one run.
 * HOW: Discovers tests in packages/ and apps/. Workspaces keep their own
 *      config for running `vitest run` from inside the workspace.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    passWithNoTests: false,
  },
});
