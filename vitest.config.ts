import { defineConfig } from 'vitest/config';

/**
 * Workspace-level Vitest configuration.
 *
 * Each package under packages/ is a Vitest project with its own config;
 * this file only carries the settings that apply to the whole run.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // Each package is a project
    projects: ['packages/*'],

    // No retries - surface issues immediately
    retry: 0,

    // Disable file parallelization in CI for deterministic results
    fileParallelism: !isCI,

    reporters: ['default'],
  },
});
