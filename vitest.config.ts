import { defineConfig } from 'vitest/config'
import { unitTestMinimalProject } from './configs/vitest.config.unit-minimal'

export default defineConfig({
  test: {
    projects: [
      {
        extends: true,
        ...unitTestMinimalProject,
      },
    ],
    exclude: ['**/node_modules/**', '**/dist/**', '**/.{idea,git,cache}/**'],
    env: {
      NODE_ENV: 'test',
    },
    clearMocks: true,
    // The bias check draws a few thousand addresses
    testTimeout: 20_000,
    onConsoleLog: () => !process.env.TEST_QUIET_CONSOLE,
  },
})
