import { defineConfig } from 'vitest/config'

// Filesystem-heavy tests on Windows runners can be slow; keep timeouts forgiving.
export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    hookTimeout: 20_000,
    setupFiles: ['./tests/test-setup.ts'],
    disableConsoleIntercept: true,
  },
})
