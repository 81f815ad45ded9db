import { mkdirSync } from 'node:fs';
import { defineConfig } from 'vitest/config';

// Stage tests create scratch trees under TMPDIR; make sure it exists and is writable.
const fallbackTmpDir = '/tmp';
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : fallbackTmpDir;
process.env.TMPDIR = resolvedTmpDir;
process.env.TMP = resolvedTmpDir;
process.env.TEMP = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

/**
 * Vitest Configuration for pkgstage
 *
 * Every external tool (git, patch, meson, ssh-agent) is replaced in tests by the
 * scripted runner in src/test/fake_runner.ts, so the suite never needs the real
 * toolchain or the network.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'src/test/**',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
