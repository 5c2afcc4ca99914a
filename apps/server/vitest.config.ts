/**
 * Main Vitest Configuration
 *
 * Runs every test once: `npm test`, or `npm run test:coverage` for coverage.
 */

import { defineConfig, mergeConfig } from 'vitest/config';
import { sharedConfig } from './vitest.shared.js';

export default mergeConfig(
  sharedConfig,
  defineConfig({
    test: {
      include: ['src/**/*.test.ts'],
      exclude: ['**/node_modules/**', '**/dist/**'],
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json-summary', 'html'],
        reportsDirectory: './coverage',
        include: [
          'src/services/**/*.ts',
          'src/routes/**/*.ts',
          'src/jobs/**/*.ts',
          'src/utils/**/*.ts',
          'src/config/**/*.ts',
        ],
        exclude: [
          '**/*.test.ts',
          '**/test/**',
          // Type-only files with no executable code
          '**/types.ts',
        ],
        thresholds: {
          statements: 70,
          branches: 60,
          functions: 70,
          lines: 70,
        },
      },
    },
  })
);
