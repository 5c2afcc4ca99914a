/**
 * Shared Vitest configuration
 *
 * Base settings used by every test config.
 */

import { fileURLToPath } from 'node:url';
import type { UserConfig } from 'vitest/config';

const isCI = process.env.CI === 'true' || process.env.GITHUB_ACTIONS === 'true';

export const sharedConfig: UserConfig = {
  test: {
    environment: 'node',
    testTimeout: 10000,
    hookTimeout: 10000,
    clearMocks: true,
    restoreMocks: true,
    reporters: isCI ? ['default', 'github-actions'] : ['default'],
  },
  resolve: {
    alias: {
      '@marquee/shared': fileURLToPath(
        new URL('../../packages/shared/src/index.ts', import.meta.url)
      ),
    },
  },
};
