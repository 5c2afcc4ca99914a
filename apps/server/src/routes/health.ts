/**
 * Health route - poller status for every category
 */

import type { FastifyPluginAsync } from 'fastify';
import type { PollerStatus } from '@marquee/shared';

export interface HealthRoutesOptions {
  statuses: () => PollerStatus[];
}

export const healthRoutes: FastifyPluginAsync<HealthRoutesOptions> = async (app, opts) => {
  app.get('/health', async () => {
    const pollers = opts.statuses();
    const healthy = pollers.every((p) => p.status !== 'degraded' && p.status !== 'config_error');
    return {
      status: healthy ? 'ok' : 'degraded',
      pollers,
    };
  });
};
