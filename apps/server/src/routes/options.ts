/**
 * Option routes - aggregate toggles
 */

import type { FastifyPluginAsync } from 'fastify';
import type { OptionsStore } from '../services/options.js';

export interface OptionRoutesOptions {
  options: Pick<OptionsStore, 'get' | 'update'>;
}

export const optionRoutes: FastifyPluginAsync<OptionRoutesOptions> = async (app, opts) => {
  app.get('/', async () => opts.options.get());

  /**
   * PATCH /options - Flip one or more toggles; unknown keys are rejected
   */
  app.patch('/', async (request) => opts.options.update(request.body));
};
