/**
 * Entity routes - read the published entities
 */

import type { FastifyPluginAsync } from 'fastify';
import { entityParamsSchema, entityQuerySchema } from '@marquee/shared';
import type { EntityRegistry } from '../services/publisher.js';
import { NotFoundError } from '../utils/errors.js';

export interface EntityRoutesOptions {
  registry: Pick<EntityRegistry, 'get' | 'list'>;
}

export const entityRoutes: FastifyPluginAsync<EntityRoutesOptions> = async (app, opts) => {
  /**
   * GET /entities - All entities, optionally of one kind
   */
  app.get('/', async (request, reply) => {
    const query = entityQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.badRequest('Invalid entity kind');
    }
    return { data: opts.registry.list(query.data.kind) };
  });

  /**
   * GET /entities/:kind/:key - One entity
   */
  app.get('/:kind/:key', async (request, reply) => {
    const params = entityParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.badRequest('Invalid entity parameters');
    }

    const { kind, key } = params.data;
    const entity = opts.registry.get(kind, key);
    if (!entity) {
      throw new NotFoundError('Entity', `${kind}/${key}`);
    }
    return entity;
  });
};
