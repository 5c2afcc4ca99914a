/**
 * Session routes - current sessions and playback commands
 */

import type { FastifyPluginAsync } from 'fastify';
import { playbackCommandSchema, sessionKeyParamSchema } from '@marquee/shared';
import type { ClassifiedSession } from '@marquee/shared';
import type { PlaybackController } from '../services/playback.js';
import { ValidationError } from '../utils/errors.js';

export interface SessionRoutesOptions {
  sessions: () => readonly ClassifiedSession[];
  playback: Pick<PlaybackController, 'sendCommand'>;
}

export const sessionRoutes: FastifyPluginAsync<SessionRoutesOptions> = async (app, opts) => {
  /**
   * GET /sessions - Sessions from the latest poll
   */
  app.get('/', async () => {
    const data = opts.sessions();
    return { data, total: data.length };
  });

  /**
   * POST /sessions/:key/commands - play, pause, stop or seek
   */
  app.post('/:key/commands', async (request, reply) => {
    const params = sessionKeyParamSchema.safeParse(request.params);
    if (!params.success) {
      return reply.badRequest('Invalid session key');
    }

    const body = playbackCommandSchema.safeParse(request.body);
    if (!body.success) {
      throw ValidationError.fromZodError(body.error, 'Invalid playback command');
    }

    await opts.playback.sendCommand(params.data.key, body.data);
    return reply.code(202).send({ success: true });
  });
};
