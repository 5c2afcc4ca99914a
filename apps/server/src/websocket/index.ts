/**
 * Socket.io WebSocket server setup
 *
 * Clients join the `entities` room on connect and receive every registry
 * event plus poller status changes.
 */

import type { Server as HttpServer } from 'node:http';
import { Server } from 'socket.io';
import type { Socket } from 'socket.io';
import { WS_EVENTS } from '@marquee/shared';
import type { ClientToServerEvents, ServerToClientEvents } from '@marquee/shared';
import type { EntityRegistry } from '../services/publisher.js';
import type { PollerManager } from '../jobs/poller/index.js';
import type { Logger } from '../utils/logger.js';

export type TypedServer = Server<ClientToServerEvents, ServerToClientEvents>;
type TypedSocket = Socket<ClientToServerEvents, ServerToClientEvents>;

const ENTITIES_ROOM = 'entities';

export interface WebSocketOptions {
  corsOrigin?: string;
  logger: Logger;
}

export function initializeWebSocket(httpServer: HttpServer, options: WebSocketOptions): TypedServer {
  const { logger } = options;
  const io: TypedServer = new Server<ClientToServerEvents, ServerToClientEvents>(httpServer, {
    cors: {
      origin: options.corsOrigin ?? true,
      credentials: true,
    },
    pingTimeout: 60000,
    pingInterval: 25000,
  });

  io.on('connection', (socket: TypedSocket) => {
    logger.debug({ socketId: socket.id }, 'WebSocket client connected');

    // Auto-subscribe on connect
    void socket.join(ENTITIES_ROOM);

    socket.on(WS_EVENTS.SUBSCRIBE_ENTITIES, () => {
      void socket.join(ENTITIES_ROOM);
    });

    socket.on(WS_EVENTS.UNSUBSCRIBE_ENTITIES, () => {
      void socket.leave(ENTITIES_ROOM);
    });

    socket.on('disconnect', (reason) => {
      logger.debug({ socketId: socket.id, reason }, 'WebSocket client disconnected');
    });
  });

  return io;
}

/**
 * Forward registry events and poller status to subscribed clients
 *
 * @returns a function that detaches every listener
 */
export function bridgeEvents(
  io: TypedServer,
  registry: EntityRegistry,
  pollers: Pick<PollerManager, 'onStatus'>
): () => void {
  const room = () => io.to(ENTITIES_ROOM);
  const detach = [
    registry.subscribe('entity:updated', (entity) => {
      room().emit(WS_EVENTS.ENTITY_UPDATED, entity);
    }),
    registry.subscribe('entity:unavailable', (entity) => {
      room().emit(WS_EVENTS.ENTITY_UNAVAILABLE, entity);
    }),
    registry.subscribe('entity:removed', (entity) => {
      room().emit(WS_EVENTS.ENTITY_REMOVED, entity);
    }),
    pollers.onStatus((status) => {
      room().emit(WS_EVENTS.POLLER_STATUS, status);
    }),
  ];

  return () => {
    for (const off of detach) off();
  };
}
