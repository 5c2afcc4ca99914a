/**
 * WebSocket event bridge tests
 *
 * Uses a Socket.io server with no HTTP server attached and watches the
 * namespace adapter, which every room broadcast passes through.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Server } from 'socket.io';
import type { ClientToServerEvents, PollerStatus, ServerToClientEvents } from '@marquee/shared';
import { EntityRegistry } from '../../services/publisher.js';
import { bridgeEvents, type TypedServer } from '../index.js';

const T0 = new Date('2026-01-01T00:00:00Z');

describe('bridgeEvents', () => {
  let io: TypedServer;
  let registry: EntityRegistry;
  let statusListeners: Array<(status: PollerStatus) => void>;
  const pollers = {
    onStatus: (listener: (status: PollerStatus) => void) => {
      statusListeners.push(listener);
      return () => {
        statusListeners = statusListeners.filter((l) => l !== listener);
      };
    },
  };

  beforeEach(() => {
    io = new Server<ClientToServerEvents, ServerToClientEvents>();
    registry = new EntityRegistry(() => T0);
    statusListeners = [];
  });

  function watchBroadcasts() {
    return vi.spyOn(io.of('/').adapter, 'broadcast');
  }

  it('should forward registry events to the entities room', () => {
    const broadcast = watchBroadcasts();
    bridgeEvents(io, registry, pollers);

    registry.publish('bandwidth', 'emby_bandwidth', 0.95, {});
    registry.markUnavailable('bandwidth', 'emby_bandwidth');
    registry.remove('bandwidth', 'emby_bandwidth');

    const events = broadcast.mock.calls.map(([packet]) => packet.data[0]);
    expect(events).toEqual(['entity:updated', 'entity:unavailable', 'entity:removed']);
    expect(broadcast.mock.calls[0]?.[1].rooms).toEqual(new Set(['entities']));
    expect(broadcast.mock.calls[2]?.[0].data[1]).toEqual({
      kind: 'bandwidth',
      key: 'emby_bandwidth',
    });
  });

  it('should forward poller status', () => {
    const broadcast = watchBroadcasts();
    bridgeEvents(io, registry, pollers);
    const status: PollerStatus = {
      category: 'recordings',
      status: 'degraded',
      lastSuccessAt: null,
      lastErrorAt: '2026-01-01T00:00:00.000Z',
      lastError: 'Emby error: connection refused',
      consecutiveFailures: 1,
    };

    for (const listener of statusListeners) listener(status);

    expect(broadcast.mock.calls[0]?.[0].data).toEqual(['poller:status', status]);
  });

  it('should stop forwarding once detached', () => {
    const broadcast = watchBroadcasts();
    const detach = bridgeEvents(io, registry, pollers);

    detach();
    registry.publish('bandwidth', 'emby_bandwidth', 1, {});

    expect(broadcast).not.toHaveBeenCalled();
    expect(statusListeners).toHaveLength(0);
  });
});
