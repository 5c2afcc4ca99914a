/**
 * Session Engine Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { SessionEngine, classifySession } from '../sessionEngine.js';
import {
  createEmbySession,
  createMockFetcher,
  createNowPlayingItem,
  createPlayState,
  itemImageUrl,
  userImageUrl,
} from '../../../test/fixtures.js';

const NOW = new Date('2026-01-01T22:10:00Z');

describe('classifySession', () => {
  it('builds a classified session from a movie', () => {
    const session = createEmbySession({
      nowPlayingItem: createNowPlayingItem(),
      playState: createPlayState({ positionTicks: 36_000_000_000 }),
    });

    expect(classifySession(session, createMockFetcher(), NOW)).toEqual({
      sessionId: 'session-1',
      deviceId: 'device-1',
      deviceName: 'Living Room TV',
      appName: 'Emby Theater',
      userId: 'user-1',
      userName: 'alice',
      userImageUrl: userImageUrl('user-1'),
      state: 'playing',
      variant: {
        kind: 'movie',
        title: 'Test Movie',
        contentId: 'item-1',
        contentType: 'Movie',
        posterUrl: itemImageUrl('item-1'),
        durationSeconds: 7200,
        positionSeconds: 3600,
      },
      nowPlayingType: 'Movie',
      transcode: { playbackMethod: 'direct' },
      stream: {},
      videoBitrateBps: 0,
      audioBitrateBps: 0,
      playbackPercent: 50,
      positionUpdatedAt: '2026-01-01T22:10:00.000Z',
    });
  });

  it('fills defaults for a bare session', () => {
    const session = createEmbySession({
      deviceId: undefined,
      deviceName: undefined,
      client: undefined,
      userId: undefined,
      userName: undefined,
      playState: createPlayState({ isPlaying: false }),
    });

    expect(classifySession(session, createMockFetcher(), NOW)).toEqual({
      sessionId: 'session-1',
      deviceId: '',
      deviceName: 'Emby Client',
      appName: 'Emby',
      state: 'idle',
      variant: { kind: 'none' },
      transcode: { playbackMethod: 'direct' },
      stream: {},
      videoBitrateBps: 0,
      audioBitrateBps: 0,
    });
  });

  it('names the device after the client when the device name is missing', () => {
    const session = createEmbySession({ deviceName: undefined, client: 'Emby Web' });
    expect(classifySession(session, createMockFetcher(), NOW).deviceName).toBe('Emby Web');
  });
});

describe('SessionEngine', () => {
  it('classifies, keys and aggregates one poll', async () => {
    const engine = new SessionEngine(createMockFetcher());

    const snapshot = await engine.process(
      [
        createEmbySession({
          id: 's1',
          deviceName: 'Roku',
          userName: 'john',
          nowPlayingItem: createNowPlayingItem(),
          transcodingInfo: { videoCodec: 'h264', bitrate: '4000kbps' },
        }),
        createEmbySession({
          id: 's2',
          deviceName: 'Shield',
          userName: 'john',
          nowPlayingItem: createNowPlayingItem({ type: 'Episode', name: 'Pilot' }),
          playState: createPlayState({ videoBitrate: 4_000_000 }),
        }),
        createEmbySession({ id: 's3', deviceName: 'Web', userName: 'jane' }),
      ],
      NOW
    );

    expect(snapshot.sessions.map((s) => s.key)).toEqual([
      'emby_roku_john',
      'emby_shield_john',
      'emby_web_jane',
    ]);
    expect(snapshot.created).toEqual(['emby_roku_john', 'emby_shield_john', 'emby_web_jane']);
    expect(snapshot.observedAt).toBe('2026-01-01T22:10:00.000Z');

    expect(snapshot.sessions[0]?.transcode).toEqual({
      playbackMethod: 'transcoding',
      videoCodec: 'h264',
      bitrate: '4000kbps',
    });

    const { activeStreams, bandwidth, transcoding, multisessionUsers } = snapshot.aggregates;
    expect(activeStreams).toEqual({ count: 2, users: 'john', totalSessions: 3 });
    expect(bandwidth.totalBitrateBps).toBe(8_000_000);
    expect(bandwidth.megabytesPerSecond).toBe(0.95);
    expect(transcoding.load).toBe(50);
    expect(multisessionUsers.map((u) => [u.user, u.count])).toEqual([['john', 2]]);

    expect(engine.sessions).toBe(snapshot.sessions);
  });

  it('tracks created, retained and removed keys between polls', async () => {
    const engine = new SessionEngine(createMockFetcher());
    await engine.process(
      [
        createEmbySession({ id: 's1', deviceName: 'Roku', userName: 'john' }),
        createEmbySession({ id: 's2', deviceName: 'Web', userName: 'jane' }),
      ],
      NOW
    );

    const snapshot = await engine.process(
      [
        createEmbySession({ id: 's7', deviceName: 'Roku', userName: 'john' }),
        createEmbySession({ id: 's8', deviceName: 'Phone', userName: 'bob' }),
      ],
      NOW
    );

    expect(snapshot.created).toEqual(['emby_phone_bob']);
    expect(snapshot.retained).toEqual(['emby_roku_john']);
    expect(snapshot.removed).toEqual(['emby_web_jane']);
    expect(engine.identity.sessionIdFor('emby_roku_john')).toBe('s7');
  });

  it('leaves the current state alone until a prepared poll is committed', async () => {
    const engine = new SessionEngine(createMockFetcher());
    const first = await engine.process(
      [createEmbySession({ id: 's1', deviceName: 'Roku', userName: 'john' })],
      NOW
    );

    const prepared = await engine.prepare(
      [createEmbySession({ id: 's2', deviceName: 'Shield', userName: 'john' })],
      NOW
    );

    expect(prepared.created).toEqual(['emby_shield_john']);
    expect(prepared.removed).toEqual(['emby_roku_john']);
    expect(engine.sessions).toBe(first.sessions);
    expect(engine.identity.has('emby_roku_john')).toBe(true);
    expect(engine.identity.has('emby_shield_john')).toBe(false);

    engine.commit(prepared);

    expect(engine.sessions.map((s) => s.key)).toEqual(['emby_shield_john']);
    expect(engine.identity.sessionIdFor('emby_shield_john')).toBe('s2');
  });

  it('resolves the airing program for live TV', async () => {
    const fetcher = createMockFetcher({
      getAiringPrograms: vi.fn(async () => [
        {
          id: 'p1',
          name: 'News at Ten',
          startDate: '2026-01-01T22:00:00Z',
          endDate: '2026-01-01T22:30:00Z',
        },
      ]),
      getChannel: vi.fn(async () => ({ id: 'ch-5', name: 'BBC One', number: '101' })),
    });
    const engine = new SessionEngine(fetcher);

    const snapshot = await engine.process(
      [
        createEmbySession({
          nowPlayingItem: createNowPlayingItem({
            id: 'ch-5',
            name: 'BBC One',
            type: 'TvChannel',
            runTimeTicks: undefined,
          }),
        }),
      ],
      NOW
    );

    const [session] = snapshot.sessions;
    expect(fetcher.getAiringPrograms).toHaveBeenCalledWith('ch-5');
    expect(session?.variant).toEqual({
      kind: 'live_tv',
      contentId: 'ch-5',
      channelId: 'ch-5',
      channelName: 'BBC One',
      channelNumber: '101',
      program: {
        id: 'p1',
        seriesName: 'News at Ten',
        startDate: '2026-01-01T22:00:00Z',
        endDate: '2026-01-01T22:30:00Z',
        imageUrl: itemImageUrl('p1'),
        channelName: 'BBC One',
        channelNumber: '101',
        source: 'channel_search',
      },
      durationSeconds: 1800,
      positionSeconds: 600,
    });
    expect(session?.playbackPercent).toBe(33.3);
    expect(session?.positionUpdatedAt).toBe('2026-01-01T22:10:00.000Z');
  });

  it('keeps a live session when every program lookup fails', async () => {
    const fetcher = createMockFetcher({
      getAiringPrograms: vi.fn(async () => {
        throw new Error('guide unavailable');
      }),
    });
    const engine = new SessionEngine(fetcher);

    const snapshot = await engine.process(
      [
        createEmbySession({
          nowPlayingItem: createNowPlayingItem({ id: 'ch-5', name: 'BBC One', type: 'TvChannel' }),
        }),
      ],
      NOW
    );

    const [session] = snapshot.sessions;
    expect(session?.variant.kind === 'live_tv' && session.variant.program).toEqual({
      channelName: 'BBC One',
      source: 'none',
    });
    expect(session?.playbackPercent).toBeUndefined();
    expect(snapshot.aggregates.activeStreams.count).toBe(1);
  });

  it('produces empty aggregates for an empty poll', async () => {
    const engine = new SessionEngine(createMockFetcher());

    const snapshot = await engine.process([], NOW);

    expect(snapshot.sessions).toEqual([]);
    expect(snapshot.aggregates).toEqual({
      activeStreams: { count: 0, users: '', totalSessions: 0 },
      bandwidth: { megabytesPerSecond: 0, totalBitrateBps: 0, streams: [] },
      transcoding: { load: 0, transcodingCount: 0, sessions: [] },
      multisessionUsers: [],
    });
  });
});
