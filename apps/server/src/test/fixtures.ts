/**
 * Test fixtures and factory functions for creating test data
 */

import { vi } from 'vitest';
import { optionsSchema } from '@marquee/shared';
import type { ClassifiedSession, Options } from '@marquee/shared';
import type {
  EmbyFetcher,
  EmbyItemCounts,
  EmbyNowPlayingItem,
  EmbyPlayState,
  EmbySession,
} from '../services/mediaServer/types.js';
import type { ParentLogger } from '../utils/logger.js';

export const TEST_BASE_URL = 'http://emby.test:8096';
export const TEST_API_KEY = 'test-api-key';

export function createPlayState(overrides: Partial<EmbyPlayState> = {}): EmbyPlayState {
  return {
    isPaused: false,
    isPlaying: true,
    ...overrides,
  };
}

export function createNowPlayingItem(
  overrides: Partial<EmbyNowPlayingItem> = {}
): EmbyNowPlayingItem {
  return {
    id: 'item-1',
    name: 'Test Movie',
    type: 'Movie',
    runTimeTicks: 7200 * 10_000_000,
    isInfiniteStream: false,
    mediaStreams: [],
    ...overrides,
  };
}

/**
 * Create a parsed Emby session with sensible defaults
 */
export function createEmbySession(overrides: Partial<EmbySession> = {}): EmbySession {
  return {
    id: 'session-1',
    deviceId: 'device-1',
    deviceName: 'Living Room TV',
    client: 'Emby Theater',
    userId: 'user-1',
    userName: 'alice',
    playState: createPlayState(),
    ...overrides,
  };
}

/**
 * Create a classified session as the engine would produce it
 */
export function createClassifiedSession(
  overrides: Partial<ClassifiedSession> = {}
): ClassifiedSession {
  return {
    key: 'emby_living_room_tv_alice',
    sessionId: 'session-1',
    deviceId: 'device-1',
    deviceName: 'Living Room TV',
    appName: 'Emby Theater',
    userName: 'alice',
    state: 'playing',
    variant: { kind: 'movie', title: 'Test Movie', contentType: 'Movie' },
    transcode: { playbackMethod: 'direct' },
    stream: {},
    videoBitrateBps: 0,
    audioBitrateBps: 0,
    ...overrides,
  };
}

/**
 * Every toggle on unless overridden
 */
export function createOptions(overrides: Partial<Options> = {}): Options {
  return optionsSchema.parse(overrides);
}

export function itemImageUrl(id: string): string {
  return `${TEST_BASE_URL}/Items/${id}/Images/Primary?api_key=${TEST_API_KEY}`;
}

export function userImageUrl(id: string): string {
  return `${TEST_BASE_URL}/Users/${id}/Images/Primary?api_key=${TEST_API_KEY}`;
}

export const ZERO_COUNTS: EmbyItemCounts = {
  movieCount: 0,
  seriesCount: 0,
  episodeCount: 0,
  songCount: 0,
  bookCount: 0,
  audioBookCount: 0,
  trailerCount: 0,
  boxSetCount: 0,
  playlistCount: 0,
};

/**
 * Fetcher whose calls all succeed with empty payloads unless overridden
 */
export function createMockFetcher(overrides: Partial<EmbyFetcher> = {}): EmbyFetcher {
  return {
    getSessions: vi.fn(async () => []),
    getProgram: vi.fn(async () => null),
    getAiringPrograms: vi.fn(async () => []),
    getChannel: vi.fn(async () => null),
    getSystemInfo: vi.fn(async () => ({})),
    getActivityLog: vi.fn(async () => []),
    getTimers: vi.fn(async () => []),
    getActiveRecordings: vi.fn(async () => []),
    getSeriesTimers: vi.fn(async () => []),
    getItemCounts: vi.fn(async () => ZERO_COUNTS),
    getLibraryViews: vi.fn(async () => []),
    getLibraryItems: vi.fn(async () => []),
    getUpcomingEpisodes: vi.fn(async () => []),
    sendPlaystate: vi.fn(async () => undefined),
    itemImageUrl,
    userImageUrl,
    ...overrides,
  };
}

/**
 * Logger whose methods are spies; children share the parent's spies
 */
export function createTestLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn((): ParentLogger => logger),
  };
  return logger;
}
