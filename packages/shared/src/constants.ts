/**
 * Shared constants for Marquee
 */

// Emby reports positions and runtimes in 100ns ticks
export const TICKS_PER_SECOND = 10_000_000;

// Default poll intervals per category (ms)
export const POLLING_INTERVALS = {
  SESSIONS: 10_000,
  SERVER_STATS: 30_000,
  RECORDINGS: 60_000,
  LIBRARY: 15 * 60 * 1000,
} as const;

export const POLL_LIMITS = {
  // A poll running longer than this is abandoned; the previous state stays
  TIMEOUT_MS: 15_000,
  // Consecutive failures before a category's entities go unavailable
  FAILURES_BEFORE_UNAVAILABLE: 3,
} as const;

export const LIVE_TV = {
  // Minimum time between guide lookups for one channel
  GUIDE_THROTTLE_MS: 20_000,
} as const;

export const SESSION_LIMITS = {
  // Sessions idle for longer than this are not returned by the server query
  ACTIVE_WITHIN_SECONDS: 86_400,
} as const;

export const SERVER_STATS = {
  // Entries requested from the activity log per poll
  ACTIVITY_FETCH_LIMIT: 20,
  RECENT_ACTIVITY_LIMIT: 5,
} as const;

export const LIBRARY_LISTS = {
  LIMIT: 5,
  UPCOMING_HORIZON_DAYS: 365,
} as const;

// Key prefix for every published session entity
export const ENTITY_KEY_PREFIX = 'emby';

// Item types the classifier treats as live TV
export const LIVE_TV_ITEM_TYPES = ['tvchannel', 'livetvchannel', 'program', 'livetvprogram'] as const;

// WebSocket event names
export const WS_EVENTS = {
  ENTITY_UPDATED: 'entity:updated',
  ENTITY_UNAVAILABLE: 'entity:unavailable',
  ENTITY_REMOVED: 'entity:removed',
  POLLER_STATUS: 'poller:status',
  SUBSCRIBE_ENTITIES: 'subscribe:entities',
  UNSUBSCRIBE_ENTITIES: 'unsubscribe:entities',
} as const;

// Option keys (one toggle per published aggregate)
export const OPTION_KEYS = [
  'enableRecordings',
  'enableActiveStreams',
  'enableMultisessionUsers',
  'enableBandwidth',
  'enableTranscoding',
  'enableServerStats',
  'enableLibraryStats',
  'enableLatestMovies',
  'enableLatestEpisodes',
  'enableUpcomingEpisodes',
] as const;

// API version
export const API_VERSION = 'v1';
export const API_BASE_PATH = `/api/${API_VERSION}`;
