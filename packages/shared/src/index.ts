/**
 * @marquee/shared - Shared types, schemas, and constants
 */

// Type exports
export type {
  // Media
  MediaKind,
  ProgramSource,
  Program,
  NoMedia,
  MovieMedia,
  EpisodeMedia,
  LiveTvMedia,
  MediaVariant,
  // Session
  PlaybackState,
  PlaybackMethod,
  TranscodeInfo,
  VideoStreamInfo,
  AudioStreamInfo,
  StreamInfo,
  ClassifiedSession,
  // Aggregates
  ActiveStreamsSummary,
  BandwidthSample,
  BandwidthSummary,
  TranscodingSessionDetail,
  TranscodingSummary,
  MultisessionUser,
  ActivityEntry,
  SystemInfo,
  ServerStats,
  SessionAggregates,
  // Recordings & library
  RecordingKind,
  Recording,
  SeriesRecording,
  RecordingsSnapshot,
  LibraryCounts,
  LibraryStats,
  LibraryItem,
  LibraryListKey,
  // Entities
  EntityKind,
  EntityValue,
  EntityState,
  // Polling
  PollCategory,
  PollStatus,
  PollerStatus,
  // Commands
  PlaybackCommand,
  // WebSocket
  ServerToClientEvents,
  ClientToServerEvents,
  // API
  ApiError,
} from './types.js';

// Schema exports
export {
  optionsSchema,
  updateOptionsSchema,
  pollIntervalsSchema,
  entityKindSchema,
  entityParamsSchema,
  entityQuerySchema,
  sessionKeyParamSchema,
  playbackCommandSchema,
} from './schemas.js';

// Schema input type exports
export type {
  Options,
  UpdateOptionsInput,
  PollIntervals,
  EntityParams,
  PlaybackCommandInput,
} from './schemas.js';

// Constant exports
export {
  TICKS_PER_SECOND,
  POLLING_INTERVALS,
  POLL_LIMITS,
  LIVE_TV,
  SESSION_LIMITS,
  SERVER_STATS,
  LIBRARY_LISTS,
  ENTITY_KEY_PREFIX,
  LIVE_TV_ITEM_TYPES,
  WS_EVENTS,
  OPTION_KEYS,
  API_VERSION,
  API_BASE_PATH,
} from './constants.js';
