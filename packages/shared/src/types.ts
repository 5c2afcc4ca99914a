/**
 * Core type definitions for Marquee
 */

// ============================================================================
// Media Variants
// ============================================================================

export type MediaKind = 'none' | 'movie' | 'episode' | 'live_tv';

// How the current live program was resolved
export type ProgramSource = 'program_id' | 'channel_search' | 'none';

export interface Program {
  id?: string;
  seriesName?: string;
  overview?: string;
  startDate?: string;
  endDate?: string;
  imageUrl?: string;
  channelName?: string;
  channelNumber?: string;
  source: ProgramSource;
}

export interface NoMedia {
  kind: 'none';
}

export interface MovieMedia {
  kind: 'movie';
  title?: string;
  contentId?: string;
  /** Raw item type from the server (Movie, Video, MusicVideo, Audio, ...) */
  contentType: string;
  artist?: string;
  durationSeconds?: number;
  positionSeconds?: number;
  posterUrl?: string;
}

export interface EpisodeMedia extends Omit<MovieMedia, 'kind'> {
  kind: 'episode';
  seriesTitle?: string;
  seasonNumber?: number;
  episodeNumber?: number;
}

// Live TV has no title: the channel name stands in for it
export interface LiveTvMedia {
  kind: 'live_tv';
  contentId?: string;
  channelId?: string;
  channelName?: string;
  channelNumber?: string;
  /** Program id candidate taken from the session payload */
  programId?: string;
  program: Program | null;
  durationSeconds?: number;
  positionSeconds?: number;
}

export type MediaVariant = NoMedia | MovieMedia | EpisodeMedia | LiveTvMedia;

// ============================================================================
// Sessions
// ============================================================================

export type PlaybackState = 'playing' | 'paused' | 'idle';

export type PlaybackMethod = 'direct' | 'transcoding';

export interface TranscodeInfo {
  playbackMethod: PlaybackMethod;
  videoCodec?: string;
  audioCodec?: string;
  /** Target bitrate display string, e.g. "4000kbps" */
  bitrate?: string;
  reasons?: string[];
  container?: string;
  isHls?: boolean;
  height?: number;
}

export interface VideoStreamInfo {
  codec?: string;
  width?: number;
  height?: number;
  /** Bits per second */
  bitrate?: number;
  framerate?: number;
  aspectRatio?: string;
}

export interface AudioStreamInfo {
  codec?: string;
  channels?: number;
  /** Bits per second */
  bitrate?: number;
  sampleRate?: number;
  language?: string;
}

export interface StreamInfo {
  video?: VideoStreamInfo;
  audio?: AudioStreamInfo;
  container?: string;
}

export interface ClassifiedSession {
  /** Stable entity key derived from device and user */
  key: string;
  /** Server-assigned session id; may churn, never used for identity */
  sessionId: string;
  deviceId: string;
  deviceName: string;
  appName: string;
  userId?: string;
  userName?: string;
  userImageUrl?: string;
  state: PlaybackState;
  variant: MediaVariant;
  /** Raw NowPlayingItem type, used for content breakdowns */
  nowPlayingType?: string;
  transcode: TranscodeInfo;
  stream: StreamInfo;
  playbackPercent?: number;
  videoBitrateBps: number;
  audioBitrateBps: number;
  positionUpdatedAt?: string;
}

// ============================================================================
// Aggregates
// ============================================================================

export interface ActiveStreamsSummary {
  count: number;
  users: string;
  totalSessions: number;
}

export interface BandwidthSample {
  key: string;
  user: string;
  device: string;
  media: string;
  videoBitrateMbps: number;
  audioBitrateMbps: number;
  totalBitrateMbps: number;
}

export interface BandwidthSummary {
  /** Megabytes per second */
  megabytesPerSecond: number;
  totalBitrateBps: number;
  streams: BandwidthSample[];
}

export interface TranscodingSessionDetail {
  key: string;
  user: string;
  device: string;
  media: string;
  originalFormat: { video: string; audio: string };
  targetFormat: { video: string; audio: string };
  reasons: string[];
}

export interface TranscodingSummary {
  /** Percent of active streams being transcoded */
  load: number;
  transcodingCount: number;
  sessions: TranscodingSessionDetail[];
}

export interface MultisessionUser {
  user: string;
  count: number;
  devices: string[];
  sessionKeys: string[];
}

export interface ActivityEntry {
  id?: string;
  date: string;
  name: string;
  type?: string;
  user?: string;
}

export interface SystemInfo {
  serverName?: string;
  version?: string;
  operatingSystem?: string;
  architecture?: string;
}

export interface ServerStats {
  totalSessions: number;
  activeSessions: number;
  uniqueUsers: number;
  uniqueDevices: number;
  contentTypes: Record<string, number>;
  recentActivities: ActivityEntry[];
  system: SystemInfo;
}

export interface SessionAggregates {
  activeStreams: ActiveStreamsSummary;
  bandwidth: BandwidthSummary;
  transcoding: TranscodingSummary;
  multisessionUsers: MultisessionUser[];
}

// ============================================================================
// Recordings & Library
// ============================================================================

export type RecordingKind = 'active' | 'scheduled';

export interface Recording {
  kind: RecordingKind;
  name: string;
  channel: string;
  startDate?: string;
  endDate?: string;
}

export interface SeriesRecording {
  name: string;
  channel: string;
  recordAnyTime: boolean;
  recordAnyChannel: boolean;
}

export interface RecordingsSnapshot {
  active: Recording[];
  scheduled: Recording[];
  series: SeriesRecording[];
}

export interface LibraryCounts {
  movies: number;
  series: number;
  episodes: number;
  songs: number;
  books: number;
  audiobooks: number;
  trailers: number;
  boxsets: number;
  playlists: number;
}

export interface LibraryStats {
  libraryCount: number;
  libraries: string[];
  counts: LibraryCounts;
  /** ISO timestamp of the fetch that produced these counts */
  lastUpdated: string;
}

export interface LibraryItem {
  id?: string;
  title?: string;
  series?: string;
  season?: number;
  episode?: number;
  premiereDate?: string;
  runtimeSeconds?: number;
  rating?: number;
  imdbId?: string;
  genres?: string[];
  tagline?: string;
  resolutionHeight?: number;
  imageUrl?: string;
}

export type LibraryListKey = 'latest_movies' | 'latest_episodes' | 'upcoming_episodes';

// ============================================================================
// Entities
// ============================================================================

export type EntityKind =
  | 'session'
  | 'active_streams'
  | 'multisession_users'
  | 'bandwidth'
  | 'transcoding'
  | 'server_stats'
  | 'recordings'
  | 'library_stats'
  | 'latest_movies'
  | 'latest_episodes'
  | 'upcoming_episodes';

export type EntityValue = string | number | null;

export interface EntityState {
  kind: EntityKind;
  key: string;
  state: EntityValue;
  attributes: Record<string, unknown>;
  available: boolean;
  /** ISO timestamp of the last successful publish */
  lastUpdated?: string;
}

// ============================================================================
// Polling
// ============================================================================

export type PollCategory = 'sessions' | 'server_stats' | 'recordings' | 'library';

export type PollStatus = 'idle' | 'ok' | 'degraded' | 'config_error' | 'stopped';

export interface PollerStatus {
  category: PollCategory;
  status: PollStatus;
  lastSuccessAt: string | null;
  lastErrorAt: string | null;
  lastError: string | null;
  consecutiveFailures: number;
}

// ============================================================================
// Playback Commands
// ============================================================================

export type PlaybackCommand =
  | { type: 'play' }
  | { type: 'pause' }
  | { type: 'stop' }
  | { type: 'seek'; position: number };

// ============================================================================
// WebSocket
// ============================================================================

export interface ServerToClientEvents {
  'entity:updated': (entity: EntityState) => void;
  'entity:unavailable': (entity: EntityState) => void;
  'entity:removed': (entity: { kind: EntityKind; key: string }) => void;
  'poller:status': (status: PollerStatus) => void;
}

export interface ClientToServerEvents {
  'subscribe:entities': () => void;
  'unsubscribe:entities': () => void;
}

// ============================================================================
// API
// ============================================================================

export interface ApiError {
  statusCode: number;
  error: string;
  message: string;
}
