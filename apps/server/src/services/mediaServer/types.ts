/**
 * Media Server Integration Types
 *
 * Typed shapes of the Emby payloads the engine consumes, plus the
 * EmbyFetcher capability the engine is given. Parsers narrow raw JSON into
 * these shapes; nothing downstream sees untyped dictionaries.
 */

import type { PlaybackCommand } from '@marquee/shared';

// ============================================================================
// Session Payloads
// ============================================================================

export interface EmbyMediaStream {
  type?: string;
  codec?: string;
  width?: number;
  height?: number;
  /** Bits per second */
  bitrate?: number;
  framerate?: number;
  aspectRatio?: string;
  channels?: number;
  sampleRate?: number;
  language?: string;
}

/** Guide entry, either embedded in a session or fetched from /LiveTv */
export interface EmbyProgram {
  id?: string;
  name?: string;
  seriesName?: string;
  seriesTitle?: string;
  programSeriesTitle?: string;
  showName?: string;
  overview?: string;
  startDate?: string;
  endDate?: string;
  channelId?: string;
  channelName?: string;
  channelNumber?: string;
}

export interface EmbyNowPlayingItem {
  id?: string;
  name?: string;
  type?: string;
  runTimeTicks?: number;
  seriesName?: string;
  /** ParentIndexNumber */
  seasonNumber?: number;
  /** IndexNumber */
  episodeNumber?: number;
  artist?: string;
  container?: string;
  channelId?: string;
  channelName?: string;
  channelNumber?: string;
  programId?: string;
  currentProgram?: EmbyProgram;
  /** MediaSources[0].IsInfiniteStream: set for live streams */
  isInfiniteStream: boolean;
  /** MediaSources[0].Bitrate in bps */
  sourceBitrate?: number;
  mediaStreams: EmbyMediaStream[];
}

/** Present only when the server reported a non-empty TranscodingInfo block */
export interface EmbyTranscodingInfo {
  videoCodec?: string;
  audioCodec?: string;
  /** Bits per second, or a display string when the server sent one */
  bitrate?: number | string;
  videoBitrate?: number;
  audioBitrate?: number;
  reasons?: string[];
  container?: string;
  isHls?: boolean;
  width?: number;
  height?: number;
}

export interface EmbyPlayState {
  positionTicks?: number;
  isPaused: boolean;
  isPlaying: boolean;
  playMethod?: string;
  transcodingVideoCodec?: string;
  transcodingAudioCodec?: string;
  transcodingReasons?: string[];
  bitrate?: number | string;
  videoBitrate?: number;
  audioBitrate?: number;
  videoResolution?: string;
  transcodingInfo?: EmbyTranscodingInfo;
}

export interface EmbySession {
  id: string;
  deviceId?: string;
  deviceName?: string;
  client?: string;
  userId?: string;
  userName?: string;
  nowPlayingItem?: EmbyNowPlayingItem;
  /** NowPlayingProgram.Id or NowPlayingProgramId */
  nowPlayingProgramId?: string;
  playState: EmbyPlayState;
  transcodingInfo?: EmbyTranscodingInfo;
  videoBitrate?: number;
  audioBitrate?: number;
  bitrate?: number;
}

// ============================================================================
// Live TV / Recordings
// ============================================================================

export interface EmbyChannel {
  id?: string;
  name?: string;
  number?: string;
}

export interface EmbyTimer {
  name?: string;
  channelName?: string;
  status?: string;
  startDate?: string;
  endDate?: string;
  program?: EmbyProgram;
}

export interface EmbySeriesTimer {
  name: string;
  channel: string;
  recordAnyTime: boolean;
  recordAnyChannel: boolean;
}

export interface EmbyActiveRecording {
  name: string;
  channel: string;
  startDate?: string;
  endDate?: string;
}

// ============================================================================
// Server / Library
// ============================================================================

export interface EmbyActivityEntry {
  id?: string;
  name: string;
  type?: string;
  userName?: string;
  date: string;
}

export interface EmbySystemInfo {
  id?: string;
  serverName?: string;
  version?: string;
  operatingSystem?: string;
  architecture?: string;
}

export interface EmbyItemCounts {
  movieCount: number;
  seriesCount: number;
  episodeCount: number;
  songCount: number;
  bookCount: number;
  audioBookCount: number;
  trailerCount: number;
  boxSetCount: number;
  playlistCount: number;
}

export interface EmbyLibraryView {
  id?: string;
  name: string;
  collectionType?: string;
}

export interface EmbyLibraryItem {
  id?: string;
  name?: string;
  type?: string;
  seriesName?: string;
  seasonNumber?: number;
  episodeNumber?: number;
  premiereDate?: string;
  runTimeTicks?: number;
  communityRating?: number;
  imdbId?: string;
  genres?: string[];
  tagline?: string;
  originalTitle?: string;
  videoHeight?: number;
}

// ============================================================================
// Fetcher Capability
// ============================================================================

export interface LibraryItemQuery {
  includeTypes: 'Movie' | 'Episode';
  sortBy: 'DateCreated' | 'PremiereDate';
  sortOrder: 'Ascending' | 'Descending';
  limit: number;
  /** Extra query parameters (e.g. MinPremiereDate) */
  extra?: Record<string, string>;
}

/**
 * Everything the engine needs from the media server.
 * Each call resolves to a typed payload or rejects with a TransportError.
 */
export interface EmbyFetcher {
  getSessions(): Promise<EmbySession[]>;
  getProgram(programId: string): Promise<EmbyProgram | null>;
  getAiringPrograms(channelId: string): Promise<EmbyProgram[]>;
  getChannel(channelId: string): Promise<EmbyChannel | null>;

  getSystemInfo(): Promise<EmbySystemInfo>;
  getActivityLog(limit: number): Promise<EmbyActivityEntry[]>;

  getTimers(): Promise<EmbyTimer[]>;
  getActiveRecordings(): Promise<EmbyActiveRecording[]>;
  getSeriesTimers(): Promise<EmbySeriesTimer[]>;

  getItemCounts(): Promise<EmbyItemCounts>;
  getLibraryViews(): Promise<EmbyLibraryView[]>;
  getLibraryItems(query: LibraryItemQuery): Promise<EmbyLibraryItem[]>;
  getUpcomingEpisodes(limit: number): Promise<EmbyLibraryItem[]>;

  sendPlaystate(sessionId: string, command: PlaybackCommand): Promise<void>;

  itemImageUrl(itemId: string): string;
  userImageUrl(userId: string): string;
}

export interface EmbyServerConfig {
  host: string;
  port: number;
  useSsl: boolean;
  apiKey: string;
  /** Per-request timeout in ms */
  timeoutMs?: number;
}
