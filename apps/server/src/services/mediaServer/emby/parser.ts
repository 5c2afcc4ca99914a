/**
 * Emby API Response Parser
 *
 * Pure functions for parsing raw Emby API responses into typed objects.
 * Separated from the client for testability and reuse.
 */

import {
  isRecord,
  parseString,
  parseNumber,
  parseBoolean,
  parseOptionalBoolean,
  parseOptionalString,
  parseOptionalNumber,
  parseStringList,
  getNestedObject,
  getNestedRecords,
  parseItems,
  type UnknownRecord,
} from '../../../utils/parsing.js';
import type {
  EmbyActiveRecording,
  EmbyActivityEntry,
  EmbyChannel,
  EmbyItemCounts,
  EmbyLibraryItem,
  EmbyLibraryView,
  EmbyMediaStream,
  EmbyNowPlayingItem,
  EmbyPlayState,
  EmbyProgram,
  EmbySeriesTimer,
  EmbySession,
  EmbySystemInfo,
  EmbyTimer,
  EmbyTranscodingInfo,
} from '../types.js';

// ============================================================================
// Session Parsing
// ============================================================================

/**
 * Parse one MediaStreams entry
 */
function parseMediaStream(stream: UnknownRecord): EmbyMediaStream {
  return {
    type: parseOptionalString(stream.Type),
    codec: parseOptionalString(stream.Codec),
    width: parseOptionalNumber(stream.Width),
    height: parseOptionalNumber(stream.Height),
    bitrate: parseOptionalNumber(stream.BitRate),
    framerate: parseOptionalNumber(stream.RealFrameRate ?? stream.AverageFrameRate),
    aspectRatio: parseOptionalString(stream.AspectRatio),
    channels: parseOptionalNumber(stream.Channels),
    sampleRate: parseOptionalNumber(stream.SampleRate),
    language: parseOptionalString(stream.Language),
  };
}

/**
 * Parse a guide entry (program)
 */
export function parseProgram(data: unknown): EmbyProgram | null {
  if (!isRecord(data)) return null;
  return {
    id: parseOptionalString(data.Id),
    name: parseOptionalString(data.Name),
    seriesName: parseOptionalString(data.SeriesName),
    seriesTitle: parseOptionalString(data.SeriesTitle),
    programSeriesTitle: parseOptionalString(data.ProgramSeriesTitle),
    showName: parseOptionalString(data.ShowName),
    overview: parseOptionalString(data.Overview),
    startDate: parseOptionalString(data.StartDate),
    endDate: parseOptionalString(data.EndDate),
    channelId: parseOptionalString(data.ChannelId),
    channelName: parseOptionalString(data.ChannelName),
    channelNumber: parseOptionalString(data.ChannelNumber ?? data.Number),
  };
}

/**
 * Parse the programs list returned by /LiveTv/Programs (array or query result)
 */
export function parseProgramsResponse(data: unknown): EmbyProgram[] {
  const programs: EmbyProgram[] = [];
  for (const item of parseItems(data)) {
    const program = parseProgram(item);
    if (program) programs.push(program);
  }
  return programs;
}

/**
 * Parse the NowPlayingItem block
 */
function parseNowPlayingItem(item: UnknownRecord): EmbyNowPlayingItem {
  const firstSource = getNestedRecords(item, 'MediaSources')[0];
  const currentProgram = parseProgram(item.CurrentProgram);

  return {
    id: parseOptionalString(item.Id),
    name: parseOptionalString(item.Name),
    type: parseOptionalString(item.Type),
    runTimeTicks: parseOptionalNumber(item.RunTimeTicks),
    seriesName: parseOptionalString(item.SeriesName),
    seasonNumber: parseOptionalNumber(item.ParentIndexNumber),
    episodeNumber: parseOptionalNumber(item.IndexNumber),
    artist: parseOptionalString(item.AlbumArtist ?? item.Artist),
    container: parseOptionalString(item.Container),
    channelId: parseOptionalString(item.ChannelId),
    channelName: parseOptionalString(item.ChannelName),
    channelNumber: parseOptionalString(item.ChannelNumber ?? item.Number),
    programId: parseOptionalString(item.ProgramId),
    currentProgram: currentProgram ?? undefined,
    isInfiniteStream: parseBoolean(firstSource?.IsInfiniteStream),
    sourceBitrate: parseOptionalNumber(firstSource?.Bitrate),
    mediaStreams: getNestedRecords(item, 'MediaStreams').map(parseMediaStream),
  };
}

/**
 * Parse a TranscodingInfo block.
 * An absent or empty block yields undefined: the stream is not being transcoded.
 */
export function parseTranscodingInfo(data: unknown): EmbyTranscodingInfo | undefined {
  if (!isRecord(data) || Object.keys(data).length === 0) return undefined;

  const rawBitrate = data.Bitrate;
  return {
    videoCodec: parseOptionalString(data.VideoCodec),
    audioCodec: parseOptionalString(data.AudioCodec),
    bitrate: parseOptionalNumber(rawBitrate) ?? parseOptionalString(rawBitrate),
    videoBitrate: parseOptionalNumber(data.VideoBitrate),
    audioBitrate: parseOptionalNumber(data.AudioBitrate),
    reasons: parseStringList(data.TranscodeReasons ?? data.TranscodingReasons ?? data.TranscodingReason),
    container: parseOptionalString(data.Container),
    isHls: parseOptionalBoolean(data.IsHls),
    width: parseOptionalNumber(data.Width),
    height: parseOptionalNumber(data.Height),
  };
}

function parsePlayState(playState: UnknownRecord | undefined): EmbyPlayState {
  const rawBitrate = playState?.Bitrate;
  return {
    positionTicks: parseOptionalNumber(playState?.PositionTicks),
    isPaused: parseBoolean(playState?.IsPaused),
    isPlaying:
      parseBoolean(playState?.IsPlaying) ||
      parseOptionalString(playState?.PlaybackStatus) === 'Playing',
    playMethod: parseOptionalString(playState?.PlayMethod),
    transcodingVideoCodec: parseOptionalString(playState?.TranscodingVideoCodec),
    transcodingAudioCodec: parseOptionalString(playState?.TranscodingAudioCodec),
    transcodingReasons: parseStringList(playState?.TranscodingReason ?? playState?.TranscodeReasons),
    bitrate: parseOptionalNumber(rawBitrate) ?? parseOptionalString(rawBitrate),
    videoBitrate: parseOptionalNumber(playState?.VideoBitrate),
    audioBitrate: parseOptionalNumber(playState?.AudioBitrate),
    videoResolution: parseOptionalString(playState?.VideoResolution),
    transcodingInfo: parseTranscodingInfo(playState?.TranscodingInfo),
  };
}

/**
 * Parse raw Emby session into typed EmbySession.
 * Returns null when the entry carries no session id.
 */
export function parseSession(session: UnknownRecord): EmbySession | null {
  const id = parseOptionalString(session.Id ?? session.SessionId);
  if (!id) return null;

  const nowPlaying = getNestedObject(session, 'NowPlayingItem');
  const nowPlayingProgram = getNestedObject(session, 'NowPlayingProgram');

  return {
    id,
    deviceId: parseOptionalString(session.DeviceId),
    deviceName: parseOptionalString(session.DeviceName),
    client: parseOptionalString(session.Client ?? session.Application),
    userId: parseOptionalString(session.UserId),
    userName: parseOptionalString(session.UserName),
    nowPlayingItem: nowPlaying ? parseNowPlayingItem(nowPlaying) : undefined,
    nowPlayingProgramId: parseOptionalString(nowPlayingProgram?.Id ?? session.NowPlayingProgramId),
    playState: parsePlayState(getNestedObject(session, 'PlayState')),
    transcodingInfo: parseTranscodingInfo(session.TranscodingInfo),
    videoBitrate: parseOptionalNumber(session.VideoBitrate),
    audioBitrate: parseOptionalNumber(session.AudioBitrate),
    bitrate: parseOptionalNumber(session.Bitrate),
  };
}

/**
 * Parse sessions API response (all sessions, idle ones included)
 */
export function parseSessionsResponse(data: unknown): EmbySession[] {
  if (!Array.isArray(data)) return [];

  const results: EmbySession[] = [];
  for (const session of data) {
    if (!isRecord(session)) continue;
    const parsed = parseSession(session);
    if (parsed) results.push(parsed);
  }
  return results;
}

// ============================================================================
// Live TV Parsing
// ============================================================================

export function parseChannel(data: unknown): EmbyChannel | null {
  if (!isRecord(data)) return null;
  return {
    id: parseOptionalString(data.Id),
    name: parseOptionalString(data.Name),
    number: parseOptionalString(data.Number ?? data.ChannelNumber),
  };
}

/**
 * Parse /LiveTv/Timers. Program info on a timer takes precedence over the
 * timer's own name, channel and times.
 */
export function parseTimersResponse(data: unknown): EmbyTimer[] {
  return parseItems(data).map((timer) => {
    const program = parseProgram(timer.ProgramInfo) ?? undefined;
    return {
      name: parseOptionalString(timer.Name),
      channelName: parseOptionalString(timer.ChannelName),
      status: parseOptionalString(timer.Status),
      startDate: parseOptionalString(timer.StartDate),
      endDate: parseOptionalString(timer.EndDate),
      program,
    };
  });
}

export function parseActiveRecordingsResponse(data: unknown): EmbyActiveRecording[] {
  return parseItems(data).map((item) => ({
    name: parseOptionalString(item.Name) ?? parseString(item.ProgramName),
    channel: parseOptionalString(item.ChannelName) ?? parseString(item.ChannelId),
    startDate: parseOptionalString(item.StartDate),
    endDate: parseOptionalString(item.EndDate),
  }));
}

export function parseSeriesTimersResponse(data: unknown): EmbySeriesTimer[] {
  return parseItems(data).map((item) => ({
    name: parseString(item.Name),
    channel: parseOptionalString(item.ChannelName) ?? parseString(item.ChannelId),
    recordAnyTime: parseBoolean(item.RecordAnyTime, true),
    recordAnyChannel: parseBoolean(item.RecordAnyChannel, false),
  }));
}

// ============================================================================
// Server Parsing
// ============================================================================

export function parseSystemInfo(data: unknown): EmbySystemInfo {
  if (!isRecord(data)) return {};
  return {
    id: parseOptionalString(data.Id),
    serverName: parseOptionalString(data.ServerName),
    version: parseOptionalString(data.Version),
    operatingSystem: parseOptionalString(data.OperatingSystem),
    architecture: parseOptionalString(data.SystemArchitecture),
  };
}

/**
 * Parse activity log entries; entries without a date are dropped since
 * they cannot be ordered.
 */
export function parseActivityLogResponse(data: unknown): EmbyActivityEntry[] {
  const entries: EmbyActivityEntry[] = [];
  for (const item of parseItems(data)) {
    const date = parseOptionalString(item.Date);
    if (!date) continue;
    entries.push({
      id: parseOptionalString(item.Id),
      name: parseString(item.Name),
      type: parseOptionalString(item.Type),
      userName: parseOptionalString(item.UserName),
      date,
    });
  }
  return entries;
}

// ============================================================================
// Library Parsing
// ============================================================================

const COUNT_FIELDS = [
  'MovieCount',
  'SeriesCount',
  'EpisodeCount',
  'SongCount',
  'BookCount',
  'AudioBookCount',
  'TrailerCount',
  'BoxSetCount',
  'PlaylistCount',
] as const;

/**
 * Parse `/Items/Counts`. Null when the payload carries none of the count fields.
 */
export function parseItemCounts(data: unknown): EmbyItemCounts | null {
  if (!isRecord(data)) return null;
  if (!COUNT_FIELDS.some((field) => field in data)) return null;
  return {
    movieCount: parseNumber(data.MovieCount),
    seriesCount: parseNumber(data.SeriesCount),
    episodeCount: parseNumber(data.EpisodeCount),
    songCount: parseNumber(data.SongCount),
    bookCount: parseNumber(data.BookCount),
    audioBookCount: parseNumber(data.AudioBookCount),
    trailerCount: parseNumber(data.TrailerCount),
    boxSetCount: parseNumber(data.BoxSetCount),
    playlistCount: parseNumber(data.PlaylistCount),
  };
}

export function parseLibraryViewsResponse(data: unknown): EmbyLibraryView[] {
  return parseItems(data).map((item) => ({
    id: parseOptionalString(item.Id),
    name: parseString(item.Name),
    collectionType: parseOptionalString(item.CollectionType),
  }));
}

function firstVideoHeight(item: UnknownRecord): number | undefined {
  const video = getNestedRecords(item, 'MediaStreams').find(
    (stream) => parseOptionalString(stream.Type) === 'Video'
  );
  return parseOptionalNumber(video?.Height);
}

export function parseLibraryItem(item: UnknownRecord): EmbyLibraryItem {
  const providerIds = getNestedObject(item, 'ProviderIds');
  const genres = parseStringList(item.Genres);
  const taglines = parseStringList(item.Taglines);

  return {
    id: parseOptionalString(item.Id),
    name: parseOptionalString(item.Name),
    type: parseOptionalString(item.Type),
    seriesName: parseOptionalString(item.SeriesName),
    seasonNumber: parseOptionalNumber(item.ParentIndexNumber ?? item.SeasonNumber),
    episodeNumber: parseOptionalNumber(item.IndexNumber ?? item.EpisodeNumber),
    premiereDate: parseOptionalString(item.PremiereDate ?? item.ReleaseDate),
    runTimeTicks: parseOptionalNumber(item.RunTimeTicks),
    communityRating: parseOptionalNumber(item.CommunityRating),
    imdbId: parseOptionalString(providerIds?.Imdb ?? providerIds?.ImdbId),
    genres,
    tagline: taglines?.[0],
    originalTitle: parseOptionalString(item.OriginalTitle),
    videoHeight: firstVideoHeight(item),
  };
}

export function parseLibraryItemsResponse(data: unknown): EmbyLibraryItem[] {
  return parseItems(data).map(parseLibraryItem);
}
