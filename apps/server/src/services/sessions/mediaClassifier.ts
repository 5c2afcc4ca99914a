/**
 * Media Classification
 *
 * Pure functions mapping a parsed Emby session onto exactly one MediaVariant.
 * Live TV variants leave `program` unresolved; see liveProgramResolver.ts.
 */

import { LIVE_TV_ITEM_TYPES, TICKS_PER_SECOND } from '@marquee/shared';
import type {
  EpisodeMedia,
  LiveTvMedia,
  MediaVariant,
  MovieMedia,
  PlaybackState,
} from '@marquee/shared';
import type { EmbyNowPlayingItem, EmbySession } from '../mediaServer/types.js';

/** Builds the primary image URL for an item id */
export type ImageUrlBuilder = (itemId: string) => string;

const LIVE_TV_TYPES: ReadonlySet<string> = new Set(LIVE_TV_ITEM_TYPES);

/**
 * Convert Emby ticks to seconds
 *
 * @example
 * ticksToSeconds(72_000_000_000); // 7200
 * ticksToSeconds(undefined);      // undefined
 */
export function ticksToSeconds(ticks: number | undefined): number | undefined {
  return ticks === undefined ? undefined : ticks / TICKS_PER_SECOND;
}

/**
 * Playback percent rounded to one decimal and clamped to [0, 100].
 * Omitted when either value is missing or the duration is not positive.
 *
 * @example
 * computePlaybackPercent(3600, 7200); // 50
 * computePlaybackPercent(10, 0);      // undefined
 */
export function computePlaybackPercent(
  positionSeconds: number | undefined,
  durationSeconds: number | undefined
): number | undefined {
  if (positionSeconds === undefined || durationSeconds === undefined || durationSeconds <= 0) {
    return undefined;
  }
  const percent = Math.round((positionSeconds / durationSeconds) * 1000) / 10;
  return Math.min(100, Math.max(0, percent));
}

/**
 * Whether a now-playing item is a live TV stream
 */
export function isLiveTvItem(item: EmbyNowPlayingItem): boolean {
  const type = item.type?.toLowerCase();
  return (type !== undefined && LIVE_TV_TYPES.has(type)) || item.isInfiniteStream;
}

/**
 * Derive the playback state from the play-state flags
 */
export function derivePlaybackState(session: EmbySession): PlaybackState {
  if (session.playState.isPaused) return 'paused';
  if (session.playState.isPlaying || session.nowPlayingItem) return 'playing';
  return 'idle';
}

/**
 * Candidate program id, first of: the item's ProgramId, the session's
 * NowPlayingProgram, the item's embedded CurrentProgram
 */
function programIdCandidate(session: EmbySession, item: EmbyNowPlayingItem): string | undefined {
  return item.programId ?? session.nowPlayingProgramId ?? item.currentProgram?.id;
}

function classifyLiveTv(session: EmbySession, item: EmbyNowPlayingItem): LiveTvMedia {
  const variant: LiveTvMedia = {
    kind: 'live_tv',
    program: null,
  };
  if (item.id) variant.contentId = item.id;

  // A channel item is its own channel
  const channelId = item.channelId ?? item.currentProgram?.channelId ?? item.id;
  if (channelId) variant.channelId = channelId;

  const channelName = item.channelName ?? item.name ?? item.currentProgram?.channelName;
  if (channelName) variant.channelName = channelName;

  const channelNumber = item.channelNumber ?? item.currentProgram?.channelNumber;
  if (channelNumber) variant.channelNumber = channelNumber;

  const programId = programIdCandidate(session, item);
  if (programId) variant.programId = programId;

  return variant;
}

function movieFields(
  session: EmbySession,
  item: EmbyNowPlayingItem,
  contentType: string,
  imageUrl: ImageUrlBuilder
): Omit<MovieMedia, 'kind'> {
  const fields: Omit<MovieMedia, 'kind'> = { contentType };
  if (item.name) fields.title = item.name;
  if (item.id) {
    fields.contentId = item.id;
    fields.posterUrl = imageUrl(item.id);
  }
  if (item.artist) fields.artist = item.artist;

  const duration = ticksToSeconds(item.runTimeTicks);
  if (duration !== undefined) fields.durationSeconds = duration;
  const position = ticksToSeconds(session.playState.positionTicks);
  if (position !== undefined) fields.positionSeconds = position;

  return fields;
}

/**
 * Classify a session into its media variant.
 *
 * Decision order: no now-playing item, then Movie, then Episode, then live TV
 * (channel types or an infinite stream), then everything else as movie-shaped with
 * the raw item type kept as `contentType`.
 *
 * @example
 * classifyMedia(sessionPlayingMovie, client.itemImageUrl);
 * // { kind: 'movie', title: 'Arrival', contentType: 'Movie', durationSeconds: 7200, ... }
 */
export function classifyMedia(session: EmbySession, imageUrl: ImageUrlBuilder): MediaVariant {
  const item = session.nowPlayingItem;
  if (!item) return { kind: 'none' };

  const type = item.type ?? 'Unknown';
  const lower = type.toLowerCase();

  if (lower === 'movie') {
    return { kind: 'movie', ...movieFields(session, item, type, imageUrl) };
  }

  if (lower === 'episode') {
    const variant: EpisodeMedia = { kind: 'episode', ...movieFields(session, item, type, imageUrl) };
    if (item.seriesName) variant.seriesTitle = item.seriesName;
    if (item.seasonNumber !== undefined) variant.seasonNumber = item.seasonNumber;
    if (item.episodeNumber !== undefined) variant.episodeNumber = item.episodeNumber;
    return variant;
  }

  if (isLiveTvItem(item)) {
    return classifyLiveTv(session, item);
  }

  return { kind: 'movie', ...movieFields(session, item, type, imageUrl) };
}

/**
 * Playback percent for a classified variant
 */
export function variantPlaybackPercent(variant: MediaVariant): number | undefined {
  if (variant.kind === 'none') return undefined;
  return computePlaybackPercent(variant.positionSeconds, variant.durationSeconds);
}
