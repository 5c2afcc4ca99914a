/**
 * Entity Builders
 *
 * Turn engine output into the (state, attributes) pairs the registry
 * publishes. One builder per entity kind.
 */

import type {
  ActiveStreamsSummary,
  BandwidthSummary,
  ClassifiedSession,
  EntityKind,
  EntityValue,
  LibraryItem,
  LibraryListKey,
  LibraryStats,
  MediaVariant,
  MultisessionUser,
  PollCategory,
  RecordingsSnapshot,
  ServerStats,
  TranscodingSummary,
} from '@marquee/shared';
import type { OptionKey } from '../../services/options.js';
import { aggregateKey } from '../../services/publisher.js';
import { compact } from '../../utils/parsing.js';

export type AggregateKind = Exclude<EntityKind, 'session'>;

export interface EntityUpdate {
  kind: EntityKind;
  key: string;
  state: EntityValue;
  attributes: Record<string, unknown>;
}

// Toggle that controls each aggregate
export const KIND_OPTIONS: Record<AggregateKind, OptionKey> = {
  active_streams: 'enableActiveStreams',
  multisession_users: 'enableMultisessionUsers',
  bandwidth: 'enableBandwidth',
  transcoding: 'enableTranscoding',
  server_stats: 'enableServerStats',
  recordings: 'enableRecordings',
  library_stats: 'enableLibraryStats',
  latest_movies: 'enableLatestMovies',
  latest_episodes: 'enableLatestEpisodes',
  upcoming_episodes: 'enableUpcomingEpisodes',
};

// Entity kinds each polling category feeds
export const CATEGORY_KINDS: Record<PollCategory, readonly EntityKind[]> = {
  sessions: ['session', 'active_streams', 'bandwidth', 'transcoding', 'multisession_users'],
  server_stats: ['server_stats'],
  recordings: ['recordings'],
  library: ['library_stats', 'latest_movies', 'latest_episodes', 'upcoming_episodes'],
};

// ============================================================================
// Sessions
// ============================================================================

function variantAttributes(variant: MediaVariant): Record<string, unknown> {
  switch (variant.kind) {
    case 'none':
      return { mediaType: 'none' };
    case 'movie':
      return compact({
        mediaType: 'movie',
        contentType: variant.contentType,
        title: variant.title,
        contentId: variant.contentId,
        artist: variant.artist,
        durationSeconds: variant.durationSeconds,
        positionSeconds: variant.positionSeconds,
        posterUrl: variant.posterUrl,
      });
    case 'episode':
      return compact({
        mediaType: 'episode',
        contentType: variant.contentType,
        title: variant.title,
        contentId: variant.contentId,
        seriesTitle: variant.seriesTitle,
        seasonNumber: variant.seasonNumber,
        episodeNumber: variant.episodeNumber,
        durationSeconds: variant.durationSeconds,
        positionSeconds: variant.positionSeconds,
        posterUrl: variant.posterUrl,
      });
    case 'live_tv':
      return compact({
        mediaType: 'live_tv',
        contentId: variant.contentId,
        channelId: variant.channelId,
        channelName: variant.channelName,
        channelNumber: variant.channelNumber,
        durationSeconds: variant.durationSeconds,
        positionSeconds: variant.positionSeconds,
        programTitle: variant.program?.seriesName,
        programOverview: variant.program?.overview,
        programStart: variant.program?.startDate,
        programEnd: variant.program?.endDate,
        programImageUrl: variant.program?.imageUrl,
        programSource: variant.program?.source ?? 'none',
      });
  }
}

export function sessionEntity(session: ClassifiedSession): EntityUpdate {
  const { playbackMethod, ...transcode } = session.transcode;
  return {
    kind: 'session',
    key: session.key,
    state: session.state,
    attributes: compact({
      sessionId: session.sessionId,
      deviceId: session.deviceId,
      deviceName: session.deviceName,
      appName: session.appName,
      userId: session.userId,
      userName: session.userName,
      userImageUrl: session.userImageUrl,
      ...variantAttributes(session.variant),
      playbackPercent: session.playbackPercent,
      positionUpdatedAt: session.positionUpdatedAt,
      playbackMethod,
      transcode,
      stream: compact(session.stream),
      videoBitrateBps: session.videoBitrateBps,
      audioBitrateBps: session.audioBitrateBps,
    }),
  };
}

// ============================================================================
// Session Aggregates
// ============================================================================

export function activeStreamsEntity(summary: ActiveStreamsSummary): EntityUpdate {
  return {
    kind: 'active_streams',
    key: aggregateKey('active_streams'),
    state: summary.count,
    attributes: { users: summary.users, totalSessions: summary.totalSessions },
  };
}

export function bandwidthEntity(summary: BandwidthSummary): EntityUpdate {
  return {
    kind: 'bandwidth',
    key: aggregateKey('bandwidth'),
    state: summary.megabytesPerSecond,
    attributes: {
      totalBitrateBps: summary.totalBitrateBps,
      activeStreams: summary.streams.length,
      streams: summary.streams,
    },
  };
}

export function transcodingEntity(summary: TranscodingSummary): EntityUpdate {
  return {
    kind: 'transcoding',
    key: aggregateKey('transcoding'),
    state: summary.load,
    attributes: { transcodingCount: summary.transcodingCount, sessions: summary.sessions },
  };
}

export function multisessionEntity(users: readonly MultisessionUser[]): EntityUpdate {
  return {
    kind: 'multisession_users',
    key: aggregateKey('multisession_users'),
    state: users.length,
    attributes: { users: [...users] },
  };
}

// ============================================================================
// Other Categories
// ============================================================================

export function serverStatsEntity(stats: ServerStats): EntityUpdate {
  const { activeSessions, ...rest } = stats;
  return {
    kind: 'server_stats',
    key: aggregateKey('server_stats'),
    state: activeSessions,
    attributes: { ...rest },
  };
}

export function recordingsEntity(snapshot: RecordingsSnapshot): EntityUpdate {
  return {
    kind: 'recordings',
    key: aggregateKey('recordings'),
    state: snapshot.active.length,
    attributes: {
      activeCount: snapshot.active.length,
      scheduledCount: snapshot.scheduled.length,
      seriesCount: snapshot.series.length,
      active: snapshot.active,
      scheduled: snapshot.scheduled,
      series: snapshot.series,
    },
  };
}

export function libraryStatsEntity(stats: LibraryStats): EntityUpdate {
  return {
    kind: 'library_stats',
    key: aggregateKey('library_stats'),
    state: stats.libraryCount,
    attributes: {
      libraries: stats.libraries,
      counts: stats.counts,
      lastUpdated: stats.lastUpdated,
    },
  };
}

export function libraryListEntity(kind: LibraryListKey, items: readonly LibraryItem[]): EntityUpdate {
  return {
    kind,
    key: aggregateKey(kind),
    state: items.length,
    attributes: { items: [...items] },
  };
}
