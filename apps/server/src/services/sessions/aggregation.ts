/**
 * Session Aggregation
 *
 * Pure functions deriving cross-session figures from one poll's classified
 * snapshot. A session missing a field contributes what it has; nothing here
 * throws on partial data.
 */

import { SERVER_STATS } from '@marquee/shared';
import type {
  ActiveStreamsSummary,
  ActivityEntry,
  BandwidthSample,
  BandwidthSummary,
  ClassifiedSession,
  MediaVariant,
  MultisessionUser,
  ServerStats,
  SessionAggregates,
  SystemInfo,
  TranscodingSessionDetail,
  TranscodingSummary,
} from '@marquee/shared';

const UNKNOWN = 'Unknown';
const BYTES_PER_MEGABYTE = 1024 * 1024;

function round(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

/**
 * A session counts as an active stream when something is loaded and it is
 * not idle
 */
export function isActiveStream(session: ClassifiedSession): boolean {
  return session.variant.kind !== 'none' && session.state !== 'idle';
}

/**
 * Display name of what a session is playing
 */
export function mediaLabel(variant: MediaVariant): string {
  switch (variant.kind) {
    case 'none':
      return UNKNOWN;
    case 'live_tv':
      return variant.program?.seriesName ?? variant.channelName ?? UNKNOWN;
    case 'episode':
      return variant.title ?? variant.seriesTitle ?? UNKNOWN;
    case 'movie':
      return variant.title ?? UNKNOWN;
  }
}

// ============================================================================
// Active Streams
// ============================================================================

export function summarizeActiveStreams(
  sessions: readonly ClassifiedSession[],
  active: readonly ClassifiedSession[]
): ActiveStreamsSummary {
  const users = [...new Set(active.map((s) => s.userName).filter((u): u is string => !!u))].sort();
  return {
    count: active.length,
    users: users.join(', '),
    totalSessions: sessions.length,
  };
}

// ============================================================================
// Bandwidth
// ============================================================================

function bpsToMbps(bps: number): number {
  return round(bps / BYTES_PER_MEGABYTE, 2);
}

/**
 * Bandwidth across active streams.
 * MB/s = Σ bps / 8 / 1024 / 1024, two decimals.
 *
 * @example
 * // Streams at 3000 kbps, 5000 kbps and one with no bitrate data
 * summarizeBandwidth(active).megabytesPerSecond; // 0.95
 */
export function summarizeBandwidth(active: readonly ClassifiedSession[]): BandwidthSummary {
  let totalBitrateBps = 0;
  const streams: BandwidthSample[] = [];

  for (const session of active) {
    const total = session.videoBitrateBps + session.audioBitrateBps;
    totalBitrateBps += total;
    streams.push({
      key: session.key,
      user: session.userName ?? UNKNOWN,
      device: session.deviceName || UNKNOWN,
      media: mediaLabel(session.variant),
      videoBitrateMbps: bpsToMbps(session.videoBitrateBps),
      audioBitrateMbps: bpsToMbps(session.audioBitrateBps),
      totalBitrateMbps: bpsToMbps(total),
    });
  }

  return {
    megabytesPerSecond: round(totalBitrateBps / 8 / BYTES_PER_MEGABYTE, 2),
    totalBitrateBps,
    streams,
  };
}

// ============================================================================
// Transcoding
// ============================================================================

function originalFormat(session: ClassifiedSession): TranscodingSessionDetail['originalFormat'] {
  const { video, audio } = session.stream;
  const videoLabel = video
    ? [video.width && video.height ? `${video.width}x${video.height}` : undefined, video.codec]
        .filter(Boolean)
        .join(' ')
    : '';
  const audioLabel = audio
    ? [audio.codec, audio.channels ? `${audio.channels}ch` : undefined].filter(Boolean).join(' ')
    : '';
  return { video: videoLabel || UNKNOWN, audio: audioLabel || UNKNOWN };
}

function targetFormat(session: ClassifiedSession): TranscodingSessionDetail['targetFormat'] {
  const { height, videoCodec, audioCodec } = session.transcode;
  const videoLabel = [height ? `${height}p` : undefined, videoCodec].filter(Boolean).join(' ');
  return { video: videoLabel || UNKNOWN, audio: audioCodec ?? UNKNOWN };
}

/**
 * Share of active streams being transcoded, one decimal.
 * Zero when nothing is playing.
 */
export function summarizeTranscoding(active: readonly ClassifiedSession[]): TranscodingSummary {
  const transcoding = active.filter((s) => s.transcode.playbackMethod === 'transcoding');
  const load = active.length === 0 ? 0 : round((transcoding.length / active.length) * 100, 1);

  return {
    load,
    transcodingCount: transcoding.length,
    sessions: transcoding.map((session) => ({
      key: session.key,
      user: session.userName ?? UNKNOWN,
      device: session.deviceName || UNKNOWN,
      media: mediaLabel(session.variant),
      originalFormat: originalFormat(session),
      targetFormat: targetFormat(session),
      reasons: session.transcode.reasons ?? [],
    })),
  };
}

// ============================================================================
// Multisession Users
// ============================================================================

/**
 * Users with two or more concurrent active sessions
 */
export function findMultisessionUsers(active: readonly ClassifiedSession[]): MultisessionUser[] {
  const byUser = new Map<string, ClassifiedSession[]>();
  for (const session of active) {
    const user = session.userName ?? UNKNOWN;
    const list = byUser.get(user) ?? [];
    list.push(session);
    byUser.set(user, list);
  }

  const result: MultisessionUser[] = [];
  for (const [user, list] of byUser) {
    if (list.length < 2) continue;
    result.push({
      user,
      count: list.length,
      devices: list.map((s) => s.deviceName || s.deviceId || UNKNOWN),
      sessionKeys: list.map((s) => s.key),
    });
  }
  return result;
}

// ============================================================================
// Aggregate
// ============================================================================

/**
 * Every session-derived aggregate for one poll
 */
export function aggregateSessions(sessions: readonly ClassifiedSession[]): SessionAggregates {
  const active = sessions.filter(isActiveStream);
  return {
    activeStreams: summarizeActiveStreams(sessions, active),
    bandwidth: summarizeBandwidth(active),
    transcoding: summarizeTranscoding(active),
    multisessionUsers: findMultisessionUsers(active),
  };
}

// ============================================================================
// Server Stats
// ============================================================================

/**
 * Most recent activity entries: sorted by date descending, then truncated
 */
export function recentActivities(
  entries: readonly ActivityEntry[],
  limit: number = SERVER_STATS.RECENT_ACTIVITY_LIMIT
): ActivityEntry[] {
  const time = (entry: ActivityEntry): number => {
    const t = Date.parse(entry.date);
    return Number.isNaN(t) ? 0 : t;
  };
  return [...entries].sort((a, b) => time(b) - time(a)).slice(0, limit);
}

/**
 * Server-wide statistics from the session snapshot plus system info and the
 * activity log
 */
export function buildServerStats(
  sessions: readonly ClassifiedSession[],
  system: SystemInfo,
  activities: readonly ActivityEntry[]
): ServerStats {
  const active = sessions.filter(isActiveStream);

  const users = new Set<string>();
  const devices = new Set<string>();
  for (const session of sessions) {
    if (session.userName) users.add(session.userName);
    const device = session.deviceId || session.deviceName;
    if (device) devices.add(device);
  }

  const contentTypes: Record<string, number> = {};
  for (const session of active) {
    const type = session.nowPlayingType ?? UNKNOWN;
    contentTypes[type] = (contentTypes[type] ?? 0) + 1;
  }

  return {
    totalSessions: sessions.length,
    activeSessions: active.length,
    uniqueUsers: users.size,
    uniqueDevices: devices.size,
    contentTypes,
    recentActivities: recentActivities(activities),
    system,
  };
}
