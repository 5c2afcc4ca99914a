/**
 * Emby Media Server Client
 *
 * Implements EmbyFetcher over the Emby REST API.
 * Every call resolves to a typed payload or rejects with a TransportError.
 */

import { LIBRARY_LISTS, POLL_LIMITS, SESSION_LIMITS, TICKS_PER_SECOND } from '@marquee/shared';
import type { PlaybackCommand } from '@marquee/shared';
import { fetchJson, postEmpty, embyHeaders } from '../../../utils/http.js';
import { getNestedObject, isRecord, parseBoolean, parseItems, parseOptionalString } from '../../../utils/parsing.js';
import { TransportError, isTransportError } from '../../../utils/errors.js';
import type {
  EmbyActiveRecording,
  EmbyActivityEntry,
  EmbyChannel,
  EmbyFetcher,
  EmbyItemCounts,
  EmbyLibraryItem,
  EmbyLibraryView,
  EmbyProgram,
  EmbySeriesTimer,
  EmbyServerConfig,
  EmbySession,
  EmbySystemInfo,
  EmbyTimer,
  LibraryItemQuery,
} from '../types.js';
import {
  parseActiveRecordingsResponse,
  parseActivityLogResponse,
  parseChannel,
  parseItemCounts,
  parseLibraryItemsResponse,
  parseLibraryViewsResponse,
  parseProgram,
  parseProgramsResponse,
  parseSeriesTimersResponse,
  parseSessionsResponse,
  parseSystemInfo,
  parseTimersResponse,
} from './parser.js';

const CLIENT_NAME = 'Marquee';
const CLIENT_VERSION = '0.1.0';
const DEVICE_ID = 'marquee-server';
const DEVICE_NAME = 'Marquee Server';

const PROGRAM_FIELDS =
  'Overview,Genres,StartDate,EndDate,SeriesName,SeasonNumber,EpisodeNumber,ChannelName,ChannelNumber';
const LIBRARY_ITEM_FIELDS =
  'PremiereDate,ReleaseDate,DateCreated,SeriesName,RunTimeTicks,Genres,Taglines,OriginalTitle,' +
  'MediaStreams,ProviderIds,IndexNumber,ParentIndexNumber';
const UPCOMING_FIELDS = 'PremiereDate,SeriesName,RunTimeTicks,IndexNumber,ParentIndexNumber';
const NON_MEDIA_TYPES = 'CollectionFolder,Folder,Playlist,BoxSet';

const PLAYSTATE_PATHS = {
  play: 'Unpause',
  pause: 'Pause',
  stop: 'Stop',
  seek: 'Seek',
} as const satisfies Record<PlaybackCommand['type'], string>;

/**
 * Build the base URL from host/port/ssl. A host that already carries a
 * scheme is used as-is apart from the port.
 */
export function buildBaseUrl(config: Pick<EmbyServerConfig, 'host' | 'port' | 'useSsl'>): string {
  const host = config.host.replace(/\/+$/, '');
  if (/^https?:\/\//i.test(host)) return `${host}:${config.port}`;
  return `${config.useSsl ? 'https' : 'http'}://${host}:${config.port}`;
}

/**
 * Emby Media Server client implementation
 *
 * @example
 * const client = new EmbyClient({ host: 'emby.local', port: 8096, useSsl: false, apiKey: 'xxx' });
 * const sessions = await client.getSessions();
 */
export class EmbyClient implements EmbyFetcher {
  public readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private userId: string | null = null;

  constructor(config: EmbyServerConfig) {
    this.baseUrl = buildBaseUrl(config);
    this.apiKey = config.apiKey;
    this.timeoutMs = config.timeoutMs ?? POLL_LIMITS.TIMEOUT_MS;
  }

  /**
   * Build X-Emby-Authorization header value
   * Format: MediaBrowser Client="...", Device="...", DeviceId="...", Version="...", Token="..."
   */
  private buildAuthHeader(): string {
    return `MediaBrowser Client="${CLIENT_NAME}", Device="${DEVICE_NAME}", DeviceId="${DEVICE_ID}", Version="${CLIENT_VERSION}", Token="${this.apiKey}"`;
  }

  private buildHeaders(): Record<string, string> {
    return {
      'X-Emby-Authorization': this.buildAuthHeader(),
      ...embyHeaders(this.apiKey),
    };
  }

  private get(path: string): Promise<unknown> {
    return fetchJson(`${this.baseUrl}${path}`, {
      headers: this.buildHeaders(),
      timeout: this.timeoutMs,
    });
  }

  /**
   * Resolve the user id used for user-scoped queries:
   * /Users/Me, else the first administrator from /Users, else the first user.
   * Cached after the first success.
   */
  async getUserId(): Promise<string | null> {
    if (this.userId) return this.userId;

    try {
      const me = await this.get('/Users/Me');
      const id = isRecord(me) ? parseOptionalString(me.Id) : undefined;
      if (id) {
        this.userId = id;
        return id;
      }
    } catch (error) {
      // An API key has no current user; fall through to the user list
      if (!isTransportError(error) || error.kind === 'unauthorized' || error.kind === 'timeout') {
        throw error;
      }
    }

    const users = parseItems(await this.get('/Users'));
    const admin = users.find((u) => parseBoolean(getNestedObject(u, 'Policy')?.IsAdministrator));
    const id = parseOptionalString((admin ?? users[0])?.Id);
    if (id) this.userId = id;
    return id ?? null;
  }

  private userQuery(userId: string | null): string {
    return userId ? `&UserId=${encodeURIComponent(userId)}` : '';
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  /**
   * Get all sessions active within the last day, idle ones included.
   * Some servers only list the caller's own session for an API key; when at
   * most one comes back the query is repeated scoped to a controllable user
   * and the larger set is kept.
   */
  async getSessions(): Promise<EmbySession[]> {
    const params = new URLSearchParams({
      IncludeDeviceInformation: 'true',
      IncludePlaybackState: 'true',
      ExcludeInactive: 'false',
      ActiveWithinSeconds: String(SESSION_LIMITS.ACTIVE_WITHIN_SECONDS),
    });
    const sessions = await this.getSessionList(params);
    if (sessions.length > 1) return sessions;

    const userId = await this.getUserId();
    if (!userId) return sessions;

    params.set('ControllableByUserId', userId);
    const controllable = await this.getSessionList(params);
    return controllable.length > sessions.length ? controllable : sessions;
  }

  private async getSessionList(params: URLSearchParams): Promise<EmbySession[]> {
    const path = `/Sessions?${params}`;
    const data = await this.get(path);
    if (!Array.isArray(data)) {
      throw new TransportError('malformed', 'sessions response was not a list', {
        url: `${this.baseUrl}${path}`,
      });
    }
    return parseSessionsResponse(data);
  }

  // ==========================================================================
  // Live TV
  // ==========================================================================

  async getProgram(programId: string): Promise<EmbyProgram | null> {
    const userQ = this.userQuery(await this.getUserId());
    const data = await this.get(
      `/LiveTv/Programs/${encodeURIComponent(programId)}?Fields=${PROGRAM_FIELDS}${userQ}`
    );
    return parseProgram(data);
  }

  /**
   * Programs currently airing on a channel. Falls back to the per-channel
   * listing when the guide query returns nothing.
   */
  async getAiringPrograms(channelId: string): Promise<EmbyProgram[]> {
    const userQ = this.userQuery(await this.getUserId());
    const channel = encodeURIComponent(channelId);

    const programs = parseProgramsResponse(
      await this.get(`/LiveTv/Programs?ChannelIds=${channel}&IsAiring=true&Fields=${PROGRAM_FIELDS}${userQ}`)
    );
    if (programs.length > 0) return programs;

    return parseProgramsResponse(
      await this.get(`/LiveTv/Channels/${channel}/Programs?IsAiring=true&Fields=${PROGRAM_FIELDS}${userQ}`)
    );
  }

  async getChannel(channelId: string): Promise<EmbyChannel | null> {
    return parseChannel(await this.get(`/LiveTv/Channels/${encodeURIComponent(channelId)}`));
  }

  // ==========================================================================
  // Server
  // ==========================================================================

  async getSystemInfo(): Promise<EmbySystemInfo> {
    return parseSystemInfo(await this.get('/System/Info'));
  }

  async getActivityLog(limit: number): Promise<EmbyActivityEntry[]> {
    return parseActivityLogResponse(await this.get(`/System/ActivityLog/Entries?Limit=${limit}`));
  }

  // ==========================================================================
  // Recordings
  // ==========================================================================

  async getTimers(): Promise<EmbyTimer[]> {
    const userQ = this.userQuery(await this.getUserId());
    return parseTimersResponse(await this.get(`/LiveTv/Timers?Fields=${PROGRAM_FIELDS}${userQ}`));
  }

  async getActiveRecordings(): Promise<EmbyActiveRecording[]> {
    return parseActiveRecordingsResponse(await this.get('/LiveTv/Recordings/Active'));
  }

  async getSeriesTimers(): Promise<EmbySeriesTimer[]> {
    return parseSeriesTimersResponse(await this.get('/LiveTv/SeriesTimers'));
  }

  // ==========================================================================
  // Library
  // ==========================================================================

  async getItemCounts(): Promise<EmbyItemCounts> {
    const counts = parseItemCounts(await this.get('/Items/Counts'));
    if (!counts) {
      throw new TransportError('malformed', 'item counts response carried no counts', {
        url: `${this.baseUrl}/Items/Counts`,
      });
    }
    return counts;
  }

  async getLibraryViews(): Promise<EmbyLibraryView[]> {
    const userId = await this.getUserId();
    if (!userId) return [];
    return parseLibraryViewsResponse(await this.get(`/Users/${encodeURIComponent(userId)}/Views`));
  }

  /**
   * Generic /Users/{uid}/Items query limited to real media (no folders)
   */
  async getLibraryItems(query: LibraryItemQuery): Promise<EmbyLibraryItem[]> {
    const userId = await this.getUserId();
    if (!userId) return [];

    const params = new URLSearchParams({
      IncludeItemTypes: query.includeTypes,
      SortBy: query.sortBy,
      SortOrder: query.sortOrder,
      Limit: String(query.limit),
      Fields: LIBRARY_ITEM_FIELDS,
      Recursive: 'true',
      ExcludeItemTypes: NON_MEDIA_TYPES,
      ...query.extra,
    });
    return parseLibraryItemsResponse(
      await this.get(`/Users/${encodeURIComponent(userId)}/Items?${params}`)
    );
  }

  /**
   * Upcoming episodes from /Shows/Upcoming; when the schedule is empty,
   * unaired episodes premiering within the horizon.
   */
  async getUpcomingEpisodes(limit: number): Promise<EmbyLibraryItem[]> {
    const userId = await this.getUserId();
    if (!userId) return [];

    const upcoming = parseLibraryItemsResponse(
      await this.get(
        `/Shows/Upcoming?UserId=${encodeURIComponent(userId)}&Limit=${limit}&Fields=${UPCOMING_FIELDS}`
      )
    );
    if (upcoming.length > 0) return upcoming;

    const now = new Date();
    const horizon = new Date(now.getTime() + LIBRARY_LISTS.UPCOMING_HORIZON_DAYS * 86_400_000);
    return this.getLibraryItems({
      includeTypes: 'Episode',
      sortBy: 'PremiereDate',
      sortOrder: 'Ascending',
      limit,
      extra: {
        MinPremiereDate: now.toISOString(),
        MaxPremiereDate: horizon.toISOString(),
        IsUnaired: 'true',
      },
    });
  }

  // ==========================================================================
  // Playback Commands
  // ==========================================================================

  async sendPlaystate(sessionId: string, command: PlaybackCommand): Promise<void> {
    let path = `/Sessions/${encodeURIComponent(sessionId)}/Playing/${PLAYSTATE_PATHS[command.type]}`;
    if (command.type === 'seek') {
      path += `?PositionTicks=${Math.trunc(command.position * TICKS_PER_SECOND)}`;
    }
    await postEmpty(`${this.baseUrl}${path}`, {
      headers: this.buildHeaders(),
      timeout: this.timeoutMs,
    });
  }

  // ==========================================================================
  // Images
  // ==========================================================================

  itemImageUrl(itemId: string): string {
    return `${this.baseUrl}/Items/${itemId}/Images/Primary?api_key=${this.apiKey}`;
  }

  userImageUrl(userId: string): string {
    return `${this.baseUrl}/Users/${userId}/Images/Primary?api_key=${this.apiKey}`;
  }
}
