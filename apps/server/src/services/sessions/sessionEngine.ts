/**
 * Session Engine
 *
 * Runs one session poll's payload through classification, live program
 * resolution, identity reconciliation and aggregation. Classification of the
 * whole poll completes before aggregation sees it.
 *
 * Preparing a snapshot leaves the key table alone; only a committed snapshot
 * becomes the current state, so an abandoned poll changes nothing.
 */

import type { ClassifiedSession, SessionAggregates } from '@marquee/shared';
import type { EmbyFetcher, EmbySession } from '../mediaServer/types.js';
import type { Logger } from '../../utils/logger.js';
import {
  classifyMedia,
  derivePlaybackState,
  variantPlaybackPercent,
} from './mediaClassifier.js';
import { analyzeTranscode, estimateBitrates, extractStreamInfo } from './transcodeAnalyzer.js';
import { LiveProgramResolver } from './liveProgramResolver.js';
import { SessionIdentityManager } from './identityManager.js';
import { aggregateSessions } from './aggregation.js';

export type UnkeyedSession = Omit<ClassifiedSession, 'key'>;

export type SessionEngineFetcher = Pick<
  EmbyFetcher,
  'getProgram' | 'getAiringPrograms' | 'getChannel' | 'itemImageUrl' | 'userImageUrl'
>;

export interface SessionSnapshot {
  sessions: ClassifiedSession[];
  aggregates: SessionAggregates;
  created: string[];
  retained: string[];
  removed: string[];
  observedAt: string;
  /** Live TV channels watched in this poll, kept in the guide cache */
  watchedChannels: string[];
}

/**
 * Classify one session without touching the network.
 * Live TV sessions come back with `program: null`.
 */
export function classifySession(
  session: EmbySession,
  fetcher: Pick<EmbyFetcher, 'itemImageUrl' | 'userImageUrl'>,
  now: Date
): UnkeyedSession {
  const variant = classifyMedia(session, (id) => fetcher.itemImageUrl(id));
  const stream = extractStreamInfo(session);
  const { videoBps, audioBps } = estimateBitrates(session, stream);

  const classified: UnkeyedSession = {
    sessionId: session.id,
    deviceId: session.deviceId ?? '',
    deviceName: session.deviceName ?? session.client ?? 'Emby Client',
    appName: session.client ?? 'Emby',
    state: derivePlaybackState(session),
    variant,
    transcode: analyzeTranscode(session),
    stream,
    videoBitrateBps: videoBps,
    audioBitrateBps: audioBps,
  };

  if (session.userId) {
    classified.userId = session.userId;
    classified.userImageUrl = fetcher.userImageUrl(session.userId);
  }
  if (session.userName) classified.userName = session.userName;
  if (session.nowPlayingItem?.type) classified.nowPlayingType = session.nowPlayingItem.type;

  const percent = variantPlaybackPercent(variant);
  if (percent !== undefined) classified.playbackPercent = percent;
  if (variant.kind !== 'none' && variant.positionSeconds !== undefined) {
    classified.positionUpdatedAt = now.toISOString();
  }

  return classified;
}

export class SessionEngine {
  readonly identity = new SessionIdentityManager();
  private readonly resolver: LiveProgramResolver;
  private latest: ClassifiedSession[] = [];

  constructor(
    private readonly fetcher: SessionEngineFetcher,
    options: { logger?: Logger; guideThrottleMs?: number } = {}
  ) {
    this.resolver = new LiveProgramResolver(fetcher, {
      logger: options.logger,
      throttleMs: options.guideThrottleMs,
    });
  }

  /**
   * Sessions from the last processed poll
   */
  get sessions(): readonly ClassifiedSession[] {
    return this.latest;
  }

  /**
   * Prepare and commit one poll
   */
  async process(raw: readonly EmbySession[], now: Date = new Date()): Promise<SessionSnapshot> {
    const snapshot = await this.prepare(raw, now);
    this.commit(snapshot);
    return snapshot;
  }

  /**
   * Build a snapshot against the current key table without changing it
   */
  async prepare(raw: readonly EmbySession[], now: Date = new Date()): Promise<SessionSnapshot> {
    const watchedChannels = new Set<string>();
    const classified = await Promise.all(
      raw.map((session) => this.classifyAndResolve(session, now, watchedChannels))
    );

    const { sessions, created, retained, removed } = this.identity.plan(classified);

    return {
      sessions,
      aggregates: aggregateSessions(sessions),
      created,
      retained,
      removed,
      observedAt: now.toISOString(),
      watchedChannels: [...watchedChannels],
    };
  }

  /**
   * Make a prepared snapshot the current state
   */
  commit(snapshot: SessionSnapshot): void {
    this.identity.commit(snapshot);
    this.resolver.prune(new Set(snapshot.watchedChannels));
    this.latest = snapshot.sessions;
  }

  private async classifyAndResolve(
    session: EmbySession,
    now: Date,
    watchedChannels: Set<string>
  ): Promise<UnkeyedSession> {
    const classified = classifySession(session, this.fetcher, now);
    if (classified.variant.kind !== 'live_tv') return classified;

    const cacheKey = LiveProgramResolver.cacheKey(classified.variant);
    if (cacheKey) watchedChannels.add(cacheKey);

    const variant = await this.resolver.resolve(
      classified.variant,
      session.nowPlayingItem?.currentProgram,
      now
    );
    const resolved: UnkeyedSession = { ...classified, variant };
    delete resolved.playbackPercent;
    delete resolved.positionUpdatedAt;

    const percent = variantPlaybackPercent(variant);
    if (percent !== undefined) resolved.playbackPercent = percent;
    if (variant.positionSeconds !== undefined) resolved.positionUpdatedAt = now.toISOString();
    return resolved;
  }
}
