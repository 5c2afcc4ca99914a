/**
 * Poller Processor
 *
 * Builds one CategoryPoller per data category and routes each result into
 * the entity registry. Categories are independent: each has its own timer,
 * timeout and failure count.
 *
 * Toggles decide what is published. Turning a toggle off removes its entity
 * at once; a category with nothing left to publish stops polling.
 */

import { SERVER_STATS } from '@marquee/shared';
import type {
  ActivityEntry,
  EntityKind,
  PollCategory,
  PollerStatus,
  RecordingsSnapshot,
  ServerStats,
  SystemInfo,
} from '@marquee/shared';
import type {
  EmbyActivityEntry,
  EmbyFetcher,
  EmbySystemInfo,
} from '../../services/mediaServer/types.js';
import type { EntityRegistry } from '../../services/publisher.js';
import type { OptionsChange, OptionsStore } from '../../services/options.js';
import { SessionEngine, type SessionSnapshot } from '../../services/sessions/sessionEngine.js';
import { buildServerStats } from '../../services/sessions/aggregation.js';
import { fetchRecordings } from '../../services/recordings.js';
import {
  LIBRARY_LIST_KEYS,
  LibraryStatsCache,
  fetchLibraryLists,
} from '../../services/libraryStats.js';
import { compact } from '../../utils/parsing.js';
import type { Logger, ParentLogger } from '../../utils/logger.js';
import { CategoryPoller } from './categoryPoller.js';
import {
  CATEGORY_KINDS,
  KIND_OPTIONS,
  activeStreamsEntity,
  bandwidthEntity,
  libraryListEntity,
  libraryStatsEntity,
  multisessionEntity,
  recordingsEntity,
  serverStatsEntity,
  sessionEntity,
  transcodingEntity,
  type EntityUpdate,
} from './entities.js';
import { CATEGORY_INTERVAL_KEYS, type LibraryPollResult, type PollerDependencies } from './types.js';

export const POLL_CATEGORIES: readonly PollCategory[] = [
  'sessions',
  'server_stats',
  'recordings',
  'library',
];

// The lifecycle surface shared by every category's poller
type ManagedPoller = Pick<
  CategoryPoller<unknown>,
  'category' | 'status' | 'isRunning' | 'start' | 'stop' | 'runOnce'
>;

function toSystemInfo(info: EmbySystemInfo): SystemInfo {
  return compact<SystemInfo>({
    serverName: info.serverName,
    version: info.version,
    operatingSystem: info.operatingSystem,
    architecture: info.architecture,
  });
}

function toActivityEntry(entry: EmbyActivityEntry): ActivityEntry {
  return compact<ActivityEntry>({
    id: entry.id,
    date: entry.date,
    name: entry.name,
    type: entry.type,
    user: entry.userName,
  });
}

export class PollerManager {
  readonly engine: SessionEngine;
  private readonly libraryStats: LibraryStatsCache;
  private readonly fetcher: EmbyFetcher;
  private readonly registry: EntityRegistry;
  private readonly options: OptionsStore;
  private readonly logger: ParentLogger;
  private readonly clock: () => Date;

  private readonly sessionsPoller: CategoryPoller<SessionSnapshot>;
  private readonly pollers: Record<PollCategory, ManagedPoller>;
  private readonly statusListeners = new Set<(status: PollerStatus) => void>();
  private unsubscribeOptions: (() => void) | null = null;

  constructor(deps: PollerDependencies) {
    this.fetcher = deps.fetcher;
    this.registry = deps.registry;
    this.options = deps.options;
    this.logger = deps.logger;
    this.clock = deps.clock ?? (() => new Date());

    const loggers: Record<PollCategory, Logger> = {
      sessions: deps.logger.child({ category: 'sessions' }),
      server_stats: deps.logger.child({ category: 'server_stats' }),
      recordings: deps.logger.child({ category: 'recordings' }),
      library: deps.logger.child({ category: 'library' }),
    };

    this.engine = deps.engine ?? new SessionEngine(deps.fetcher, { logger: loggers.sessions });
    this.libraryStats = new LibraryStatsCache(deps.fetcher, this.clock);

    const common = (category: PollCategory) => ({
      category,
      intervalMs: deps.intervals[CATEGORY_INTERVAL_KEYS[category]],
      timeoutMs: deps.timeoutMs,
      logger: loggers[category],
      clock: this.clock,
      onUnavailable: () => this.markUnavailable(category),
      onStatus: (status: PollerStatus) => this.emitStatus(status),
    });

    this.sessionsPoller = new CategoryPoller<SessionSnapshot>({
      ...common('sessions'),
      poll: async () => this.engine.prepare(await this.fetcher.getSessions(), this.clock()),
      onSuccess: (snapshot) => {
        this.engine.commit(snapshot);
        this.publishSessions(snapshot);
      },
    });

    this.pollers = {
      sessions: this.sessionsPoller,
      server_stats: new CategoryPoller<ServerStats>({
        ...common('server_stats'),
        poll: () => this.pollServerStats(),
        onSuccess: (stats) => this.publish(serverStatsEntity(stats)),
      }),
      recordings: new CategoryPoller<RecordingsSnapshot>({
        ...common('recordings'),
        poll: () => fetchRecordings(this.fetcher, this.clock(), loggers.recordings),
        onSuccess: (snapshot) => this.publish(recordingsEntity(snapshot)),
      }),
      library: new CategoryPoller<LibraryPollResult>({
        ...common('library'),
        poll: () => this.pollLibrary(loggers.library),
        onSuccess: (result) => this.publishLibrary(result),
      }),
    };
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  start(): void {
    if (this.unsubscribeOptions) return;
    this.unsubscribeOptions = this.options.onChange((change) => this.applyOptions(change));

    for (const category of POLL_CATEGORIES) {
      if (this.isCategoryEnabled(category)) {
        this.pollers[category].start();
      } else {
        this.logger.info({ category }, 'Category disabled, not polling');
      }
    }
  }

  stop(): void {
    this.unsubscribeOptions?.();
    this.unsubscribeOptions = null;
    for (const category of POLL_CATEGORIES) {
      this.pollers[category].stop();
    }
  }

  /**
   * Poll sessions now, outside the regular cadence
   */
  triggerPoll(): Promise<void> {
    return this.sessionsPoller.runOnce();
  }

  statuses(): PollerStatus[] {
    return POLL_CATEGORIES.map((category) => this.pollers[category].status);
  }

  onStatus(listener: (status: PollerStatus) => void): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  private emitStatus(status: PollerStatus): void {
    for (const listener of this.statusListeners) {
      listener(status);
    }
  }

  // ==========================================================================
  // Toggles
  // ==========================================================================

  private isKindEnabled(kind: EntityKind): boolean {
    return kind === 'session' || this.options.isEnabled(KIND_OPTIONS[kind]);
  }

  private isCategoryEnabled(category: PollCategory): boolean {
    if (category === 'sessions') return true;
    return CATEGORY_KINDS[category].some((kind) => this.isKindEnabled(kind));
  }

  private applyOptions({ options, changed }: OptionsChange): void {
    for (const category of POLL_CATEGORIES) {
      const touched = CATEGORY_KINDS[category].filter(
        (kind) => kind !== 'session' && changed.includes(KIND_OPTIONS[kind])
      );
      if (touched.length === 0) continue;

      for (const kind of touched) {
        if (kind !== 'session' && !options[KIND_OPTIONS[kind]]) {
          this.registry.removeKind(kind);
        }
      }

      const poller = this.pollers[category];
      if (!this.isCategoryEnabled(category)) {
        if (poller.isRunning) poller.stop();
      } else if (poller.isRunning) {
        void poller.runOnce();
      } else {
        poller.start();
      }
    }
  }

  // ==========================================================================
  // Polls
  // ==========================================================================

  private async pollServerStats(): Promise<ServerStats> {
    const [system, activity] = await Promise.all([
      this.fetcher.getSystemInfo(),
      this.fetcher.getActivityLog(SERVER_STATS.ACTIVITY_FETCH_LIMIT),
    ]);
    return buildServerStats(this.engine.sessions, toSystemInfo(system), activity.map(toActivityEntry));
  }

  private async pollLibrary(logger: Logger): Promise<LibraryPollResult> {
    const now = this.clock();
    const stats = this.isKindEnabled('library_stats') ? await this.libraryStats.refresh() : null;
    const lists = await fetchLibraryLists(
      this.fetcher,
      {
        latest_movies: this.isKindEnabled('latest_movies'),
        latest_episodes: this.isKindEnabled('latest_episodes'),
        upcoming_episodes: this.isKindEnabled('upcoming_episodes'),
      },
      now,
      logger
    );
    return { stats, lists };
  }

  // ==========================================================================
  // Publishing
  // ==========================================================================

  private publish(update: EntityUpdate): void {
    if (!this.isKindEnabled(update.kind)) return;
    this.registry.publish(update.kind, update.key, update.state, update.attributes);
  }

  private publishSessions(snapshot: SessionSnapshot): void {
    const current = new Set(snapshot.sessions.map((s) => s.key));
    for (const key of this.registry.keysOf('session')) {
      if (!current.has(key)) this.registry.remove('session', key);
    }
    for (const session of snapshot.sessions) {
      this.publish(sessionEntity(session));
    }

    const { aggregates } = snapshot;
    this.publish(activeStreamsEntity(aggregates.activeStreams));
    this.publish(bandwidthEntity(aggregates.bandwidth));
    this.publish(transcodingEntity(aggregates.transcoding));
    this.publish(multisessionEntity(aggregates.multisessionUsers));
  }

  private publishLibrary({ stats, lists }: LibraryPollResult): void {
    if (stats) this.publish(libraryStatsEntity(stats));
    for (const key of LIBRARY_LIST_KEYS) {
      const items = lists[key];
      if (items) this.publish(libraryListEntity(key, items));
    }
  }

  private markUnavailable(category: PollCategory): void {
    for (const kind of CATEGORY_KINDS[category]) {
      for (const key of this.registry.keysOf(kind)) {
        this.registry.markUnavailable(kind, key);
      }
    }
  }
}
