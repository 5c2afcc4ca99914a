/**
 * Poller Type Definitions
 */

import type {
  LibraryItem,
  LibraryListKey,
  LibraryStats,
  PollCategory,
  PollIntervals,
} from '@marquee/shared';
import type { EmbyFetcher } from '../../services/mediaServer/types.js';
import type { EntityRegistry } from '../../services/publisher.js';
import type { OptionsStore } from '../../services/options.js';
import type { SessionEngine } from '../../services/sessions/sessionEngine.js';
import type { ParentLogger } from '../../utils/logger.js';

/**
 * Collaborators the poller manager wires together
 */
export interface PollerDependencies {
  fetcher: EmbyFetcher;
  registry: EntityRegistry;
  options: OptionsStore;
  logger: ParentLogger;
  intervals: PollIntervals;
  /** Per-poll timeout in ms */
  timeoutMs?: number;
  /** Supply an engine to share its identity table elsewhere */
  engine?: SessionEngine;
  clock?: () => Date;
}

/**
 * Result of one library poll. `stats` is null when library stats are off.
 */
export interface LibraryPollResult {
  stats: LibraryStats | null;
  lists: Partial<Record<LibraryListKey, LibraryItem[]>>;
}

// Interval setting that drives each category
export const CATEGORY_INTERVAL_KEYS: Record<PollCategory, keyof PollIntervals> = {
  sessions: 'sessions',
  server_stats: 'serverStats',
  recordings: 'recordings',
  library: 'library',
};
