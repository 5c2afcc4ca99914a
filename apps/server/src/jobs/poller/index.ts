/**
 * Poller Module
 *
 * One polling loop per data category (sessions, server stats, recordings,
 * library), each publishing into the entity registry.
 *
 * @example
 * import { PollerManager } from './jobs/poller/index.js';
 *
 * const pollers = new PollerManager({ fetcher, registry, options, logger, intervals });
 * pollers.start();
 *
 * // Re-read sessions right after a playback command
 * await pollers.triggerPoll();
 *
 * pollers.stop();
 */

export { PollerManager, POLL_CATEGORIES } from './processor.js';
export { CategoryPoller } from './categoryPoller.js';
export type { CategoryPollerOptions } from './categoryPoller.js';
export type { PollerDependencies, LibraryPollResult } from './types.js';
export { CATEGORY_KINDS, KIND_OPTIONS, sessionEntity } from './entities.js';
export type { EntityUpdate, AggregateKind } from './entities.js';
