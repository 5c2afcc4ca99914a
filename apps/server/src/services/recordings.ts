/**
 * Recordings Tracker
 *
 * Shapes timers, in-progress recordings and series timers into the
 * recordings snapshot. The three sources are fetched independently.
 */

import type { Recording, RecordingsSnapshot, SeriesRecording } from '@marquee/shared';
import type {
  EmbyActiveRecording,
  EmbyFetcher,
  EmbySeriesTimer,
  EmbyTimer,
} from './mediaServer/types.js';
import { compact, parseDate } from '../utils/parsing.js';
import { isTransportError } from '../utils/errors.js';
import { errorMessage, type Logger } from '../utils/logger.js';

const ACTIVE_STATUSES = new Set(['inprogress', 'recording']);

export type RecordingsFetcher = Pick<
  EmbyFetcher,
  'getTimers' | 'getActiveRecordings' | 'getSeriesTimers'
>;

/**
 * Split timers into active and scheduled recordings.
 *
 * A timer is active when its status says so or now falls within its window;
 * scheduled when it starts in the future. Finished timers are dropped.
 * Program info on the timer takes precedence over the timer's own fields.
 */
export function buildRecordings(
  timers: readonly EmbyTimer[],
  activeRecordings: readonly EmbyActiveRecording[],
  seriesTimers: readonly EmbySeriesTimer[],
  now: Date
): RecordingsSnapshot {
  const active: Recording[] = [];
  const scheduled: Recording[] = [];

  for (const timer of timers) {
    const program = timer.program;
    const startDate = program ? program.startDate : timer.startDate;
    const endDate = program ? program.endDate : timer.endDate;
    const start = parseDate(startDate);
    const end = parseDate(endDate);

    const inWindow = !!start && !!end && start <= now && now <= end;
    const isActive = ACTIVE_STATUSES.has(timer.status?.toLowerCase() ?? '') || inWindow;
    const isScheduled = !isActive && !!start && start > now;
    if (!isActive && !isScheduled) continue;

    const recording = compact<Recording>({
      kind: isActive ? 'active' : 'scheduled',
      name: (program ? program.name : timer.name) ?? '',
      channel: (program ? program.channelName : timer.channelName) ?? '',
      startDate,
      endDate,
    });
    (isActive ? active : scheduled).push(recording);
  }

  const activeNames = new Set(active.map((r) => r.name));
  for (const item of activeRecordings) {
    if (activeNames.has(item.name)) continue;
    activeNames.add(item.name);
    active.push(
      compact<Recording>({
        kind: 'active',
        name: item.name,
        channel: item.channel,
        startDate: item.startDate,
        endDate: item.endDate,
      })
    );
  }

  const series: SeriesRecording[] = seriesTimers.map((timer) => ({
    name: timer.name,
    channel: timer.channel,
    recordAnyTime: timer.recordAnyTime,
    recordAnyChannel: timer.recordAnyChannel,
  }));

  return { active, scheduled, series };
}

/**
 * Fetch all three sources and build the snapshot.
 *
 * One source failing leaves its part empty. A rejected API key, or every
 * source failing, rejects the whole fetch so the poller can act on it.
 */
export async function fetchRecordings(
  fetcher: RecordingsFetcher,
  now: Date,
  logger?: Logger
): Promise<RecordingsSnapshot> {
  const [timers, active, series] = await Promise.allSettled([
    fetcher.getTimers(),
    fetcher.getActiveRecordings(),
    fetcher.getSeriesTimers(),
  ]);

  const failures: unknown[] = [];
  const valueOf = <T>(result: PromiseSettledResult<T[]>, source: string): T[] => {
    if (result.status === 'fulfilled') return result.value;
    failures.push(result.reason);
    logger?.warn({ source, error: errorMessage(result.reason) }, 'Recordings source failed');
    return [];
  };

  const snapshot = buildRecordings(
    valueOf(timers, 'timers'),
    valueOf(active, 'active'),
    valueOf(series, 'series'),
    now
  );

  const fatal = failures.find((error) => isTransportError(error) && error.isFatal);
  if (fatal) throw fatal;
  if (failures.length === 3) throw failures[0];

  return snapshot;
}
