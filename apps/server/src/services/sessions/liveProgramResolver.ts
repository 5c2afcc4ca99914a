/**
 * Live Program Resolution
 *
 * Resolves the program currently airing for a live TV session through a
 * fallback chain:
 *   1. the program id the session carries      → source 'program_id'
 *   2. the channel guide entry covering "now"  → source 'channel_search'
 *   3. channel-derived fields only             → source 'none'
 *
 * Lookups are cached per channel and throttled; a failed lookup skips its
 * step and is never thrown.
 */

import { LIVE_TV } from '@marquee/shared';
import type { LiveTvMedia, Program, ProgramSource } from '@marquee/shared';
import type { EmbyFetcher, EmbyProgram } from '../mediaServer/types.js';
import { compact, parseDate } from '../../utils/parsing.js';
import { errorMessage, type Logger } from '../../utils/logger.js';

export type ProgramFetcher = Pick<
  EmbyFetcher,
  'getProgram' | 'getAiringPrograms' | 'getChannel' | 'itemImageUrl'
>;

export interface LiveProgramResolverOptions {
  /** Minimum time between lookups for one channel */
  throttleMs?: number;
  logger?: Logger;
}

interface CachedLookup {
  fetchedAt: number;
  programId: string | undefined;
  program: EmbyProgram | null;
  source: ProgramSource;
  channelNumber: string | undefined;
}

/**
 * Series title of a guide entry, falling back to its name
 */
export function programSeriesName(program: EmbyProgram): string | undefined {
  return (
    program.seriesName ??
    program.seriesTitle ??
    program.programSeriesTitle ??
    program.showName ??
    program.name
  );
}

/**
 * Whether a guide entry's [start, end) window contains `now`
 */
export function programCoversTime(program: EmbyProgram, now: Date): boolean {
  const start = parseDate(program.startDate);
  const end = parseDate(program.endDate);
  if (!start || !end) return false;
  const t = now.getTime();
  return start.getTime() <= t && t < end.getTime();
}

/**
 * Duration and position from the program window.
 * Duration = end − start; position = clamp(now − start, 0, duration).
 */
export function programTiming(
  program: Pick<Program, 'startDate' | 'endDate'>,
  now: Date
): { durationSeconds: number; positionSeconds: number } | undefined {
  const start = parseDate(program.startDate);
  const end = parseDate(program.endDate);
  if (!start || !end) return undefined;

  const durationSeconds = Math.max(0, (end.getTime() - start.getTime()) / 1000);
  const elapsed = (now.getTime() - start.getTime()) / 1000;
  const positionSeconds = Math.min(durationSeconds, Math.max(0, elapsed));
  return { durationSeconds, positionSeconds };
}

export class LiveProgramResolver {
  private readonly cache = new Map<string, CachedLookup>();
  private readonly throttleMs: number;
  private readonly logger: Logger | undefined;

  constructor(
    private readonly fetcher: ProgramFetcher,
    options: LiveProgramResolverOptions = {}
  ) {
    this.throttleMs = options.throttleMs ?? LIVE_TV.GUIDE_THROTTLE_MS;
    this.logger = options.logger;
  }

  /**
   * Lookups are cached per channel; a channel item's own id stands in when
   * the session names no channel
   */
  static cacheKey(variant: LiveTvMedia): string | undefined {
    return variant.channelId ?? variant.contentId ?? variant.programId;
  }

  /**
   * Fill in `program`, duration and position for a live TV variant.
   *
   * @param embedded - CurrentProgram embedded in the now-playing item, if any
   */
  async resolve(
    variant: LiveTvMedia,
    embedded: EmbyProgram | undefined,
    now: Date
  ): Promise<LiveTvMedia> {
    const cacheKey = LiveProgramResolver.cacheKey(variant);
    let lookup = cacheKey ? this.fromCache(cacheKey, variant.programId, now) : undefined;

    if (!lookup) {
      lookup = await this.lookup(variant, embedded, now);
      if (cacheKey) this.cache.set(cacheKey, lookup);
    }

    return this.apply(variant, lookup, now);
  }

  /**
   * Drop cached lookups for channels no longer being watched
   */
  prune(activeKeys: ReadonlySet<string>): void {
    for (const key of this.cache.keys()) {
      if (!activeKeys.has(key)) this.cache.delete(key);
    }
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private fromCache(key: string, programId: string | undefined, now: Date): CachedLookup | undefined {
    const cached = this.cache.get(key);
    if (!cached) return undefined;
    if (now.getTime() - cached.fetchedAt >= this.throttleMs) return undefined;
    if (cached.programId !== programId) return undefined;
    if (cached.program && !programCoversTime(cached.program, now)) return undefined;
    return cached;
  }

  private async lookup(
    variant: LiveTvMedia,
    embedded: EmbyProgram | undefined,
    now: Date
  ): Promise<CachedLookup> {
    let program: EmbyProgram | null = null;
    let source: ProgramSource = 'none';

    const programId = variant.programId;
    if (programId) {
      program = await this.attempt('program', () => this.fetcher.getProgram(programId));
      if (program) source = 'program_id';
    }

    if (!program && embedded && programCoversTime(embedded, now)) {
      program = embedded;
      source = 'channel_search';
    }

    if (!program && variant.channelId) {
      const channelId = variant.channelId;
      const airing = await this.attempt('guide', () => this.fetcher.getAiringPrograms(channelId));
      program = airing?.find((entry) => programCoversTime(entry, now)) ?? null;
      if (program) source = 'channel_search';
    }

    let channelNumber = variant.channelNumber ?? program?.channelNumber;
    const channelId = program?.channelId ?? variant.channelId;
    if (!channelNumber && channelId) {
      const channel = await this.attempt('channel', () => this.fetcher.getChannel(channelId));
      channelNumber = channel?.number;
    }

    return { fetchedAt: now.getTime(), programId: variant.programId, program, source, channelNumber };
  }

  private async attempt<T>(step: string, fn: () => Promise<T>): Promise<T | null> {
    try {
      return await fn();
    } catch (error) {
      this.logger?.debug({ step, error: errorMessage(error) }, 'Live TV lookup failed, skipping');
      return null;
    }
  }

  private apply(variant: LiveTvMedia, lookup: CachedLookup, now: Date): LiveTvMedia {
    const { program: raw, source, channelNumber } = lookup;
    const resolved: LiveTvMedia = { ...variant, program: null };
    delete resolved.durationSeconds;
    delete resolved.positionSeconds;

    if (channelNumber) resolved.channelNumber = channelNumber;
    if (!resolved.channelId && raw?.channelId) resolved.channelId = raw.channelId;

    const imageId = raw?.id ?? variant.programId;
    const program = compact<Program>({
      id: raw?.id,
      seriesName: raw ? programSeriesName(raw) : undefined,
      overview: raw?.overview,
      startDate: raw?.startDate,
      endDate: raw?.endDate,
      imageUrl: raw && imageId ? this.fetcher.itemImageUrl(imageId) : undefined,
      channelName: variant.channelName ?? raw?.channelName,
      channelNumber: resolved.channelNumber,
      source,
    });
    resolved.program = program;

    const timing = raw ? programTiming(program, now) : undefined;
    if (timing) {
      resolved.durationSeconds = timing.durationSeconds;
      resolved.positionSeconds = timing.positionSeconds;
    }
    return resolved;
  }
}
