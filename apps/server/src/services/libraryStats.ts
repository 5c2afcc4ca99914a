/**
 * Library Stats Cache and Library Lists
 *
 * Library counts change far less often than sessions, so they are fetched on
 * a slow cadence and the last good value is kept across failures.
 */

import { LIBRARY_LISTS, TICKS_PER_SECOND } from '@marquee/shared';
import type { LibraryItem, LibraryListKey, LibraryStats } from '@marquee/shared';
import type { EmbyFetcher, EmbyLibraryItem } from './mediaServer/types.js';
import { compact, parseDate } from '../utils/parsing.js';
import { errorMessage, type Logger } from '../utils/logger.js';

export type LibraryFetcher = Pick<
  EmbyFetcher,
  'getItemCounts' | 'getLibraryViews' | 'getLibraryItems' | 'getUpcomingEpisodes' | 'itemImageUrl'
>;

/**
 * Holds the last successfully fetched library stats.
 * `lastUpdated` is the time of that fetch, not of any later publish.
 */
export class LibraryStatsCache {
  private current: LibraryStats | null = null;

  constructor(
    private readonly fetcher: Pick<LibraryFetcher, 'getItemCounts' | 'getLibraryViews'>,
    private readonly clock: () => Date = () => new Date()
  ) {}

  get value(): LibraryStats | null {
    return this.current;
  }

  /**
   * Fetch counts and views. On failure the cached value is kept and the
   * error is rethrown for the poller to record.
   */
  async refresh(): Promise<LibraryStats> {
    const fetchedAt = this.clock();
    const [counts, views] = await Promise.all([
      this.fetcher.getItemCounts(),
      this.fetcher.getLibraryViews(),
    ]);

    this.current = {
      libraryCount: views.length,
      libraries: views.map((v) => v.name),
      counts: {
        movies: counts.movieCount,
        series: counts.seriesCount,
        episodes: counts.episodeCount,
        songs: counts.songCount,
        books: counts.bookCount,
        audiobooks: counts.audioBookCount,
        trailers: counts.trailerCount,
        boxsets: counts.boxSetCount,
        playlists: counts.playlistCount,
      },
      lastUpdated: fetchedAt.toISOString(),
    };
    return this.current;
  }
}

// ============================================================================
// Library Lists
// ============================================================================

function runtimeSeconds(ticks: number | undefined): number | undefined {
  return ticks === undefined ? undefined : Math.trunc(ticks / TICKS_PER_SECOND);
}

/**
 * Normalize a movie for the latest-movies list; empty values are dropped
 */
export function normalizeMovie(item: EmbyLibraryItem, imageUrl: (id: string) => string): LibraryItem {
  return compact<LibraryItem>({
    id: item.id,
    title: item.name,
    premiereDate: item.premiereDate,
    runtimeSeconds: runtimeSeconds(item.runTimeTicks),
    rating: item.communityRating,
    imdbId: item.imdbId,
    genres: item.genres,
    tagline: item.tagline ?? item.originalTitle,
    resolutionHeight: item.videoHeight,
    imageUrl: item.id ? imageUrl(item.id) : undefined,
  });
}

/**
 * Normalize an episode for the latest/upcoming lists; empty values are dropped
 */
export function normalizeEpisode(item: EmbyLibraryItem, imageUrl: (id: string) => string): LibraryItem {
  return compact<LibraryItem>({
    id: item.id,
    title: item.name,
    series: item.seriesName,
    season: item.seasonNumber,
    episode: item.episodeNumber,
    premiereDate: item.premiereDate,
    runtimeSeconds: runtimeSeconds(item.runTimeTicks),
    imageUrl: item.id ? imageUrl(item.id) : undefined,
  });
}

/**
 * Only future premieres, earliest first, truncated
 */
export function selectUpcoming(
  items: readonly EmbyLibraryItem[],
  now: Date,
  limit: number = LIBRARY_LISTS.LIMIT
): EmbyLibraryItem[] {
  const withDates = items.flatMap((item) => {
    const premiere = parseDate(item.premiereDate);
    return premiere && premiere >= now ? [{ item, time: premiere.getTime() }] : [];
  });
  return withDates
    .sort((a, b) => a.time - b.time)
    .slice(0, limit)
    .map(({ item }) => item);
}

export type LibraryLists = Record<LibraryListKey, LibraryItem[]>;

export const LIBRARY_LIST_KEYS: readonly LibraryListKey[] = [
  'latest_movies',
  'latest_episodes',
  'upcoming_episodes',
];

/**
 * Fetch the enabled lists. A list that fails to load is empty; the others
 * are unaffected.
 */
export async function fetchLibraryLists(
  fetcher: LibraryFetcher,
  enabled: Record<LibraryListKey, boolean>,
  now: Date,
  logger?: Logger
): Promise<Partial<LibraryLists>> {
  const limit = LIBRARY_LISTS.LIMIT;
  const imageUrl = (id: string): string => fetcher.itemImageUrl(id);

  const loaders: Record<LibraryListKey, () => Promise<LibraryItem[]>> = {
    latest_movies: async () =>
      (
        await fetcher.getLibraryItems({
          includeTypes: 'Movie',
          sortBy: 'DateCreated',
          sortOrder: 'Descending',
          limit: limit * 2,
        })
      )
        .slice(0, limit)
        .map((item) => normalizeMovie(item, imageUrl)),
    latest_episodes: async () =>
      (
        await fetcher.getLibraryItems({
          includeTypes: 'Episode',
          sortBy: 'DateCreated',
          sortOrder: 'Descending',
          limit: limit * 2,
        })
      )
        .slice(0, limit)
        .map((item) => normalizeEpisode(item, imageUrl)),
    upcoming_episodes: async () =>
      selectUpcoming(await fetcher.getUpcomingEpisodes(limit * 8), now, limit).map((item) =>
        normalizeEpisode(item, imageUrl)
      ),
  };

  const result: Partial<LibraryLists> = {};
  const keys = LIBRARY_LIST_KEYS.filter((key) => enabled[key]);
  await Promise.all(
    keys.map(async (key) => {
      try {
        result[key] = await loaders[key]();
      } catch (error) {
        logger?.warn({ list: key, error: errorMessage(error) }, 'Library list failed to load');
        result[key] = [];
      }
    })
  );
  return result;
}
