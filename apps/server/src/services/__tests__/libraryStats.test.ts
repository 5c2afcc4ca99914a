/**
 * Library Stats and Lists Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  LibraryStatsCache,
  fetchLibraryLists,
  normalizeEpisode,
  normalizeMovie,
  selectUpcoming,
} from '../libraryStats.js';
import { TransportError } from '../../utils/errors.js';
import { createMockFetcher, createTestLogger, itemImageUrl } from '../../test/fixtures.js';

const NOW = new Date('2026-03-01T12:00:00Z');

const COUNTS = {
  movieCount: 120,
  seriesCount: 14,
  episodeCount: 610,
  songCount: 0,
  bookCount: 2,
  audioBookCount: 0,
  trailerCount: 3,
  boxSetCount: 4,
  playlistCount: 1,
};

describe('LibraryStatsCache', () => {
  it('builds stats from counts and views', async () => {
    const fetcher = createMockFetcher({
      getItemCounts: vi.fn(async () => COUNTS),
      getLibraryViews: vi.fn(async () => [
        { id: 'v1', name: 'Movies', collectionType: 'movies' },
        { id: 'v2', name: 'TV Shows', collectionType: 'tvshows' },
      ]),
    });
    const cache = new LibraryStatsCache(fetcher, () => NOW);

    const stats = await cache.refresh();

    expect(stats).toEqual({
      libraryCount: 2,
      libraries: ['Movies', 'TV Shows'],
      counts: {
        movies: 120,
        series: 14,
        episodes: 610,
        songs: 0,
        books: 2,
        audiobooks: 0,
        trailers: 3,
        boxsets: 4,
        playlists: 1,
      },
      lastUpdated: '2026-03-01T12:00:00.000Z',
    });
    expect(cache.value).toBe(stats);
  });

  it('counts zero for an empty library', async () => {
    const cache = new LibraryStatsCache(createMockFetcher(), () => NOW);

    const stats = await cache.refresh();

    expect(stats.libraryCount).toBe(0);
    expect(stats.counts.movies).toBe(0);
  });

  it('keeps counts and lastUpdated when the counts payload is malformed', async () => {
    const getItemCounts = vi
      .fn()
      .mockResolvedValueOnce(COUNTS)
      .mockRejectedValueOnce(
        new TransportError('malformed', 'item counts response carried no counts')
      );
    let now = NOW;
    const cache = new LibraryStatsCache(createMockFetcher({ getItemCounts }), () => now);

    await cache.refresh();
    now = new Date('2026-03-01T12:15:00Z');
    await expect(cache.refresh()).rejects.toMatchObject({ kind: 'malformed' });

    expect(cache.value?.counts.movies).toBe(120);
    expect(cache.value?.lastUpdated).toBe('2026-03-01T12:00:00.000Z');
  });

  it('keeps the last good value when a refresh fails', async () => {
    const getItemCounts = vi
      .fn()
      .mockResolvedValueOnce(COUNTS)
      .mockRejectedValueOnce(new TransportError('timeout', 'counts'));
    const cache = new LibraryStatsCache(createMockFetcher({ getItemCounts }), () => NOW);

    const first = await cache.refresh();
    await expect(cache.refresh()).rejects.toThrow('Emby error: counts');

    expect(cache.value).toBe(first);
  });
});

describe('normalizeMovie', () => {
  it('maps and drops empty fields', () => {
    const movie = normalizeMovie(
      {
        id: 'm1',
        name: 'Arrival',
        premiereDate: '2016-11-11T00:00:00Z',
        runTimeTicks: 69_605_000_000,
        communityRating: 7.9,
        genres: [],
        originalTitle: 'Story of Your Life',
        videoHeight: 2160,
      },
      itemImageUrl
    );

    expect(movie).toEqual({
      id: 'm1',
      title: 'Arrival',
      premiereDate: '2016-11-11T00:00:00Z',
      runtimeSeconds: 6960,
      rating: 7.9,
      tagline: 'Story of Your Life',
      resolutionHeight: 2160,
      imageUrl: itemImageUrl('m1'),
    });
  });
});

describe('normalizeEpisode', () => {
  it('keeps series numbering', () => {
    expect(
      normalizeEpisode(
        { id: 'e1', name: 'Pilot', seriesName: 'The Show', seasonNumber: 1, episodeNumber: 0 },
        itemImageUrl
      )
    ).toEqual({
      id: 'e1',
      title: 'Pilot',
      series: 'The Show',
      season: 1,
      episode: 0,
      imageUrl: itemImageUrl('e1'),
    });
  });
});

describe('selectUpcoming', () => {
  it('keeps future premieres earliest first', () => {
    const items = [
      { id: 'c', premiereDate: '2026-03-05T00:00:00Z' },
      { id: 'past', premiereDate: '2026-02-01T00:00:00Z' },
      { id: 'a', premiereDate: '2026-03-02T00:00:00Z' },
      { id: 'undated' },
      { id: 'b', premiereDate: '2026-03-03T00:00:00Z' },
    ];

    expect(selectUpcoming(items, NOW).map((i) => i.id)).toEqual(['a', 'b', 'c']);
    expect(selectUpcoming(items, NOW, 2).map((i) => i.id)).toEqual(['a', 'b']);
  });
});

describe('fetchLibraryLists', () => {
  it('loads only enabled lists', async () => {
    const getLibraryItems = vi.fn(async () =>
      Array.from({ length: 8 }, (_, i) => ({ id: `m${i}`, name: `Movie ${i}` }))
    );
    const fetcher = createMockFetcher({ getLibraryItems });

    const lists = await fetchLibraryLists(
      fetcher,
      { latest_movies: true, latest_episodes: false, upcoming_episodes: false },
      NOW
    );

    expect(getLibraryItems).toHaveBeenCalledWith({
      includeTypes: 'Movie',
      sortBy: 'DateCreated',
      sortOrder: 'Descending',
      limit: 10,
    });
    expect(Object.keys(lists)).toEqual(['latest_movies']);
    expect(lists.latest_movies?.map((m) => m.id)).toEqual(['m0', 'm1', 'm2', 'm3', 'm4']);
    expect(fetcher.getUpcomingEpisodes).not.toHaveBeenCalled();
  });

  it('filters upcoming episodes to the future', async () => {
    const fetcher = createMockFetcher({
      getUpcomingEpisodes: vi.fn(async () => [
        { id: 'old', name: 'Old', premiereDate: '2026-01-01T00:00:00Z' },
        { id: 'new', name: 'New', seriesName: 'Show', premiereDate: '2026-03-08T00:00:00Z' },
      ]),
    });

    const lists = await fetchLibraryLists(
      fetcher,
      { latest_movies: false, latest_episodes: false, upcoming_episodes: true },
      NOW
    );

    expect(fetcher.getUpcomingEpisodes).toHaveBeenCalledWith(40);
    expect(lists.upcoming_episodes).toEqual([
      {
        id: 'new',
        title: 'New',
        series: 'Show',
        premiereDate: '2026-03-08T00:00:00Z',
        imageUrl: itemImageUrl('new'),
      },
    ]);
  });

  it('empties a list that fails without affecting the others', async () => {
    const logger = createTestLogger();
    const fetcher = createMockFetcher({
      getLibraryItems: vi.fn(async () => [{ id: 'e1', name: 'Pilot' }]),
      getUpcomingEpisodes: vi.fn(async () => {
        throw new TransportError('unreachable', 'down');
      }),
    });

    const lists = await fetchLibraryLists(
      fetcher,
      { latest_movies: false, latest_episodes: true, upcoming_episodes: true },
      NOW,
      logger
    );

    expect(lists.latest_episodes).toEqual([
      { id: 'e1', title: 'Pilot', imageUrl: itemImageUrl('e1') },
    ]);
    expect(lists.upcoming_episodes).toEqual([]);
    expect(logger.warn).toHaveBeenCalledWith(
      { list: 'upcoming_episodes', error: 'Emby error: down' },
      'Library list failed to load'
    );
  });
});
