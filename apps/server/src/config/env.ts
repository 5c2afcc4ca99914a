/**
 * Environment configuration
 *
 * Validated once at startup. Anything invalid fails fast with a
 * ValidationError naming every offending variable.
 */

import { z } from 'zod';
import { POLLING_INTERVALS, POLL_LIMITS } from '@marquee/shared';
import type { Options, PollIntervals } from '@marquee/shared';
import type { EmbyServerConfig } from '../services/mediaServer/types.js';
import { ValidationError } from '../utils/errors.js';

const flag = (fallback: boolean) => z.stringbool().default(fallback);
const interval = (fallback: number) => z.coerce.number().int().min(1000).default(fallback);

export const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  EMBY_HOST: z.string().trim().min(1, 'EMBY_HOST is required'),
  EMBY_PORT: z.coerce.number().int().min(1).max(65535).default(8096),
  EMBY_SSL: flag(false),
  EMBY_API_KEY: z.string().trim().min(1, 'EMBY_API_KEY is required'),

  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGIN: z.string().optional(),

  POLL_SESSIONS_MS: interval(POLLING_INTERVALS.SESSIONS),
  POLL_SERVER_STATS_MS: interval(POLLING_INTERVALS.SERVER_STATS),
  POLL_RECORDINGS_MS: interval(POLLING_INTERVALS.RECORDINGS),
  POLL_LIBRARY_MS: interval(POLLING_INTERVALS.LIBRARY),
  POLL_TIMEOUT_MS: z.coerce.number().int().min(1000).default(POLL_LIMITS.TIMEOUT_MS),

  ENABLE_RECORDINGS: flag(true),
  ENABLE_ACTIVE_STREAMS: flag(true),
  ENABLE_MULTISESSION_USERS: flag(true),
  ENABLE_BANDWIDTH: flag(true),
  ENABLE_TRANSCODING: flag(true),
  ENABLE_SERVER_STATS: flag(true),
  ENABLE_LIBRARY_STATS: flag(true),
  ENABLE_LATEST_MOVIES: flag(true),
  ENABLE_LATEST_EPISODES: flag(true),
  ENABLE_UPCOMING_EPISODES: flag(true),
});

export interface AppConfig {
  isDevelopment: boolean;
  emby: EmbyServerConfig;
  server: {
    port: number;
    host: string;
    logLevel: string;
    corsOrigin?: string;
  };
  intervals: PollIntervals;
  pollTimeoutMs: number;
  options: Options;
}

/**
 * Parse and validate configuration from environment variables
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw ValidationError.fromZodError(result.error, 'Invalid configuration');
  }
  const e = result.data;

  return {
    isDevelopment: e.NODE_ENV === 'development',
    emby: {
      host: e.EMBY_HOST,
      port: e.EMBY_PORT,
      useSsl: e.EMBY_SSL,
      apiKey: e.EMBY_API_KEY,
      timeoutMs: e.POLL_TIMEOUT_MS,
    },
    server: {
      port: e.PORT,
      host: e.HOST,
      logLevel: e.LOG_LEVEL,
      ...(e.CORS_ORIGIN ? { corsOrigin: e.CORS_ORIGIN } : {}),
    },
    intervals: {
      sessions: e.POLL_SESSIONS_MS,
      serverStats: e.POLL_SERVER_STATS_MS,
      recordings: e.POLL_RECORDINGS_MS,
      library: e.POLL_LIBRARY_MS,
    },
    pollTimeoutMs: e.POLL_TIMEOUT_MS,
    options: {
      enableRecordings: e.ENABLE_RECORDINGS,
      enableActiveStreams: e.ENABLE_ACTIVE_STREAMS,
      enableMultisessionUsers: e.ENABLE_MULTISESSION_USERS,
      enableBandwidth: e.ENABLE_BANDWIDTH,
      enableTranscoding: e.ENABLE_TRANSCODING,
      enableServerStats: e.ENABLE_SERVER_STATS,
      enableLibraryStats: e.ENABLE_LIBRARY_STATS,
      enableLatestMovies: e.ENABLE_LATEST_MOVIES,
      enableLatestEpisodes: e.ENABLE_LATEST_EPISODES,
      enableUpcomingEpisodes: e.ENABLE_UPCOMING_EPISODES,
    },
  };
}
