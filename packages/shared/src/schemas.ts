/**
 * Zod validation schemas for API requests and options
 */

import { z } from 'zod';

// Option schemas - one toggle per published aggregate
export const optionsSchema = z.object({
  enableRecordings: z.boolean().default(true),
  enableActiveStreams: z.boolean().default(true),
  enableMultisessionUsers: z.boolean().default(true),
  enableBandwidth: z.boolean().default(true),
  enableTranscoding: z.boolean().default(true),
  enableServerStats: z.boolean().default(true),
  enableLibraryStats: z.boolean().default(true),
  enableLatestMovies: z.boolean().default(true),
  enableLatestEpisodes: z.boolean().default(true),
  enableUpcomingEpisodes: z.boolean().default(true),
});

export const updateOptionsSchema = z
  .object({
    enableRecordings: z.boolean(),
    enableActiveStreams: z.boolean(),
    enableMultisessionUsers: z.boolean(),
    enableBandwidth: z.boolean(),
    enableTranscoding: z.boolean(),
    enableServerStats: z.boolean(),
    enableLibraryStats: z.boolean(),
    enableLatestMovies: z.boolean(),
    enableLatestEpisodes: z.boolean(),
    enableUpcomingEpisodes: z.boolean(),
  })
  .partial()
  .strict();

// Poll interval schemas
export const pollIntervalsSchema = z.object({
  sessions: z.number().int().min(1000),
  serverStats: z.number().int().min(1000),
  recordings: z.number().int().min(1000),
  library: z.number().int().min(1000),
});

// Entity schemas
export const entityKindSchema = z.enum([
  'session',
  'active_streams',
  'multisession_users',
  'bandwidth',
  'transcoding',
  'server_stats',
  'recordings',
  'library_stats',
  'latest_movies',
  'latest_episodes',
  'upcoming_episodes',
]);

export const entityParamsSchema = z.object({
  kind: entityKindSchema,
  key: z.string().min(1).max(200),
});

export const entityQuerySchema = z.object({
  kind: entityKindSchema.optional(),
});

// Session command schemas
export const sessionKeyParamSchema = z.object({
  key: z.string().min(1).max(200),
});

export const playbackCommandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('play') }),
  z.object({ type: z.literal('pause') }),
  z.object({ type: z.literal('stop') }),
  z.object({ type: z.literal('seek'), position: z.number().nonnegative() }),
]);

// Type exports from schemas
export type Options = z.infer<typeof optionsSchema>;
export type UpdateOptionsInput = z.infer<typeof updateOptionsSchema>;
export type PollIntervals = z.infer<typeof pollIntervalsSchema>;
export type EntityParams = z.infer<typeof entityParamsSchema>;
export type PlaybackCommandInput = z.infer<typeof playbackCommandSchema>;
