/**
 * Environment configuration tests
 */

import { describe, it, expect } from 'vitest';
import { loadConfig } from '../env.js';
import { ValidationError } from '../../utils/errors.js';

const REQUIRED = { EMBY_HOST: 'emby.test', EMBY_API_KEY: 'test-api-key' };

describe('loadConfig', () => {
  it('should apply defaults', () => {
    expect(loadConfig(REQUIRED)).toEqual({
      isDevelopment: false,
      emby: {
        host: 'emby.test',
        port: 8096,
        useSsl: false,
        apiKey: 'test-api-key',
        timeoutMs: 15_000,
      },
      server: { port: 3000, host: '0.0.0.0', logLevel: 'info' },
      intervals: { sessions: 10_000, serverStats: 30_000, recordings: 60_000, library: 900_000 },
      pollTimeoutMs: 15_000,
      options: {
        enableRecordings: true,
        enableActiveStreams: true,
        enableMultisessionUsers: true,
        enableBandwidth: true,
        enableTranscoding: true,
        enableServerStats: true,
        enableLibraryStats: true,
        enableLatestMovies: true,
        enableLatestEpisodes: true,
        enableUpcomingEpisodes: true,
      },
    });
  });

  it('should coerce numbers and booleans from strings', () => {
    const config = loadConfig({
      ...REQUIRED,
      NODE_ENV: 'development',
      EMBY_PORT: '8920',
      EMBY_SSL: 'true',
      POLL_SESSIONS_MS: '5000',
      ENABLE_BANDWIDTH: 'false',
      ENABLE_RECORDINGS: 'no',
      CORS_ORIGIN: 'http://localhost:5173',
    });

    expect(config.isDevelopment).toBe(true);
    expect(config.emby.port).toBe(8920);
    expect(config.emby.useSsl).toBe(true);
    expect(config.intervals.sessions).toBe(5000);
    expect(config.options.enableBandwidth).toBe(false);
    expect(config.options.enableRecordings).toBe(false);
    expect(config.server.corsOrigin).toBe('http://localhost:5173');
  });

  it('should require the host and API key', () => {
    try {
      loadConfig({ EMBY_HOST: ' ' });
      expect.fail('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (!(error instanceof ValidationError)) return;
      expect(error.message).toBe('Invalid configuration');
      expect(error.fields?.map((f) => f.field)).toEqual(['EMBY_HOST', 'EMBY_API_KEY']);
    }
  });

  it('should reject intervals below one second', () => {
    expect(() => loadConfig({ ...REQUIRED, POLL_LIBRARY_MS: '500' })).toThrow('Invalid configuration');
  });

  it('should reject a flag that is not a boolean word', () => {
    expect(() => loadConfig({ ...REQUIRED, ENABLE_TRANSCODING: 'maybe' })).toThrow(ValidationError);
  });
});
