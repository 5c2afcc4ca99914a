/**
 * Error Classes Tests
 *
 * Status codes, error codes, toJSON() output and the Fastify error handler.
 */

import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import sensible from '@fastify/sensible';
import { z } from 'zod';
import {
  AppError,
  CommandError,
  ErrorCodes,
  NotFoundError,
  TransportError,
  ValidationError,
  isTransportError,
  registerErrorHandler,
  toApiError,
} from '../errors.js';

describe('AppError hierarchy', () => {
  it('NotFoundError renders resource and id', () => {
    const error = new NotFoundError('Session', 'emby_tv_alice');
    expect(error.statusCode).toBe(404);
    expect(error.toJSON()).toEqual({
      statusCode: 404,
      error: 'NotFoundError',
      message: "Session with ID 'emby_tv_alice' not found",
      code: ErrorCodes.NOT_FOUND,
    });
  });

  it('NotFoundError without an id', () => {
    expect(new NotFoundError('Entity').message).toBe('Entity not found');
  });

  it('ValidationError.fromZodError lists each field', () => {
    const schema = z.object({ port: z.number(), host: z.string() });
    const result = schema.safeParse({ port: 'x', host: 1 });
    if (result.success) throw new Error('expected failure');

    const error = ValidationError.fromZodError(result.error, 'Invalid configuration');
    expect(error.statusCode).toBe(400);
    expect(error.message).toBe('Invalid configuration');
    expect(error.fields?.map((f) => f.field)).toEqual(['port', 'host']);
  });

  it('CommandError names the command', () => {
    const error = new CommandError('pause', 'Emby error: fetch failed');
    expect(error.statusCode).toBe(502);
    expect(error.message).toBe('Failed to send pause: Emby error: fetch failed');
    expect(error.details).toEqual({ command: 'pause' });
  });
});

describe('TransportError', () => {
  it('only unauthorized is fatal', () => {
    expect(new TransportError('unauthorized', 'x').isFatal).toBe(true);
    expect(new TransportError('timeout', 'x').isFatal).toBe(false);
    expect(new TransportError('unreachable', 'x').isFatal).toBe(false);
    expect(new TransportError('malformed', 'x').isFatal).toBe(false);
  });

  it('uses 504 for timeouts and 502 otherwise', () => {
    expect(new TransportError('timeout', 'x').statusCode).toBe(504);
    expect(new TransportError('malformed', 'x').statusCode).toBe(502);
  });

  it('maps kinds to codes', () => {
    expect(new TransportError('unauthorized', 'x').code).toBe(ErrorCodes.EMBY_UNAUTHORIZED);
    expect(new TransportError('malformed', 'x').code).toBe(ErrorCodes.EMBY_MALFORMED);
  });

  it('is recognised by isTransportError and is an AppError', () => {
    const error = new TransportError('timeout', 'x');
    expect(isTransportError(error)).toBe(true);
    expect(error).toBeInstanceOf(AppError);
    expect(isTransportError(new Error('x'))).toBe(false);
  });
});

describe('toApiError', () => {
  it('hides unexpected messages unless exposed', () => {
    expect(toApiError(new Error('db exploded'), false)).toEqual({
      statusCode: 500,
      error: 'InternalServerError',
      message: 'Internal server error',
    });
    expect(toApiError(new Error('db exploded'), true).message).toBe('db exploded');
  });
});

describe('registerErrorHandler', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  async function buildTestApp(): Promise<FastifyInstance> {
    app = Fastify({ logger: false });
    await app.register(sensible);
    registerErrorHandler(app);
    app.get('/missing', async () => {
      throw new NotFoundError('Entity', 'session/x');
    });
    app.get('/bad', async (_request, reply) => reply.badRequest('Invalid entity kind'));
    app.get('/boom', async () => {
      throw new Error('kaboom');
    });
    return app;
  }

  it('renders AppErrors with their status and code', async () => {
    await buildTestApp();
    const response = await app.inject({ method: 'GET', url: '/missing' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      statusCode: 404,
      error: 'NotFoundError',
      message: "Entity with ID 'session/x' not found",
      code: ErrorCodes.NOT_FOUND,
    });
  });

  it('passes through sensible http errors', async () => {
    await buildTestApp();
    const response = await app.inject({ method: 'GET', url: '/bad' });

    expect(response.statusCode).toBe(400);
    expect(response.json().message).toBe('Invalid entity kind');
  });

  it('renders unknown errors as 500', async () => {
    await buildTestApp();
    const response = await app.inject({ method: 'GET', url: '/boom' });

    expect(response.statusCode).toBe(500);
    expect(response.json().error).toBe('InternalServerError');
  });

  it('renders transport errors with their upstream status and code', async () => {
    await buildTestApp();
    app.get('/upstream', async () => {
      throw new TransportError('timeout', 'sessions poll exceeded 50ms');
    });
    const response = await app.inject({ method: 'GET', url: '/upstream' });

    expect(response.statusCode).toBe(504);
    expect(response.json()).toEqual({
      statusCode: 504,
      error: 'TransportError',
      message: 'Emby error: sessions poll exceeded 50ms',
      code: ErrorCodes.EMBY_TIMEOUT,
    });
  });

  it('renders unknown routes as 404', async () => {
    await buildTestApp();
    const response = await app.inject({ method: 'GET', url: '/nowhere' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({
      statusCode: 404,
      error: 'NotFound',
      message: 'No route for GET /nowhere',
    });
  });
});
