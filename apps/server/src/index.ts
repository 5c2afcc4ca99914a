import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { config as loadEnv } from 'dotenv';
import Fastify from 'fastify';
import cors from '@fastify/cors';
import sensible from '@fastify/sensible';
import { API_BASE_PATH } from '@marquee/shared';

import { loadConfig, type AppConfig } from './config/env.js';
import { createEmbyClient } from './services/mediaServer/index.js';
import { EntityRegistry } from './services/publisher.js';
import { OptionsStore } from './services/options.js';
import { PlaybackController } from './services/playback.js';
import { PollerManager } from './jobs/poller/index.js';
import { healthRoutes } from './routes/health.js';
import { entityRoutes } from './routes/entities.js';
import { sessionRoutes } from './routes/sessions.js';
import { optionRoutes } from './routes/options.js';
import { bridgeEvents, initializeWebSocket } from './websocket/index.js';
import { registerErrorHandler } from './utils/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Project root directory (apps/server/src -> project root)
const PROJECT_ROOT = resolve(__dirname, '../../..');

// Load .env from project root
loadEnv({ path: resolve(PROJECT_ROOT, '.env') });

async function buildApp(config: AppConfig) {
  const app = Fastify({
    logger: {
      level: config.server.logLevel,
      transport: config.isDevelopment
        ? { target: 'pino-pretty', options: { colorize: true } }
        : undefined,
    },
  });

  await app.register(cors, {
    origin: config.server.corsOrigin ?? true,
    credentials: true,
  });
  await app.register(sensible);
  registerErrorHandler(app);

  const fetcher = createEmbyClient(config.emby);
  const registry = new EntityRegistry();
  const options = new OptionsStore(config.options);
  const pollers = new PollerManager({
    fetcher,
    registry,
    options,
    logger: app.log.child({ module: 'poller' }),
    intervals: config.intervals,
    timeoutMs: config.pollTimeoutMs,
  });
  const playback = new PlaybackController(fetcher, pollers.engine.identity, {
    logger: app.log.child({ module: 'playback' }),
    requestRefresh: () => void pollers.triggerPoll(),
  });

  app.addHook('onClose', async () => {
    pollers.stop();
  });

  await app.register(healthRoutes, { statuses: () => pollers.statuses() });
  await app.register(entityRoutes, { prefix: `${API_BASE_PATH}/entities`, registry });
  await app.register(sessionRoutes, {
    prefix: `${API_BASE_PATH}/sessions`,
    sessions: () => pollers.engine.sessions,
    playback,
  });
  await app.register(optionRoutes, { prefix: `${API_BASE_PATH}/options`, options });

  return { app, registry, pollers };
}

async function start() {
  try {
    const config = loadConfig();
    const { app, registry, pollers } = await buildApp(config);

    await app.listen({ port: config.server.port, host: config.server.host });
    app.log.info(`Server running at http://${config.server.host}:${config.server.port}`);

    // Initialize WebSocket server using Fastify's underlying HTTP server
    const io = initializeWebSocket(app.server, {
      corsOrigin: config.server.corsOrigin,
      logger: app.log.child({ module: 'websocket' }),
    });
    const detach = bridgeEvents(io, registry, pollers);
    app.log.info('WebSocket server initialized');

    // Handle graceful shutdown
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    for (const signal of signals) {
      process.on(signal, () => {
        app.log.info(`Received ${signal}, shutting down gracefully...`);
        pollers.stop();
        detach();
        io.disconnectSockets(true);
        void app.close().then(() => process.exit(0));
      });
    }

    // Start polling after the server is listening
    pollers.start();
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

void start();
