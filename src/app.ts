// ============================================
// VALLEY ECONOMY - Fastify App Setup
// ============================================

import Fastify, { FastifyInstance } from 'fastify';
import { env, isDevelopment } from './config/env.js';
import { loadGameConfig } from './config/loader.js';
import { corsPlugin, websocketPlugin, errorHandlerPlugin, simulationPlugin } from './plugins/index.js';
import { registerControllers } from './controllers/index.js';
import type { GameConfig } from './models/types.js';

export interface AppOptions {
  logger?: boolean;
  /** Game data; loaded from GAME_CONFIG_PATH or the defaults when omitted. */
  config?: GameConfig;
  seed?: number;
  tickIntervalMs?: number;
  autoStart?: boolean;
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? (isDevelopment()
      ? {
          transport: {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : true),
  });

  const config = options.config ?? loadGameConfig(env.GAME_CONFIG_PATH);

  // Register plugins
  await fastify.register(errorHandlerPlugin);
  await fastify.register(corsPlugin);
  await fastify.register(websocketPlugin);

  // Register simulation engine (uses websocket for broadcasts)
  await fastify.register(simulationPlugin, {
    config,
    seed: options.seed ?? env.RNG_SEED,
    tickIntervalMs: options.tickIntervalMs ?? env.TICK_INTERVAL_MS,
    autoStart: options.autoStart ?? env.AUTO_START,
  });

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // API version info
  fastify.get('/api', async () => {
    return {
      name: 'Valley Economy API',
      version: '1.0.0',
      framework: 'Fastify',
    };
  });

  // Register all API controllers
  await registerControllers(fastify);

  return fastify;
}

export async function startApp(): Promise<FastifyInstance> {
  const app = await buildApp();

  try {
    const address = await app.listen({
      host: env.HOST,
      port: env.PORT,
    });
    app.log.info(`Valley Economy server running at ${address}`);
    return app;
  } catch (err) {
    app.log.error(err);
    throw err;
  }
}
