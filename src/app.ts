// ============================================
// DEADZONE - Fastify App Setup
// ============================================

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import { env, isDevelopment } from './config/env.js';
import { gameConfigFromEnv, type GameConfig } from './config/game.js';
import { getDatabase, type DatabaseHandle, type DrizzleDb } from './db/drizzle.js';
import { loadWorldDefinition, seedWorld, type WorldDefinition } from './db/bootstrap.js';
import { corsPlugin, websocketPlugin, errorHandlerPlugin, authPlugin, simulationPlugin } from './plugins/index.js';
import { registerControllers } from './controllers/index.js';
import { createEngine, createWorldState } from './simulation/engine.js';
import { WorldEventBus } from './simulation/world-state.js';
import type { Random } from './utils/random.js';

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    db: DrizzleDb;
    worldDefinition: WorldDefinition;
  }
}

export interface AppOptions {
  logger?: FastifyServerOptions['logger'];
  database?: DatabaseHandle;
  worldDefinition?: WorldDefinition;
  config?: GameConfig;
  now?: () => number;
  rng?: Random;
  autoStart?: boolean;
  jwtSecret?: string;
  adminKey?: string;
}

function defaultLogger(): FastifyServerOptions['logger'] {
  if (isDevelopment()) {
    return {
      level: env.LOG_LEVEL,
      transport: {
        target: 'pino-pretty',
        options: {
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    };
  }
  return { level: env.LOG_LEVEL };
}

export async function buildApp(options: AppOptions = {}): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? defaultLogger(),
  });

  // Database and starting world
  const { db } = options.database ?? getDatabase();
  const definition = options.worldDefinition ?? loadWorldDefinition(env.WORLD_FILE);
  const config = options.config ?? gameConfigFromEnv(env);
  const now = options.now ?? Date.now;
  await seedWorld(db, definition, now());

  fastify.decorate('db', db);
  fastify.decorate('worldDefinition', definition);

  // World engine
  const events = new WorldEventBus();
  const world = createWorldState({
    db,
    config: { ...config, spawnRegionId: definition.spawnRegionId },
    logger: fastify.log.child({ module: 'world' }),
    events,
    rng: options.rng,
    now,
  });
  const engine = createEngine(world);

  // Register plugins
  await fastify.register(errorHandlerPlugin);
  await fastify.register(corsPlugin);
  await fastify.register(authPlugin, { jwtSecret: options.jwtSecret, adminKey: options.adminKey });
  await fastify.register(websocketPlugin, { jwtSecret: options.jwtSecret });

  // Register the world clock (uses websocket for broadcasts)
  await fastify.register(simulationPlugin, {
    engine,
    events,
    autoStart: options.autoStart ?? env.AUTO_START_CLOCK,
  });

  // Health check
  fastify.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // API version info
  fastify.get('/api', async () => {
    return {
      name: 'Deadzone API',
      version: '0.1.0',
      framework: 'Fastify',
    };
  });

  // Register all API controllers
  await registerControllers(fastify, { jwtSecret: options.jwtSecret });

  return fastify;
}

export async function startApp(): Promise<FastifyInstance> {
  const app = await buildApp();

  try {
    const address = await app.listen({
      host: env.HOST,
      port: env.PORT,
    });
    app.log.info(`Deadzone server running at ${address}`);
    return app;
  } catch (err) {
    app.log.error(err);
    throw err;
  }
}
