/**
 * Server entry point for the dataset registry API.
 *
 * This module:
 * - Loads configuration and opens the registry on the configured backend
 * - Creates the Fastify server with routes under /api
 * - Provides both programmatic API and CLI usage
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';
import { join, resolve } from 'node:path';

import { loadConfig } from './config/loader.js';
import type { AppConfig } from './config/types.js';
import { DatasetRegistry } from './registry/DatasetRegistry.js';
import { NotificationLog } from './registry/NotificationLog.js';
import type { RegistryBackend } from './registry/types.js';
import { createBackend } from './storage/createBackend.js';
import { createActorResolver, type ActorResolver } from './identity/ActorIdentity.js';
import { createDatasetHandlers, createEventHandlers } from './api/handlers/index.js';
import { registerRoutes } from './api/routes.js';

/**
 * Application context holding all initialized components.
 */
export interface AppContext {
  config: AppConfig;
  registry: DatasetRegistry;
  backend: RegistryBackend;
  actorResolver: ActorResolver;
}

/**
 * Options for initializeApp.
 */
export interface InitializeOptions {
  /** Use this config instead of loading config.yaml */
  config?: AppConfig;
  /** Use this backend instead of the one the storage config names */
  backend?: RegistryBackend;
}

/**
 * Initialize all application components.
 */
export async function initializeApp(
  basePath: string,
  options: InitializeOptions = {}
): Promise<AppContext> {
  console.log(`Initializing app with base path: ${basePath}`);

  const config = options.config ?? await loadConfig({
    configPath: process.env.CONFIG_PATH ?? join(basePath, 'config.yaml'),
  });

  const backend = options.backend ?? createBackend(config.storage, basePath);
  if (!options.backend && config.storage.driver === 'file') {
    console.log(`Storing datasets under ${resolve(basePath, config.storage.directory)}`);
  }

  const registry = await DatasetRegistry.open({
    backend,
    notifications: new NotificationLog({ retain: config.notifications.retain }),
  });
  console.log(`Loaded ${registry.count()} datasets (${registry.countPublic()} public)`);

  return {
    config,
    registry,
    backend,
    actorResolver: createActorResolver(config.identity.header),
  };
}

/**
 * Create and configure a Fastify server.
 */
export async function createServer(
  ctx: AppContext
): Promise<ReturnType<typeof Fastify>> {
  const { server, identity, listing, storage } = ctx.config;

  const fastify = Fastify({
    logger: {
      level: server.logLevel,
    },
  });

  if (server.cors.enabled) {
    await fastify.register(cors, {
      origin: server.cors.origins.includes('*') ? true : server.cors.origins,
      methods: ['GET', 'HEAD', 'POST', 'PUT', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', identity.header],
    });
  }

  const datasetHandlers = createDatasetHandlers(ctx.registry, ctx.actorResolver, listing);
  const eventHandlers = createEventHandlers(ctx.registry, ctx.actorResolver, listing);

  // Hand queued notifications to sinks before the process lets go
  fastify.addHook('onClose', async () => {
    await ctx.registry.drain();
  });

  await fastify.register(async (instance) => {
    registerRoutes(instance, {
      datasetHandlers,
      eventHandlers,
      health: () => ({
        datasets: { total: ctx.registry.count(), public: ctx.registry.countPublic() },
        notifications: {
          firstSequence: ctx.registry.notificationLog.firstSequence,
          lastSequence: ctx.registry.notificationLog.lastSequence,
          subscribers: ctx.registry.notificationLog.subscriberCount,
        },
        storage: { driver: storage.driver },
      }),
    });
  }, { prefix: '/api' });

  return fastify;
}

/**
 * Start the server.
 */
export async function startServer(
  basePath: string,
  options: InitializeOptions = {}
): Promise<void> {
  try {
    const ctx = await initializeApp(basePath, options);
    const fastify = await createServer(ctx);
    const { port, host } = ctx.config.server;

    await fastify.listen({ port, host });

    console.log(`Server listening on http://${host}:${port}`);

    const shutdown = () => {
      console.log('\nShutting down...');
      fastify.close().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error('Shutdown failed:', err);
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  } catch (err) {
    console.error('Failed to start server:', err);
    process.exit(1);
  }
}

/**
 * CLI entry point.
 */
async function main() {
  const basePath = process.env.APP_BASE_PATH || process.cwd();
  await startServer(basePath);
}

// ESM has no require.main
const isMain = process.argv[1]?.endsWith('server.js') ||
               process.argv[1]?.endsWith('server.ts');

if (isMain) {
  main().catch(console.error);
}
