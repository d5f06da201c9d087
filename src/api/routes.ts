/**
 * Route configuration for the API.
 *
 * Registers every API route on a Fastify instance. Handlers are thin
 * wrappers; authorization is decided by the registry.
 */

import type { FastifyInstance } from 'fastify';
import type { DatasetHandlers } from './handlers/DatasetHandlers.js';
import type { EventHandlers } from './handlers/EventHandlers.js';
import type { HealthResponse } from './types.js';

/**
 * Options for registering routes.
 */
export interface RouteOptions {
  datasetHandlers: DatasetHandlers;
  eventHandlers: EventHandlers;
  health: () => NonNullable<HealthResponse['components']>;
}

/**
 * Register all API routes on a Fastify instance.
 */
export function registerRoutes(
  fastify: FastifyInstance,
  options: RouteOptions
): void {
  const { datasetHandlers, eventHandlers, health } = options;

  // ============================================================================
  // Health Check
  // ============================================================================

  fastify.get('/health', async (): Promise<HealthResponse> => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      components: health(),
    };
  });

  // ============================================================================
  // Dataset Routes
  // ============================================================================

  // Register a dataset
  fastify.post('/datasets', datasetHandlers.uploadDataset);

  // List public datasets
  fastify.get('/datasets', datasetHandlers.listPublic);

  // Total and public counts
  fastify.get('/datasets/count', datasetHandlers.countDatasets);

  // Get a single dataset
  fastify.get('/datasets/:id', datasetHandlers.getDataset);

  // Owner-only updates
  fastify.put('/datasets/:id/analysis', datasetHandlers.updateAnalysis);
  fastify.put('/datasets/:id/visibility', datasetHandlers.setVisibility);

  // Usage counters
  fastify.post('/datasets/:id/views', datasetHandlers.recordView);
  fastify.post('/datasets/:id/downloads', datasetHandlers.recordDownload);
  fastify.post('/datasets/:id/citations', datasetHandlers.recordCitation);

  // Datasets owned by the caller
  fastify.get('/actors/:actor/datasets', datasetHandlers.listOwned);

  // ============================================================================
  // Notification Routes
  // ============================================================================

  fastify.get('/events', eventHandlers.listEvents);
}
