/**
 * DatasetHandlers — HTTP handlers for dataset registration, reads and
 * usage counters.
 *
 * Thin wrappers around DatasetRegistry: they resolve the caller, parse the
 * request and translate registry errors into replies.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { DatasetRegistry } from '../../registry/DatasetRegistry.js';
import { requireActor, type ActorResolver } from '../../identity/ActorIdentity.js';
import type { ListingConfig } from '../../config/types.js';
import type { ActorId, CounterKind } from '../../types/DatasetRecord.js';
import { RegistryError } from '../../core/errors.js';
import { replyWithError } from '../errors.js';
import {
  datasetParamsSchema,
  listQuerySchema,
  parseInput,
  resolveWindow,
  setVisibilitySchema,
  updateAnalysisSchema,
  uploadDatasetSchema,
} from '../schemas.js';
import type {
  ApiError,
  CountResponse,
  CounterResponse,
  DatasetResponse,
  ListDatasetsQuery,
  ListDatasetsResponse,
  MutationResponse,
  UploadDatasetResponse,
} from '../types.js';

type DatasetRequest = FastifyRequest<{ Params: { id: string }; Body: unknown }>;

/**
 * Create dataset handlers bound to a registry.
 */
export function createDatasetHandlers(
  registry: DatasetRegistry,
  actors: ActorResolver,
  listing: ListingConfig
) {
  function incrementCounter(actor: ActorId, id: number, counter: CounterKind): Promise<boolean> {
    switch (counter) {
      case 'views':
        return registry.recordView(actor, id);
      case 'downloads':
        return registry.recordDownload(actor, id);
      case 'citations':
        return registry.recordCitation(actor, id);
    }
  }

  async function increment(
    request: DatasetRequest,
    reply: FastifyReply,
    counter: CounterKind
  ): Promise<CounterResponse | ApiError> {
    try {
      const actor = requireActor(actors, request.headers);
      const { id } = parseInput(datasetParamsSchema, request.params, 'dataset id');

      const applied = await incrementCounter(actor, id, counter);

      if (!applied) {
        request.log.debug({ id, counter, actor }, 'counter increment skipped for private dataset');
      }
      return { id, counter, applied };
    } catch (err) {
      return replyWithError(request, reply, err, `record ${counter}`);
    }
  }

  return {
    /**
     * POST /datasets
     * Register a dataset owned by the caller.
     */
    async uploadDataset(
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply
    ): Promise<UploadDatasetResponse | ApiError> {
      try {
        const actor = requireActor(actors, request.headers);
        const body = parseInput(uploadDatasetSchema, request.body, 'request body');
        const id = await registry.upload(actor, body.datasetRef, body.analysisRef, body.isPublic);
        reply.status(201);
        return { id };
      } catch (err) {
        return replyWithError(request, reply, err, 'upload dataset');
      }
    },

    /**
     * GET /datasets
     * Public datasets in id order.
     */
    async listPublic(
      request: FastifyRequest<{ Querystring: ListDatasetsQuery }>,
      reply: FastifyReply
    ): Promise<ListDatasetsResponse | ApiError> {
      try {
        const window = resolveWindow(parseInput(listQuerySchema, request.query, 'query'), listing);
        return {
          datasets: registry.listPublic(window),
          total: registry.countPublic(),
          ...window,
        };
      } catch (err) {
        return replyWithError(request, reply, err, 'list datasets');
      }
    },

    /**
     * GET /datasets/count
     */
    async countDatasets(): Promise<CountResponse> {
      return {
        count: registry.count(),
        public: registry.countPublic(),
      };
    },

    /**
     * GET /datasets/:id
     * A public dataset, or a private one owned by the caller.
     */
    async getDataset(
      request: DatasetRequest,
      reply: FastifyReply
    ): Promise<DatasetResponse | ApiError> {
      try {
        const actor = requireActor(actors, request.headers);
        const { id } = parseInput(datasetParamsSchema, request.params, 'dataset id');
        return { dataset: registry.get(actor, id) };
      } catch (err) {
        return replyWithError(request, reply, err, 'get dataset');
      }
    },

    /**
     * PUT /datasets/:id/analysis
     */
    async updateAnalysis(
      request: DatasetRequest,
      reply: FastifyReply
    ): Promise<MutationResponse | ApiError> {
      try {
        const actor = requireActor(actors, request.headers);
        const { id } = parseInput(datasetParamsSchema, request.params, 'dataset id');
        const body = parseInput(updateAnalysisSchema, request.body, 'request body');
        await registry.updateAnalysis(actor, id, body.analysisRef);
        return { success: true, id };
      } catch (err) {
        return replyWithError(request, reply, err, 'update analysis');
      }
    },

    /**
     * PUT /datasets/:id/visibility
     */
    async setVisibility(
      request: DatasetRequest,
      reply: FastifyReply
    ): Promise<MutationResponse | ApiError> {
      try {
        const actor = requireActor(actors, request.headers);
        const { id } = parseInput(datasetParamsSchema, request.params, 'dataset id');
        const body = parseInput(setVisibilitySchema, request.body, 'request body');
        await registry.setVisibility(actor, id, body.isPublic);
        return { success: true, id };
      } catch (err) {
        return replyWithError(request, reply, err, 'set visibility');
      }
    },

    /**
     * POST /datasets/:id/views
     */
    async recordView(request: DatasetRequest, reply: FastifyReply): Promise<CounterResponse | ApiError> {
      return increment(request, reply, 'views');
    },

    /**
     * POST /datasets/:id/downloads
     */
    async recordDownload(request: DatasetRequest, reply: FastifyReply): Promise<CounterResponse | ApiError> {
      return increment(request, reply, 'downloads');
    },

    /**
     * POST /datasets/:id/citations
     */
    async recordCitation(request: DatasetRequest, reply: FastifyReply): Promise<CounterResponse | ApiError> {
      return increment(request, reply, 'citations');
    },

    /**
     * GET /actors/:actor/datasets
     * Every dataset the caller owns, private ones included. Callers may
     * only list their own.
     */
    async listOwned(
      request: FastifyRequest<{ Params: { actor: string }; Querystring: ListDatasetsQuery }>,
      reply: FastifyReply
    ): Promise<ListDatasetsResponse | ApiError> {
      try {
        const actor = requireActor(actors, request.headers);
        if (request.params.actor !== actor) {
          throw new RegistryError('ACCESS_DENIED', 'Datasets may only be listed by their owner');
        }
        const window = resolveWindow(parseInput(listQuerySchema, request.query, 'query'), listing);
        return {
          datasets: registry.listOwnedBy(actor, window),
          total: registry.ownedCount(actor),
          ...window,
        };
      } catch (err) {
        return replyWithError(request, reply, err, 'list owned datasets');
      }
    },
  };
}

export type DatasetHandlers = ReturnType<typeof createDatasetHandlers>;
