/**
 * EventHandlers — read access to the outbound notification log, for
 * observers that poll instead of subscribing in process.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { DatasetRegistry } from '../../registry/DatasetRegistry.js';
import { requireActor, type ActorResolver } from '../../identity/ActorIdentity.js';
import type { ListingConfig } from '../../config/types.js';
import { replyWithError } from '../errors.js';
import { eventsQuerySchema, parseInput } from '../schemas.js';
import type { ApiError, ListEventsQuery, ListEventsResponse } from '../types.js';

export function createEventHandlers(
  registry: DatasetRegistry,
  actors: ActorResolver,
  listing: ListingConfig
) {
  return {
    /**
     * GET /events
     * Notifications with sequence greater than `since`, oldest first,
     * limited to records the caller may currently read.
     */
    async listEvents(
      request: FastifyRequest<{ Querystring: ListEventsQuery }>,
      reply: FastifyReply
    ): Promise<ListEventsResponse | ApiError> {
      try {
        const actor = requireActor(actors, request.headers);
        const query = parseInput(eventsQuerySchema, request.query, 'query');
        const limit = Math.min(query.limit ?? listing.defaultLimit, listing.maxLimit);
        const log = registry.notificationLog;
        return {
          notifications: registry.notificationsVisibleTo(actor, query.since ?? 0, limit),
          firstSequence: log.firstSequence,
          lastSequence: log.lastSequence,
        };
      } catch (err) {
        return replyWithError(request, reply, err, 'list events');
      }
    },
  };
}

export type EventHandlers = ReturnType<typeof createEventHandlers>;
