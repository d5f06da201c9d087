/**
 * Resolves the authenticated actor for an incoming request.
 *
 * Authentication happens upstream (a proxy or gateway); it forwards the
 * caller's identity in a request header. The registry only compares the
 * resolved id against stored owners.
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { ActorId } from '../types/DatasetRecord.js';
import { RegistryErrors } from '../core/errors.js';

/**
 * Supplies the actor id for a request, or null when none was supplied.
 */
export interface ActorResolver {
  resolve(headers: IncomingHttpHeaders): ActorId | null;
}

/**
 * Reads the actor id from a single header. Repeated headers are rejected
 * (null) rather than guessed at.
 */
export class HeaderActorResolver implements ActorResolver {
  private readonly header: string;

  constructor(header = 'x-actor-id') {
    this.header = header.toLowerCase();
  }

  resolve(headers: IncomingHttpHeaders): ActorId | null {
    const value = headers[this.header];
    if (typeof value !== 'string') {
      return null;
    }
    const actor = value.trim();
    return actor.length > 0 ? actor : null;
  }
}

export function createActorResolver(header?: string): ActorResolver {
  return new HeaderActorResolver(header);
}

/**
 * Resolve the actor or throw UNAUTHENTICATED.
 */
export function requireActor(resolver: ActorResolver, headers: IncomingHttpHeaders): ActorId {
  const actor = resolver.resolve(headers);
  if (actor === null) {
    throw RegistryErrors.unauthenticated();
  }
  return actor;
}
