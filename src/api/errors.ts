/**
 * Maps thrown errors onto HTTP replies.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { isRegistryError } from '../core/errors.js';
import type { ApiError } from './types.js';

/**
 * Set the reply status for `err` and return the error body.
 * Registry errors keep their own code and status; anything else is a 500.
 */
export function replyWithError(
  request: FastifyRequest,
  reply: FastifyReply,
  err: unknown,
  action: string
): ApiError {
  if (isRegistryError(err)) {
    reply.status(err.statusCode);
    return { error: err.code, message: err.message };
  }

  const message = err instanceof Error ? err.message : String(err);
  request.log.error({ err }, `Failed to ${action}`);
  reply.status(500);
  return {
    error: 'INTERNAL_ERROR',
    message: `Failed to ${action}: ${message}`,
  };
}
