/**
 * zod schemas for request bodies, path parameters and query strings.
 */

import { z } from 'zod';
import { RegistryErrors } from '../core/errors.js';
import type { ListingConfig } from '../config/types.js';
import type { ListWindow } from '../registry/types.js';

const digits = z.string().regex(/^\d+$/, 'must be a non-negative integer').transform(Number);

export const uploadDatasetSchema = z.object({
  datasetRef: z.string(),
  analysisRef: z.string().default(''),
  isPublic: z.boolean(),
}).strict();

export const updateAnalysisSchema = z.object({
  analysisRef: z.string(),
}).strict();

export const setVisibilitySchema = z.object({
  isPublic: z.boolean(),
}).strict();

export const datasetParamsSchema = z.object({
  id: digits.refine(Number.isSafeInteger, 'is out of range'),
});

export const listQuerySchema = z.object({
  offset: digits.optional(),
  limit: digits.optional(),
});

export const eventsQuerySchema = z.object({
  since: digits.optional(),
  limit: digits.optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse input or throw INVALID_ARGUMENT naming what was malformed.
 */
export function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    throw RegistryErrors.invalidArgument(`Invalid ${what}: ${describeIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Resolve a paging window, applying the configured default and cap.
 */
export function resolveWindow(
  query: { offset?: number | undefined; limit?: number | undefined },
  listing: ListingConfig
): Required<ListWindow> {
  return {
    offset: query.offset ?? 0,
    limit: Math.min(query.limit ?? listing.defaultLimit, listing.maxLimit),
  };
}
