/**
 * Map catalog errors onto HTTP statuses and the ApiError body.
 */

import type { FastifyReply } from 'fastify';
import { CatalogError, InvalidValueError, type CatalogErrorCode } from '../errors.js';
import type { ApiError } from './types.js';

const STATUS_BY_CODE: Record<CatalogErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_ARGUMENT: 400,
  INVALID_VALUE: 400,
  PARSE_ERROR: 400,
  QUERY_EXECUTION: 400,
  IO_ERROR: 500,
};

export function statusForError(err: unknown): number {
  return err instanceof CatalogError ? STATUS_BY_CODE[err.code] : 500;
}

/**
 * Set the reply status for `err` and return its body.
 */
export function sendError(reply: FastifyReply, err: unknown): ApiError {
  const status = statusForError(err);
  reply.status(status);

  if (err instanceof CatalogError && status < 500) {
    return {
      error: err.code,
      message: err.message,
      ...(err instanceof InvalidValueError && err.issues.length > 0 ? { details: err.issues } : {}),
    };
  }

  reply.log.error({ err }, 'Request failed');
  return {
    error: 'INTERNAL_ERROR',
    message: err instanceof Error ? err.message : String(err),
  };
}

export function badRequest(reply: FastifyReply, message: string, details?: unknown): ApiError {
  reply.status(400);
  return {
    error: 'BAD_REQUEST',
    message,
    ...(details !== undefined ? { details } : {}),
  };
}
