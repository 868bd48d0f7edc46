/**
 * Types for the HTTP API layer.
 *
 * These types define request/response structures for the REST API.
 */

import { z } from 'zod';
import type { ModelMetadata } from '../model/metadata.js';
import type { QueryOutcome } from '../queryable/types.js';

// ============================================================================
// Error Response
// ============================================================================

/**
 * Standard error response.
 */
export interface ApiError {
  /** Error type/code */
  error: string;
  /** Human-readable message */
  message: string;
  /** Additional details (optional) */
  details?: unknown;
}

// ============================================================================
// Model Endpoints
// ============================================================================

/**
 * Query parameters for listing models. Every key other than `operand`
 * is a metadata field; repeat a key to accept several values.
 */
export type ListModelsQuery = Record<string, string | string[] | undefined>;

export interface ModelSummary {
  id: string;
  metadata: ModelMetadata;
}

export interface ListModelsResponse {
  models: ModelSummary[];
  total: number;
}

export interface ModelDetail extends ModelSummary {
  triples: number;
  graphHash: string;
  hasMetadataGraph: boolean;
  /** Present when the model folder has a metadata.ttl */
  metadataGraphHash?: string;
}

// ============================================================================
// Query Endpoints
// ============================================================================

export const QueryRequestSchema = z.object({
  /** Names the result file */
  name: z.string().min(1),
  sparql: z.string().min(1),
  save: z.boolean().optional(),
});

export type QueryRequest = z.infer<typeof QueryRequestSchema>;

export type QueryResponse = QueryOutcome & { element: string };

export interface RefreshResponse {
  models: number;
  triples: number;
  graphHash: string;
}

// ============================================================================
// Health Check
// ============================================================================

export interface HealthResponse {
  status: 'ok';
  timestamp: string;
  models: number;
  graphStale: boolean;
}
