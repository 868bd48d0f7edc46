/**
 * RemoteHandlers — Read-only listing of the catalog published on GitHub.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { RemoteCatalogIndex } from '../../catalog/RemoteCatalogIndex.js';
import type { ModelMetadata } from '../../model/metadata.js';
import { sendError } from '../errorResponse.js';
import type { ApiError } from '../types.js';

export interface RemoteModelsResponse {
  repository: string;
  models: string[];
  total: number;
}

export function createRemoteHandlers(index: RemoteCatalogIndex) {
  return {
    /**
     * GET /remote/models
     */
    async listRemoteModels(
      _request: FastifyRequest,
      reply: FastifyReply
    ): Promise<RemoteModelsResponse | ApiError> {
      try {
        const models = await index.listModelFolders();
        return { repository: index.repository, models, total: models.length };
      } catch (err) {
        return sendError(reply, err);
      }
    },

    /**
     * GET /remote/models/:id/metadata
     */
    async getRemoteMetadata(
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply
    ): Promise<{ id: string; metadata: ModelMetadata } | ApiError> {
      try {
        return { id: request.params.id, metadata: await index.fetchMetadata(request.params.id) };
      } catch (err) {
        return sendError(reply, err);
      }
    },
  };
}

export type RemoteHandlers = ReturnType<typeof createRemoteHandlers>;
