/**
 * MCP tools over the loaded catalog: list, inspect and filter models,
 * and run SPARQL queries on a model or the merged graph.
 */

import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppContext } from '../../server.js';
import { toDetail, toSummary } from '../../api/handlers/ModelHandlers.js';
import { Query } from '../../query/Query.js';
import { caughtErrorResult, jsonResult } from '../helpers.js';

const filterValue = z.union([z.string(), z.array(z.string())]);

export function registerCatalogTools(server: McpServer, ctx: AppContext): void {
  const { catalog } = ctx;

  server.tool(
    'catalog_list_models',
    'List every model in the catalog with its metadata.',
    {},
    async () => {
      const models = catalog.models.map(toSummary);
      return jsonResult({ models, total: models.length });
    }
  );

  server.tool(
    'catalog_get_model',
    'Get one model: metadata, triple count and graph hash.',
    {
      id: z.string().describe('Model ID (its folder name)'),
    },
    async (args) => {
      try {
        return jsonResult(toDetail(catalog.getModel(args.id)));
      } catch (err) {
        return caughtErrorResult(err);
      }
    }
  );

  server.tool(
    'catalog_filter_models',
    'Find models whose metadata matches field filters. A list of values matches any of them; "and" requires every field to match, "or" any field.',
    {
      operand: z.enum(['and', 'or']).optional().describe('How fields combine (default "and")'),
      filters: z.record(filterValue).describe('Metadata field to expected value or values, e.g. {"language": "en"}'),
    },
    async (args) => {
      try {
        const models = catalog.getModels(args.operand ?? 'and', args.filters).map(toSummary);
        return jsonResult({ models, total: models.length });
      } catch (err) {
        return caughtErrorResult(err);
      }
    }
  );

  server.tool(
    'catalog_run_query',
    'Run a SPARQL SELECT query on one model, or on the merged catalog graph when no model is given. Queries already run against the same graph are skipped unless save is false.',
    {
      name: z.string().min(1).describe('Query name; names the result file'),
      sparql: z.string().min(1).describe('SPARQL SELECT query text'),
      modelId: z.string().optional().describe('Model to query (default: the merged graph)'),
      save: z.boolean().optional().describe('Write results and record the execution (default true)'),
    },
    async (args) => {
      try {
        const query = Query.fromText(args.name, args.sparql);
        const options = args.save !== undefined ? { save: args.save } : {};
        const outcome = args.modelId !== undefined
          ? await catalog.executeQueryOnModel(query, args.modelId, options)
          : await catalog.executeQuery(query, options);
        return jsonResult({ ...outcome, element: args.modelId ?? catalog.id });
      } catch (err) {
        return caughtErrorResult(err);
      }
    }
  );
}
