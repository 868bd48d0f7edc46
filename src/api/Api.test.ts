/**
 * HTTP API tests through fastify.inject.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { applyDefaults } from '../config/loader.js';
import type { AppConfig } from '../config/types.js';
import { createLogger } from '../logging/logger.js';
import { createServer, initializeApp } from '../server.js';
import {
  OWL_CLASS_QUERY,
  REMOTE_CONTENTS,
  createFakeOctokit,
  makeTempDir,
  removeTempDir,
  writeCatalog,
} from '../testing/fixtures.js';

const logger = createLogger({ level: 'silent' });

function testConfig(root: string, withGitHub: boolean): AppConfig {
  return applyDefaults({
    catalog: { path: root },
    results: { dir: join(root, 'results') },
    server: { logLevel: 'silent' },
    ...(withGitHub ? { github: { owner: 'acme', repo: 'ontologies', modelsPath: 'models' } } : {}),
  });
}

describe('HTTP API', () => {
  let root: string;
  let fastify: FastifyInstance;

  async function start(withGitHub = false): Promise<void> {
    const ctx = await initializeApp(testConfig(root, withGitHub), {
      logger,
      octokit: createFakeOctokit(REMOTE_CONTENTS),
    });
    fastify = await createServer(ctx);
  }

  beforeEach(async () => {
    root = await makeTempDir('api');
    await writeCatalog(root);
  });

  afterEach(async () => {
    await fastify.close();
    await removeTempDir(root);
  });

  describe('health', () => {
    it('reports the model count and graph state', async () => {
      await start();
      const response = await fastify.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', models: 3, graphStale: false });
    });
  });

  describe('models', () => {
    beforeEach(async () => {
      await start();
    });

    it('lists every model without filters', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/models' });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.total).toBe(3);
      expect(body.models[0]).toEqual({
        id: 'alpha',
        metadata: {
          title: 'Alpha Transport Ontology',
          acronym: 'ATO',
          keyword: ['safety', 'transport'],
          language: 'en',
          context: ['Research'],
          designedForTask: ['ConceptualClarification', 'Interoperability'],
          representationStyle: 'OntoumlStyle',
          ontologyType: 'Domain',
        },
      });
    });

    it('filters with and by default', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/models?language=en&keyword=safety' });
      expect(response.json().models.map((model: { id: string }) => model.id)).toEqual(['alpha']);
    });

    it('filters with or, and repeated keys as alternatives', async () => {
      const either = await fastify.inject({ method: 'GET', url: '/models?operand=or&language=pt&keyword=health' });
      expect(either.json().models.map((model: { id: string }) => model.id)).toEqual(['beta', 'gamma']);

      const repeated = await fastify.inject({ method: 'GET', url: '/models?keyword=health&keyword=transport' });
      expect(repeated.json().models.map((model: { id: string }) => model.id)).toEqual(['alpha', 'beta']);
    });

    it('rejects an invalid operand and an unknown field', async () => {
      const operand = await fastify.inject({ method: 'GET', url: '/models?operand=xor&language=en' });
      expect(operand.statusCode).toBe(400);
      expect(operand.json()).toEqual({
        error: 'INVALID_ARGUMENT',
        message: "Invalid operand 'xor'. Use 'and' or 'or'.",
      });

      const field = await fastify.inject({ method: 'GET', url: '/models?colour=red' });
      expect(field.statusCode).toBe(400);
      expect(field.json().message).toBe("Unknown metadata field 'colour'");
    });

    it('rejects a repeated operand', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/models?operand=and&operand=or' });
      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('BAD_REQUEST');
    });

    it('returns model detail', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/models/beta' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ id: 'beta', triples: 1, hasMetadataGraph: false });
      expect(response.json().graphHash).toMatch(/^[0-9a-f]{64}$/);
      expect(response.json()).not.toHaveProperty('metadataGraphHash');
    });

    it('returns 404 for an unknown model', async () => {
      const response = await fastify.inject({ method: 'GET', url: '/models/zeta' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({ error: 'NOT_FOUND', message: "Model with ID 'zeta' not found." });
    });

    it('deletes a model, leaving the merged graph stale until refreshed', async () => {
      const removed = await fastify.inject({ method: 'DELETE', url: '/models/alpha' });
      expect(removed.statusCode).toBe(204);
      expect(removed.body).toBe('');

      const health = await fastify.inject({ method: 'GET', url: '/health' });
      expect(health.json()).toMatchObject({ models: 2, graphStale: true });

      const refreshed = await fastify.inject({ method: 'POST', url: '/catalog/refresh' });
      expect(refreshed.statusCode).toBe(200);
      expect(refreshed.json()).toMatchObject({ models: 2, triples: 3 });

      const again = await fastify.inject({ method: 'DELETE', url: '/models/alpha' });
      expect(again.statusCode).toBe(404);
    });

    it('queries one model and writes under its results folder', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/models/beta/query',
        payload: { name: 'classes', sparql: OWL_CLASS_QUERY },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'executed',
        queryName: 'classes',
        variables: ['class'],
        bindings: [{ class: 'Patient' }],
        resultFile: join(root, 'results', 'beta', 'classes.csv'),
        element: 'beta',
      });

      const repeat = await fastify.inject({
        method: 'POST',
        url: '/models/beta/query',
        payload: { name: 'classes', sparql: OWL_CLASS_QUERY },
      });
      expect(repeat.json()).toEqual({ status: 'skipped', queryName: 'classes', element: 'beta' });
    });

    it('rejects a query request without sparql', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/models/beta/query',
        payload: { name: 'classes' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'BAD_REQUEST', message: 'Invalid query request' });
    });

    it('rejects a query name reserved for the hash record', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/models/beta/query',
        payload: { name: '.hashes', sparql: OWL_CLASS_QUERY },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        error: 'INVALID_ARGUMENT',
        message: "Query name '.hashes' is reserved: it may not start with '.' or end in '_compiled'",
      });
    });
  });

  describe('catalog', () => {
    beforeEach(async () => {
      await start();
    });

    it('queries the merged graph', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/catalog/query',
        payload: { name: 'classes', sparql: OWL_CLASS_QUERY, save: false },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        status: 'executed',
        queryName: 'classes',
        variables: ['class'],
        bindings: [
          { class: 'Driver' },
          { class: 'Vehicle' },
          { class: 'Patient' },
          { class: 'Hazard' },
          { class: 'Vehicle' },
        ],
        element: 'catalog',
      });
    });

    it('maps a query the engine rejects to 400', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/catalog/query',
        payload: { name: 'broken', sparql: 'SELECT ?x WHERE {' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toBe('QUERY_EXECUTION');
    });

    it('fans a query out to every model and compiles the results', async () => {
      const response = await fastify.inject({
        method: 'POST',
        url: '/catalog/models/query',
        payload: { name: 'classes', sparql: OWL_CLASS_QUERY },
      });

      expect(response.statusCode).toBe(200);
      const compiledFile = join(root, 'results', 'classes_compiled.csv');
      expect(response.json().compiledFile).toBe(compiledFile);
      expect(response.json().outcomes.map((entry: { modelId: string }) => entry.modelId)).toEqual([
        'alpha',
        'beta',
        'gamma',
      ]);
      expect(await readFile(compiledFile, 'utf-8')).toBe(
        'model_id,class\nalpha,Driver\nalpha,Vehicle\nbeta,Patient\ngamma,Hazard\ngamma,Vehicle\n'
      );
    });
  });

  describe('remote', () => {
    it('is not mounted without a GitHub catalog', async () => {
      await start();
      const response = await fastify.inject({ method: 'GET', url: '/remote/models' });
      expect(response.statusCode).toBe(404);
    });

    it('lists remote models and reads their metadata', async () => {
      await start(true);

      const list = await fastify.inject({ method: 'GET', url: '/remote/models' });
      expect(list.json()).toEqual({ repository: 'acme/ontologies', models: ['alpha', 'beta'], total: 2 });

      const metadata = await fastify.inject({ method: 'GET', url: '/remote/models/alpha/metadata' });
      expect(metadata.json()).toEqual({
        id: 'alpha',
        metadata: { title: 'Remote Alpha', language: 'en', keyword: ['safety'], designedForTask: [], context: [] },
      });

      const missing = await fastify.inject({ method: 'GET', url: '/remote/models/beta/metadata' });
      expect(missing.statusCode).toBe(404);
    });
  });

  describe('mcp endpoint', () => {
    it('refuses GET in stateless mode', async () => {
      await start();
      const response = await fastify.inject({ method: 'GET', url: '/mcp' });
      expect(response.statusCode).toBe(405);
    });
  });
});
