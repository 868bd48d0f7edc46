/**
 * Model — One ontology model stored as a folder.
 *
 * A model folder holds exactly one ontology file (any RDF extension n3
 * parses) and a metadata.yaml. A metadata.ttl next to them is loaded as a
 * separate metadata graph; it is not part of the queried graph.
 */

import { readFile, readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import type { Store } from 'n3';
import { computeGraphHash } from '../graph/canonicalHash.js';
import { guessFormat, loadGraph } from '../graph/GraphLoader.js';
import { getDefaultLogger } from '../logging/logger.js';
import { GraphQueryExecutor, type GraphQueryExecutorOptions } from '../queryable/GraphQueryExecutor.js';
import type { ExecuteQueryOptions, QueryOutcome, Queryable } from '../queryable/types.js';
import type { Query } from '../query/Query.js';
import {
  IOError,
  InvalidValueError,
  NotFoundError,
  ParseError,
  describeError,
  errnoCode,
} from '../errors.js';
import { mapMetadata, type ModelMetadata } from './metadata.js';

export const METADATA_YAML_FILES = ['metadata.yaml', 'metadata.yml'];
const METADATA_GRAPH_FILE = 'metadata.ttl';

export type ModelOptions = GraphQueryExecutorOptions;

async function listFiles(folder: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(folder, { withFileTypes: true });
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new NotFoundError(`Model folder ${folder} not found.`, { cause: err });
    }
    throw new IOError(`Failed to list model folder ${folder}: ${describeError(err)}`, { cause: err });
  }
  return entries.filter(entry => entry.isFile()).map(entry => entry.name);
}

/**
 * The single ontology file among a folder's files.
 */
function findOntologyFile(folder: string, files: readonly string[]): string {
  const candidates = files.filter(name =>
    guessFormat(name) !== undefined && basename(name, extname(name)).toLowerCase() !== 'metadata'
  );

  const [first, ...rest] = candidates;
  if (first === undefined) {
    throw new NotFoundError(`No ontology file found in model folder ${folder}.`);
  }
  if (rest.length > 0) {
    throw new InvalidValueError(
      `Model folder ${folder} has more than one ontology file: ${candidates.join(', ')}`,
      candidates
    );
  }
  return join(folder, first);
}

/**
 * Parse metadata YAML text. `source` names it in errors.
 *
 * @throws ParseError on malformed YAML or a document that is not a mapping
 * @throws InvalidValueError when a value does not fit the metadata schema
 */
export function parseMetadata(content: string, source: string): ModelMetadata {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ParseError(`Error parsing metadata file ${source}: ${describeError(err)}`, source, { cause: err });
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ParseError(`Metadata file ${source} must contain a mapping`, source);
  }

  const result = mapMetadata(raw);
  if (!result.success) {
    throw new InvalidValueError(
      `Invalid metadata in ${source}: ${result.errors.join('; ')}`,
      result.errors
    );
  }
  return result.metadata;
}

/**
 * Read and map a metadata YAML file.
 *
 * @throws ParseError on malformed YAML or a document that is not a mapping
 * @throws InvalidValueError when a value does not fit the metadata schema
 */
export async function readMetadataFile(filePath: string): Promise<ModelMetadata> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw new NotFoundError(`Metadata file ${filePath} not found.`, { cause: err });
    }
    throw new IOError(`Failed to read metadata file ${filePath}: ${describeError(err)}`, { cause: err });
  }

  return parseMetadata(content, filePath);
}

export class Model implements Queryable {
  readonly id: string;
  readonly path: string | undefined;
  readonly metadata: ModelMetadata;
  readonly metadataGraph: Store | undefined;
  /** Canonical hash of `metadataGraph`, computed at construction */
  readonly metadataGraphHash: string | undefined;
  private readonly executor: GraphQueryExecutor;

  private constructor(
    id: string,
    graph: Store,
    metadata: ModelMetadata,
    options: ModelOptions,
    path?: string,
    metadataGraph?: Store
  ) {
    this.id = id;
    this.path = path;
    this.metadata = metadata;
    this.metadataGraph = metadataGraph;
    this.metadataGraphHash = metadataGraph !== undefined ? computeGraphHash(metadataGraph) : undefined;
    this.executor = new GraphQueryExecutor(id, graph, options);
  }

  /**
   * Load a model from its folder. The id is the folder name.
   *
   * @throws NotFoundError when the folder, its ontology file or its metadata file is missing
   * @throws ParseError when either file is malformed
   * @throws InvalidValueError on several ontology files or invalid metadata values
   */
  static async load(folder: string, options: ModelOptions = {}): Promise<Model> {
    const logger = options.logger ?? getDefaultLogger();
    const files = await listFiles(folder);

    const ontologyFile = findOntologyFile(folder, files);
    const metadataFile = METADATA_YAML_FILES.find(name => files.includes(name));
    if (metadataFile === undefined) {
      throw new NotFoundError(`Metadata file not found in model folder ${folder}.`);
    }

    const graph = await loadGraph(ontologyFile);
    const metadataGraph = files.includes(METADATA_GRAPH_FILE)
      ? await loadGraph(join(folder, METADATA_GRAPH_FILE))
      : undefined;
    const metadata = await readMetadataFile(join(folder, metadataFile));

    const model = new Model(basename(folder), graph, metadata, options, folder, metadataGraph);
    // hashed once, at load
    model.graphHash();

    logger.info({ model: model.id, triples: graph.size }, 'Loaded model');
    return model;
  }

  /**
   * Build a model from a graph already in memory.
   */
  static fromGraph(id: string, graph: Store, metadata: ModelMetadata, options: ModelOptions = {}): Model {
    return new Model(id, graph, metadata, options);
  }

  get graph(): Store {
    return this.executor.graph;
  }

  get tripleCount(): number {
    return this.executor.graph.size;
  }

  graphHash(): string {
    return this.executor.graphHash();
  }

  executeQuery(query: Query, options?: ExecuteQueryOptions): Promise<QueryOutcome> {
    return this.executor.executeQuery(query, options);
  }

  executeQueries(queries: readonly Query[], options?: ExecuteQueryOptions): Promise<QueryOutcome[]> {
    return this.executor.executeQueries(queries, options);
  }
}
