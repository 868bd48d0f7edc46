/**
 * Catalog — A folder of model folders, plus the merged graph of them all.
 *
 * The catalog is queryable itself (over the merged graph) and fans
 * queries out to its models. Adding or removing a model does not rebuild
 * the merged graph: the catalog reports itself stale until
 * `refreshGraph()` is called.
 */

import { readdir } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join, resolve } from 'node:path';
import type { Store } from 'n3';
import { mergeGraphs } from '../graph/GraphLoader.js';
import { getDefaultLogger, type Logger } from '../logging/logger.js';
import { Model } from '../model/Model.js';
import type { Query } from '../query/Query.js';
import {
  DEFAULT_RESULTS_DIR,
  GraphQueryExecutor,
  type GraphQueryExecutorOptions,
} from '../queryable/GraphQueryExecutor.js';
import type { ExecuteQueryOptions, QueryOutcome, Queryable } from '../queryable/types.js';
import {
  ensureResultsDir,
  modelResultsDir,
  readResultFile,
  resultFilePath,
  writeCompiledResults,
  type ModelResultTable,
} from '../results/ResultFiles.js';
import {
  CatalogError,
  IOError,
  InvalidArgumentError,
  NotFoundError,
  describeError,
  errnoCode,
} from '../errors.js';
import { buildFilter, matchesFilter, type FilterValues, type ModelFilter } from './ModelFilter.js';

export const CATALOG_ID = 'catalog';
export const DEFAULT_MODELS_DIR = 'models';

export type ModelErrorPolicy = 'fail' | 'skip';

export interface CatalogLoadOptions extends GraphQueryExecutorOptions {
  /** Stop after this many models; 0 loads all (default: 0) */
  limit?: number;
  /** Folder under the root holding one folder per model (default: 'models') */
  modelsDir?: string;
  /** What a model that fails to load does to the whole load (default: 'fail') */
  onModelError?: ModelErrorPolicy;
}

export interface ModelLoadFailure {
  folder: string;
  code: string;
  message: string;
}

export interface ModelQueryOutcome {
  modelId: string;
  outcome: QueryOutcome;
}

export interface FanOutResult {
  queryName: string;
  outcomes: ModelQueryOutcome[];
  /** Compiled file of all per-model results, when saved and any exist */
  compiledFile?: string;
}

async function listModelFolders(modelsPath: string): Promise<string[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(modelsPath, { withFileTypes: true });
  } catch (err) {
    const code = errnoCode(err);
    if (code === 'ENOENT' || code === 'ENOTDIR') {
      throw new NotFoundError(`Models directory ${modelsPath} not found.`, { cause: err });
    }
    throw new IOError(`Failed to list models directory ${modelsPath}: ${describeError(err)}`, { cause: err });
  }

  return entries
    .filter(entry => entry.isDirectory())
    .map(entry => entry.name)
    .sort();
}

export class Catalog implements Queryable {
  readonly id = CATALOG_ID;
  readonly path: string | undefined;
  readonly loadFailures: readonly ModelLoadFailure[];
  private readonly modelList: Model[];
  private readonly executor: GraphQueryExecutor;
  private readonly logger: Logger;
  private readonly defaultResultsDir: string;
  private stale = false;

  private constructor(
    models: Model[],
    options: GraphQueryExecutorOptions,
    path?: string,
    loadFailures: ModelLoadFailure[] = []
  ) {
    this.modelList = models;
    this.path = path;
    this.loadFailures = loadFailures;
    this.logger = options.logger ?? getDefaultLogger();
    this.defaultResultsDir = options.resultsDir ?? DEFAULT_RESULTS_DIR;
    this.executor = new GraphQueryExecutor(CATALOG_ID, this.mergeGraphs(), options);
  }

  /**
   * Load every model folder under `<root>/<modelsDir>`, in name order.
   *
   * @throws NotFoundError when the models directory is missing or holds no folders
   */
  static async load(root: string, options: CatalogLoadOptions = {}): Promise<Catalog> {
    const {
      limit = 0,
      modelsDir = DEFAULT_MODELS_DIR,
      onModelError = 'fail',
      ...executorOptions
    } = options;
    const logger = executorOptions.logger ?? getDefaultLogger();

    if (!Number.isInteger(limit) || limit < 0) {
      throw new InvalidArgumentError(`limit must be a non-negative integer, got ${limit}`);
    }

    const modelsPath = join(root, modelsDir);
    const folders = await listModelFolders(modelsPath);
    if (folders.length === 0) {
      throw new NotFoundError(`No model folders found in ${modelsPath}.`);
    }

    const models: Model[] = [];
    const failures: ModelLoadFailure[] = [];

    for (const folder of folders) {
      if (limit > 0 && models.length >= limit) {
        break;
      }

      const folderPath = join(modelsPath, folder);
      try {
        models.push(await Model.load(folderPath, executorOptions));
      } catch (err) {
        if (onModelError === 'fail') {
          throw err;
        }
        const code = err instanceof CatalogError ? err.code : 'UNKNOWN';
        logger.warn({ folder: folderPath, code, err: describeError(err) }, 'Skipping model that failed to load');
        failures.push({ folder: folderPath, code, message: describeError(err) });
      }
    }

    const catalog = new Catalog(models, executorOptions, resolve(root), failures);
    logger.info(
      { root: catalog.path, models: models.length, failures: failures.length },
      'Catalog loaded'
    );
    return catalog;
  }

  /**
   * A catalog over models already in memory.
   */
  static fromModels(models: readonly Model[], options: GraphQueryExecutorOptions = {}): Catalog {
    const ids = new Set<string>();
    for (const model of models) {
      if (ids.has(model.id)) {
        throw new InvalidArgumentError(`Duplicate model ID '${model.id}'`);
      }
      ids.add(model.id);
    }
    return new Catalog([...models], options);
  }

  get models(): readonly Model[] {
    return this.modelList;
  }

  get graph(): Store {
    return this.executor.graph;
  }

  /** True when models changed since the merged graph was built */
  get isGraphStale(): boolean {
    return this.stale;
  }

  /**
   * Union of all current model graphs, in a fresh store.
   */
  mergeGraphs(): Store {
    return mergeGraphs(this.modelList.map(model => model.graph));
  }

  refreshGraph(): void {
    this.executor.replaceGraph(this.mergeGraphs());
    this.stale = false;
    this.logger.info({ models: this.modelList.length, triples: this.graph.size }, 'Merged graph rebuilt');
  }

  graphHash(): string {
    return this.executor.graphHash();
  }

  executeQuery(query: Query, options?: ExecuteQueryOptions): Promise<QueryOutcome> {
    this.warnIfStale(query);
    return this.executor.executeQuery(query, options);
  }

  executeQueries(queries: readonly Query[], options?: ExecuteQueryOptions): Promise<QueryOutcome[]> {
    for (const query of queries) {
      this.warnIfStale(query);
    }
    return this.executor.executeQueries(queries, options);
  }

  /**
   * @throws NotFoundError when no model has the id
   */
  getModel(id: string): Model {
    const model = this.modelList.find(candidate => candidate.id === id);
    if (model === undefined) {
      throw new NotFoundError(`Model with ID '${id}' not found.`);
    }
    return model;
  }

  hasModel(id: string): boolean {
    return this.modelList.some(model => model.id === id);
  }

  addModel(model: Model): void {
    if (this.hasModel(model.id)) {
      throw new InvalidArgumentError(`Model with ID '${model.id}' already exists in the catalog.`);
    }
    this.modelList.push(model);
    this.stale = true;
    this.logger.info({ model: model.id }, 'Model added');
  }

  removeModelById(id: string): void {
    const index = this.modelList.findIndex(model => model.id === id);
    if (index < 0) {
      throw new NotFoundError(`Model with ID '${id}' not found.`);
    }
    this.modelList.splice(index, 1);
    this.stale = true;
    this.logger.info({ model: id }, 'Model removed');
  }

  /**
   * Models whose metadata matches the field filters, combined by `and` or `or`.
   *
   * @throws InvalidArgumentError on another operand or an unknown field
   */
  getModels(operand: string, filters: FilterValues): Model[] {
    return this.selectModels(buildFilter(operand, filters));
  }

  selectModels(filter: ModelFilter): Model[] {
    return this.modelList.filter(model => matchesFilter(model.metadata, filter));
  }

  /**
   * Run a query on one model; results go to `<resultsDir>/<modelId>/`.
   */
  async executeQueryOnModel(query: Query, modelId: string, options: ExecuteQueryOptions = {}): Promise<QueryOutcome> {
    const model = this.getModel(modelId);
    const baseDir = options.resultsDir ?? this.defaultResultsDir;
    return model.executeQuery(query, { ...options, resultsDir: modelResultsDir(baseDir, model.id) });
  }

  /**
   * Run a query on every model in order, then compile the per-model
   * result files into `<resultsDir>/<query>_compiled.csv`.
   */
  async executeQueryOnModels(query: Query, options: ExecuteQueryOptions = {}): Promise<FanOutResult> {
    const outcomes: ModelQueryOutcome[] = [];
    for (const model of this.modelList) {
      outcomes.push({ modelId: model.id, outcome: await this.executeQueryOnModel(query, model.id, options) });
    }

    if (options.save === false) {
      return { queryName: query.name, outcomes };
    }

    const compiledFile = await this.compileResults(query, options.resultsDir ?? this.defaultResultsDir);
    return {
      queryName: query.name,
      outcomes,
      ...(compiledFile !== null ? { compiledFile } : {}),
    };
  }

  async executeQueriesOnModels(queries: readonly Query[], options: ExecuteQueryOptions = {}): Promise<FanOutResult[]> {
    const results: FanOutResult[] = [];
    for (const query of queries) {
      results.push(await this.executeQueryOnModels(query, options));
    }
    return results;
  }

  private async compileResults(query: Query, baseDir: string): Promise<string | null> {
    const tables: ModelResultTable[] = [];
    for (const model of this.modelList) {
      const table = await readResultFile(resultFilePath(modelResultsDir(baseDir, model.id), query.name));
      if (table !== null) {
        tables.push({ modelId: model.id, table });
      }
    }

    if (tables.length === 0) {
      return null;
    }
    await ensureResultsDir(baseDir);
    const compiledFile = await writeCompiledResults(baseDir, query.name, tables);
    if (compiledFile !== null) {
      this.logger.info({ query: query.name, models: tables.length, compiledFile }, 'Compiled results written');
    }
    return compiledFile;
  }

  private warnIfStale(query: Query): void {
    if (this.stale) {
      this.logger.warn(
        { query: query.name },
        'Merged graph is stale: models changed since it was built; call refreshGraph()'
      );
    }
  }
}
