/**
 * GraphQueryExecutor — Runs SPARQL queries against one n3 store and
 * avoids running the same (graph, query) pair twice.
 *
 * The cache is write-avoidance only: when the pair is already listed in
 * the results directory's hash record, the query is skipped and nothing
 * is read back.
 *
 * Models and the catalog each own an executor rather than extending a
 * common base class.
 */

import { QueryEngine } from '@comunica/query-sparql';
import type * as RDF from '@rdfjs/types';
import type { Store } from 'n3';
import { computeGraphHash } from '../graph/canonicalHash.js';
import { getDefaultLogger, type Logger } from '../logging/logger.js';
import type { Query } from '../query/Query.js';
import { HashRecord } from '../results/HashRecord.js';
import { assertQueryName, ensureResultsDir, writeResultFile } from '../results/ResultFiles.js';
import {
  CatalogError,
  InvalidArgumentError,
  QueryExecutionError,
  describeError,
} from '../errors.js';
import type {
  ExecuteQueryOptions,
  IriFormat,
  QueryOutcome,
  Queryable,
  ResultBinding,
} from './types.js';

export const DEFAULT_RESULTS_DIR = './results';

export interface GraphQueryExecutorOptions {
  logger?: Logger;
  iriFormat?: IriFormat;
  /** Used when a call gives no resultsDir (default: './results') */
  resultsDir?: string;
  /** Shared engine; one is created lazily otherwise */
  engine?: QueryEngine;
}

let sharedEngine: QueryEngine | undefined;

function getSharedEngine(): QueryEngine {
  if (sharedEngine === undefined) {
    sharedEngine = new QueryEngine();
  }
  return sharedEngine;
}

/**
 * Local name of an IRI: the text after the last '#' or '/'. IRIs ending
 * in a separator are returned whole.
 */
export function localName(iri: string): string {
  const index = Math.max(iri.lastIndexOf('#'), iri.lastIndexOf('/'));
  if (index < 0 || index === iri.length - 1) {
    return iri;
  }
  return iri.slice(index + 1);
}

export function renderTerm(term: RDF.Term, iriFormat: IriFormat): string {
  if (term.termType === 'NamedNode' && iriFormat === 'local-name') {
    return localName(term.value);
  }
  return term.value;
}

export class GraphQueryExecutor implements Queryable {
  readonly id: string;
  private store: Store;
  private hash: string | undefined;
  private readonly logger: Logger;
  private readonly iriFormat: IriFormat;
  private readonly defaultResultsDir: string;
  private readonly engine: QueryEngine | undefined;

  constructor(id: string, store: Store, options: GraphQueryExecutorOptions = {}) {
    this.id = id;
    this.store = store;
    this.logger = options.logger ?? getDefaultLogger();
    this.iriFormat = options.iriFormat ?? 'local-name';
    this.defaultResultsDir = options.resultsDir ?? DEFAULT_RESULTS_DIR;
    this.engine = options.engine;
  }

  get graph(): Store {
    return this.store;
  }

  /**
   * Swap the graph; the hash is recomputed on next use.
   */
  replaceGraph(store: Store): void {
    this.store = store;
    this.hash = undefined;
  }

  graphHash(): string {
    if (this.hash === undefined) {
      this.hash = computeGraphHash(this.store);
    }
    return this.hash;
  }

  async executeQuery(query: Query, options: ExecuteQueryOptions = {}): Promise<QueryOutcome> {
    const save = options.save ?? true;
    const resultsDir = options.resultsDir ?? this.defaultResultsDir;
    if (save) {
      assertQueryName(query.name);
    }
    const graphHash = this.graphHash();

    const record = new HashRecord(resultsDir);
    if (save && await record.has(graphHash, query.hash)) {
      this.logger.info(
        { element: this.id, query: query.name, queryHash: query.hash, graphHash },
        'Skipping query already executed against this graph'
      );
      return { status: 'skipped', queryName: query.name };
    }

    this.logger.info({ element: this.id, query: query.name }, 'Executing query');
    const { variables, bindings } = await this.runSelect(query);
    this.logger.debug({ element: this.id, query: query.name, rows: bindings.length }, 'Query returned');

    if (!save) {
      return { status: 'executed', queryName: query.name, variables, bindings };
    }

    await ensureResultsDir(resultsDir);
    const resultFile = await writeResultFile(resultsDir, query.name, variables, bindings);
    await record.append(graphHash, query.hash);
    this.logger.info({ element: this.id, resultFile }, 'Results written');

    return { status: 'executed', queryName: query.name, variables, bindings, resultFile };
  }

  async executeQueries(queries: readonly Query[], options: ExecuteQueryOptions = {}): Promise<QueryOutcome[]> {
    const outcomes: QueryOutcome[] = [];
    for (const query of queries) {
      outcomes.push(await this.executeQuery(query, options));
    }
    return outcomes;
  }

  private async runSelect(query: Query): Promise<{ variables: string[]; bindings: ResultBinding[] }> {
    const engine = this.engine ?? getSharedEngine();

    try {
      const result = await engine.query(query.text, { sources: [this.store] });
      if (result.resultType !== 'bindings') {
        throw new InvalidArgumentError(
          `Query '${query.name}' is a ${result.resultType} query; only SELECT queries produce bindings`
        );
      }

      const metadata = await result.metadata();
      const variables = metadata.variables.map(variable => variable.value);

      const stream = await result.execute();
      const rows = await stream.toArray();
      const bindings = rows.map(row => {
        const binding: ResultBinding = {};
        for (const [variable, term] of row) {
          binding[variable.value] = renderTerm(term, this.iriFormat);
        }
        return binding;
      });

      return { variables, bindings };
    } catch (err) {
      if (err instanceof CatalogError) {
        throw err;
      }
      throw new QueryExecutionError(
        query.name,
        `Query '${query.name}' failed on '${this.id}': ${describeError(err)}`,
        { cause: err }
      );
    }
  }
}
