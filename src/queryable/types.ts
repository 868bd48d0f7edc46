/**
 * Types for the queryable capability shared by models and the catalog.
 */

import type { Query } from '../query/Query.js';

/**
 * How IRIs are rendered in result bindings.
 * - `local-name`: the part after the last '#' or '/'
 * - `full`: the complete IRI
 */
export type IriFormat = 'local-name' | 'full';

/**
 * One result row: variable name to rendered value. Unbound variables are absent.
 */
export type ResultBinding = Record<string, string>;

export interface ExecuteQueryOptions {
  /** Directory for the result file and hash record (default: the executor's) */
  resultsDir?: string;
  /** Consult and update the hash record, and write results (default: true) */
  save?: boolean;
}

export interface ExecutedQuery {
  status: 'executed';
  queryName: string;
  /** Projection variables, in query order */
  variables: string[];
  bindings: ResultBinding[];
  /** Result file written, when saved */
  resultFile?: string;
}

export interface SkippedQuery {
  status: 'skipped';
  queryName: string;
}

/**
 * A skipped query has nothing to return: previous results are not read back.
 */
export type QueryOutcome = ExecutedQuery | SkippedQuery;

/**
 * Something holding an RDF graph that SPARQL queries run against.
 */
export interface Queryable {
  readonly id: string;
  /** SHA-256 hex of the canonical serialization of the graph */
  graphHash(): string;
  executeQuery(query: Query, options?: ExecuteQueryOptions): Promise<QueryOutcome>;
  /** Runs the queries one after another; the first failure stops the batch */
  executeQueries(queries: readonly Query[], options?: ExecuteQueryOptions): Promise<QueryOutcome[]>;
}
