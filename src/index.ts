/**
 * ontology-catalog — Metadata-driven catalog of ontology models with
 * memoized SPARQL execution.
 *
 * This is the main entry point for the library.
 */

// Errors and logging
export * from './errors.js';
export { createLogger, getDefaultLogger, setDefaultLogger } from './logging/logger.js';
export type { Logger, LogLevel, LoggerOptions } from './logging/logger.js';

// Graphs and hashing
export { loadGraph, parseGraph, mergeGraphs, guessFormat, RDF_EXTENSIONS } from './graph/GraphLoader.js';
export { canonicalTriples, computeGraphHash } from './graph/canonicalHash.js';
export { sha256Hex } from './hash/contentHash.js';

// Queries and execution
export { Query, loadAllQueries, QUERY_EXTENSIONS } from './query/Query.js';
export { GraphQueryExecutor, localName, DEFAULT_RESULTS_DIR } from './queryable/GraphQueryExecutor.js';
export type { GraphQueryExecutorOptions } from './queryable/GraphQueryExecutor.js';
export * from './queryable/types.js';
export { HashRecord, HASH_RECORD_FILE } from './results/HashRecord.js';

// Models
export { Model, parseMetadata, readMetadataFile } from './model/Model.js';
export type { ModelOptions } from './model/Model.js';
export * from './model/metadata.js';
export * from './model/enumerations.js';

// Catalog
export * from './catalog/Catalog.js';
export * from './catalog/ModelFilter.js';
export { RemoteCatalogIndex } from './catalog/RemoteCatalogIndex.js';
export type { RemoteCatalogConfig } from './catalog/RemoteCatalogIndex.js';

// Configuration
export { loadConfig, validateConfig, applyDefaults, ConfigValidationError } from './config/loader.js';
export * from './config/types.js';

// Server
export { initializeApp, createServer, startServer } from './server.js';
export type { AppContext } from './server.js';
