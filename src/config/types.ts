/**
 * Configuration types for the catalog server.
 *
 * These types define the structure of config.yaml and provide
 * type-safe access to server configuration.
 */

import type { ModelErrorPolicy } from '../catalog/Catalog.js';
import type { LogLevel } from '../logging/logger.js';
import type { IriFormat } from '../queryable/types.js';

/**
 * Top-level configuration.
 */
export interface AppConfig {
  catalog: CatalogConfig;
  results: ResultsConfig;
  server: ServerConfig;
  github?: GitHubCatalogConfig;
}

/**
 * Where the catalog lives and how it is loaded.
 */
export interface CatalogConfig {
  /** Catalog root directory (default: './catalog') */
  path: string;
  /** Folder under the root holding the model folders (default: 'models') */
  modelsDir: string;
  /** Maximum number of models to load, 0 for all (default: 0) */
  limit: number;
  /** 'fail' aborts the load on the first bad model, 'skip' logs and continues (default: 'fail') */
  onModelError: ModelErrorPolicy;
}

/**
 * Query result settings.
 */
export interface ResultsConfig {
  /** Directory for result files and the hash record (default: './results') */
  dir: string;
  /** How IRIs are written in results (default: 'local-name') */
  iriFormat: IriFormat;
}

/**
 * Server settings.
 */
export interface ServerConfig {
  /** Port to listen on (default: 3001) */
  port: number;
  /** Host to bind to (default: '0.0.0.0') */
  host: string;
  /** Log level (default: 'info') */
  logLevel: LogLevel;
  /** CORS configuration */
  cors: CorsConfig;
}

/**
 * CORS configuration.
 */
export interface CorsConfig {
  /** Whether CORS is enabled (default: true) */
  enabled: boolean;
  /** Allowed origins (default: ['*']) */
  origins: string[];
}

/**
 * A catalog published in a GitHub repository.
 */
export interface GitHubCatalogConfig {
  owner: string;
  repo: string;
  /** Models directory inside the repository (default: 'models') */
  modelsPath: string;
  /** Branch, tag or commit */
  ref?: string;
  /** Personal access token; anonymous access otherwise */
  token?: string;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: AppConfig = {
  catalog: {
    path: './catalog',
    modelsDir: 'models',
    limit: 0,
    onModelError: 'fail',
  },
  results: {
    dir: './results',
    iriFormat: 'local-name',
  },
  server: {
    port: 3001,
    host: '0.0.0.0',
    logLevel: 'info',
    cors: {
      enabled: true,
      origins: ['*'],
    },
  },
};
