/**
 * Handler exports for the API layer.
 */

export * from './ModelHandlers.js';
export * from './CatalogHandlers.js';
export * from './RemoteHandlers.js';
