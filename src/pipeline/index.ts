/**
 * Pipeline
 *
 * Entry point for the capture-to-insight orchestrator and its background
 * indexer.
 */

export * from './types';
export { create } from './orchestrator';
export * as Indexer from './indexer';
export * as Events from './events';
