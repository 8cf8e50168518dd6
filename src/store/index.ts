/**
 * Insight Store
 *
 * Entry point for durable insight records and the browsable index.
 */

export * from './types';
export { create } from './store';
export { generateTitle, extractTags, uniqueTags } from './text';
export { parseInsight, serializeInsight } from './record';
export { parseIndex, renderIndex, formatTimestamp } from './index-file';
