export * from './types';
export { create, buildContext, formatSources } from './synthesizer';
export type { ContextEntry } from './synthesizer';
