export * from './types';
export * as Silence from './silence';
export * as Wav from './wav';
export * as Session from './session';
export * as StdinSource from './stdin-source';
