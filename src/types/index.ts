export type * from './track.js';
export type * from './config.js';
export type * from './telegram.js';
export * from './errors.js';
