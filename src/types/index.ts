export type * from './config.js';
export type * from './completion.js';
export type * from './query.js';
