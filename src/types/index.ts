export * from './action';
export * from './android';
export type * from './environment';
export type * from './worker';
export type * from './reward';
