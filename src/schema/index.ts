// src/schema/index.ts

export * from './spec';
export * from './config';
export type * from './report';
export type * from './git';
