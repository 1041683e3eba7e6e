export { default as parse, tokenize, formatExpression } from './parser';
export * from './parser/type';
export { default as execute, executeWithContext } from './executor';
export * from './executor/type';
export { explain, compareIndexes, createIndexStatement } from './planner';
export * from './planner/type';
export { default as analyze } from './analyzer';
export * from './analyzer/type';
export { default as BTree, compareKeys, formatKey } from './btree';
export * from './btree/type';
export { buildIndex, buildIndexFromTable } from './btree/build';
export { default as QueryEngine } from './engine';
export { default as MemoryDataset, FixtureSchema } from './dataset/memory';
export type { Fixture } from './dataset/memory';
export type { default as Dataset } from './dataset/type';
export * from './dataset/type';
export * from './errors';
export * from './value';
export type { ValueRecord, Row } from './row';
export { Logger } from './logger';
export type { LogLevel, LoggerOptions } from './logger';
export { resolveOptions } from './config';
export type {
  CostOptions, EngineContext, EngineOptions, ResolvedOptions,
} from './config';
