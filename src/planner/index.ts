export { default as explain } from './explain';
export { default as compareIndexes } from './compare';
export { createIndexStatement } from './annotate';
export * from './type';
