export * from './types';
export * from './position';
export * from './visitor';
export { parseModule } from './parser';
