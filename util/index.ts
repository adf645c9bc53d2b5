export * from './dialect';
export * from './errors';
export * from './escape-hatch';
export * from './liveness';
export * from './logger';
export * from './scope';
export * from './scope-builder';
export * from './usage';
export * from './util';
export * from './walker';
