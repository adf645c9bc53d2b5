export * from './syntax';
export * from './typeguard';
export * from './util';
export * from './rules/unusedLocalVariableRule';
