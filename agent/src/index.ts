export { default as DdiAgent } from './agent';
export type { DdiAgentDependencies } from './agent';
export * from './config-loader';
export { parseCliArgs } from './cli';
export * from './errors';
export * from './ddi';
export * from './transport';
export * from './logging';
