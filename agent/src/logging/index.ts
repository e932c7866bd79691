/**
 * Logging Module
 * ==============
 *
 * Agent log collection, storage, and retrieval.
 */

export * from './types';
export { LocalLogBackend } from './local-backend';
export type { LocalLogBackendOptions } from './local-backend';
export { AgentLogger } from './agent-logger';
export type { AgentLoggerOptions } from './agent-logger';
export { ComponentLogger } from './component-logger';
