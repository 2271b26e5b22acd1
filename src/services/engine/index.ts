export { QueueExecutionEngine, HardStopError } from './engine.js';
export type { EngineDeps } from './engine.js';
export { createArrClientFactory } from './client-factory.js';
export type { ClientSettings } from './client-factory.js';
export type {
  ArrClientFactory,
  ClientHooks,
  EngineOptions,
  ExecuteOptions,
  ExecutionResult,
  ExecutionStatus,
  QueueExecutor,
} from './types.js';
