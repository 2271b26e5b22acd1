import { randomUUID } from 'crypto';
import type { ExecutionTrigger } from '../../types/index.js';

/**
 * Short correlation ID for tracing one queue execution through the logs.
 * First 8 chars of a UUID.
 */
export function generateCorrelationId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Bound into every log line an execution writes.
 */
export interface ExecutionContext {
  correlationId: string;
  queueId: number;
  instanceId: number;
  trigger: ExecutionTrigger;
}

export function createExecutionContext(
  queueId: number,
  instanceId: number,
  trigger: ExecutionTrigger,
): ExecutionContext {
  return {
    correlationId: generateCorrelationId(),
    queueId,
    instanceId,
    trigger,
  };
}
