/**
 * Telemetry Context Module
 *
 * Carries per-invocation correlation fields (run ID, workflow mode)
 * through async calls so every log line of one workflow run can be
 * tied together without threading a logger through each node.
 *
 * @module @docqa/core/telemetry/context
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

// =============================================================================
// Telemetry Context Types
// =============================================================================

/**
 * Source of the telemetry event
 */
export type TelemetrySource = 'cli' | 'service' | 'internal';

/**
 * Severity levels (aligned with Cloud Logging)
 */
export type Severity = 'DEBUG' | 'INFO' | 'NOTICE' | 'WARNING' | 'ERROR' | 'CRITICAL';

/**
 * Context that flows through one workflow invocation
 */
export interface TelemetryContext {
  /** Unique ID of the workflow invocation */
  runId: string;
  /** Workflow mode being executed */
  mode?: string;
  /** Component that started the invocation */
  source: TelemetrySource;
  /** When the context was created */
  timestamp: Date;
}

// =============================================================================
// Async Local Storage for Context Propagation
// =============================================================================

const telemetryStorage = new AsyncLocalStorage<TelemetryContext>();

/**
 * Get the current telemetry context from async local storage
 */
export function getCurrentContext(): TelemetryContext | undefined {
  return telemetryStorage.getStore();
}

/**
 * Run a function with a telemetry context
 */
export function runWithContext<T>(ctx: TelemetryContext, fn: () => T): T {
  return telemetryStorage.run(ctx, fn);
}

// =============================================================================
// Context Creation
// =============================================================================

/**
 * Generate a run ID
 */
export function generateRunId(): string {
  return randomUUID();
}

/**
 * Create a new telemetry context
 */
export function createContext(
  source: TelemetrySource,
  overrides?: Partial<TelemetryContext>
): TelemetryContext {
  return {
    runId: generateRunId(),
    source,
    timestamp: new Date(),
    ...overrides,
  };
}
