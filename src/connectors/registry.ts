/**
 * Connector Registry
 *
 * Connectors are keyed by the name of the trace format they read.
 */

import type { TraceConnector } from './types.js';
import { OpenAITraceConnector } from './openai/connector.js';

const connectors = new Map<string, () => TraceConnector>();

/**
 * Register a connector factory for a format. A later registration for the
 * same format replaces the earlier one.
 */
export function registerConnector(format: string, factory: () => TraceConnector): void {
  connectors.set(format, factory);
}

/**
 * Get a connector for a format, or null if none is registered.
 */
export function getConnector(format: string): TraceConnector | null {
  const factory = connectors.get(format);
  return factory ? factory() : null;
}

/**
 * List registered format names in registration order.
 */
export function listConnectors(): string[] {
  return [...connectors.keys()];
}

export function hasConnector(format: string): boolean {
  return connectors.has(format);
}

// ─── Built-in connectors ─────────────────────────────────────

registerConnector('openai', () => new OpenAITraceConnector());
