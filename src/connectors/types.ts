/**
 * Connector Plugin Interface
 *
 * A connector turns one trace document of an external format into a
 * populated Run. Conversion is synchronous and builds a fresh object graph
 * on every call.
 */

import type { Run } from '../ontology/run.js';

export interface ConnectorOptions {
  /** Clock used wherever the trace has no timestamp */
  now?: () => Date;
  /** Model id recorded when the trace names none */
  defaultModelId?: string;
  /** Interface id stamped on synthesized messages */
  interfaceId?: string;
  /** Version given to inferred tool capabilities */
  capabilityVersion?: string;
  /** Called for input the connector accepts but cannot map */
  onWarning?: (message: string) => void;
}

export interface TraceConnector {
  /** Source format handled, e.g. "openai" */
  readonly format: string;
  /** Connector version */
  readonly version: string;
  readonly description: string;

  /**
   * Convert a parsed trace document.
   *
   * @throws ValidationError when a trace field has the wrong type
   * @throws MalformedTimestampError when a timestamp is not ISO-8601
   */
  convert(trace: unknown, options?: ConnectorOptions): Run;
}
