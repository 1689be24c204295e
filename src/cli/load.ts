/**
 * Input loading for CLI commands.
 *
 * Commands accept either a raw trace (converted with a registered
 * connector) or a document previously written by `agentlog convert`.
 */

import { readFile } from 'node:fs/promises';
import { isJsonObject } from '../ontology/json.js';
import type { Run } from '../ontology/run.js';
import { fromDocument } from '../serializer/index.js';
import { getConnector, listConnectors, type ConnectorOptions } from '../connectors/index.js';
import type { AgentLogConfig } from '../config.js';

export interface LoadOptions {
  /** Trace format; defaults to the configured one */
  format?: string;
  onWarning?: (message: string) => void;
}

/**
 * Read and parse a JSON file.
 */
export async function readJsonFile(path: string): Promise<unknown> {
  const raw = await readFile(path, 'utf-8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`${path} is not valid JSON: ${reason}`);
  }
}

/**
 * Serialized ontology documents carry `agent` and `start_time` at the top
 * level; traces do not.
 */
export function isOntologyDocument(data: unknown): boolean {
  return isJsonObject(data) && 'agent' in data && 'start_time' in data;
}

export function connectorOptions(config: AgentLogConfig, onWarning?: (message: string) => void): ConnectorOptions {
  return {
    defaultModelId: config.connector.defaultModelId,
    interfaceId: config.connector.interfaceId,
    capabilityVersion: config.connector.capabilityVersion,
    onWarning,
  };
}

/**
 * Convert parsed trace data with the connector for `format`.
 */
export function convertTrace(
  data: unknown,
  config: AgentLogConfig,
  options: LoadOptions = {},
): Run {
  const format = options.format ?? config.connector.defaultFormat;
  const connector = getConnector(format);
  if (!connector) {
    throw new Error(`Unknown trace format "${format}". Available: ${listConnectors().join(', ')}`);
  }
  return connector.convert(data, connectorOptions(config, options.onWarning));
}

/**
 * Load a Run from a trace or ontology document on disk.
 */
export async function loadRun(path: string, config: AgentLogConfig, options: LoadOptions = {}): Promise<Run> {
  const data = await readJsonFile(path);
  if (isOntologyDocument(data)) {
    return fromDocument(data);
  }
  return convertTrace(data, config, options);
}
