/**
 * agentlog
 *
 * Public API for programmatic usage.
 */

// Ontology: entity schemas, run/step model, step tree queries
export * from './ontology/index.js';

// Connectors
export {
  fromOpenAITrace,
  OpenAITraceConnector,
  OpenAITraceSchema,
  OpenAITraceStepSchema,
  registerConnector,
  getConnector,
  listConnectors,
  hasConnector,
  DEFAULT_MODEL_ID,
  DEFAULT_INTERFACE_ID,
  DEFAULT_CAPABILITY_VERSION,
} from './connectors/index.js';
export type { ConnectorOptions, TraceConnector, OpenAITrace, OpenAITraceStep } from './connectors/index.js';

// Serializer
export {
  entityToDocument,
  toDocument,
  fromDocument,
  serializeRun,
  deserializeRun,
  DEFAULT_INDENT,
} from './serializer/index.js';
export type { SerializeOptions } from './serializer/index.js';

// Config
export {
  ConfigSchema,
  defaultConfig,
  loadConfig,
  saveConfig,
  initializeProject,
  isInitialized,
  localConfigDir,
  localConfigPath,
  globalConfigDir,
  AGENTLOG_DIR,
  CONFIG_FILE,
} from './config.js';
export type { AgentLogConfig } from './config.js';
