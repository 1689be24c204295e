export type { ConnectorOptions, TraceConnector } from './types.js';
export { registerConnector, getConnector, listConnectors, hasConnector } from './registry.js';
export {
  fromOpenAITrace,
  OpenAITraceConnector,
  DEFAULT_MODEL_ID,
  DEFAULT_INTERFACE_ID,
  DEFAULT_CAPABILITY_VERSION,
} from './openai/connector.js';
export {
  OpenAITraceSchema,
  OpenAITraceStepSchema,
  type OpenAITrace,
  type OpenAITraceStep,
} from './openai/trace.js';
