/**
 * OpenAI Agent-Trace Connector
 *
 * Maps one OpenAI agent-trace document onto a Run.
 *
 * Mappings:
 * | Trace                  | Ontology                                         |
 * |------------------------|--------------------------------------------------|
 * | trace id / agent_id    | AgentInstance (types, tool capabilities)         |
 * | started_at, ended_at   | Run start/end, duration, initial state           |
 * | status                 | Run status (fixed table, else "unknown")         |
 * | message step           | Observation + Message snapshots                  |
 * | tool step              | ActionExecution owning one ToolInvocation        |
 * | every step             | CompleteState (phase, attention, last input)     |
 *
 * Timestamps missing from the trace fall back to one reading of the clock
 * taken at the start of the conversion.
 */

import type { JsonObject, JsonValue } from '../../ontology/json.js';
import { parseTimestamp, secondsBetween } from '../../ontology/timestamp.js';
import { parseEntity } from '../../ontology/validation.js';
import { createRun, type Run, type RunStatus, type StepInput } from '../../ontology/run.js';
import { toolCapability, type AgentInstanceInput, type AgentType } from '../../ontology/layers/identity.js';
import type { PerceptionSnapshotInput } from '../../ontology/layers/perception.js';
import type { ActionSnapshotInput } from '../../ontology/layers/action.js';
import type { CompleteStateInput } from '../../ontology/layers/state.js';
import type { InteractionSnapshotInput } from '../../ontology/layers/interaction.js';
import type { ConnectorOptions, TraceConnector } from '../types.js';
import { OpenAITraceSchema, type OpenAITrace, type OpenAITraceStep } from './trace.js';

export const DEFAULT_MODEL_ID = 'gpt-4';
export const DEFAULT_INTERFACE_ID = 'openai-api';
export const DEFAULT_CAPABILITY_VERSION = '1.0.0';

const STATUS_MAP: Record<string, RunStatus> = {
  completed: 'completed',
  failed: 'failed',
  cancelled: 'cancelled',
  running: 'running',
};

const KNOWN_STEP_TYPES = new Set(['message', 'tool']);

interface ConversionContext {
  agentId: string;
  importedAt: Date;
  interfaceId: string;
  warn: (message: string) => void;
}

/** Step fields after defaults have been applied. */
interface ResolvedStep {
  raw: OpenAITraceStep;
  index: number;
  id: string;
  type: string;
  timestamp: Date;
}

// ─── Entry point ─────────────────────────────────────────────

/**
 * Convert an OpenAI agent-trace document into a Run.
 *
 * @throws ValidationError when a trace field has the wrong JSON type
 * @throws MalformedTimestampError when a timestamp is not ISO-8601
 */
export function fromOpenAITrace(input: unknown, options: ConnectorOptions = {}): Run {
  const trace = parseEntity(OpenAITraceSchema, input, 'OpenAITrace');
  const importedAt = (options.now ?? (() => new Date()))();
  const warn = options.onWarning ?? (() => undefined);
  const rawSteps = trace.steps ?? [];

  const startedAt = parseTimestamp(trace.started_at, 'started_at');
  const endedAt = parseTimestamp(trace.ended_at, 'ended_at');
  const runStart = startedAt ?? importedAt;

  const agent = buildAgent(trace, rawSteps, runStart, options);
  const ctx: ConversionContext = {
    agentId: agent.id,
    importedAt,
    interfaceId: options.interfaceId ?? DEFAULT_INTERFACE_ID,
    warn,
  };

  const steps = rawSteps.map((raw, index) => buildStep(resolveStep(raw, index, ctx), ctx));
  const lastStep = steps.at(-1);

  const runId = trace.id ?? '';
  return createRun({
    id: runId,
    name: `OpenAI Agent Run ${runId}`,
    agent,
    start_time: runStart,
    end_time: endedAt,
    duration: startedAt && endedAt ? secondsBetween(startedAt, endedAt) : null,
    status: mapStatus(trace.status, warn),
    initial_state: buildInitialState(agent.id, runStart),
    final_state: lastStep?.complete_state ?? null,
    steps,
    // Counted over the raw trace events
    total_observations: rawSteps.filter((s) => s.type === 'message' || s.type === 'tool').length,
    total_actions: rawSteps.filter((s) => s.type === 'tool').length,
    total_messages: rawSteps.filter((s) => s.type === 'message').length,
  });
}

function mapStatus(status: string | null | undefined, warn: (message: string) => void): RunStatus {
  if (status === undefined || status === null) return 'unknown';
  const mapped = STATUS_MAP[status];
  if (mapped === undefined) {
    warn(`Unrecognized trace status "${status}", recorded as "unknown"`);
    return 'unknown';
  }
  return mapped;
}

// ─── Agent ───────────────────────────────────────────────────

function buildAgent(
  trace: OpenAITrace,
  rawSteps: OpenAITraceStep[],
  createdAt: Date,
  options: ConnectorOptions,
): AgentInstanceInput & { id: string } {
  const agentId = trace.agent_id ?? trace.id ?? 'unknown';
  const toolSteps = rawSteps.filter((s) => s.type === 'tool');

  const types: AgentType[] = ['conversational'];
  if (toolSteps.length > 0) {
    types.push('task-execution');
  }

  // One capability per distinct tool, first-seen order
  const toolNames: string[] = [];
  for (const step of toolSteps) {
    const name = step.tool_name;
    if (name && !toolNames.includes(name)) {
      toolNames.push(name);
    }
  }
  const version = options.capabilityVersion ?? DEFAULT_CAPABILITY_VERSION;

  return {
    id: agentId,
    name: `OpenAI Agent ${agentId}`,
    types,
    domains: ['general'],
    capabilities: toolNames.map((name) => toolCapability(name, version)),
    configuration: {
      model_id: trace.model ?? options.defaultModelId ?? DEFAULT_MODEL_ID,
      parameters: trace.config ?? {},
    },
    metadata: {
      created_at: createdAt,
      created_by: 'openai',
      version: '1.0.0',
      tags: ['openai', 'trace-import'],
    },
  };
}

// ─── Steps ───────────────────────────────────────────────────

function resolveStep(raw: OpenAITraceStep, index: number, ctx: ConversionContext): ResolvedStep {
  const id = raw.id ?? `step-${index}`;
  const type = raw.type ?? 'unknown';
  if (!KNOWN_STEP_TYPES.has(type)) {
    ctx.warn(`Step ${id} has unrecognized type "${type}"; only its state is recorded`);
  }
  return {
    raw,
    index,
    id,
    type,
    timestamp: parseTimestamp(raw.timestamp, `steps.${index}.timestamp`) ?? ctx.importedAt,
  };
}

function buildStep(step: ResolvedStep, ctx: ConversionContext): StepInput {
  const built: StepInput = {
    id: step.id,
    name: step.type,
    step_number: step.index,
    start_time: step.timestamp,
    inputs: { original_step: toJsonObject(step.raw) },
    complete_state: buildStepState(step, ctx),
  };

  if (step.type === 'message') {
    const content = step.raw.content ?? '';
    built.perception_state = buildPerception(step, content, ctx);
    built.interaction_state = buildInteraction(step, content, ctx);
    built.outputs = { message_content: content };
  } else if (step.type === 'tool') {
    built.action_state = buildAction(step, ctx);
    built.outputs = { tool_output: step.raw.output ?? null };
  }

  return built;
}

function buildPerception(step: ResolvedStep, content: JsonValue, ctx: ConversionContext): PerceptionSnapshotInput {
  return {
    timestamp: step.timestamp,
    current_observations: [
      {
        id: `${step.id}-obs`,
        processor_id: `${ctx.agentId}-nlp-processor`,
        signal_ids: [`${step.id}-signal`],
        type: 'text-message',
        content,
        confidence: 1.0,
        timestamp: step.timestamp,
        metadata: { role: roleOf(step.raw) },
      },
    ],
    processing_queue_size: 0,
  };
}

/**
 * Only an explicit `assistant` role makes the message a response; the
 * `assistant` default of `roleOf` applies to observation metadata alone.
 */
function buildInteraction(step: ResolvedStep, content: JsonValue, ctx: ConversionContext): InteractionSnapshotInput {
  const fromAgent = step.raw.role === 'assistant';
  return {
    timestamp: step.timestamp,
    recent_messages: [
      {
        id: step.id,
        type: fromAgent ? 'response' : 'request',
        sender_id: fromAgent ? ctx.agentId : 'user',
        recipient_id: fromAgent ? 'user' : ctx.agentId,
        interface_id: ctx.interfaceId,
        content,
        timestamp: step.timestamp,
      },
    ],
    pending_messages: 0,
  };
}

/**
 * Tool steps become one completed execution. Traces carry a single
 * timestamp per step, so the invocation starts and ends at that instant.
 */
function buildAction(step: ResolvedStep, ctx: ConversionContext): ActionSnapshotInput {
  const parameters = step.raw.input ?? {};
  const output = step.raw.output ?? null;
  return {
    timestamp: step.timestamp,
    executing_actions: [],
    completed_actions: [
      {
        id: step.id,
        action_plan_id: `${step.id}-plan`,
        status: 'completed',
        start_time: step.timestamp,
        end_time: step.timestamp,
        executor_id: ctx.agentId,
        actual_parameters: parameters,
        results: output,
        tool_invocations: [
          {
            id: `${step.id}-tool`,
            tool_name: step.raw.tool_name ?? '',
            action_execution_id: step.id,
            input_parameters: parameters,
            output_data: output,
            start_time: step.timestamp,
            end_time: step.timestamp,
          },
        ],
      },
    ],
    action_queue_size: 0,
  };
}

function buildStepState(step: ResolvedStep, ctx: ConversionContext): CompleteStateInput {
  const { agentId } = ctx;
  return {
    timestamp: step.timestamp,
    agent_state: {
      id: `${agentId}-state-${step.id}`,
      agent_id: agentId,
      status: 'active',
      health_score: 1.0,
      uptime: 0,
      last_activity: step.timestamp,
      configuration_hash: 'active',
    },
    execution_state: {
      id: `${agentId}-exec-${step.id}`,
      phase: step.type === 'tool' ? 'execution' : 'perception',
      active_tasks: [step.id],
      pending_actions: [],
    },
    cognitive_state: {
      id: `${agentId}-cog-${step.id}`,
      attention_focus: [step.type],
    },
    perceptual_state: {
      id: `${agentId}-percept-${step.id}`,
      active_sensors: [ctx.interfaceId],
      sensor_readings: { last_input: lastInput(step.raw) },
    },
  };
}

function buildInitialState(agentId: string, timestamp: Date): CompleteStateInput {
  return {
    timestamp,
    agent_state: {
      id: `${agentId}-state-initial`,
      agent_id: agentId,
      status: 'initializing',
      health_score: 1.0,
      uptime: 0,
      last_activity: timestamp,
      configuration_hash: 'initial',
    },
    execution_state: { id: `${agentId}-exec-initial`, phase: 'idle' },
    cognitive_state: { id: `${agentId}-cog-initial` },
    perceptual_state: { id: `${agentId}-percept-initial` },
  };
}

// ─── Helpers ─────────────────────────────────────────────────

function roleOf(step: OpenAITraceStep): string {
  return step.role ?? 'assistant';
}

/** Step content unless it is empty or falsy, otherwise the tool input. */
function lastInput(step: OpenAITraceStep): JsonValue {
  const { content } = step;
  if (content !== undefined && !isEmptyValue(content)) {
    return content;
  }
  return step.input ?? null;
}

function isEmptyValue(value: JsonValue): boolean {
  if (value === null || value === false || value === 0 || value === '') return true;
  if (Array.isArray(value)) return value.length === 0;
  if (typeof value === 'object') return Object.keys(value).length === 0;
  return false;
}

function toJsonObject(step: OpenAITraceStep): JsonObject {
  const result: JsonObject = {};
  for (const [key, value] of Object.entries(step)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

// ─── Connector ───────────────────────────────────────────────

export class OpenAITraceConnector implements TraceConnector {
  readonly format = 'openai';
  readonly version = '1.0.0';
  readonly description = 'OpenAI agent-trace JSON';

  convert(trace: unknown, options?: ConnectorOptions): Run {
    return fromOpenAITrace(trace, options);
  }
}
