import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors.js';
import { parseEntity } from '../validation.js';
import {
  ActionExecutionSchema,
  CompleteStateSchema,
  DecisionSchema,
  MessageSchema,
  OversightSnapshotSchema,
  ProcessSchema,
  toolCapability,
  validateAgentInstance,
  type AgentInstanceInput,
} from '../layers/index.js';

const minimalAgent: AgentInstanceInput = {
  id: 'agent-1',
  name: 'Support Agent',
  types: ['conversational'],
  configuration: {},
  metadata: {
    created_at: '2024-01-01T00:00:00Z',
    created_by: 'test',
    version: '1.0.0',
  },
};

function validationField(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.field;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('identity layer', () => {
  it('fills defaults on a minimal agent', () => {
    const agent = validateAgentInstance(minimalAgent);
    expect(agent.domains).toEqual([]);
    expect(agent.capabilities).toEqual([]);
    expect(agent.child_agent_ids).toEqual([]);
    expect(agent.configuration.parameters).toEqual({});
    expect(agent.configuration.feature_flags).toEqual({});
    expect(agent.metadata.tags).toEqual([]);
    expect(agent.metadata.created_at).toEqual(new Date('2024-01-01T00:00:00.000Z'));
  });

  it('requires at least one type tag', () => {
    expect(validationField(() => validateAgentInstance({ ...minimalAgent, types: [] }))).toBe('types');
  });

  it('rejects type tags outside the enumeration', () => {
    expect(validationField(() => validateAgentInstance({ ...minimalAgent, types: ['robot'] }))).toBe('types.0');
  });

  it('rejects duplicate capability names', () => {
    const field = validationField(() =>
      validateAgentInstance({
        ...minimalAgent,
        capabilities: [{ name: 'tool:search' }, { name: 'tool:search', version: '2.0.0' }],
      }),
    );
    expect(field).toBe('capabilities.1.name');
  });

  it('keeps unknown keys at every level', () => {
    const agent = validateAgentInstance({
      ...minimalAgent,
      deployment: { region: 'eu-west' },
      configuration: { model_id: 'gpt-4', temperature_profile: 'low' },
    });
    expect(agent['deployment']).toEqual({ region: 'eu-west' });
    expect(agent.configuration['temperature_profile']).toBe('low');
  });

  it('builds tool capabilities', () => {
    expect(toolCapability('search')).toEqual({
      name: 'tool:search',
      version: '1.0.0',
      parameters: {},
      constraints: {},
      enabled: true,
    });
    expect(toolCapability('fetch', '2.1.0').version).toBe('2.1.0');
  });
});

describe('perception layer', () => {
  it('parses nested sub-processes', () => {
    const tokenize = ProcessSchema.parse({
      id: 'p1',
      name: 'tokenize',
      processor_id: 'nlp',
      sub_processes: [{ id: 'p2', name: 'split', processor_id: 'nlp' }],
    });
    expect(tokenize.status).toBe('active');
    expect(tokenize.sub_processes[0].id).toBe('p2');
    expect(tokenize.sub_processes[0].sub_processes).toEqual([]);
  });
});

describe('cognition layer', () => {
  it('rejects unknown decision strategies', () => {
    const decision = {
      id: 'd1',
      reasoning_ids: [],
      strategy: 'coin-flip',
      options: [{ label: 'a' }],
      selected_option: { label: 'a' },
      timestamp: '2024-01-01T00:00:00Z',
    };
    expect(validationField(() => parseEntity(DecisionSchema, decision, 'Decision'))).toBe('strategy');
  });
});

describe('action layer', () => {
  it('defaults optional execution fields', () => {
    const execution = parseEntity(
      ActionExecutionSchema,
      {
        id: 'a1',
        action_plan_id: 'a1-plan',
        status: 'executing',
        start_time: '2024-01-01T00:00:00Z',
        executor_id: 'agent-1',
      },
      'ActionExecution',
    );
    expect(execution.end_time).toBeNull();
    expect(execution.duration).toBeNull();
    expect(execution.results).toBeNull();
    expect(execution.tool_invocations).toEqual([]);
  });

  it('rejects unknown statuses', () => {
    const field = validationField(() =>
      parseEntity(
        ActionExecutionSchema,
        {
          id: 'a1',
          action_plan_id: 'a1-plan',
          status: 'retrying',
          start_time: '2024-01-01T00:00:00Z',
          executor_id: 'agent-1',
        },
        'ActionExecution',
      ),
    );
    expect(field).toBe('status');
  });
});

describe('state layer', () => {
  it('builds a complete state from its minimal parts', () => {
    const state = parseEntity(
      CompleteStateSchema,
      {
        timestamp: '2024-01-01T00:00:00Z',
        agent_state: {
          id: 's',
          agent_id: 'agent-1',
          status: 'ready',
          uptime: 12,
          last_activity: '2024-01-01T00:00:00Z',
          configuration_hash: 'abc',
        },
        execution_state: { id: 'e', phase: 'planning' },
        cognitive_state: { id: 'c' },
        perceptual_state: { id: 'p' },
      },
      'CompleteState',
    );
    expect(state.agent_state.health_score).toBe(1);
    expect(state.cognitive_state.exploration_rate).toBe(0.1);
    expect(state.perceptual_state.anomaly_detection_active).toBe(true);
    expect(state.active_constraints).toEqual([]);
  });
});

describe('interaction layer', () => {
  it('rejects message types outside the enumeration', () => {
    const field = validationField(() =>
      parseEntity(
        MessageSchema,
        {
          id: 'm1',
          type: 'shout',
          sender_id: 'user',
          recipient_id: 'agent-1',
          interface_id: 'openai-api',
          content: 'hello',
          timestamp: '2024-01-01T00:00:00Z',
        },
        'Message',
      ),
    );
    expect(field).toBe('type');
  });

  it('accepts structured content', () => {
    const message = MessageSchema.parse({
      id: 'm1',
      type: 'command',
      sender_id: 'user',
      recipient_id: 'agent-1',
      interface_id: 'openai-api',
      content: { action: 'stop', reason: null },
      timestamp: '2024-01-01T00:00:00Z',
    });
    expect(message.content).toEqual({ action: 'stop', reason: null });
    expect(message.expires_at).toBeNull();
  });
});

describe('oversight layer', () => {
  it('requires oversight_health', () => {
    expect(
      validationField(() =>
        parseEntity(OversightSnapshotSchema, { timestamp: '2024-01-01T00:00:00Z' }, 'OversightSnapshot'),
      ),
    ).toBe('oversight_health');
  });
});
