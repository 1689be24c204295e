import { describe, expect, it } from 'vitest';
import { deserializeRun, fromDocument, serializeRun, toDocument } from '../document.js';
import { fromOpenAITrace } from '../../connectors/openai/connector.js';
import { createRun, type Run } from '../../ontology/run.js';
import { ValidationError } from '../../ontology/errors.js';

const now = () => new Date('2024-06-01T12:00:00.000Z');

function importedRun(): Run {
  return fromOpenAITrace(
    {
      id: 'r1',
      agent_id: 'bot-7',
      model: 'gpt-4o',
      status: 'completed',
      started_at: '2024-01-01T00:00:00Z',
      ended_at: '2024-01-01T00:00:05Z',
      steps: [
        { id: 's1', type: 'message', role: 'user', content: 'hi', timestamp: '2024-01-01T00:00:00Z' },
        {
          id: 's2',
          type: 'tool',
          tool_name: 'search',
          input: { q: 'x' },
          output: { r: 1 },
          timestamp: '2024-01-01T00:00:01Z',
        },
      ],
    },
    { now },
  );
}

function minimalRun(extra: Record<string, unknown> = {}): Run {
  return createRun({
    id: 'r1',
    name: 'Minimal',
    start_time: '2024-01-01T00:00:00Z',
    agent: {
      id: 'agent-1',
      name: 'Agent',
      types: ['reactive'],
      configuration: {},
      metadata: { created_at: '2024-01-01T00:00:00Z', created_by: 'test', version: '1.0.0' },
    },
    ...extra,
  });
}

function captureValidationError(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('toDocument', () => {
  it('writes timestamps as ISO-8601 text', () => {
    const document = toDocument(importedRun());
    expect(document['start_time']).toBe('2024-01-01T00:00:00.000Z');
    expect(document['end_time']).toBe('2024-01-01T00:00:05.000Z');
  });

  it('writes unset optional timestamps as null', () => {
    const document = toDocument(minimalRun());
    expect(document['end_time']).toBeNull();
    expect(document['duration']).toBeNull();
    expect(document['final_state']).toBeNull();
  });

  it('writes enum fields as their tags', () => {
    const document = toDocument(importedRun());
    expect(document['status']).toBe('completed');
    expect(document['agent']).toMatchObject({ types: ['conversational', 'task-execution'] });
  });

  it('carries unrecognized keys through', () => {
    const document = toDocument(minimalRun({ source_system: 'batch-7', labels: { team: 'ops' } }));
    expect(document['source_system']).toBe('batch-7');
    expect(document['labels']).toEqual({ team: 'ops' });
  });

  it('drops undefined keys', () => {
    const document = toDocument(minimalRun());
    expect(Object.keys(document)).not.toContain('description');
  });
});

describe('round trip', () => {
  it('reproduces an imported run', () => {
    const run = importedRun();
    expect(fromDocument(toDocument(run))).toEqual(run);
  });

  it('reproduces a run through JSON text', () => {
    const run = importedRun();
    expect(deserializeRun(serializeRun(run))).toEqual(run);
    expect(deserializeRun(serializeRun(run, { indent: 0 }))).toEqual(run);
  });

  it('keeps nested sub-steps', () => {
    const run = minimalRun({
      steps: [
        {
          id: 'a',
          name: 'plan',
          step_number: 0,
          start_time: '2024-01-01T00:00:00Z',
          sub_steps: [{ id: 'a.1', name: 'search', step_number: 0, start_time: '2024-01-01T00:00:01Z' }],
        },
      ],
    });
    const restored = deserializeRun(serializeRun(run));
    expect(restored.steps[0].sub_steps[0].id).toBe('a.1');
    expect(restored.steps[0].sub_steps[0].start_time).toEqual(new Date('2024-01-01T00:00:01.000Z'));
  });
});

describe('round trip of constructed runs', () => {
  it('reproduces every layer snapshot, nested extra keys and sub-steps field-for-field', () => {
    const run = minimalRun({
      description: 'Full layer coverage',
      tags: ['nightly'],
      performance_metrics: { tokens_per_second: 41.5 },
      deployment: { region: 'eu-west', replicas: [1, 2] },
      steps: [
        {
          id: 'plan',
          name: 'plan',
          step_number: 0,
          start_time: '2024-01-01T00:00:00Z',
          end_time: '2024-01-01T00:00:04.250Z',
          duration: 4.25,
          trace_ref: { span: 'abc', attrs: [1, 'two', null] },
          perception_state: {
            timestamp: '2024-01-01T00:00:00Z',
            current_observations: [
              {
                id: 'obs-1',
                processor_id: 'nlp',
                signal_ids: ['sig-1'],
                type: 'text-message',
                content: { text: 'hi', tokens: 1 },
                timestamp: '2024-01-01T00:00:00Z',
              },
            ],
          },
          cognition_state: {
            timestamp: '2024-01-01T00:00:01Z',
            active_reasoning: [
              {
                id: 'r-1',
                type: 'deductive',
                inputs: ['obs-1'],
                conclusion: 'search first',
                timestamp: '2024-01-01T00:00:01Z',
                scratchpad: { lines: ['a', 'b'] },
              },
            ],
            knowledge_stats: { facts: 3 },
            uncertainty_level: 0.2,
          },
          oversight_state: {
            timestamp: '2024-01-01T00:00:02Z',
            oversight_health: 0.9,
            active_anomalies: [
              {
                id: 'an-1',
                type: 'performance',
                severity: 'low',
                detected_at: '2024-01-01T00:00:02Z',
                component: 'planner',
                description: 'slow step',
                evidence: [{ latency_ms: 900 }],
                confidence: 0.7,
              },
            ],
            compliance_status: { 'pii-check': true },
          },
          sub_steps: [
            {
              id: 'plan.search',
              name: 'search',
              step_number: 0,
              parent_step_id: 'plan',
              start_time: '2024-01-01T00:00:03Z',
              outputs: { hits: 2 },
              sub_steps: [
                { id: 'plan.search.rank', name: 'rank', step_number: 0, start_time: '2024-01-01T00:00:03.500Z' },
              ],
            },
          ],
        },
      ],
    });

    expect(deserializeRun(serializeRun(run))).toEqual(run);
    expect(fromDocument(toDocument(run))).toEqual(run);
  });

  it('reproduces timestamps before year 100', () => {
    const run = minimalRun({
      start_time: new Date('0050-03-01T00:00:00.000Z'),
      end_time: new Date('0000-02-29T12:00:00.000Z'),
    });
    const restored = deserializeRun(serializeRun(run));

    expect(restored.start_time.toISOString()).toBe('0050-03-01T00:00:00.000Z');
    expect(restored.end_time?.toISOString()).toBe('0000-02-29T12:00:00.000Z');
    expect(restored).toEqual(run);
  });

  it('rejects numbers that JSON cannot carry', () => {
    expect(captureValidationError(() => minimalRun({ duration: Infinity })).field).toBe('duration');
    expect(captureValidationError(() => minimalRun({ metadata: { ratio: Number.NaN } })).field).toBe('metadata.ratio');
  });
});

describe('serializeRun', () => {
  it('indents with two spaces by default', () => {
    const text = serializeRun(minimalRun());
    expect(text.startsWith('{\n  "id": "r1",\n  "name": "Minimal",')).toBe(true);
  });

  it('writes a single line with indent 0', () => {
    const text = serializeRun(minimalRun(), { indent: 0 });
    expect(text.startsWith('{"id":"r1","name":"Minimal",')).toBe(true);
    expect(text).not.toContain('\n');
  });
});

describe('deserializeRun', () => {
  it('rejects text that is not JSON', () => {
    const error = captureValidationError(() => deserializeRun('{"id": '));
    expect(error.entity).toBe('Run');
    expect(error.field).toBe('(root)');
    expect(error.issues[0].message.startsWith('Not valid JSON: ')).toBe(true);
  });

  it('names the field holding an unknown enum tag', () => {
    const document = toDocument(minimalRun());
    document['status'] = 'paused';
    const error = captureValidationError(() => deserializeRun(JSON.stringify(document)));
    expect(error.field).toBe('status');
  });

  it('names the field holding a malformed timestamp', () => {
    const document = toDocument(minimalRun());
    document['end_time'] = '5 minutes later';
    expect(captureValidationError(() => fromDocument(document)).field).toBe('end_time');
  });

  it('requires the agent', () => {
    const document = toDocument(minimalRun());
    delete document['agent'];
    expect(captureValidationError(() => fromDocument(document)).field).toBe('agent');
  });
});
