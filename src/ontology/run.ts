/**
 * Run & Step
 *
 * A Run is one end-to-end execution of an agent. It owns the agent
 * instance, the ordered top-level steps, and aggregate counters. Steps own
 * their sub-steps exclusively; the tree is held as nested arrays.
 */

import { z } from 'zod';
import { jsonMap, numberMap, stringList } from './json.js';
import { TimestampSchema, optionalTimestamp } from './timestamp.js';
import { parseEntity, safeParseEntity, type EntityParseResult } from './validation.js';
import { AgentInstanceSchema } from './layers/identity.js';
import { PerceptionSnapshotSchema } from './layers/perception.js';
import { CognitionSnapshotSchema } from './layers/cognition.js';
import { ActionSnapshotSchema } from './layers/action.js';
import { CompleteStateSchema } from './layers/state.js';
import { InteractionSnapshotSchema } from './layers/interaction.js';
import { OversightSnapshotSchema } from './layers/oversight.js';

export const RUN_STATUSES = ['running', 'completed', 'failed', 'cancelled', 'unknown'] as const;
export const RunStatusSchema = z.enum(RUN_STATUSES);
export type RunStatus = z.infer<typeof RunStatusSchema>;

// ─── Step ────────────────────────────────────────────────────

const BaseStepSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    /** Sequence number within the owning collection */
    step_number: z.number().int(),
    parent_step_id: z.string().nullable().default(null),

    start_time: TimestampSchema,
    end_time: optionalTimestamp(),
    /** Seconds */
    duration: z.number().finite().nullable().default(null),

    // At most one snapshot per layer
    perception_state: PerceptionSnapshotSchema.nullable().default(null),
    cognition_state: CognitionSnapshotSchema.nullable().default(null),
    action_state: ActionSnapshotSchema.nullable().default(null),
    complete_state: CompleteStateSchema.nullable().default(null),
    interaction_state: InteractionSnapshotSchema.nullable().default(null),
    oversight_state: OversightSnapshotSchema.nullable().default(null),

    inputs: jsonMap(),
    outputs: jsonMap(),
    metadata: jsonMap(),
  })
  .passthrough();

export type Step = z.output<typeof BaseStepSchema> & { sub_steps: Step[] };
export type StepInput = z.input<typeof BaseStepSchema> & { sub_steps?: StepInput[] };

export const StepSchema: z.ZodType<Step, z.ZodTypeDef, StepInput> = BaseStepSchema.extend({
  sub_steps: z.lazy(() => z.array(StepSchema)).default([]),
});

// ─── Run ─────────────────────────────────────────────────────

export const RunSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string().nullish(),

    agent: AgentInstanceSchema,

    start_time: TimestampSchema,
    end_time: optionalTimestamp(),
    /** Seconds */
    duration: z.number().finite().nullable().default(null),

    status: RunStatusSchema.default('running'),
    success: z.boolean().nullish(),
    error_message: z.string().nullish(),

    initial_state: CompleteStateSchema.nullable().default(null),
    initial_goals: stringList(),
    initial_context: jsonMap(),

    final_state: CompleteStateSchema.nullable().default(null),
    achieved_goals: stringList(),
    final_context: jsonMap(),

    steps: z.array(StepSchema).default([]),

    // Counters are set once at conversion time
    total_observations: z.number().int().default(0),
    total_decisions: z.number().int().default(0),
    total_actions: z.number().int().default(0),
    total_messages: z.number().int().default(0),
    total_anomalies: z.number().int().default(0),
    total_interventions: z.number().int().default(0),

    performance_metrics: numberMap(),
    resource_usage: jsonMap(),

    risk_events: stringList(),
    compliance_checks: stringList(),
    human_reviews: stringList(),

    tags: stringList(),
    metadata: jsonMap(),
  })
  .passthrough();

export type Run = z.infer<typeof RunSchema>;
export type RunInput = z.input<typeof RunSchema>;

/**
 * Build a step from its fields, filling defaults.
 *
 * @throws ValidationError
 */
export function createStep(input: StepInput): Step {
  return parseEntity(StepSchema, input, 'Step');
}

/**
 * Build a run from its fields, filling defaults.
 *
 * @throws ValidationError
 */
export function createRun(input: RunInput): Run {
  return parseEntity(RunSchema, input, 'Run');
}

export function validateRun(data: unknown): Run {
  return parseEntity(RunSchema, data, 'Run');
}

export function safeValidateRun(data: unknown): EntityParseResult<Run> {
  return safeParseEntity(RunSchema, data, 'Run');
}
