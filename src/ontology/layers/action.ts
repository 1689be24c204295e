/**
 * Action Layer - planning and execution.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema, jsonMap, jsonObjectList, numberMap, stringList } from '../json.js';
import { TimestampSchema, optionalTimestamp } from '../timestamp.js';

export const ACTION_TYPES = [
  'external', // affects the environment
  'internal', // affects the agent's own state
  'social', // involves other agents
  'meta', // about actions: planning, monitoring
] as const;
export const ActionTypeSchema = z.enum(ACTION_TYPES);
export type ActionType = z.infer<typeof ActionTypeSchema>;

export const ACTION_CATEGORIES = [
  'communication',
  'computation',
  'data-manipulation',
  'resource-access',
  'tool-use',
  'decision-making',
  'learning',
  'monitoring',
] as const;
export const ActionCategorySchema = z.enum(ACTION_CATEGORIES);
export type ActionCategory = z.infer<typeof ActionCategorySchema>;

export const ACTION_STATUSES = [
  'planned',
  'validated',
  'executing',
  'completed',
  'failed',
  'cancelled',
  'suspended',
] as const;
export const ActionStatusSchema = z.enum(ACTION_STATUSES);
export type ActionStatus = z.infer<typeof ActionStatusSchema>;

export const EXECUTION_MODES = [
  'synchronous',
  'asynchronous',
  'parallel',
  'sequential',
  'conditional',
  'iterative',
] as const;
export const ExecutionModeSchema = z.enum(EXECUTION_MODES);
export type ExecutionMode = z.infer<typeof ExecutionModeSchema>;

// ─── Planning ────────────────────────────────────────────────

export const ActionPlanSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: ActionTypeSchema,
    category: ActionCategorySchema,
    description: z.string(),
    goal_id: z.string().nullish(),
    plan_id: z.string().nullish(),
    parameters: jsonMap(),
    preconditions: jsonObjectList(),
    expected_effects: jsonObjectList(),
    priority: z.number().int().default(0),
    deadline: optionalTimestamp(),
  })
  .passthrough();
export type ActionPlan = z.infer<typeof ActionPlanSchema>;

export const ActionSequenceSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    /** Ordered action ids */
    action_ids: z.array(z.string()),
    execution_mode: ExecutionModeSchema,
    dependencies: z.record(z.string(), z.array(z.string())).default({}),
    branching_conditions: jsonObjectList(),
    loop_conditions: jsonObjectList(),
  })
  .passthrough();
export type ActionSequence = z.infer<typeof ActionSequenceSchema>;

export const ActionValidationSchema = z
  .object({
    id: z.string(),
    action_id: z.string(),
    timestamp: TimestampSchema,
    is_valid: z.boolean(),
    validation_checks: z.array(JsonObjectSchema),
    violations: stringList(),
    warnings: stringList(),
    suggestions: stringList(),
  })
  .passthrough();
export type ActionValidation = z.infer<typeof ActionValidationSchema>;

// ─── Execution ───────────────────────────────────────────────

/**
 * Tool or API invocation made on behalf of an action execution.
 */
export const ToolInvocationSchema = z
  .object({
    id: z.string(),
    tool_name: z.string(),
    tool_version: z.string().nullish(),
    /** Parent action execution id */
    action_execution_id: z.string(),
    input_parameters: JsonObjectSchema,
    output_data: JsonValueSchema.default(null),
    status_code: z.number().int().nullish(),
    error_message: z.string().nullish(),
    start_time: TimestampSchema,
    end_time: optionalTimestamp(),
  })
  .passthrough();
export type ToolInvocation = z.infer<typeof ToolInvocationSchema>;

/**
 * Execution record of an action. Owns the tool invocations it made.
 */
export const ActionExecutionSchema = z
  .object({
    id: z.string(),
    action_plan_id: z.string(),
    status: ActionStatusSchema,
    start_time: TimestampSchema,
    end_time: optionalTimestamp(),
    /** Duration in seconds */
    duration: z.number().finite().nullable().default(null),
    executor_id: z.string(),
    actual_parameters: jsonMap(),
    results: JsonValueSchema.default(null),
    tool_invocations: z.array(ToolInvocationSchema).default([]),
    side_effects: jsonObjectList(),
    resource_usage: jsonMap(),
  })
  .passthrough();
export type ActionExecution = z.infer<typeof ActionExecutionSchema>;

export const CommunicationActionSchema = z
  .object({
    id: z.string(),
    action_execution_id: z.string(),
    sender_id: z.string(),
    recipient_id: z.string(),
    channel: z.string(),
    message_type: z.string(),
    content: JsonValueSchema,
    timestamp: TimestampSchema,
    acknowledgment_required: z.boolean().default(false),
    acknowledgment_received: z.boolean().nullish(),
  })
  .passthrough();
export type CommunicationAction = z.infer<typeof CommunicationActionSchema>;

// ─── Action kinds ────────────────────────────────────────────

export const ExternalActionSchema = z
  .object({
    id: z.string(),
    execution_id: z.string(),
    target_system: z.string(),
    operation: z.string(),
    environment_changes: jsonObjectList(),
    reversible: z.boolean(),
    reversal_action_id: z.string().nullish(),
  })
  .passthrough();
export type ExternalAction = z.infer<typeof ExternalActionSchema>;

export const InternalActionSchema = z
  .object({
    id: z.string(),
    execution_id: z.string(),
    component_affected: z.string(),
    state_changes: JsonObjectSchema,
    configuration_updates: jsonMap(),
  })
  .passthrough();
export type InternalAction = z.infer<typeof InternalActionSchema>;

export const SocialActionSchema = z
  .object({
    id: z.string(),
    execution_id: z.string(),
    interaction_type: z.string(),
    other_agent_ids: z.array(z.string()),
    protocol: z.string(),
    negotiation_state: JsonObjectSchema.nullish(),
    outcome: z.string().nullish(),
  })
  .passthrough();
export type SocialAction = z.infer<typeof SocialActionSchema>;

export const MetaActionSchema = z
  .object({
    id: z.string(),
    execution_id: z.string(),
    meta_type: z.string(),
    target_actions: z.array(z.string()),
    adjustments_made: jsonObjectList(),
    optimization_metrics: numberMap(),
  })
  .passthrough();
export type MetaAction = z.infer<typeof MetaActionSchema>;

/**
 * Action state at a point in time.
 */
export const ActionSnapshotSchema = z
  .object({
    timestamp: TimestampSchema,
    planned_actions: z.array(ActionPlanSchema).default([]),
    executing_actions: z.array(ActionExecutionSchema).default([]),
    completed_actions: z.array(ActionExecutionSchema).default([]),
    failed_actions: z.array(ActionExecutionSchema).default([]),
    /** Actions awaiting execution */
    action_queue_size: z.number().int().default(0),
    resource_utilization: numberMap(),
  })
  .passthrough();
export type ActionSnapshot = z.infer<typeof ActionSnapshotSchema>;
export type ActionSnapshotInput = z.input<typeof ActionSnapshotSchema>;
