/**
 * State Layer
 *
 * Agent status, execution phase, and the composite state captured at each
 * step of a run.
 */

import { z } from 'zod';
import { JsonObjectSchema, jsonMap, jsonObjectList, numberMap, stringList } from '../json.js';
import { TimestampSchema, optionalTimestamp } from '../timestamp.js';

export const STATE_TYPES = ['agent', 'execution', 'cognitive', 'perceptual', 'historical'] as const;
export const StateTypeSchema = z.enum(STATE_TYPES);
export type StateType = z.infer<typeof StateTypeSchema>;

export const AGENT_STATUSES = [
  'initializing',
  'ready',
  'active',
  'busy',
  'paused',
  'error',
  'shutting-down',
  'terminated',
] as const;
export const AgentStatusSchema = z.enum(AGENT_STATUSES);
export type AgentStatus = z.infer<typeof AgentStatusSchema>;

export const EXECUTION_PHASES = [
  'perception',
  'reasoning',
  'planning',
  'execution',
  'monitoring',
  'learning',
  'idle',
] as const;
export const ExecutionPhaseSchema = z.enum(EXECUTION_PHASES);
export type ExecutionPhase = z.infer<typeof ExecutionPhaseSchema>;

// ─── Core state components ───────────────────────────────────

export const AgentStateSchema = z
  .object({
    id: z.string(),
    agent_id: z.string(),
    status: AgentStatusSchema,
    /** Agent health (0-1) */
    health_score: z.number().finite().default(1.0),
    /** Uptime in seconds */
    uptime: z.number().finite(),
    last_activity: TimestampSchema,
    active_capabilities: stringList(),
    resource_allocation: jsonMap(),
    configuration_hash: z.string(),
  })
  .passthrough();
export type AgentState = z.infer<typeof AgentStateSchema>;

export const ExecutionStateSchema = z
  .object({
    id: z.string(),
    phase: ExecutionPhaseSchema,
    active_tasks: stringList(),
    pending_actions: stringList(),
    execution_stack: jsonObjectList(),
    resource_usage: numberMap(),
    performance_metrics: numberMap(),
    bottlenecks: stringList(),
  })
  .passthrough();
export type ExecutionState = z.infer<typeof ExecutionStateSchema>;

export const CognitiveStateSchema = z
  .object({
    id: z.string(),
    attention_focus: stringList(),
    working_memory: stringList(),
    active_goals: stringList(),
    active_plans: stringList(),
    reasoning_depth: z.number().int().default(0),
    /** Cognitive load (0-1) */
    cognitive_load: z.number().finite().default(0.0),
    learning_enabled: z.boolean().default(true),
    exploration_rate: z.number().finite().default(0.1),
  })
  .passthrough();
export type CognitiveState = z.infer<typeof CognitiveStateSchema>;

export const PerceptualStateSchema = z
  .object({
    id: z.string(),
    active_sensors: stringList(),
    /** Latest reading per sensor */
    sensor_readings: jsonMap(),
    observation_buffer: stringList(),
    attention_filters: stringList(),
    signal_quality: numberMap(),
    anomaly_detection_active: z.boolean().default(true),
  })
  .passthrough();
export type PerceptualState = z.infer<typeof PerceptualStateSchema>;

export const HistoricalStateSchema = z
  .object({
    id: z.string(),
    state_history: stringList(),
    event_log: jsonObjectList(),
    performance_history: jsonObjectList(),
    error_history: stringList(),
    learning_history: stringList(),
    checkpoint_states: jsonObjectList(),
  })
  .passthrough();
export type HistoricalState = z.infer<typeof HistoricalStateSchema>;

// ─── State management ────────────────────────────────────────

export const StateTransitionSchema = z
  .object({
    id: z.string(),
    from_state_id: z.string(),
    to_state_id: z.string(),
    trigger: z.string(),
    conditions: jsonObjectList(),
    timestamp: TimestampSchema,
    /** Seconds */
    duration: z.number().finite(),
    success: z.boolean(),
    side_effects: jsonObjectList(),
  })
  .passthrough();
export type StateTransition = z.infer<typeof StateTransitionSchema>;

export const StateCheckpointSchema = z
  .object({
    id: z.string(),
    timestamp: TimestampSchema,
    reason: z.string(),
    state_snapshot: JsonObjectSchema,
    metadata: jsonMap(),
    size_bytes: z.number().int(),
    compression_ratio: z.number().finite().default(1.0),
  })
  .passthrough();
export type StateCheckpoint = z.infer<typeof StateCheckpointSchema>;

export const StateConstraintSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: z.string(),
    expression: z.string(),
    severity: z.string().default('warning'),
    active: z.boolean().default(true),
    violation_count: z.number().int().default(0),
    last_violation: optionalTimestamp(),
  })
  .passthrough();
export type StateConstraint = z.infer<typeof StateConstraintSchema>;

export const StateMonitorSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    monitored_states: z.array(StateTypeSchema),
    metrics: z.array(z.string()),
    thresholds: numberMap(),
    /** Hz */
    sampling_rate: z.number().finite().default(1.0),
    alerts_enabled: z.boolean().default(true),
  })
  .passthrough();
export type StateMonitor = z.infer<typeof StateMonitorSchema>;

export const StateAnalysisSchema = z
  .object({
    id: z.string(),
    timestamp: TimestampSchema,
    /** Analysis window in seconds */
    time_window: z.number().finite(),
    state_distribution: z.record(z.string(), z.number().finite()),
    transition_frequency: z.record(z.string(), z.number().int()),
    stability_score: z.number().finite(),
    anomalies_detected: jsonObjectList(),
    recommendations: stringList(),
  })
  .passthrough();
export type StateAnalysis = z.infer<typeof StateAnalysisSchema>;

/**
 * Composite state of an agent at one instant.
 */
export const CompleteStateSchema = z
  .object({
    timestamp: TimestampSchema,
    agent_state: AgentStateSchema,
    execution_state: ExecutionStateSchema,
    cognitive_state: CognitiveStateSchema,
    perceptual_state: PerceptualStateSchema,
    historical_summary: jsonMap(),
    active_constraints: z.array(StateConstraintSchema).default([]),
    health_indicators: numberMap(),
  })
  .passthrough();
export type CompleteState = z.infer<typeof CompleteStateSchema>;
export type CompleteStateInput = z.input<typeof CompleteStateSchema>;
