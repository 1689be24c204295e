/**
 * Cognition Layer - reasoning, knowledge, and metacognition.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema, jsonMap, jsonObjectList, numberMap, stringList } from '../json.js';
import { TimestampSchema } from '../timestamp.js';

export const REASONING_TYPES = [
  'deductive',
  'inductive',
  'abductive',
  'probabilistic',
  'fuzzy',
  'rule-based',
  'case-based',
  'model-based',
] as const;
export const ReasoningTypeSchema = z.enum(REASONING_TYPES);
export type ReasoningType = z.infer<typeof ReasoningTypeSchema>;

export const DECISION_STRATEGIES = [
  'optimization',
  'satisficing',
  'heuristic',
  'multi-criteria',
  'game-theoretic',
  'consensus',
] as const;
export const DecisionStrategySchema = z.enum(DECISION_STRATEGIES);
export type DecisionStrategy = z.infer<typeof DecisionStrategySchema>;

export const KNOWLEDGE_TYPES = [
  'declarative',
  'procedural',
  'episodic',
  'semantic',
  'tacit',
  'explicit',
] as const;
export const KnowledgeTypeSchema = z.enum(KNOWLEDGE_TYPES);
export type KnowledgeType = z.infer<typeof KnowledgeTypeSchema>;

export const LEARNING_TYPES = [
  'supervised',
  'unsupervised',
  'reinforcement',
  'transfer',
  'federated',
  'continual',
  'one-shot',
  'zero-shot',
] as const;
export const LearningTypeSchema = z.enum(LEARNING_TYPES);
export type LearningType = z.infer<typeof LearningTypeSchema>;

// ─── Reasoning ───────────────────────────────────────────────

export const ReasoningSchema = z
  .object({
    id: z.string(),
    type: ReasoningTypeSchema,
    /** Input observation ids */
    inputs: z.array(z.string()),
    premises: jsonObjectList(),
    inference_steps: jsonObjectList(),
    conclusion: JsonValueSchema,
    confidence: z.number().finite().default(1.0),
    timestamp: TimestampSchema,
  })
  .passthrough();
export type Reasoning = z.infer<typeof ReasoningSchema>;

/**
 * A decision: the options considered, the one selected, and how.
 */
export const DecisionSchema = z
  .object({
    id: z.string(),
    /** Supporting reasoning ids */
    reasoning_ids: z.array(z.string()),
    strategy: DecisionStrategySchema,
    options: z.array(JsonObjectSchema),
    selected_option: JsonObjectSchema,
    /** Criterion name → weight */
    criteria: numberMap(),
    confidence: z.number().finite().default(1.0),
    timestamp: TimestampSchema,
    justification: z.string().nullish(),
  })
  .passthrough();
export type Decision = z.infer<typeof DecisionSchema>;

export const GoalSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    priority: z.number().int().default(0),
    parent_goal_id: z.string().nullish(),
    sub_goal_ids: stringList(),
    constraints: jsonMap(),
    success_criteria: JsonObjectSchema,
    status: z.string().default('active'),
    /** Progress (0-1) */
    progress: z.number().finite().default(0.0),
  })
  .passthrough();
export type Goal = z.infer<typeof GoalSchema>;

export const PlanSchema = z
  .object({
    id: z.string(),
    goal_ids: z.array(z.string()),
    steps: z.array(JsonObjectSchema),
    dependencies: z.record(z.string(), z.array(z.string())).default({}),
    resources_required: jsonMap(),
    /** Estimated duration in seconds */
    estimated_duration: z.number().finite().nullish(),
    confidence: z.number().finite().default(1.0),
    alternatives: stringList(),
  })
  .passthrough();
export type Plan = z.infer<typeof PlanSchema>;

/**
 * Risk assessment attached to a decision or plan. Distinct from the
 * oversight layer's RiskAssessment, which scopes a whole system.
 */
export const CognitiveRiskAssessmentSchema = z
  .object({
    id: z.string(),
    target_id: z.string(),
    /** "decision" or "plan" */
    target_type: z.string(),
    risk_factors: z.array(JsonObjectSchema),
    probability: z.number().finite(),
    impact: z.number().finite(),
    mitigation_strategies: jsonObjectList(),
  })
  .passthrough();
export type CognitiveRiskAssessment = z.infer<typeof CognitiveRiskAssessmentSchema>;

// ─── Knowledge ───────────────────────────────────────────────

export const KnowledgeItemSchema = z
  .object({
    id: z.string(),
    type: KnowledgeTypeSchema,
    content: JsonValueSchema,
    source: z.string(),
    confidence: z.number().finite().default(1.0),
    created_at: TimestampSchema,
    last_accessed: TimestampSchema,
    access_count: z.number().int().default(0),
    tags: stringList(),
  })
  .passthrough();
export type KnowledgeItem = z.infer<typeof KnowledgeItemSchema>;

export const MemorySchema = z
  .object({
    id: z.string(),
    type: z.string(),
    content: JsonValueSchema,
    importance: z.number().finite().default(0.5),
    timestamp: TimestampSchema,
    decay_rate: z.number().finite().default(0.0),
    associations: stringList(),
  })
  .passthrough();
export type Memory = z.infer<typeof MemorySchema>;

export const LearningEventSchema = z
  .object({
    id: z.string(),
    type: LearningTypeSchema,
    trigger: z.string(),
    input_data: JsonValueSchema,
    learned_content: JsonValueSchema,
    knowledge_updates: stringList(),
    performance_delta: z.number().finite().nullish(),
    timestamp: TimestampSchema,
  })
  .passthrough();
export type LearningEvent = z.infer<typeof LearningEventSchema>;

export const ContextSchema = z
  .object({
    id: z.string(),
    active_goals: stringList(),
    relevant_knowledge: stringList(),
    recent_memories: stringList(),
    environmental_factors: jsonMap(),
    temporal_context: jsonMap(),
    social_context: jsonMap(),
  })
  .passthrough();
export type Context = z.infer<typeof ContextSchema>;

// ─── Metacognition ───────────────────────────────────────────

export const SelfAssessmentSchema = z
  .object({
    id: z.string(),
    target_component: z.string(),
    metrics: z.record(z.string(), z.number().finite()),
    performance_rating: z.number().finite(),
    identified_issues: jsonObjectList(),
    improvement_suggestions: stringList(),
    timestamp: TimestampSchema,
  })
  .passthrough();
export type SelfAssessment = z.infer<typeof SelfAssessmentSchema>;

export const UncertaintySchema = z
  .object({
    id: z.string(),
    source: z.string(),
    type: z.string(),
    magnitude: z.number().finite(),
    reducible: z.boolean(),
    reduction_strategies: stringList(),
    impact_on_decisions: stringList(),
  })
  .passthrough();
export type Uncertainty = z.infer<typeof UncertaintySchema>;

export const ErrorEventSchema = z
  .object({
    id: z.string(),
    error_type: z.string(),
    severity: z.string(),
    component: z.string(),
    description: z.string(),
    root_cause: z.string().nullish(),
    recovery_action: z.string().nullish(),
    timestamp: TimestampSchema,
  })
  .passthrough();
export type ErrorEvent = z.infer<typeof ErrorEventSchema>;

export const CognitionSnapshotSchema = z
  .object({
    timestamp: TimestampSchema,
    active_reasoning: z.array(ReasoningSchema).default([]),
    recent_decisions: z.array(DecisionSchema).default([]),
    current_goals: z.array(GoalSchema).default([]),
    active_plans: z.array(PlanSchema).default([]),
    knowledge_stats: z.record(z.string(), z.number().int()).default({}),
    learning_rate: z.number().finite().default(0.0),
    /** Overall uncertainty (0-1) */
    uncertainty_level: z.number().finite().default(0.0),
  })
  .passthrough();
export type CognitionSnapshot = z.infer<typeof CognitionSnapshotSchema>;
export type CognitionSnapshotInput = z.input<typeof CognitionSnapshotSchema>;
