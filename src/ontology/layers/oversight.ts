/**
 * Oversight Layer
 *
 * Anomaly detection, risk, performance, audit and human-in-the-loop review.
 */

import { z } from 'zod';
import { JsonObjectSchema, jsonMap, jsonObjectList, numberMap, stringList } from '../json.js';
import { TimestampSchema, optionalTimestamp } from '../timestamp.js';

export const ANOMALY_TYPES = [
  'behavioral',
  'performance',
  'resource',
  'security',
  'compliance',
  'data-quality',
  'system',
] as const;
export const AnomalyTypeSchema = z.enum(ANOMALY_TYPES);
export type AnomalyType = z.infer<typeof AnomalyTypeSchema>;

export const RISK_LEVELS = ['critical', 'high', 'medium', 'low', 'minimal'] as const;
export const RiskLevelSchema = z.enum(RISK_LEVELS);
export type RiskLevel = z.infer<typeof RiskLevelSchema>;

export const INTERVENTION_TYPES = [
  'human-review',
  'automatic-correction',
  'pause-execution',
  'rollback',
  'parameter-adjustment',
  'capability-restriction',
  'shutdown',
] as const;
export const InterventionTypeSchema = z.enum(INTERVENTION_TYPES);
export type InterventionType = z.infer<typeof InterventionTypeSchema>;

export const AUDIT_LEVELS = ['full', 'detailed', 'summary', 'minimal', 'none'] as const;
export const AuditLevelSchema = z.enum(AUDIT_LEVELS);
export type AuditLevel = z.infer<typeof AuditLevelSchema>;

// ─── Anomaly detection ───────────────────────────────────────

export const AnomalySchema = z
  .object({
    id: z.string(),
    type: AnomalyTypeSchema,
    severity: RiskLevelSchema,
    detected_at: TimestampSchema,
    component: z.string(),
    description: z.string(),
    evidence: z.array(JsonObjectSchema),
    confidence: z.number().finite(),
    false_positive_probability: z.number().finite().default(0.0),
    related_anomalies: stringList(),
  })
  .passthrough();
export type Anomaly = z.infer<typeof AnomalySchema>;

export const AnomalyDetectorSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    /** Detection algorithm */
    type: z.string(),
    monitored_components: z.array(z.string()),
    detection_rules: jsonObjectList(),
    thresholds: numberMap(),
    baseline: jsonMap(),
    sensitivity: z.number().finite().default(0.5),
    active: z.boolean().default(true),
  })
  .passthrough();
export type AnomalyDetector = z.infer<typeof AnomalyDetectorSchema>;

// ─── Risk ────────────────────────────────────────────────────

export const RiskSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    description: z.string(),
    level: RiskLevelSchema,
    probability: z.number().finite(),
    impact: z.number().finite(),
    risk_score: z.number().finite(),
    affected_components: z.array(z.string()),
    mitigation_options: jsonObjectList(),
    monitoring_required: z.boolean().default(true),
  })
  .passthrough();
export type Risk = z.infer<typeof RiskSchema>;

export const RiskAssessmentSchema = z
  .object({
    id: z.string(),
    timestamp: TimestampSchema,
    scope: z.string(),
    identified_risks: z.array(RiskSchema),
    overall_risk_level: RiskLevelSchema,
    recommendations: z.array(z.string()),
    next_assessment: optionalTimestamp(),
  })
  .passthrough();
export type RiskAssessment = z.infer<typeof RiskAssessmentSchema>;

// ─── Performance ─────────────────────────────────────────────

export const PerformanceMetricSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    category: z.string(),
    value: z.number().finite(),
    unit: z.string(),
    baseline: z.number().finite(),
    threshold_warning: z.number().finite(),
    threshold_critical: z.number().finite(),
    trend: z.string().default('stable'),
  })
  .passthrough();
export type PerformanceMetric = z.infer<typeof PerformanceMetricSchema>;

export const PerformanceReportSchema = z
  .object({
    id: z.string(),
    timestamp: TimestampSchema,
    time_window: z.number().finite(),
    metrics: z.array(PerformanceMetricSchema),
    efficiency_score: z.number().finite(),
    bottlenecks: stringList(),
    optimization_opportunities: stringList(),
    comparison_to_baseline: numberMap(),
  })
  .passthrough();
export type PerformanceReport = z.infer<typeof PerformanceReportSchema>;

// ─── Audit and compliance ────────────────────────────────────

export const AuditEventSchema = z
  .object({
    id: z.string(),
    timestamp: TimestampSchema,
    event_type: z.string(),
    actor_id: z.string(),
    action: z.string(),
    target: z.string(),
    result: z.string(),
    details: jsonMap(),
    compliance_tags: stringList(),
    immutable: z.boolean().default(true),
  })
  .passthrough();
export type AuditEvent = z.infer<typeof AuditEventSchema>;

export const ComplianceCheckSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    /** Regulation or policy checked */
    regulation: z.string(),
    timestamp: TimestampSchema,
    passed: z.boolean(),
    violations: jsonObjectList(),
    evidence: stringList(),
    remediation_required: z.boolean().default(false),
  })
  .passthrough();
export type ComplianceCheck = z.infer<typeof ComplianceCheckSchema>;

// ─── Human in the loop ───────────────────────────────────────

export const HumanReviewRequestSchema = z
  .object({
    id: z.string(),
    timestamp: TimestampSchema,
    urgency: RiskLevelSchema,
    reason: z.string(),
    context: JsonObjectSchema,
    decision_options: z.array(JsonObjectSchema),
    /** Seconds */
    timeout: z.number().finite().nullish(),
    assigned_to: z.string().nullish(),
    status: z.string().default('pending'),
  })
  .passthrough();
export type HumanReviewRequest = z.infer<typeof HumanReviewRequestSchema>;

export const HumanInterventionSchema = z
  .object({
    id: z.string(),
    request_id: z.string(),
    reviewer_id: z.string(),
    timestamp: TimestampSchema,
    decision: z.string(),
    rationale: z.string(),
    actions_taken: z.array(JsonObjectSchema),
    override_automated: z.boolean().default(false),
    feedback_to_system: jsonMap(),
  })
  .passthrough();
export type HumanIntervention = z.infer<typeof HumanInterventionSchema>;

export const EscalationPolicySchema = z
  .object({
    id: z.string(),
    name: z.string(),
    triggers: z.array(JsonObjectSchema),
    escalation_levels: z.array(JsonObjectSchema),
    notification_channels: z.array(z.string()),
    auto_escalate_timeout: z.number().finite(),
    active: z.boolean().default(true),
  })
  .passthrough();
export type EscalationPolicy = z.infer<typeof EscalationPolicySchema>;

export const InterventionActionSchema = z
  .object({
    id: z.string(),
    type: InterventionTypeSchema,
    trigger: z.string(),
    timestamp: TimestampSchema,
    target_component: z.string(),
    parameters: JsonObjectSchema,
    expected_outcome: z.string(),
    actual_outcome: z.string().nullish(),
    success: z.boolean().nullish(),
    rollback_available: z.boolean().default(false),
  })
  .passthrough();
export type InterventionAction = z.infer<typeof InterventionActionSchema>;

export const OversightSnapshotSchema = z
  .object({
    timestamp: TimestampSchema,
    active_anomalies: z.array(AnomalySchema).default([]),
    current_risks: z.array(RiskSchema).default([]),
    performance_summary: numberMap(),
    pending_reviews: z.array(HumanReviewRequestSchema).default([]),
    recent_interventions: z.array(InterventionActionSchema).default([]),
    compliance_status: z.record(z.string(), z.boolean()).default({}),
    /** Oversight system health (0-1) */
    oversight_health: z.number().finite(),
    recommendations: stringList(),
  })
  .passthrough();
export type OversightSnapshot = z.infer<typeof OversightSnapshotSchema>;
export type OversightSnapshotInput = z.input<typeof OversightSnapshotSchema>;
