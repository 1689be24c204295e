/**
 * Interaction Layer - interfaces, messages, and conversations.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema, jsonMap, numberMap, stringList } from '../json.js';
import { TimestampSchema, optionalTimestamp } from '../timestamp.js';

export const INTERFACE_TYPES = ['human', 'agent', 'system', 'environment'] as const;
export const InterfaceTypeSchema = z.enum(INTERFACE_TYPES);
export type InterfaceType = z.infer<typeof InterfaceTypeSchema>;

export const COMMUNICATION_PROTOCOLS = [
  'http',
  'websocket',
  'grpc',
  'message-queue',
  'shared-memory',
  'custom',
] as const;
export const CommunicationProtocolSchema = z.enum(COMMUNICATION_PROTOCOLS);
export type CommunicationProtocol = z.infer<typeof CommunicationProtocolSchema>;

export const MESSAGE_TYPES = [
  'request',
  'response',
  'notification',
  'command',
  'query',
  'update',
  'error',
  'acknowledgment',
] as const;
export const MessageTypeSchema = z.enum(MESSAGE_TYPES);
export type MessageType = z.infer<typeof MessageTypeSchema>;

export const INTERACTION_MODES = [
  'synchronous',
  'asynchronous',
  'streaming',
  'batch',
  'publish-subscribe',
] as const;
export const InteractionModeSchema = z.enum(INTERACTION_MODES);
export type InteractionMode = z.infer<typeof InteractionModeSchema>;

const stringListMap = () => z.record(z.string(), z.array(z.string())).default({});

// ─── Interfaces ──────────────────────────────────────────────

export const InterfaceSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: InterfaceTypeSchema,
    protocol: CommunicationProtocolSchema,
    endpoint: z.string(),
    capabilities: stringList(),
    authentication_required: z.boolean().default(false),
    rate_limits: z.record(z.string(), z.number().int()).default({}),
    active: z.boolean().default(true),
  })
  .passthrough();
export type Interface = z.infer<typeof InterfaceSchema>;

export const HumanInterfaceSchema = z
  .object({
    interface_id: z.string(),
    /** text, voice, ... */
    interaction_modalities: z.array(z.string()),
    language_support: stringList(),
    accessibility_features: stringList(),
    user_preferences: jsonMap(),
    session_management: jsonMap(),
    feedback_mechanisms: stringList(),
  })
  .passthrough();
export type HumanInterface = z.infer<typeof HumanInterfaceSchema>;

export const AgentInterfaceSchema = z
  .object({
    interface_id: z.string(),
    supported_agent_types: stringList(),
    negotiation_protocols: stringList(),
    coordination_mechanisms: stringList(),
    trust_model: jsonMap(),
    collaboration_modes: stringList(),
    conflict_resolution: jsonMap(),
  })
  .passthrough();
export type AgentInterface = z.infer<typeof AgentInterfaceSchema>;

export const SystemInterfaceSchema = z
  .object({
    interface_id: z.string(),
    api_version: z.string(),
    supported_operations: z.array(z.string()),
    data_formats: z.array(z.string()),
    security_protocols: stringList(),
    transaction_support: z.boolean().default(false),
    idempotency_keys: z.boolean().default(false),
  })
  .passthrough();
export type SystemInterface = z.infer<typeof SystemInterfaceSchema>;

export const EnvironmentInterfaceSchema = z
  .object({
    interface_id: z.string(),
    sensor_types: z.array(z.string()),
    actuator_types: stringList(),
    environment_model: jsonMap(),
    physical_constraints: jsonMap(),
    safety_protocols: stringList(),
    simulation_support: z.boolean().default(false),
  })
  .passthrough();
export type EnvironmentInterface = z.infer<typeof EnvironmentInterfaceSchema>;

// ─── Communication ───────────────────────────────────────────

export const MessageSchema = z
  .object({
    id: z.string(),
    type: MessageTypeSchema,
    sender_id: z.string(),
    recipient_id: z.string(),
    interface_id: z.string(),
    content: JsonValueSchema,
    metadata: jsonMap(),
    timestamp: TimestampSchema,
    correlation_id: z.string().nullish(),
    /** Id of the message this one replies to */
    reply_to: z.string().nullish(),
    expires_at: optionalTimestamp(),
  })
  .passthrough();
export type Message = z.infer<typeof MessageSchema>;

export const ConversationSchema = z
  .object({
    id: z.string(),
    participant_ids: z.array(z.string()),
    interface_ids: z.array(z.string()),
    start_time: TimestampSchema,
    end_time: optionalTimestamp(),
    message_count: z.number().int().default(0),
    context: jsonMap(),
    status: z.string().default('active'),
    topic: z.string().nullish(),
  })
  .passthrough();
export type Conversation = z.infer<typeof ConversationSchema>;

export const InteractionEventSchema = z
  .object({
    id: z.string(),
    event_type: z.string(),
    timestamp: TimestampSchema,
    interface_id: z.string(),
    participant_ids: z.array(z.string()),
    description: z.string(),
    impact: z.string().default('low'),
    data: jsonMap(),
  })
  .passthrough();
export type InteractionEvent = z.infer<typeof InteractionEventSchema>;

// ─── Protocols and policies ──────────────────────────────────

export const ProtocolSpecificationSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    version: z.string(),
    steps: z.array(JsonObjectSchema),
    message_formats: JsonObjectSchema,
    state_machine: jsonMap(),
    /** Seconds, keyed by phase */
    timeouts: numberMap(),
    error_handling: jsonMap(),
  })
  .passthrough();
export type ProtocolSpecification = z.infer<typeof ProtocolSpecificationSchema>;

export const InteractionPolicySchema = z
  .object({
    id: z.string(),
    name: z.string(),
    interface_types: z.array(InterfaceTypeSchema),
    rules: z.array(JsonObjectSchema),
    permissions: stringListMap(),
    restrictions: stringListMap(),
    priority: z.number().int().default(0),
    active: z.boolean().default(true),
  })
  .passthrough();
export type InteractionPolicy = z.infer<typeof InteractionPolicySchema>;

export const InteractionMetricsSchema = z
  .object({
    id: z.string(),
    interface_id: z.string(),
    /** Window in seconds */
    time_window: z.number().finite(),
    message_count: z.number().int().default(0),
    error_count: z.number().int().default(0),
    /** Milliseconds */
    average_latency: z.number().finite().default(0.0),
    /** Messages per second */
    throughput: z.number().finite().default(0.0),
    success_rate: z.number().finite().default(1.0),
    active_conversations: z.number().int().default(0),
  })
  .passthrough();
export type InteractionMetrics = z.infer<typeof InteractionMetricsSchema>;

export const InteractionSnapshotSchema = z
  .object({
    timestamp: TimestampSchema,
    active_interfaces: z.array(InterfaceSchema).default([]),
    ongoing_conversations: z.array(ConversationSchema).default([]),
    recent_messages: z.array(MessageSchema).default([]),
    interface_metrics: z.array(InteractionMetricsSchema).default([]),
    active_policies: z.array(InteractionPolicySchema).default([]),
    pending_messages: z.number().int().default(0),
  })
  .passthrough();
export type InteractionSnapshot = z.infer<typeof InteractionSnapshotSchema>;
export type InteractionSnapshotInput = z.input<typeof InteractionSnapshotSchema>;
