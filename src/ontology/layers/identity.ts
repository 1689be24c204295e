/**
 * Identity Layer
 *
 * Who the agent is: type tags, domains, capabilities, configuration and
 * provenance. All records are open: unknown keys are kept and written back.
 */

import { z } from 'zod';
import { jsonMap, stringList } from '../json.js';
import { TimestampSchema } from '../timestamp.js';
import { parseEntity } from '../validation.js';

export const AGENT_TYPES = [
  'conversational',
  'task-execution',
  'reasoning',
  'learning',
  'hybrid',
  'general',
  'deliberative',
  'reactive',
] as const;

export const AgentTypeSchema = z.enum(AGENT_TYPES);
export type AgentType = z.infer<typeof AgentTypeSchema>;

export const AGENT_DOMAINS = [
  'customer-support',
  'finance',
  'software-development',
  'healthcare',
  'education',
  'general',
] as const;

export const AgentDomainSchema = z.enum(AGENT_DOMAINS);
export type AgentDomain = z.infer<typeof AgentDomainSchema>;

/**
 * Individual capability of an agent.
 */
export const AgentCapabilitySchema = z
  .object({
    /** Capability name, unique within the owning agent */
    name: z.string(),
    /** Capability version */
    version: z.string().default('1.0.0'),
    /** Capability parameters */
    parameters: jsonMap(),
    /** Capability constraints */
    constraints: jsonMap(),
    /** Whether the capability is enabled */
    enabled: z.boolean().default(true),
  })
  .passthrough();

export type AgentCapability = z.infer<typeof AgentCapabilitySchema>;

/**
 * Agent configuration settings.
 */
export const AgentConfigurationSchema = z
  .object({
    /** Model identifier (e.g. "gpt-4") */
    model_id: z.string().nullish(),
    /** Model version */
    model_version: z.string().nullish(),
    /** Free-form configuration parameters */
    parameters: jsonMap(),
    /** Resource constraints */
    resource_limits: jsonMap(),
    /** Security configuration */
    security_settings: jsonMap(),
    /** Feature toggles */
    feature_flags: z.record(z.string(), z.boolean()).default({}),
  })
  .passthrough();

export type AgentConfiguration = z.infer<typeof AgentConfigurationSchema>;

/**
 * Agent provenance and tracking information.
 */
export const AgentMetadataSchema = z
  .object({
    /** Agent creation time */
    created_at: TimestampSchema,
    /** Creator identifier */
    created_by: z.string(),
    /** Agent version */
    version: z.string(),
    description: z.string().nullish(),
    tags: stringList(),
    documentation_url: z.string().nullish(),
    license: z.string().nullish(),
    /** Extension point for custom provenance fields */
    custom_metadata: jsonMap(),
  })
  .passthrough();

export type AgentMetadata = z.infer<typeof AgentMetadataSchema>;

/**
 * Core agent instance.
 *
 * `parent_agent_id` / `child_agent_ids` describe hierarchical agents. No
 * cycle check is made between them.
 */
export const AgentInstanceSchema = z
  .object({
    /** Unique agent instance identifier */
    id: z.string(),
    /** Agent name */
    name: z.string(),
    /** Ordered type tags, at least one */
    types: z.array(AgentTypeSchema).min(1, 'At least one agent type is required'),
    /** Operating domains */
    domains: z.array(AgentDomainSchema).default([]),
    /** Capabilities; names are unique within the agent */
    capabilities: z
      .array(AgentCapabilitySchema)
      .default([])
      .superRefine((capabilities, ctx) => {
        const seen = new Set<string>();
        capabilities.forEach((capability, index) => {
          if (seen.has(capability.name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [index, 'name'],
              message: `Duplicate capability name "${capability.name}"`,
            });
          }
          seen.add(capability.name);
        });
      }),
    configuration: AgentConfigurationSchema,
    metadata: AgentMetadataSchema,
    /** Parent agent for hierarchical agents */
    parent_agent_id: z.string().nullish(),
    /** Child agents */
    child_agent_ids: stringList(),
  })
  .passthrough();

export type AgentInstance = z.infer<typeof AgentInstanceSchema>;
export type AgentInstanceInput = z.input<typeof AgentInstanceSchema>;

/**
 * Validate an agent instance document.
 *
 * @throws ValidationError
 */
export function validateAgentInstance(data: unknown): AgentInstance {
  return parseEntity(AgentInstanceSchema, data, 'AgentInstance');
}

/**
 * Build a capability record for a tool the agent was seen using.
 */
export function toolCapability(toolName: string, version = '1.0.0'): AgentCapability {
  return parseEntity(
    AgentCapabilitySchema,
    { name: `tool:${toolName}`, version, enabled: true },
    'AgentCapability',
  );
}
