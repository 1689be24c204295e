/**
 * Shape of an OpenAI agent-trace document.
 *
 * Every field is optional. Unknown fields must still be JSON values; they
 * are kept and end up in each step's `inputs.original_step`.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema } from '../../ontology/json.js';

export const OpenAITraceStepSchema = z
  .object({
    id: z.string().nullish(),
    /** "message", "tool", or anything else */
    type: z.string().nullish(),
    timestamp: z.string().nullish(),
    role: z.string().nullish(),
    content: JsonValueSchema.optional(),
    tool_name: z.string().nullish(),
    input: JsonObjectSchema.nullish(),
    output: JsonValueSchema.optional(),
  })
  .catchall(JsonValueSchema);

export type OpenAITraceStep = z.infer<typeof OpenAITraceStepSchema>;

export const OpenAITraceSchema = z
  .object({
    id: z.string().nullish(),
    agent_id: z.string().nullish(),
    model: z.string().nullish(),
    config: JsonObjectSchema.nullish(),
    started_at: z.string().nullish(),
    ended_at: z.string().nullish(),
    status: z.string().nullish(),
    steps: z.array(OpenAITraceStepSchema).nullish(),
  })
  .catchall(JsonValueSchema);

export type OpenAITrace = z.infer<typeof OpenAITraceSchema>;
