/**
 * Plain-text descriptions of ontology entities for terminal output.
 */

import type { JsonValue } from '../ontology/json.js';
import type { Step } from '../ontology/run.js';

/**
 * One-line preview of a content value, whitespace collapsed and cut to
 * `maxLength` characters.
 */
export function previewContent(content: JsonValue, maxLength = 48): string {
  const text = typeof content === 'string' ? content : JSON.stringify(content);
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > maxLength ? `${flat.slice(0, maxLength - 1)}…` : flat;
}

/**
 * Messages and tool calls recorded on a step, one entry each.
 */
export function describeStep(step: Step): string[] {
  const parts: string[] = [];
  for (const message of step.interaction_state?.recent_messages ?? []) {
    parts.push(`${message.sender_id} → ${message.recipient_id}: "${previewContent(message.content)}"`);
  }
  for (const action of step.action_state?.completed_actions ?? []) {
    for (const tool of action.tool_invocations) {
      parts.push(`tool ${tool.tool_name}(${previewContent(tool.input_parameters)})`);
    }
  }
  return parts;
}

export function formatSeconds(seconds: number): string {
  if (seconds < 1) return `${Math.round(seconds * 1000)}ms`;
  if (seconds < 60) return `${Number(seconds.toFixed(2))}s`;
  const minutes = Math.floor(seconds / 60);
  return `${minutes}m ${Math.round(seconds - minutes * 60)}s`;
}
