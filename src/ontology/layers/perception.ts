/**
 * Perception Layer - input capture and observation.
 */

import { z } from 'zod';
import { JsonObjectSchema, JsonValueSchema, jsonMap, stringList } from '../json.js';
import { TimestampSchema } from '../timestamp.js';

export const SENSOR_TYPES = [
  'text-input',
  'document-input',
  'api-input',
  'database-input',
  'file-system-input',
  'network-input',
  'environment-state',
  'agent-state',
  'user-feedback',
  'system-metrics',
] as const;
export const SensorTypeSchema = z.enum(SENSOR_TYPES);
export type SensorType = z.infer<typeof SensorTypeSchema>;

export const SIGNAL_TYPES = [
  'text',
  'numeric',
  'binary',
  'structured',
  'unstructured',
  'time-series',
  'event',
] as const;
export const SignalTypeSchema = z.enum(SIGNAL_TYPES);
export type SignalType = z.infer<typeof SignalTypeSchema>;

export const PROCESSING_TYPES = [
  'nlp',
  'ocr',
  'parsing',
  'filtering',
  'aggregation',
  'normalization',
  'feature-extraction',
  'pattern-recognition',
] as const;
export const ProcessingTypeSchema = z.enum(PROCESSING_TYPES);
export type ProcessingType = z.infer<typeof ProcessingTypeSchema>;

export const SensorSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    type: SensorTypeSchema,
    configuration: jsonMap(),
    active: z.boolean().default(true),
    /** Sampling rate in Hz */
    sampling_rate: z.number().finite().nullish(),
    filters: stringList(),
  })
  .passthrough();
export type Sensor = z.infer<typeof SensorSchema>;

export const RawSignalSchema = z
  .object({
    id: z.string(),
    sensor_id: z.string(),
    type: SignalTypeSchema,
    data: JsonValueSchema,
    timestamp: TimestampSchema,
    /** Signal quality (0-1) */
    quality: z.number().finite().default(1.0),
    metadata: jsonMap(),
  })
  .passthrough();
export type RawSignal = z.infer<typeof RawSignalSchema>;

export const SignalProcessorSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    processing_types: z.array(ProcessingTypeSchema),
    input_signal_types: z.array(SignalTypeSchema),
    configuration: jsonMap(),
  })
  .passthrough();
export type SignalProcessor = z.infer<typeof SignalProcessorSchema>;

/**
 * Processed observation derived from one or more raw signals.
 */
export const ObservationSchema = z
  .object({
    id: z.string(),
    processor_id: z.string(),
    /** Source signal ids */
    signal_ids: z.array(z.string()),
    type: z.string(),
    content: JsonValueSchema,
    /** Observation confidence (0-1) */
    confidence: z.number().finite().default(1.0),
    timestamp: TimestampSchema,
    metadata: jsonMap(),
  })
  .passthrough();
export type Observation = z.infer<typeof ObservationSchema>;

const BaseProcessSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    processor_id: z.string(),
    input_signals: stringList(),
    output_observations: stringList(),
    status: z.string().default('active'),
  })
  .passthrough();

export type Process = z.infer<typeof BaseProcessSchema> & { sub_processes: Process[] };
export type ProcessInput = z.input<typeof BaseProcessSchema> & { sub_processes?: ProcessInput[] };

export const ProcessSchema: z.ZodType<Process, z.ZodTypeDef, ProcessInput> = BaseProcessSchema.extend({
  sub_processes: z.lazy(() => z.array(ProcessSchema)).default([]),
});

export const ContextFilterSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    criteria: JsonObjectSchema,
    priority: z.number().int().default(0),
    active: z.boolean().default(true),
  })
  .passthrough();
export type ContextFilter = z.infer<typeof ContextFilterSchema>;

/**
 * Perception state at a point in time.
 */
export const PerceptionSnapshotSchema = z
  .object({
    timestamp: TimestampSchema,
    active_sensors: z.array(SensorSchema).default([]),
    recent_signals: z.array(RawSignalSchema).default([]),
    current_observations: z.array(ObservationSchema).default([]),
    active_filters: z.array(ContextFilterSchema).default([]),
    /** Signals awaiting processing */
    processing_queue_size: z.number().int().default(0),
  })
  .passthrough();
export type PerceptionSnapshot = z.infer<typeof PerceptionSnapshotSchema>;
export type PerceptionSnapshotInput = z.input<typeof PerceptionSnapshotSchema>;
