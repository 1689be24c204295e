/**
 * Step Tree
 *
 * Queries and edits over a run's step forest. Traversal is depth-first in
 * list order everywhere, so lookups and emitted events are deterministic.
 */

import type { Run, Step } from './run.js';

export type TimelineEventType = 'step_start' | 'step_end';

export interface TimelineEvent {
  timestamp: Date;
  type: TimelineEventType;
  step_id: string;
  step_name: string;
  /** Root steps are depth 0 */
  depth: number;
}

export interface StepVisit {
  step: Step;
  depth: number;
}

export interface RunMetrics {
  /** Top-level steps only */
  total_steps: number;
  total_duration: number;
  average_step_duration: number;
  max_nesting_depth: number;
  [metric: string]: number;
}

/**
 * Depth-first walk over every step, root steps at depth 0.
 */
export function* walkSteps(run: Pick<Run, 'steps'>): Generator<StepVisit> {
  yield* walk(run.steps, 0);
}

function* walk(steps: Step[], depth: number): Generator<StepVisit> {
  for (const step of steps) {
    yield { step, depth };
    yield* walk(step.sub_steps, depth + 1);
  }
}

/**
 * Find a step anywhere in the tree. First match in depth-first order wins.
 */
export function findStepById(run: Pick<Run, 'steps'>, id: string): Step | undefined {
  for (const { step } of walkSteps(run)) {
    if (step.id === id) return step;
  }
  return undefined;
}

/**
 * Start/end events for every step, ascending by timestamp. Events at the
 * same instant keep depth-first emission order.
 */
export function timeline(run: Pick<Run, 'steps'>): TimelineEvent[] {
  const events: TimelineEvent[] = [];
  for (const { step, depth } of walkSteps(run)) {
    events.push({
      timestamp: step.start_time,
      type: 'step_start',
      step_id: step.id,
      step_name: step.name,
      depth,
    });
    if (step.end_time) {
      events.push({
        timestamp: step.end_time,
        type: 'step_end',
        step_id: step.id,
        step_name: step.name,
        depth,
      });
    }
  }
  // Array#sort is stable
  return events.sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
}

/**
 * Length of the deepest step chain: 0 with no steps, 1 for a flat list.
 */
export function maxNestingDepth(run: Pick<Run, 'steps'>): number {
  let max = 0;
  for (const { depth } of walkSteps(run)) {
    max = Math.max(max, depth + 1);
  }
  return max;
}

/**
 * Mean duration over every step that has one, sub-steps included.
 */
export function averageStepDuration(run: Pick<Run, 'steps'>): number {
  let total = 0;
  let count = 0;
  for (const { step } of walkSteps(run)) {
    if (step.duration !== null) {
      total += step.duration;
      count++;
    }
  }
  return count === 0 ? 0 : total / count;
}

export function addStep(run: Pick<Run, 'steps'>, step: Step): void {
  run.steps.push(step);
}

/**
 * Attach `child` under `parent`, linking it back through `parent_step_id`.
 */
export function appendSubStep(parent: Step, child: Step): void {
  child.parent_step_id = parent.id;
  parent.sub_steps.push(child);
}

/**
 * Aggregate metrics for a run, merged with its recorded performance metrics.
 */
export function calculateMetrics(run: Run): RunMetrics {
  return {
    total_steps: run.steps.length,
    total_duration: run.duration ?? 0,
    average_step_duration: averageStepDuration(run),
    max_nesting_depth: maxNestingDepth(run),
    ...run.performance_metrics,
  };
}
