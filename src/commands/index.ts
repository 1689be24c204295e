/**
 * Command re-exports
 */

export { initCommand } from './init.js';
export { convertCommand, type ConvertOptions } from './convert.js';
export { treeCommand, type TreeOptions } from './tree.js';
export { timelineCommand, type TimelineOptions } from './timeline.js';
export { metricsCommand, type MetricsOptions } from './metrics.js';
export { validateCommand } from './validate.js';
