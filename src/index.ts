export * from './http/index.js';
export { formatBytes, formatDuration, splitDuration } from './progress/format.js';
export type { DurationParts } from './progress/format.js';
export { ThroughputSampler, DEFAULT_SPEED_SAMPLES } from './progress/sampler.js';
export { ProgressRenderer, describeProgress, formatStatusLine } from './progress/renderer.js';
export type { ProgressInput } from './progress/renderer.js';
export { ConfigManager, getConfig } from './config/index.js';
export type { Config } from './config/types.js';
export type { Clock } from './utils/clock.js';
