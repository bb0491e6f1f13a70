/**
 * json-completeness
 * Path-level completeness tracking for JSON documents that arrive as a stream
 * Tells which parts of a truncated LLM output are closed and safe to validate
 */

export { JsonCompletenessTracker, createCompletenessTracker } from './tracker.js';
export { CompletenessScanner, scanCompleteness } from './scanner.js';
export { isJsonComplete } from './probe.js';
export {
  ROOT_PATH,
  appendSegment,
  indexSegment,
  keySegment,
  locationSegments,
  renderPath,
} from './path.js';

// Export types
export type {
  PathSegment,
  PathSpan,
  CompletedPath,
  ScanState,
  ScanEnd,
  PathLocation,
  OpenContainer,
  CompletenessResult,
  TrackerEvents,
  CompletenessTrackerOptions,
  CompletenessTracker,
} from './types.js';
