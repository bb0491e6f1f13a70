/**
 * One step of a structural path: an object member or an array element
 */
export type PathSegment =
  | { kind: 'key'; key: string }
  | { kind: 'index'; index: number };

/**
 * Offsets of a complete structure in the scanned source (end is exclusive)
 */
export interface PathSpan {
  start: number;
  end: number;
}

export interface CompletedPath {
  /** Flattened path, e.g. `user.tags[2]` ("" for the root) */
  path: string;
  segments: PathSegment[];
  span: PathSpan;
}

/**
 * Result of a single scan. Created fresh by every scan and never
 * modified afterwards.
 */
export interface ScanState {
  source: string;
  completePaths: Set<string>;
  pathSpans: Map<string, PathSpan>;
  /** Completed locations in completion order (children before parents) */
  entries: CompletedPath[];
}

/**
 * Offset just past a structure whose terminating token was seen, or null
 * when the structure is truncated or malformed
 */
export type ScanEnd = number | null;

/**
 * Location of a value during a scan, linked to its parent. The root value
 * has location `null`.
 */
export interface PathLocation {
  parent: PathLocation | null;
  segment: PathSegment;
}

/**
 * Container still waiting for its closing token
 */
export interface OpenContainer {
  type: 'object' | 'array';
  start: number;
  location: PathLocation | null;
  /** Members or elements scanned so far */
  count: number;
}

export interface CompletenessResult {
  /** Whether the root value was closed */
  rootComplete: boolean;
  /** Distinct complete paths, each at the position of its first completion */
  completePaths: string[];
  /** Length of the analyzed source */
  bytesProcessed: number;
}

/**
 * Event types for the tracker
 */
export interface TrackerEvents {
  onPathComplete?: (path: string, span: PathSpan, segments: readonly PathSegment[]) => void;
  onAnalyze?: (result: CompletenessResult) => void;
}

/**
 * Tracker options
 */
export interface CompletenessTrackerOptions {
  /** Event callbacks */
  events?: TrackerEvents;
}

/**
 * Path-level completeness queries over the most recently analyzed text
 */
export interface CompletenessTracker {
  /** Re-scan `text` from scratch, replacing the previous results */
  analyze(text: string): void;
  /** Append a chunk to the buffer and re-scan the whole buffer */
  feed(chunk: string): CompletenessResult;
  /** Clear the buffer and the results */
  reset(): void;
  isPathComplete(path: string): boolean;
  getCompletePaths(): Set<string>;
  isRootComplete(): boolean;
  getPathSpan(path: string): PathSpan | undefined;
  getCompleteText(path: string): string | undefined;
  getCompleteEntries(): CompletedPath[];
  getResult(): CompletenessResult;
  getSource(): string;
}
