import { ROOT_PATH } from './path.js';
import { scanCompleteness } from './scanner.js';
import type {
  CompletedPath,
  CompletenessResult,
  CompletenessTracker,
  CompletenessTrackerOptions,
  PathSpan,
  ScanState,
} from './types.js';

function emptyState(): ScanState {
  return {
    source: '',
    completePaths: new Set(),
    pathSpans: new Map(),
    entries: [],
  };
}

/**
 * Tracks which parts of a streamed JSON document are closed.
 *
 * Every `analyze` call re-scans the text from scratch and replaces the
 * previous results; nothing carries over between calls. Use one tracker
 * per in-flight document.
 *
 * @example
 * ```ts
 * const tracker = new JsonCompletenessTracker();
 * tracker.analyze('{"name": "Alice", "address": {"city": "NY');
 * tracker.isPathComplete('name');    // true
 * tracker.isPathComplete('address'); // false
 * tracker.isRootComplete();          // false
 * ```
 */
export class JsonCompletenessTracker implements CompletenessTracker {
  private options: CompletenessTrackerOptions;
  private state: ScanState;

  constructor(options: CompletenessTrackerOptions = {}) {
    this.options = {
      events: {},
      ...options,
    };
    this.state = emptyState();
  }

  analyze(text: string): void {
    this.state = scanCompleteness(text, this.options.events);
    this.options.events?.onAnalyze?.(this.getResult());
  }

  feed(chunk: string): CompletenessResult {
    this.analyze(this.state.source + chunk);
    return this.getResult();
  }

  reset(): void {
    this.state = emptyState();
  }

  isPathComplete(path: string): boolean {
    return this.state.completePaths.has(path);
  }

  getCompletePaths(): Set<string> {
    return new Set(this.state.completePaths);
  }

  isRootComplete(): boolean {
    return this.isPathComplete(ROOT_PATH);
  }

  getPathSpan(path: string): PathSpan | undefined {
    const span = this.state.pathSpans.get(path);
    return span ? { ...span } : undefined;
  }

  /**
   * Raw source text of a complete structure
   */
  getCompleteText(path: string): string | undefined {
    const span = this.state.pathSpans.get(path);
    if (!span) return undefined;
    return this.state.source.slice(span.start, span.end);
  }

  /**
   * Completed locations with their unambiguous segment form, in
   * completion order
   */
  getCompleteEntries(): CompletedPath[] {
    return this.state.entries.map((entry) => ({
      path: entry.path,
      segments: entry.segments.map((segment) => ({ ...segment })),
      span: { ...entry.span },
    }));
  }

  getResult(): CompletenessResult {
    return {
      rootComplete: this.isRootComplete(),
      completePaths: Array.from(this.state.completePaths),
      bytesProcessed: this.state.source.length,
    };
  }

  getSource(): string {
    return this.state.source;
  }
}

/**
 * Create a new completeness tracker
 */
export function createCompletenessTracker(options?: CompletenessTrackerOptions): JsonCompletenessTracker {
  return new JsonCompletenessTracker(options);
}
