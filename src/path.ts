import type { PathLocation, PathSegment } from './types.js';

export const ROOT_PATH = '';

export function keySegment(key: string): PathSegment {
  return { kind: 'key', key };
}

export function indexSegment(index: number): PathSegment {
  return { kind: 'index', index };
}

/**
 * Render segments to the flattened query form: keys joined with `.`,
 * indices in brackets. Keys are not escaped, so a key containing `.` or
 * `[` renders the same as the nested path it resembles.
 */
export function renderPath(segments: readonly PathSegment[]): string {
  return segments.reduce<string>(appendSegment, ROOT_PATH);
}

/**
 * Extend an already rendered path by one segment
 */
export function appendSegment(path: string, segment: PathSegment): string {
  if (segment.kind === 'index') {
    return `${path}[${segment.index}]`;
  }
  return path ? `${path}.${segment.key}` : segment.key;
}

/**
 * Segments from the root down to `location`
 */
export function locationSegments(location: PathLocation | null): PathSegment[] {
  const segments: PathSegment[] = [];
  for (let current = location; current; current = current.parent) {
    segments.push(current.segment);
  }
  return segments.reverse();
}
