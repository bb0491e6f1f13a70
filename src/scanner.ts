import { indexSegment, keySegment, locationSegments, renderPath } from './path.js';
import type {
  OpenContainer,
  PathLocation,
  PathSegment,
  PathSpan,
  ScanEnd,
  ScanState,
  TrackerEvents,
} from './types.js';

const WHITESPACE = new Set([' ', '\t', '\n', '\r']);
const NUMBER_TERMINATOR = new Set([' ', '\t', '\n', '\r', ',', '}', ']']);
const LITERALS = ['true', 'false', 'null'] as const;

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

/**
 * Single-pass completeness scan over a (possibly truncated) JSON document.
 *
 * Open containers live on an explicit stack, so nesting depth does not
 * consume call stack. Every structure either yields the offset just past
 * its terminating token or `null`; nothing here throws on bad input.
 */
export class CompletenessScanner {
  private readonly source: string;
  private readonly events: TrackerEvents;
  private state: ScanState;
  private stack: OpenContainer[];

  constructor(source: string, events: TrackerEvents = {}) {
    this.source = source;
    this.events = events;
    this.state = this.createInitialState();
    this.stack = [];
  }

  private createInitialState(): ScanState {
    return {
      source: this.source,
      completePaths: new Set(),
      pathSpans: new Map(),
      entries: [],
    };
  }

  /**
   * Run a full pass. Each call starts over and returns a new state.
   */
  scan(): ScanState {
    this.state = this.createInitialState();
    this.stack = [];

    let position: ScanEnd = this.openValue(0, null);

    while (position !== null) {
      const frame = this.currentFrame();
      if (!frame) {
        // Root value closed; anything after it is ignored
        break;
      }
      position = this.continueContainer(frame, position);
    }

    return this.state;
  }

  /**
   * Start the value at `start`. Scalars are scanned to their end;
   * containers are pushed and the offset after the opening token returned.
   */
  private openValue(start: number, location: PathLocation | null): ScanEnd {
    const position = this.skipWhitespace(start);
    const char = this.source[position];

    switch (char) {
      case undefined:
        return null;

      case '{':
      case '[':
        this.stack.push({
          type: char === '{' ? 'object' : 'array',
          start: position,
          location,
          count: 0,
        });
        return position + 1;

      case '"':
        return this.complete(location, position, this.scanString(position));

      default:
        if (char === '-' || isDigit(char)) {
          return this.complete(location, position, this.scanNumber(position));
        }
        return this.complete(location, position, this.scanLiteral(position));
    }
  }

  /**
   * Advance the innermost open container by one member, element or its
   * closing token.
   */
  private continueContainer(frame: OpenContainer, start: number): ScanEnd {
    const closer = frame.type === 'object' ? '}' : ']';
    let position = this.skipWhitespace(start);

    if (position >= this.source.length) {
      return null;
    }

    if (this.source[position] === closer) {
      this.stack.pop();
      return this.complete(frame.location, frame.start, position + 1);
    }

    if (frame.count > 0) {
      if (this.source[position] !== ',') {
        return null;
      }
      position = this.skipWhitespace(position + 1);
      if (position >= this.source.length) {
        return null;
      }
    }

    let segment: PathSegment;
    if (frame.type === 'object') {
      if (this.source[position] !== '"') {
        return null;
      }
      const keyEnd = this.scanString(position);
      if (keyEnd === null) {
        return null;
      }
      // Raw key text: escapes are not decoded
      segment = keySegment(this.source.slice(position + 1, keyEnd - 1));

      position = this.skipWhitespace(keyEnd);
      if (this.source[position] !== ':') {
        return null;
      }
      position++;
    } else {
      segment = indexSegment(frame.count);
    }

    frame.count++;
    return this.openValue(position, { parent: frame.location, segment });
  }

  /**
   * Find the closing quote of the string opening at `start`. A backslash
   * skips the next character whatever it is; escapes are not validated.
   */
  private scanString(start: number): ScanEnd {
    let position = start + 1;

    while (position < this.source.length) {
      const char = this.source[position];
      if (char === '\\') {
        position += 2;
      } else if (char === '"') {
        return position + 1;
      } else {
        position++;
      }
    }

    return null;
  }

  /**
   * Numbers have no closing token: the longest valid numeric prefix counts
   * as finished when followed by a terminator or by the end of the text.
   */
  private scanNumber(start: number): ScanEnd {
    const source = this.source;
    let position = start;

    if (source[position] === '-') {
      position++;
    }

    // Integer part
    if (source[position] === '0') {
      position++;
    } else if (isDigit(source[position])) {
      while (isDigit(source[position])) {
        position++;
      }
    } else {
      return null;
    }

    // Fraction needs at least one digit after the dot
    if (source[position] === '.') {
      position++;
      if (!isDigit(source[position])) {
        return null;
      }
      while (isDigit(source[position])) {
        position++;
      }
    }

    // Exponent, optionally signed, needs at least one digit
    const exponent = source[position];
    if (exponent === 'e' || exponent === 'E') {
      position++;
      const sign = source[position];
      if (sign === '+' || sign === '-') {
        position++;
      }
      if (!isDigit(source[position])) {
        return null;
      }
      while (isDigit(source[position])) {
        position++;
      }
    }

    const next = source[position];
    if (next !== undefined && !NUMBER_TERMINATOR.has(next)) {
      return null;
    }

    return position;
  }

  private scanLiteral(start: number): ScanEnd {
    for (const literal of LITERALS) {
      if (this.source.startsWith(literal, start)) {
        return start + literal.length;
      }
    }
    return null;
  }

  private complete(location: PathLocation | null, start: number, end: ScanEnd): ScanEnd {
    if (end === null) {
      return null;
    }

    const segments = locationSegments(location);
    const path = renderPath(segments);
    const span: PathSpan = { start, end };
    this.state.completePaths.add(path);
    this.state.pathSpans.set(path, span);
    this.state.entries.push({ path, segments, span });
    this.events.onPathComplete?.(path, { ...span }, [...segments]);

    return end;
  }

  private skipWhitespace(start: number): number {
    let position = start;
    while (position < this.source.length && WHITESPACE.has(this.source.charAt(position))) {
      position++;
    }
    return position;
  }

  private currentFrame(): OpenContainer | undefined {
    return this.stack[this.stack.length - 1];
  }
}

/**
 * Scan `source` once and return the resulting state
 */
export function scanCompleteness(source: string, events?: TrackerEvents): ScanState {
  return new CompletenessScanner(source, events).scan();
}
