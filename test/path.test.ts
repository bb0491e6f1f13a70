import { describe, it, expect } from 'vitest';
import {
  ROOT_PATH,
  appendSegment,
  indexSegment,
  keySegment,
  locationSegments,
  renderPath,
} from '../src/path.js';

describe('paths', () => {
  it('should render the root as an empty string', () => {
    expect(renderPath([])).toBe(ROOT_PATH);
    expect(ROOT_PATH).toBe('');
  });

  it('should join keys with dots and wrap indices in brackets', () => {
    expect(renderPath([keySegment('user'), keySegment('tags'), indexSegment(2)])).toBe('user.tags[2]');
    expect(renderPath([indexSegment(0), keySegment('id')])).toBe('[0].id');
    expect(renderPath([indexSegment(1), indexSegment(3)])).toBe('[1][3]');
  });

  it('should not escape keys that look like paths', () => {
    expect(renderPath([keySegment('a.b')])).toBe(renderPath([keySegment('a'), keySegment('b')]));
  });

  it('should render an empty root key as the root path', () => {
    expect(renderPath([keySegment('')])).toBe('');
    expect(appendSegment('a', keySegment(''))).toBe('a.');
  });

  it('should collect segments from a linked location', () => {
    const items = { parent: null, segment: keySegment('items') };
    const element = { parent: items, segment: indexSegment(1) };
    expect(locationSegments(element)).toEqual([keySegment('items'), indexSegment(1)]);
    expect(locationSegments(null)).toEqual([]);
  });
});
