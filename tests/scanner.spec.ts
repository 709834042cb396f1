import { describe, it, expect } from 'vitest';
import { scanLines, step, initialScanState } from '../src/features/screenplay/scanner.js';
import type { Segment } from '../src/features/screenplay/types.js';

function scan(text: string): readonly Segment[] {
  const result = scanLines(text.split('\n'));
  if (!result.success) throw result.error;
  return result.segments;
}

function tags(segments: readonly Segment[]): string[] {
  return segments.map(s => `${s.sceneIndex}${s.setup?.letter ?? '-'}${s.occurrenceSuffix}`);
}

describe('scanLines', () => {
  it('splits the studio example into three segments with a suffix on the repeat', () => {
    const segments = scan('INT. STUDIO - DAY\n[[SETUP A: wide]]\nLine one.\n[[SETUP B: close]]\nLine two.\n[[SETUP A: wide]]\nLine three.');
    expect(segments).toEqual([
      { sceneIndex: 1, setup: { letter: 'A', description: 'wide' }, contentLines: ['Line one.'], occurrenceSuffix: '' },
      { sceneIndex: 1, setup: { letter: 'B', description: 'close' }, contentLines: ['Line two.'], occurrenceSuffix: '' },
      { sceneIndex: 1, setup: { letter: 'A', description: 'wide' }, contentLines: ['Line three.'], occurrenceSuffix: 'A' },
    ]);
  });

  it('advances the suffix for repeats whether or not the description changes', () => {
    const segments = scan([
      'INT. HALL - DAY',
      '[[SETUP A: wide]]', 'one',
      '[[SETUP A: wide]]', 'two',
      '[[SETUP A: low wide]]', 'three',
      'EXT. YARD - DAY',
      '[[SETUP A: wide]]', 'four',
    ].join('\n'));
    expect(tags(segments)).toEqual(['1A', '1AA', '1AB', '2A']);
    expect(segments[2]?.setup?.description).toBe('low wide');
  });

  it('numbers scenes sequentially and ignores embedded scene numbers', () => {
    const segments = scan('INT. A - DAY #7#\n[[SETUP A: x]]\none\nEXT. B - DAY #3B#\n[[SETUP A: x]]\ntwo');
    expect(segments.map(s => s.sceneIndex)).toEqual([1, 2]);
  });

  it('keeps the active setup across a scene heading', () => {
    const segments = scan('INT. A - DAY\n[[SETUP C: crane]]\none\nINT. B - DAY\ntwo');
    expect(tags(segments)).toEqual(['1C', '2C']);
    expect(segments[1]?.setup).toEqual({ letter: 'C', description: 'crane' });
  });

  it('collapses blank runs into one separator and trims leading and trailing blanks', () => {
    const segments = scan('INT. A - DAY\n[[SETUP A: x]]\n\n\nMARA\nHello.\n\n\n\nShe leaves.\n\n');
    expect(segments).toHaveLength(1);
    expect(segments[0]?.contentLines).toEqual(['MARA', 'Hello.', '', 'She leaves.']);
  });

  it('drops transitions without splitting the segment', () => {
    const segments = scan('INT. A - DAY\n[[SETUP A: x]]\nFirst.\n\nCUT TO:\n\nSecond.');
    expect(segments).toHaveLength(1);
    expect(segments[0]?.contentLines).toEqual(['First.', '', 'Second.']);
  });

  it('discards empty runs between markers without consuming a suffix', () => {
    const segments = scan('INT. A - DAY\n[[SETUP A: x]]\n\n[[SETUP B: y]]\nbody\n[[SETUP A: x]]\nagain');
    expect(tags(segments)).toEqual(['1B', '1A']);
  });

  it('attributes leading content to an unattributed segment', () => {
    const segments = scan('Title: Test\n\nINT. A - DAY\nAction before any setup.\n[[SETUP A: x]]\nShot.');
    expect(segments).toEqual([
      { sceneIndex: 0, contentLines: ['Title: Test'], occurrenceSuffix: '' },
      { sceneIndex: 1, contentLines: ['Action before any setup.'], occurrenceSuffix: '' },
      { sceneIndex: 1, setup: { letter: 'A', description: 'x' }, contentLines: ['Shot.'], occurrenceSuffix: '' },
    ]);
  });

  it('places content after a marker but before the first heading in scene 0', () => {
    expect(tags(scan('[[SETUP A: x]]\ncold open'))).toEqual(['0A']);
  });

  it('treats a malformed marker as content of the open segment', () => {
    const segments = scan('INT. A - DAY\n[[SETUP A: x]]\nLine.\n[[SETUP a: nope]]');
    expect(segments[0]?.contentLines).toEqual(['Line.', '[[SETUP a: nope]]']);
  });

  it('preserves every content line in order', () => {
    const text = [
      'Opening note',
      'INT. A - DAY',
      '[[SETUP A: x]]', 'a1', '', 'a2',
      '[[SETUP B: y]]', 'b1',
      'DISSOLVE TO:',
      'INT. B - NIGHT', 'b2',
      '[[SETUP A: x]]', 'a3',
    ].join('\n');
    const all = scan(text).flatMap(s => s.contentLines.filter(l => l !== ''));
    expect(all).toEqual(['Opening note', 'a1', 'a2', 'b1', 'b2', 'a3']);
  });

  it('freezes emitted segments', () => {
    const [first] = scan('INT. A - DAY\n[[SETUP A: x]]\nLine.');
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first?.contentLines)).toBe(true);
  });

  it('returns a new state from each step', () => {
    const next = step(initialScanState, { kind: 'scene-heading', text: 'INT. A - DAY' });
    expect(next.success).toBe(true);
    if (!next.success) return;
    expect(next.state).not.toBe(initialScanState);
    expect(next.state.sceneIndex).toBe(1);
    expect(initialScanState.sceneIndex).toBe(0);
  });
});

describe('suffix overflow', () => {
  function repeated(count: number): string[] {
    const lines = ['INT. STAGE - DAY'];
    for (let i = 0; i < count; i++) lines.push('[[SETUP A: wide]]', `take ${i}`);
    return lines;
  }

  it('tags 18,278 repeats of one pair, ending at ZZZ', () => {
    const result = scanLines(repeated(18279));
    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.segments).toHaveLength(18279);
    expect(result.segments[18278]?.occurrenceSuffix).toBe('ZZZ');
  });

  it('fails on the 18,279th repeat', () => {
    const result = scanLines(repeated(18280));
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.name).toBe('SuffixOverflowError');
    expect(result.error.sceneIndex).toBe(1);
    expect(result.error.letter).toBe('A');
  });
});
