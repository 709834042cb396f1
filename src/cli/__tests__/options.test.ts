import { describe, it, expect } from 'vitest';
import { parseCliOptions, deriveOutputPath, SCHEDULE_PREFIX, SCREENPLAY_PREFIX } from '../options.js';

describe('parseCliOptions', () => {
  it('applies defaults for a bare input path', () => {
    expect(parseCliOptions(['script.fountain'])).toEqual({
      success: true,
      help: false,
      options: { input: 'script.fountain', mode: 'all', verbose: false },
    });
  });

  it('reads short, long and inline flag values', () => {
    const r = parseCliOptions(['-o', 'out.fountain', '--screenplay-output=ann.fountain', '--mode', 'schedule', '-v', 'in.fountain']);
    expect(r).toEqual({
      success: true,
      help: false,
      options: { input: 'in.fountain', output: 'out.fountain', screenplayOutput: 'ann.fountain', mode: 'schedule', verbose: true },
    });
  });

  it('returns help unless an earlier argument is invalid', () => {
    expect(parseCliOptions(['--bogus', '-h'])).toEqual({ success: false, errors: expect.anything() });
    expect(parseCliOptions(['-h'])).toEqual({ success: true, help: true });
  });

  it('rejects missing input, unknown flags, bad modes and dangling values', () => {
    const cases: Array<[string[], string]> = [
      [[], 'Input file path is required'],
      [['a.fountain', '--fast'], 'Unknown option --fast'],
      [['a.fountain', 'b.fountain'], 'Unexpected argument b.fountain'],
      [['a.fountain', '-o'], 'Missing value for -o'],
    ];
    for (const [args, message] of cases) {
      const r = parseCliOptions(args);
      expect(r.success).toBe(false);
      if (r.success) continue;
      expect(r.errors.issues[0]?.message).toBe(message);
    }
    const bad = parseCliOptions(['a.fountain', '-m', 'everything']);
    expect(bad.success).toBe(false);
    if (!bad.success) expect(bad.errors.issues[0]?.path).toEqual(['mode']);
  });
});

describe('deriveOutputPath', () => {
  it('prefixes the base name and keeps the directory', () => {
    expect(deriveOutputPath('script.fountain', SCHEDULE_PREFIX)).toBe('SCHEDULE_script.fountain');
    expect(deriveOutputPath('drafts/v2/script.fountain', SCREENPLAY_PREFIX)).toBe('drafts/v2/SETUPSCREENPLAY_script.fountain');
    expect(deriveOutputPath('/tmp/shoot/ep1.fountain', SCHEDULE_PREFIX)).toBe('/tmp/shoot/SCHEDULE_ep1.fountain');
  });
});
