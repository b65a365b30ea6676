import { describe, it, expect, vi, afterEach } from 'vitest';
import { parseCliArgs } from '../cli/args';
import { parseCoordinates } from '../cli/input';

describe('parseCoordinates', () => {
  it('accepts two comma-separated integers', () => {
    expect(parseCoordinates('1,2')).toEqual({ ok: true, row: 1, col: 2 });
    expect(parseCoordinates(' 0 , 2 \n')).toEqual({ ok: true, row: 0, col: 2 });
  });

  it('flags values above 2 as out of range', () => {
    expect(parseCoordinates('3,0')).toEqual({ ok: false, error: 'out_of_range' });
    expect(parseCoordinates('0, 10')).toEqual({ ok: false, error: 'out_of_range' });
  });

  it('rejects malformed input', () => {
    for (const line of ['', '1', '1,2,3', 'a,b', '1;2', '-1,0', '1.5,0', ',']) {
      expect(parseCoordinates(line)).toEqual({ ok: false, error: 'invalid_format' });
    }
  });
});

describe('parseCliArgs', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('defaults the starting player', () => {
    expect(parseCliArgs([], 'X')).toEqual({ kind: 'play', startPlayer: 'X' });
    expect(parseCliArgs([], 'O')).toEqual({ kind: 'play', startPlayer: 'O' });
  });

  it('reads the start player from short and long flags', () => {
    expect(parseCliArgs(['-s', 'O'], 'X')).toEqual({ kind: 'play', startPlayer: 'O' });
    expect(parseCliArgs(['--start-player', 'X'], 'O')).toEqual({ kind: 'play', startPlayer: 'X' });
  });

  it('falls back to X with a warning for an unknown mark', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(parseCliArgs(['-s', 'Z'], 'X')).toEqual({ kind: 'play', startPlayer: 'X' });
    expect(warn).toHaveBeenCalledWith("[config] unrecognized start player 'Z', falling back to X");
  });

  it('treats marks as case-sensitive', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    expect(parseCliArgs(['-s', 'o'], 'X')).toEqual({ kind: 'play', startPlayer: 'X' });
    expect(warn).toHaveBeenCalledWith("[config] unrecognized start player 'o', falling back to X");
  });

  it('recognizes help and version', () => {
    expect(parseCliArgs(['--help'], 'X')).toEqual({ kind: 'help' });
    expect(parseCliArgs(['-V'], 'X')).toEqual({ kind: 'version' });
  });

  it('reports unknown options and stray arguments', () => {
    expect(parseCliArgs(['--board-size', '4'], 'X').kind).toBe('error');
    expect(parseCliArgs(['O'], 'X').kind).toBe('error');
  });
});
