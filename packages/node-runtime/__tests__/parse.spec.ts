import { parseOffset, parseSize } from '../src/parse.js';
import { ArgumentError } from '../../core/src/errors/index.js';

describe('parseOffset', () => {
  it.each([
    ['0', 0],
    ['42', 42],
    ['+3', 3],
    [' 7 ', 7],
    ['0x10', 16],
    ['0XfF', 255],
    ['0o17', 15],
    ['0b101', 5],
    ['010', 8],
    ['00', 0],
  ])('parses %j as %i', (raw, n) => {
    expect(parseOffset(raw)).toBe(n);
  });

  it.each(['', 'abc', '-5', '1e3', '1.5', '0x', '9007199254740993', '09'])('rejects %j', raw => {
    expect(() => parseOffset(raw)).toThrow(ArgumentError);
  });

  it('names the option in the message', () => {
    expect(() => parseOffset('zz')).toThrow('could not parse offset "zz"');
  });
});

describe('parseSize', () => {
  it('accepts -1 as unbounded', () => {
    expect(parseSize('-1')).toBe(-1);
    expect(parseSize('0x20')).toBe(32);
  });

  it('rejects other negative sizes', () => {
    expect(() => parseSize('-2')).toThrow('could not parse size "-2"');
  });
});
