import {
  escapeBytes,
  stepFragment,
  INITIAL_SPLIT_STATE,
  SEGMENT_BREAK,
} from '../src/escape/splitter.js';
import { LEGACY_PRINTABLE_FLOOR } from '../src/escape/classifier.js';

const hex   = { text: '\\xab', isHexEscape: true };
const plain = { text: 'a',     isHexEscape: false };

describe('stepFragment', () => {
  it('starts without a break', () => {
    expect(INITIAL_SPLIT_STATE).toEqual({ lastWasHexEscape: false });
    expect(stepFragment(INITIAL_SPLIT_STATE, plain)).toEqual({
      state: { lastWasHexEscape: false },
      text : 'a',
    });
  });

  it('records a hex escape', () => {
    expect(stepFragment(INITIAL_SPLIT_STATE, hex)).toEqual({
      state: { lastWasHexEscape: true },
      text : '\\xab',
    });
  });

  it('breaks the literal on a hex -> non-hex transition', () => {
    expect(SEGMENT_BREAK).toBe('" "');
    expect(stepFragment({ lastWasHexEscape: true }, plain)).toEqual({
      state: { lastWasHexEscape: false },
      text : '" "a',
    });
  });

  it('does not break between two hex escapes', () => {
    expect(stepFragment({ lastWasHexEscape: true }, hex).text).toBe('\\xab');
  });

  it('breaks before a named escape that follows a hex escape', () => {
    const nl = { text: '\\n', isHexEscape: false };
    expect(stepFragment({ lastWasHexEscape: true }, nl).text).toBe('" "\\n');
  });
});

describe('escapeBytes', () => {
  it('folds a run of bytes', () => {
    expect(escapeBytes(INITIAL_SPLIT_STATE, Uint8Array.of(0xab, 0x61))).toEqual({
      state: { lastWasHexEscape: false },
      text : '\\xab" "a',
    });
  });

  it('carries state from one call to the next', () => {
    const first = escapeBytes(INITIAL_SPLIT_STATE, Uint8Array.of(0x41, 0x00));
    expect(first).toEqual({ state: { lastWasHexEscape: true }, text: 'A\\x00' });

    const second = escapeBytes(first.state, Uint8Array.of(0x62));
    expect(second.text).toBe('" "b');
  });

  it('returns the input state for an empty run', () => {
    const state = { lastWasHexEscape: true };
    expect(escapeBytes(state, new Uint8Array(0))).toEqual({ state, text: '' });
  });

  it('honours the legacy floor', () => {
    const bytes = Uint8Array.of(0x00, 0x1b);
    expect(escapeBytes(INITIAL_SPLIT_STATE, bytes).text).toBe('\\x00\\x1b');
    expect(escapeBytes(INITIAL_SPLIT_STATE, bytes, LEGACY_PRINTABLE_FLOOR).text).toBe('\\x00" "\x1b');
  });
});
