// packages/core/src/escape/splitter.ts
import type { EscapeDecision, SplitState } from '../types/index.js';
import { classifyByte, PRINTABLE_FLOOR } from './classifier.js';

/**
 * Closes the current literal and opens the next one. Adjacent literals
 * concatenate, so this only ends the preceding `\x` escape.
 */
export const SEGMENT_BREAK = '" "';

export const INITIAL_SPLIT_STATE: SplitState = { lastWasHexEscape: false };

export interface EscapedRun {
  readonly state: SplitState;
  readonly text: string;
}

/**
 * One step of the fold. A `\x` escape swallows every hex digit that
 * follows it, so any non-hex fragment after one starts a new literal.
 * Two hex escapes in a row need no break.
 */
export function stepFragment(state: SplitState, fragment: EscapeDecision): EscapedRun {
  const needsBreak = state.lastWasHexEscape && !fragment.isHexEscape;
  return {
    state: { lastWasHexEscape: fragment.isHexEscape },
    text : needsBreak ? SEGMENT_BREAK + fragment.text : fragment.text,
  };
}

/**
 * Escape a run of bytes, continuing from `state`. Feed the returned
 * state into the next call to escape a stream chunk by chunk.
 */
export function escapeBytes(
  state: SplitState,
  bytes: Uint8Array,
  floor: number = PRINTABLE_FLOOR,
): EscapedRun {
  const parts: string[] = [];
  const end = bytes.reduce((st, b) => {
    const step = stepFragment(st, classifyByte(b, floor));
    parts.push(step.text);
    return step.state;
  }, state);
  return { state: end, text: parts.join('') };
}
