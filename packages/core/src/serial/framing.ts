import { highByte, highNibble, joinBytes, joinNibbles, lowByte, lowNibble, zeroExtend8 } from '../utils/bit.js';

export type Phase = 'first' | 'second';

export type FramingName = 'byte' | 'nibble';

/**
 * How a wide operand pair and a wide result are cut into 8-bit bus chunks.
 * The framer state machine is the same for every framing; only these maps differ.
 */
export interface Framing {
  readonly name: FramingName;
  /** What the first input phase keeps from data_in. */
  stage(dataIn: number): number;
  /** Combines the staged first-phase chunk with the second-phase data_in. */
  assemble(staged: number, dataIn: number): { a: number; b: number };
  /** Host side: data_in values for phase 1 and phase 2. */
  splitOperands(a: number, b: number): readonly [number, number];
  /** data_out for the given output phase. */
  resultChunk(result: number, phase: Phase): number;
  /** Host side: rebuilds the 16-bit result from the FIRST and SECOND phase chunks. */
  joinResult(first: number, second: number): number;
}

// Phase 1 carries A, phase 2 carries B. The result goes out high byte first.
export const BYTE_FRAMING: Framing = {
  name: 'byte',
  stage: (dataIn) => zeroExtend8(dataIn),
  assemble: (staged, dataIn) => ({ a: zeroExtend8(staged), b: zeroExtend8(dataIn) }),
  splitOperands: (a, b) => [zeroExtend8(a), zeroExtend8(b)] as const,
  resultChunk: (result, phase) => (phase === 'first' ? highByte(result) : lowByte(result)),
  joinResult: (first, second) => joinBytes(first, second),
};

// data_in = {B nibble, A nibble}: low nibbles in phase 1, high nibbles in phase 2.
// The result is cut the same way, treating its low byte as "A" and its high byte as "B".
export const NIBBLE_FRAMING: Framing = {
  name: 'nibble',
  stage: (dataIn) => zeroExtend8(dataIn),
  assemble: (staged, dataIn) => ({
    a: joinNibbles(lowNibble(dataIn), lowNibble(staged)),
    b: joinNibbles(highNibble(dataIn), highNibble(staged)),
  }),
  splitOperands: (a, b) => [
    joinNibbles(lowNibble(b), lowNibble(a)),
    joinNibbles(highNibble(b), highNibble(a)),
  ] as const,
  resultChunk: (result, phase) => {
    const lo = lowByte(result);
    const hi = highByte(result);
    return phase === 'first'
      ? joinNibbles(lowNibble(hi), lowNibble(lo))
      : joinNibbles(highNibble(hi), highNibble(lo));
  },
  joinResult: (first, second) => joinBytes(
    joinNibbles(highNibble(second), highNibble(first)),
    joinNibbles(lowNibble(second), lowNibble(first)),
  ),
};

export function framingByName(name: FramingName): Framing {
  return name === 'nibble' ? NIBBLE_FRAMING : BYTE_FRAMING;
}
