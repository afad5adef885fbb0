// CLEAR is driven as 1 on mode_in, ACCUMULATE as 0.
export type MacMode = 'clear' | 'accumulate';

export type OperandPair = {
  a: number; // unsigned 8-bit
  b: number; // unsigned 8-bit
  mode: MacMode;
};

export type PipelineSlot = OperandPair & {
  valid: boolean;
};

export const EMPTY_SLOT: Readonly<PipelineSlot> = {
  a: 0,
  b: 0,
  mode: 'accumulate',
  valid: false,
};

export function modeFromBit(bit: number): MacMode {
  return (bit & 1) !== 0 ? 'clear' : 'accumulate';
}

export function modeToBit(mode: MacMode): number {
  return mode === 'clear' ? 1 : 0;
}

export type AccumulatorOutput = {
  visibleResult: number; // unsigned 16-bit
  overflow: boolean;
};
