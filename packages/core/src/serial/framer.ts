import { zeroExtend16 } from '../utils/bit.js';
import { modeFromBit, type AccumulatorOutput, type MacMode, type OperandPair } from '../mac/types.js';
import { BYTE_FRAMING, type Framing, type Phase } from './framing.js';

export type FramerInputs = {
  enable: boolean;
  dataIn: number;
  modeIn: number; // 1 = CLEAR, sampled in the first phase only
};

export type FramerOutputs = {
  dataOut: number;
  overflowOut: boolean;
  dataReady: boolean;
};

// What the framer drives into the MAC engine: the last completed pair, plus a strobe that
// is high for the one cycle after the pair was assembled.
export type FramerMacOutput = OperandPair & {
  valid: boolean;
};

/**
 * Two-phase serial framer. The input side assembles one operand pair from two enabled
 * cycles; the output side walks the latched result out over two cycles while enable is low.
 *
 * Nothing is validated. Dropping enable mid-frame abandons the half-assembled pair, and a
 * read taken before the pipeline has settled returns whatever the accumulator held.
 */
export class SerialFramer {
  inPhase: Phase = 'first';
  private staged = 0;
  private stagedMode: MacMode = 'accumulate';
  private pair: OperandPair = { a: 0, b: 0, mode: 'accumulate' };
  private strobe = false;

  outPhase: Phase = 'first';
  latchedResult = 0;
  latchedOverflow = false;
  resultAvailable = false;

  constructor(public readonly framing: Framing = BYTE_FRAMING) {}

  macOutput(): FramerMacOutput {
    return { ...this.pair, valid: this.strobe };
  }

  outputs(enable: boolean): FramerOutputs {
    return {
      dataOut: this.framing.resultChunk(this.latchedResult, this.outPhase),
      overflowOut: this.latchedOverflow,
      dataReady: this.inPhase === 'first' && !enable,
    };
  }

  // `acc` must be the accumulator's pre-edge output.
  clock(inputs: FramerInputs, acc: AccumulatorOutput): void {
    const completing = inputs.enable && this.inPhase === 'second';

    this.latchedResult = zeroExtend16(acc.visibleResult);
    this.latchedOverflow = acc.overflow;
    if (!inputs.enable) {
      if (!this.resultAvailable) {
        this.outPhase = 'first';
        this.resultAvailable = true;
      } else {
        this.outPhase = this.outPhase === 'first' ? 'second' : 'first';
      }
    } else if (completing) {
      this.resultAvailable = false;
    }

    this.strobe = false;
    if (!inputs.enable) {
      this.inPhase = 'first';
      return;
    }
    if (this.inPhase === 'first') {
      this.staged = this.framing.stage(inputs.dataIn);
      this.stagedMode = modeFromBit(inputs.modeIn);
      this.inPhase = 'second';
      return;
    }
    const { a, b } = this.framing.assemble(this.staged, inputs.dataIn);
    this.pair = { a, b, mode: this.stagedMode };
    this.strobe = true;
    this.inPhase = 'first';
  }

  reset(): void {
    this.inPhase = 'first';
    this.staged = 0;
    this.stagedMode = 'accumulate';
    this.pair = { a: 0, b: 0, mode: 'accumulate' };
    this.strobe = false;
    this.outPhase = 'first';
    this.latchedResult = 0;
    this.latchedOverflow = false;
    this.resultAvailable = false;
  }
}
