import { zeroExtend8 } from '../utils/bit.js';
import { EMPTY_SLOT, type PipelineSlot } from './types.js';

// One-cycle relay. Loads every clock, cannot stall.
export class PipelineRegister {
  private slot: PipelineSlot = { ...EMPTY_SLOT };

  get output(): Readonly<PipelineSlot> {
    return this.slot;
  }

  load(next: Readonly<PipelineSlot>): void {
    this.slot = {
      a: zeroExtend8(next.a),
      b: zeroExtend8(next.b),
      mode: next.mode,
      valid: next.valid,
    };
  }

  reset(): void {
    this.slot = { ...EMPTY_SLOT };
  }
}
