import { zeroExtend8 } from '../utils/bit.js';
import type { MacMode, OperandPair } from './types.js';

export class ChangeDetector {
  private lastA = 0;
  private lastB = 0;
  private lastMode: MacMode = 'accumulate';

  // Compares against the pair seen on the previous clock, then remembers this one.
  // The memory updates every clock whether or not anything changed.
  observe(pair: OperandPair): boolean {
    const a = zeroExtend8(pair.a);
    const b = zeroExtend8(pair.b);
    const changed = a !== this.lastA || b !== this.lastB || pair.mode !== this.lastMode;
    this.lastA = a;
    this.lastB = b;
    this.lastMode = pair.mode;
    return changed;
  }

  reset(): void {
    this.lastA = 0;
    this.lastB = 0;
    this.lastMode = 'accumulate';
  }
}
