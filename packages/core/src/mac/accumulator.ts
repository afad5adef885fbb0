import { bit, zeroExtend16, zeroExtend17 } from '../utils/bit.js';
import type { AccumulatorOutput, MacMode } from './types.js';

export class Accumulator {
  // 17-bit running sum; bit 16 is the carry of the last accumulate step.
  private _value = 0;
  private _visibleResult = 0;
  private _overflow = false;

  get value(): number { return this._value; }
  get visibleResult(): number { return this._visibleResult; }
  get overflow(): boolean { return this._overflow; }

  output(): AccumulatorOutput {
    return { visibleResult: this._visibleResult, overflow: this._overflow };
  }

  clock(valid: boolean, mode: MacMode, product: number): void {
    if (!valid) return;
    const p = zeroExtend16(product);
    if (mode === 'clear') {
      this._value = p;
      this._visibleResult = p;
      this._overflow = false;
      return;
    }
    const sum = this._value + p;
    this._value = zeroExtend17(sum);
    this._visibleResult = zeroExtend16(sum);
    this._overflow = bit(sum, 16) === 1;
  }

  reset(): void {
    this._value = 0;
    this._visibleResult = 0;
    this._overflow = false;
  }
}
