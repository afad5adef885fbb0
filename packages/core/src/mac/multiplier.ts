import { zeroExtend8, zeroExtend16 } from '../utils/bit.js';

// Combinational 8x8 -> 16 unsigned multiply. 255 * 255 = 0xFE01 always fits in 16 bits.
export function multiply(a: number, b: number): number {
  return zeroExtend16(zeroExtend8(a) * zeroExtend8(b));
}
