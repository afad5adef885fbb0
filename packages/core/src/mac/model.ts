import { bit, zeroExtend16, zeroExtend17 } from '../utils/bit.js';
import { multiply } from './multiplier.js';
import type { MacMode } from './types.js';

export type MacStepResult = {
  acc17: number;
  result: number;
  overflow: boolean;
};

// Untimed reference for one MAC step. The clocked system must agree with this once the
// pipeline has settled.
export function macStep(acc17: number, a: number, b: number, mode: MacMode): MacStepResult {
  const prod = multiply(a, b);
  if (mode === 'clear') {
    return { acc17: prod, result: prod, overflow: false };
  }
  const add17 = zeroExtend17(acc17) + prod;
  return {
    acc17: zeroExtend17(add17),
    result: zeroExtend16(add17),
    overflow: bit(add17, 16) === 1,
  };
}
