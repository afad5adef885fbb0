import { modeToBit, type MacMode, type OperandPair } from '../mac/types.js';
import type { MacSystem } from './system.js';

// Cycles a host waits after a write before starting a read. Must be even for the first read
// to land on the FIRST output phase.
export const DEFAULT_SETTLE_CYCLES = 6;
// Extra edges a read waits before sampling the first chunk.
export const READ_LEAD_CYCLES = 2;

export type ChunkRead = {
  data: number;
  overflow: boolean;
  ready: boolean;
};

export type ResultRead = {
  result: number;
  overflow: boolean;
  ready: boolean;
};

export function resetDevice(sys: MacSystem, holdCycles = 5, releaseCycles = 2): void {
  sys.setPins({ reset: true, enable: false, dataIn: 0, modeIn: 0 });
  sys.stepCycles(holdCycles);
  sys.setPins({ reset: false });
  sys.stepCycles(releaseCycles);
}

// Phase 1 edge, phase 2 edge, then one edge with enable low.
export function writeOperands(sys: MacSystem, a: number, b: number, mode: MacMode): void {
  streamOperands(sys, [{ a, b, mode }]);
}

// Holds enable high across every frame, one pair per two edges, and drops it after the last.
export function streamOperands(sys: MacSystem, ops: readonly OperandPair[]): void {
  for (const op of ops) {
    const [first, second] = sys.framing.splitOperands(op.a, op.b);
    sys.setPins({ enable: true, dataIn: first, modeIn: modeToBit(op.mode) });
    sys.stepCycles(1);
    sys.setPins({ enable: true, dataIn: second, modeIn: 0 });
    sys.stepCycles(1);
  }
  sys.setPins({ enable: false, modeIn: 0 });
  sys.stepCycles(1);
}

export function waitPipeline(sys: MacSystem, cycles = DEFAULT_SETTLE_CYCLES): void {
  sys.stepCycles(cycles);
}

export function readChunk(sys: MacSystem): ChunkRead {
  const out = sys.outputs();
  return { data: out.dataOut, overflow: out.overflowOut, ready: out.dataReady };
}

// Assumes the output side is on its FIRST phase after the lead cycles; the overflow and ready
// flags are taken from the first sample.
export function readResult(sys: MacSystem): ResultRead {
  sys.stepCycles(READ_LEAD_CYCLES);
  const first = readChunk(sys);
  sys.stepCycles(1);
  const second = readChunk(sys);
  return {
    result: sys.framing.joinResult(first.data, second.data),
    overflow: first.overflow,
    ready: first.ready,
  };
}

export function runOperation(sys: MacSystem, op: OperandPair, settle = DEFAULT_SETTLE_CYCLES): ResultRead {
  writeOperands(sys, op.a, op.b, op.mode);
  waitPipeline(sys, settle);
  return readResult(sys);
}
