import { describe, it, expect } from 'vitest';
import { MacSystem } from '../src/system/system.js';
import { NIBBLE_FRAMING } from '../src/serial/framing.js';
import { readChunk, readResult, resetDevice, runOperation, streamOperands, waitPipeline, writeOperands } from '../src/system/host.js';

function freshSystem(): MacSystem {
  const sys = new MacSystem({ framing: NIBBLE_FRAMING });
  resetDevice(sys);
  return sys;
}

describe('nibble-framed MAC', () => {
  it('runs the reference scenarios', () => {
    const sys = freshSystem();
    expect(runOperation(sys, { a: 5, b: 6, mode: 'clear' })).toEqual({ result: 30, overflow: false, ready: true });
    expect(runOperation(sys, { a: 10, b: 10, mode: 'clear' }).result).toBe(100);
    expect(runOperation(sys, { a: 5, b: 5, mode: 'accumulate' }).result).toBe(125);
    expect(runOperation(sys, { a: 255, b: 255, mode: 'clear' })).toEqual({ result: 65025, overflow: false, ready: true });
    expect(runOperation(sys, { a: 200, b: 200, mode: 'accumulate' })).toEqual({ result: 39489, overflow: true, ready: true });
    expect(runOperation(sys, { a: 255, b: 127, mode: 'clear' })).toEqual({ result: 32385, overflow: false, ready: true });
  });

  it('pipelines back-to-back frames with enable held high', () => {
    const sys = freshSystem();
    streamOperands(sys, [{ a: 10, b: 10, mode: 'clear' }, { a: 5, b: 5, mode: 'accumulate' }]);
    waitPipeline(sys);
    expect(readResult(sys)).toEqual({ result: 125, overflow: false, ready: true });
  });

  it('drives low nibbles then high nibbles onto data_in', () => {
    const sys = freshSystem();
    sys.enableTrace();
    writeOperands(sys, 0xA5, 0x3C, 'clear');
    const trace = sys.traceRecords();
    expect(trace.map((r) => r.dataIn).slice(0, 2)).toEqual([0xC5, 0x3A]);
    expect(sys.framer.macOutput()).toEqual({ a: 0xA5, b: 0x3C, mode: 'clear', valid: false });
  });

  it('walks a result out as {r[11:8], r[3:0]} then {r[15:12], r[7:4]}', () => {
    const sys = freshSystem();
    writeOperands(sys, 0xA5, 0x3C, 'clear'); // 165 * 60 = 0x26AC
    waitPipeline(sys);
    sys.stepCycles(2);
    const first = readChunk(sys);
    sys.stepCycles(1);
    const second = readChunk(sys);
    expect(first.data).toBe(0x6C);
    expect(second.data).toBe(0x2A);
    expect(NIBBLE_FRAMING.joinResult(first.data, second.data)).toBe(0x26AC);
  });

  it('builds 0x1234 from 68*68 + 6*6', () => {
    const sys = freshSystem();
    runOperation(sys, { a: 68, b: 68, mode: 'clear' });
    writeOperands(sys, 6, 6, 'accumulate');
    waitPipeline(sys);
    sys.stepCycles(2);
    expect(readChunk(sys).data).toBe(0x24);
    sys.stepCycles(1);
    expect(readChunk(sys).data).toBe(0x13);
  });
});
