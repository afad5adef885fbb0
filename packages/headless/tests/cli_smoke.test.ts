import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { cmdMul, cmdRun, cmdStress, parseArgs, parseNum, parseScript, runStress } from '../src/lib.js';
import { ScriptError, type ScriptErrorCode } from '../src/errors.js';

const FIXTURE = fileURLToPath(new URL('./fixtures/accumulate.json', import.meta.url));

function errorCode(fn: () => unknown): ScriptErrorCode | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof ScriptError) return e.code;
    throw e;
  }
  return undefined;
}

describe('argument parsing', () => {
  it('parses decimal and hex numbers with a fallback', () => {
    expect(parseNum('0x1F', 0)).toBe(31);
    expect(parseNum('42', 0)).toBe(42);
    expect(parseNum('0.25', 0)).toBe(0.25);
    expect(parseNum(undefined, 7)).toBe(7);
    expect(parseNum('abc', 3)).toBe(3);
    expect(parseNum('', 3)).toBe(3);
  });

  it('splits positionals from --flags, bare flags read as 1', () => {
    expect(parseArgs(['x.json', '--trace', '--settle', '4'])).toEqual({
      positional: ['x.json'],
      opts: { trace: '1', settle: '4' },
    });
  });
});

describe('script validation', () => {
  it('fills in defaults', () => {
    expect(parseScript({ ops: [{ a: 1, b: '0x02', mode: 'clear' }] })).toEqual({
      framing: 'byte',
      validity: 'strobe',
      settle: 6,
      ops: [{ a: 1, b: 2, mode: 'clear' }],
    });
  });

  it('rejects bad operands, modes and settle counts', () => {
    expect(errorCode(() => parseScript({ ops: [{ a: 256, b: 1, mode: 'clear' }] }))).toBe('BadScript');
    expect(errorCode(() => parseScript({ ops: [{ a: 1, b: 1, mode: 'signed' }] }))).toBe('BadScript');
    expect(errorCode(() => parseScript({ settle: 5, ops: [] }))).toBe('BadScript');
    expect(errorCode(() => parseScript({ framing: 'word', ops: [] }))).toBe('BadScript');
    expect(errorCode(() => parseScript([]))).toBe('BadScript');
    expect(errorCode(() => parseScript({}))).toBe('BadScript');
  });
});

describe('headless commands', () => {
  it('mul runs one CLEAR operation', () => {
    expect(cmdMul(['255', '127'])).toEqual(['[mac] #0 clear 255*127 -> 32385 (0x7E81) overflow=0 ready=1']);
    expect(cmdMul(['5', '6', '--framing', 'nibble'])).toEqual(['[mac] #0 clear 5*6 -> 30 (0x001E) overflow=0 ready=1']);
  });

  it('mul rejects a missing or out-of-range operand', () => {
    expect(errorCode(() => cmdMul(['5']))).toBe('BadArgument');
    expect(errorCode(() => cmdMul(['300', '2']))).toBe('BadArgument');
    expect(errorCode(() => cmdMul(['2', '-1']))).toBe('BadArgument');
  });

  it('run prints one line per scripted operation', () => {
    expect(cmdRun([FIXTURE])).toEqual([
      '[mac] framing=byte validity=strobe settle=6 ops=4',
      '[mac] #0 clear 10*10 -> 100 (0x0064) overflow=0 ready=1',
      '[mac] #1 accumulate 5*5 -> 125 (0x007D) overflow=0 ready=1',
      '[mac] #2 clear 255*255 -> 65025 (0xFE01) overflow=0 ready=1',
      '[mac] #3 accumulate 200*200 -> 39489 (0x9A41) overflow=1 ready=1',
    ]);
  });

  it('run flags override the script', () => {
    const lines = cmdRun([FIXTURE, '--framing', 'nibble', '--settle', '4']);
    expect(lines[0]).toBe('[mac] framing=nibble validity=strobe settle=4 ops=4');
    expect(lines[4]).toBe('[mac] #3 accumulate 200*200 -> 39489 (0x9A41) overflow=1 ready=1');
    expect(errorCode(() => cmdRun([FIXTURE, '--settle', '3']))).toBe('BadArgument');
    expect(errorCode(() => cmdRun([FIXTURE, '--validity', 'maybe']))).toBe('BadArgument');
  });

  it('run --trace appends one line per clock edge', () => {
    const lines = cmdRun([FIXTURE, '--trace']);
    const trace = lines.filter((l) => l.startsWith('[trace]'));
    // 7 reset edges, then 12 edges per operation
    expect(trace.length).toBe(7 + 4 * 12);
    expect(trace[0]).toBe('[trace] cyc=1 en=0 in=0x00 out=0x00 ov=0 rdy=1 acc=0x0000');
  });

  it('run reports a missing script', () => {
    expect(errorCode(() => cmdRun(['does-not-exist.json']))).toBe('MissingFile');
    expect(errorCode(() => cmdRun([]))).toBe('BadArgument');
  });

  it('stress agrees with the reference model and is deterministic', () => {
    const s1 = runStress(200, 1234567, 0.15, 'byte');
    const s2 = runStress(200, 1234567, 0.15, 'byte');
    expect(s1.mismatches).toBe(0);
    expect(s1.digest).toBe(s2.digest);
    expect(runStress(200, 1234567, 0.15, 'nibble').mismatches).toBe(0);
    expect(runStress(200, 99, 0.15, 'byte').digest).not.toBe(s1.digest);
  });

  it('stress rejects a negative count and a clear rate outside 0..1', () => {
    expect(errorCode(() => cmdStress(['--iter', '-1']))).toBe('BadArgument');
    expect(errorCode(() => cmdStress(['--clear-rate', '1.5']))).toBe('BadArgument');
    expect(errorCode(() => cmdStress(['--clear-rate', 'abc']))).toBe('BadArgument');
    expect(cmdStress(['--iter', '0'])).toEqual(['[stress] iter=0 seed=1234567 framing=byte mismatches=0 crc32=00000000']);
  });

  it('stress prints a summary line', () => {
    const [line] = cmdStress(['--iter', '50', '--seed', '7']);
    expect(line).toMatch(/^\[stress\] iter=50 seed=7 framing=byte mismatches=0 crc32=[0-9a-f]{8}$/);
  });
});
