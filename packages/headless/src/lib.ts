import * as fs from 'node:fs';
import {
  MacSystem, createRng, crc32, hex, macStep, modeToBit, resetDevice, runOperation, framingByName,
  DEFAULT_SETTLE_CYCLES,
  type FramingName, type MacMode, type OperandPair, type ResultRead, type TraceRecord, type ValiditySource,
} from '@mac8/core';
import { ScriptError } from './errors.js';

export type MacScript = {
  framing: FramingName;
  validity: ValiditySource;
  settle: number;
  ops: OperandPair[];
};

export type ParsedArgs = {
  positional: string[];
  opts: Record<string, string>;
};

export function parseNum(val: string | undefined, def: number): number {
  if (val === undefined) return def;
  const s = val.trim();
  if (s.startsWith('0x') || s.startsWith('0X')) {
    const n = parseInt(s, 16);
    return Number.isFinite(n) ? (n >>> 0) : def;
  }
  const n = Number(s);
  return s !== '' && Number.isFinite(n) ? n : def;
}

export function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const opts: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const a = args[i]!;
    if (a.startsWith('--')) {
      const key = a.slice(2);
      const next = (i + 1 < args.length) ? args[i + 1] : undefined;
      const val = (next !== undefined && !next.startsWith('--')) ? args[++i]! : '1';
      opts[key] = val;
    } else {
      positional.push(a);
    }
  }
  return { positional, opts };
}

function requireNum(val: string | undefined, what: string): number {
  const n = parseNum(val, Number.NaN);
  if (!Number.isInteger(n)) throw new ScriptError('BadArgument', `${what} must be a number, got ${val ?? 'nothing'}`);
  return n;
}

function parseFramingName(val: unknown, where: string): FramingName {
  if (val === 'byte' || val === 'nibble') return val;
  throw new ScriptError(where === 'flag' ? 'BadArgument' : 'BadScript', `framing must be 'byte' or 'nibble', got ${String(val)}`);
}

function parseValidity(val: unknown, where: string): ValiditySource {
  if (val === 'change' || val === 'strobe') return val;
  throw new ScriptError(where === 'flag' ? 'BadArgument' : 'BadScript', `validity must be 'change' or 'strobe', got ${String(val)}`);
}

function parseSettle(n: number, code: 'BadArgument' | 'BadScript'): number {
  if (!Number.isInteger(n) || n < 2 || n % 2 !== 0) {
    throw new ScriptError(code, `settle must be an even integer >= 2, got ${n}`);
  }
  return n;
}

function parseOperand(val: unknown, where: string, code: 'BadArgument' | 'BadScript' = 'BadScript'): number {
  const n = typeof val === 'number' ? val : typeof val === 'string' ? parseNum(val, Number.NaN) : Number.NaN;
  if (!Number.isInteger(n) || n < 0 || n > 0xff) {
    throw new ScriptError(code, `${where} must be an integer in 0..255, got ${String(val)}`);
  }
  return n;
}

function parseMode(val: unknown, where: string): MacMode {
  if (val === 'clear' || val === 'accumulate') return val;
  throw new ScriptError('BadScript', `${where} must be 'clear' or 'accumulate', got ${String(val)}`);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

export function parseScript(raw: unknown): MacScript {
  if (!isRecord(raw)) throw new ScriptError('BadScript', 'script must be a JSON object');
  const ops = raw['ops'];
  if (!Array.isArray(ops)) throw new ScriptError('BadScript', 'script.ops must be an array');
  const settleRaw = raw['settle'];
  let settle = DEFAULT_SETTLE_CYCLES;
  if (settleRaw !== undefined) {
    if (typeof settleRaw !== 'number') throw new ScriptError('BadScript', 'settle must be a number');
    settle = parseSettle(settleRaw, 'BadScript');
  }
  return {
    framing: raw['framing'] === undefined ? 'byte' : parseFramingName(raw['framing'], 'script'),
    validity: raw['validity'] === undefined ? 'strobe' : parseValidity(raw['validity'], 'script'),
    settle,
    ops: ops.map((op: unknown, i): OperandPair => {
      if (!isRecord(op)) throw new ScriptError('BadScript', `ops[${i}] must be an object`);
      return {
        a: parseOperand(op['a'], `ops[${i}].a`),
        b: parseOperand(op['b'], `ops[${i}].b`),
        mode: parseMode(op['mode'], `ops[${i}].mode`),
      };
    }),
  };
}

export function loadScript(file: string): MacScript {
  if (!fs.existsSync(file)) throw new ScriptError('MissingFile', `no such script: ${file}`);
  const text = fs.readFileSync(file, 'utf8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new ScriptError('BadScript', `${file} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseScript(raw);
}

export function formatOpLine(index: number, op: OperandPair, read: ResultRead): string {
  return `[mac] #${index} ${op.mode} ${op.a}*${op.b} -> ${read.result} (${hex(read.result, 4)}) overflow=${read.overflow ? 1 : 0} ready=${read.ready ? 1 : 0}`;
}

export function formatTraceLine(rec: TraceRecord): string {
  return `[trace] cyc=${rec.cycle} en=${rec.enable ? 1 : 0} in=${hex(rec.dataIn, 2)} out=${hex(rec.dataOut, 2)} ov=${rec.overflow ? 1 : 0} rdy=${rec.ready ? 1 : 0} acc=${hex(rec.acc, 4)}`;
}

export function cmdMul(args: readonly string[]): string[] {
  const { positional, opts } = parseArgs(args);
  const a = parseOperand(positional[0], 'a', 'BadArgument');
  const b = parseOperand(positional[1], 'b', 'BadArgument');
  const framing = parseFramingName(opts['framing'] ?? 'byte', 'flag');
  const sys = new MacSystem({ framing: framingByName(framing) });
  resetDevice(sys);
  const op: OperandPair = { a, b, mode: 'clear' };
  return [formatOpLine(0, op, runOperation(sys, op))];
}

export function cmdRun(args: readonly string[]): string[] {
  const { positional, opts } = parseArgs(args);
  const file = positional[0];
  if (file === undefined) throw new ScriptError('BadArgument', 'run requires a JSON script path');
  const script = loadScript(file);
  const framing = opts['framing'] !== undefined ? parseFramingName(opts['framing'], 'flag') : script.framing;
  const validity = opts['validity'] !== undefined ? parseValidity(opts['validity'], 'flag') : script.validity;
  const settle = opts['settle'] !== undefined ? parseSettle(requireNum(opts['settle'], 'settle'), 'BadArgument') : script.settle;

  const sys = new MacSystem({ framing: framingByName(framing), validity });
  if (opts['trace'] !== undefined) sys.enableTrace();
  resetDevice(sys);
  const lines = [`[mac] framing=${framing} validity=${validity} settle=${settle} ops=${script.ops.length}`];
  script.ops.forEach((op, i) => {
    lines.push(formatOpLine(i, op, runOperation(sys, op, settle)));
  });
  for (const rec of sys.traceRecords()) lines.push(formatTraceLine(rec));
  return lines;
}

export type StressSummary = {
  iterations: number;
  mismatches: number;
  digest: string;
};

export function runStress(iterations: number, seed: number, clearRate: number, framing: FramingName): StressSummary {
  const rng = createRng(seed);
  const sys = new MacSystem({ framing: framingByName(framing) });
  resetDevice(sys);
  const bytes = new Uint8Array(iterations * 3);
  let acc17 = 0;
  let mismatches = 0;
  for (let i = 0; i < iterations; i++) {
    const a = rng.nextByte();
    const b = rng.nextByte();
    const mode: MacMode = (i === 0 || rng.nextFloat() < clearRate) ? 'clear' : 'accumulate';
    const got = runOperation(sys, { a, b, mode });
    const want = macStep(acc17, a, b, mode);
    acc17 = want.acc17;
    if (got.result !== want.result || got.overflow !== want.overflow) mismatches++;
    bytes[i * 3] = (got.result >>> 8) & 0xff;
    bytes[i * 3 + 1] = got.result & 0xff;
    bytes[i * 3 + 2] = (got.overflow ? 2 : 0) | modeToBit(mode);
  }
  return { iterations, mismatches, digest: crc32(bytes) };
}

export function cmdStress(args: readonly string[]): string[] {
  const { opts } = parseArgs(args);
  const iterations = requireNum(opts['iter'] ?? '1000', 'iter');
  if (iterations < 0) throw new ScriptError('BadArgument', `iter must be >= 0, got ${iterations}`);
  const seed = requireNum(opts['seed'] ?? '1234567', 'seed');
  const rateRaw = opts['clear-rate'];
  const clearRate = rateRaw === undefined ? 0.15 : parseNum(rateRaw, Number.NaN);
  if (!(clearRate >= 0 && clearRate <= 1)) {
    throw new ScriptError('BadArgument', `clear-rate must be a number in 0..1, got ${rateRaw ?? 'nothing'}`);
  }
  const framing = parseFramingName(opts['framing'] ?? 'byte', 'flag');
  const s = runStress(iterations, seed, clearRate, framing);
  return [`[stress] iter=${s.iterations} seed=${seed} framing=${framing} mismatches=${s.mismatches} crc32=${s.digest}`];
}
