import { MacEngine, type ValiditySource } from '../mac/engine.js';
import { SerialFramer, type FramerOutputs } from '../serial/framer.js';
import { BYTE_FRAMING, type Framing } from '../serial/framing.js';

export type ScheduledCallback = () => void;

export type HostPins = {
  reset: boolean;
  enable: boolean;
  dataIn: number;
  modeIn: number;
};

export type TraceRecord = {
  cycle: number;
  enable: boolean;
  dataIn: number;
  dataOut: number;
  overflow: boolean;
  ready: boolean;
  acc: number;
};

export type MacSystemOptions = {
  framing?: Framing;
  validity?: ValiditySource;
};

export class MacSystem {
  cycle = 0 >>> 0;
  readonly framer: SerialFramer;
  readonly engine: MacEngine;
  readonly pins: HostPins = { reset: false, enable: false, dataIn: 0, modeIn: 0 };
  private events = new Map<number, ScheduledCallback[]>();
  private trace: TraceRecord[] | null = null;

  constructor(opts: MacSystemOptions = {}) {
    this.framer = new SerialFramer(opts.framing ?? BYTE_FRAMING);
    this.engine = new MacEngine(opts.validity ?? 'strobe');
  }

  get framing(): Framing {
    return this.framer.framing;
  }

  setPins(next: Partial<HostPins>): void {
    Object.assign(this.pins, next);
  }

  outputs(): FramerOutputs {
    return this.framer.outputs(this.pins.enable);
  }

  scheduleAt(cycle: number, cb: ScheduledCallback): void {
    const t = cycle >>> 0;
    const arr = this.events.get(t) ?? [];
    arr.push(cb);
    this.events.set(t, arr);
  }

  enableTrace(): void {
    this.trace = [];
  }

  traceRecords(): readonly TraceRecord[] {
    return this.trace ?? [];
  }

  stepCycles(n: number): void {
    for (let i = 0; i < n; i++) {
      // Advance cycle first and run its events, so pin changes scheduled for a cycle are
      // sampled by that cycle's edge
      this.cycle = (this.cycle + 1) >>> 0;
      const due = this.events.get(this.cycle);
      if (due) {
        for (const cb of due) cb();
        this.events.delete(this.cycle);
      }
      this.edge();
    }
  }

  private edge(): void {
    if (this.pins.reset) {
      this.framer.reset();
      this.engine.reset();
    } else {
      // Both sides see the other's pre-edge outputs
      const macIn = this.framer.macOutput();
      const acc = this.engine.output();
      this.framer.clock(
        { enable: this.pins.enable, dataIn: this.pins.dataIn, modeIn: this.pins.modeIn },
        acc,
      );
      this.engine.clock(macIn);
    }
    if (this.trace) {
      const out = this.outputs();
      this.trace.push({
        cycle: this.cycle,
        enable: this.pins.enable,
        dataIn: this.pins.dataIn,
        dataOut: out.dataOut,
        overflow: out.overflowOut,
        ready: out.dataReady,
        acc: this.engine.accumulator.visibleResult,
      });
    }
  }
}
