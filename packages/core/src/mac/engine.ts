import { Accumulator } from './accumulator.js';
import { ChangeDetector } from './change_detector.js';
import { multiply } from './multiplier.js';
import { PipelineRegister } from './pipeline.js';
import type { AccumulatorOutput, OperandPair } from './types.js';

// Edges from presenting a pair at the engine input to the accumulator holding its result,
// counting the capture edge.
export const MAC_LATENCY = 3;

// 'change': a slot is valid when the pair differs from the previous clock's pair.
// 'strobe': a slot is valid when the caller says so (the framer's completion strobe).
export type ValiditySource = 'change' | 'strobe';

export type EngineInput = OperandPair & {
  valid?: boolean;
};

export class MacEngine {
  readonly detector = new ChangeDetector();
  readonly inputStage = new PipelineRegister();
  readonly pipeStage = new PipelineRegister();
  readonly accumulator = new Accumulator();

  constructor(public readonly validity: ValiditySource = 'change') {}

  // Every stage loads from the pre-edge value of the stage in front of it, so the
  // downstream end is updated first.
  clock(input: EngineInput): void {
    const arriving = this.pipeStage.output;
    this.accumulator.clock(arriving.valid, arriving.mode, multiply(arriving.a, arriving.b));
    this.pipeStage.load(this.inputStage.output);
    const changed = this.detector.observe(input);
    const valid = this.validity === 'change' ? changed : input.valid === true;
    this.inputStage.load({ a: input.a, b: input.b, mode: input.mode, valid });
  }

  output(): AccumulatorOutput {
    return this.accumulator.output();
  }

  reset(): void {
    this.detector.reset();
    this.inputStage.reset();
    this.pipeStage.reset();
    this.accumulator.reset();
  }
}
