export * from './utils/bit.js';
export * from './utils/rng.js';
export * from './mac/types.js';
export * from './mac/multiplier.js';
export * from './mac/change_detector.js';
export * from './mac/pipeline.js';
export * from './mac/accumulator.js';
export * from './mac/engine.js';
export * from './mac/model.js';
export * from './serial/framing.js';
export * from './serial/framer.js';
export * from './system/system.js';
export * from './system/host.js';
