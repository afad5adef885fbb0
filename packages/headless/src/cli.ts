#!/usr/bin/env node
import { cmdMul, cmdRun, cmdStress } from './lib.js';
import { ScriptError } from './errors.js';

function printUsage() {
  console.log(`Usage:
  npm run cli -- mul <a> <b> [--framing byte|nibble]
  npm run cli -- run <script.json> [--framing byte|nibble] [--validity change|strobe] [--settle N] [--trace]
  npm run cli -- stress [--iter N] [--seed S] [--clear-rate P] [--framing byte|nibble]

Examples:
  npm run cli -- mul 255 127
  npm run cli -- run packages/headless/tests/fixtures/accumulate.json --trace
  npm run cli -- stress --iter 1000 --seed 0x12D687 --framing nibble
`);
}

const commands: Record<string, (args: readonly string[]) => string[]> = {
  mul: cmdMul,
  run: cmdRun,
  stress: cmdStress,
};

function main() {
  const argv = process.argv.slice(2);
  const cmd = argv[0];
  if (!cmd || cmd === 'help' || cmd === '-h' || cmd === '--help') {
    printUsage();
    return;
  }
  const handler = commands[cmd];
  if (!handler) {
    throw new ScriptError('UnknownCommand', cmd);
  }
  for (const line of handler(argv.slice(1))) console.log(line);
}

try {
  main();
} catch (err) {
  if (err instanceof ScriptError) {
    console.error(`[mac] error: ${err.message}`);
    printUsage();
  } else {
    console.error(err);
  }
  process.exitCode = 1;
}
