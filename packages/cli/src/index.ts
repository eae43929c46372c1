import {or} from '@optique/core/constructs';
import {command} from '@optique/core/primitives';
import {message} from '@optique/core/message';
import type {InferValue} from '@optique/core/parser';
import pino from 'pino';
import {BusConfig, PinoLogger} from '@typebus/core';

import {benchCommand, handleBench} from './commands/bench.js';
import {churnCommand, handleChurn} from './commands/churn.js';

// Main parser with all commands
export const parser = or(
  command('bench', benchCommand, { description: message`Measure publish throughput per resolver strategy` }),
  command('churn', churnCommand, { description: message`Construct and dispose sparse resolvers, checking for stale slots` }),
);

export type ParsedResult = InferValue<typeof parser>;

/**
 * Run a parsed command and return what it prints.
 * Logs go to `logTo` (stderr by default), never into the returned output.
 */
export function dispatch(
  result: ParsedResult,
  color = false,
  logTo: pino.DestinationStream = pino.destination({dest: 2, sync: true}),
): string {
  PinoLogger.configure(result.logLevel ?? BusConfig.fromEnv().logLevel, logTo);

  switch (result.cmd) {
    case 'bench':
      return handleBench(result, color);
    case 'churn':
      return handleChurn(result, color);
  }
}

export { handleBench, handleChurn };
export { runBenchmark, runChurn } from './workload.js';
export type { BenchOptions, BenchResult, ChurnOptions, ChurnResult } from './workload.js';
