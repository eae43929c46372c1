import {object} from '@optique/core/constructs';
import {constant} from '@optique/core/primitives';
import {message} from '@optique/core/message';
import {CliPrinter, type OutputFormat} from '../cli-printable.js';
import {BenchPrinters} from '../printers/bench-printers.js';
import {countOption, logLevelOption, outputOption} from '../parsers.js';
import {runChurn} from '../workload.js';

export const churnCommand = object({
  cmd: constant('churn' as const),
  resolvers: countOption('--resolvers', 1_000, message`Sparse resolvers to construct`),
  types: countOption('--types', 8, message`Message types each resolver touches`),
  live: countOption('--live', 4, message`Resolvers alive at once`),
  output: outputOption,
  logLevel: logLevelOption,
});

export function handleChurn(opts: {
  resolvers: number;
  types: number;
  live: number;
  output: OutputFormat;
}, color = false): string {
  const result = runChurn(opts);
  return new CliPrinter({ color, format: opts.output }).print(BenchPrinters.ChurnResult, result);
}
