import {object} from '@optique/core/constructs';
import {withDefault} from '@optique/core/modifiers';
import {constant, option} from '@optique/core/primitives';
import {message} from '@optique/core/message';
import {RESOLVER_KINDS, type ResolverKind} from '@typebus/core';
import {CliPrinter, type OutputFormat} from '../cli-printable.js';
import {BenchPrinters} from '../printers/bench-printers.js';
import {countOption, logLevelOption, outputOption, resolverChoice} from '../parsers.js';
import {runBenchmark} from '../workload.js';

export const benchCommand = object({
  cmd: constant('bench' as const),
  resolver: withDefault(option('-r', '--resolver', resolverChoice, { description: message`Resolver strategy to measure` }), 'all' as const),
  types: countOption('--types', 16, message`Distinct message types`),
  iterations: countOption('--iterations', 10_000, message`Publish rounds over all types`),
  subscribers: countOption('--subscribers', 2, message`Callbacks per message type`),
  output: outputOption,
  logLevel: logLevelOption,
});

export function handleBench(opts: {
  resolver: ResolverKind | 'all';
  types: number;
  iterations: number;
  subscribers: number;
  output: OutputFormat;
}, color = false): string {
  const kinds: readonly ResolverKind[] = opts.resolver === 'all' ? RESOLVER_KINDS : [opts.resolver];
  const results = kinds.map((kind) => runBenchmark(kind, opts));
  return new CliPrinter({ color, format: opts.output }).print(BenchPrinters.BenchResults, results);
}
