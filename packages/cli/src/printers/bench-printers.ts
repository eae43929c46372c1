import {CliValuePrinter} from "../cli-printable.js";
import type {BenchResult, ChurnResult} from "../workload.js";

export const BenchPrinters = {

  BenchResults: CliValuePrinter.of<BenchResult[]>((results, fmt) => {
    const header = ["resolver", "types", "publishes", "deliveries", "elapsed ms", "publishes/s"];
    const rows = results.map((r) => [
      r.resolver,
      String(r.types),
      String(r.publishes),
      String(r.deliveries),
      r.elapsedMs.toFixed(1),
      String(r.publishesPerSec),
    ]);
    const widths = header.map((h, col) => Math.max(h.length, ...rows.map((row) => row[col].length)));
    const line = (cells: string[]) => cells.map((c, col) => c.padEnd(widths[col])).join("  ").trimEnd();

    return [fmt.bold(line(header)), ...rows.map(line)].join("\n");
  }),

  ChurnResult: CliValuePrinter.of<ChurnResult>((value, fmt) => {
    const verdict = value.leaked
      ? fmt.red(`✗ ${value.staleRegistries} stale registr${value.staleRegistries === 1 ? "y" : "ies"}`)
      : fmt.green("✓ no stale registries");
    return [
      `Constructed:    ${value.constructed} sparse resolvers over ${value.types} type(s)`,
      `Highest slot:   ${value.highestIndex}`,
      `Survivors:      ${value.survivors}`,
      `Result:         ${verdict}`,
    ].join("\n");
  }),

}
