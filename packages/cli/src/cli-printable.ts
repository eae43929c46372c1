import {StaticTypeCompanion} from "@typebus/core";

export type OutputFormat = "text" | "json";

/** ANSI styling that collapses to plain text when color is off. */
export class Fmt {
  constructor(readonly color: boolean) {}

  dim(text: string): string { return this.wrap("\x1b[2m", text); }
  bold(text: string): string { return this.wrap("\x1b[1m", text); }
  green(text: string): string { return this.wrap("\x1b[32m", text); }
  red(text: string): string { return this.wrap("\x1b[31m", text); }

  private wrap(code: string, text: string): string {
    return this.color ? `${code}${text}\x1b[0m` : text;
  }
}

export interface CliValuePrinter<in T> {
  print(value: T, fmt: Fmt): string
}

export const CliValuePrinter = StaticTypeCompanion({
  of<T>(fn: CliValuePrinter<T>['print']): CliValuePrinter<T> {
    return { print: fn }
  }
})

export class CliPrinter {
  readonly fmt: Fmt;

  constructor(args: { color: boolean; format?: OutputFormat }) {
    this.fmt = new Fmt(args.color);
    this.format = args.format ?? "text";
  }

  readonly format: OutputFormat;

  /** Text goes through the printer; json is the value itself, pretty-printed. */
  print<T>(printer: CliValuePrinter<T>, item: T): string {
    return this.format === "json" ? JSON.stringify(item, null, 2) : printer.print(item, this.fmt)
  }
}
