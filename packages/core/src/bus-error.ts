/**
 * BusError — faceted errors raised by the bus.
 *
 * Each error code is defined once, inside a boundary, and composed from
 * facets: markers such as BadInput, and data traits that add typed fields.
 * Callers tell errors apart by definition (`ErrX.is`) or by facet
 * (`BusError.has`).
 *
 * A publish fans out to many callbacks, so one error can have several causes.
 */

import {StaticTypeCompanion} from "./companion.js";
import type {UnionToIntersection} from "./type-system-utils.js";
import {Inspect} from "./inspect.js";

// -- Facets ----------------------------------------------------------------------

export interface ErrMarkerFacet {
  readonly kind: "marker";
  readonly name: string;
}

export interface ErrDataFacet<TData extends Record<string, unknown> = Record<string, unknown>> {
  readonly kind: "data";
  readonly name: string;
  readonly _data?: TData; // phantom
}

export type ErrFacetAny = ErrMarkerFacet | ErrDataFacet;

/** Fields owned by a single error definition rather than a facet. Type only. */
export interface ErrProps<T extends Record<string, unknown> = {}> {
  readonly _kind: "props";
  readonly _phantom?: T;
}

type InferPropsData<P> = P extends ErrProps<infer T> ? T : {};

export const ErrFacet = StaticTypeCompanion({
  marker(name: string): ErrMarkerFacet {
    return Object.freeze({ kind: "marker" as const, name });
  },

  data<TData extends Record<string, unknown>>(name: string): ErrDataFacet<TData> {
    return Object.freeze({ kind: "data" as const, name });
  },

  props<T extends Record<string, unknown>>(): ErrProps<T> {
    return { _kind: "props" };
  },
});

type FacetProps<F> = F extends ErrDataFacet<infer D> ? D : {};

/** What `create` takes: every data facet's fields plus the definition's own. */
export type ErrorData<Fs extends readonly ErrFacetAny[], D extends Record<string, unknown> = {}> =
  UnionToIntersection<FacetProps<Fs[number]>> & D;

// -- Definitions -----------------------------------------------------------------

export interface ErrorDef<
  Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[],
  D extends Record<string, unknown> = {},
> {
  readonly code: string;
  readonly facets: Fs;
  /** The first cause becomes `cause`; all of them are kept in `causes`. */
  create(data: ErrorData<Fs, D>, causes?: readonly BusError[]): BusError<Fs, D>;
  is(err: unknown): err is BusError<Fs, D>;
}

export interface ErrorBoundary {
  readonly domain: string;
  /** Define an error owned by this boundary. The code is prefixed with the domain. */
  define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
    code: string,
    opts: { customProps?: P; facets: Fs; message: (data: ErrorData<Fs, InferPropsData<P>>) => string },
  ): ErrorDef<Fs, InferPropsData<P>>;
  is(err: unknown): err is BusError;
}

export interface BusError<
  Fs extends readonly ErrFacetAny[] = readonly ErrFacetAny[],
  D extends Record<string, unknown> = {},
> extends Error {
  readonly code: string;
  readonly domain: string;
  readonly data: ErrorData<Fs, D>;
  readonly facetNames: ReadonlySet<string>;
  readonly cause?: BusError;
  readonly causes: readonly BusError[];
  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string;
}

// -- Implementation --------------------------------------------------------------

class BusErrorImpl extends Error implements BusError {
  readonly code: string;
  readonly domain: string;
  readonly data: Record<string, unknown>;
  readonly facetNames: ReadonlySet<string>;
  readonly causes: readonly BusError[];
  declare readonly cause?: BusError;

  static {
    Inspect(this, (self, opts) => ({
      format: self.prettyPrint({color: opts.colors, includeStackTrace: true}),
      params: [],
    }));
  }

  constructor(
    code: string,
    domain: string,
    message: string,
    facetNames: ReadonlySet<string>,
    data: Record<string, unknown>,
    causes: readonly BusError[] = [],
  ) {
    super(message, causes.length > 0 ? { cause: causes[0] } : undefined);
    this.name = `BusError[${code}]`;
    this.code = code;
    this.domain = domain;
    this.data = { ...data };
    this.facetNames = facetNames;
    this.causes = causes;
  }

  prettyPrint(opts?: { color?: boolean; includeStackTrace?: boolean }): string {
    const paint = palette(opts?.color ?? false);
    const lines = [`BusError: ${headline(this, paint)}`];
    appendTree(lines, this, "  ", paint);

    if (opts?.includeStackTrace) {
      const frames = stackFrames(this.stack);
      if (frames.length > 0) {
        lines.push(`  ${paint.dim}➝ Stack trace:${paint.reset}`);
        for (const frame of frames) lines.push(`${paint.dim}${frame}${paint.reset}`);
      }
    }
    return lines.join("\n");
  }
}

interface Palette {
  readonly red: string;
  readonly dim: string;
  readonly reset: string;
}

function palette(color: boolean): Palette {
  return color
    ? { red: "\x1b[31m", dim: "\x1b[2m", reset: "\x1b[0m" }
    : { red: "", dim: "", reset: "" };
}

function headline(err: BusError, paint: Palette): string {
  return `${paint.red}${err.code}${paint.reset}: ${err.message}`;
}

/** Data, then each cause, as branches under `err`. Causes recurse one level deeper. */
function appendTree(lines: string[], err: BusError, indent: string, paint: Palette): void {
  const branches: Array<() => void> = [];
  if (Object.keys(err.data).length > 0) {
    branches.push(() => lines.push(`${indent}${paint.dim}${connector()} data: ${JSON.stringify(err.data)}${paint.reset}`));
  }
  for (const cause of err.causes) {
    branches.push(() => {
      lines.push(`${indent}${paint.dim}${connector()} caused by:${paint.reset} ${headline(cause, paint)}`);
      appendTree(lines, cause, indent + "  ", paint);
    });
  }

  let remaining = branches.length;
  function connector(): string {
    remaining -= 1;
    return remaining === 0 ? "└" : "├";
  }
  for (const branch of branches) branch();
}

/** Stack frames without the message line or the frame of `create` itself. */
function stackFrames(stack: string | undefined): string[] {
  if (!stack) return [];
  return stack
    .split("\n")
    .filter((line) => line.trimStart().startsWith("at ") && !line.includes("at create ("));
}

function asBusError(thrown: unknown): BusError {
  if (thrown instanceof BusErrorImpl) return thrown;
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  const wrapped = new BusErrorImpl("unknown", "unknown", message, new Set<string>(), {});
  if (thrown instanceof Error && thrown.stack) wrapped.stack = thrown.stack;
  return wrapped;
}

// -- Companion -------------------------------------------------------------------

export const BusError = StaticTypeCompanion({
  /**
   * A domain that owns a set of error codes.
   *
   *   const Bus = BusError.boundary("bus");
   *   const ErrBusDisposed = Bus.define("bus_disposed", {...});   // code "bus.bus_disposed"
   */
  boundary(domain: string): ErrorBoundary {
    return {
      domain,

      define<const Fs extends readonly ErrFacetAny[], P extends ErrProps = ErrProps>(
        code: string,
        opts: { customProps?: P; facets: Fs; message: (data: ErrorData<Fs, InferPropsData<P>>) => string },
      ): ErrorDef<Fs, InferPropsData<P>> {
        type D = InferPropsData<P>;
        const fullCode = `${domain}.${code}`;
        const facetNames = new Set(opts.facets.map((f) => f.name));

        function create(data: ErrorData<Fs, D>, causes?: readonly BusError[]): BusError<Fs, D> {
          const err = new BusErrorImpl(
            fullCode,
            domain,
            opts.message(data),
            facetNames,
            data,
            causes,
          ) as unknown as BusError<Fs, D>;
          Error.captureStackTrace(err, create);
          return err;
        }

        function is(err: unknown): err is BusError<Fs, D> {
          return err instanceof BusErrorImpl && err.code === fullCode;
        }

        return Object.freeze({ code: fullCode, facets: opts.facets, create, is });
      },

      is(err: unknown): err is BusError {
        return err instanceof BusErrorImpl && err.domain === domain;
      },
    };
  },

  isBusError(err: unknown): err is BusError {
    return err instanceof BusErrorImpl;
  },

  /** Whether `err` is a BusError carrying `facet`. A data facet narrows `err.data`. */
  has<F extends ErrFacetAny>(
    err: unknown,
    facet: F,
  ): err is BusError & { readonly data: FacetProps<F> } {
    return err instanceof BusErrorImpl && err.facetNames.has(facet.name);
  },

  /** Any thrown value as a BusError. BusErrors come back unchanged; others get code "unknown". */
  wrap(err: unknown): BusError {
    return asBusError(err);
  },
});
