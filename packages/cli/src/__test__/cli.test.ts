import { describe, test, expect } from 'vitest'
import { parse } from '@optique/core/parser'
import { dispatch, parser } from '../index.js'
import { CliPrinter } from '../cli-printable.js'
import { BenchPrinters } from '../printers/bench-printers.js'
import type { BenchResult, ChurnResult } from '../workload.js'

const bench: BenchResult = { resolver: 'map', types: 3, publishes: 12, deliveries: 24, elapsedMs: 500, publishesPerSec: 24 }
const churn: ChurnResult = { constructed: 4, types: 3, survivors: 2, highestIndex: 2, staleRegistries: 0, leaked: false }

// -- Parsing ------------------------------------------------------------------

describe('parser', () => {
  test('bench with explicit options', () => {
    const result = parse(parser, ['bench', '--resolver', 'sparse', '--types', '3', '-o', 'json'])
    expect(result.success).toBe(true)
    if (result.success) {
      expect(result.value).toMatchObject({ cmd: 'bench', resolver: 'sparse', types: 3, iterations: 10_000, subscribers: 2, output: 'json' })
    }
  })

  test('bench defaults to every resolver and text output', () => {
    const result = parse(parser, ['bench'])
    expect(result.success && result.value).toMatchObject({ cmd: 'bench', resolver: 'all', output: 'text' })
  })

  test('churn defaults', () => {
    const result = parse(parser, ['churn'])
    expect(result.success && result.value).toMatchObject({ cmd: 'churn', resolvers: 1_000, types: 8, live: 4 })
  })

  test('rejects unknown resolvers and non-positive counts', () => {
    expect(parse(parser, ['bench', '--resolver', 'ring']).success).toBe(false)
    expect(parse(parser, ['bench', '--types', '0']).success).toBe(false)
    expect(parse(parser, ['churn', '--log-level', 'loud']).success).toBe(false)
  })
})

// -- Printing -----------------------------------------------------------------

describe('BenchPrinters', () => {
  test('bench results as an aligned table', () => {
    const printer = new CliPrinter({ color: false })
    const out = printer.print(BenchPrinters.BenchResults, [bench, { ...bench, resolver: 'sparse' }])

    expect(out.split('\n')).toEqual([
      'resolver  types  publishes  deliveries  elapsed ms  publishes/s',
      'map       3      12         24          500.0       24',
      'sparse    3      12         24          500.0       24',
    ])
  })

  test('churn result as text', () => {
    const out = new CliPrinter({ color: false }).print(BenchPrinters.ChurnResult, churn)
    expect(out).toBe([
      'Constructed:    4 sparse resolvers over 3 type(s)',
      'Highest slot:   2',
      'Survivors:      2',
      'Result:         ✓ no stale registries',
    ].join('\n'))
  })

  test('a leak is reported with its count', () => {
    const out = new CliPrinter({ color: false }).print(BenchPrinters.ChurnResult, { ...churn, staleRegistries: 1, leaked: true })
    expect(out.split('\n')[3]).toBe('Result:         ✗ 1 stale registry')
  })

  test('color wraps styled parts only', () => {
    const out = new CliPrinter({ color: true }).print(BenchPrinters.ChurnResult, churn)
    expect(out.split('\n')[3]).toBe('Result:         \x1b[32m✓ no stale registries\x1b[0m')
  })

  test('json output is the value itself', () => {
    const out = new CliPrinter({ color: true, format: 'json' }).print(BenchPrinters.ChurnResult, churn)
    expect(JSON.parse(out)).toEqual(churn)
  })
})

// -- Dispatch -----------------------------------------------------------------

describe('dispatch', () => {
  test('churn end to end as json', () => {
    const out = dispatch({ cmd: 'churn', resolvers: 5, types: 2, live: 2, output: 'json', logLevel: undefined })
    expect(JSON.parse(out)).toEqual({
      constructed: 5,
      types: 2,
      survivors: 2,
      highestIndex: 2,
      staleRegistries: 0,
      leaked: false,
    })
  })

  test('logs go to the log destination, not into the printed result', () => {
    const lines: string[] = []
    const out = dispatch(
      { cmd: 'churn', resolvers: 3, types: 1, live: 1, output: 'json', logLevel: 'debug' },
      false,
      { write: (line: string) => { lines.push(line) } },
    )

    expect(JSON.parse(out)).toMatchObject({ constructed: 3, survivors: 1, leaked: false })
    const last: unknown = JSON.parse(lines[lines.length - 1])
    expect(last).toMatchObject({ level: 20, name: 'churn', msg: 'churn finished' })
  })

  test('bench on one resolver as json', () => {
    const out = dispatch({ cmd: 'bench', resolver: 'map', types: 2, iterations: 3, subscribers: 1, output: 'json', logLevel: undefined })
    const parsed: unknown = JSON.parse(out)
    expect(parsed).toMatchObject([{ resolver: 'map', types: 2, publishes: 6, deliveries: 6 }])
  })
})
