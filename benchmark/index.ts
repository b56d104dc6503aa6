/**
 * Benchmark CLI entry point
 *
 * Usage:
 *   tsx benchmark/index.ts           # Run all benchmarks
 *   tsx benchmark/index.ts --category callbacks
 *   tsx benchmark/index.ts --filter trigger
 *   tsx benchmark/index.ts --json
 */

import { suite as dispatch } from './callbacks/dispatch.bench.js'
import { suite as append } from './checkpoint/append.bench.js'
import { formatTable, summarize, writeJson } from './lib/report.js'
import type { BenchmarkConfig, BenchmarkSuite, TaskSummary } from './lib/types.js'

const SUITES: readonly BenchmarkSuite[] = [dispatch, append]

const HELP = `
optcb Benchmark Suite

Usage:
  tsx benchmark/index.ts [options]

Options:
  --category <name>   Only run one category (callbacks, checkpoint)
  --filter <pattern>  Only run tasks whose name contains the pattern
  --json              Also write results to benchmark/results/
  --time <ms>         Time per task in ms (default: 1000)
  --no-warmup         Skip warmup phase
  --help, -h          Show this help message
`

function parseArgs(args: readonly string[]): BenchmarkConfig {
  const config: BenchmarkConfig = { time: 1000, warmup: true }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const next = args[i + 1]

    if (arg === '--category' && next) {
      config.category = next
      i++
    } else if (arg === '--filter' && next) {
      config.filter = next
      i++
    } else if (arg === '--time' && next) {
      config.time = parseInt(next, 10)
      i++
    } else if (arg === '--json') {
      config.jsonDir = './benchmark/results'
    } else if (arg === '--no-warmup') {
      config.warmup = false
    } else if (arg === '--help' || arg === '-h') {
      console.log(HELP)
      process.exit(0)
    }
  }

  return config
}

async function main(): Promise<void> {
  const config = parseArgs(process.argv.slice(2))
  const suites = SUITES.filter((s) => !config.category || s.category === config.category)
  const all: TaskSummary[] = []

  for (const suite of suites) {
    const bench = await suite.run(config)
    const rows = summarize(suite.name, bench)
    all.push(...rows)
    console.log(['', ...formatTable(suite.name, rows)].join('\n'))
  }

  if (config.jsonDir) {
    console.log(`\nResults written to: ${writeJson(config.jsonDir, all)}`)
  }
}

main().catch((err: unknown) => {
  console.error('Benchmark failed:', err)
  process.exit(1)
})
