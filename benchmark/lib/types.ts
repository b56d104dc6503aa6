import type { Bench } from 'tinybench'

export interface BenchmarkConfig {
  /** Time in ms per task (default: 1000) */
  time?: number
  /** Warm up before measuring (default: true) */
  warmup?: boolean
  /** Only run tasks whose name contains this, case-insensitive */
  filter?: string
  /** Only run suites of this category */
  category?: string
  /** Write results to a JSON file in this directory */
  jsonDir?: string
}

export interface BenchmarkSuite {
  name: string
  category: string
  run(config: BenchmarkConfig): Promise<Bench>
}

/** One measured task */
export interface TaskSummary {
  suite: string
  name: string
  opsPerSec: number
  meanUs: number
  /** Relative margin of error, in percent */
  rme: number
  samples: number
}
