import type { Bench } from 'tinybench'
import type { BenchmarkConfig } from './types.js'

/**
 * Objective values that wander like an optimizer converging on 0
 */
export function objectiveTrace(length: number): number[] {
  return Array.from({ length }, (_, i) => 1 / (1 + i) + 0.01 * Math.sin(i))
}

/**
 * `bench.add` that skips tasks not matching `config.filter`
 */
export function taskAdder(bench: Bench, config: BenchmarkConfig): (name: string, fn: () => unknown) => void {
  const pattern = config.filter?.toLowerCase()
  return (name, fn) => {
    if (pattern && !name.toLowerCase().includes(pattern)) return
    bench.add(name, fn)
  }
}
