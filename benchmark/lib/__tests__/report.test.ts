/**
 * Tests for benchmark reporting helpers
 */

import { describe, test, expect } from 'vitest'
import { Bench } from 'tinybench'
import { formatTable, summarize } from '../report.js'
import { taskAdder } from '../utils.js'
import type { TaskSummary } from '../types.js'

const row: TaskSummary = {
  suite: 'Checkpoint Store',
  name: 'encodeValue',
  opsPerSec: 1234567.8,
  meanUs: 0.81,
  rme: 1.234,
  samples: 10,
}

describe('formatTable', () => {
  test('prints a header, a rule and one %g row per task', () => {
    expect(formatTable('Checkpoint Store', [row])).toEqual([
      `${'Checkpoint Store'.padEnd(44)} |       ops/s |     mean µs | rme`,
      '_'.repeat(78),
      `${'encodeValue'.padEnd(44)} | 1.23457e+06 |        0.81 | ±1.2%`,
    ])
  })
})

describe('summarize', () => {
  test('skips tasks that have not run', () => {
    const bench = new Bench()
    bench.add('idle', () => {})
    expect(summarize('s', bench)).toEqual([])
  })
})

describe('taskAdder', () => {
  test('adds every task without a filter', () => {
    const bench = new Bench()
    const add = taskAdder(bench, {})
    add('encodeValue', () => {})
    add('appendCheckpoint', () => {})
    expect(bench.tasks.map((t) => t.name)).toEqual(['encodeValue', 'appendCheckpoint'])
  })

  test('keeps only names containing the filter, ignoring case', () => {
    const bench = new Bench()
    const add = taskAdder(bench, { filter: 'APPEND' })
    add('encodeValue', () => {})
    add('appendCheckpoint', () => {})
    expect(bench.tasks.map((t) => t.name)).toEqual(['appendCheckpoint'])
  })
})
