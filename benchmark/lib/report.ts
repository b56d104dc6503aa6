/**
 * Result table and JSON dump for benchmark runs
 */

import { mkdirSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import type { Bench } from 'tinybench'
import { formatG, pad } from '@optcb/core'
import type { TaskSummary } from './types.js'

const NAME_WIDTH = 44

export function summarize(suite: string, bench: Bench): TaskSummary[] {
  const rows: TaskSummary[] = []
  for (const task of bench.tasks) {
    const result = task.result
    if (!result) continue
    rows.push({
      suite,
      name: task.name,
      opsPerSec: result.hz,
      meanUs: result.mean * 1000,
      rme: result.rme,
      samples: result.samples.length,
    })
  }
  return rows
}

/**
 * Lines of the table printed for one suite
 */
export function formatTable(suite: string, rows: readonly TaskSummary[]): string[] {
  const lines = [`${pad(suite, NAME_WIDTH)} | ${pad('ops/s', 11, 'right')} | ${pad('mean µs', 11, 'right')} | rme`]
  lines.push('_'.repeat(NAME_WIDTH + 34))
  for (const row of rows) {
    const ops = pad(formatG(row.opsPerSec, 6), 11, 'right')
    const mean = pad(formatG(row.meanUs, 6), 11, 'right')
    lines.push(`${pad(row.name, NAME_WIDTH)} | ${ops} | ${mean} | ±${row.rme.toFixed(1)}%`)
  }
  return lines
}

/**
 * Write all rows to `benchmark-<timestamp>.json` in `dir` and return the path
 */
export function writeJson(dir: string, rows: readonly TaskSummary[]): string {
  mkdirSync(dir, { recursive: true })
  const path = join(dir, `benchmark-${new Date().toISOString().replace(/[:.]/g, '-')}.json`)
  const report = {
    timestamp: new Date().toISOString(),
    platform: { os: process.platform, arch: process.arch, node: process.version },
    tasks: rows,
  }
  writeFileSync(path, JSON.stringify(report, null, 2))
  return path
}
