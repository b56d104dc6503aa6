/**
 * Checkpoint Store Benchmarks
 *
 * Append cost per record (encode, write, fsync) and decode throughput.
 */

import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Bench } from 'tinybench'
import { appendCheckpoint, decodeCheckpointFile, encodeHeader, encodeRecord, encodeValue, prepareCheckpointFile } from '@optcb/checkpoint'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { taskAdder } from '../lib/utils.js'

const SIZES = [
  { length: 16, label: 'small (16)' },
  { length: 1024, label: 'medium (1K)' },
]

function concat(chunks: Uint8Array[]): Uint8Array {
  const out = new Uint8Array(chunks.reduce((n, c) => n + c.length, 0))
  let offset = 0
  for (const chunk of chunks) {
    out.set(chunk, offset)
    offset += chunk.length
  }
  return out
}

export const suite: BenchmarkSuite = {
  name: 'Checkpoint Store',
  category: 'checkpoint',

  async run(config: BenchmarkConfig) {
    const bench = new Bench({ time: config.time ?? 1000 })
    const add = taskAdder(bench, config)
    const dir = mkdtempSync(join(tmpdir(), 'optcb-bench-'))

    for (const { length, label } of SIZES) {
      const plain = Array.from({ length }, (_, i) => i / length)
      const typed = Float64Array.from(plain)

      add(`encodeValue number[] ${label}`, () => {
        encodeValue(plain)
      })

      add(`encodeValue Float64Array ${label}`, () => {
        encodeValue(typed)
      })

      const file = concat([encodeHeader(), ...Array.from({ length: 100 }, (_, i) => encodeRecord(String(i + 1), typed))])
      add(`decode 100 records of Float64Array ${label}`, () => {
        decodeCheckpointFile(file)
      })

      const path = join(dir, `append-${length}.opck`)
      prepareCheckpointFile(path, { overwrite: true })
      let t = 0
      add(`appendCheckpoint Float64Array ${label}`, () => {
        t++
        appendCheckpoint(path, String(t), typed)
      })
    }

    try {
      if (config.warmup !== false) {
        await bench.warmup()
      }
      await bench.run()
    } finally {
      rmSync(dir, { recursive: true, force: true })
    }
    return bench
  },
}

export default suite
