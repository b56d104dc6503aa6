/**
 * Callback Dispatch Benchmarks
 *
 * Per-iteration overhead of invoking a callback from an optimization loop.
 */

import { Bench } from 'tinybench'
import { Callback, CallbackSet, EventTrigger, IterationTrigger, LogProgress, TimeTrigger, formatRow, trigger } from '@optcb/callbacks'
import type { BenchmarkSuite, BenchmarkConfig } from '../lib/types.js'
import { objectiveTrace, taskAdder } from '../lib/utils.js'

const STEPS = 1000

export const suite: BenchmarkSuite = {
  name: 'Callback Dispatch',
  category: 'callbacks',

  async run(config: BenchmarkConfig) {
    const bench = new Bench({ time: config.time ?? 1000 })
    const add = taskAdder(bench, config)

    const values = objectiveTrace(STEPS)
    const state = { x: [1, 2, 3] }
    const discard = (): void => {}

    const drive = (callback: { invoke(state: unknown, value: number): boolean }) => {
      for (const value of values) {
        callback.invoke(state, value)
      }
    }

    add(`IterationTrigger(1), no-op action x${STEPS}`, () => {
      drive(new Callback(new IterationTrigger(1), discard))
    })

    add(`IterationTrigger(100), no-op action x${STEPS}`, () => {
      drive(new Callback(new IterationTrigger(100), discard))
    })

    add(`TimeTrigger(60s), no-op action x${STEPS}`, () => {
      drive(new Callback(new TimeTrigger(60), discard))
    })

    add(`plain function trigger x${STEPS}`, () => {
      drive(new Callback((_s: unknown, _v: number, t: number) => t % 10 === 0, discard))
    })

    add(`three triggers, OR-combined x${STEPS}`, () => {
      drive(new Callback([new IterationTrigger(7), new IterationTrigger(11), new EventTrigger('end')], discard))
    })

    add(`EventTrigger notify + invoke x${STEPS}`, () => {
      const callback = new Callback(new EventTrigger(['checkpoint', 'end']), discard)
      for (let i = 0; i < STEPS; i++) {
        if (i % 50 === 0) trigger(callback, 'checkpoint')
        callback.invoke(state, values[i] ?? 0)
      }
    })

    add(`LogProgress to null sink x${STEPS}`, () => {
      drive(new Callback(new IterationTrigger(1), new LogProgress({ sink: discard })))
    })

    add(`CallbackSet of 4 x${STEPS}`, () => {
      drive(
        new CallbackSet([
          new Callback(new IterationTrigger(1), discard),
          new Callback(new IterationTrigger(5), discard),
          new Callback(new IterationTrigger(25), new LogProgress({ sink: discard })),
          new Callback(new EventTrigger('end'), discard),
        ]),
      )
    })

    add('formatRow', () => {
      formatRow(12345, 0.000123456789, -1.5e-7, 98765.4321)
    })

    if (config.warmup !== false) {
      await bench.warmup()
    }
    await bench.run()
    return bench
  },
}

export default suite
