/**
 * Rosenbrock Minimization Example
 *
 * This example demonstrates:
 * - Driving a hand-written gradient descent loop with callbacks
 * - Progress table every 500 iterations
 * - Checkpointing the parameters every 2000 iterations and at the end
 * - Recording the distance to the known minimum on the side
 * - Stopping on an iteration budget or a small enough objective
 *
 * Run with: npm run example
 */

import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import {
  Callback,
  CallbackSet,
  CheckPointSaver,
  EventTrigger,
  Evaluator,
  IterationTrigger,
  LogProgress,
  anyStop,
  stopAfter,
  stopBelow,
  trigger,
} from '@optcb/callbacks'
import { loadCheckpoints } from '@optcb/checkpoint'

// ==================== Configuration ====================
const CONFIG = {
  a: 1,
  b: 100,
  start: [-1.2, 1] as const,
  learningRate: 0.001,
  maxIterations: 20000,
  tolerance: 1e-8,
}

interface State {
  u: Float64Array
  gradient: Float64Array
}

// ==================== Objective ====================

function rosenbrock(u: Float64Array): number {
  const x = u[0] ?? 0
  const y = u[1] ?? 0
  return (CONFIG.a - x) ** 2 + CONFIG.b * (y - x * x) ** 2
}

function gradient(u: Float64Array, out: Float64Array): void {
  const x = u[0] ?? 0
  const y = u[1] ?? 0
  out[0] = -2 * (CONFIG.a - x) - 4 * CONFIG.b * x * (y - x * x)
  out[1] = 2 * CONFIG.b * (y - x * x)
}

// ==================== Optimizer ====================

/**
 * Plain gradient descent, calling `callback` once per step until it asks to stop
 */
function minimize(callback: (state: State, value: number) => boolean): State {
  const state: State = {
    u: Float64Array.from(CONFIG.start),
    gradient: new Float64Array(2),
  }

  for (;;) {
    gradient(state.u, state.gradient)
    for (let i = 0; i < state.u.length; i++) {
      state.u[i] = (state.u[i] ?? 0) - CONFIG.learningRate * (state.gradient[i] ?? 0)
    }
    if (callback(state, rosenbrock(state.u))) {
      return state
    }
  }
}

// ==================== Main ====================

console.log('=== Rosenbrock Gradient Descent ===\n')

const dir = mkdtempSync(join(tmpdir(), 'optcb-example-'))
const path = join(dir, 'rosenbrock.opck')

try {
  const distance = new Evaluator((state: State) => Math.hypot((state.u[0] ?? 0) - 1, (state.u[1] ?? 0) - 1), {
    label: 'distance to minimum',
  })

  const progress = new Callback<State>(new IterationTrigger(500), new LogProgress({ headerEvery: 20 }), {
    stop: anyStop(stopAfter(CONFIG.maxIterations), stopBelow(CONFIG.tolerance)),
  })
  const saver = new Callback<State>(
    [new IterationTrigger(2000), new EventTrigger('end')],
    new CheckPointSaver(path, { transform: (state: State) => state.u }),
  )
  const tracker = new Callback<State>(new IterationTrigger(2000), distance)

  const callbacks = new CallbackSet<State>([progress, saver, tracker])
  const final = minimize(callbacks.asFunction())

  // One more invocation with the latch set saves the final parameters
  trigger(saver, 'end')
  saver.invoke(final, rosenbrock(final.u))

  console.log(`\nStopped after ${progress.t} iterations at u = [${Array.from(final.u).join(', ')}]`)
  console.log(`f(u) = ${rosenbrock(final.u)}`)

  console.log(`\n${distance.label}:`)
  distance.evaluations.forEach((d, i) => console.log(`  t=${(i + 1) * 2000}: ${d.toFixed(6)}`))

  const checkpoints = loadCheckpoints(path)
  console.log(`\nCheckpoints in ${path}: ${Array.from(checkpoints.keys()).join(', ')}`)
} finally {
  rmSync(dir, { recursive: true, force: true })
}
