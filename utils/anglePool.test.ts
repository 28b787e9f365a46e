import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { pathToFileURL } from 'node:url'
import { afterEach, describe, expect, it } from 'vitest'
import type { Point } from '@/types/coverage'
import { type AngleTask, createInlinePool, createWorkerPool } from './anglePool'
import { evaluateAngle } from './angleOptimizer'
import { planCoverageCandidate, planCoverageParallel } from './coveragePlanner'

const WORKER_TIMEOUT = 30000

const uShape: Point[] = [
  { x: 0, y: 0 },
  { x: 30, y: 0 },
  { x: 30, y: 30 },
  { x: 20, y: 30 },
  { x: 20, y: 10 },
  { x: 10, y: 10 },
  { x: 10, y: 30 },
  { x: 0, y: 30 }
]

const task: AngleTask = {
  polygon: uShape,
  pivot: { x: 15, y: 15 },
  angle: 30,
  spacingM: 5,
  overshootM: 5
}

let tempDir: string | undefined

afterEach(async () => {
  if (tempDir) {
    await rm(tempDir, { recursive: true, force: true })
    tempDir = undefined
  }
})

describe('createInlinePool', () => {
  it('evaluates the task in process', async () => {
    const pool = createInlinePool()
    await expect(pool.run(task)).resolves.toEqual(
      evaluateAngle(task.polygon, task.angle, task.pivot, task.spacingM, task.overshootM)
    )
    await pool.close()
  })
})

describe('createWorkerPool', () => {
  it('plans the same path as the sequential planner', async () => {
    const config = { spacingM: 4, angleSamples: 12 }
    const pool = createWorkerPool(2)
    try {
      await expect(planCoverageParallel(uShape, config, pool)).resolves.toEqual(planCoverageCandidate(uShape, config))
    } finally {
      await pool.close()
    }
  }, WORKER_TIMEOUT)

  it('fails tasks still running when the pool closes', async () => {
    const pool = createWorkerPool(1)
    const running = expect(pool.run(task)).rejects.toThrow('Angle pool closed before the task finished')
    const queued = expect(pool.run(task)).rejects.toThrow('Angle pool closed before the task finished')

    await pool.close()
    await running
    await queued
    await expect(pool.run(task)).rejects.toThrow('Angle pool is closed')
  }, WORKER_TIMEOUT)

  it('fails every task once all workers have died', async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'angle-pool-'))
    const brokenWorker = join(tempDir, 'broken.mjs')
    await writeFile(brokenWorker, "throw new Error('worker failed to start')\n", 'utf8')

    const pool = createWorkerPool(2, pathToFileURL(brokenWorker))
    const first = expect(pool.run(task)).rejects.toThrow('worker failed to start')
    const second = expect(pool.run(task)).rejects.toThrow('worker failed to start')
    const queued = expect(pool.run(task)).rejects.toThrow('No angle workers left: worker failed to start')

    await first
    await second
    await queued
    await expect(pool.run(task)).rejects.toThrow('No angle workers left')
    await pool.close()
  }, WORKER_TIMEOUT)
})
