import { availableParallelism } from 'node:os'
import { Worker } from 'node:worker_threads'
import type { Candidate, Point } from '@/types/coverage'
import { evaluateAngle } from './angleOptimizer'

export interface AngleTask {
  polygon: Point[]
  pivot: Point
  angle: number
  spacingM: number
  overshootM: number
}

export type AngleWorkerRequest = { id: number; task: AngleTask }

export type AngleWorkerResponse =
  | { id: number; candidate: Candidate | null }
  | { id: number; error: string }

// Evaluates sweep orientations. Results are matched to tasks by promise, never by completion order.
export interface AnglePool {
  run(task: AngleTask): Promise<Candidate | null>
  close(): Promise<void>
}

export function createInlinePool(): AnglePool {
  return {
    run: async task => evaluateAngle(task.polygon, task.angle, task.pivot, task.spacingM, task.overshootM),
    close: async () => {}
  }
}

interface PendingTask {
  request: AngleWorkerRequest
  resolve: (candidate: Candidate | null) => void
  reject: (error: Error) => void
}

export const ANGLE_WORKER_URL = new URL('./angleWorker.ts', import.meta.url)

// Workers load TypeScript sources, so they need tsx whether or not the parent has it
function workerExecArgv(): string[] {
  const hasTsx = process.execArgv.some(arg => arg.includes('tsx'))
  return hasTsx ? process.execArgv : [...process.execArgv, '--import', 'tsx']
}

// Fixed pool of worker threads, one task in flight per worker.
// A worker that dies fails its task. When none are left, queued tasks fail too.
export function createWorkerPool(
  size: number = availableParallelism(),
  workerUrl: URL = ANGLE_WORKER_URL
): AnglePool {
  const workerCount = Math.max(1, Math.floor(size))
  const live = new Set<Worker>()
  const idle: Worker[] = []
  const busy = new Map<Worker, PendingTask>()
  const queue: PendingTask[] = []
  let nextId = 0
  let closed = false

  const dispatch = () => {
    while (idle.length > 0 && queue.length > 0) {
      const worker = idle.pop()
      const pending = queue.shift()
      if (!worker || !pending) return
      busy.set(worker, pending)
      worker.postMessage(pending.request)
    }
  }

  const settle = (worker: Worker) => {
    busy.delete(worker)
    if (!closed) idle.push(worker)
    dispatch()
  }

  const retire = (worker: Worker, error: Error) => {
    if (!live.delete(worker)) return

    const index = idle.indexOf(worker)
    if (index !== -1) idle.splice(index, 1)

    const pending = busy.get(worker)
    busy.delete(worker)
    pending?.reject(error)

    if (live.size === 0) {
      for (const queued of queue.splice(0)) {
        queued.reject(new Error(`No angle workers left: ${error.message}`))
      }
    }
  }

  for (let i = 0; i < workerCount; i++) {
    const worker = new Worker(workerUrl, { execArgv: workerExecArgv() })

    worker.on('message', (response: AngleWorkerResponse) => {
      const pending = busy.get(worker)
      if (!pending || pending.request.id !== response.id) return
      settle(worker)
      if ('error' in response) {
        pending.reject(new Error(response.error))
      } else {
        pending.resolve(response.candidate)
      }
    })

    worker.on('error', error => retire(worker, error))
    worker.on('exit', code => {
      if (!closed) retire(worker, new Error(`Angle worker exited with code ${code}`))
    })

    live.add(worker)
    idle.push(worker)
  }

  return {
    run(task) {
      if (closed) {
        return Promise.reject(new Error('Angle pool is closed'))
      }
      if (live.size === 0) {
        return Promise.reject(new Error('No angle workers left'))
      }
      return new Promise((resolve, reject) => {
        queue.push({ request: { id: nextId++, task }, resolve, reject })
        dispatch()
      })
    },

    async close() {
      closed = true
      const stopped = new Error('Angle pool closed before the task finished')
      for (const pending of [...queue.splice(0), ...busy.values()]) {
        pending.reject(stopped)
      }
      busy.clear()
      idle.length = 0

      const workers = [...live]
      live.clear()
      await Promise.all(workers.map(worker => worker.terminate()))
    }
  }
}
