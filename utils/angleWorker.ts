import { parentPort } from 'node:worker_threads'
import { evaluateAngle } from './angleOptimizer'
import type { AngleWorkerRequest, AngleWorkerResponse } from './anglePool'

if (!parentPort) {
  throw new Error('angleWorker must be started as a worker thread')
}

const port = parentPort

port.on('message', ({ id, task }: AngleWorkerRequest) => {
  let response: AngleWorkerResponse
  try {
    const candidate = evaluateAngle(task.polygon, task.angle, task.pivot, task.spacingM, task.overshootM)
    response = { id, candidate }
  } catch (error) {
    response = { id, error: error instanceof Error ? error.message : String(error) }
  }
  port.postMessage(response)
})
