/**
 * Worker-side half of the bridge.
 *
 * Opens the DirectoryService, runs an EventLoop of its own, and turns each
 * request polled from the host into an action on a local TaskQueue. Every
 * result crosses back as a completion message followed by a wake signal;
 * nothing here ever calls into the host thread directly.
 */

import type { Logger } from '../logging/index.js'
import { EventLoop } from '../loop/index.js'
import { DirectoryEngine } from '../engine/index.js'
import {
  BridgeCompletionSchema,
  BridgeRequestSchema,
  TaskChannel,
  TaskQueue,
  WakeChannel,
  type BridgeCompletion,
  type BridgeRequest,
  type QueuedAction,
} from '../channel/index.js'
import type { ServiceSpec } from '../types/config.js'
import type { DirectoryService } from '../types/directory.js'
import type { WorkerInit } from './types.js'

export interface WorkerRuntimeOptions {
  openService: (spec: ServiceSpec) => Promise<DirectoryService>
  logger: Logger
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Scheduler handed to the engine. Once the loop is terminated, actions are
 * dropped, including those already queued but not yet started.
 */
export function scheduleUntilTerminated(loop: EventLoop, queue: TaskQueue): (action: QueuedAction) => void {
  return (action) => {
    if (loop.isTerminated) return
    queue.enqueue(() => (loop.isTerminated ? undefined : action()))
    void queue.drainAndRunAll()
  }
}

/**
 * Run the worker until a terminate request arrives. Resolves after the
 * engine, the service handle and the loop registrations are released.
 * Never rejects: initialization failures are reported to the host.
 */
export async function runBridgeWorker(init: WorkerInit, options: WorkerRuntimeOptions): Promise<void> {
  const { logger } = options
  const onInvalid = (value: unknown): void => {
    logger.warn({ value }, 'dropping malformed message')
  }
  const requests = new TaskChannel(init.ports.requests, BridgeRequestSchema, onInvalid)
  const requestWake = new WakeChannel(init.ports.requestWake)
  const completions = new TaskChannel(init.ports.completions, BridgeCompletionSchema, onInvalid)
  const completionWake = new WakeChannel(init.ports.completionWake)

  const report = (completion: BridgeCompletion): void => {
    completions.send(completion)
    completionWake.signal()
  }

  let service: DirectoryService
  try {
    service = await options.openService(init.service)
  } catch (err) {
    logger.error({ err }, 'error opening directory service')
    report({ kind: 'init-failed', reason: describeError(err) })
    return
  }

  const loop = new EventLoop(logger)
  const queue = new TaskQueue((err) => {
    logger.error({ err }, 'queued action failed')
  })
  const runQueue = (): void => {
    void queue.drainAndRunAll()
  }

  const engine = new DirectoryEngine({
    service,
    loop,
    settings: init.settings,
    schedule: scheduleUntilTerminated(loop, queue),
    onDiscovered: (ok, identities) => {
      report({ kind: 'discovered', ok, identities })
    },
    logger,
  })

  const toAction = (request: BridgeRequest): QueuedAction => {
    switch (request.kind) {
      case 'discover':
        return () => engine.discover()
      case 'register':
        return async () => {
          const ok = await engine.register(request.identity, request.leaseSeconds)
          report({ kind: 'completed', requestId: request.requestId, ok })
        }
      case 'deregister':
        return async () => {
          const ok = await engine.deregister(request.identity)
          report({ kind: 'completed', requestId: request.requestId, ok })
        }
      case 'terminate':
        return () => {
          logger.info('terminate requested')
          loop.terminate()
        }
    }
  }

  loop.addWakeable(requestWake, () => {
    requestWake.drain()
    for (const request of requests.receiveAll()) {
      queue.enqueue(toAction(request))
    }
    runQueue()
  })

  report({ kind: 'ready' })
  logger.info({ backend: init.service.backend }, 'bridge worker running')
  await loop.run()

  // Let the action that terminated the loop, and anything queued behind
  // it, finish before the state it uses goes away.
  await queue.drainAndRunAll()
  engine.close()
  try {
    await service.close?.()
  } catch (err) {
    logger.error({ err }, 'error closing directory service')
  }
  loop.removeWakeable(requestWake)

  // Timers still armed here were leaked by the engine; close() cancels them
  // only after they are counted.
  report({ kind: 'stopped', pendingTimers: loop.pendingTimers, wakeables: loop.wakeableCount })
  loop.close()
  requests.close()
  requestWake.close()
  logger.info('bridge worker stopped')
}
