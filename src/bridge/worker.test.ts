import { describe, it, expect, afterEach, vi } from 'vitest'
import { silentLogger } from '../logging/index.js'
import { EventLoop } from '../loop/index.js'
import { TaskQueue } from '../channel/index.js'
import { scheduleUntilTerminated } from './worker.js'

describe('scheduleUntilTerminated', () => {
  const loop = new EventLoop(silentLogger())
  const onError = vi.fn<(err: unknown) => void>()
  const queue = new TaskQueue(onError)

  afterEach(() => {
    expect(onError).not.toHaveBeenCalled()
  })

  it('runs actions while the loop is live', async () => {
    const schedule = scheduleUntilTerminated(new EventLoop(silentLogger()), queue)
    const action = vi.fn()

    schedule(action)
    await queue.drainAndRunAll()
    expect(action).toHaveBeenCalledTimes(1)
  })

  it('drops actions still queued when the loop terminates', async () => {
    let openGate: () => void = () => undefined
    const gate = new Promise<void>((resolve) => {
      openGate = resolve
    })
    queue.enqueue(() => gate)
    const draining = queue.drainAndRunAll()

    const schedule = scheduleUntilTerminated(loop, queue)
    const renewal = vi.fn()
    schedule(renewal)
    expect(queue.size).toBe(1)

    loop.terminate()
    schedule(renewal)
    expect(queue.size).toBe(1)

    openGate()
    await draining
    expect(renewal).not.toHaveBeenCalled()
    expect(queue.size).toBe(0)
  })
})
