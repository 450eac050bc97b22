import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest'
import { silentLogger } from '../logging/index.js'
import { EventLoop } from '../loop/index.js'
import { TaskQueue } from '../channel/index.js'
import type {
  CallStatus,
  DirectoryService,
  FindResult,
  MaybePromise,
  RegisterResult,
} from '../types/directory.js'
import { DirectoryEngine } from './engine.js'

class FakeDirectory implements DirectoryService {
  findServices = vi.fn((): MaybePromise<FindResult> => ({ entries: [] }))
  register = vi.fn(
    (_identity: string, leaseSeconds: number): MaybePromise<RegisterResult> => ({
      grantedLeaseSeconds: leaseSeconds,
    }),
  )
  deregister = vi.fn((_identity: string): MaybePromise<CallStatus> => ({}))
  minRefreshInterval = vi.fn((): MaybePromise<number> => 0)
}

describe('DirectoryEngine', () => {
  let loop: EventLoop
  let queue: TaskQueue
  let service: FakeDirectory
  let onDiscovered: Mock<(ok: boolean, identities: string[]) => void>
  let onError: Mock<(err: unknown) => void>
  let engine: DirectoryEngine

  beforeEach(() => {
    vi.useFakeTimers()
    const logger = silentLogger()
    loop = new EventLoop(logger)
    onError = vi.fn<(err: unknown) => void>()
    queue = new TaskQueue(onError)
    service = new FakeDirectory()
    onDiscovered = vi.fn<(ok: boolean, identities: string[]) => void>()
    engine = new DirectoryEngine({
      service,
      loop,
      settings: { refreshSeconds: 60, minLeaseSeconds: 5, renewalMarginSeconds: 2 },
      schedule: (action) => {
        queue.enqueue(action)
        void queue.drainAndRunAll()
      },
      onDiscovered,
      logger,
    })
  })

  afterEach(() => {
    expect(onError).not.toHaveBeenCalled()
    engine.close()
    loop.close()
    vi.useRealTimers()
  })

  describe('discover', () => {
    it('reports the identities and schedules the next run at the shortest lease', async () => {
      service.findServices.mockReturnValue({
        entries: [
          { identity: 'A', leaseSeconds: 10 },
          { identity: 'B', leaseSeconds: 30 },
        ],
      })

      await engine.discover()
      expect(onDiscovered).toHaveBeenCalledWith(true, ['A', 'B'])
      expect(engine.refreshArmed).toBe(true)

      await vi.advanceTimersByTimeAsync(9_999)
      expect(service.findServices).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(1)
      expect(service.findServices).toHaveBeenCalledTimes(2)
      expect(onDiscovered).toHaveBeenCalledTimes(2)
    })

    it('keeps at most one refresh timer across repeated runs', async () => {
      await engine.discover()
      await engine.discover()
      await engine.discover()
      expect(loop.pendingTimers).toBe(1)
    })

    it('falls back to the refresh interval when the service reports an error', async () => {
      service.findServices.mockReturnValue({
        entries: [{ identity: 'A', leaseSeconds: 10 }],
        callbackError: 'browse failed',
      })

      await engine.discover()
      expect(onDiscovered).toHaveBeenCalledWith(false, ['A'])

      await vi.advanceTimersByTimeAsync(10_000)
      expect(service.findServices).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(50_000)
      expect(service.findServices).toHaveBeenCalledTimes(2)
    })

    it('reports failure with no identities when the call throws', async () => {
      service.findServices.mockImplementation(() => {
        throw new Error('socket closed')
      })

      await engine.discover()
      expect(onDiscovered).toHaveBeenCalledWith(false, [])
      expect(engine.refreshArmed).toBe(true)
    })

    it('accepts asynchronous results', async () => {
      service.findServices.mockResolvedValue({ entries: [{ identity: 'C', leaseSeconds: 40 }] })

      await engine.discover()
      expect(onDiscovered).toHaveBeenCalledWith(true, ['C'])
    })

    it('ignores malformed leases in discovery results', async () => {
      service.findServices.mockReturnValue({
        entries: [
          { identity: 'A', leaseSeconds: Number.NaN },
          { identity: 'B', leaseSeconds: 30 },
        ],
      })

      await engine.discover()
      await vi.advanceTimersByTimeAsync(29_999)
      expect(service.findServices).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(1)
      expect(service.findServices).toHaveBeenCalledTimes(2)
    })
  })

  describe('register', () => {
    it('raises a short lease to the configured floor', async () => {
      expect(await engine.register('A', 1)).toBe(true)
      expect(service.register).toHaveBeenCalledWith('A', 5)
      expect(engine.registrations()).toEqual([
        { identity: 'A', leaseSeconds: 5, renewalArmed: true },
      ])
    })

    it('raises the lease to the service minimum when larger', async () => {
      service.minRefreshInterval.mockReturnValue(20)
      await engine.register('A', 10)
      expect(service.register).toHaveBeenCalledWith('A', 20)
    })

    it('renews before the granted lease runs out', async () => {
      await engine.register('A', 30)

      await vi.advanceTimersByTimeAsync(26_999)
      expect(service.register).toHaveBeenCalledTimes(1)

      await vi.advanceTimersByTimeAsync(1)
      expect(service.register).toHaveBeenCalledTimes(2)
      expect(service.register).toHaveBeenLastCalledWith('A', 30)
      expect(engine.registrations()[0].renewalArmed).toBe(true)
    })

    it('schedules renewal from the lease the service granted', async () => {
      service.register.mockReturnValue({ grantedLeaseSeconds: 10 })
      await engine.register('A', 30)

      await vi.advanceTimersByTimeAsync(7_000)
      expect(service.register).toHaveBeenCalledTimes(2)
    })

    it.each([Number.NaN, 3_000_000, 0, 12.5])(
      'renews from the stored lease when the service grants %s',
      async (granted) => {
        service.register.mockReturnValue({ grantedLeaseSeconds: granted })
        await engine.register('A', 30)

        await vi.advanceTimersByTimeAsync(100)
        expect(service.register).toHaveBeenCalledTimes(1)

        await vi.advanceTimersByTimeAsync(26_899)
        expect(service.register).toHaveBeenCalledTimes(1)

        await vi.advanceTimersByTimeAsync(1)
        expect(service.register).toHaveBeenCalledTimes(2)
      },
    )

    it('skips the service call when the lease is unchanged', async () => {
      await engine.register('A', 30)
      expect(await engine.register('A', 30)).toBe(true)
      expect(service.register).toHaveBeenCalledTimes(1)
      expect(loop.pendingTimers).toBe(1)
    })

    it('updates the entry in place when the lease changes', async () => {
      await engine.register('A', 30)
      await engine.register('A', 40)

      expect(service.register).toHaveBeenCalledTimes(2)
      expect(service.register).toHaveBeenLastCalledWith('A', 40)
      expect(engine.registrations()).toEqual([
        { identity: 'A', leaseSeconds: 40, renewalArmed: true },
      ])
      expect(loop.pendingTimers).toBe(1)
    })

    it('fails when either status carries an error but keeps renewing', async () => {
      service.register.mockReturnValueOnce({ submitError: 'not submitted' })
      expect(await engine.register('A', 30)).toBe(false)

      service.register.mockReturnValueOnce({ callbackError: 'conflict' })
      expect(await engine.register('B', 30)).toBe(false)

      expect(engine.registrations().map((r) => r.renewalArmed)).toEqual([true, true])

      await vi.advanceTimersByTimeAsync(27_000)
      expect(service.register).toHaveBeenCalledTimes(4)
    })

    it('fails when the service throws and renews from the requested lease', async () => {
      service.register.mockRejectedValueOnce(new Error('daemon gone'))
      expect(await engine.register('A', 10)).toBe(false)

      await vi.advanceTimersByTimeAsync(7_000)
      expect(service.register).toHaveBeenCalledTimes(2)
    })
  })

  describe('deregister', () => {
    it('cancels the renewal so a forced fire afterwards does nothing', async () => {
      await engine.register('A', 30)
      expect(await engine.deregister('A')).toBe(true)

      expect(service.deregister).toHaveBeenCalledWith('A')
      expect(engine.registrations()).toEqual([])
      expect(loop.pendingTimers).toBe(0)

      await engine.renewalTriggered('A')
      await vi.advanceTimersByTimeAsync(60_000)
      expect(service.register).toHaveBeenCalledTimes(1)
    })

    it('still asks the service for an identity it never registered', async () => {
      expect(await engine.deregister('ghost')).toBe(true)
      expect(service.deregister).toHaveBeenCalledWith('ghost')
    })

    it('reports a confirmation error as failure', async () => {
      service.deregister.mockReturnValue({ callbackError: 'unknown name' })
      expect(await engine.deregister('A')).toBe(false)
    })
  })

  describe('close', () => {
    it('cancels every timer and forgets all entries', async () => {
      await engine.register('A', 30)
      await engine.register('B', 30)
      await engine.discover()
      expect(loop.pendingTimers).toBe(3)

      engine.close()
      expect(loop.pendingTimers).toBe(0)
      expect(engine.registrations()).toEqual([])
      expect(engine.refreshArmed).toBe(false)
    })
  })
})
