/**
 * EventLoop: a single-threaded cooperative loop adapter.
 *
 * Wraps Node's event loop for one thread with the operations the bridge
 * needs: wakeable registration, one-shot timers with cancellable handles,
 * and run-until-terminated. One instance per thread; an instance is never
 * touched from another thread.
 */

import type { Logger } from '../logging/index.js'

/** Something another thread can poke to interrupt this loop. */
export interface Wakeable {
  listen(onReady: () => void): void
  unlisten(): void
}

/** Opaque handle returned by registerSingleTimer. */
export interface TimerHandle {
  readonly id: number
}

/** Keeps the thread alive while run() is pending; fires roughly once a day. */
const KEEPALIVE_MS = 24 * 60 * 60 * 1000

export class EventLoop {
  private readonly timers = new Map<number, ReturnType<typeof setTimeout>>()
  private readonly wakeables = new Set<Wakeable>()
  private nextTimerId = 1
  private terminated = false
  private keepalive: ReturnType<typeof setInterval> | null = null
  private running: Promise<void> | null = null
  private resolveRun: (() => void) | null = null

  constructor(private readonly logger: Logger) {}

  /**
   * Run until terminate() is called. Resolves immediately when the loop
   * was terminated before run() started.
   */
  run(): Promise<void> {
    if (this.running) return this.running
    if (this.terminated) {
      this.running = Promise.resolve()
      return this.running
    }

    this.running = new Promise<void>((resolve) => {
      this.resolveRun = resolve
    })
    this.keepalive = setInterval(() => {}, KEEPALIVE_MS)
    return this.running
  }

  /**
   * Stop dispatching and resolve run(). Timers still armed stay counted,
   * and never fire, until their owner cancels them or close() is called.
   * Registered wakeables stay registered until their owner removes them.
   */
  terminate(): void {
    if (this.terminated) return
    this.terminated = true

    if (this.keepalive) {
      clearInterval(this.keepalive)
      this.keepalive = null
    }
    this.resolveRun?.()
    this.resolveRun = null
  }

  /** Terminate, then cancel every timer still armed. */
  close(): void {
    this.terminate()
    for (const timer of this.timers.values()) {
      clearTimeout(timer)
    }
    this.timers.clear()
  }

  get isTerminated(): boolean {
    return this.terminated
  }

  /** Register a wakeable; onData runs on this loop whenever it fires. */
  addWakeable(wakeable: Wakeable, onData: () => void): void {
    if (this.wakeables.has(wakeable)) return
    this.wakeables.add(wakeable)
    wakeable.listen(() => {
      if (this.terminated) return
      this.invoke('wakeable', onData)
    })
  }

  removeWakeable(wakeable: Wakeable): void {
    if (!this.wakeables.delete(wakeable)) return
    wakeable.unlisten()
  }

  /**
   * Register a one-shot timer. The handle is forgotten before the callback
   * runs, so cancelling from inside the callback is a no-op.
   */
  registerSingleTimer(delayMs: number, callback: () => void): TimerHandle {
    const id = this.nextTimerId++
    if (this.terminated) {
      this.logger.debug({ delayMs }, 'timer registered on a terminated loop, ignoring')
      return { id }
    }

    const timer = setTimeout(() => {
      this.timers.delete(id)
      if (this.terminated) return
      this.invoke('timer', callback)
    }, delayMs)
    this.timers.set(id, timer)
    return { id }
  }

  /** Cancel a timer. Safe when it already fired or was cancelled. */
  cancelTimer(handle: TimerHandle): void {
    const timer = this.timers.get(handle.id)
    if (timer === undefined) return
    clearTimeout(timer)
    this.timers.delete(handle.id)
  }

  get pendingTimers(): number {
    return this.timers.size
  }

  get wakeableCount(): number {
    return this.wakeables.size
  }

  private invoke(source: 'timer' | 'wakeable', callback: () => void): void {
    try {
      callback()
    } catch (err) {
      this.logger.error({ err, source }, 'event loop callback threw')
    }
  }
}
