import type { EventLoop, TimerHandle } from './event-loop.js'

/**
 * Holds at most one armed timer. Arming again cancels the previous timer,
 * so a slot can never leak a second pending callback.
 */
export class TimerSlot {
  private handle: TimerHandle | null = null

  constructor(private readonly loop: EventLoop) {}

  arm(delayMs: number, callback: () => void): void {
    this.clear()
    this.handle = this.loop.registerSingleTimer(delayMs, () => {
      this.handle = null
      callback()
    })
  }

  clear(): void {
    if (this.handle === null) return
    this.loop.cancelTimer(this.handle)
    this.handle = null
  }

  get armed(): boolean {
    return this.handle !== null
  }
}
