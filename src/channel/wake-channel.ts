/**
 * WakeChannel: an intra-process notification primitive.
 *
 * One end of a MessageChannel. signal() posts a single byte to the other
 * end, interrupting that loop's wait; the woken side drains whatever bytes
 * have piled up. Wakeups may coalesce, which is fine because every wake
 * leads to a drain-until-empty of the matching task channel.
 */

import { receiveMessageOnPort, type MessagePort } from 'node:worker_threads'
import type { Wakeable } from '../loop/index.js'

const WAKE_BYTE = 0x61

export class WakeChannel implements Wakeable {
  private closed = false
  private listener: (() => void) | null = null

  constructor(private readonly port: MessagePort) {
    port.once('close', () => {
      this.closed = true
    })
  }

  /**
   * Wake the other end. Callable from the thread owning this end at any
   * time; once the channel is closed this is a no-op.
   */
  signal(): void {
    if (this.closed) return
    this.port.postMessage(Uint8Array.of(WAKE_BYTE))
  }

  /** Read and discard every pending wake byte without blocking. */
  drain(): number {
    let count = 0
    while (receiveMessageOnPort(this.port) !== undefined) {
      count++
    }
    return count
  }

  listen(onReady: () => void): void {
    this.unlisten()
    const listener = (): void => onReady()
    this.listener = listener
    this.port.on('message', listener)
  }

  unlisten(): void {
    if (this.listener === null) return
    this.port.off('message', this.listener)
    this.listener = null
    // an idle end must not keep its thread alive
    this.port.unref()
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** Close both ends. Safe to call repeatedly. */
  close(): void {
    if (this.closed) return
    this.unlisten()
    this.closed = true
    this.port.close()
  }
}

