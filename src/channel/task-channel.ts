/**
 * TaskChannel: one direction of cross-thread work.
 *
 * Messages are posted on one end of a MessageChannel and polled on the
 * other with receiveMessageOnPort, so the producer never blocks and the
 * consumer only reads when its wake channel fires. The polled end never
 * gets a 'message' listener; delivery is strictly FIFO.
 */

import { receiveMessageOnPort, type MessagePort } from 'node:worker_threads'
import type { Static, TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'

export class TaskChannel<S extends TSchema> {
  private closed = false

  constructor(
    private readonly port: MessagePort,
    private readonly schema: S,
    private readonly onInvalid: (value: unknown) => void,
  ) {
    port.once('close', () => {
      this.closed = true
    })
  }

  send(message: Static<S>): void {
    if (this.closed) return
    this.port.postMessage(message)
  }

  /** Take every message currently available, oldest first. */
  receiveAll(): Array<Static<S>> {
    const received: Array<Static<S>> = []
    for (;;) {
      const next = receiveMessageOnPort(this.port)
      if (next === undefined) return received
      const message: unknown = next.message
      if (Value.Check(this.schema, message)) {
        received.push(message)
      } else {
        this.onInvalid(message)
      }
    }
  }

  get isClosed(): boolean {
    return this.closed
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    this.port.close()
  }
}

