import { MessageChannel, type MessagePort } from 'node:worker_threads'

/**
 * Two entangled ports. One end stays with the creating thread; the other is
 * handed to the worker, which wraps it as a WakeChannel or TaskChannel.
 */
export function createPortPair(): [MessagePort, MessagePort] {
  const { port1, port2 } = new MessageChannel()
  return [port1, port2]
}
