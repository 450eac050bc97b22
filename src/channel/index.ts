export { WakeChannel } from './wake-channel.js'
export { TaskQueue } from './task-queue.js'
export type { QueuedAction } from './task-queue.js'
export { TaskChannel } from './task-channel.js'
export { createPortPair } from './ports.js'
export {
  BridgeRequestSchema,
  type BridgeRequest,
  BridgeCompletionSchema,
  type BridgeCompletion,
  type WorkerReport,
} from './protocol.js'
