export * from './types/index.js'
export { loadConfig, resolveConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js'
export { createLogger, silentLogger } from './logging/index.js'
export type { Logger } from './logging/index.js'
export { EventLoop, TimerSlot } from './loop/index.js'
export type { Wakeable, TimerHandle } from './loop/index.js'
export { WakeChannel, TaskQueue, TaskChannel, createPortPair } from './channel/index.js'
export type { QueuedAction, BridgeRequest, BridgeCompletion, WorkerReport } from './channel/index.js'
export {
  DirectoryEngine,
  clampLease,
  renewalDelaySeconds,
  nextDiscoveryDelaySeconds,
  isCallOk,
} from './engine/index.js'
export type { RegistrationSnapshot } from './engine/index.js'
export {
  MemoryDirectory,
  BonjourDirectory,
  openDirectoryService,
  isDirectoryService,
} from './directory/index.js'
export {
  DirectoryBridge,
  inProcessLauncher,
  workerThreadLauncher,
} from './bridge/index.js'
export type {
  BridgeState,
  CompletionCallback,
  DiscoveryCallback,
  DirectoryBridgeOptions,
  ThreadLauncher,
} from './bridge/index.js'
