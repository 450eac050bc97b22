export { DirectoryBridge } from './bridge.js'
export type {
  BridgeState,
  CompletionCallback,
  DiscoveryCallback,
  DirectoryBridgeOptions,
} from './bridge.js'
export { runBridgeWorker } from './worker.js'
export type { WorkerRuntimeOptions } from './worker.js'
export { workerThreadLauncher, inProcessLauncher } from './launcher.js'
export type { InProcessLauncherOptions } from './launcher.js'
export { isWorkerInit } from './types.js'
export type { BridgeThread, ThreadLauncher, WorkerInit, WorkerPorts } from './types.js'
