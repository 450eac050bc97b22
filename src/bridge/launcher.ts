import { Worker } from 'node:worker_threads'
import { silentLogger, type Logger } from '../logging/index.js'
import { openDirectoryService } from '../directory/index.js'
import type { ServiceSpec } from '../types/config.js'
import type { DirectoryService } from '../types/directory.js'
import { runBridgeWorker } from './worker.js'
import type { BridgeThread, ThreadLauncher, WorkerInit } from './types.js'

const DEFAULT_ENTRY = new URL('./worker-entry.js', import.meta.url)

/**
 * Launch the worker half on a real worker thread. The worker's ports are
 * transferred with workerData; the entry module opens the service there.
 */
export function workerThreadLauncher(logger: Logger, entry: URL = DEFAULT_ENTRY): ThreadLauncher {
  return (init: WorkerInit): BridgeThread => {
    const { ports } = init
    const worker = new Worker(entry, {
      workerData: init,
      transferList: [ports.requests, ports.requestWake, ports.completions, ports.completionWake],
    })
    worker.on('error', (err) => {
      logger.error({ err }, 'bridge worker thread failed')
    })
    const exited = new Promise<void>((resolve) => {
      worker.once('exit', (code) => {
        if (code !== 0) logger.warn({ code }, 'bridge worker thread exited with non-zero code')
        resolve()
      })
    })
    return { join: () => exited }
  }
}

export interface InProcessLauncherOptions {
  openService?: (spec: ServiceSpec) => Promise<DirectoryService>
  logger?: Logger
}

/**
 * Run the worker half on the calling thread. The two halves still talk
 * only through their channels; this is for embedding and tests where
 * the DirectoryService never blocks.
 */
export function inProcessLauncher(options: InProcessLauncherOptions = {}): ThreadLauncher {
  return (init: WorkerInit): BridgeThread => {
    const done = runBridgeWorker(init, {
      openService: options.openService ?? openDirectoryService,
      logger: options.logger ?? silentLogger(),
    })
    return { join: () => done }
  }
}
