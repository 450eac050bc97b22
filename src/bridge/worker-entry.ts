/**
 * Entry module for the bridge worker thread.
 */

import { workerData } from 'node:worker_threads'
import { createLogger } from '../logging/index.js'
import { openDirectoryService } from '../directory/index.js'
import { runBridgeWorker } from './worker.js'
import { isWorkerInit } from './types.js'

if (!isWorkerInit(workerData)) {
  throw new Error('bridge worker: invalid workerData')
}

const logger = createLogger(workerData.logLevel, 'bridge-worker')

runBridgeWorker(workerData, { openService: openDirectoryService, logger }).catch((err: unknown) => {
  logger.fatal({ err }, 'bridge worker crashed')
  process.exitCode = 1
})
