import { MessagePort } from 'node:worker_threads'
import { Type } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { LogLevel, ServiceSpecSchema, type EngineSettings, type ServiceSpec } from '../types/config.js'

/** The worker's ends of the four channels. */
export interface WorkerPorts {
  /** Polled end of the host -> worker task channel */
  requests: MessagePort
  /** Woken by the host after it sends requests */
  requestWake: MessagePort
  /** Sending end of the worker -> host task channel */
  completions: MessagePort
  /** Signalled by the worker after it sends completions */
  completionWake: MessagePort
}

/** Everything a worker thread starts from; sent as workerData. */
export interface WorkerInit {
  settings: EngineSettings
  service: ServiceSpec
  logLevel: LogLevel
  ports: WorkerPorts
}

/** Handle on a launched worker thread. */
export interface BridgeThread {
  /** Resolves once the thread has exited. Never rejects. */
  join(): Promise<void>
}

export type ThreadLauncher = (init: WorkerInit) => BridgeThread

const WorkerSettingsSchema = Type.Object({
  settings: Type.Object({
    refreshSeconds: Type.Integer({ minimum: 1 }),
    minLeaseSeconds: Type.Integer({ minimum: 1 }),
    renewalMarginSeconds: Type.Integer({ minimum: 0 }),
  }),
  service: ServiceSpecSchema,
  logLevel: LogLevel,
})

function isPortSet(value: unknown): value is WorkerPorts {
  if (value === null || typeof value !== 'object') return false
  return (['requests', 'requestWake', 'completions', 'completionWake'] as const).every(
    (name) => Reflect.get(value, name) instanceof MessagePort,
  )
}

/** Validate the workerData a worker thread was started with. */
export function isWorkerInit(value: unknown): value is WorkerInit {
  if (!Value.Check(WorkerSettingsSchema, value)) return false
  return isPortSet(Reflect.get(value, 'ports'))
}
