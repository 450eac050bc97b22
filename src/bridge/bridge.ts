/**
 * DirectoryBridge: host-side surface of the discovery/registration bridge.
 *
 * Requests go out as messages on the request channel followed by a wake
 * signal; the worker answers on the completion channel. Caller callbacks
 * only ever run on the host loop, from inside the completion drain, and
 * never synchronously from the call that supplied them.
 *
 * Lifecycle: created -> initialized -> running -> stopping -> joined,
 * or failed when initialization fails or the worker dies.
 */

import { createLogger, type Logger } from '../logging/index.js'
import type { EventLoop } from '../loop/index.js'
import {
  BridgeCompletionSchema,
  BridgeRequestSchema,
  TaskChannel,
  TaskQueue,
  WakeChannel,
  createPortPair,
  type BridgeCompletion,
  type BridgeRequest,
  type WorkerReport,
} from '../channel/index.js'
import { MAX_LEASE_SECONDS } from '../engine/index.js'
import type { BridgeConfig } from '../types/config.js'
import { workerThreadLauncher } from './launcher.js'
import type { BridgeThread, ThreadLauncher } from './types.js'

export type BridgeState = 'created' | 'initialized' | 'running' | 'stopping' | 'joined' | 'failed'

/** Receives every discovery result, requested or automatic. */
export type DiscoveryCallback = (ok: boolean, identities: string[]) => void

/** Receives the outcome of one register or deregister request. */
export type CompletionCallback = (ok: boolean) => void

export interface DirectoryBridgeOptions {
  /** The caller's loop; completions are delivered on it */
  host: EventLoop
  config: BridgeConfig
  onDiscovery?: DiscoveryCallback
  /** Defaults to a real worker thread */
  launcher?: ThreadLauncher
  logger?: Logger
}

interface HostChannels {
  requests: TaskChannel<typeof BridgeRequestSchema>
  requestWake: WakeChannel
  completions: TaskChannel<typeof BridgeCompletionSchema>
  completionWake: WakeChannel
}

type InitOutcome = { ok: true } | { ok: false; reason: string }

export class DirectoryBridge {
  private state: BridgeState = 'created'
  private readonly host: EventLoop
  private readonly config: BridgeConfig
  private readonly onDiscovery?: DiscoveryCallback
  private readonly launcher: ThreadLauncher
  private readonly logger: Logger
  private readonly queue: TaskQueue
  private readonly pending = new Map<number, CompletionCallback>()
  private nextRequestId = 1
  private channels: HostChannels | null = null
  private thread: BridgeThread | null = null
  private initializing: Promise<boolean> | null = null
  private stopRequested = false
  private settleInit: ((outcome: InitOutcome) => void) | null = null
  private report: WorkerReport | null = null

  constructor(options: DirectoryBridgeOptions) {
    this.host = options.host
    this.config = options.config
    this.onDiscovery = options.onDiscovery
    this.logger = options.logger ?? createLogger(options.config.logging.level, 'bridge')
    this.launcher = options.launcher ?? workerThreadLauncher(this.logger)
    this.queue = new TaskQueue((err) => {
      this.logger.error({ err }, 'completion callback threw')
    })
  }

  get currentState(): BridgeState {
    return this.state
  }

  /**
   * Acquire the channels, register the host end with the host loop and
   * launch the worker, which opens the DirectoryService on its own thread.
   * Resolves false, with nothing left open, when any step fails.
   */
  initialize(): Promise<boolean> {
    if (this.state === 'initialized' || this.state === 'running') return Promise.resolve(true)
    if (this.initializing) return this.initializing
    if (this.state !== 'created') {
      this.logger.warn({ state: this.state }, 'initialize called in the wrong state')
      return Promise.resolve(false)
    }

    this.initializing = this.acquire().finally(() => {
      this.initializing = null
    })
    return this.initializing
  }

  /** Allow requests. Fails unless initialize() succeeded. */
  start(): boolean {
    if (this.state !== 'initialized') {
      this.logger.warn({ state: this.state }, 'start called before a successful initialize')
      return false
    }
    this.state = 'running'
    return true
  }

  /**
   * Trigger discovery. The result arrives later through the discovery
   * callback. Returns false when no callback was configured.
   */
  discover(): boolean {
    if (!this.onDiscovery) {
      this.logger.warn(
        'attempted to run discovery but no discovery callback was configured, this is a programming error',
      )
      return false
    }
    if (this.state !== 'running') {
      this.logger.warn({ state: this.state }, 'discover called while the bridge is not running')
      return false
    }
    this.send({ kind: 'discover' })
    return true
  }

  /**
   * Register an identity with the given lease, renewing it automatically
   * until deregistered.
   */
  register(onComplete: CompletionCallback, identity: string, leaseSeconds: number): void {
    if (!this.accepts('register', identity, onComplete)) return
    if (!Number.isFinite(leaseSeconds)) {
      this.logger.warn({ identity, leaseSeconds }, 'rejecting registration with a non-numeric lease')
      this.failLater(onComplete)
      return
    }

    const lease = Math.min(Math.max(0, Math.trunc(leaseSeconds)), MAX_LEASE_SECONDS)
    this.send({ kind: 'register', requestId: this.track(onComplete), identity, leaseSeconds: lease })
  }

  deregister(onComplete: CompletionCallback, identity: string): void {
    if (!this.accepts('deregister', identity, onComplete)) return
    this.send({ kind: 'deregister', requestId: this.track(onComplete), identity })
  }

  /**
   * Ask the worker loop to terminate and wake it so it notices at once.
   * Requests sent earlier still run first. While initialize() is pending the
   * request is held and sent once the worker reports ready.
   */
  stop(): void {
    if (this.initializing) {
      this.stopRequested = true
      return
    }
    this.requestTerminate()
  }

  /**
   * Wait for the worker thread to exit, deliver the completions it left
   * behind, then release the host side. Resolves with the worker's final
   * resource counts when it reported them.
   */
  async join(): Promise<WorkerReport | null> {
    if (this.initializing) await this.initializing
    if (this.thread) {
      await this.thread.join()
      this.thread = null
    }
    this.onCompletionsReady()
    await this.queue.drainAndRunAll()
    this.failPending()
    await this.queue.drainAndRunAll()
    this.release()
    if (this.state !== 'failed') this.state = 'joined'
    return this.report
  }

  /** stop() followed by join(). */
  async shutdown(): Promise<WorkerReport | null> {
    this.stop()
    return this.join()
  }

  get pendingRequests(): number {
    return this.pending.size
  }

  private async acquire(): Promise<boolean> {
    const [requestsHost, requestsWorker] = createPortPair()
    const [requestWakeHost, requestWakeWorker] = createPortPair()
    const [completionsHost, completionsWorker] = createPortPair()
    const [completionWakeHost, completionWakeWorker] = createPortPair()

    const onInvalid = (value: unknown): void => {
      this.logger.warn({ value }, 'dropping malformed message')
    }
    const channels: HostChannels = {
      requests: new TaskChannel(requestsHost, BridgeRequestSchema, onInvalid),
      requestWake: new WakeChannel(requestWakeHost),
      completions: new TaskChannel(completionsHost, BridgeCompletionSchema, onInvalid),
      completionWake: new WakeChannel(completionWakeHost),
    }
    this.channels = channels
    this.host.addWakeable(channels.completionWake, () => this.onCompletionsReady())

    const settled = new Promise<InitOutcome>((resolve) => {
      this.settleInit = resolve
    })

    let thread: BridgeThread
    try {
      thread = this.launcher({
        settings: { ...this.config.discovery, ...this.config.registration },
        service: this.config.service,
        logLevel: this.config.logging.level,
        ports: {
          requests: requestsWorker,
          requestWake: requestWakeWorker,
          completions: completionsWorker,
          completionWake: completionWakeWorker,
        },
      })
    } catch (err) {
      this.logger.error({ err }, 'error launching bridge worker')
      this.settleInit = null
      this.release()
      this.state = 'failed'
      return false
    }
    this.thread = thread

    const exitedEarly = thread.join().then(
      (): InitOutcome => ({ ok: false, reason: 'worker exited during initialization' }),
    )
    const outcome = await Promise.race([settled, exitedEarly])
    this.settleInit = null

    if (!outcome.ok) {
      this.logger.error({ reason: outcome.reason }, 'bridge initialization failed')
      await thread.join()
      this.thread = null
      this.release()
      this.state = 'failed'
      return false
    }

    void thread.join().then(() => this.onWorkerExit())
    this.state = 'initialized'
    if (this.stopRequested) this.requestTerminate()
    return true
  }

  private requestTerminate(): void {
    if (this.state !== 'running' && this.state !== 'initialized') return
    this.state = 'stopping'
    this.send({ kind: 'terminate' })
  }

  private onWorkerExit(): void {
    if (this.state !== 'initialized' && this.state !== 'running') return
    this.logger.error('bridge worker exited unexpectedly')
    this.state = 'failed'
    this.onCompletionsReady()
    void this.queue.drainAndRunAll().then(() => this.failPending())
  }

  /** Host wake handler: move every completion onto the host queue and run it. */
  private onCompletionsReady(): void {
    const channels = this.channels
    if (!channels) return
    channels.completionWake.drain()
    for (const completion of channels.completions.receiveAll()) {
      this.queue.enqueue(() => this.deliver(completion))
    }
    void this.queue.drainAndRunAll()
  }

  private deliver(completion: BridgeCompletion): void {
    switch (completion.kind) {
      case 'ready':
        this.settleInit?.({ ok: true })
        return
      case 'init-failed':
        this.settleInit?.({ ok: false, reason: completion.reason })
        return
      case 'discovered':
        this.onDiscovery?.(completion.ok, completion.identities)
        return
      case 'completed': {
        const callback = this.pending.get(completion.requestId)
        if (!callback) {
          this.logger.warn({ requestId: completion.requestId }, 'completion for unknown request')
          return
        }
        this.pending.delete(completion.requestId)
        callback(completion.ok)
        return
      }
      case 'stopped':
        this.report = {
          pendingTimers: completion.pendingTimers,
          wakeables: completion.wakeables,
        }
        return
    }
  }

  private accepts(operation: string, identity: string, onComplete: CompletionCallback): boolean {
    if (this.state !== 'running') {
      this.logger.warn({ operation, identity, state: this.state }, 'request while the bridge is not running')
      this.failLater(onComplete)
      return false
    }
    if (identity.length === 0) {
      this.logger.warn({ operation }, 'rejecting request with an empty identity')
      this.failLater(onComplete)
      return false
    }
    return true
  }

  private track(onComplete: CompletionCallback): number {
    const requestId = this.nextRequestId++
    this.pending.set(requestId, onComplete)
    return requestId
  }

  private send(request: BridgeRequest): void {
    const channels = this.channels
    if (!channels) return
    channels.requests.send(request)
    channels.requestWake.signal()
  }

  /** Report failure on the host queue, after the current call has returned. */
  private failLater(onComplete: CompletionCallback): void {
    queueMicrotask(() => {
      this.queue.enqueue(() => onComplete(false))
      void this.queue.drainAndRunAll()
    })
  }

  /** Requests the worker will never answer complete with false. */
  private failPending(): void {
    for (const callback of this.pending.values()) {
      this.queue.enqueue(() => callback(false))
    }
    this.pending.clear()
    void this.queue.drainAndRunAll()
  }

  /** Unregister and close the host ends. Safe to repeat. */
  private release(): void {
    const channels = this.channels
    if (!channels) return
    this.channels = null
    this.host.removeWakeable(channels.completionWake)
    channels.requests.close()
    channels.requestWake.close()
    channels.completions.close()
    channels.completionWake.close()
  }
}
