/**
 * DirectoryEngine: discovery and lease-renewed registration state machine.
 *
 * Lives on the worker thread only. Every entry point is reached through
 * the worker's TaskQueue, including timer fires (see `schedule`), so the
 * registration map, the refresh timer and the DirectoryService handle
 * are only ever touched by one serialized writer.
 */

import type { Logger } from '../logging/index.js'
import type { QueuedAction } from '../channel/index.js'
import { TimerSlot, type EventLoop } from '../loop/index.js'
import type { EngineSettings } from '../types/config.js'
import type {
  CallStatus,
  DirectoryEntry,
  DirectoryService,
  MaybePromise,
} from '../types/directory.js'
import {
  clampLease,
  isCallOk,
  isUsableLease,
  nextDiscoveryDelaySeconds,
  renewalDelaySeconds,
} from './lease.js'

interface RegistrationEntry {
  readonly identity: string
  leaseSeconds: number
  /** Cleared while the renewal itself is running */
  readonly renewal: TimerSlot
}

export interface RegistrationSnapshot {
  identity: string
  leaseSeconds: number
  renewalArmed: boolean
}

export interface DirectoryEngineOptions {
  service: DirectoryService
  loop: EventLoop
  settings: EngineSettings
  /** Puts timer-driven work on the same queue as requests */
  schedule: (action: QueuedAction) => void
  /** Receives the outcome of every discovery run, requested or automatic */
  onDiscovered: (ok: boolean, identities: string[]) => void
  logger: Logger
}

export class DirectoryEngine {
  private readonly entries = new Map<string, RegistrationEntry>()
  private readonly refresh: TimerSlot
  private readonly service: DirectoryService
  private readonly loop: EventLoop
  private readonly settings: EngineSettings
  private readonly schedule: (action: QueuedAction) => void
  private readonly onDiscovered: (ok: boolean, identities: string[]) => void
  private readonly logger: Logger

  constructor(options: DirectoryEngineOptions) {
    this.service = options.service
    this.loop = options.loop
    this.settings = options.settings
    this.schedule = options.schedule
    this.onDiscovered = options.onDiscovered
    this.logger = options.logger
    this.refresh = new TimerSlot(options.loop)
  }

  /**
   * Run discovery now and arm the next automatic run.
   * At most one refresh timer exists afterwards.
   */
  async discover(): Promise<void> {
    this.refresh.clear()

    const result = await this.invoke('findServices', () => this.service.findServices())
    const ok = result !== null && this.checkStatus('finding services', result)
    const entries: DirectoryEntry[] = result?.entries ?? []

    const delaySeconds = nextDiscoveryDelaySeconds(
      this.settings.refreshSeconds,
      ok ? entries : null,
    )
    this.logger.info({ delaySeconds, found: entries.length, ok }, 'next discovery scheduled')
    this.refresh.arm(delaySeconds * 1000, () => {
      this.schedule(() => this.discoveryTriggered())
    })

    this.onDiscovered(ok, entries.map((entry) => entry.identity))
  }

  /** Called when the refresh timer fires; the slot has already let go of it. */
  async discoveryTriggered(): Promise<void> {
    this.logger.debug('automatic discovery run')
    await this.discover()
  }

  /**
   * Register an identity, or update its lease.
   *
   * Re-registering with the lease already on record reports success
   * without calling the facility.
   */
  async register(identity: string, requestedSeconds: number): Promise<boolean> {
    const serviceMinimum = (await this.invoke('minRefreshInterval', () => this.service.minRefreshInterval())) ?? 0
    const leaseSeconds = clampLease(requestedSeconds, this.settings.minLeaseSeconds, serviceMinimum)
    if (leaseSeconds !== requestedSeconds) {
      this.logger.info(
        { identity, requestedSeconds, leaseSeconds, serviceMinimum },
        'lease raised to minimum',
      )
    }

    let entry = this.entries.get(identity)
    if (entry) {
      if (entry.leaseSeconds === leaseSeconds) {
        this.logger.info({ identity, leaseSeconds }, 'lease matches current registration, ignoring update')
        return true
      }
      entry.renewal.clear()
      entry.leaseSeconds = leaseSeconds
    } else {
      entry = { identity, leaseSeconds, renewal: new TimerSlot(this.loop) }
      this.entries.set(identity, entry)
    }

    return this.performRegistration(entry)
  }

  /**
   * Drop the local entry (and its renewal timer) first, then deregister
   * with the facility whether or not an entry existed.
   */
  async deregister(identity: string): Promise<boolean> {
    const entry = this.entries.get(identity)
    if (entry) {
      this.logger.info({ identity }, 'removing registration')
      entry.renewal.clear()
      this.entries.delete(identity)
    }

    const result = await this.invoke('deregister', () => this.service.deregister(identity))
    return result !== null && this.checkStatus('deregistering service', result)
  }

  /** Renewal timer path. A no-op when the identity was deregistered meanwhile. */
  async renewalTriggered(identity: string): Promise<void> {
    const entry = this.entries.get(identity)
    if (!entry) {
      this.logger.debug({ identity }, 'renewal for unknown identity, ignoring')
      return
    }
    this.logger.info({ identity }, 'renewing registration')
    await this.performRegistration(entry)
  }

  /** Cancel every timer and forget all registration and discovery state. */
  close(): void {
    this.refresh.clear()
    for (const entry of this.entries.values()) {
      entry.renewal.clear()
    }
    this.entries.clear()
  }

  registrations(): RegistrationSnapshot[] {
    return [...this.entries.values()].map((entry) => ({
      identity: entry.identity,
      leaseSeconds: entry.leaseSeconds,
      renewalArmed: entry.renewal.armed,
    }))
  }

  get refreshArmed(): boolean {
    return this.refresh.armed
  }

  /** Register with the facility and arm the renewal, whatever the outcome. */
  private async performRegistration(entry: RegistrationEntry): Promise<boolean> {
    const { identity, leaseSeconds } = entry
    const result = await this.invoke('register', () => this.service.register(identity, leaseSeconds))
    const ok = result !== null && this.checkStatus('registering service', result)

    const granted = result?.grantedLeaseSeconds
    let grantedSeconds = leaseSeconds
    if (isUsableLease(granted)) {
      grantedSeconds = granted
    } else if (granted !== undefined) {
      this.logger.warn({ identity, granted, leaseSeconds }, 'ignoring unusable granted lease')
    }
    const delaySeconds = renewalDelaySeconds(grantedSeconds, this.settings.renewalMarginSeconds)
    this.logger.info({ identity, grantedSeconds, delaySeconds, ok }, 'next registration scheduled')
    entry.renewal.arm(delaySeconds * 1000, () => {
      this.schedule(() => this.renewalTriggered(identity))
    })
    return ok
  }

  private checkStatus(action: string, status: CallStatus): boolean {
    if (status.submitError !== undefined) {
      this.logger.warn({ code: status.submitError }, `error ${action}`)
    }
    if (status.callbackError !== undefined) {
      this.logger.warn({ code: status.callbackError }, `error ${action}`)
    }
    return isCallOk(status)
  }

  /** Run one facility call; a throw or rejection becomes null. */
  private async invoke<T>(operation: string, call: () => MaybePromise<T>): Promise<T | null> {
    try {
      return await call()
    } catch (err) {
      this.logger.error({ err, operation }, 'directory service call failed')
      return null
    }
  }
}
