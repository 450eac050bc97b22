/**
 * BonjourDirectory: DirectoryService over mDNS/DNS-SD via bonjour-service.
 *
 * findServices browses for `browseMs` and reports every instance name seen,
 * each with `defaultLeaseSeconds` (mDNS does not expose record TTLs here).
 * register publishes the identity as an instance name; a repeat call for a
 * published identity only refreshes the lease, since mDNS keeps announcing
 * on its own. A publish error surfaces as the confirmation error of the
 * next call for that identity.
 */

import { Bonjour, type Service } from 'bonjour-service'
import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type {
  CallStatus,
  DirectoryService,
  FindResult,
  RegisterResult,
} from '../types/directory.js'

export const BonjourDirectoryOptionsSchema = Type.Object({
  type: Type.String({ minLength: 1, default: 'discovery-bridge' }),
  port: Type.Integer({ minimum: 1, maximum: 65535 }),
  browseMs: Type.Integer({ minimum: 100, default: 2000 }),
  defaultLeaseSeconds: Type.Integer({ minimum: 1, maximum: 65535, default: 120 }),
})

export type BonjourDirectoryOptions = Static<typeof BonjourDirectoryOptionsSchema>

interface Published {
  service: Service
  error?: string
}

export class BonjourDirectory implements DirectoryService {
  private readonly bonjour: Bonjour
  private readonly published = new Map<string, Published>()

  constructor(private readonly options: BonjourDirectoryOptions) {
    this.bonjour = new Bonjour()
  }

  findServices(): Promise<FindResult> {
    return new Promise<FindResult>((resolve) => {
      const found = new Set<string>()
      const browser = this.bonjour.find({ type: this.options.type }, (service: Service) => {
        found.add(service.name)
      })

      setTimeout(() => {
        browser.stop()
        resolve({
          entries: [...found].map((identity) => ({
            identity,
            leaseSeconds: this.options.defaultLeaseSeconds,
          })),
        })
      }, this.options.browseMs)
    })
  }

  register(identity: string, leaseSeconds: number): RegisterResult {
    const existing = this.published.get(identity)
    if (existing) {
      return { grantedLeaseSeconds: leaseSeconds, callbackError: existing.error }
    }

    const record: Published = {
      service: this.bonjour.publish({
        name: identity,
        type: this.options.type,
        port: this.options.port,
      }),
    }
    record.service.on('error', (err: Error) => {
      record.error = err.message
    })
    this.published.set(identity, record)
    return { grantedLeaseSeconds: leaseSeconds }
  }

  deregister(identity: string): Promise<CallStatus> {
    const record = this.published.get(identity)
    if (!record) return Promise.resolve({})
    this.published.delete(identity)

    return new Promise<CallStatus>((resolve) => {
      // bonjour-service attaches stop() to published services at runtime
      const stop: unknown = record.service.stop
      if (typeof stop !== 'function') {
        resolve({ submitError: 'published service has no stop()' })
        return
      }
      stop.call(record.service, () => resolve({ callbackError: record.error }))
    })
  }

  minRefreshInterval(): number {
    return 0
  }

  /** Unpublish everything (sending goodbye packets) and release the sockets. */
  close(): Promise<void> {
    this.published.clear()
    return new Promise<void>((resolve) => {
      this.bonjour.unpublishAll(() => {
        this.bonjour.destroy()
        resolve()
      })
    })
  }
}

/**
 * Validate `service.options` for the bonjour backend.
 * @throws Error listing the offending fields
 */
export function parseBonjourOptions(options: Record<string, unknown>): BonjourDirectoryOptions {
  const candidate: unknown = {
    type: 'discovery-bridge',
    browseMs: 2000,
    defaultLeaseSeconds: 120,
    ...options,
  }
  if (!Value.Check(BonjourDirectoryOptionsSchema, candidate)) {
    const details = [...Value.Errors(BonjourDirectoryOptionsSchema, candidate)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ')
    throw new Error(`Invalid bonjour directory options: ${details}`)
  }
  return candidate
}
