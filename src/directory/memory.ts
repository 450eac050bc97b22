import { Type, type Static } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import type {
  CallStatus,
  DirectoryEntry,
  DirectoryService,
  FindResult,
  RegisterResult,
} from '../types/directory.js'

export const MemoryDirectoryOptionsSchema = Type.Object({
  /** Entries that are always found, as if registered by other peers */
  seed: Type.Array(
    Type.Object({
      identity: Type.String({ minLength: 1 }),
      leaseSeconds: Type.Integer({ minimum: 0, maximum: 65535 }),
    }),
    { default: [] },
  ),
  /** Advertised minimum refresh interval, 0 for none */
  minRefreshSeconds: Type.Integer({ minimum: 0, maximum: 65535, default: 0 }),
})

export type MemoryDirectoryOptions = Static<typeof MemoryDirectoryOptionsSchema>

/**
 * Process-local directory. Registrations made through it are found by its
 * own findServices(); nothing leaves the process.
 */
export class MemoryDirectory implements DirectoryService {
  private readonly registered = new Map<string, number>()
  private readonly seed: DirectoryEntry[]
  private readonly minRefreshSeconds: number

  constructor(options: Partial<MemoryDirectoryOptions> = {}) {
    this.seed = options.seed ?? []
    this.minRefreshSeconds = options.minRefreshSeconds ?? 0
  }

  findServices(): FindResult {
    const entries = [...this.seed]
    for (const [identity, leaseSeconds] of this.registered) {
      entries.push({ identity, leaseSeconds })
    }
    return { entries }
  }

  register(identity: string, leaseSeconds: number): RegisterResult {
    this.registered.set(identity, leaseSeconds)
    return { grantedLeaseSeconds: leaseSeconds }
  }

  deregister(identity: string): CallStatus {
    this.registered.delete(identity)
    return {}
  }

  minRefreshInterval(): number {
    return this.minRefreshSeconds
  }
}

/**
 * Validate `service.options` for the memory backend.
 * @throws Error listing the offending fields
 */
export function parseMemoryOptions(options: Record<string, unknown>): MemoryDirectoryOptions {
  const candidate: unknown = { seed: [], minRefreshSeconds: 0, ...options }
  if (!Value.Check(MemoryDirectoryOptionsSchema, candidate)) {
    const details = [...Value.Errors(MemoryDirectoryOptionsSchema, candidate)]
      .map((e) => `${e.path}: ${e.message}`)
      .join(', ')
    throw new Error(`Invalid memory directory options: ${details}`)
  }
  return candidate
}
