import type { CallStatus, DirectoryEntry } from '../types/directory.js'

/** Leases travel as unsigned 16-bit second counts. */
export const MAX_LEASE_SECONDS = 65535

/** Timers never fire sooner than this, whatever the lease arithmetic says. */
export const MIN_TIMER_SECONDS = 1

/** True when neither the submission nor the confirmation reported an error. */
export function isCallOk(status: CallStatus): boolean {
  return status.submitError === undefined && status.callbackError === undefined
}

/**
 * True for a lease the timers can be driven from: whole seconds within
 * 1..MAX_LEASE_SECONDS. Grants reported by a facility are checked with
 * this before they schedule anything.
 */
export function isUsableLease(seconds: number | undefined): seconds is number {
  return (
    seconds !== undefined &&
    Number.isInteger(seconds) &&
    seconds >= MIN_TIMER_SECONDS &&
    seconds <= MAX_LEASE_SECONDS
  )
}

/**
 * Raise a requested lease to the configured floor, then to the facility's
 * advertised minimum refresh interval when it has one (0 means none).
 */
export function clampLease(
  requestedSeconds: number,
  floorSeconds: number,
  serviceMinimumSeconds: number,
): number {
  let lease = Math.max(Math.trunc(requestedSeconds), floorSeconds)
  if (serviceMinimumSeconds !== 0 && lease < serviceMinimumSeconds) {
    lease = serviceMinimumSeconds
  }
  return Math.min(lease, MAX_LEASE_SECONDS)
}

/**
 * Seconds until a registration must be renewed: the margin plus one more
 * second ahead of expiry, so the renewal call itself has time to land.
 */
export function renewalDelaySeconds(grantedSeconds: number, marginSeconds: number): number {
  return Math.max(MIN_TIMER_SECONDS, grantedSeconds - marginSeconds - 1)
}

/**
 * Seconds until the next automatic discovery run: the tightest lease among
 * the results, never later than the configured refresh interval. A failed
 * run (entries === null) falls back to the refresh interval.
 *
 * Every peer seeing the same results converges on the same cadence.
 */
export function nextDiscoveryDelaySeconds(
  refreshSeconds: number,
  entries: readonly DirectoryEntry[] | null,
): number {
  let delay = refreshSeconds
  if (entries !== null) {
    for (const entry of entries) {
      // a malformed lease says nothing about when the entry expires
      if (!Number.isFinite(entry.leaseSeconds)) continue
      delay = Math.min(delay, entry.leaseSeconds)
    }
  }
  return Math.max(MIN_TIMER_SECONDS, Math.trunc(delay))
}
