import { describe, it, expect } from 'vitest'
import {
  MAX_LEASE_SECONDS,
  clampLease,
  isCallOk,
  isUsableLease,
  nextDiscoveryDelaySeconds,
  renewalDelaySeconds,
} from './lease.js'

describe('clampLease', () => {
  it('raises a short request to the floor', () => {
    expect(clampLease(1, 5, 0)).toBe(5)
  })

  it('raises to the service minimum when it is larger', () => {
    expect(clampLease(10, 5, 20)).toBe(20)
  })

  it('keeps a request above both minimums', () => {
    expect(clampLease(30, 5, 20)).toBe(30)
  })

  it('treats a zero service minimum as none', () => {
    expect(clampLease(7, 5, 0)).toBe(7)
  })

  it('drops fractions and caps at the 16-bit maximum', () => {
    expect(clampLease(7.9, 5, 0)).toBe(7)
    expect(clampLease(70000, 5, 0)).toBe(MAX_LEASE_SECONDS)
  })
})

describe('renewalDelaySeconds', () => {
  it('renews the margin plus one second before expiry', () => {
    expect(renewalDelaySeconds(30, 2)).toBe(27)
  })

  it('never goes below one second', () => {
    expect(renewalDelaySeconds(3, 2)).toBe(1)
    expect(renewalDelaySeconds(1, 2)).toBe(1)
  })
})

describe('nextDiscoveryDelaySeconds', () => {
  it('follows the shortest lease among the results', () => {
    const entries = [
      { identity: 'A', leaseSeconds: 10 },
      { identity: 'B', leaseSeconds: 30 },
    ]
    expect(nextDiscoveryDelaySeconds(60, entries)).toBe(10)
  })

  it('uses the refresh interval when every lease is longer', () => {
    expect(nextDiscoveryDelaySeconds(60, [{ identity: 'A', leaseSeconds: 90 }])).toBe(60)
  })

  it('uses the refresh interval for empty and failed runs', () => {
    expect(nextDiscoveryDelaySeconds(60, [])).toBe(60)
    expect(nextDiscoveryDelaySeconds(60, null)).toBe(60)
  })

  it('never goes below one second', () => {
    expect(nextDiscoveryDelaySeconds(60, [{ identity: 'A', leaseSeconds: 0 }])).toBe(1)
  })

  it('skips entries whose lease is not a finite number', () => {
    const entries = [
      { identity: 'A', leaseSeconds: Number.NaN },
      { identity: 'B', leaseSeconds: Number.NEGATIVE_INFINITY },
      { identity: 'C', leaseSeconds: 45 },
    ]
    expect(nextDiscoveryDelaySeconds(60, entries)).toBe(45)
  })
})

describe('isUsableLease', () => {
  it('accepts whole seconds within 1..65535', () => {
    expect(isUsableLease(1)).toBe(true)
    expect(isUsableLease(MAX_LEASE_SECONDS)).toBe(true)
  })

  it('rejects missing, fractional, non-finite and out-of-range values', () => {
    expect(isUsableLease(undefined)).toBe(false)
    expect(isUsableLease(0)).toBe(false)
    expect(isUsableLease(2.5)).toBe(false)
    expect(isUsableLease(Number.NaN)).toBe(false)
    expect(isUsableLease(Number.POSITIVE_INFINITY)).toBe(false)
    expect(isUsableLease(MAX_LEASE_SECONDS + 1)).toBe(false)
  })
})

describe('isCallOk', () => {
  it('needs both the submission and the confirmation to be clear', () => {
    expect(isCallOk({})).toBe(true)
    expect(isCallOk({ submitError: 'queue full' })).toBe(false)
    expect(isCallOk({ callbackError: 'name conflict' })).toBe(false)
    expect(isCallOk({ submitError: 'queue full', callbackError: 'name conflict' })).toBe(false)
  })
})
