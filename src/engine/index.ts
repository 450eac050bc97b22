export { DirectoryEngine } from './engine.js'
export type { DirectoryEngineOptions, RegistrationSnapshot } from './engine.js'
export {
  clampLease,
  renewalDelaySeconds,
  nextDiscoveryDelaySeconds,
  isCallOk,
  isUsableLease,
  MAX_LEASE_SECONDS,
  MIN_TIMER_SECONDS,
} from './lease.js'
