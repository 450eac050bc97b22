import type { BridgeConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: BridgeConfig = {
  discovery: {
    refreshSeconds: 60,
  },
  registration: {
    minLeaseSeconds: 5,
    renewalMarginSeconds: 2,
  },
  service: {
    backend: 'memory',
    options: {},
  },
  logging: {
    level: 'info',
  },
}
