import { loadConfig, ConfigError } from '../config/index.js'
import type { ThreadLauncher } from '../bridge/index.js'
import type { BridgeConfig } from '../types/config.js'
import { output } from './output.js'

/** Seams the bridge commands accept so they can run without a worker thread. */
export interface BridgeCommandDeps {
  launcher?: ThreadLauncher
  /** Resolves when the command should wind down; defaults to SIGINT/SIGTERM */
  untilShutdown?: () => Promise<void>
}

/**
 * Load the configuration for a command. On a ConfigError the message is
 * printed, the process exit code set to 1, and null returned.
 */
export function loadCommandConfig(configPath: string): BridgeConfig | null {
  try {
    return loadConfig(configPath)
  } catch (err) {
    if (err instanceof ConfigError) {
      output.error(err.message)
      process.exit(1)
      return null
    }
    throw err
  }
}

/** Resolves on the first SIGINT or SIGTERM, then removes both handlers. */
export function waitForSignal(): Promise<void> {
  return new Promise<void>((resolve) => {
    const onSignal = (): void => {
      process.off('SIGINT', onSignal)
      process.off('SIGTERM', onSignal)
      resolve()
    }
    process.on('SIGINT', onSignal)
    process.on('SIGTERM', onSignal)
  })
}
