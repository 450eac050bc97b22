/**
 * `discovery-bridge discover` -- one discovery run through the bridge.
 *
 * Starts the worker, asks for a discovery, prints the identities it
 * reports and shuts the bridge down again.
 */

import type { Command } from 'commander'
import { DirectoryBridge } from '../../bridge/index.js'
import { createLogger } from '../../logging/index.js'
import { EventLoop } from '../../loop/index.js'
import { loadCommandConfig, type BridgeCommandDeps } from '../bridge-session.js'
import { output } from '../output.js'

type DiscoveryOutcome =
  | { kind: 'result'; ok: boolean; identities: string[] }
  | { kind: 'timeout' }

export function registerDiscoverCommand(program: Command, deps: BridgeCommandDeps = {}): void {
  program
    .command('discover')
    .description('Run one discovery and list the identities found')
    .option('-c, --config <path>', 'configuration file path', 'bridge.config.json')
    .option('-t, --timeout <ms>', 'how long to wait for the result in milliseconds', '10000')
    .action(async (options: { config: string; timeout: string }) => {
      const timeoutMs = parseInt(options.timeout, 10)
      if (isNaN(timeoutMs) || timeoutMs < 100) {
        output.error('Timeout must be at least 100ms')
        process.exit(1)
        return
      }

      const config = loadCommandConfig(options.config)
      if (!config) return

      const logger = createLogger(config.logging.level, 'cli')
      const host = new EventLoop(logger)
      let deliver: ((ok: boolean, identities: string[]) => void) | null = null
      const bridge = new DirectoryBridge({
        host,
        config,
        logger,
        launcher: deps.launcher,
        onDiscovery: (ok, identities) => deliver?.(ok, identities),
      })

      if (!(await bridge.initialize()) || !bridge.start()) {
        output.error(`Bridge failed to start with backend "${config.service.backend}"`)
        process.exit(1)
        return
      }

      const outcome = await new Promise<DiscoveryOutcome>((resolve) => {
        const timer = setTimeout(() => resolve({ kind: 'timeout' }), timeoutMs)
        deliver = (ok, identities) => {
          clearTimeout(timer)
          resolve({ kind: 'result', ok, identities })
        }
        bridge.discover()
      })
      deliver = null

      await bridge.shutdown()
      host.close()

      if (outcome.kind === 'timeout') {
        output.error(`No discovery result within ${timeoutMs}ms`)
        process.exit(1)
        return
      }
      if (!outcome.ok) {
        output.error('Discovery failed, see the log for the service error')
        process.exit(1)
        return
      }
      if (outcome.identities.length === 0) {
        output.info('No identities found')
        return
      }
      output.list(outcome.identities)
      output.info(`Found ${outcome.identities.length} identity(ies)`)
    })
}
