import { existsSync, writeFileSync } from 'node:fs'
import type { Command } from 'commander'
import { DEFAULT_CONFIG } from '../../config/index.js'
import type { BridgeConfig } from '../../types/config.js'
import { output } from '../output.js'

const BONJOUR_STARTER_OPTIONS = {
  type: 'discovery-bridge',
  port: 7400,
  browseMs: 2000,
  defaultLeaseSeconds: 120,
}

/**
 * Register the `init` command on the Commander program.
 *
 * Writes a starter bridge.config.json for the chosen backend.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Write a starter bridge configuration')
    .option('-o, --output <path>', 'output file path', 'bridge.config.json')
    .option('-b, --backend <name>', 'directory backend: memory or bonjour', 'memory')
    .action((options: { output: string; backend: string }) => {
      const configPath = options.output

      if (options.backend !== 'memory' && options.backend !== 'bonjour') {
        output.error(`Unknown backend "${options.backend}", expected memory or bonjour`)
        process.exit(1)
        return
      }

      if (existsSync(configPath)) {
        output.warn(`Configuration file already exists: ${configPath}`)
        output.warn('Use a different path with --output or remove the existing file.')
        process.exit(1)
        return
      }

      const starterConfig: BridgeConfig = {
        discovery: DEFAULT_CONFIG.discovery,
        registration: DEFAULT_CONFIG.registration,
        service:
          options.backend === 'bonjour'
            ? { backend: 'bonjour', options: BONJOUR_STARTER_OPTIONS }
            : { backend: 'memory', options: { seed: [], minRefreshSeconds: 0 } },
        logging: DEFAULT_CONFIG.logging,
      }

      writeFileSync(configPath, JSON.stringify(starterConfig, null, 2) + '\n')
      output.info(`Configuration written to ${configPath}`)
      output.info('Review the service section, then run: discovery-bridge discover')
    })
}
