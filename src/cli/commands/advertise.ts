import type { Command } from 'commander'
import { DirectoryBridge, type CompletionCallback } from '../../bridge/index.js'
import { createLogger } from '../../logging/index.js'
import { EventLoop } from '../../loop/index.js'
import { loadCommandConfig, waitForSignal, type BridgeCommandDeps } from '../bridge-session.js'
import { output } from '../output.js'

function completion(send: (done: CompletionCallback) => void): Promise<boolean> {
  return new Promise<boolean>((resolve) => send(resolve))
}

/**
 * Register the `advertise` command on the Commander program.
 *
 * Registers every identity and keeps the leases renewed until the process
 * is interrupted, then deregisters them and stops the bridge.
 */
export function registerAdvertiseCommand(program: Command, deps: BridgeCommandDeps = {}): void {
  program
    .command('advertise')
    .description('Register identities and keep them renewed until interrupted')
    .argument('<identity...>', 'identities to register')
    .option('-c, --config <path>', 'configuration file path', 'bridge.config.json')
    .option('-l, --lease <seconds>', 'requested lease in seconds', '60')
    .action(async (identities: string[], options: { config: string; lease: string }) => {
      const leaseSeconds = parseInt(options.lease, 10)
      if (isNaN(leaseSeconds) || leaseSeconds < 0 || leaseSeconds > 65535) {
        output.error('Lease must be between 0 and 65535 seconds')
        process.exit(1)
        return
      }

      const config = loadCommandConfig(options.config)
      if (!config) return

      const logger = createLogger(config.logging.level, 'cli')
      const host = new EventLoop(logger)
      const bridge = new DirectoryBridge({ host, config, logger, launcher: deps.launcher })

      if (!(await bridge.initialize()) || !bridge.start()) {
        output.error(`Bridge failed to start with backend "${config.service.backend}"`)
        process.exit(1)
        return
      }

      const registered = await Promise.all(
        identities.map((identity) =>
          completion((done) => bridge.register(done, identity, leaseSeconds)),
        ),
      )
      output.table(
        ['IDENTITY', 'LEASE', 'STATUS'],
        identities.map((identity, i) => [
          identity,
          String(leaseSeconds),
          registered[i] ? 'registered' : 'failed, retrying',
        ]),
      )
      output.info('Advertising, press Ctrl+C to stop')

      await (deps.untilShutdown ?? waitForSignal)()

      const removed = await Promise.all(
        identities.map((identity) => completion((done) => bridge.deregister(done, identity))),
      )
      const failures = identities.filter((_, i) => !removed[i])
      for (const identity of failures) {
        output.warn(`Could not deregister ${identity}`)
      }

      await bridge.shutdown()
      host.close()
      output.info(`Deregistered ${identities.length - failures.length} identity(ies), bridge stopped`)
    })
}
