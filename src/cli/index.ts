#!/usr/bin/env node
import { Command } from 'commander'
import { registerInitCommand } from './commands/init.js'
import { registerDiscoverCommand } from './commands/discover.js'
import { registerAdvertiseCommand } from './commands/advertise.js'

const program = new Command()

program
  .name('discovery-bridge')
  .description('Run directory discovery and lease-renewed registration on a worker thread')
  .version('0.1.0')

registerInitCommand(program)
registerDiscoverCommand(program)
registerAdvertiseCommand(program)

export { program }

await program.parseAsync()
