export {
  MemoryDirectory,
  MemoryDirectoryOptionsSchema,
  parseMemoryOptions,
} from './memory.js'
export type { MemoryDirectoryOptions } from './memory.js'

export {
  BonjourDirectory,
  BonjourDirectoryOptionsSchema,
  parseBonjourOptions,
} from './bonjour.js'
export type { BonjourDirectoryOptions } from './bonjour.js'

export { openDirectoryService, isDirectoryService } from './open.js'
