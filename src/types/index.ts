// Configuration
export {
  BridgeConfigSchema,
  ServiceSpecSchema,
  DirectoryBackend,
  LogLevel,
} from './config.js'
export type { BridgeConfig, ServiceSpec, EngineSettings } from './config.js'

// External directory facility
export type {
  MaybePromise,
  CallStatus,
  DirectoryEntry,
  FindResult,
  RegisterResult,
  DirectoryService,
  DirectoryServiceFactory,
} from './directory.js'
