import { Type, type Static } from '@sinclair/typebox'

/** Log levels accepted by the pino loggers */
export const LogLevel = Type.Union([
  Type.Literal('fatal'),
  Type.Literal('error'),
  Type.Literal('warn'),
  Type.Literal('info'),
  Type.Literal('debug'),
  Type.Literal('trace'),
  Type.Literal('silent'),
])
export type LogLevel = Static<typeof LogLevel>

/** Which DirectoryService implementation the worker opens */
export const DirectoryBackend = Type.Union([
  Type.Literal('memory'),
  Type.Literal('bonjour'),
  Type.Literal('module'),
])
export type DirectoryBackend = Static<typeof DirectoryBackend>

export const ServiceSpecSchema = Type.Object({
  backend: DirectoryBackend,
  /** Path or package name of a module exporting createDirectoryService (backend "module") */
  module: Type.Optional(Type.String({ minLength: 1 })),
  options: Type.Record(Type.String(), Type.Unknown(), { default: {} }),
})
export type ServiceSpec = Static<typeof ServiceSpecSchema>

/** Bridge configuration schema for bridge.config.json */
export const BridgeConfigSchema = Type.Object({
  discovery: Type.Object({
    refreshSeconds: Type.Integer({ minimum: 1, maximum: 65535, default: 60 }),
  }),
  registration: Type.Object({
    minLeaseSeconds: Type.Integer({ minimum: 1, maximum: 65535, default: 5 }),
    renewalMarginSeconds: Type.Integer({ minimum: 0, maximum: 65535, default: 2 }),
  }),
  service: ServiceSpecSchema,
  logging: Type.Object({
    level: LogLevel,
  }),
})

export type BridgeConfig = Static<typeof BridgeConfigSchema>

/** The part of the configuration the worker thread needs to run the engine */
export type EngineSettings = BridgeConfig['discovery'] & BridgeConfig['registration']
