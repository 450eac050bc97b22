import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { BridgeConfigSchema, type BridgeConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

const ENV_PREFIX = 'BRIDGE_'

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

/**
 * Coerce string values to appropriate types.
 * Environment variables are always strings.
 */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

/**
 * Find the actual key in an object that matches the given key case-insensitively.
 * Env var names lose their camelCase, so `REFRESHSECONDS` must find `refreshSeconds`.
 */
function findCaseInsensitiveKey(obj: Record<string, unknown>, key: string): string {
  const lowerKey = key.toLowerCase()
  for (const k of Object.keys(obj)) {
    if (k.toLowerCase() === lowerKey) return k
  }
  return key
}

function setNestedValue(
  obj: Record<string, unknown>,
  path: string[],
  value: unknown,
): void {
  let current = obj
  for (let i = 0; i < path.length - 1; i++) {
    const resolvedKey = findCaseInsensitiveKey(current, path[i])
    const next = current[resolvedKey]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[resolvedKey] = created
      current = created
    }
  }
  const finalKey = findCaseInsensitiveKey(current, path[path.length - 1])
  current[finalKey] = value
}

/**
 * Apply BRIDGE_ prefixed environment variable overrides to config.
 * Double underscores (__) indicate nested paths:
 *   BRIDGE_DISCOVERY__REFRESHSECONDS=30 -> config.discovery.refreshSeconds = 30
 */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = key.slice(ENV_PREFIX.length).toLowerCase().split('__')
    setNestedValue(config, path, coerceValue(value))
  }
  return config
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

/**
 * Merge a user configuration object over the defaults, apply environment
 * overrides, validate and freeze it.
 *
 * @throws ConfigError with field-level details on validation failure
 */
export function resolveConfig(userConfig: Record<string, unknown>): BridgeConfig {
  // Deep clone so the frozen result never shares objects with DEFAULT_CONFIG
  const merged: unknown = JSON.parse(JSON.stringify(deepMerge({ ...DEFAULT_CONFIG }, userConfig)))
  const config = applyEnvOverrides(isRecord(merged) ? merged : {})

  if (!Value.Check(BridgeConfigSchema, config)) {
    const fields = [...Value.Errors(BridgeConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  const { minLeaseSeconds, renewalMarginSeconds } = config.registration
  if (minLeaseSeconds <= renewalMarginSeconds + 1) {
    throw new ConfigError(
      `registration.minLeaseSeconds (${minLeaseSeconds}) must exceed renewalMarginSeconds + 1 (${renewalMarginSeconds + 1})`,
      [{ path: '/registration/minLeaseSeconds', message: 'must exceed renewalMarginSeconds + 1' }],
    )
  }

  if (config.service.backend === 'module' && config.service.module === undefined) {
    throw new ConfigError(
      'service.module is required when service.backend is "module"',
      [{ path: '/service/module', message: 'required for backend "module"' }],
    )
  }

  return deepFreeze(config)
}

/**
 * Load, validate, and return a frozen BridgeConfig.
 *
 * Pipeline: read file -> parse JSON -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> cross-field checks -> freeze
 *
 * @param configPath - Path to bridge.config.json
 */
export function loadConfig(configPath: string): BridgeConfig {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let userConfig: unknown
  try {
    userConfig = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }

  if (!isRecord(userConfig)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }

  return resolveConfig(userConfig)
}
