export { loadConfig, resolveConfig, ConfigError } from './loader.js'
export { DEFAULT_CONFIG } from './defaults.js'
