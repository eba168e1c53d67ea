export * from './protocol/index.js'
export * from './storage/index.js'
export * from './worker/index.js'
export * from './client/index.js'
export { loadConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js'
export { LarderConfigSchema, type LarderConfig } from './types/index.js'
