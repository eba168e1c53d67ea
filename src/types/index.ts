// Configuration
export { LarderConfigSchema, JournalModeSchema } from './config.js'
export type { LarderConfig } from './config.js'
