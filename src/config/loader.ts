import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { LarderConfigSchema, type LarderConfig } from '../types/config.js'
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

const ENV_PREFIX = 'LARDER_'

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
 * Environment variables are always strings; numeric and boolean strings
 * become numbers and booleans.
 */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

/**
 * Find the key in an object that matches case-insensitively, so that
 * LARDER_STORAGE__BUSYTIMEOUTMS lands on `busyTimeoutMs`.
 */
function findCaseInsensitiveKey(obj: Record<string, unknown>, key: string): string {
  const lowerKey = key.toLowerCase()
  for (const k of Object.keys(obj)) {
    if (k.toLowerCase() === lowerKey) return k
  }
  return key
}

function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj
  for (const segment of path.slice(0, -1)) {
    const resolvedKey = findCaseInsensitiveKey(current, segment)
    const next = current[resolvedKey]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[resolvedKey] = created
      current = created
    }
  }
  current[findCaseInsensitiveKey(current, path[path.length - 1])] = value
}

/**
 * Apply LARDER_ prefixed environment variable overrides.
 * Double underscores (__) indicate nested paths:
 *   LARDER_WORKER__DEBUG=true -> config.worker.debug = true
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

function readConfigFile(configPath: string): Record<string, unknown> {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }

  if (!isRecord(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Load, validate, and return a frozen LarderConfig.
 *
 * Pipeline: read file (when a path is given) -> merge defaults
 *           -> apply env overrides -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to larder.config.json; defaults and environment only when omitted
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath?: string): LarderConfig {
  const userConfig = configPath === undefined ? {} : readConfigFile(configPath)

  // Round-trip through JSON so defaults are never shared or mutated
  const merged: unknown = JSON.parse(JSON.stringify(deepMerge(DEFAULT_CONFIG, userConfig)))
  const config = applyEnvOverrides(isRecord(merged) ? merged : {})

  if (!Value.Check(LarderConfigSchema, config)) {
    const fields = [...Value.Errors(LarderConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  return deepFreeze(config)
}
