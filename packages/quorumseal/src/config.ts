/**
 * Configuration loading, validation, and defaults for quorumseal.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigurationError } from './errors.js'
import type { ConfigDefaults, QuorumSealConfig, ThresholdMismatchMode } from './types.js'

/** File name of the configuration inside the config directory. */
export const CONFIG_FILE_NAME = 'config.json'

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'quorumseal')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'quorumseal')
  }
  return path.join(os.homedir(), '.config', 'quorumseal')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): QuorumSealConfig {
  return {
    version: 1,
    defaults: {
      sign: false,
      strict: false,
      allFiles: false,
      thresholdMismatch: 'prompt',
    },
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isThresholdMismatchMode(value: unknown): value is ThresholdMismatchMode {
  return value === 'prompt' || value === 'use-file' || value === 'abort'
}

function readBoolean(defaults: Record<string, unknown>, key: keyof ConfigDefaults, fallback: boolean): boolean {
  const value = defaults[key]
  if (value === undefined) {
    return fallback
  }
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`Config defaults.${key} must be a boolean`, `defaults.${key}`)
  }
  return value
}

/**
 * Validate an unknown value as a QuorumSealConfig, throwing on invalid
 * structure. Missing defaults take their built-in values.
 */
export function validateConfig(config: unknown): QuorumSealConfig {
  if (!isObject(config)) {
    throw new ConfigurationError('Config must be an object', 'config')
  }

  if (config.version !== 1) {
    throw new ConfigurationError('Config version must be 1', 'version')
  }

  const fallback = defaultConfig().defaults
  const raw = config.defaults ?? {}
  if (!isObject(raw)) {
    throw new ConfigurationError('Config defaults must be an object', 'defaults')
  }

  const thresholdMismatch = raw.thresholdMismatch ?? fallback.thresholdMismatch
  if (!isThresholdMismatchMode(thresholdMismatch)) {
    throw new ConfigurationError(
      "Config defaults.thresholdMismatch must be 'prompt', 'use-file' or 'abort'",
      'defaults.thresholdMismatch',
    )
  }

  const defaults: ConfigDefaults = {
    sign: readBoolean(raw, 'sign', fallback.sign),
    strict: readBoolean(raw, 'strict', fallback.strict),
    allFiles: readBoolean(raw, 'allFiles', fallback.allFiles),
    thresholdMismatch,
  }

  if (raw.shareDir !== undefined) {
    if (typeof raw.shareDir !== 'string' || raw.shareDir.trim() === '') {
      throw new ConfigurationError(
        'Config defaults.shareDir must be a non-empty string',
        'defaults.shareDir',
      )
    }
    defaults.shareDir = raw.shareDir
  }

  return { version: 1, defaults }
}

/**
 * Load the quorumseal config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 */
export async function loadConfig(configDir?: string): Promise<QuorumSealConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, CONFIG_FILE_NAME)

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    return defaultConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigurationError(`Failed to parse config file at ${configPath}`, 'config')
  }

  return validateConfig(parsed)
}
