/**
 * Individual preflight checks for the runtime capabilities quorumseal uses.
 */

import * as crypto from 'node:crypto'
import { loadConfig } from '../config.js'
import type { PreflightCheck } from '../types.js'

/** Oldest Node.js release that is supported, as [major, minor]. */
export const MINIMUM_NODE_VERSION: readonly [number, number] = [20, 10]

/**
 * Parse a semver-like version string and return [major, minor, patch].
 * Returns null if unparseable.
 */
function parseVersion(raw: string): [number, number, number] | null {
  const match = /(\d+)\.(\d+)\.(\d+)/.exec(raw)
  if (!match) return null
  const major = parseInt(match[1] ?? '0', 10)
  const minor = parseInt(match[2] ?? '0', 10)
  const patch = parseInt(match[3] ?? '0', 10)
  return [major, minor, patch]
}

/**
 * Check that the running Node.js is new enough.
 * @internal
 */
export function checkNode(version: string = process.versions.node): Promise<PreflightCheck> {
  const name = 'node'
  const parsed = parseVersion(version)
  if (!parsed) {
    return Promise.resolve({
      name,
      status: 'version-unsupported',
      version,
      reason: 'Could not parse the Node.js version',
    })
  }
  const [minMajor, minMinor] = MINIMUM_NODE_VERSION
  if (parsed[0] < minMajor || (parsed[0] === minMajor && parsed[1] < minMinor)) {
    return Promise.resolve({
      name,
      status: 'version-unsupported',
      version,
      reason: `Node.js >= ${String(minMajor)}.${String(minMinor)} is required`,
    })
  }
  return Promise.resolve({ name, status: 'ok', version })
}

/**
 * Check that the crypto build offers ChaCha20-Poly1305.
 * @internal
 */
export function checkCipher(ciphers: readonly string[] = crypto.getCiphers()): Promise<PreflightCheck> {
  const name = 'chacha20-poly1305'
  if (ciphers.includes(name)) {
    return Promise.resolve({ name, status: 'ok' })
  }
  return Promise.resolve({
    name,
    status: 'missing',
    reason: 'The OpenSSL build behind Node.js does not provide chacha20-poly1305',
  })
}

/**
 * Check that Ed25519 key pairs can be generated.
 * @internal
 */
export function checkEd25519(): Promise<PreflightCheck> {
  const name = 'ed25519'
  try {
    crypto.generateKeyPairSync('ed25519')
    return Promise.resolve({ name, status: 'ok' })
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return Promise.resolve({ name, status: 'missing', reason: `Ed25519 unavailable: ${message}` })
  }
}

/**
 * Check that the config file, if present, is valid (optional).
 * @internal
 */
export async function checkConfig(configDir?: string): Promise<PreflightCheck> {
  const name = 'config'
  try {
    await loadConfig(configDir)
    return { name, status: 'ok' }
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err)
    return { name, status: 'invalid', reason: message }
  }
}
