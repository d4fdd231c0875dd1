/**
 * Doctor runner: runs the preflight checks and aggregates results.
 *
 * @packageDocumentation
 */

import { checkCipher, checkConfig, checkEd25519, checkNode } from './checks.js'
import type { DoctorCheckFn, PreflightCheck, PreflightResult } from './types.js'

/** Options for running the doctor. */
export interface RunDoctorOptions {
  /** Override the detected Node.js version (useful for testing). */
  nodeVersion?: string | undefined
  /** Override the available cipher list (useful for testing). */
  ciphers?: readonly string[] | undefined
  /** Config directory to validate. */
  configDir?: string | undefined
}

/** A doctor check entry pairing the check function with whether it is required. */
interface CheckEntry {
  check: DoctorCheckFn
  required: boolean
}

/** Aggregated check entry with its result. */
interface ResolvedEntry {
  required: boolean
  result: PreflightCheck
}

/**
 * Run all preflight checks and aggregate the results.
 */
export async function runDoctor(options?: RunDoctorOptions): Promise<PreflightResult> {
  const entries: CheckEntry[] = buildCheckList(options ?? {})

  const resolved: ResolvedEntry[] = await Promise.all(
    entries.map(async ({ check, required }) => {
      const result = await check()
      return { required, result }
    }),
  )

  const ready = resolved.every(({ required, result }) => {
    if (!required) return true
    return result.status === 'ok'
  })

  const warnings: string[] = []
  const nextSteps: string[] = []

  for (const { required, result } of resolved) {
    const detail = result.reason !== undefined ? `: ${result.reason}` : ''
    if (result.status === 'missing') {
      if (required) {
        nextSteps.push(`Use a Node.js build that provides ${result.name}${detail}`)
      } else {
        warnings.push(`Optional capability not found: ${result.name}${detail}`)
      }
    } else if (result.status === 'version-unsupported') {
      const msg = `${result.name} version is unsupported${detail}`
      if (required) {
        nextSteps.push(`Upgrade ${msg}`)
      } else {
        warnings.push(msg)
      }
    } else if (result.status === 'invalid') {
      const msg = `${result.name} is invalid${detail}`
      if (required) {
        nextSteps.push(`Fix ${msg}`)
      } else {
        warnings.push(msg)
      }
    }
  }

  const checks = resolved.map(({ result }) => result)

  return { checks, ready, warnings, nextSteps }
}

function buildCheckList(options: RunDoctorOptions): CheckEntry[] {
  return [
    { check: () => checkNode(options.nodeVersion), required: true },
    { check: () => checkCipher(options.ciphers), required: true },
    { check: checkEd25519, required: true },
    { check: () => checkConfig(options.configDir), required: false },
  ]
}
