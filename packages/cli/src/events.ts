/**
 * Rendering of unseal progress events.
 *
 * @internal
 */

import { describeSigningMismatch, toHex } from 'quorumseal'
import type { UnsealEvent } from 'quorumseal'
import { bold, dim } from './output.js'

/** A line of output and the stream it belongs on. */
export interface RenderedLine {
  stream: 'stdout' | 'stderr'
  text: string
}

function fingerprint(publicKey: Uint8Array): string {
  return toHex(publicKey).slice(0, 16)
}

/** Turn an event into one line of output. */
export function formatEvent(event: UnsealEvent): RenderedLine {
  switch (event.type) {
    case 'share-accepted':
      return {
        stream: 'stdout',
        text: dim(`  ✓ ${event.source}${event.signed ? ' (signed)' : ''}`),
      }
    case 'share-rejected':
      return { stream: 'stderr', text: `  ✗ ${event.source}: ${event.message}` }
    case 'threshold-mismatch': {
      const { mismatch } = event
      const current =
        mismatch.effectiveThreshold !== mismatch.fileThreshold
          ? ` (threshold in use: ${String(mismatch.effectiveThreshold)})`
          : ''
      return {
        stream: 'stderr',
        text: `${bold('WARNING:')} ${mismatch.source} records threshold ${String(mismatch.shareThreshold)}, the encrypted file records ${String(mismatch.fileThreshold)}${current}`,
      }
    }
    case 'threshold-resolved': {
      const { mismatch, resolution } = event
      const outcome =
        resolution.action === 'override'
          ? `using threshold ${String(resolution.threshold)}; this might fail`
          : resolution.action === 'keep'
            ? `keeping threshold ${String(mismatch.effectiveThreshold)}`
            : 'aborting'
      return { stream: 'stderr', text: `  ${outcome}` }
    }
    case 'signing-mismatch': {
      const suffix = event.strict ? ' (strict mode: aborting)' : ''
      return {
        stream: 'stderr',
        text: `${bold('WARNING:')} ${describeSigningMismatch(event.mismatch)}${suffix}`,
      }
    }
    case 'file-signature-mismatch': {
      const suffix = event.strict ? ' (strict mode: aborting)' : ''
      return {
        stream: 'stderr',
        text: `${bold('WARNING:')} the signature on ${event.mismatch.source} does not verify; the file may have been tampered with${suffix}`,
      }
    }
    case 'file-verified':
      return {
        stream: 'stdout',
        text: `Signature verified (key ${fingerprint(event.publicKey)}…)`,
      }
    case 'key-recovered':
      return {
        stream: 'stdout',
        text: `Recovered the key from ${String(event.shares)} share(s) (threshold ${String(event.threshold)})`,
      }
  }
}

/** Write an event to its stream. */
export function printEvent(event: UnsealEvent): void {
  const line = formatEvent(event)
  process[line.stream].write(`${line.text}\n`)
}
