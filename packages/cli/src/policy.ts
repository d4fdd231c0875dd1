/**
 * Reconciliation policy that asks the operator on the terminal.
 *
 * @remarks
 * Warnings themselves are printed by the event renderer; the policy only
 * asks the question.
 *
 * @internal
 */

import { createStaticPolicy, DEFAULT_SIGNING_RESOLUTIONS } from 'quorumseal'
import type {
  ReconciliationPolicy,
  SigningResolution,
  ThresholdMismatchMode,
  ThresholdResolution,
} from 'quorumseal'
import { ask } from './prompts.js'

export interface InteractivePolicyOptions {
  strict: boolean
  /** `'prompt'` asks; the other modes answer without asking. */
  thresholdMismatch: ThresholdMismatchMode
}

/**
 * Read a threshold answer: empty keeps the threshold, a whole number
 * overrides it, anything else aborts.
 */
export function parseThresholdAnswer(answer: string): ThresholdResolution {
  const trimmed = answer.trim()
  if (trimmed === '') {
    return { action: 'keep' }
  }
  if (/^\d+$/.test(trimmed)) {
    return { action: 'override', threshold: parseInt(trimmed, 10) }
  }
  return { action: 'abort' }
}

/**
 * Read a signing answer: `a` accepts, `e` excludes, `q` aborts, empty takes
 * `fallback`. Anything else aborts.
 */
export function parseSigningAnswer(answer: string, fallback: SigningResolution): SigningResolution {
  switch (answer.trim().toLowerCase()) {
    case '':
      return fallback
    case 'a':
    case 'accept':
      return 'accept'
    case 'e':
    case 'exclude':
      return 'exclude'
    default:
      return 'abort'
  }
}

/** Build a policy for a terminal session. */
export function createInteractivePolicy(options: InteractivePolicyOptions): ReconciliationPolicy {
  const fixed = createStaticPolicy({
    strict: options.strict,
    thresholdMismatch: options.thresholdMismatch === 'use-file' ? 'use-file' : 'abort',
  })

  return {
    strict: options.strict,

    async resolveThresholdMismatch(mismatch) {
      if (options.thresholdMismatch !== 'prompt') {
        return fixed.resolveThresholdMismatch(mismatch)
      }
      const answer = await ask(
        `Press Enter to keep threshold ${String(mismatch.effectiveThreshold)}, ` +
          'type a number to use that threshold instead, or anything else to abort: ',
      )
      return parseThresholdAnswer(answer)
    },

    async resolveSigningMismatch(mismatch) {
      const fallback = DEFAULT_SIGNING_RESOLUTIONS[mismatch.kind]
      const answer = await ask(
        `[a]ccept this share, [e]xclude it, or [q]uit? (Enter = ${fallback}) `,
      )
      return parseSigningAnswer(answer, fallback)
    },

    async resolveFileSignatureMismatch() {
      const answer = await ask('Continue decrypting anyway? [y/N] ')
      return answer.trim().toLowerCase() === 'y' ? 'accept' : 'abort'
    },
  }
}
