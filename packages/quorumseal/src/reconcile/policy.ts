/**
 * Non-interactive reconciliation policies.
 */

import type {
  FileSignatureResolution,
  ReconciliationPolicy,
  SignatureFailureKind,
  SigningResolution,
  ThresholdResolution,
} from './types.js'

/**
 * How a static policy settles threshold mismatches: keep the file's
 * threshold, abort, or override with a fixed number.
 */
export type ThresholdMismatchSetting = 'use-file' | 'abort' | number

/** Options for {@link createStaticPolicy}. */
export interface StaticPolicyOptions {
  strict?: boolean | undefined
  /** Defaults to `'use-file'`. */
  thresholdMismatch?: ThresholdMismatchSetting | undefined
  /**
   * One resolution for every share whose signature fails against a signed
   * file. When omitted, such shares are excluded.
   */
  onSigningMismatch?: SigningResolution | undefined
  /** Defaults to `'accept'`. Ignored in strict mode. */
  onFileSignatureMismatch?: FileSignatureResolution | undefined
}

/** Resolution applied per mismatch kind when no override is given. */
export const DEFAULT_SIGNING_RESOLUTIONS: Readonly<Record<SignatureFailureKind, SigningResolution>> = {
  'public-key-mismatch': 'exclude',
  'invalid-share-signature': 'exclude',
}

function thresholdResolution(setting: ThresholdMismatchSetting): ThresholdResolution {
  if (setting === 'use-file') {
    return { action: 'keep' }
  }
  if (setting === 'abort') {
    return { action: 'abort' }
  }
  return { action: 'override', threshold: setting }
}

/**
 * Build a policy that answers every question the same way, without asking
 * anyone.
 *
 * @public
 */
export function createStaticPolicy(options: StaticPolicyOptions = {}): ReconciliationPolicy {
  const threshold = thresholdResolution(options.thresholdMismatch ?? 'use-file')
  const signing = options.onSigningMismatch
  const fileSignature = options.onFileSignatureMismatch ?? 'accept'

  return {
    strict: options.strict ?? false,
    resolveThresholdMismatch: () => threshold,
    resolveSigningMismatch: (mismatch) => signing ?? DEFAULT_SIGNING_RESOLUTIONS[mismatch.kind],
    resolveFileSignatureMismatch: () => fileSignature,
  }
}
