/**
 * Reconciliation policy that answers from a script and records every
 * question it was asked.
 */

import { DEFAULT_SIGNING_RESOLUTIONS } from 'quorumseal'
import type {
  FileSignatureMismatch,
  FileSignatureResolution,
  ReconciliationPolicy,
  SignatureFailure,
  SigningResolution,
  ThresholdMismatch,
  ThresholdResolution,
} from 'quorumseal'

/**
 * Options for creating a {@link ScriptedPolicy}.
 * @public
 */
export interface ScriptedPolicyOptions {
  strict?: boolean | undefined
  /** Answers to threshold mismatches, in order. Defaults to `keep` once exhausted. */
  threshold?: ThresholdResolution[] | undefined
  /** Answers to share signature failures, in order. Defaults per kind once exhausted. */
  signing?: SigningResolution[] | undefined
  /** Answers to file signature failures, in order. Defaults to `abort` once exhausted. */
  fileSignature?: FileSignatureResolution[] | undefined
}

/**
 * A policy that plays back prepared answers, standing in for an operator.
 *
 * @example
 * ```ts
 * const policy = new ScriptedPolicy({ threshold: [{ action: 'override', threshold: 2 }] })
 * await seal.unseal(container, candidates, { policy })
 * expect(policy.thresholdMismatches).toHaveLength(1)
 * ```
 *
 * @public
 */
export class ScriptedPolicy implements ReconciliationPolicy {
  readonly strict: boolean

  /** Threshold mismatches seen, in order. */
  readonly thresholdMismatches: ThresholdMismatch[] = []
  /** Share signature failures seen, in order. */
  readonly signingMismatches: SignatureFailure[] = []
  /** File signature failures seen, in order. */
  readonly fileSignatureMismatches: FileSignatureMismatch[] = []

  readonly #threshold: ThresholdResolution[]
  readonly #signing: SigningResolution[]
  readonly #fileSignature: FileSignatureResolution[]

  constructor(options?: ScriptedPolicyOptions) {
    this.strict = options?.strict ?? false
    this.#threshold = [...(options?.threshold ?? [])]
    this.#signing = [...(options?.signing ?? [])]
    this.#fileSignature = [...(options?.fileSignature ?? [])]
  }

  /** @public */
  resolveThresholdMismatch(mismatch: ThresholdMismatch): ThresholdResolution {
    this.thresholdMismatches.push(mismatch)
    return this.#threshold.shift() ?? { action: 'keep' }
  }

  /** @public */
  resolveSigningMismatch(mismatch: SignatureFailure): SigningResolution {
    this.signingMismatches.push(mismatch)
    return this.#signing.shift() ?? DEFAULT_SIGNING_RESOLUTIONS[mismatch.kind]
  }

  /** @public */
  resolveFileSignatureMismatch(mismatch: FileSignatureMismatch): FileSignatureResolution {
    this.fileSignatureMismatches.push(mismatch)
    return this.#fileSignature.shift() ?? 'abort'
  }
}
