/**
 * Types for share reconciliation: the policy that settles disagreements,
 * the events emitted while gathering, and the final report.
 */

import type { QuorumSealError } from '../errors.js'

/** Why a candidate share was left out of the pool. */
export type RejectionReason =
  | 'unreadable'
  | 'malformed'
  | 'not-a-share'
  | 'wrong-file'
  | 'unsupported-version'
  | 'truncated'
  | 'bad-public-key'
  | 'bad-signature'
  | 'corrupt-share'
  | 'signature-mismatch'

/** A share whose recorded threshold differs from the effective one. */
export interface ThresholdMismatch {
  /** Candidate name. */
  source: string
  /** Threshold recorded in the encrypted file header. */
  fileThreshold: number
  /** Threshold recorded in the share header. */
  shareThreshold: number
  /** Threshold in force when the share was examined. */
  effectiveThreshold: number
}

/**
 * Outcome of a threshold mismatch: keep the effective threshold, replace it
 * for the rest of the run, or stop.
 */
export type ThresholdResolution =
  | { action: 'keep' }
  | { action: 'override'; threshold: number }
  | { action: 'abort' }

/** The file and the share disagree about whether they are signed. */
export type SigningStateKind = 'unsigned-share' | 'unsigned-file'

/** Both are signed, and the share's signature does not hold up. */
export type SignatureFailureKind = 'public-key-mismatch' | 'invalid-share-signature'

/**
 * Kind of signing disagreement between a share and the target file.
 *
 * - `unsigned-share`: the file is signed, the share is not
 * - `unsigned-file`: the share is signed, the file is not
 * - `public-key-mismatch`: both signed, with different keys
 * - `invalid-share-signature`: the share's signature does not verify against its own key
 */
export type SigningMismatchKind = SigningStateKind | SignatureFailureKind

export interface SigningMismatch {
  source: string
  kind: SigningMismatchKind
  /** Key embedded in the target file, when signed. */
  filePublicKey?: Uint8Array | undefined
  /** Key embedded in the share, when signed. */
  sharePublicKey?: Uint8Array | undefined
}

/** A signing mismatch where both sides carry a signature block. */
export interface SignatureFailure extends SigningMismatch {
  kind: SignatureFailureKind
  filePublicKey: Uint8Array
  sharePublicKey: Uint8Array
}

export type SigningResolution = 'accept' | 'exclude' | 'abort'

/** The target file's own signature did not verify. */
export interface FileSignatureMismatch {
  source: string
  publicKey: Uint8Array
}

export type FileSignatureResolution = 'accept' | 'abort'

/** Either a value or a promise of it; policies may ask an operator. */
export type MaybePromise<T> = T | Promise<T>

/**
 * Decisions the reconciliation protocol delegates to its caller.
 *
 * @remarks
 * The protocol never prompts. Front ends that want interaction implement
 * these callbacks with prompts; tests and scripts use
 * {@link createStaticPolicy}.
 *
 * @public
 */
export interface ReconciliationPolicy {
  /**
   * When true, a share signature failure against a signed file and a file
   * signature failure abort the operation. Shares or files that are simply
   * unsigned only produce a warning, strict or not.
   */
  readonly strict: boolean

  resolveThresholdMismatch(mismatch: ThresholdMismatch): MaybePromise<ThresholdResolution>

  /** Only consulted outside strict mode, when both file and share are signed. */
  resolveSigningMismatch(mismatch: SignatureFailure): MaybePromise<SigningResolution>

  /** Only consulted outside strict mode. */
  resolveFileSignatureMismatch(mismatch: FileSignatureMismatch): MaybePromise<FileSignatureResolution>
}

/** A share left out of the pool. */
export interface RejectedShare {
  source: string
  reason: RejectionReason
  message: string
  /** The typed error behind the rejection, when a check raised one. */
  error?: QuorumSealError | undefined
}

/** A recorded change (or confirmation) of the effective threshold. */
export interface ThresholdDecision {
  source: string
  shareThreshold: number
  from: number
  to: number
}

/**
 * Summary of one gathering run.
 *
 * @public
 */
export interface ReconciliationReport {
  /** Threshold recorded in the target file. */
  fileThreshold: number
  /** Threshold used for reconstruction after all resolutions. */
  effectiveThreshold: number
  /** Candidate names admitted to the pool, in scan order. */
  accepted: string[]
  rejected: RejectedShare[]
  /** Mismatches that were accepted or only noted, rather than excluded. */
  warnings: string[]
  thresholdResolutions: ThresholdDecision[]
}

/**
 * Progress notifications emitted while unsealing.
 *
 * @public
 */
export type UnsealEvent =
  | { type: 'share-accepted'; source: string; signed: boolean }
  | { type: 'share-rejected'; source: string; reason: RejectionReason; message: string }
  | { type: 'threshold-mismatch'; mismatch: ThresholdMismatch }
  | { type: 'threshold-resolved'; mismatch: ThresholdMismatch; resolution: ThresholdResolution }
  | { type: 'signing-mismatch'; mismatch: SigningMismatch; strict: boolean }
  | { type: 'file-signature-mismatch'; mismatch: FileSignatureMismatch; strict: boolean }
  | { type: 'file-verified'; publicKey: Uint8Array }
  | { type: 'key-recovered'; shares: number; threshold: number }

export type UnsealEventListener = (event: UnsealEvent) => void
