/**
 * Public types for quorumseal.
 *
 * @packageDocumentation
 */

import type {
  ReconciliationPolicy,
  ReconciliationReport,
  UnsealEventListener,
} from './reconcile/types.js'
import type { CandidateScope, ShareDirectory } from './storage/types.js'

/** How threshold disagreements are settled when nobody is asked. */
export type ThresholdMismatchMode = 'prompt' | 'use-file' | 'abort'

/** Defaults applied when an operation does not say otherwise. */
export interface ConfigDefaults {
  /** Sign new containers with a one-time key. */
  sign: boolean
  /** Abort on any signing disagreement against a signed file. */
  strict: boolean
  /** Treat every regular file in the share directory as a candidate. */
  allFiles: boolean
  /** Share directory used when none is given. */
  shareDir?: string | undefined
  /**
   * `'prompt'` asks the operator when a front end can; the library itself
   * treats it as `'abort'`.
   */
  thresholdMismatch: ThresholdMismatchMode
}

/** Top-level configuration file shape. */
export interface QuorumSealConfig {
  /** Schema version; currently always `1`. */
  version: 1
  defaults: ConfigDefaults
}

/** Status of a preflight check. */
export type PreflightCheckStatus = 'ok' | 'missing' | 'version-unsupported' | 'invalid'

/** Result of a preflight check for a single runtime capability. */
export interface PreflightCheck {
  /** Human-readable name of the capability being checked. */
  name: string
  /** Whether the capability was found and usable. */
  status: PreflightCheckStatus
  /** The detected version string, if any. */
  version?: string | undefined
  /** Human-readable explanation of why the status is not `'ok'`. */
  reason?: string | undefined
}

/** Aggregated result from all preflight checks. */
export interface PreflightResult {
  /** Individual check results. */
  checks: PreflightCheck[]
  /** `true` if all required checks passed. */
  ready: boolean
  /** Non-fatal advisory messages. */
  warnings: string[]
  /** Action items to complete before quorumseal will work. */
  nextSteps: string[]
}

/** Parameters for sealing one payload. */
export interface SealOptions {
  /** Number of shares to produce (1..255). */
  players: number
  /** Shares required to recover the key (1..players). */
  threshold: number
  /** Sign the container and every share. Defaults to the configured `sign`. */
  sign?: boolean | undefined
}

/** One encoded share container ready to hand out. */
export interface SealedShare {
  /** 1-based position among the produced shares. */
  index: number
  /** Suggested file name, `<index>-<hex nonce>.ccms`. */
  fileName: string
  bytes: Uint8Array
}

/** Everything produced by sealing one payload. */
export interface SealedArtifacts {
  nonce: Uint8Array
  /** The encrypted-file container. */
  container: Uint8Array
  shares: SealedShare[]
  /** One-time public key, when signed. */
  publicKey?: Uint8Array | undefined
}

/** Options for unsealing. */
export interface UnsealOptions {
  /** Defaults to a static policy built from the configuration. */
  policy?: ReconciliationPolicy | undefined
  onEvent?: UnsealEventListener | undefined
  /** Label for the encrypted file in messages. */
  source?: string | undefined
}

export interface UnsealResult {
  plaintext: Uint8Array
  report: ReconciliationReport
}

/** Options for {@link QuorumSeal.sealFile}. */
export interface SealFileOptions extends SealOptions {
  shareDirectory: ShareDirectory
  /** Where to write the container. Defaults to `<path>.ccm`. */
  outputPath?: string | undefined
}

export interface SealFileResult {
  containerPath: string
  /** Share file names, in index order. */
  shareNames: string[]
  nonce: Uint8Array
  publicKey?: Uint8Array | undefined
}

/** Options for {@link QuorumSeal.unsealFile}. */
export interface UnsealFileOptions extends UnsealOptions {
  shareDirectory: ShareDirectory
  /** Defaults to `'all'` when the configured `allFiles` is set, else `'containers'`. */
  scope?: CandidateScope | undefined
  /** Where to write the plaintext. Defaults to the path without `.ccm`. */
  outputPath?: string | undefined
}

export interface UnsealFileResult extends UnsealResult {
  outputPath: string
}
