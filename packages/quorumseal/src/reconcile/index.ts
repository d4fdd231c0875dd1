export { ShareReconciler, describeSigningMismatch } from './protocol.js'
export type { ReconcilerOptions } from './protocol.js'
export { createStaticPolicy, DEFAULT_SIGNING_RESOLUTIONS } from './policy.js'
export type { StaticPolicyOptions, ThresholdMismatchSetting } from './policy.js'
export type {
  FileSignatureMismatch,
  FileSignatureResolution,
  MaybePromise,
  ReconciliationPolicy,
  ReconciliationReport,
  RejectedShare,
  RejectionReason,
  SigningMismatch,
  SigningMismatchKind,
  SigningStateKind,
  SignatureFailure,
  SignatureFailureKind,
  SigningResolution,
  ThresholdDecision,
  ThresholdMismatch,
  ThresholdResolution,
  UnsealEvent,
  UnsealEventListener,
} from './types.js'
