/**
 * quorumseal: file encryption with threshold key shares and optional
 * one-time signatures.
 *
 * @packageDocumentation
 */

export {
  QuorumSealError,
  ConfigurationError,
  FormatError,
  CorrelationError,
  AuthenticationError,
  StrictModeViolationError,
  InsufficientSharesError,
  CorruptSharesError,
  InternalConsistencyError,
  OperationAbortedError,
  FilesystemError,
} from './errors.js'
export type { FormatErrorCode, CorrelationErrorCode, ConsistencyStage } from './errors.js'

export type {
  ThresholdMismatchMode,
  ConfigDefaults,
  QuorumSealConfig,
  PreflightCheckStatus,
  PreflightCheck,
  PreflightResult,
  SealOptions,
  SealedShare,
  SealedArtifacts,
  UnsealOptions,
  UnsealResult,
  SealFileOptions,
  SealFileResult,
  UnsealFileOptions,
  UnsealFileResult,
} from './types.js'

export {
  encodeBaseHeader,
  encodeFileHeader,
  decodeFileHeader,
  encodeShareHeader,
  decodeShareHeader,
  assembleContainer,
  headerLength,
  peekHeader,
  ALGORITHM_VERSION,
  FILE_EXTENSION,
  SHARE_EXTENSION,
  FILE_MAGIC,
  SHARE_MAGIC,
  NONCE_LENGTH,
  KEY_LENGTH,
} from './container/index.js'
export type {
  ContainerKind,
  ContainerHeader,
  SignatureBlock,
  DecodedContainer,
  DecodeOptions,
  HeaderPeek,
} from './container/index.js'

export { KeySplitEngine, ShamirSecretSharing, validateShareLayout, MAX_SHARES } from './sharing/index.js'
export type { SecretSharingScheme, ShareLayout } from './sharing/index.js'

export { CipherAdapter, ChaCha20Poly1305Cipher } from './cipher/index.js'
export type { AeadCipher } from './cipher/index.js'

export { SignatureBinder, signableBytes, Ed25519Signatures } from './signing/index.js'
export type { SignatureScheme, SigningIdentity, SignatureBlockValidator, SignedFields } from './signing/index.js'

export { KeyMaterial, withKeyMaterial, generateNonce } from './keys/index.js'

export {
  ShareReconciler,
  describeSigningMismatch,
  createStaticPolicy,
  DEFAULT_SIGNING_RESOLUTIONS,
} from './reconcile/index.js'
export type {
  ReconcilerOptions,
  StaticPolicyOptions,
  ThresholdMismatchSetting,
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
} from './reconcile/index.js'

export {
  FsShareDirectory,
  shareFileName,
  encryptedPathFor,
  decryptedPathFor,
  toHex,
  DECRYPTED_SUFFIX,
} from './storage/index.js'
export type { CandidateScope, ShareCandidate, ShareDirectory } from './storage/index.js'

export { runDoctor } from './doctor/index.js'
export type { RunDoctorOptions, DoctorCheckFn } from './doctor/index.js'
export { checkNode, checkCipher, checkEd25519, checkConfig } from './doctor/index.js'

export { QuorumSeal } from './quorumseal.js'
export type { QuorumSealOptions } from './quorumseal.js'

export { loadConfig, getDefaultConfigDir, validateConfig, defaultConfig, CONFIG_FILE_NAME } from './config.js'
