export { KeySplitEngine, validateShareLayout, MAX_SHARES } from './engine.js'
export type { ShareLayout } from './engine.js'
export { ShamirSecretSharing } from './shamir.js'
export type { SecretSharingScheme } from './types.js'
