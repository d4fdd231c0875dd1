export { SignatureBinder, signableBytes } from './binder.js'
export type { SignedFields } from './binder.js'
export { Ed25519Signatures } from './ed25519.js'
export type { SignatureScheme, SigningIdentity, SignatureBlockValidator } from './types.js'
