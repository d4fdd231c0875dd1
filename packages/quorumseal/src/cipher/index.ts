export { CipherAdapter } from './adapter.js'
export { ChaCha20Poly1305Cipher } from './chacha20-poly1305.js'
export type { AeadCipher } from './types.js'
