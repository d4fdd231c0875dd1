export { FsShareDirectory } from './fs-share-directory.js'
export {
  DECRYPTED_SUFFIX,
  decryptedPathFor,
  encryptedPathFor,
  shareFileName,
  toHex,
} from './naming.js'
export type { CandidateScope, ShareCandidate, ShareDirectory } from './types.js'
