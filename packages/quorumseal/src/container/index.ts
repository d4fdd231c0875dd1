export {
  encodeBaseHeader,
  encodeFileHeader,
  decodeFileHeader,
  encodeShareHeader,
  decodeShareHeader,
  assembleContainer,
  headerLength,
  peekHeader,
} from './header.js'
export type {
  ContainerKind,
  SignatureBlock,
  ContainerHeader,
  DecodedContainer,
  DecodeOptions,
  HeaderPeek,
} from './header.js'
export * from './constants.js'
