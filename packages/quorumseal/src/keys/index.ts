export { KeyMaterial, withKeyMaterial, generateNonce } from './key-material.js'
