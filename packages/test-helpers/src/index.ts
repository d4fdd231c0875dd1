/**
 * @quorumseal/test-helpers: Test utilities for quorumseal consumers.
 *
 * @packageDocumentation
 */

export { InMemoryShareDirectory } from './in-memory-share-directory.js'
export { ScriptedPolicy } from './scripted-policy.js'
export type { ScriptedPolicyOptions } from './scripted-policy.js'
export { TestSeal } from './test-seal.js'
export type { TestSealOptions } from './test-seal.js'
