export { runDoctor } from './runner.js'
export type { RunDoctorOptions } from './runner.js'
export { checkNode, checkCipher, checkEd25519, checkConfig, MINIMUM_NODE_VERSION } from './checks.js'
export type { DoctorCheckFn, PreflightCheck, PreflightCheckStatus, PreflightResult } from './types.js'
