import { describe, it, expect } from 'vitest'
import { createStaticPolicy, DEFAULT_SIGNING_RESOLUTIONS } from '../../../src/reconcile/policy.js'
import type { SignatureFailure, ThresholdMismatch } from '../../../src/reconcile/types.js'

const thresholdMismatch: ThresholdMismatch = {
  source: 's.ccms',
  fileThreshold: 2,
  shareThreshold: 3,
  effectiveThreshold: 2,
}

function signing(kind: SignatureFailure['kind']): SignatureFailure {
  return {
    source: 's.ccms',
    kind,
    filePublicKey: new Uint8Array(32),
    sharePublicKey: new Uint8Array(32).fill(1),
  }
}

describe('createStaticPolicy', () => {
  it('should default to lenient, file threshold and excluding failed signatures', () => {
    const policy = createStaticPolicy()
    expect(policy.strict).toBe(false)
    expect(policy.resolveThresholdMismatch(thresholdMismatch)).toEqual({ action: 'keep' })
    expect(policy.resolveSigningMismatch(signing('public-key-mismatch'))).toBe('exclude')
    expect(policy.resolveSigningMismatch(signing('invalid-share-signature'))).toBe('exclude')
    expect(policy.resolveFileSignatureMismatch({ source: 'f', publicKey: new Uint8Array(32) })).toBe(
      'accept',
    )
  })

  it('should abort threshold mismatches when asked', () => {
    const policy = createStaticPolicy({ thresholdMismatch: 'abort' })
    expect(policy.resolveThresholdMismatch(thresholdMismatch)).toEqual({ action: 'abort' })
  })

  it('should override with a fixed threshold', () => {
    const policy = createStaticPolicy({ thresholdMismatch: 4 })
    expect(policy.resolveThresholdMismatch(thresholdMismatch)).toEqual({
      action: 'override',
      threshold: 4,
    })
  })

  it('should apply one signing resolution to every kind', () => {
    const policy = createStaticPolicy({ onSigningMismatch: 'abort' })
    for (const kind of Object.keys(DEFAULT_SIGNING_RESOLUTIONS)) {
      if (kind === 'public-key-mismatch' || kind === 'invalid-share-signature') {
        expect(policy.resolveSigningMismatch(signing(kind))).toBe('abort')
      }
    }
  })

  it('should carry strict and the file signature setting', () => {
    const policy = createStaticPolicy({ strict: true, onFileSignatureMismatch: 'abort' })
    expect(policy.strict).toBe(true)
    expect(policy.resolveFileSignatureMismatch({ source: 'f', publicKey: new Uint8Array(32) })).toBe(
      'abort',
    )
  })
})
