import { describe, it, expect, beforeEach } from 'vitest'
import {
  InsufficientSharesError,
  SignatureBinder,
  StrictModeViolationError,
  assembleContainer,
  decodeShareHeader,
  encodeShareHeader,
} from 'quorumseal'
import { InMemoryShareDirectory, ScriptedPolicy, TestSeal } from '../../src/index.js'

const encode = (text: string): Uint8Array => new TextEncoder().encode(text)

describe('InMemoryShareDirectory', () => {
  let directory: InMemoryShareDirectory

  beforeEach(() => {
    directory = new InMemoryShareDirectory()
  })

  it('should have a default location', () => {
    expect(directory.location).toBe('memory://shares')
  })

  it('should store and read back a copy', async () => {
    const bytes = Uint8Array.of(1, 2, 3)
    await directory.write('1.ccms', bytes)
    bytes[0] = 9
    const [entry] = await directory.list('containers')
    expect(entry?.name).toBe('1.ccms')
    expect([...((await entry?.read()) ?? [])]).toEqual([1, 2, 3])
  })

  it('should filter by extension unless the scope is all', async () => {
    directory.put('b.ccms', new Uint8Array(1))
    directory.put('a.txt', new Uint8Array(1))
    directory.put('a.ccms', new Uint8Array(1))
    expect((await directory.list('containers')).map((c) => c.name)).toEqual(['a.ccms', 'b.ccms'])
    expect((await directory.list('all')).map((c) => c.name)).toEqual(['a.ccms', 'a.txt', 'b.ccms'])
  })

  it('should list unreadable files whose reads reject', async () => {
    directory.putUnreadable('locked.ccms')
    const [entry] = await directory.list('containers')
    await expect(entry?.read()).rejects.toThrow('Cannot read locked.ccms')
  })

  it('should remove and clear files', () => {
    directory.put('a.ccms', new Uint8Array(1))
    directory.putUnreadable('b.ccms')
    expect(directory.size).toBe(2)
    expect(directory.remove('b.ccms')).toBe(true)
    expect(directory.remove('missing')).toBe(false)
    expect(directory.names()).toEqual(['a.ccms'])
    directory.clear()
    expect(directory.size).toBe(0)
  })
})

describe('ScriptedPolicy', () => {
  it('should play back answers in order and then fall back', () => {
    const policy = new ScriptedPolicy({ threshold: [{ action: 'abort' }] })
    const mismatch = { source: 's', fileThreshold: 2, shareThreshold: 3, effectiveThreshold: 2 }
    expect(policy.resolveThresholdMismatch(mismatch)).toEqual({ action: 'abort' })
    expect(policy.resolveThresholdMismatch(mismatch)).toEqual({ action: 'keep' })
    expect(policy.thresholdMismatches).toHaveLength(2)
  })

  it('should default signing answers to exclude and file signatures to abort', () => {
    const policy = new ScriptedPolicy({ signing: ['accept'] })
    const keys = { filePublicKey: new Uint8Array(32), sharePublicKey: new Uint8Array(32).fill(1) }
    expect(policy.strict).toBe(false)
    expect(policy.resolveSigningMismatch({ source: 's', kind: 'public-key-mismatch', ...keys })).toBe('accept')
    expect(policy.resolveSigningMismatch({ source: 's', kind: 'invalid-share-signature', ...keys })).toBe(
      'exclude',
    )
    expect(policy.resolveFileSignatureMismatch({ source: 'f', publicKey: new Uint8Array(32) })).toBe('abort')
    expect(policy.signingMismatches.map((m) => m.kind)).toEqual([
      'public-key-mismatch',
      'invalid-share-signature',
    ])
  })
})

describe('TestSeal', () => {
  let seal: TestSeal

  beforeEach(async () => {
    seal = await TestSeal.create()
  })

  it('should seal into the in-memory directory and unseal from it', async () => {
    const { container, shares } = await seal.seal(encode('hello'), { players: 3, threshold: 2 })
    expect(seal.shares.names()).toEqual(shares.map((s) => s.fileName).sort())

    const { plaintext, report } = await seal.unseal(container)
    expect(new TextDecoder().decode(plaintext)).toBe('hello')
    expect(report.accepted).toHaveLength(3)
  })

  it('should fail once too many shares are gone', async () => {
    const { container, shares } = await seal.seal(encode('hello'), { players: 3, threshold: 2 })
    seal.shares.remove(shares[0]?.fileName ?? '')
    seal.shares.remove(shares[1]?.fileName ?? '')
    await expect(seal.unseal(container)).rejects.toBeInstanceOf(InsufficientSharesError)
  })

  it('should record threshold questions through a scripted policy', async () => {
    const { container, shares } = await seal.seal(encode('hello'), { players: 2, threshold: 2 })
    const first = shares[0]
    if (first === undefined) throw new Error('unreachable')
    const edited = first.bytes.slice()
    edited[5] = 1
    seal.shares.put(first.fileName, edited)

    const policy = new ScriptedPolicy({ threshold: [{ action: 'override', threshold: 1 }] })
    const { plaintext, report } = await seal.unseal(container, { policy })
    expect(new TextDecoder().decode(plaintext)).toBe('hello')
    // the untouched share now disagrees with the override and is kept at 1
    expect(policy.thresholdMismatches).toHaveLength(2)
    expect(policy.thresholdMismatches[0]).toEqual({
      source: first.fileName,
      fileThreshold: 2,
      shareThreshold: 1,
      effectiveThreshold: 2,
    })
    expect(report.effectiveThreshold).toBe(1)
  })

  it('should sign when created with sign: true', async () => {
    const signing = await TestSeal.create({ sign: true, strict: true })
    const { publicKey } = await signing.seal(encode('x'), { players: 2, threshold: 2 })
    expect(publicKey?.length).toBe(32)
    expect(signing.quorumSeal.config.defaults.strict).toBe(true)
  })

  it('should enforce strict mode against a share signed with another key', async () => {
    const signing = await TestSeal.create({ sign: true, strict: true })
    const { container, shares } = await signing.seal(encode('x'), { players: 2, threshold: 2 })
    const first = shares[0]
    if (first === undefined) throw new Error('unreachable')
    const binder = new SignatureBinder()
    const { header, body } = decodeShareHeader(first.bytes)
    const resigned = binder.signShare(binder.createIdentity(), header, body)
    signing.shares.put(
      first.fileName,
      assembleContainer(encodeShareHeader({ ...header, signing: resigned }), body),
    )
    await expect(signing.unseal(container)).rejects.toBeInstanceOf(StrictModeViolationError)
  })

  it('should only warn about an unsigned share in strict mode', async () => {
    const signing = await TestSeal.create({ sign: true, strict: true })
    const { container, shares } = await signing.seal(encode('x'), { players: 2, threshold: 2 })
    const first = shares[0]
    if (first === undefined) throw new Error('unreachable')
    const { header, body } = decodeShareHeader(first.bytes)
    signing.shares.put(
      first.fileName,
      assembleContainer(encodeShareHeader({ ...header, signing: undefined }), body),
    )
    const { plaintext, report } = await signing.unseal(container)
    expect(new TextDecoder().decode(plaintext)).toBe('x')
    expect(report.warnings).toEqual([`Share ${first.fileName} is not signed, but the encrypted file is`])
  })
})
