import { describe, it, expect, beforeEach, vi } from 'vitest'
import { PsbtHandshake } from './PsbtHandshake'
import { appErr, ok, type Result } from '../../domain/result'
import type { PsbtSession } from '../../domain/types'
import {
  createDeferred,
  createFakeWalletEngine,
  TEST_TXID,
  type FakeWalletEngine
} from '../../test/factories'
import { buildPsbtFixture, RECIPIENT_ADDRESS, type PsbtFixture } from '../../test/psbtFixtures'

describe('PsbtHandshake', () => {
  let fixture: PsbtFixture
  let engine: FakeWalletEngine

  function createHandshake(): PsbtHandshake {
    return new PsbtHandshake({
      created: {
        psbtBase64: fixture.unsignedBase64,
        feeSats: 1000,
        recipientAddresses: [RECIPIENT_ADDRESS]
      },
      draftRecipientSats: 60_000,
      engine,
      network: 'mainnet',
      id: 'session-1'
    })
  }

  beforeEach(() => {
    fixture = buildPsbtFixture()
    engine = createFakeWalletEngine({ isWatchOnly: true })
  })

  describe('initial state', () => {
    it('should start exporting with the unsigned payload', () => {
      const handshake = createHandshake()
      expect(handshake.getSession()).toEqual({
        id: 'session-1',
        unsignedPayload: fixture.unsignedBase64,
        phase: 'exporting'
      })
    })

    it('should generate an id when none is given', () => {
      const handshake = new PsbtHandshake({
        created: { psbtBase64: fixture.unsignedBase64, feeSats: 1000, recipientAddresses: [] },
        draftRecipientSats: 0,
        engine,
        network: 'mainnet'
      })
      expect(handshake.id).toMatch(/^[0-9a-f-]{36}$/)
    })
  })

  describe('markExported', () => {
    it('should move to awaitingSigned and be repeatable', () => {
      const handshake = createHandshake()
      expect(handshake.markExported().ok).toBe(true)
      expect(handshake.phase).toBe('awaitingSigned')
      expect(handshake.markExported().ok).toBe(true)
      expect(handshake.phase).toBe('awaitingSigned')
    })

    it('should be rejected once a payload is accepted', () => {
      const handshake = createHandshake()
      handshake.acceptSignedPayload(fixture.signedBase64)
      const result = handshake.markExported()
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('INVALID_STATE')
    })
  })

  describe('acceptSignedPayload', () => {
    it('should accept a payload straight from exporting', () => {
      const handshake = createHandshake()
      const result = handshake.acceptSignedPayload(fixture.signedBase64)
      expect(result.ok).toBe(true)
      expect(handshake.phase).toBe('confirmingBroadcast')
    })

    it('should store the canonical payload and recomputed totals', () => {
      const handshake = createHandshake()
      handshake.markExported()
      const result = handshake.acceptSignedPayload(fixture.signedHex)
      if (!result.ok) throw result.error

      const session = handshake.getSession()
      expect(session.signedPayload).toBe(fixture.signedBase64)
      expect(session.reconciledTotals).toEqual(result.value)
      expect(result.value.feeSats).toBe(1000)
      expect(result.value.recipientSats).toBe(60_000)
      expect(result.value.changeSats).toBe(39_000)
    })

    it('should stay in awaitingSigned with an error code on garbage', () => {
      const handshake = createHandshake()
      handshake.markExported()
      const result = handshake.acceptSignedPayload('not a transaction')

      expect(result.ok).toBe(false)
      const session = handshake.getSession()
      expect(session.phase).toBe('awaitingSigned')
      expect(session.errorCode).toBe('PSBT_UNPARSEABLE_SIGNED_PAYLOAD')
      expect(session.signedPayload).toBeUndefined()
    })

    it('should turn away the unsigned export and take the signed one after it', async () => {
      const handshake = createHandshake()
      handshake.markExported()

      const pastedBack = handshake.acceptSignedPayload(fixture.unsignedBase64)
      expect(pastedBack.ok).toBe(false)
      expect(handshake.getSession().phase).toBe('awaitingSigned')
      expect(handshake.getSession().errorCode).toBe('PSBT_UNPARSEABLE_SIGNED_PAYLOAD')

      const signed = handshake.acceptSignedPayload(fixture.signedBase64)
      expect(signed.ok && signed.value.signedInputCount).toBe(1)
      expect(handshake.getSession().phase).toBe('confirmingBroadcast')

      const broadcast = await handshake.confirmBroadcast()
      expect(broadcast.ok).toBe(true)
      expect(engine.broadcastSigned).toHaveBeenCalledWith(fixture.signedBase64)
    })

    it('should clear the error after a later valid payload', () => {
      const handshake = createHandshake()
      handshake.markExported()
      handshake.acceptSignedPayload('zzzz')
      handshake.acceptSignedPayload(fixture.rawTx)

      const session = handshake.getSession()
      expect(session.phase).toBe('confirmingBroadcast')
      expect(session.errorCode).toBeUndefined()
      expect(session.signedPayload).toBe(fixture.rawHex)
    })
  })

  describe('confirmBroadcast', () => {
    it('should broadcast the canonical payload once and finish', async () => {
      const handshake = createHandshake()
      handshake.acceptSignedPayload(fixture.signedPsbt)

      const result = await handshake.confirmBroadcast()

      expect(result).toEqual(ok(TEST_TXID))
      expect(engine.broadcastSigned).toHaveBeenCalledTimes(1)
      expect(engine.broadcastSigned).toHaveBeenCalledWith(fixture.signedBase64)
      expect(handshake.getSession().phase).toBe('done')
      expect(handshake.getSession().txid).toBe(TEST_TXID)
    })

    it('should refuse to broadcast before a payload is accepted', async () => {
      const handshake = createHandshake()
      const result = await handshake.confirmBroadcast()
      expect(result.ok).toBe(false)
      expect(engine.broadcastSigned).not.toHaveBeenCalled()
    })

    it('should refuse a second broadcast', async () => {
      const handshake = createHandshake()
      handshake.acceptSignedPayload(fixture.signedBase64)
      await handshake.confirmBroadcast()
      const second = await handshake.confirmBroadcast()
      expect(second.ok).toBe(false)
      expect(engine.broadcastSigned).toHaveBeenCalledTimes(1)
    })

    it('should fail the session when the engine rejects', async () => {
      engine.broadcastSigned.mockResolvedValueOnce(appErr('COMMIT_FAILED', 'mempool conflict'))
      const handshake = createHandshake()
      handshake.acceptSignedPayload(fixture.signedBase64)

      const result = await handshake.confirmBroadcast()

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('PSBT_BROADCAST_FAILED')
      expect(result.error.message).toBe('mempool conflict')
      const session = handshake.getSession()
      expect(session.phase).toBe('failed')
      expect(session.errorCode).toBe('PSBT_BROADCAST_FAILED')
    })

    it('should fail the session when the engine throws', async () => {
      engine.broadcastSigned.mockRejectedValueOnce(new Error('socket closed'))
      const handshake = createHandshake()
      handshake.acceptSignedPayload(fixture.signedBase64)

      const result = await handshake.confirmBroadcast()

      expect(result.ok).toBe(false)
      expect(handshake.phase).toBe('failed')
    })
  })

  describe('cancel', () => {
    it('should cancel while waiting and then refuse payloads', () => {
      const handshake = createHandshake()
      handshake.markExported()

      expect(handshake.cancel().ok).toBe(true)
      expect(handshake.phase).toBe('cancelled')

      const result = handshake.acceptSignedPayload(fixture.signedBase64)
      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('INVALID_STATE')
    })

    it('should cancel from confirmingBroadcast without broadcasting', () => {
      const handshake = createHandshake()
      handshake.acceptSignedPayload(fixture.signedBase64)
      expect(handshake.cancel().ok).toBe(true)
      expect(engine.broadcastSigned).not.toHaveBeenCalled()
    })

    it('should not cancel once broadcasting has started', async () => {
      const pending = createDeferred<Result<string>>()
      engine.broadcastSigned.mockReturnValueOnce(pending.promise)
      const handshake = createHandshake()
      handshake.acceptSignedPayload(fixture.signedBase64)

      const broadcast = handshake.confirmBroadcast()
      expect(handshake.phase).toBe('broadcasting')

      const result = handshake.cancel()
      expect(result.ok).toBe(false)
      if (!result.ok) expect(result.error.code).toBe('PSBT_CANCEL_NOT_ALLOWED')

      pending.resolve(ok(TEST_TXID))
      await broadcast
      expect(handshake.phase).toBe('done')
    })
  })

  describe('subscribe', () => {
    it('should notify listeners of each phase until unsubscribed', async () => {
      const handshake = createHandshake()
      const phases: string[] = []
      const listener = vi.fn((session: Readonly<PsbtSession>) => {
        phases.push(session.phase)
      })
      const unsubscribe = handshake.subscribe(listener)

      handshake.markExported()
      handshake.acceptSignedPayload(fixture.signedBase64)
      await handshake.confirmBroadcast()
      unsubscribe()
      handshake.cancel()

      expect(phases).toEqual(['awaitingSigned', 'confirmingBroadcast', 'broadcasting', 'done'])
    })

    it('should hand out snapshots that later changes do not touch', () => {
      const handshake = createHandshake()
      const before = handshake.getSession()
      handshake.markExported()
      expect(before.phase).toBe('exporting')
      expect(Object.isFrozen(before)).toBe(true)
    })
  })
})
