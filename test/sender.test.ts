import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ConfirmationTimeoutError, DecodeError, InvalidKeyError, SequenceMismatchError, TransactionRejectedError } from '../src/errors'
import type { BroadcastFailure } from '../src/tx/broadcast'
import { signTx } from '../src/tx/encode'
import { VoidSigner } from '../src/wallet/signer'
import { ONE_TOKEN, startHarness, type Harness } from './helpers/harness'

function failureOf(result: { ok: true } | { ok: false; error: BroadcastFailure }): BroadcastFailure {
  if (result.ok) throw new Error('expected the send to fail')
  return result.error
}

describe('TxSender', () => {
  let h: Harness

  beforeEach(async () => {
    h = await startHarness()
  })
  afterEach(async () => {
    await h.close()
  })

  const transfer = () => ({ kind: 'transfer' as const, amount: ONE_TOKEN, to: h.bob.address })

  it('returns only the hash in async mode', async () => {
    const result = await h.client.sender(h.alice).send(transfer(), { mode: 'async' })
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value.status).toBe('pending')
    expect(result.value.height).toBeNull()
    expect(result.value.hash).toBe(h.node.broadcasts[0].hash)
    expect(h.node.broadcasts[0].method).toBe('broadcast_tx_async')
  })

  it('reports acceptance in sync mode', async () => {
    const result = await h.client.sender(h.alice).send(transfer(), { mode: 'sync' })
    expect(result.ok && result.value.status).toBe('accepted')
    expect(h.node.broadcasts[0].method).toBe('broadcast_tx_sync')
  })

  it('waits for inclusion in commit mode', async () => {
    const result = await h.client.sender(h.alice).send(transfer())
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.value).toEqual({
      hash: h.node.broadcasts[0].hash,
      status: 'committed',
      height: h.node.height,
      gasUsed: 1_500_000n,
      data: null
    })
    expect(h.node.balanceOf(h.bob.address)).toBe(ONE_TOKEN)
  })

  it('numbers consecutive sends from one account', async () => {
    const sender = h.client.sender(h.alice)
    await Promise.all([sender.sendOrThrow(transfer()), sender.sendOrThrow(transfer()), sender.sendOrThrow(transfer())])
    expect(h.node.broadcasts.map((b) => b.message.sequence)).toEqual([0n, 1n, 2n])
    expect(h.node.sequenceOf(h.alice.address)).toBe(3n)
  })

  it('gives the sequence back after a mempool rejection', async () => {
    h.node.rejectNext.push({ stage: 'check', code: 11, log: 'mempool is full' })
    const error = failureOf(await h.client.sender(h.alice).send(transfer()))
    expect(error).toBeInstanceOf(TransactionRejectedError)
    expect(error instanceof TransactionRejectedError && error.stage).toBe('check')
    expect(error.code).toBe(11)
    expect(h.client.sequences.peek(h.alice.address)).toBeUndefined()

    await h.client.sender(h.alice).sendOrThrow(transfer())
    expect(h.node.broadcasts.map((b) => b.message.sequence)).toEqual([0n, 0n])
  })

  it('keeps the sequence used by a failed execution', async () => {
    h.node.rejectNext.push({ stage: 'deliver', code: 33, log: 'out of gas' })
    const error = failureOf(await h.client.sender(h.alice).send(transfer()))
    expect(error instanceof TransactionRejectedError && error.stage).toBe('deliver')
    expect(error.message).toBe('transaction rejected (code 33): info: out of gas; log: out of gas')
    expect(h.client.sequences.peek(h.alice.address)).toEqual({ baseline: 0n, issued: 1n })

    await h.client.sender(h.alice).sendOrThrow(transfer())
    expect(h.node.broadcasts.map((b) => b.message.sequence)).toEqual([0n, 1n])
  })

  it('re-reads the sequence and retries once after a mismatch', async () => {
    const sender = h.client.sender(h.alice)
    await sender.sendOrThrow(transfer())
    h.node.bumpSequence(h.alice.address, 2n)

    const result = await sender.send(transfer())
    expect(result.ok).toBe(true)
    expect(h.node.broadcasts.map((b) => [b.message.sequence, b.code])).toEqual([
      [0n, 0],
      [1n, 2],
      [3n, 0]
    ])
  })

  it('returns a second mismatch to the caller', async () => {
    h.node.rejectNext.push(
      { stage: 'check', code: 2, log: 'invalid sequence' },
      { stage: 'check', code: 2, log: 'invalid sequence' }
    )
    const error = failureOf(await h.client.sender(h.alice).send(transfer()))
    expect(error).toBeInstanceOf(SequenceMismatchError)
    expect(h.node.broadcasts).toHaveLength(2)
  })

  it('times out locally when a commit never answers', async () => {
    const slow = await startHarness({ commitTimeoutMs: 50 })
    try {
      slow.node.stallCommits = true
      const error = failureOf(await slow.client.sender(slow.alice).send(transfer()))
      expect(error).toBeInstanceOf(ConfirmationTimeoutError)
      if (!(error instanceof ConfirmationTimeoutError)) return
      expect(error.timeoutMs).toBe(50)
      expect(slow.client.sequences.peek(slow.alice.address)).toEqual({ baseline: 0n, issued: 1n })

      const found = await slow.client.txStatus(error.txHash)
      expect(found?.txResult.code).toBe(0)
      expect(found?.height).toBe(slow.node.height)
    } finally {
      await slow.close()
    }
  })

  it('broadcasts a second send while the first still waits for commit', async () => {
    const slow = await startHarness({ commitTimeoutMs: 500 })
    try {
      slow.node.stallCommits = true
      const sender = slow.client.sender(slow.alice)
      const first = sender.send(transfer())
      const second = sender.send(transfer())
      await vi.waitFor(() => expect(slow.node.broadcasts.map((b) => b.message.sequence)).toEqual([0n, 1n]), {
        timeout: 300,
        interval: 5
      })

      const results = await Promise.all([first, second])
      expect(results.map((r) => !r.ok && r.error instanceof ConfirmationTimeoutError)).toEqual([true, true])
      expect(slow.client.sequences.peek(slow.alice.address)).toEqual({ baseline: 0n, issued: 2n })
    } finally {
      await slow.close()
    }
  })

  it('keeps a committed receipt when its return value does not decode', async () => {
    const prepared = await h.client.builder.prepare(transfer(), h.alice.address)
    const signed = await signTx(h.alice, h.client.builder.bind(prepared, 0n), h.node.chainId)
    const result = await h.client.broadcaster.submit(signed, 'commit', () => {
      throw new DecodeError('unexpected return')
    })
    expect(result).toEqual({
      ok: true,
      value: { hash: signed.hash, status: 'committed', height: h.node.height, gasUsed: 1_500_000n, data: null }
    })
  })

  it('maps the node commit timeout to a confirmation timeout', async () => {
    h.node.commitTimesOut = true
    const error = failureOf(await h.client.sender(h.alice).send(transfer()))
    expect(error).toBeInstanceOf(ConfirmationTimeoutError)
  })

  it('reports unknown hashes as not found', async () => {
    expect(await h.client.txStatus('AB'.repeat(32))).toBeNull()
  })

  it('refuses to send without a secret key', async () => {
    const sender = h.client.sender(new VoidSigner(h.alice.address))
    await expect(sender.send(transfer())).rejects.toThrow(InvalidKeyError)
    expect(h.node.broadcasts).toEqual([])
  })
})
