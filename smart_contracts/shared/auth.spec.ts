import algosdk from 'algosdk'
import { beforeEach, describe, expect, test } from 'vitest'
import { PriceOracle } from '../price_oracle/PriceOracle'
import { createTestRuntime } from '../testing-utils'
import { callSigner, HostAuthorizer, signCall, SignatureAuthorizer } from './auth'

const unauthorized = expect.objectContaining({ code: 'Unauthorized' })

describe('shared Testing - authorization', () => {
  const alice = algosdk.generateAccount()
  const bob = algosdk.generateAccount()
  const call = { app: 'lending-pool', method: 'deposit', args: [500n] } as const

  describe('HostAuthorizer', () => {
    const authorizer = new HostAuthorizer()

    test('accepts the principal as sender', () => {
      expect(() =>
        authorizer.requireAuthorization(alice.addr.toString(), { ...call, txn: { sender: alice.addr } }),
      ).not.toThrow()
    })

    test('rejects anyone else', () => {
      expect(() => authorizer.requireAuthorization(alice.addr.toString(), { ...call, txn: { sender: bob.addr } })).toThrowError(
        unauthorized,
      )
    })
  })

  describe('SignatureAuthorizer', () => {
    let authorizer: SignatureAuthorizer

    beforeEach(() => {
      authorizer = new SignatureAuthorizer()
    })

    test('accepts a call signed by the principal', () => {
      const txn = signCall(alice, call, 1n)
      expect(() => authorizer.requireAuthorization(alice.addr.toString(), { ...call, txn })).not.toThrow()
    })

    test('rejects a replayed nonce', () => {
      const txn = signCall(alice, call, 7n)
      authorizer.requireAuthorization(alice.addr.toString(), { ...call, txn })
      expect(() => authorizer.requireAuthorization(alice.addr.toString(), { ...call, txn })).toThrowError(unauthorized)
    })

    test('the same nonce is independent per sender', () => {
      authorizer.requireAuthorization(alice.addr.toString(), { ...call, txn: signCall(alice, call, 1n) })
      expect(() =>
        authorizer.requireAuthorization(bob.addr.toString(), { ...call, txn: signCall(bob, call, 1n) }),
      ).not.toThrow()
    })

    test('rejects arguments other than the signed ones', () => {
      const txn = signCall(alice, call, 1n)
      expect(() => authorizer.requireAuthorization(alice.addr.toString(), { ...call, args: [501n], txn })).toThrowError(
        unauthorized,
      )
    })

    test('rejects a signature by someone else', () => {
      const forged = { ...signCall(bob, call, 1n), sender: alice.addr }
      expect(() => authorizer.requireAuthorization(alice.addr.toString(), { ...call, txn: forged })).toThrowError(unauthorized)
    })

    test('rejects an unsigned call', () => {
      expect(() => authorizer.requireAuthorization(alice.addr.toString(), { ...call, txn: { sender: alice.addr } })).toThrowError(
        unauthorized,
      )
    })
  })

  test('signed admin calls drive a contract end to end', () => {
    const { runtime, clock } = createTestRuntime(new SignatureAuthorizer())
    const sign = callSigner(alice)
    const oracle = new PriceOracle(runtime)

    oracle.initialize(sign({ app: oracle.appName, method: 'initialize', args: [3_600n] }))
    oracle.setPrice(sign({ app: oracle.appName, method: 'setPrice', args: ['XLM', 1_200_000n] }), 'XLM', 1_200_000n)

    expect(oracle.getPrice('XLM')).toEqual(1_200_000n)
    expect(oracle.getLastUpdate('XLM')).toEqual(clock.now())
    expect(() =>
      oracle.setPrice(signCall(alice, { app: oracle.appName, method: 'setPrice', args: ['XLM', 1n] }, 1n), 'XLM', 1n),
    ).toThrowError(unauthorized)
    expect(oracle.getPrice('XLM')).toEqual(1_200_000n)
  })
})
