import { beforeEach, describe, expect, test } from 'vitest'
import { SignatureAuthorizer, signCall } from '../shared/auth'
import { InMemoryToken } from '../shared/token'
import { DEFAULT_RATE_CURVE } from '../shared/config'
import { InterestRateModel } from '../interest_rate_model/InterestRateModel'
import { PriceOracle } from '../price_oracle/PriceOracle'
import { addressOf, createTestRuntime, setupProtocol, txnFrom, type TestProtocol } from '../testing-utils'
import { LendingPool } from './LendingPool'

describe('lending-pool Testing - deposit & withdraw', () => {
  let protocol: TestProtocol

  beforeEach(() => {
    protocol = setupProtocol()
  })

  test('deposit credits the account and the pool', () => {
    const { pool, lendable, events, fundedAccount } = protocol
    const lender = fundedAccount(10_000n)

    pool.deposit(txnFrom(lender), 4_000n)

    expect(pool.getDepositBalance(lender.addr)).toEqual(4_000n)
    expect(pool.getTotalDeposits()).toEqual(4_000n)
    expect(lendable.balanceOf(addressOf(lender))).toEqual(6_000n)
    expect(lendable.balanceOf('pool')).toEqual(4_000n)
    expect(events.events).toEqual([
      expect.objectContaining({ name: 'deposit', data: { account: addressOf(lender), amount: 4_000n } }),
    ])
  })

  test('deposits from one account accumulate', () => {
    const { pool, fundedAccount } = protocol
    const lender = fundedAccount(10_000n)

    pool.deposit(txnFrom(lender), 1_000n)
    pool.deposit(txnFrom(lender), 2_500n)

    expect(pool.getDepositBalance(lender.addr)).toEqual(3_500n)
    expect(pool.getTotalDeposits()).toEqual(3_500n)
  })

  test('amounts must be positive', () => {
    const { pool, fundedAccount } = protocol
    const lender = fundedAccount(10_000n)

    for (const amount of [0n, -1n]) {
      expect(() => pool.deposit(txnFrom(lender), amount)).toThrowError(expect.objectContaining({ code: 'InvalidInput' }))
      expect(() => pool.withdraw(txnFrom(lender), amount)).toThrowError(expect.objectContaining({ code: 'InvalidInput' }))
    }
    expect(pool.getTotalDeposits()).toEqual(0n)
  })

  test('a failed token transfer leaves the ledger untouched', () => {
    const { pool, fundedAccount } = protocol
    const lender = fundedAccount(100n)
    const before = pool.snapshot()

    expect(() => pool.deposit(txnFrom(lender), 101n)).toThrowError(expect.objectContaining({ code: 'TransferFailed' }))

    expect(pool.snapshot()).toEqual(before)
  })

  test('withdraw returns funds and prunes an emptied account', () => {
    const { pool, lendable, fundedAccount } = protocol
    const lender = fundedAccount(10_000n)
    pool.deposit(txnFrom(lender), 4_000n)

    pool.withdraw(txnFrom(lender), 1_000n)
    expect(pool.getDepositBalance(lender.addr)).toEqual(3_000n)
    expect(pool.getTotalDeposits()).toEqual(3_000n)

    pool.withdraw(txnFrom(lender), 3_000n)
    expect(pool.getTotalDeposits()).toEqual(0n)
    expect(lendable.balanceOf(addressOf(lender))).toEqual(10_000n)
    expect(pool.snapshot().accounts.has(addressOf(lender))).toBe(false)
  })

  test('cannot withdraw more than deposited', () => {
    const { pool, fundedAccount } = protocol
    const lender = fundedAccount(10_000n)
    const other = fundedAccount(10_000n)
    pool.deposit(txnFrom(lender), 1_000n)
    pool.deposit(txnFrom(other), 5_000n)
    const before = pool.snapshot()

    expect(() => pool.withdraw(txnFrom(lender), 1_001n)).toThrowError(
      expect.objectContaining({ code: 'InsufficientBalance' }),
    )
    expect(pool.snapshot()).toEqual(before)
  })

  test('cannot withdraw liquidity that is lent out', () => {
    const { pool, fundedAccount } = protocol
    const lender = fundedAccount(10_000n)
    const borrower = fundedAccount(0n, 10_000n)
    pool.deposit(txnFrom(lender), 10_000n)
    pool.depositCollateral(txnFrom(borrower), 10_000n)
    pool.borrow(txnFrom(borrower), 7_000n)
    const before = pool.snapshot()

    expect(() => pool.withdraw(txnFrom(lender), 3_001n)).toThrowError(
      expect.objectContaining({ code: 'InsufficientLiquidity' }),
    )
    expect(pool.snapshot()).toEqual(before)

    pool.withdraw(txnFrom(lender), 3_000n)
    expect(pool.getTotalDeposits()).toEqual(7_000n)
    expect(pool.getTotalBorrows()).toEqual(7_000n)
  })

  test('a pool that is not initialized rejects everything', () => {
    const { runtime } = createTestRuntime()
    const pool = new LendingPool(runtime, {
      oracle: new PriceOracle(runtime),
      rates: new InterestRateModel(runtime),
      tokens: { lendable: new InMemoryToken('USDC'), collateral: new InMemoryToken('XLM') },
    })
    const lender = protocol.fundedAccount(1_000n)

    expect(() => pool.deposit(txnFrom(lender), 1n)).toThrowError(expect.objectContaining({ code: 'NotInitialized' }))
    expect(() => pool.getTotalDeposits()).toThrowError(expect.objectContaining({ code: 'NotInitialized' }))
    expect(() => pool.accrueInterest()).toThrowError(expect.objectContaining({ code: 'NotInitialized' }))
  })

  test('with signature checks, only signed calls from the owner go through', () => {
    const { runtime } = createTestRuntime(new SignatureAuthorizer())
    const rates = new InterestRateModel(runtime)
    rates.initialize(DEFAULT_RATE_CURVE)
    const lendable = new InMemoryToken('USDC')
    const pool = new LendingPool(runtime, {
      oracle: new PriceOracle(runtime),
      rates,
      tokens: { lendable, collateral: new InMemoryToken('XLM') },
    })
    const admin = protocol.fundedAccount()
    const lender = protocol.fundedAccount()
    lendable.mint(addressOf(lender), 1_000n)

    pool.initialize(signCall(admin, { app: pool.appName, method: 'initialize', args: ['XLM', 'USDC'] }, 1n), {
      collateralAsset: 'XLM',
      borrowAsset: 'USDC',
    })
    expect(() => pool.deposit(txnFrom(lender), 500n)).toThrowError(expect.objectContaining({ code: 'Unauthorized' }))

    pool.deposit(signCall(lender, { app: pool.appName, method: 'deposit', args: [500n] }, 1n), 500n)
    expect(pool.getDepositBalance(lender.addr)).toEqual(500n)
  })
})
