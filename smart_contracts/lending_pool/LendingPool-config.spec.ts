import { beforeEach, describe, expect, test } from 'vitest'
import { InMemoryToken } from '../shared/token'
import { createTestRuntime, setupProtocol, testConfig, txnFrom, type TestProtocol } from '../testing-utils'
import { deployLendingProtocol } from './pool-deploy'

describe('lending-pool Testing - config', () => {
  let protocol: TestProtocol

  beforeEach(() => {
    protocol = setupProtocol()
  })

  test('deploys with the default parameters', () => {
    const { pool, oracle, rateModel, admin } = protocol

    expect(pool.getAdmin()).toEqual(admin.addr.toString())
    expect(pool.getAssets()).toEqual({ collateralAsset: 'XLM', borrowAsset: 'USDC' })
    expect(pool.getRiskParameters()).toEqual({ ltvBps: 7_500n, liquidationThresholdBps: 8_000n })
    expect(pool.getLiquidationParameters()).toEqual({ bonusBps: 0n, closeFactorBps: 10_000n })
    expect(oracle.getStalenessThreshold()).toEqual(3_600n)
    expect(rateModel.getOptimalUtilization()).toEqual(8_000_000n)
    expect(pool.getBorrowIndex()).toEqual(1_000_000_000n)
    expect(pool.getSupplyIndex()).toEqual(1_000_000_000n)
  })

  test('cannot initialize twice', () => {
    const { pool, fundedAccount } = protocol
    expect(() =>
      pool.initialize(txnFrom(fundedAccount()), { collateralAsset: 'ETH', borrowAsset: 'USDC' }),
    ).toThrowError(expect.objectContaining({ code: 'AlreadyInitialized' }))
    expect(pool.getAssets().collateralAsset).toEqual('XLM')
  })

  test('admin updates risk parameters', () => {
    const { pool, admin, events } = protocol

    pool.setRiskParameters(txnFrom(admin), { ltvBps: 6_000n, liquidationThresholdBps: 7_000n })

    expect(pool.getRiskParameters()).toEqual({ ltvBps: 6_000n, liquidationThresholdBps: 7_000n })
    expect(events.names()).toEqual(['riskParametersUpdated'])
  })

  test('risk parameters must be ordered', () => {
    const { pool, admin } = protocol
    const invalid = [
      { ltvBps: 0n, liquidationThresholdBps: 8_000n },
      { ltvBps: 8_000n, liquidationThresholdBps: 8_000n },
      { ltvBps: 9_000n, liquidationThresholdBps: 8_000n },
      { ltvBps: 7_500n, liquidationThresholdBps: 10_000n },
    ]
    for (const params of invalid) {
      expect(() => pool.setRiskParameters(txnFrom(admin), params)).toThrowError(
        expect.objectContaining({ code: 'InvalidInput' }),
      )
    }
    expect(pool.getRiskParameters()).toEqual({ ltvBps: 7_500n, liquidationThresholdBps: 8_000n })
  })

  test('liquidation parameters are bounded', () => {
    const { pool, admin } = protocol
    expect(() => pool.setLiquidationParameters(txnFrom(admin), { bonusBps: 0n, closeFactorBps: 0n })).toThrowError(
      expect.objectContaining({ code: 'InvalidInput' }),
    )
    expect(() =>
      pool.setLiquidationParameters(txnFrom(admin), { bonusBps: 10_001n, closeFactorBps: 5_000n }),
    ).toThrowError(expect.objectContaining({ code: 'InvalidInput' }))

    pool.setLiquidationParameters(txnFrom(admin), { bonusBps: 1_000n, closeFactorBps: 5_000n })
    expect(pool.getLiquidationParameters()).toEqual({ bonusBps: 1_000n, closeFactorBps: 5_000n })
  })

  test('only the admin configures the pool', () => {
    const { pool, fundedAccount } = protocol
    const stranger = fundedAccount()

    expect(() =>
      pool.setRiskParameters(txnFrom(stranger), { ltvBps: 5_000n, liquidationThresholdBps: 6_000n }),
    ).toThrowError(expect.objectContaining({ code: 'Unauthorized' }))
    expect(() => pool.setAdmin(txnFrom(stranger), stranger.addr)).toThrowError(
      expect.objectContaining({ code: 'Unauthorized' }),
    )
  })

  test('admin hands over the pool', () => {
    const { pool, admin, fundedAccount } = protocol
    const successor = fundedAccount()

    pool.setAdmin(txnFrom(admin), successor.addr)

    expect(pool.getAdmin()).toEqual(successor.addr.toString())
    expect(() =>
      pool.setLiquidationParameters(txnFrom(admin), { bonusBps: 100n, closeFactorBps: 5_000n }),
    ).toThrowError(expect.objectContaining({ code: 'Unauthorized' }))
    pool.setLiquidationParameters(txnFrom(successor), { bonusBps: 100n, closeFactorBps: 5_000n })
  })

  test('deployment rejects an invalid configuration', () => {
    const { runtime } = createTestRuntime()
    const config = testConfig({ risk: { ltvBps: 8_500n, liquidationThresholdBps: 8_000n } })

    expect(() =>
      deployLendingProtocol({
        adminTxn: txnFrom(protocol.fundedAccount()),
        config,
        runtime,
        tokens: { lendable: new InMemoryToken('USDC'), collateral: new InMemoryToken('XLM') },
      }),
    ).toThrowError(expect.objectContaining({ code: 'InvalidInput' }))
  })

  test('collateral and borrow asset must differ', () => {
    const { runtime } = createTestRuntime()

    expect(() =>
      deployLendingProtocol({
        adminTxn: txnFrom(protocol.fundedAccount()),
        config: testConfig({ collateralAsset: 'USDC' }),
        runtime,
        tokens: { lendable: new InMemoryToken('USDC'), collateral: new InMemoryToken('USDC') },
      }),
    ).toThrowError(expect.objectContaining({ code: 'InvalidInput' }))
  })
})
