import type { Address } from 'algosdk'
import type { RateModel } from '../interest_rate_model/InterestRateModel'
import type { PriceFeed } from '../price_oracle/config'
import {
  BASIS_POINTS,
  DEFAULT_CLOSE_FACTOR_BPS,
  DEFAULT_LIQUIDATION_BONUS_BPS,
  DEFAULT_LIQUIDATION_THRESHOLD_BPS,
  DEFAULT_LTV_BPS,
  HEALTH_FACTOR_INFINITE,
  HEALTH_FACTOR_SCALE,
} from '../shared/config'
import { Contract } from '../shared/Contract'
import { assert } from '../shared/errors'
import { checkedI128, min, requirePositiveAmount, saturatingSub } from '../shared/math'
import type { CallArg, Runtime, Txn } from '../shared/runtime'
import type { PoolTokens } from '../shared/token'
import {
  bookBorrow,
  bookDeposit,
  bookRepayment,
  bookWithdrawal,
  liveDebt,
  liveDeposit,
  readAccount,
  writeAccount,
} from './accounts'
import { accrueMarket, marketOf, previewAccrual, reportedIndex, utilizationOf, type MarketSnapshot } from './accrual'
import {
  createPoolState,
  type AccountPosition,
  type LiquidationParameters,
  type LiquidationResult,
  type PoolInitOptions,
  type PoolState,
  type RiskParameters,
} from './config'
import * as risk from './RiskEngine'

export interface PoolDependencies {
  oracle: PriceFeed
  rates: RateModel
  tokens: PoolTokens
}

type AccountId = Address | string

export function validateRiskParameters(params: RiskParameters): void {
  const { ltvBps, liquidationThresholdBps } = params
  assert(
    ltvBps > 0n && ltvBps < liquidationThresholdBps && liquidationThresholdBps < BASIS_POINTS,
    'InvalidInput',
    'require 0 < ltv < liquidation threshold < 10000',
  )
}

export function validateLiquidationParameters(params: LiquidationParameters): void {
  assert(params.bonusBps >= 0n && params.bonusBps <= BASIS_POINTS, 'InvalidInput', 'bonus must be within [0, 10000]')
  assert(
    params.closeFactorBps > 0n && params.closeFactorBps <= BASIS_POINTS,
    'InvalidInput',
    'close factor must be within (0, 10000]',
  )
}

/**
 * Single-collateral, single-borrow-asset pool.
 *
 * Every mutating entry point accrues interest first, checks everything it needs
 * to, mutates the ledger and moves tokens last.
 */
export class LendingPool extends Contract<PoolState> {
  private readonly oracle: PriceFeed
  private readonly rates: RateModel
  private readonly tokens: PoolTokens

  constructor(
    runtime: Runtime,
    dependencies: PoolDependencies,
    state: PoolState = createPoolState(),
    appName = 'lending-pool',
  ) {
    super(appName, state, runtime)
    this.oracle = dependencies.oracle
    this.rates = dependencies.rates
    this.tokens = dependencies.tokens
  }

  // ═══════════════════════════════════════════════════════════════════════
  // ADMIN
  // ═══════════════════════════════════════════════════════════════════════

  public initialize(txn: Txn, options: PoolInitOptions): void {
    this.atomic('initialize', () => {
      assert(this.state.admin === undefined, 'AlreadyInitialized')
      const { collateralAsset, borrowAsset } = options
      assert(collateralAsset.length > 0 && borrowAsset.length > 0, 'InvalidInput', 'asset symbols required')
      assert(collateralAsset !== borrowAsset, 'InvalidInput', 'collateral and borrow asset must differ')

      const riskParams = options.risk ?? { ltvBps: DEFAULT_LTV_BPS, liquidationThresholdBps: DEFAULT_LIQUIDATION_THRESHOLD_BPS }
      const liquidationParams = options.liquidation ?? {
        bonusBps: DEFAULT_LIQUIDATION_BONUS_BPS,
        closeFactorBps: DEFAULT_CLOSE_FACTOR_BPS,
      }
      validateRiskParameters(riskParams)
      validateLiquidationParameters(liquidationParams)

      const admin = txn.sender.toString()
      this.authorize(admin, txn, 'initialize', [collateralAsset, borrowAsset])

      this.state.admin = admin
      this.state.collateralAsset = collateralAsset
      this.state.borrowAsset = borrowAsset
      this.state.risk = { ...riskParams }
      this.state.liquidation = { ...liquidationParams }
      this.state.lastAccrualTime = this.now
    })
  }

  public setRiskParameters(txn: Txn, params: RiskParameters): void {
    this.atomic('setRiskParameters', () => {
      this.requireAdmin(txn, 'setRiskParameters', [params.ltvBps, params.liquidationThresholdBps])
      validateRiskParameters(params)
      this.state.risk = { ...params }
      this.emit('riskParametersUpdated', {
        ltvBps: params.ltvBps,
        liquidationThresholdBps: params.liquidationThresholdBps,
      })
    })
  }

  public setLiquidationParameters(txn: Txn, params: LiquidationParameters): void {
    this.atomic('setLiquidationParameters', () => {
      this.requireAdmin(txn, 'setLiquidationParameters', [params.bonusBps, params.closeFactorBps])
      validateLiquidationParameters(params)
      this.state.liquidation = { ...params }
      this.emit('liquidationParametersUpdated', { bonusBps: params.bonusBps, closeFactorBps: params.closeFactorBps })
    })
  }

  public setAdmin(txn: Txn, newAdmin: Address): void {
    this.atomic('setAdmin', () => {
      const admin = newAdmin.toString()
      this.requireAdmin(txn, 'setAdmin', [admin])
      this.state.admin = admin
      this.emit('adminChanged', { admin })
    })
  }

  /**
   * Brings the market up to the current time. Open to anyone.
   * @returns Interest added to total borrows
   */
  public accrueInterest(): bigint {
    return this.atomic('accrueInterest', () => {
      this.requireInitialized()
      return this.accrue()
    })
  }

  // ═══════════════════════════════════════════════════════════════════════
  // LENDING
  // ═══════════════════════════════════════════════════════════════════════

  public deposit(txn: Txn, amount: bigint): void {
    this.atomic('deposit', () => {
      const user = this.requireUser(txn, 'deposit', amount)
      this.accrue()

      const record = readAccount(this.state, user)
      bookDeposit(this.state, record, amount)
      writeAccount(this.state, user, record)

      this.emit('deposit', { account: user, amount })
      this.tokens.lendable.transferIn(user, amount)
    })
  }

  public withdraw(txn: Txn, amount: bigint): void {
    this.atomic('withdraw', () => {
      const user = this.requireUser(txn, 'withdraw', amount)
      this.accrue()

      const record = readAccount(this.state, user)
      const balance = liveDeposit(record, this.state.supplyIndex)
      assert(amount <= balance, 'InsufficientBalance', `deposit balance ${balance}`)
      assert(amount <= this.availableLiquidity(), 'InsufficientLiquidity')

      bookWithdrawal(this.state, record, amount)
      writeAccount(this.state, user, record)
      this.requireSolvent()

      this.emit('withdraw', { account: user, amount })
      this.tokens.lendable.transferOut(user, amount)
    })
  }

  // ═══════════════════════════════════════════════════════════════════════
  // COLLATERAL
  // ═══════════════════════════════════════════════════════════════════════

  public depositCollateral(txn: Txn, amount: bigint): void {
    this.atomic('depositCollateral', () => {
      const user = this.requireUser(txn, 'depositCollateral', amount)
      this.accrue()

      const record = readAccount(this.state, user)
      record.collateralBalance = checkedI128(record.collateralBalance + amount)
      writeAccount(this.state, user, record)

      this.emit('collateralDeposited', { account: user, amount })
      this.tokens.collateral.transferIn(user, amount)
    })
  }

  public withdrawCollateral(txn: Txn, amount: bigint): void {
    this.atomic('withdrawCollateral', () => {
      const user = this.requireUser(txn, 'withdrawCollateral', amount)
      this.accrue()

      const record = readAccount(this.state, user)
      assert(amount <= record.collateralBalance, 'InsufficientBalance', `collateral balance ${record.collateralBalance}`)

      const remaining = record.collateralBalance - amount
      const debt = liveDebt(record, this.state.borrowIndex)
      if (debt > 0n) {
        const projected = risk.healthFactor(this.positionInputs(remaining, debt))
        assert(projected >= HEALTH_FACTOR_SCALE, 'UnhealthyPosition', `health factor would drop to ${projected}`)
      }

      record.collateralBalance = remaining
      writeAccount(this.state, user, record)

      this.emit('collateralWithdrawn', { account: user, amount })
      this.tokens.collateral.transferOut(user, amount)
    })
  }

  // ═══════════════════════════════════════════════════════════════════════
  // BORROWING
  // ═══════════════════════════════════════════════════════════════════════

  public borrow(txn: Txn, amount: bigint): void {
    this.atomic('borrow', () => {
      const user = this.requireUser(txn, 'borrow', amount)
      this.accrue()

      assert(amount <= this.availableLiquidity(), 'InsufficientLiquidity')
      const record = readAccount(this.state, user)
      const debt = liveDebt(record, this.state.borrowIndex)
      const capacity = risk.maxBorrow(this.positionInputs(record.collateralBalance, debt))
      assert(debt + amount <= capacity, 'ExceedsCapacity', `capacity ${capacity}, debt ${debt}`)

      bookBorrow(this.state, record, amount)
      writeAccount(this.state, user, record)
      this.requireSolvent()

      this.emit('borrow', { account: user, amount })
      this.tokens.lendable.transferOut(user, amount)
    })
  }

  /**
   * Repays up to `amount`; anything above the live debt is not taken.
   * @returns Amount actually repaid
   */
  public repay(txn: Txn, amount: bigint): bigint {
    return this.atomic('repay', () => {
      const user = this.requireUser(txn, 'repay', amount)
      this.accrue()

      const record = readAccount(this.state, user)
      const debt = liveDebt(record, this.state.borrowIndex)
      assert(debt > 0n, 'NoOutstandingDebt')
      const repayAmount = min(amount, debt)

      bookRepayment(this.state, record, repayAmount)
      writeAccount(this.state, user, record)

      this.emit('repay', { account: user, amount: repayAmount })
      this.tokens.lendable.transferIn(user, repayAmount)
      return repayAmount
    })
  }

  /**
   * Repays part or all of an unhealthy borrower's debt in exchange for collateral.
   * @param borrower - Account being liquidated
   * @param requested - Debt to repay; the full live debt when omitted
   */
  public liquidate(txn: Txn, borrower: AccountId, requested?: bigint): LiquidationResult {
    return this.atomic('liquidate', () => {
      this.requireInitialized()
      const liquidator = txn.sender.toString()
      const target = borrower.toString()
      const args: CallArg[] = requested === undefined ? [target] : [target, requested]
      this.authorize(liquidator, txn, 'liquidate', args)
      assert(target !== liquidator, 'InvalidInput', 'cannot liquidate own position')
      if (requested !== undefined) requirePositiveAmount(requested, 'repay amount')
      this.accrue()

      const record = readAccount(this.state, target)
      const debt = liveDebt(record, this.state.borrowIndex)
      const inputs = this.positionInputs(record.collateralBalance, debt)
      const healthFactorBefore = risk.healthFactor(inputs)
      assert(healthFactorBefore < HEALTH_FACTOR_SCALE, 'PositionHealthy', `health factor ${healthFactorBefore}`)

      const { repay, seize } = risk.quoteLiquidation({
        debt,
        collateral: record.collateralBalance,
        requested: requested ?? debt,
        collateralPrice: inputs.collateralPrice,
        borrowPrice: inputs.borrowPrice,
        params: this.state.liquidation,
      })

      bookRepayment(this.state, record, repay)
      record.collateralBalance -= seize
      writeAccount(this.state, target, record)

      this.emit('liquidation', { borrower: target, liquidator, repaid: repay, collateralSeized: seize })
      // The host aborts the whole call if a transfer fails; the liquidator's
      // payment, the one that can fail for lack of funds, goes first.
      this.tokens.lendable.transferIn(liquidator, repay)
      if (seize > 0n) this.tokens.collateral.transferOut(liquidator, seize)
      return { repaid: repay, collateralSeized: seize, healthFactorBefore }
    })
  }

  // ═══════════════════════════════════════════════════════════════════════
  // QUERIES (read-only accrual preview)
  // ═══════════════════════════════════════════════════════════════════════

  public getTotalDeposits(): bigint {
    return this.view().totalDeposits
  }

  public getTotalBorrows(): bigint {
    return this.view().totalBorrows
  }

  /** Scale 1e7. */
  public getUtilization(): bigint {
    const market = this.view()
    return utilizationOf(market.totalDeposits, market.totalBorrows)
  }

  public getBorrowRate(): bigint {
    this.requireInitialized()
    return this.rates.getBorrowRate(this.getUtilization())
  }

  public getSupplyRate(): bigint {
    this.requireInitialized()
    return this.rates.getSupplyRate(this.getUtilization())
  }

  /** Scale 1e9. */
  public getBorrowIndex(): bigint {
    return reportedIndex(this.view().borrowIndex)
  }

  /** Scale 1e9. */
  public getSupplyIndex(): bigint {
    return reportedIndex(this.view().supplyIndex)
  }

  /** Stored value; queries never move it. */
  public getLastAccrualTime(): bigint {
    return this.state.lastAccrualTime
  }

  public getDepositBalance(user: AccountId): bigint {
    return liveDeposit(readAccount(this.state, user.toString()), this.view().supplyIndex)
  }

  public getBorrowBalance(user: AccountId): bigint {
    return liveDebt(readAccount(this.state, user.toString()), this.view().borrowIndex)
  }

  public getCollateralBalance(user: AccountId): bigint {
    return readAccount(this.state, user.toString()).collateralBalance
  }

  public getHealthFactor(user: AccountId): bigint {
    const debt = this.getBorrowBalance(user)
    if (debt === 0n) return HEALTH_FACTOR_INFINITE
    return risk.healthFactor(this.positionInputs(this.getCollateralBalance(user), debt))
  }

  public isLiquidatable(user: AccountId): boolean {
    return this.getHealthFactor(user) < HEALTH_FACTOR_SCALE
  }

  /** Remaining borrowing headroom in borrow-asset units. */
  public getMaxBorrow(user: AccountId): bigint {
    const debt = this.getBorrowBalance(user)
    const capacity = risk.maxBorrow(this.positionInputs(this.getCollateralBalance(user), debt))
    return saturatingSub(capacity, debt)
  }

  public getMaxWithdrawableCollateral(user: AccountId): bigint {
    const collateral = this.getCollateralBalance(user)
    const debt = this.getBorrowBalance(user)
    if (debt === 0n) return collateral
    return risk.maxWithdrawableCollateral(this.positionInputs(collateral, debt))
  }

  public getPosition(user: AccountId): AccountPosition {
    const account = user.toString()
    const collateral = this.getCollateralBalance(account)
    const debt = this.getBorrowBalance(account)
    const inputs = this.positionInputs(collateral, debt)
    return {
      account,
      deposit: this.getDepositBalance(account),
      debt,
      collateral,
      collateralValueUsd: risk.collateralValueUsd(collateral, inputs.collateralPrice),
      debtValueUsd: risk.debtValueUsd(debt, inputs.borrowPrice),
      maxBorrow: saturatingSub(risk.maxBorrow(inputs), debt),
      healthFactor: risk.healthFactor(inputs),
    }
  }

  public getRiskParameters(): RiskParameters {
    return { ...this.state.risk }
  }

  public getLiquidationParameters(): LiquidationParameters {
    return { ...this.state.liquidation }
  }

  public getAdmin(): string {
    assert(this.state.admin !== undefined, 'NotInitialized')
    return this.state.admin
  }

  public getAssets(): { collateralAsset: string; borrowAsset: string } {
    return { collateralAsset: this.state.collateralAsset, borrowAsset: this.state.borrowAsset }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // INTERNALS
  // ═══════════════════════════════════════════════════════════════════════

  private accrue(): bigint {
    const outcome = accrueMarket(this.state, this.now, this.rates)
    if (outcome.kind === 'current' || outcome.interest === 0n) return 0n
    this.emit('interestAccrued', {
      interest: outcome.interest,
      borrowRate: outcome.borrowRate,
      borrowIndex: reportedIndex(this.state.borrowIndex),
    })
    return outcome.interest
  }

  private view(): MarketSnapshot {
    this.requireInitialized()
    return previewAccrual(marketOf(this.state), this.now, this.rates).market
  }

  private availableLiquidity(): bigint {
    return saturatingSub(this.state.totalDeposits, this.state.totalBorrows)
  }

  // Share rounding can leave the revalued totals one unit apart from the amounts booked
  private requireSolvent(): void {
    assert(this.state.totalBorrows <= this.state.totalDeposits, 'InsufficientLiquidity')
  }

  private positionInputs(collateral: bigint, debt: bigint): risk.PositionInputs {
    return {
      collateral,
      debt,
      collateralPrice: this.oracle.getPriceSafe(this.state.collateralAsset),
      borrowPrice: this.oracle.getPriceSafe(this.state.borrowAsset),
      risk: this.state.risk,
    }
  }

  private requireInitialized(): void {
    assert(this.state.admin !== undefined, 'NotInitialized')
  }

  private requireAdmin(txn: Txn, method: string, args: readonly CallArg[]): void {
    assert(this.state.admin !== undefined, 'NotInitialized')
    this.authorize(this.state.admin, txn, method, args)
  }

  // Account-owner entry: initialized pool, positive amount, caller signs for itself
  private requireUser(txn: Txn, method: string, amount: bigint): string {
    this.requireInitialized()
    requirePositiveAmount(amount)
    const user = txn.sender.toString()
    this.authorize(user, txn, method, [amount])
    return user
  }
}
