import {
  BASIS_POINTS,
  HEALTH_FACTOR_INFINITE,
  HEALTH_FACTOR_SCALE,
  PRICE_SCALE,
} from '../shared/config'
import { assert } from '../shared/errors'
import { min, mulDiv, mulDivUp, saturatingSub } from '../shared/math'
import type { LiquidationParameters, RiskParameters } from './config'

// Stateless valuation over balances, prices and risk parameters. USD values are scale 1e7.

export interface PositionInputs {
  collateral: bigint
  debt: bigint
  collateralPrice: bigint
  borrowPrice: bigint
  risk: RiskParameters
}

export function collateralValueUsd(collateral: bigint, collateralPrice: bigint): bigint {
  return mulDiv(collateral, collateralPrice, PRICE_SCALE)
}

/** Rounded up, so any non-zero debt at a positive price is worth at least one unit. */
export function debtValueUsd(debt: bigint, borrowPrice: bigint): bigint {
  return mulDivUp(debt, borrowPrice, PRICE_SCALE)
}

export function maxBorrowUsd(position: PositionInputs): bigint {
  return mulDiv(collateralValueUsd(position.collateral, position.collateralPrice), position.risk.ltvBps, BASIS_POINTS)
}

/** Borrowing capacity in borrow-asset units, including debt already taken. */
export function maxBorrow(position: PositionInputs): bigint {
  return mulDiv(maxBorrowUsd(position), PRICE_SCALE, position.borrowPrice)
}

/**
 * Threshold-weighted collateral over debt, scale 1e7.
 * @returns `HEALTH_FACTOR_INFINITE` when there is no debt
 */
export function healthFactor(position: PositionInputs): bigint {
  if (position.debt === 0n) return HEALTH_FACTOR_INFINITE
  const collateralUsd = collateralValueUsd(position.collateral, position.collateralPrice)
  const weighted = mulDiv(collateralUsd, position.risk.liquidationThresholdBps, BASIS_POINTS)
  return mulDiv(weighted, HEALTH_FACTOR_SCALE, debtValueUsd(position.debt, position.borrowPrice))
}

export function isLiquidatable(position: PositionInputs): boolean {
  return healthFactor(position) < HEALTH_FACTOR_SCALE
}

/**
 * Smallest collateral balance that keeps the position at a health factor of 1.0.
 */
export function minimumCollateral(position: PositionInputs): bigint {
  if (position.debt === 0n) return 0n
  const debtUsd = debtValueUsd(position.debt, position.borrowPrice)
  const weightedNeeded = mulDivUp(debtUsd, BASIS_POINTS, position.risk.liquidationThresholdBps)
  return mulDivUp(weightedNeeded, PRICE_SCALE, position.collateralPrice)
}

export function maxWithdrawableCollateral(position: PositionInputs): bigint {
  return saturatingSub(position.collateral, minimumCollateral(position))
}

// ═══════════════════════════════════════════════════════════════════════
// LIQUIDATION
// ═══════════════════════════════════════════════════════════════════════

export interface LiquidationRequest {
  debt: bigint
  collateral: bigint
  requested: bigint
  collateralPrice: bigint
  borrowPrice: bigint
  params: LiquidationParameters
}

export interface LiquidationQuote {
  repay: bigint
  seize: bigint
}

/** Collateral paid out for `repay` units of debt, bonus included, before capping. */
export function collateralForRepayment(
  repay: bigint,
  borrowPrice: bigint,
  collateralPrice: bigint,
  bonusBps: bigint,
): bigint {
  return mulDiv(repay * borrowPrice, BASIS_POINTS + bonusBps, collateralPrice * BASIS_POINTS)
}

/** Most debt one liquidation may repay; the whole debt once the close factor truncates to nothing. */
export function closeFactorCap(debt: bigint, closeFactorBps: bigint): bigint {
  const cap = mulDiv(debt, closeFactorBps, BASIS_POINTS)
  return cap > 0n ? cap : debt
}

/**
 * Sizes a liquidation. Every request is clamped to the close factor. When the
 * clamped repayment would already take all of the collateral, only a request
 * for the whole debt goes through, and it repays the whole debt.
 */
export function quoteLiquidation(request: LiquidationRequest): LiquidationQuote {
  const { debt, collateral, requested, collateralPrice, borrowPrice, params } = request
  const repay = min(requested, closeFactorCap(debt, params.closeFactorBps))
  const seize = min(collateralForRepayment(repay, borrowPrice, collateralPrice, params.bonusBps), collateral)

  if (seize === collateral && repay < debt) {
    assert(requested >= debt, 'FullRepaymentRequired', 'collateral exhausted before debt')
    return { repay: debt, seize: collateral }
  }
  assert(seize > 0n || repay === debt, 'InvalidInput', 'repayment too small to seize collateral')
  return { repay, seize }
}
