import type { RateModel } from '../interest_rate_model/InterestRateModel'
import { INDEX_PRECISION, INDEX_SCALE, RATE_SCALE, SECONDS_PER_YEAR } from '../shared/config'
import { checkedI128, mulDiv } from '../shared/math'
import { sharesToAmount, supplyIndexAfter } from './accounts'
import type { PoolState } from './config'

export interface MarketSnapshot {
  totalDeposits: bigint
  totalBorrows: bigint
  totalDepositShares: bigint
  totalBorrowShares: bigint
  borrowIndex: bigint
  supplyIndex: bigint
  lastAccrualTime: bigint
}

export type AccrualOutcome =
  | { kind: 'current' }
  | {
      kind: 'accrued'
      elapsed: bigint
      utilization: bigint
      borrowRate: bigint
      interest: bigint
    }

/** Borrowed share of deposits, scale 1e7. Zero for an empty pool. */
export function utilizationOf(totalDeposits: bigint, totalBorrows: bigint): bigint {
  if (totalDeposits === 0n) return 0n
  return mulDiv(totalBorrows, RATE_SCALE, totalDeposits)
}

/** Stored index (scale 1e18) at the reported scale of 1e9. */
export function reportedIndex(index: bigint): bigint {
  return index / (INDEX_PRECISION / INDEX_SCALE)
}

export function marketOf(state: PoolState): MarketSnapshot {
  return {
    totalDeposits: state.totalDeposits,
    totalBorrows: state.totalBorrows,
    totalDepositShares: state.totalDepositShares,
    totalBorrowShares: state.totalBorrowShares,
    borrowIndex: state.borrowIndex,
    supplyIndex: state.supplyIndex,
    lastAccrualTime: state.lastAccrualTime,
  }
}

/**
 * Advances `market` from `lastAccrualTime` to `now` with simple linear interest
 * at the rate for the current utilization. Returns a new snapshot; the input is
 * left untouched. A clock reading at or before `lastAccrualTime` is a no-op.
 *
 * The borrow index moves first and the borrow total is revalued from its
 * shares, so interest is exactly what the borrowers' debt gained. The supply
 * index then grows until deposit shares are worth that interest more.
 */
export function previewAccrual(
  market: MarketSnapshot,
  now: bigint,
  rates: RateModel,
): { market: MarketSnapshot; outcome: AccrualOutcome } {
  const elapsed = now - market.lastAccrualTime
  if (elapsed <= 0n) return { market, outcome: { kind: 'current' } }

  const { totalDeposits, totalBorrows, totalDepositShares, totalBorrowShares, borrowIndex, supplyIndex } = market
  const utilization = utilizationOf(totalDeposits, totalBorrows)
  const borrowRate = rates.getBorrowRate(utilization)

  // rate * elapsed / (year * scale) is the slice factor
  const nextBorrowIndex = borrowIndex + mulDiv(borrowIndex, borrowRate * elapsed, SECONDS_PER_YEAR * RATE_SCALE)
  const nextBorrows = checkedI128(sharesToAmount(totalBorrowShares, nextBorrowIndex))
  const interest = nextBorrows - totalBorrows
  const nextSupplyIndex = supplyIndexAfter(supplyIndex, totalDepositShares, interest)

  return {
    market: {
      totalDeposits: checkedI128(sharesToAmount(totalDepositShares, nextSupplyIndex)),
      totalBorrows: nextBorrows,
      totalDepositShares,
      totalBorrowShares,
      borrowIndex: nextBorrowIndex,
      supplyIndex: nextSupplyIndex,
      lastAccrualTime: now,
    },
    outcome: { kind: 'accrued', elapsed, utilization, borrowRate, interest },
  }
}

/** Commits `previewAccrual` into the pool state. */
export function accrueMarket(state: PoolState, now: bigint, rates: RateModel): AccrualOutcome {
  const { market, outcome } = previewAccrual(marketOf(state), now, rates)
  if (outcome.kind === 'current') return outcome

  state.totalDeposits = market.totalDeposits
  state.totalBorrows = market.totalBorrows
  state.borrowIndex = market.borrowIndex
  state.supplyIndex = market.supplyIndex
  state.lastAccrualTime = market.lastAccrualTime
  return outcome
}
