import { INDEX_PRECISION, SHARE_SCALE } from '../shared/config'
import { checkedI128, min, mulDiv, mulDivUp } from '../shared/math'
import type { AccountRecord, PoolState } from './config'

// Shares carry SHARE_SCALE sub-units per token, so rounding a single booking
// in the account's favour moves less than one token unit.
const SHARE_UNIT = INDEX_PRECISION * SHARE_SCALE

function emptyAccount(): AccountRecord {
  return { depositShares: 0n, borrowShares: 0n, collateralBalance: 0n }
}

/** Copy of the stored record, or a zeroed one for an unknown account. */
export function readAccount(state: PoolState, account: string): AccountRecord {
  const record = state.accounts.get(account)
  return record ? { ...record } : emptyAccount()
}

/**
 * Stores `record`, dropping the entry once every balance is back to zero.
 */
export function writeAccount(state: PoolState, account: string, record: AccountRecord): void {
  if (record.depositShares === 0n && record.borrowShares === 0n && record.collateralBalance === 0n) {
    state.accounts.delete(account)
    return
  }
  state.accounts.set(account, record)
}

/** Token value of `shares` at `index` (scale 1e18), truncated. */
export function sharesToAmount(shares: bigint, index: bigint): bigint {
  return mulDiv(shares, index, SHARE_UNIT)
}

/**
 * Debt owed at `borrowIndex`.
 * @param record - Stored account record
 * @param borrowIndex - Current (or previewed) market index
 */
export function liveDebt(record: AccountRecord, borrowIndex: bigint): bigint {
  return sharesToAmount(record.borrowShares, borrowIndex)
}

export function liveDeposit(record: AccountRecord, supplyIndex: bigint): bigint {
  return sharesToAmount(record.depositShares, supplyIndex)
}

// ═══════════════════════════════════════════════════════════════════════
// BOOKING
// Each booking moves the same shares on the account and on the pool, then
// revalues the pool total from its shares.
// ═══════════════════════════════════════════════════════════════════════

export function bookDeposit(state: PoolState, record: AccountRecord, amount: bigint): void {
  const shares = mulDivUp(amount, SHARE_UNIT, state.supplyIndex)
  record.depositShares += shares
  state.totalDepositShares += shares
  state.totalDeposits = checkedI128(sharesToAmount(state.totalDepositShares, state.supplyIndex))
}

/** Withdrawing the whole balance clears every share the account holds. */
export function bookWithdrawal(state: PoolState, record: AccountRecord, amount: bigint): void {
  const shares =
    amount === liveDeposit(record, state.supplyIndex)
      ? record.depositShares
      : min(mulDiv(amount, SHARE_UNIT, state.supplyIndex), record.depositShares)
  record.depositShares -= shares
  state.totalDepositShares -= shares
  state.totalDeposits = sharesToAmount(state.totalDepositShares, state.supplyIndex)
}

export function bookBorrow(state: PoolState, record: AccountRecord, amount: bigint): void {
  const shares = mulDivUp(amount, SHARE_UNIT, state.borrowIndex)
  record.borrowShares += shares
  state.totalBorrowShares += shares
  state.totalBorrows = checkedI128(sharesToAmount(state.totalBorrowShares, state.borrowIndex))
}

/** Repaying the whole debt clears every share the account owes. */
export function bookRepayment(state: PoolState, record: AccountRecord, amount: bigint): void {
  const shares =
    amount === liveDebt(record, state.borrowIndex)
      ? record.borrowShares
      : min(mulDiv(amount, SHARE_UNIT, state.borrowIndex), record.borrowShares)
  record.borrowShares -= shares
  state.totalBorrowShares -= shares
  state.totalBorrows = sharesToAmount(state.totalBorrowShares, state.borrowIndex)
}

/** Supply index at which `totalDepositShares` are worth `interest` more tokens, rounded up. */
export function supplyIndexAfter(supplyIndex: bigint, totalDepositShares: bigint, interest: bigint): bigint {
  if (interest === 0n || totalDepositShares === 0n) return supplyIndex
  return supplyIndex + mulDivUp(interest, SHARE_UNIT, totalDepositShares)
}
