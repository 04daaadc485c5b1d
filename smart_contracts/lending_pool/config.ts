import { INDEX_PRECISION } from '../shared/config'

export interface PoolState {
  admin?: string
  collateralAsset: string
  borrowAsset: string
  totalDeposits: bigint
  totalBorrows: bigint
  totalDepositShares: bigint
  totalBorrowShares: bigint
  borrowIndex: bigint // scale 1e18
  supplyIndex: bigint // scale 1e18
  lastAccrualTime: bigint
  risk: RiskParameters
  liquidation: LiquidationParameters
  accounts: Map<string, AccountRecord>
}

/**
 * Per-account balances as stored. Deposit and debt are shares of the pool
 * totals; their token value moves with the supply and borrow index.
 */
export interface AccountRecord {
  depositShares: bigint
  borrowShares: bigint
  collateralBalance: bigint
}

/** Basis points; `ltvBps < liquidationThresholdBps < 10_000`. */
export interface RiskParameters {
  ltvBps: bigint
  liquidationThresholdBps: bigint
}

export interface LiquidationParameters {
  bonusBps: bigint
  closeFactorBps: bigint
}

export interface PoolInitOptions {
  collateralAsset: string
  borrowAsset: string
  risk?: RiskParameters
  liquidation?: LiquidationParameters
}

/** Live view of one account at the current (or previewed) indices. */
export interface AccountPosition {
  account: string
  deposit: bigint
  debt: bigint
  collateral: bigint
  collateralValueUsd: bigint
  debtValueUsd: bigint
  maxBorrow: bigint
  healthFactor: bigint
}

export interface LiquidationResult {
  repaid: bigint
  collateralSeized: bigint
  healthFactorBefore: bigint
}

export function createPoolState(): PoolState {
  return {
    collateralAsset: '',
    borrowAsset: '',
    totalDeposits: 0n,
    totalBorrows: 0n,
    totalDepositShares: 0n,
    totalBorrowShares: 0n,
    borrowIndex: INDEX_PRECISION,
    supplyIndex: INDEX_PRECISION,
    lastAccrualTime: 0n,
    risk: { ltvBps: 0n, liquidationThresholdBps: 0n },
    liquidation: { bonusBps: 0n, closeFactorBps: 0n },
    accounts: new Map(),
  }
}
