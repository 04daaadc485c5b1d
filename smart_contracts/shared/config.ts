export const BASIS_POINTS = 10_000n
export const PRICE_SCALE = 10_000_000n // $1.00
export const RATE_SCALE = 10_000_000n // 100%
export const HEALTH_FACTOR_SCALE = 10_000_000n // 1.0
export const INDEX_SCALE = 1_000_000_000n // 1.0, as reported
export const INDEX_PRECISION = 1_000_000_000_000_000_000n // 1.0, as stored
/** Share units per token at an index of 1.0 */
export const SHARE_SCALE = 1_000_000_000n
export const SECONDS_PER_YEAR = 365n * 24n * 60n * 60n

/** Health factor reported for an account without debt */
export const HEALTH_FACTOR_INFINITE = 999_000_000n

export const DEFAULT_STALENESS_THRESHOLD = 3_600n
export const DEFAULT_LTV_BPS = 7_500n
export const DEFAULT_LIQUIDATION_THRESHOLD_BPS = 8_000n
export const DEFAULT_LIQUIDATION_BONUS_BPS = 0n
export const DEFAULT_CLOSE_FACTOR_BPS = 10_000n

export const DEFAULT_RATE_CURVE = {
  baseRate: 0n,
  slope1: 400_000n, // 4%
  slope2: 7_500_000n, // 75%
  optimalUtilization: 8_000_000n, // 80%
} as const

export const MAX_I128 = (1n << 127n) - 1n
export const MIN_I128 = -(1n << 127n)
