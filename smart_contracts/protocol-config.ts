import dotenv from 'dotenv'
import { z } from 'zod'
import type { RateCurveParameters } from './interest_rate_model/InterestRateModel'
import type { LiquidationParameters, RiskParameters } from './lending_pool/config'
import {
  DEFAULT_CLOSE_FACTOR_BPS,
  DEFAULT_LIQUIDATION_BONUS_BPS,
  DEFAULT_LIQUIDATION_THRESHOLD_BPS,
  DEFAULT_LTV_BPS,
  DEFAULT_RATE_CURVE,
  DEFAULT_STALENESS_THRESHOLD,
} from './shared/config'
import { LendingError } from './shared/errors'

dotenv.config()

export interface ProtocolConfig {
  collateralAsset: string
  borrowAsset: string
  risk: RiskParameters
  liquidation: LiquidationParameters
  stalenessThreshold: bigint
  rateCurve: RateCurveParameters
  debug: boolean
}

const integer = (fallback: bigint) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'expected a non-negative integer')
    .default(fallback.toString())
    .transform((value) => BigInt(value))

const symbol = (fallback: string) => z.string().trim().min(1).default(fallback)

const envSchema = z.object({
  COLLATERAL_ASSET: symbol('XLM'),
  BORROW_ASSET: symbol('USDC'),
  LTV_BPS: integer(DEFAULT_LTV_BPS),
  LIQUIDATION_THRESHOLD_BPS: integer(DEFAULT_LIQUIDATION_THRESHOLD_BPS),
  LIQUIDATION_BONUS_BPS: integer(DEFAULT_LIQUIDATION_BONUS_BPS),
  CLOSE_FACTOR_BPS: integer(DEFAULT_CLOSE_FACTOR_BPS),
  PRICE_STALENESS_SECONDS: integer(DEFAULT_STALENESS_THRESHOLD),
  RATE_BASE: integer(DEFAULT_RATE_CURVE.baseRate),
  RATE_SLOPE1: integer(DEFAULT_RATE_CURVE.slope1),
  RATE_SLOPE2: integer(DEFAULT_RATE_CURVE.slope2),
  RATE_OPTIMAL_UTILIZATION: integer(DEFAULT_RATE_CURVE.optimalUtilization),
  DEBUG: z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1'),
})

/**
 * Reads protocol parameters from the environment (and `.env`, if present).
 * Range checks happen when the contracts are initialized.
 */
export function loadProtocolConfig(env: NodeJS.ProcessEnv = process.env): ProtocolConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new LendingError('InvalidInput', `${issue.path.join('.')}: ${issue.message}`)
  }

  const vars = parsed.data
  return {
    collateralAsset: vars.COLLATERAL_ASSET,
    borrowAsset: vars.BORROW_ASSET,
    risk: { ltvBps: vars.LTV_BPS, liquidationThresholdBps: vars.LIQUIDATION_THRESHOLD_BPS },
    liquidation: { bonusBps: vars.LIQUIDATION_BONUS_BPS, closeFactorBps: vars.CLOSE_FACTOR_BPS },
    stalenessThreshold: vars.PRICE_STALENESS_SECONDS,
    rateCurve: {
      baseRate: vars.RATE_BASE,
      slope1: vars.RATE_SLOPE1,
      slope2: vars.RATE_SLOPE2,
      optimalUtilization: vars.RATE_OPTIMAL_UTILIZATION,
    },
    debug: vars.DEBUG,
  }
}
