import { RATE_SCALE } from '../shared/config'
import { Contract } from '../shared/Contract'
import { assert } from '../shared/errors'
import { mulDiv } from '../shared/math'
import type { Runtime } from '../shared/runtime'

/** All values scale 1e7. */
export interface RateCurveParameters {
  baseRate: bigint
  slope1: bigint
  slope2: bigint
  optimalUtilization: bigint
}

export interface RateModelState {
  curve?: RateCurveParameters
}

/** Read side the pool depends on. Utilization and rates are scale 1e7. */
export interface RateModel {
  getBorrowRate(utilization: bigint): bigint
  getSupplyRate(utilization: bigint): bigint
}

export function validateRateCurve(curve: RateCurveParameters): void {
  assert(curve.baseRate >= 0n, 'InvalidInput', 'base rate must not be negative')
  assert(curve.slope1 >= 0n && curve.slope2 >= 0n, 'InvalidInput', 'slopes must not be negative')
  assert(
    curve.optimalUtilization > 0n && curve.optimalUtilization < RATE_SCALE,
    'InvalidInput',
    'optimal utilization must be inside (0, 1e7)',
  )
}

/**
 * Evaluates the kinked curve.
 *
 * Below the kink the rate climbs from `baseRate` by `slope1` at optimal utilization;
 * above it the excess utilization, renormalized to the remaining band, adds `slope2`.
 * Every division truncates.
 */
export function kinkedBorrowRate(curve: RateCurveParameters, utilization: bigint): bigint {
  const { baseRate, slope1, slope2, optimalUtilization: optimal } = curve
  if (utilization <= optimal) {
    return baseRate + mulDiv(utilization, slope1, optimal)
  }
  const excess = mulDiv(utilization - optimal, RATE_SCALE, RATE_SCALE - optimal)
  return baseRate + slope1 + mulDiv(excess, slope2, RATE_SCALE)
}

// supply = borrow * utilization, no reserve factor
export function kinkedSupplyRate(curve: RateCurveParameters, utilization: bigint): bigint {
  return mulDiv(kinkedBorrowRate(curve, utilization), utilization, RATE_SCALE)
}

export class InterestRateModel extends Contract<RateModelState> implements RateModel {
  constructor(runtime: Runtime, state: RateModelState = {}, appName = 'interest-rate-model') {
    super(appName, state, runtime)
  }

  public initialize(curve: RateCurveParameters): void {
    this.atomic('initialize', () => {
      assert(this.state.curve === undefined, 'AlreadyInitialized')
      validateRateCurve(curve)
      this.state.curve = { ...curve }
    })
  }

  public getBorrowRate(utilization: bigint): bigint {
    assert(utilization >= 0n, 'InvalidInput', 'utilization must not be negative')
    return kinkedBorrowRate(this.curve(), utilization)
  }

  public getSupplyRate(utilization: bigint): bigint {
    assert(utilization >= 0n, 'InvalidInput', 'utilization must not be negative')
    return kinkedSupplyRate(this.curve(), utilization)
  }

  public getBaseRate(): bigint {
    return this.curve().baseRate
  }

  public getSlope1(): bigint {
    return this.curve().slope1
  }

  public getSlope2(): bigint {
    return this.curve().slope2
  }

  public getOptimalUtilization(): bigint {
    return this.curve().optimalUtilization
  }

  private curve(): RateCurveParameters {
    assert(this.state.curve !== undefined, 'NotInitialized')
    return this.state.curve
  }
}
