import { MAX_I128, MIN_I128 } from './config'
import { assert } from './errors'

// (a * b) / d with the product held at full width, truncating toward zero
export function mulDiv(a: bigint, b: bigint, d: bigint): bigint {
  assert(d !== 0n, 'InvalidInput', 'division by zero')
  return (a * b) / d
}

// Rounds up; callers only pass non-negative operands.
export function mulDivUp(a: bigint, b: bigint, d: bigint): bigint {
  assert(d > 0n, 'InvalidInput', 'division by zero')
  const product = a * b
  return (product + d - 1n) / d
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b
}

/** Subtracts without letting the result go below zero. */
export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n
}

export function checkedI128(value: bigint): bigint {
  assert(value >= MIN_I128 && value <= MAX_I128, 'ArithmeticOverflow', `value ${value} outside i128`)
  return value
}

/**
 * Validates an operation amount: strictly positive and representable in i128.
 */
export function requirePositiveAmount(amount: bigint, label = 'amount'): bigint {
  assert(amount > 0n, 'InvalidInput', `${label} must be positive`)
  assert(amount <= MAX_I128, 'InvalidInput', `${label} exceeds i128`)
  return amount
}
