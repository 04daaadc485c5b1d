export type LendingErrorCode =
  | 'AlreadyInitialized'
  | 'NotInitialized'
  | 'InvalidInput'
  | 'Unauthorized'
  | 'InsufficientBalance'
  | 'InsufficientLiquidity'
  | 'ExceedsCapacity'
  | 'UnhealthyPosition'
  | 'NoOutstandingDebt'
  | 'PriceNotSet'
  | 'StalePrice'
  | 'PositionHealthy'
  | 'ArithmeticOverflow'
  | 'TransferFailed'
  | 'FullRepaymentRequired'

export class LendingError extends Error {
  constructor(
    readonly code: LendingErrorCode,
    message?: string,
  ) {
    super(message ?? code)
    this.name = 'LendingError'
    Object.setPrototypeOf(this, LendingError.prototype)
  }

  toJSON(): { code: LendingErrorCode; message: string } {
    return { code: this.code, message: this.message }
  }
}

/**
 * Aborts the current invocation with a typed error when `condition` does not hold.
 */
export function assert(condition: boolean, code: LendingErrorCode, message?: string): asserts condition {
  if (!condition) throw new LendingError(code, message)
}

export function isLendingError(error: unknown, code?: LendingErrorCode): error is LendingError {
  return error instanceof LendingError && (code === undefined || error.code === code)
}
