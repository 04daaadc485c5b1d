import { assert } from './errors'

export type AssetKind = 'lendable' | 'collateral'

/** Moves one asset between an account and the pool. Either succeeds fully or throws. */
export interface TokenTransfer {
  transferIn(from: string, amount: bigint): void
  transferOut(to: string, amount: bigint): void
}

export type PoolTokens = Record<AssetKind, TokenTransfer>

/**
 * In-process token ledger with a single pool account.
 */
export class InMemoryToken implements TokenTransfer {
  private readonly balances = new Map<string, bigint>()

  constructor(
    readonly symbol: string,
    readonly poolAccount = 'pool',
  ) {}

  public mint(to: string, amount: bigint): void {
    assert(amount > 0n, 'InvalidInput', 'mint amount must be positive')
    this.balances.set(to, this.balanceOf(to) + amount)
  }

  public balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n
  }

  public transferIn(from: string, amount: bigint): void {
    this.move(from, this.poolAccount, amount)
  }

  public transferOut(to: string, amount: bigint): void {
    this.move(this.poolAccount, to, amount)
  }

  private move(from: string, to: string, amount: bigint): void {
    const available = this.balanceOf(from)
    assert(amount > 0n && amount <= available, 'TransferFailed', `${this.symbol}: ${from} holds ${available}, needs ${amount}`)
    this.balances.set(from, available - amount)
    this.balances.set(to, this.balanceOf(to) + amount)
  }
}
