import type { Address } from 'algosdk'
import { DEFAULT_STALENESS_THRESHOLD, PRICE_SCALE } from '../shared/config'
import { Contract } from '../shared/Contract'
import { assert } from '../shared/errors'
import { mulDiv } from '../shared/math'
import type { CallArg, Runtime, Txn } from '../shared/runtime'
import { createOracleState, type OracleInitOptions, type OracleState, type PriceEntry, type PriceFeed } from './config'

export class PriceOracle extends Contract<OracleState> implements PriceFeed {
  constructor(runtime: Runtime, state: OracleState = createOracleState(), appName = 'price-oracle') {
    super(appName, state, runtime)
  }

  // ═══════════════════════════════════════════════════════════════════════
  // ADMIN
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Makes the caller admin and optionally seeds the threshold and prices.
   */
  public initialize(txn: Txn, options: OracleInitOptions = {}): void {
    this.atomic('initialize', () => {
      assert(this.state.admin === undefined, 'AlreadyInitialized')
      const threshold = options.stalenessThreshold ?? DEFAULT_STALENESS_THRESHOLD
      assert(threshold > 0n, 'InvalidInput', 'staleness threshold must be positive')

      const admin = txn.sender.toString()
      this.authorize(admin, txn, 'initialize', [threshold])

      this.state.admin = admin
      this.state.stalenessThreshold = threshold
      for (const [asset, price] of Object.entries(options.initialPrices ?? {})) {
        assert(price > 0n, 'InvalidInput', `price for ${asset} must be positive`)
        this.writePrice(asset, price)
        this.emit('priceUpdated', { asset, price })
      }
    })
  }

  public setPrice(txn: Txn, asset: string, price: bigint): void {
    this.atomic('setPrice', () => {
      this.requireAdmin(txn, 'setPrice', [asset, price])
      assert(price > 0n, 'InvalidInput', 'price must be positive')
      this.writePrice(asset, price)
      this.emit('priceUpdated', { asset, price })
    })
  }

  /**
   * Stress-test entry point: stores half the submitted price. A price of 1
   * leaves the asset unpriced.
   */
  public setPriceChaos(txn: Txn, asset: string, price: bigint): void {
    this.atomic('setPriceChaos', () => {
      this.requireAdmin(txn, 'setPriceChaos', [asset, price])
      assert(price > 0n, 'InvalidInput', 'price must be positive')
      const halved = price / 2n
      this.writePrice(asset, halved)
      this.emit('priceChaos', { asset, price: halved })
    })
  }

  public setStalenessThreshold(txn: Txn, seconds: bigint): void {
    this.atomic('setStalenessThreshold', () => {
      this.requireAdmin(txn, 'setStalenessThreshold', [seconds])
      assert(seconds > 0n, 'InvalidInput', 'staleness threshold must be positive')
      this.state.stalenessThreshold = seconds
      this.emit('stalenessThresholdUpdated', { seconds })
    })
  }

  public setAdmin(txn: Txn, newAdmin: Address): void {
    this.atomic('setAdmin', () => {
      const admin = newAdmin.toString()
      this.requireAdmin(txn, 'setAdmin', [admin])
      this.state.admin = admin
      this.emit('adminChanged', { admin })
    })
  }

  // ═══════════════════════════════════════════════════════════════════════
  // READS
  // ═══════════════════════════════════════════════════════════════════════

  /** Stored price, or 0 when the asset is unpriced. */
  public getPrice(asset: string): bigint {
    return this.state.prices.get(asset)?.price ?? 0n
  }

  public getPriceSafe(asset: string): bigint {
    const price = this.getPrice(asset)
    assert(price > 0n, 'PriceNotSet', `no price for ${asset}`)
    assert(!this.isStale(asset), 'StalePrice', `price for ${asset} is stale`)
    return price
  }

  /**
   * Fresh while `now - lastUpdateTime <= threshold`. Unpriced assets read as stale.
   */
  public isStale(asset: string): boolean {
    return this.now - this.getLastUpdate(asset) > this.state.stalenessThreshold
  }

  public getLastUpdate(asset: string): bigint {
    return this.state.prices.get(asset)?.lastUpdateTime ?? 0n
  }

  public getEntry(asset: string): PriceEntry | undefined {
    const entry = this.state.prices.get(asset)
    return entry ? { ...entry } : undefined
  }

  public getStalenessThreshold(): bigint {
    return this.state.stalenessThreshold
  }

  public getAdmin(): string {
    assert(this.state.admin !== undefined, 'NotInitialized')
    return this.state.admin
  }

  /** USD value (scale 1e7) of `amount` units of `asset`. */
  public assetToUsd(amount: bigint, asset: string): bigint {
    return mulDiv(amount, this.getPrice(asset), PRICE_SCALE)
  }

  public usdToAsset(usd: bigint, asset: string): bigint {
    const price = this.getPrice(asset)
    assert(price !== 0n, 'PriceNotSet', `no price for ${asset}`)
    return mulDiv(usd, PRICE_SCALE, price)
  }

  private requireAdmin(txn: Txn, method: string, args: readonly CallArg[]): void {
    assert(this.state.admin !== undefined, 'NotInitialized')
    this.authorize(this.state.admin, txn, method, args)
  }

  private writePrice(asset: string, price: bigint): void {
    assert(asset.length > 0, 'InvalidInput', 'asset symbol required')
    this.state.prices.set(asset, { price, lastUpdateTime: this.now })
  }
}
