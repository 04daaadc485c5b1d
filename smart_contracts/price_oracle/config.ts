/** Price in USD per unit (scale 1e7) and the time it was written. */
export interface PriceEntry {
  price: bigint
  lastUpdateTime: bigint
}

export interface OracleState {
  admin?: string
  stalenessThreshold: bigint
  prices: Map<string, PriceEntry>
}

export interface OracleInitOptions {
  stalenessThreshold?: bigint
  initialPrices?: Record<string, bigint>
}

/** Read side the pool depends on. */
export interface PriceFeed {
  getPrice(asset: string): bigint
  getPriceSafe(asset: string): bigint
}

export function createOracleState(): OracleState {
  return { stalenessThreshold: 0n, prices: new Map() }
}
