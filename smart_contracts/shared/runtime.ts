import { Config } from '@algorandfoundation/algokit-utils'
import type { Address } from 'algosdk'

export type Logger = typeof Config.logger

// ═══════════════════════════════════════════════════════════════════════
// CLOCK
// ═══════════════════════════════════════════════════════════════════════

export interface Clock {
  /** Seconds since epoch */
  now(): bigint
}

export class SystemClock implements Clock {
  public now(): bigint {
    return BigInt(Math.floor(Date.now() / 1000))
  }
}

/** Clock that only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current: bigint = 1_700_000_000n) {}

  public now(): bigint {
    return this.current
  }

  public set(timestamp: bigint): void {
    this.current = timestamp
  }

  public advance(seconds: bigint): bigint {
    this.current += seconds
    return this.current
  }
}

// ═══════════════════════════════════════════════════════════════════════
// CALLS & AUTHORIZATION
// ═══════════════════════════════════════════════════════════════════════

export interface Txn {
  sender: Address
  /** Required by signature-checking authorizers, unique per sender */
  nonce?: bigint
  signature?: Uint8Array
}

export type CallArg = string | bigint

export interface AppCall {
  app: string
  method: string
  args: readonly CallArg[]
  txn: Txn
}

export interface Authorizer {
  /** Throws `Unauthorized` unless `call` is authorized on behalf of `principal`. */
  requireAuthorization(principal: string, call: AppCall): void
}

// ═══════════════════════════════════════════════════════════════════════
// EVENTS
// ═══════════════════════════════════════════════════════════════════════

export type ProtocolEventName =
  | 'deposit'
  | 'withdraw'
  | 'borrow'
  | 'repay'
  | 'collateralDeposited'
  | 'collateralWithdrawn'
  | 'liquidation'
  | 'priceUpdated'
  | 'priceChaos'
  | 'adminChanged'
  | 'stalenessThresholdUpdated'
  | 'riskParametersUpdated'
  | 'liquidationParametersUpdated'
  | 'interestAccrued'

export interface ProtocolEvent {
  name: ProtocolEventName
  app: string
  timestamp: bigint
  data: Record<string, CallArg>
}

export interface EventSink {
  publish(event: ProtocolEvent): void
}

export class LoggingEventSink implements EventSink {
  constructor(private readonly logger: Logger = Config.logger) {}

  public publish(event: ProtocolEvent): void {
    const data = Object.fromEntries(Object.entries(event.data).map(([key, value]) => [key, value.toString()]))
    this.logger.info(`${event.app}: ${event.name}`, { timestamp: event.timestamp.toString(), ...data })
  }
}

/** Collaborators every contract receives at construction. */
export interface Runtime {
  clock: Clock
  authorizer: Authorizer
  events: EventSink
  logger: Logger
}
