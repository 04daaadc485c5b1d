import { Config } from '@algorandfoundation/algokit-utils'
import algosdk, { type Account } from 'algosdk'
import { deployLendingProtocol } from './lending_pool/pool-deploy'
import { loadProtocolConfig, type ProtocolConfig } from './protocol-config'
import { HostAuthorizer } from './shared/auth'
import { PRICE_SCALE } from './shared/config'
import {
  ManualClock,
  type Authorizer,
  type EventSink,
  type ProtocolEvent,
  type ProtocolEventName,
  type Runtime,
  type Txn,
} from './shared/runtime'
import { InMemoryToken } from './shared/token'

export const START_TIME = 1_700_000_000n
export const ONE_DOLLAR = PRICE_SCALE

export class RecordingEventSink implements EventSink {
  readonly events: ProtocolEvent[] = []

  public publish(event: ProtocolEvent): void {
    this.events.push(event)
  }

  public names(): ProtocolEventName[] {
    return this.events.map((event) => event.name)
  }

  public clear(): void {
    this.events.length = 0
  }
}

export function createTestRuntime(authorizer: Authorizer = new HostAuthorizer()) {
  const clock = new ManualClock(START_TIME)
  const events = new RecordingEventSink()
  const runtime: Runtime = { clock, authorizer, events, logger: Config.getLogger(true) }
  return { runtime, clock, events }
}

export const txnFrom = (account: Account): Txn => ({ sender: account.addr })

export const addressOf = (account: Account): string => account.addr.toString()

export function testConfig(overrides: Partial<ProtocolConfig> = {}): ProtocolConfig {
  return { ...loadProtocolConfig({}), ...overrides }
}

/**
 * Deploys a full protocol on a manual clock with both assets priced at $1.00
 * unless `prices` says otherwise.
 */
export function setupProtocol(options: { config?: Partial<ProtocolConfig>; prices?: Record<string, bigint> } = {}) {
  const { runtime, clock, events } = createTestRuntime()
  const config = testConfig(options.config)
  const admin = algosdk.generateAccount()
  const lendable = new InMemoryToken(config.borrowAsset)
  const collateral = new InMemoryToken(config.collateralAsset)

  const { oracle, rateModel, pool } = deployLendingProtocol({
    adminTxn: txnFrom(admin),
    config,
    runtime,
    tokens: { lendable, collateral },
    initialPrices: options.prices ?? { [config.collateralAsset]: ONE_DOLLAR, [config.borrowAsset]: ONE_DOLLAR },
  })
  events.clear()

  /** New account holding the given wallet balances. */
  const fundedAccount = (lendableAmount = 0n, collateralAmount = 0n): Account => {
    const account = algosdk.generateAccount()
    if (lendableAmount > 0n) lendable.mint(addressOf(account), lendableAmount)
    if (collateralAmount > 0n) collateral.mint(addressOf(account), collateralAmount)
    return account
  }

  const setPrice = (asset: string, price: bigint) => oracle.setPrice(txnFrom(admin), asset, price)

  return { runtime, clock, events, config, admin, oracle, rateModel, pool, lendable, collateral, fundedAccount, setPrice }
}

export type TestProtocol = ReturnType<typeof setupProtocol>
