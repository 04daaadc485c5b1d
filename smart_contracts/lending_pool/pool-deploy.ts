import { Config } from '@algorandfoundation/algokit-utils'
import { InterestRateModel } from '../interest_rate_model/InterestRateModel'
import { adminTxnFor, deployOracle, type AdminCredential } from '../price_oracle/oracle-deploy'
import type { ProtocolConfig } from '../protocol-config'
import type { Runtime } from '../shared/runtime'
import type { PoolTokens } from '../shared/token'
import { LendingPool } from './LendingPool'

export interface DeployProtocolParams {
  /** Pass a signer when the runtime checks signatures: each initialize call needs its own. */
  adminTxn: AdminCredential
  config: ProtocolConfig
  runtime: Runtime
  tokens: PoolTokens
  initialPrices?: Record<string, bigint>
}

/**
 * Creates and initializes oracle, rate model and pool, with the admin
 * transaction's sender as admin of both oracle and pool.
 */
export const deployLendingProtocol = ({ adminTxn, config, runtime, tokens, initialPrices }: DeployProtocolParams) => {
  Config.configure({ debug: config.debug })

  const oracle = deployOracle(adminTxn, runtime, { stalenessThreshold: config.stalenessThreshold, initialPrices })

  const rateModel = new InterestRateModel(runtime)
  rateModel.initialize(config.rateCurve)

  const pool = new LendingPool(runtime, { oracle, rates: rateModel, tokens })
  const { collateralAsset, borrowAsset } = config
  pool.initialize(adminTxnFor(adminTxn, pool.appName, 'initialize', [collateralAsset, borrowAsset]), {
    collateralAsset,
    borrowAsset,
    risk: config.risk,
    liquidation: config.liquidation,
  })
  runtime.logger.info(`lending-pool deployed: ${collateralAsset} collateral, ${borrowAsset} borrow`)

  return { oracle, rateModel, pool }
}
