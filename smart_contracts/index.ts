export * from './shared/config'
export * from './shared/errors'
export * from './shared/math'
export * from './shared/runtime'
export * from './shared/auth'
export * from './shared/token'
export { Contract } from './shared/Contract'

export * from './price_oracle/config'
export { PriceOracle } from './price_oracle/PriceOracle'
export { deployOracle, adminTxnFor, type AdminCredential } from './price_oracle/oracle-deploy'

export * from './interest_rate_model/InterestRateModel'

export * from './lending_pool/config'
export { LendingPool, validateLiquidationParameters, validateRiskParameters, type PoolDependencies } from './lending_pool/LendingPool'
export * as riskEngine from './lending_pool/RiskEngine'
export { previewAccrual, reportedIndex, utilizationOf, type AccrualOutcome, type MarketSnapshot } from './lending_pool/accrual'
export { deployLendingProtocol, type DeployProtocolParams } from './lending_pool/pool-deploy'

export { loadProtocolConfig, type ProtocolConfig } from './protocol-config'
