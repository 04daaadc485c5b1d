import type { CallSigner } from '../shared/auth'
import { DEFAULT_STALENESS_THRESHOLD } from '../shared/config'
import type { CallArg, Runtime, Txn } from '../shared/runtime'
import type { OracleInitOptions } from './config'
import { PriceOracle } from './PriceOracle'

/** A host-verified transaction, or a signer producing one per call. */
export type AdminCredential = Txn | CallSigner

export const adminTxnFor = (admin: AdminCredential, app: string, method: string, args: readonly CallArg[]): Txn =>
  typeof admin === 'function' ? admin({ app, method, args }) : admin

export const deployOracle = (admin: AdminCredential, runtime: Runtime, options: OracleInitOptions = {}) => {
  const oracle = new PriceOracle(runtime)
  const threshold = options.stalenessThreshold ?? DEFAULT_STALENESS_THRESHOLD
  oracle.initialize(adminTxnFor(admin, oracle.appName, 'initialize', [threshold]), options)
  runtime.logger.info(`price-oracle deployed, admin ${oracle.getAdmin()}`)
  return oracle
}
