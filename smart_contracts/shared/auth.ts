import algosdk, { type Account } from 'algosdk'
import { assert } from './errors'
import type { AppCall, Authorizer, Txn } from './runtime'

const CALL_DOMAIN = 'lending-call'

/**
 * Canonical bytes a caller signs to authorize `method` on `app`.
 */
export function callPayload(call: Omit<AppCall, 'txn'>, sender: string, nonce: bigint): Uint8Array {
  const parts = [CALL_DOMAIN, call.app, call.method, sender, nonce.toString(), ...call.args.map((arg) => arg.toString())]
  return new TextEncoder().encode(parts.join(':'))
}

/** Trusts the host to have verified `txn.sender`. */
export class HostAuthorizer implements Authorizer {
  public requireAuthorization(principal: string, call: AppCall): void {
    assert(call.txn.sender.toString() === principal, 'Unauthorized', `${call.method}: caller is not ${principal}`)
  }
}

/**
 * Requires an ed25519 signature by the principal over the call payload.
 * Each `(sender, nonce)` pair is accepted once.
 */
export class SignatureAuthorizer implements Authorizer {
  private readonly seen = new Set<string>()

  public requireAuthorization(principal: string, call: AppCall): void {
    const { txn } = call
    const sender = txn.sender.toString()
    assert(sender === principal, 'Unauthorized', `${call.method}: caller is not ${principal}`)
    assert(txn.nonce !== undefined && txn.signature !== undefined, 'Unauthorized', `${call.method}: unsigned call`)

    const replayKey = `${sender}:${txn.nonce}`
    assert(!this.seen.has(replayKey), 'Unauthorized', `${call.method}: nonce ${txn.nonce} already used`)

    const payload = callPayload(call, sender, txn.nonce)
    assert(algosdk.verifyBytes(payload, txn.signature, txn.sender), 'Unauthorized', `${call.method}: bad signature`)

    this.seen.add(replayKey)
  }
}

/**
 * Builds a signed transaction for `call`.
 * @param account - Signing account
 * @param call - Target app, method and arguments
 * @param nonce - Must not repeat for this account
 */
export function signCall(account: Account, call: Omit<AppCall, 'txn'>, nonce: bigint): Txn {
  const payload = callPayload(call, account.addr.toString(), nonce)
  return { sender: account.addr, nonce, signature: algosdk.signBytes(payload, account.sk) }
}

export type CallSigner = (call: Omit<AppCall, 'txn'>) => Txn

/** Signs successive calls for `account` with increasing nonces. */
export function callSigner(account: Account, firstNonce = 1n): CallSigner {
  let nonce = firstNonce
  return (call) => signCall(account, call, nonce++)
}
