import { isLendingError } from './errors'
import type { CallArg, ProtocolEvent, ProtocolEventName, Runtime, Txn } from './runtime'

/**
 * Base for the in-process contracts.
 *
 * State is a plain structured-cloneable value handed over at construction.
 * Mutating methods run through `atomic`, which restores the pre-call state on
 * any failure and publishes queued events only once the call commits.
 */
export abstract class Contract<TState> {
  private pendingEvents: ProtocolEvent[] = []

  protected constructor(
    readonly appName: string,
    protected state: TState,
    protected readonly runtime: Runtime,
  ) {}

  /** Deep copy of the current state. */
  public snapshot(): TState {
    return structuredClone(this.state)
  }

  protected get now(): bigint {
    return this.runtime.clock.now()
  }

  protected authorize(principal: string, txn: Txn, method: string, args: readonly CallArg[] = []): void {
    this.runtime.authorizer.requireAuthorization(principal, { app: this.appName, method, args, txn })
  }

  protected emit(name: ProtocolEventName, data: Record<string, CallArg> = {}): void {
    this.pendingEvents.push({ name, app: this.appName, timestamp: this.now, data })
  }

  protected atomic<T>(method: string, body: () => T): T {
    const saved = structuredClone(this.state)
    let result: T
    try {
      result = body()
    } catch (error) {
      this.state = saved
      this.pendingEvents = []
      const reason = isLendingError(error) ? error.code : String(error)
      this.runtime.logger.verbose(`${this.appName}.${method} rejected: ${reason}`)
      throw error
    }

    this.runtime.logger.debug(`${this.appName}.${method} committed`)
    this.flushEvents()
    return result
  }

  private flushEvents(): void {
    const events = this.pendingEvents
    this.pendingEvents = []
    for (const event of events) {
      try {
        this.runtime.events.publish(event)
      } catch (error) {
        this.runtime.logger.warn(`${this.appName}: event sink failed on ${event.name}`, error)
      }
    }
  }
}
