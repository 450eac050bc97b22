/**
 * The opaque external directory facility driven by the worker thread.
 *
 * Each call may block or return a promise; the worker awaits it before the
 * next queued action runs. A call succeeds only when both the submission
 * (`submitError`) and the confirmation delivered through the facility's own
 * callback (`callbackError`) are clear.
 */

export type MaybePromise<T> = T | Promise<T>

export interface CallStatus {
  /** Set when the call itself could not be submitted */
  submitError?: string
  /** Set when the facility reported a failure through its completion callback */
  callbackError?: string
}

export interface DirectoryEntry {
  identity: string
  leaseSeconds: number
}

export interface FindResult extends CallStatus {
  entries: DirectoryEntry[]
}

export interface RegisterResult extends CallStatus {
  /** Lease the facility actually granted; the requested lease when omitted */
  grantedLeaseSeconds?: number
}

export interface DirectoryService {
  findServices(): MaybePromise<FindResult>
  register(identity: string, leaseSeconds: number): MaybePromise<RegisterResult>
  deregister(identity: string): MaybePromise<CallStatus>
  /** Minimum refresh interval currently advertised by the facility, 0 when none */
  minRefreshInterval(): MaybePromise<number>
  close?(): MaybePromise<void>
}

/** Shape of a user module loaded with `service.backend = "module"` */
export type DirectoryServiceFactory = (
  options: Record<string, unknown>,
) => MaybePromise<DirectoryService>

