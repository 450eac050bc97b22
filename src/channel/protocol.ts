import { Type, type Static } from '@sinclair/typebox'

const RequestId = Type.Integer({ minimum: 1 })
const Identity = Type.String({ minLength: 1 })
const Seconds = Type.Integer({ minimum: 0, maximum: 65535 })

/** Host -> worker requests, discriminated on `kind`. */
export const BridgeRequestSchema = Type.Union([
  Type.Object({ kind: Type.Literal('discover') }),
  Type.Object({
    kind: Type.Literal('register'),
    requestId: RequestId,
    identity: Identity,
    leaseSeconds: Seconds,
  }),
  Type.Object({
    kind: Type.Literal('deregister'),
    requestId: RequestId,
    identity: Identity,
  }),
  Type.Object({ kind: Type.Literal('terminate') }),
])

export type BridgeRequest = Static<typeof BridgeRequestSchema>

/** Worker -> host completions. */
export const BridgeCompletionSchema = Type.Union([
  Type.Object({ kind: Type.Literal('ready') }),
  Type.Object({ kind: Type.Literal('init-failed'), reason: Type.String() }),
  Type.Object({
    kind: Type.Literal('discovered'),
    ok: Type.Boolean(),
    identities: Type.Array(Type.String()),
  }),
  Type.Object({
    kind: Type.Literal('completed'),
    requestId: RequestId,
    ok: Type.Boolean(),
  }),
  Type.Object({
    kind: Type.Literal('stopped'),
    pendingTimers: Type.Integer({ minimum: 0 }),
    wakeables: Type.Integer({ minimum: 0 }),
  }),
])

export type BridgeCompletion = Static<typeof BridgeCompletionSchema>

/** Resource counts the worker reports once its loop has been torn down. */
export type WorkerReport = Omit<Extract<BridgeCompletion, { kind: 'stopped' }>, 'kind'>
