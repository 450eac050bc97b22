export { EventLoop } from './event-loop.js'
export type { Wakeable, TimerHandle } from './event-loop.js'
export { TimerSlot } from './timer-slot.js'
