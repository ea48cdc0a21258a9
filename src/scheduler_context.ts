import { eventClassOf } from './types.js'

export type ScheduledEvent = {
  event_class: Function // exact constructor of the event, used as the registry key
  event: object
}

export const scheduleEvent = (event: object): ScheduledEvent => ({ event_class: eventClassOf(event), event })

export type SenderMark = {
  immediate: number
  delayed: number
}

// Follow-up events staged by systems during one epoch, owned by the Scheduler.
export class EventSender {
  immediate: ScheduledEvent[] // become one epoch at the front of the queue
  delayed: ScheduledEvent[] // each becomes its own epoch at the back of the queue

  constructor() {
    this.immediate = []
    this.delayed = []
  }

  get size(): number {
    return this.immediate.length + this.delayed.length
  }

  sendImmediate(event: object): void {
    this.immediate.push(scheduleEvent(event))
  }

  sendDelayed(event: object): void {
    this.delayed.push(scheduleEvent(event))
  }

  takeImmediate(): ScheduledEvent[] {
    return this.immediate.splice(0, this.immediate.length)
  }

  takeDelayed(): ScheduledEvent[] {
    return this.delayed.splice(0, this.delayed.length)
  }

  // position of the staging lists, taken before an event dispatches
  mark(): SenderMark {
    return { immediate: this.immediate.length, delayed: this.delayed.length }
  }

  // drop whatever was staged after the mark
  rollback(mark: SenderMark): void {
    this.immediate.length = Math.min(this.immediate.length, mark.immediate)
    this.delayed.length = Math.min(this.delayed.length, mark.delayed)
  }

  clear(): void {
    this.immediate.length = 0
    this.delayed.length = 0
  }
}

// Capability handed to systems while one event runs through its chain.
export class SchedulerContext {
  readonly event_type: string
  readonly scheduler_name: string

  private _sender: EventSender
  private _active: boolean

  constructor(params: { sender: EventSender; event_type: string; scheduler_name: string }) {
    this._sender = params.sender
    this.event_type = params.event_type
    this.scheduler_name = params.scheduler_name
    this._active = true
  }

  get active(): boolean {
    return this._active
  }

  // runs in the epoch right after the current one, together with every other immediate event staged during this epoch
  sendImmediate<T extends object>(event: T): void {
    this.assertActive('sendImmediate')
    this._sender.sendImmediate(event)
  }

  // runs in its own epoch, after everything already queued
  sendDelayed<T extends object>(event: T): void {
    this.assertActive('sendDelayed')
    this._sender.sendDelayed(event)
  }

  // alias for sendImmediate
  send<T extends object>(event: T): void {
    this.sendImmediate(event)
  }

  _release(): void {
    this._active = false
  }

  private assertActive(method: string): void {
    if (!this._active) {
      throw new Error(
        `SchedulerContext.${method}() called after ${this.event_type} finished dispatching on ${this.scheduler_name}; contexts must not be kept past the system call`
      )
    }
  }
}
