import { z } from 'zod'
import { v7 as uuidv7 } from 'uuid'

import type { Observer } from './observable_log.js'
import { EventSender, scheduleEvent, type ScheduledEvent } from './scheduler_context.js'
import { SystemEntry, toSystemHandler, type SystemInput } from './system_handler.js'
import { SystemSet, type SystemSetErased } from './system_set.js'
import { logSchedule } from './logging.js'
import { SYSTEM_ERROR_MODES, type EventClass, type SystemErrorMode } from './types.js'

const MaxStepsSchema = z.number().int().positive().nullable()

export const SchedulerOptionsSchema = z
  .object({
    on_system_error: z.enum(SYSTEM_ERROR_MODES).optional(),
    debug: z.boolean().optional(),
    max_steps: MaxStepsSchema.optional(),
    backlog_warning_threshold: z.number().int().positive().nullable().optional(),
  })
  .strict()

export type SchedulerOptions = z.input<typeof SchedulerOptionsSchema>

export type RunUntilIdleOptions = {
  max_steps?: number | null // overrides the scheduler's max_steps for this call
}

// runUntilIdle() gave up before the queue drained, usually a system that keeps re-emitting its own event
export class SchedulerStepLimitError extends Error {
  max_steps: number
  pending_epoch_count: number

  constructor(message: string, params: { max_steps: number; pending_epoch_count: number }) {
    super(message)
    this.name = 'SchedulerStepLimitError'
    this.max_steps = params.max_steps
    this.pending_epoch_count = params.pending_epoch_count
  }
}

// Map from event constructor to the SystemSet for that event type. Entries are created lazily and never replaced.
class SystemRegistry<W> {
  private _sets: Map<Function, SystemSetErased<W>> = new Map()

  get size(): number {
    return this._sets.size
  }

  get(event_class: Function): SystemSetErased<W> | undefined {
    return this._sets.get(event_class)
  }

  ensure<T extends object>(event_class: EventClass<T>, create: () => SystemSet<T, W>): SystemSet<T, W> {
    const existing = this._sets.get(event_class)
    if (existing) {
      // only ensure() inserts, always under the set's own event_class, so this is the SystemSet<T, W> made for it
      return existing as SystemSet<T, W>
    }
    const created = create()
    this._sets.set(event_class, created)
    return created
  }

  values(): IterableIterator<SystemSetErased<W>> {
    return this._sets.values()
  }

  clear(): void {
    this._sets.clear()
  }
}

export class Scheduler<W = unknown> {
  readonly id: string // uuidv7, seeds the ids of registered systems
  readonly name: string

  // configuration options, fixed at construction since every SystemSet copies them
  readonly on_system_error: SystemErrorMode
  readonly debug: boolean
  readonly max_steps: number | null // default limit for runUntilIdle(), null for unlimited
  readonly backlog_warning_threshold: number | null

  // runtime state
  pending_epochs: ScheduledEvent[][] // FIFO of epochs, each an ordered batch of logically simultaneous events
  steps_completed: number

  private _registry: SystemRegistry<W>
  private _sender: EventSender
  private _stepping: boolean
  private _next_registered_seq: number

  constructor(name: string = 'Scheduler', options: SchedulerOptions = {}) {
    const parsed = SchedulerOptionsSchema.parse(options)
    this.id = uuidv7()
    this.name = name

    this.on_system_error = parsed.on_system_error ?? 'throw'
    this.debug = parsed.debug ?? false
    this.max_steps = parsed.max_steps ?? null
    this.backlog_warning_threshold = parsed.backlog_warning_threshold === undefined ? 10_000 : parsed.backlog_warning_threshold

    this.pending_epochs = []
    this.steps_completed = 0
    this._registry = new SystemRegistry()
    this._sender = new EventSender()
    this._stepping = false
    this._next_registered_seq = 0
  }

  toString(): string {
    if (this.name.toLowerCase().includes('scheduler')) {
      return this.name
    }
    return `Scheduler(${this.name})`
  }

  get pending_epoch_count(): number {
    return this.pending_epochs.length
  }

  get system_sets(): SystemSetErased<W>[] {
    return Array.from(this._registry.values())
  }

  get event_types(): string[] {
    return this.system_sets.map((system_set) => system_set.event_type)
  }

  addSystem<T extends object>(event_class: EventClass<T>, system: SystemInput<T, W>): SystemEntry<T, W> {
    return this.addSystemWithPriority(event_class, system, 0)
  }

  addSystemWithPriority<T extends object>(event_class: EventClass<T>, system: SystemInput<T, W>, priority: number): SystemEntry<T, W> {
    const system_set = this.systemSet(event_class)
    const entry = new SystemEntry<T, W>({
      handler: toSystemHandler(system),
      priority,
      event_type: system_set.event_type,
      registered_seq: this._next_registered_seq,
      scheduler_name: this.name,
      scheduler_id: this.id,
    })
    this._next_registered_seq += 1
    system_set.add(entry)
    return entry
  }

  removeSystem<T extends object>(event_class: EventClass<T>, entry: SystemEntry<T, W> | string): boolean {
    return this._registry.get(event_class) ? this.systemSet(event_class).remove(entry) : false
  }

  systemsFor<T extends object>(event_class: EventClass<T>): ReadonlyArray<SystemEntry<T, W>> {
    return this._registry.get(event_class) ? this.systemSet(event_class).systems : []
  }

  // one new epoch at the tail holding just this event
  send<T extends object>(event: T): void {
    this.pending_epochs.push([scheduleEvent(event)])
  }

  // one new epoch at the tail holding all of these events, in order
  sendMany<T extends object>(events: readonly T[]): void {
    this.pending_epochs.push(events.map((event) => scheduleEvent(event)))
  }

  // process the front epoch, returns false when there was nothing to do
  step(world: W): boolean {
    if (this._stepping) {
      throw new Error(`${this}.step() called from inside a system, step() is not re-entrant`)
    }
    const epoch = this.pending_epochs.shift()
    if (!epoch) {
      return false
    }

    this._stepping = true
    let dispatched = 0
    let mark = this._sender.mark()
    try {
      for (const scheduled of epoch) {
        mark = this._sender.mark()
        // events of a type nobody registered or observed are dropped here
        this._registry.get(scheduled.event_class)?.dispatch(scheduled.event, world, this._sender)
        dispatched += 1
      }
    } catch (error) {
      // the failing event leaves no follow-ups behind, the events dispatched before it keep theirs
      this._sender.rollback(mark)
      this.queueFollowUps()
      // the rest of the epoch runs first on the next step
      const undispatched = epoch.slice(dispatched + 1)
      if (undispatched.length > 0) {
        this.pending_epochs.unshift(undispatched)
      }
      throw error
    } finally {
      this._stepping = false
    }

    this.queueFollowUps()
    this.steps_completed += 1
    return true
  }

  // while (scheduler.step(world)) {}, with an optional step limit
  runUntilIdle(world: W, options: RunUntilIdleOptions = {}): number {
    const max_steps = options.max_steps === undefined ? this.max_steps : MaxStepsSchema.parse(options.max_steps)
    let steps = 0
    while (!this.isEmpty()) {
      if (max_steps !== null && steps >= max_steps) {
        throw new SchedulerStepLimitError(
          `${this}.runUntilIdle() stopped after max_steps=${max_steps} with ${this.pending_epoch_count} epochs still pending`,
          { max_steps, pending_epoch_count: this.pending_epoch_count }
        )
      }
      this.step(world)
      steps += 1
    }
    return steps
  }

  // subscribe to every event of this type that completes its chain from now on, works without any systems registered
  observe<T extends object>(event_class: EventClass<T>): Observer<T> {
    return this.systemSet(event_class).subscribe()
  }

  isEmpty(): boolean {
    return this.pending_epochs.length === 0
  }

  logSchedule(): string {
    return logSchedule(this)
  }

  // drop all state; Observers of this scheduler read nothing afterwards
  destroy(): void {
    for (const system_set of this._registry.values()) {
      system_set.log.close()
    }
    this._registry.clear()
    this.pending_epochs.length = 0
    this._sender.clear()
  }

  // staged immediate events become the next epoch, each delayed event its own epoch at the back
  private queueFollowUps(): void {
    const immediate = this._sender.takeImmediate()
    if (immediate.length > 0) {
      this.pending_epochs.unshift(immediate)
    }
    for (const delayed of this._sender.takeDelayed()) {
      this.pending_epochs.push([delayed])
    }
  }

  private systemSet<T extends object>(event_class: EventClass<T>): SystemSet<T, W> {
    return this._registry.ensure(
      event_class,
      () =>
        new SystemSet<T, W>(event_class, {
          scheduler_name: this.name,
          on_system_error: this.on_system_error,
          debug: this.debug,
          backlog_warning_threshold: this.backlog_warning_threshold,
        })
    )
  }
}
