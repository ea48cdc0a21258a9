import { ObservableLog, type Observer } from './observable_log.js'
import { SchedulerContext, type EventSender } from './scheduler_context.js'
import { SystemEntry, SystemError } from './system_handler.js'
import { eventTypeName, snapshotEvent, type EventClass, type SystemErrorMode, type SystemResult } from './types.js'

export type SystemSetOptions = {
  scheduler_name: string
  on_system_error: SystemErrorMode
  debug: boolean
  backlog_warning_threshold: number | null
}

export type SystemEntryInfo = Pick<
  SystemEntry<object, unknown>,
  'id' | 'system_name' | 'system_kind' | 'priority' | 'event_type' | 'registered_seq' | 'toJSON' | 'toString'
>

// What the registry needs from a SystemSet without knowing its event type.
export interface SystemSetErased<W> {
  readonly event_class: Function
  readonly event_type: string
  readonly systems: ReadonlyArray<SystemEntryInfo>
  readonly log: { readonly size: number; readonly observer_count: number; close(): void }
  dispatch(event: object, world: W, sender: EventSender): boolean
}

// The chain of systems for one event type, paired with that type's ObservableLog.
export class SystemSet<T extends object, W> implements SystemSetErased<W> {
  readonly event_class: EventClass<T>
  readonly event_type: string
  readonly log: ObservableLog<T>
  readonly options: SystemSetOptions

  private _systems: Array<SystemEntry<T, W>>

  constructor(event_class: EventClass<T>, options: SystemSetOptions) {
    this.event_class = event_class
    this.event_type = eventTypeName(event_class)
    this.options = options
    this.log = new ObservableLog<T>({
      label: this.event_type,
      backlog_warning_threshold: options.backlog_warning_threshold,
      clone: snapshotEvent,
    })
    this._systems = []
  }

  get systems(): ReadonlyArray<SystemEntry<T, W>> {
    return this._systems
  }

  add(entry: SystemEntry<T, W>): void {
    this._systems.push(entry)
    // Array.prototype.sort is stable, equal priorities keep registration order
    this._systems.sort((a, b) => a.priority - b.priority)
  }

  remove(entry: SystemEntry<T, W> | string): boolean {
    const system_id = typeof entry === 'string' ? entry : entry.id
    const index = this._systems.findIndex((system) => system.id === system_id)
    if (index === -1) {
      return false
    }
    this._systems.splice(index, 1)
    return true
  }

  // runs the chain, returns true when the event completed it and was published
  dispatch(event: T, world: W, sender: EventSender): boolean {
    const context = new SchedulerContext({ sender, event_type: this.event_type, scheduler_name: this.options.scheduler_name })
    if (this.options.debug) {
      console.debug(`[epochs] ${this.options.scheduler_name} executing ${this._systems.length} systems for ${this.event_type}`)
    }
    try {
      // snapshot so systems added or removed mid-dispatch only apply to the next event
      for (const entry of [...this._systems]) {
        if (this.runSystem(entry, event, world, context) === 'break') {
          return false
        }
      }
    } finally {
      context._release()
    }
    // published as a snapshot, later dispatches of the same instance do not reach observers
    this.log.push(event)
    return true
  }

  subscribe(): Observer<T> {
    return this.log.subscribe()
  }

  private runSystem(entry: SystemEntry<T, W>, event: T, world: W, context: SchedulerContext): SystemResult {
    try {
      return entry.run(event, world, context)
    } catch (error) {
      const system_error = new SystemError(`${entry} failed while handling ${this.event_type}: ${describeError(error)}`, {
        event_type: this.event_type,
        system_name: entry.system_name,
        system_id: entry.id,
        cause: error,
      })
      if (this.options.on_system_error === 'throw') {
        throw system_error
      }
      console.error(`[epochs] ${this.options.scheduler_name} ${system_error.message} (on_system_error=${this.options.on_system_error})`, error)
      return this.options.on_system_error
    }
  }
}

const describeError = (error: unknown): string => (error instanceof Error ? `${error.name}: ${error.message}` : String(error))
