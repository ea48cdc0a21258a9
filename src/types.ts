import type { SchedulerContext } from './scheduler_context.js'

// Any class can be an event type; instances are routed by their exact constructor.
export type EventClass<T extends object = object> = { event_type?: string } & (new (...args: never[]) => T)

export const SYSTEM_SIGNALS = ['ok', 'continue', 'break'] as const
export type SystemSignal = (typeof SYSTEM_SIGNALS)[number]

// undefined / 'ok': proceed. 'continue': declined to act, proceed anyway. 'break': stop the chain, never publish.
export type SystemResult = SystemSignal | void

export type SystemFunction<T extends object, W> = (event: T, world: W, context: SchedulerContext) => SystemResult
export type EventOnlySystemFunction<T extends object> = (event: T) => SystemResult
export type WorldSystemFunction<T extends object, W> = (event: T, world: W) => SystemResult
export type ContextSystemFunction<T extends object> = (event: T, context: SchedulerContext) => SystemResult

export const SYSTEM_KINDS = ['event', 'world', 'context', 'world+context'] as const
export type SystemKind = (typeof SYSTEM_KINDS)[number]

export const SYSTEM_ERROR_MODES = ['throw', 'break', 'continue'] as const
export type SystemErrorMode = (typeof SYSTEM_ERROR_MODES)[number]

export const eventTypeName = (event_class: Function & { event_type?: unknown }): string => {
  const event_type = event_class.event_type
  if (typeof event_type === 'string' && event_type.length > 0) {
    return event_type
  }
  return event_class.name || 'AnonymousEvent'
}

// the constructor of an event value is its type tag
export const eventClassOf = (event: unknown): Function => {
  if (typeof event !== 'object' || event === null) {
    throw new Error(`Invalid event: expected a class instance, got: ${String(event)}`)
  }
  const prototype: unknown = Object.getPrototypeOf(event)
  const constructor: unknown = prototype === null || typeof prototype !== 'object' ? undefined : Reflect.get(prototype, 'constructor')
  if (typeof constructor !== 'function') {
    throw new Error('Invalid event: value has no constructor to use as its event type')
  }
  return constructor
}

// shallow copy that keeps the prototype, so methods and instanceof still work on the copy
export const snapshotEvent = <T extends object>(event: T): T => {
  const copy: T = Object.create(Object.getPrototypeOf(event))
  return Object.assign(copy, event)
}
