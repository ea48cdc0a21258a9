import { z } from 'zod'
import { v5 as uuidv5 } from 'uuid'

import type { SchedulerContext } from './scheduler_context.js'
import {
  SYSTEM_KINDS,
  type ContextSystemFunction,
  type EventOnlySystemFunction,
  type SystemFunction,
  type SystemKind,
  type SystemResult,
  type WorldSystemFunction,
} from './types.js'

const SYSTEM_ID_NAMESPACE = uuidv5('epochs-system', uuidv5.DNS)

export const SystemPrioritySchema = z.number().int().min(Number.MIN_SAFE_INTEGER).max(Number.MAX_SAFE_INTEGER)
const RegisteredSeqSchema = z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)

// a system adapted to the canonical (event, world, context) call shape
export type SystemHandler<T extends object, W> = {
  kind: SystemKind
  name: string
  run: SystemFunction<T, W>
}

// bare functions are taken as the canonical shape; (event) and (event, world) functions already fit it
export type SystemInput<T extends object, W> = SystemFunction<T, W> | SystemHandler<T, W>

const functionName = (fn: Function): string => fn.name || 'anonymous' // 'anonymous' for inline arrow functions

export const eventOnly = <T extends object, W = unknown>(fn: EventOnlySystemFunction<T>): SystemHandler<T, W> => ({
  kind: 'event',
  name: functionName(fn),
  run: (event) => fn(event),
})

export const withWorld = <T extends object, W>(fn: WorldSystemFunction<T, W>): SystemHandler<T, W> => ({
  kind: 'world',
  name: functionName(fn),
  run: (event, world) => fn(event, world),
})

export const withContext = <T extends object, W = unknown>(fn: ContextSystemFunction<T>): SystemHandler<T, W> => ({
  kind: 'context',
  name: functionName(fn),
  run: (event, _world, context) => fn(event, context),
})

export const withWorldAndContext = <T extends object, W>(fn: SystemFunction<T, W>): SystemHandler<T, W> => ({
  kind: 'world+context',
  name: functionName(fn),
  run: (event, world, context) => fn(event, world, context),
})

export const toSystemHandler = <T extends object, W>(system: SystemInput<T, W>): SystemHandler<T, W> =>
  typeof system === 'function' ? withWorldAndContext(system) : system

export const SystemEntryJSONSchema = z
  .object({
    id: z.string().uuid(),
    system_name: z.string(),
    system_kind: z.enum(SYSTEM_KINDS),
    event_type: z.string(),
    priority: SystemPrioritySchema,
    registered_seq: RegisteredSeqSchema,
    scheduler_name: z.string(),
    scheduler_id: z.string().uuid(),
  })
  .strict()

export type SystemEntryJSON = z.infer<typeof SystemEntryJSONSchema>

// one link in the chain of systems registered for an event type
export class SystemEntry<T extends object, W> {
  id: string // uuidv5 of scheduler id, event type, system name, priority and registration sequence
  system: SystemFunction<T, W>
  system_name: string
  system_kind: SystemKind
  priority: number // lower runs first, equal priorities run in registration order
  event_type: string
  registered_seq: number // position in the scheduler-wide registration order
  scheduler_name: string
  scheduler_id: string

  constructor(params: {
    id?: string
    handler: SystemHandler<T, W>
    priority: number
    event_type: string
    registered_seq: number
    scheduler_name: string
    scheduler_id: string
  }) {
    const priority = SystemPrioritySchema.parse(params.priority)
    const registered_seq = RegisteredSeqSchema.parse(params.registered_seq)
    this.id =
      params.id ??
      SystemEntry.computeSystemId({
        scheduler_id: params.scheduler_id,
        event_type: params.event_type,
        system_name: params.handler.name,
        priority,
        registered_seq,
      })
    this.system = params.handler.run
    this.system_name = params.handler.name
    this.system_kind = params.handler.kind
    this.priority = priority
    this.event_type = params.event_type
    this.registered_seq = registered_seq
    this.scheduler_name = params.scheduler_name
    this.scheduler_id = params.scheduler_id
  }

  static computeSystemId(params: {
    scheduler_id: string
    event_type: string
    system_name: string
    priority: number
    registered_seq: number
  }): string {
    const seed = `${params.scheduler_id}|${params.event_type}|${params.system_name}|${params.priority}|${params.registered_seq}`
    return uuidv5(seed, SYSTEM_ID_NAMESPACE)
  }

  run(event: T, world: W, context: SchedulerContext): SystemResult {
    return this.system(event, world, context)
  }

  // "apply_damage()" for named functions, "function#1a2b()" for inline arrow functions
  toString(): string {
    return this.system_name && this.system_name !== 'anonymous' ? `${this.system_name}()` : `function#${this.id.slice(-4)}()`
  }

  toJSON(): SystemEntryJSON {
    return {
      id: this.id,
      system_name: this.system_name,
      system_kind: this.system_kind,
      event_type: this.event_type,
      priority: this.priority,
      registered_seq: this.registered_seq,
      scheduler_name: this.scheduler_name,
      scheduler_id: this.scheduler_id,
    }
  }
}

// A system threw while handling an event. Break and continue are return values, never errors.
export class SystemError extends Error {
  event_type: string
  system_name: string
  system_id: string
  cause: unknown

  constructor(message: string, params: { event_type: string; system_name: string; system_id: string; cause: unknown }) {
    super(message)
    this.name = 'SystemError'
    this.event_type = params.event_type
    this.system_name = params.system_name
    this.system_id = params.system_id
    this.cause = params.cause
  }
}
