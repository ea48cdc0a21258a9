import assert from 'node:assert/strict'
import { test } from 'node:test'

import { z } from 'zod'

import {
  EventSender,
  SchedulerContext,
  SystemEntry,
  SystemEntryJSONSchema,
  eventOnly,
  toSystemHandler,
  withContext,
  withWorld,
  withWorldAndContext,
  type SystemResult,
} from '../src/index.js'

const SCHEDULER_ID = '018f6d3a-6b4c-7c1e-9a2b-3c4d5e6f7a8b'

class Attack {
  constructor(public value: number) {}
}

class Damage {
  constructor(public value: number) {}
}

type World = { value: number }

const makeContext = (sender: EventSender = new EventSender()): SchedulerContext =>
  new SchedulerContext({ sender, event_type: 'Attack', scheduler_name: 'HandlerTestScheduler' })

test('eventOnly ignores the world and the context', () => {
  const world: World = { value: 0 }
  const handler = eventOnly<Attack, World>(function add_one(attack) {
    attack.value += 1
  })
  const attack = new Attack(13)

  const result = handler.run(attack, world, makeContext())

  assert.equal(result, undefined)
  assert.equal(attack.value, 14)
  assert.equal(world.value, 0)
  assert.equal(handler.kind, 'event')
  assert.equal(handler.name, 'add_one')
})

test('withWorld passes the world through', () => {
  const world: World = { value: 0 }
  const handler = withWorld<Attack, World>(function store_value(attack, target) {
    target.value = attack.value
  })

  handler.run(new Attack(13), world, makeContext())

  assert.equal(world.value, 13)
  assert.equal(handler.kind, 'world')
})

test('withContext passes the context as the second argument', () => {
  const sender = new EventSender()
  const handler = withContext<Attack, World>((attack, context) => {
    context.sendImmediate(new Attack(17 + attack.value))
  })

  handler.run(new Attack(13), { value: 0 }, makeContext(sender))

  assert.equal(handler.kind, 'context')
  assert.equal(handler.name, 'anonymous')
  assert.equal(sender.immediate.length, 1)
  assert.equal(sender.immediate[0].event_class, Attack)
  assert.deepEqual(sender.immediate[0].event, new Attack(30))
})

test('withWorldAndContext receives all three arguments', () => {
  const sender = new EventSender()
  const world: World = { value: 0 }
  const handler = withWorldAndContext<Attack, World>(function strike(attack, target, context): SystemResult {
    target.value = attack.value
    context.sendDelayed(new Damage(attack.value * 2))
    return 'continue'
  })

  const result = handler.run(new Attack(5), world, makeContext(sender))

  assert.equal(result, 'continue')
  assert.equal(world.value, 5)
  assert.equal(sender.delayed.length, 1)
  assert.equal(sender.delayed[0].event_class, Damage)
  assert.equal(handler.kind, 'world+context')
})

test('toSystemHandler takes bare functions as the canonical shape and passes adapted handlers through', () => {
  const adapted = eventOnly<Attack, World>(() => 'break')
  assert.equal(toSystemHandler(adapted), adapted)

  const canonical = toSystemHandler<Attack, World>(function bare(attack, world) {
    world.value = attack.value
  })
  const world: World = { value: 0 }
  canonical.run(new Attack(9), world, makeContext())

  assert.equal(canonical.kind, 'world+context')
  assert.equal(canonical.name, 'bare')
  assert.equal(world.value, 9)
})

test('SystemEntry ids are deterministic for the same registration', () => {
  const handler = eventOnly<Attack, World>(function apply(attack) {
    attack.value += 1
  })
  const params = {
    handler,
    priority: 2,
    event_type: 'Attack',
    registered_seq: 4,
    scheduler_name: 'HandlerTestScheduler',
    scheduler_id: SCHEDULER_ID,
  }

  const first = new SystemEntry(params)
  const second = new SystemEntry(params)
  const later = new SystemEntry({ ...params, registered_seq: 5 })

  assert.equal(first.id, second.id)
  assert.notEqual(first.id, later.id)
  assert.equal(
    first.id,
    SystemEntry.computeSystemId({
      scheduler_id: SCHEDULER_ID,
      event_type: 'Attack',
      system_name: 'apply',
      priority: 2,
      registered_seq: 4,
    })
  )
})

test('SystemEntry priority must be an integer', () => {
  const handler = eventOnly<Attack, World>(() => undefined)
  const params = {
    handler,
    event_type: 'Attack',
    registered_seq: 0,
    scheduler_name: 'HandlerTestScheduler',
    scheduler_id: SCHEDULER_ID,
  }

  assert.throws(
    () => new SystemEntry({ ...params, priority: 1.5 }),
    (error: unknown) => error instanceof z.ZodError
  )
  assert.throws(
    () => new SystemEntry({ ...params, priority: Number.POSITIVE_INFINITY }),
    (error: unknown) => error instanceof z.ZodError
  )
  assert.equal(new SystemEntry({ ...params, priority: -10 }).priority, -10)
})

test('SystemEntry toString and toJSON', () => {
  const named = new SystemEntry<Attack, World>({
    handler: withWorld(function apply_damage(attack: Attack, world: World) {
      world.value -= attack.value
    }),
    priority: 1,
    event_type: 'Attack',
    registered_seq: 0,
    scheduler_name: 'HandlerTestScheduler',
    scheduler_id: SCHEDULER_ID,
  })
  const anonymous = new SystemEntry<Attack, World>({
    handler: eventOnly(() => undefined),
    priority: 0,
    event_type: 'Attack',
    registered_seq: 1,
    scheduler_name: 'HandlerTestScheduler',
    scheduler_id: SCHEDULER_ID,
  })

  assert.equal(named.toString(), 'apply_damage()')
  assert.equal(anonymous.toString(), `function#${anonymous.id.slice(-4)}()`)

  const json = named.toJSON()
  assert.deepEqual(SystemEntryJSONSchema.parse(json), {
    id: named.id,
    system_name: 'apply_damage',
    system_kind: 'world',
    event_type: 'Attack',
    priority: 1,
    registered_seq: 0,
    scheduler_name: 'HandlerTestScheduler',
    scheduler_id: SCHEDULER_ID,
  })
})
