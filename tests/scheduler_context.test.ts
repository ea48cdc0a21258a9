import assert from 'node:assert/strict'
import { test } from 'node:test'

import { EventSender, SchedulerContext, eventClassOf, eventTypeName } from '../src/index.js'

class Attack {
  constructor(public value: number) {}
}

class Damage {
  static event_type = 'DamageDealt'
  constructor(public value: number) {}
}

class CriticalAttack extends Attack {}

test('sender keeps immediate and delayed events apart, each in staging order', () => {
  const sender = new EventSender()
  const context = new SchedulerContext({ sender, event_type: 'Attack', scheduler_name: 'ContextScheduler' })

  context.sendImmediate(new Attack(1))
  context.sendDelayed(new Damage(2))
  context.send(new Attack(3))
  context.sendDelayed(new Damage(4))

  assert.equal(sender.size, 4)
  assert.equal(context.scheduler_name, 'ContextScheduler')

  const immediate = sender.takeImmediate()
  const delayed = sender.takeDelayed()

  assert.deepEqual(
    immediate.map((scheduled) => scheduled.event),
    [new Attack(1), new Attack(3)]
  )
  assert.deepEqual(
    delayed.map((scheduled) => scheduled.event_class),
    [Damage, Damage]
  )
  assert.equal(sender.size, 0)
})

test('clear discards everything staged', () => {
  const sender = new EventSender()
  sender.sendImmediate(new Attack(1))
  sender.sendDelayed(new Attack(2))

  sender.clear()

  assert.deepEqual(sender.takeImmediate(), [])
  assert.deepEqual(sender.takeDelayed(), [])
})

test('rollback drops only what was staged after the mark', () => {
  const sender = new EventSender()
  sender.sendImmediate(new Attack(1))
  sender.sendDelayed(new Damage(2))
  const mark = sender.mark()
  sender.sendImmediate(new Attack(3))
  sender.sendDelayed(new Damage(4))

  sender.rollback(mark)

  assert.deepEqual(mark, { immediate: 1, delayed: 1 })
  assert.deepEqual(
    sender.takeImmediate().map((scheduled) => scheduled.event),
    [new Attack(1)]
  )
  assert.deepEqual(
    sender.takeDelayed().map((scheduled) => scheduled.event),
    [new Damage(2)]
  )
})

test('the exact constructor is the event type tag', () => {
  assert.equal(eventClassOf(new Attack(1)), Attack)
  assert.equal(eventClassOf(new CriticalAttack(1)), CriticalAttack)
  assert.equal(eventClassOf({ value: 1 }), Object)
})

test('values without a constructor are rejected', () => {
  assert.throws(() => eventClassOf(Object.create(null)), {
    message: 'Invalid event: value has no constructor to use as its event type',
  })
  assert.throws(() => eventClassOf(null), { message: 'Invalid event: expected a class instance, got: null' })
  assert.throws(() => eventClassOf(42), { message: 'Invalid event: expected a class instance, got: 42' })
  assert.throws(() => new EventSender().sendImmediate(Object.create(null)), {
    message: 'Invalid event: value has no constructor to use as its event type',
  })
})

test('event type names prefer a static event_type over the class name', () => {
  assert.equal(eventTypeName(Attack), 'Attack')
  assert.equal(eventTypeName(Damage), 'DamageDealt')
  assert.equal(eventTypeName(CriticalAttack), 'CriticalAttack')
})
