#!/usr/bin/env -S node --import tsx
// Run: node --import tsx examples/simple.ts

import { Scheduler, eventOnly, withContext, withWorld, type SchedulerContext } from '../src/index.js'

// 1) Events are plain classes, the constructor is the event type.
class Attack {
  constructor(
    public attacker: string,
    public power: number
  ) {}
}

class Damage {
  static event_type = 'DamageDealt' // optional display name for logs
  constructor(
    public target: string,
    public amount: number
  ) {}
}

type World = { health: Map<string, number> }

function main(): void {
  const scheduler = new Scheduler<World>('SimpleExampleScheduler')

  // 2) Systems come in four shapes, pick the adapter that matches what the system needs.
  scheduler.addSystemWithPriority(
    Attack,
    eventOnly(function critical_hit(attack: Attack) {
      if (attack.attacker === 'ada') attack.power *= 2
    }),
    0
  )
  scheduler.addSystemWithPriority(
    Attack,
    withContext(function resolve_attack(attack: Attack, context: SchedulerContext) {
      context.sendImmediate(new Damage('grace', attack.power))
    }),
    1
  )
  scheduler.addSystem(
    Damage,
    withWorld(function apply_damage(damage: Damage, world: World) {
      world.health.set(damage.target, (world.health.get(damage.target) ?? 0) - damage.amount)
    })
  )

  // 3) Observers read every event that made it through its chain, starting now.
  const damage_observer = scheduler.observe(Damage)

  scheduler.send(new Attack('ada', 3))
  scheduler.send(new Attack('linus', 4))

  console.log('=== scheduler.logSchedule() before stepping ===')
  console.log(scheduler.logSchedule())

  // 4) Each step processes one epoch; immediate follow-ups run in the very next one.
  const world: World = { health: new Map([['grace', 20]]) }
  while (scheduler.step(world)) {
    console.log(`step ${scheduler.steps_completed}: ${scheduler.pending_epoch_count} epochs pending`)
  }

  for (const damage of damage_observer) {
    console.log(`[observer] ${damage.target} took ${damage.amount}`)
  }
  console.log(`grace has ${world.health.get('grace')} health left`)
}

try {
  main()
} catch (error) {
  console.error('Example failed:', error)
  process.exitCode = 1
}
