#!/usr/bin/env -S node --import tsx
// Run: node --import tsx examples/scheduler_control_flow.ts

import { Scheduler, type SchedulerContext, type SystemResult } from '../src/index.js'

type Unit = {
  alive: boolean
  health: number
  invincible: boolean
  shield: number | null
}

type World = { units: Unit[] }

class Hit {
  constructor(
    public unit: number,
    public damage: number
  ) {}
}

class Kill {
  constructor(public unit: number) {}
}

// 'break' ends the chain for this event, nothing after it runs and observers never see it
function check_invincible(hit: Hit, world: World): SystemResult {
  return world.units[hit.unit].invincible ? 'break' : 'ok'
}

// 'continue' means nothing to do here, the rest of the chain still runs
function apply_shield(hit: Hit, world: World): SystemResult {
  const shield = world.units[hit.unit].shield
  if (shield === null) return 'continue'
  hit.damage -= shield
  return 'ok'
}

function apply_damage(hit: Hit, world: World, context: SchedulerContext): SystemResult {
  const unit = world.units[hit.unit]
  unit.health -= hit.damage
  if (unit.health <= 0) {
    context.sendImmediate(new Kill(hit.unit))
  }
  return 'ok'
}

function kill(event: Kill, world: World): SystemResult {
  world.units[event.unit].alive = false
  return 'ok'
}

function main(): void {
  const world: World = {
    units: [
      { alive: true, health: 2, invincible: false, shield: null },
      { alive: true, health: 2, invincible: true, shield: null },
      { alive: true, health: 2, invincible: false, shield: 1 },
    ],
  }

  const scheduler = new Scheduler<World>('ControlFlowScheduler', { max_steps: 100 })
  scheduler.addSystemWithPriority(Hit, check_invincible, 0)
  scheduler.addSystemWithPriority(Hit, apply_shield, 1)
  scheduler.addSystemWithPriority(Hit, apply_damage, 2)
  scheduler.addSystem(Kill, kill)

  scheduler.send(new Hit(0, 2))
  scheduler.send(new Hit(1, 2))
  scheduler.send(new Hit(2, 2))

  const steps = scheduler.runUntilIdle(world)
  console.log(`processed ${steps} epochs`)
  world.units.forEach((unit, index) => {
    console.log(`unit ${index}: health=${unit.health} alive=${unit.alive}`)
  })
}

try {
  main()
} catch (error) {
  console.error('Example failed:', error)
  process.exitCode = 1
}
