#!/usr/bin/env -S node --import tsx
// Run: node --import tsx examples/observer.ts

import { Scheduler, eventOnly, type Observer, type SystemResult } from '../src/index.js'

class NumberEvent {
  constructor(public value: number) {}
}

const delay = (ms: number): Promise<void> =>
  new Promise((resolve) => {
    setTimeout(resolve, ms)
  })

// polls its own Observer until told to stop; other observers of the same log are unaffected
async function printEvens(observer: Observer<NumberEvent>, signal: { done: boolean }): Promise<void> {
  while (!signal.done || observer.pending > 0) {
    const value = observer.mapNext((event) => event.value)
    if (value === undefined) {
      await delay(10)
      continue
    }
    console.log(`${value} is even`)
  }
  observer.close()
}

async function main(): Promise<void> {
  const scheduler = new Scheduler<null>('ObserverExampleScheduler')

  // subscribing before any system exists is fine
  const observer = scheduler.observe(NumberEvent)
  const signal = { done: false }
  const printer = printEvens(observer, signal)

  scheduler.addSystem(
    NumberEvent,
    eventOnly(function is_even(event: NumberEvent): SystemResult {
      return event.value % 2 === 0 ? 'ok' : 'break'
    })
  )

  for (const value of [2, 3, 5, 4]) {
    scheduler.send(new NumberEvent(value))
  }
  while (scheduler.step(null)) {
    await delay(5)
  }

  signal.done = true
  await printer
}

main().catch((error) => {
  console.error('Example failed:', error)
  process.exitCode = 1
})
