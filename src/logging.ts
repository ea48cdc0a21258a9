import type { ScheduledEvent } from './scheduler_context.js'
import type { SystemEntryInfo } from './system_set.js'
import { eventTypeName } from './types.js'

type LogScheduleSystemSet = {
  event_type: string
  systems: ReadonlyArray<SystemEntryInfo>
  log: { size: number; observer_count: number }
}

type LogScheduleScheduler = {
  name: string
  system_sets: Iterable<LogScheduleSystemSet>
  pending_epochs: ReadonlyArray<ReadonlyArray<ScheduledEvent>>
  toString?: () => string
}

const RULE_WIDTH = 80

const plural = (count: number, noun: string): string => `${count} ${noun}${count === 1 ? '' : 's'}`

export const logSchedule = (scheduler: LogScheduleScheduler): string => {
  const label = typeof scheduler.toString === 'function' ? scheduler.toString() : scheduler.name
  const lines: string[] = []
  lines.push(`📋 Schedule for ${label}`)
  lines.push('='.repeat(RULE_WIDTH))

  const system_sets = Array.from(scheduler.system_sets)
  if (system_sets.length === 0) {
    lines.push('(No event types registered)')
  }
  system_sets.forEach((system_set, index) => {
    lines.push(...buildSystemSetLines(system_set, index === system_sets.length - 1))
  })

  lines.push('-'.repeat(RULE_WIDTH))
  lines.push(...buildPendingLines(scheduler.pending_epochs))
  lines.push('='.repeat(RULE_WIDTH))
  return lines.join('\n')
}

export const buildSystemSetLines = (system_set: LogScheduleSystemSet, is_last: boolean): string[] => {
  const connector = is_last ? '└── ' : '├── '
  const extension = is_last ? '    ' : '│   '
  const summary = [
    plural(system_set.systems.length, 'system'),
    plural(system_set.log.observer_count, 'observer'),
    `${system_set.log.size} buffered`,
  ].join(', ')
  const lines = [`${connector}${system_set.event_type} (${summary})`]
  system_set.systems.forEach((system, index) => {
    const system_connector = index === system_set.systems.length - 1 ? '└── ' : '├── '
    lines.push(`${extension}${system_connector}${system.toString()} [priority ${system.priority}]`)
  })
  return lines
}

export const buildPendingLines = (pending_epochs: ReadonlyArray<ReadonlyArray<ScheduledEvent>>): string[] => {
  if (pending_epochs.length === 0) {
    return ['✅ No pending epochs']
  }
  const lines = [`⏳ ${plural(pending_epochs.length, 'pending epoch')}`]
  pending_epochs.forEach((epoch, index) => {
    const connector = index === pending_epochs.length - 1 ? '└── ' : '├── '
    lines.push(`${connector}#${index}: ${formatEpoch(epoch)}`)
  })
  return lines
}

export const formatEpoch = (epoch: ReadonlyArray<ScheduledEvent>): string => {
  if (epoch.length === 0) {
    return '(empty)'
  }
  return epoch.map((scheduled) => eventTypeName(scheduled.event_class)).join(', ')
}
