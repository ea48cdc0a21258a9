export { Scheduler, SchedulerOptionsSchema, SchedulerStepLimitError } from './scheduler.js'
export type { SchedulerOptions, RunUntilIdleOptions } from './scheduler.js'
export { SchedulerContext, EventSender } from './scheduler_context.js'
export type { ScheduledEvent, SenderMark } from './scheduler_context.js'
export { ObservableLog, Observer } from './observable_log.js'
export type { ObservableLogOptions } from './observable_log.js'
export {
  SystemEntry,
  SystemEntryJSONSchema,
  SystemError,
  eventOnly,
  withWorld,
  withContext,
  withWorldAndContext,
  toSystemHandler,
} from './system_handler.js'
export type { SystemEntryJSON, SystemHandler, SystemInput } from './system_handler.js'
export { SystemSet } from './system_set.js'
export type { SystemEntryInfo, SystemSetOptions } from './system_set.js'
export { logSchedule } from './logging.js'
export { SYSTEM_SIGNALS, SYSTEM_KINDS, SYSTEM_ERROR_MODES, eventTypeName, eventClassOf, snapshotEvent } from './types.js'
export type {
  EventClass,
  SystemSignal,
  SystemResult,
  SystemFunction,
  EventOnlySystemFunction,
  WorldSystemFunction,
  ContextSystemFunction,
  SystemKind,
  SystemErrorMode,
} from './types.js'
