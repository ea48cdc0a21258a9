export type LogBuffer<T> = {
  items: T[]
  closed: boolean
}

export type ObserverCursor = {
  index: number // next unread index, relative to the current front of the buffer
  detached: boolean // set by Observer.close(), purged on the next push
}

export type ObservableLogOptions<T> = {
  label?: string // shown in warnings, normally the event type name
  backlog_warning_threshold?: number | null // buffered items before a one-time warning, null disables it
  clone?: (item: T) => T // applied when an item is pushed and again on every read, defaults to identity
}

// Append-only log shared by independent Observers. Consumed history is trimmed lazily, only during push().
export class ObservableLog<T> {
  label: string
  backlog_warning_threshold: number | null
  readonly clone: (item: T) => T

  private _buffer: LogBuffer<T> | null
  private _cursors: Array<WeakRef<ObserverCursor>>
  private _warned_about_backlog: boolean

  constructor(options: ObservableLogOptions<T> = {}) {
    this.label = options.label ?? 'ObservableLog'
    this.backlog_warning_threshold = options.backlog_warning_threshold === undefined ? 10_000 : options.backlog_warning_threshold
    this.clone = options.clone ?? ((item) => item)
    this._buffer = { items: [], closed: false }
    this._cursors = []
    this._warned_about_backlog = false
  }

  // number of buffered items not yet trimmed
  get size(): number {
    return this._buffer?.items.length ?? 0
  }

  get observer_count(): number {
    return this.liveCursors().length
  }

  get closed(): boolean {
    return this._buffer === null
  }

  push(item: T): void {
    const buffer = this._buffer
    if (!buffer) {
      return
    }
    // nobody is listening, nothing to keep
    this.purgeDeadCursors()
    if (this._cursors.length === 0) {
      buffer.items.length = 0
      return
    }
    // later changes to the pushed value must not reach readers
    buffer.items.push(this.clone(item))
    this.synchronize()
    this.checkBacklog(buffer)
  }

  subscribe(): Observer<T> {
    const buffer: LogBuffer<T> = this._buffer ?? { items: [], closed: true }
    const cursor: ObserverCursor = { index: buffer.items.length, detached: buffer.closed }
    if (!buffer.closed) {
      this._cursors.push(new WeakRef(cursor))
    }
    return new Observer(cursor, buffer, this.clone)
  }

  // release the buffer: every Observer of this log reads nothing from now on
  close(): void {
    if (this._buffer) {
      this._buffer.closed = true
      this._buffer.items.length = 0
    }
    this._buffer = null
    this._cursors = []
  }

  private purgeDeadCursors(): void {
    this._cursors = this._cursors.filter((ref) => {
      const cursor = ref.deref()
      return cursor !== undefined && !cursor.detached
    })
  }

  private liveCursors(): ObserverCursor[] {
    const cursors: ObserverCursor[] = []
    for (const ref of this._cursors) {
      const cursor = ref.deref()
      if (cursor && !cursor.detached) cursors.push(cursor)
    }
    return cursors
  }

  private synchronize(): void {
    const buffer = this._buffer
    if (!buffer) {
      return
    }
    this.purgeDeadCursors()
    const cursors = this.liveCursors()
    let new_front = buffer.items.length
    for (const cursor of cursors) {
      if (cursor.index < new_front) new_front = cursor.index
    }
    if (new_front <= 0) {
      return
    }
    for (const cursor of cursors) {
      cursor.index -= new_front
    }
    buffer.items.splice(0, new_front)
  }

  private checkBacklog(buffer: LogBuffer<T>): void {
    const threshold = this.backlog_warning_threshold
    if (threshold === null || this._warned_about_backlog || buffer.items.length < threshold) {
      return
    }
    this._warned_about_backlog = true
    console.warn(
      `[epochs] ⚠️ Observable log for ${this.label} is holding ${buffer.items.length} unread events. Drain its Observers or close() the ones you no longer read.`
    )
  }
}

// Read handle into an ObservableLog. Holds its cursor strongly and the log's buffer weakly.
//
// Reads are a synchronous load-check-advance, so within one isolate an Observer shared by several
// async tasks still hands each item to exactly one of them. Observers cannot be moved to worker_threads.
export class Observer<T> implements Iterable<T> {
  private _cursor: ObserverCursor
  private _buffer: WeakRef<LogBuffer<T>>
  private _clone: (item: T) => T

  constructor(cursor: ObserverCursor, buffer: LogBuffer<T>, clone: (item: T) => T = (item) => item) {
    this._cursor = cursor
    this._buffer = new WeakRef(buffer)
    this._clone = clone
  }

  get closed(): boolean {
    return this.readableBuffer() === undefined
  }

  // number of items available to next() right now
  get pending(): number {
    const buffer = this.readableBuffer()
    if (!buffer) {
      return 0
    }
    return Math.max(0, buffer.items.length - this._cursor.index)
  }

  next(): T | undefined {
    return this.mapNext((item) => item)
  }

  mapNext<U>(transform: (item: T) => U): U | undefined {
    const buffer = this.readableBuffer()
    if (!buffer) {
      return undefined
    }
    const index = this._cursor.index
    if (index >= buffer.items.length) {
      return undefined
    }
    const item = buffer.items[index]
    this._cursor.index = index + 1
    // each read gets its own copy, so one reader cannot change what another sees
    return transform(this._clone(item))
  }

  drain(): T[] {
    return Array.from(this)
  }

  *[Symbol.iterator](): Iterator<T> {
    while (this.pending > 0) {
      const buffer = this.readableBuffer()
      if (!buffer) return
      const item = buffer.items[this._cursor.index]
      this._cursor.index += 1
      yield this._clone(item)
    }
  }

  // stop reading; the log forgets this cursor on its next push
  close(): void {
    this._cursor.detached = true
  }

  private readableBuffer(): LogBuffer<T> | undefined {
    if (this._cursor.detached) {
      return undefined
    }
    const buffer = this._buffer.deref()
    return buffer && !buffer.closed ? buffer : undefined
  }
}
