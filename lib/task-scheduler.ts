import { errorMessage } from './errors'

export interface PeriodicTask {
  name: string
  intervalMs: number
  /** Run immediately on start instead of waiting one interval. */
  runOnStart?: boolean
  run: () => Promise<unknown>
}

export type TaskRunOutcome = 'completed' | 'failed' | 'skipped'

export interface TaskStatus {
  name: string
  intervalMs: number
  running: boolean
  lastRun: Date | null
  runs: number
  consecutiveFailures: number
  lastError: string | null
}

interface TaskState {
  task: PeriodicTask
  lastRun: number
  hasRun: boolean
  running: boolean
  current: Promise<void> | null
  runs: number
  consecutiveFailures: number
  lastError: string | null
}

export interface TaskSchedulerOptions {
  tickMs?: number
  now?: () => number
}

const DEFAULT_TICK_MS = 1000

export function formatInterval(ms: number): string {
  if (ms >= 3600000) return `${ms / 3600000}h`
  if (ms >= 60000) return `${ms / 60000}m`
  return `${ms / 1000}s`
}

/**
 * Runs periodic tasks off a single tick timer. A task that is still running
 * when it comes due again is skipped for that tick, never queued. Errors are
 * logged per task; the next scheduled run is the retry.
 */
export class TaskScheduler {
  private readonly tasks = new Map<string, TaskState>()
  private readonly tickMs: number
  private readonly now: () => number
  private timer: ReturnType<typeof setInterval> | null = null

  constructor(opts: TaskSchedulerOptions = {}) {
    this.tickMs = opts.tickMs ?? DEFAULT_TICK_MS
    this.now = opts.now ?? (() => Date.now())
  }

  register(task: PeriodicTask): void {
    if (this.tasks.has(task.name)) {
      throw new Error(`Task "${task.name}" is already registered`)
    }
    this.tasks.set(task.name, {
      task,
      lastRun: this.now(),
      hasRun: false,
      running: false,
      current: null,
      runs: 0,
      consecutiveFailures: 0,
      lastError: null,
    })
  }

  start(): void {
    if (this.timer) return

    console.log('[Scheduler] Schedule:')
    const startedAt = this.now()
    for (const state of this.tasks.values()) {
      console.log(`  - ${state.task.name}: every ${formatInterval(state.task.intervalMs)}`)
      state.lastRun = startedAt
      if (state.task.runOnStart) this.launch(state)
    }

    this.timer = setInterval(() => this.tick(), this.tickMs)
  }

  /** Launch every idle task whose interval has elapsed. */
  tick(): void {
    const now = this.now()
    for (const state of this.tasks.values()) {
      if (!state.running && now - state.lastRun >= state.task.intervalMs) this.launch(state)
    }
  }

  async runNow(name: string): Promise<TaskRunOutcome> {
    const state = this.tasks.get(name)
    if (!state) throw new Error(`Unknown task "${name}"`)

    const run = this.launch(state)
    if (!run) return 'skipped'
    await run
    return state.lastError === null ? 'completed' : 'failed'
  }

  /** Stop ticking and wait for runs already in progress. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    const inFlight: Promise<void>[] = []
    for (const state of this.tasks.values()) {
      if (state.running && state.current) inFlight.push(state.current)
    }
    await Promise.all(inFlight)
    console.log('[Scheduler] Stopped')
  }

  status(): TaskStatus[] {
    return [...this.tasks.values()].map((state) => ({
      name: state.task.name,
      intervalMs: state.task.intervalMs,
      running: state.running,
      lastRun: state.hasRun ? new Date(state.lastRun) : null,
      runs: state.runs,
      consecutiveFailures: state.consecutiveFailures,
      lastError: state.lastError,
    }))
  }

  get started(): boolean {
    return this.timer !== null
  }

  private launch(state: TaskState): Promise<void> | null {
    if (state.running) {
      console.log(`[Scheduler] ${state.task.name}: SKIPPED (still running)`)
      return null
    }
    state.running = true
    state.hasRun = true
    state.lastRun = this.now()
    state.current = this.execute(state)
    return state.current
  }

  private async execute(state: TaskState): Promise<void> {
    const startTime = this.now()
    try {
      await state.task.run()
      state.consecutiveFailures = 0
      state.lastError = null
      console.log(`[Scheduler] ${state.task.name}: SUCCESS (${this.now() - startTime}ms)`)
    } catch (error) {
      state.consecutiveFailures++
      state.lastError = errorMessage(error)
      console.error(
        `[Scheduler] ${state.task.name}: ERROR (${this.now() - startTime}ms) [failures: ${state.consecutiveFailures}] -`,
        state.lastError
      )
    } finally {
      state.runs++
      state.running = false
    }
  }
}
