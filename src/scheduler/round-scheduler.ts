// src/scheduler/round-scheduler.ts — Periodic task execution with an in-flight guard

export interface ScheduledTaskDef {
  id: string
  name: string
  intervalMs: number
  handler: () => Promise<unknown>
}

interface RunningTask {
  def: ScheduledTaskDef
  timer: ReturnType<typeof setTimeout> | undefined
  lastRun: number | undefined
  lastError: string | undefined
  runs: number
  failures: number
  running: boolean
}

export interface TaskStatus {
  id: string
  name: string
  state: "running" | "waiting" | "error"
  lastRun: number | undefined
  lastError: string | undefined
  runs: number
  failures: number
}

export class RoundScheduler {
  private tasks = new Map<string, RunningTask>()
  private started = false

  constructor(private readonly now: () => number = Date.now) {}

  register(def: ScheduledTaskDef): void {
    if (def.intervalMs <= 0) throw new RangeError(`task ${def.id}: intervalMs must be positive`)
    this.tasks.set(def.id, {
      def,
      timer: undefined,
      lastRun: undefined,
      lastError: undefined,
      runs: 0,
      failures: 0,
      running: false,
    })
  }

  start(): void {
    if (this.started) return
    this.started = true
    for (const task of this.tasks.values()) this.scheduleNext(task)
  }

  stop(): void {
    this.started = false
    for (const task of this.tasks.values()) {
      if (task.timer) {
        clearTimeout(task.timer)
        task.timer = undefined
      }
    }
  }

  isStarted(): boolean {
    return this.started
  }

  /**
   * Run a task immediately, outside its timer. Returns false when the task is
   * unknown or its previous run has not finished.
   */
  async runNow(taskId: string): Promise<boolean> {
    const task = this.tasks.get(taskId)
    if (!task || task.running) return false
    await this.runTask(task)
    return true
  }

  getStatus(): TaskStatus[] {
    return Array.from(this.tasks.values()).map((t) => ({
      id: t.def.id,
      name: t.def.name,
      state: t.running ? "running" : t.lastError ? "error" : "waiting",
      lastRun: t.lastRun,
      lastError: t.lastError,
      runs: t.runs,
      failures: t.failures,
    }))
  }

  private scheduleNext(task: RunningTask): void {
    if (!this.started) return

    task.timer = setTimeout(async () => {
      // A manual runNow() still in progress takes this tick's place
      if (!task.running) await this.runTask(task)
      this.scheduleNext(task)
    }, task.def.intervalMs)

    // Allow Node to exit cleanly if only timers remain
    task.timer.unref()
  }

  /** Never rejects: handler errors are recorded on the task and logged. */
  private async runTask(task: RunningTask): Promise<void> {
    task.running = true
    task.runs++
    try {
      await task.def.handler()
      task.lastError = undefined
    } catch (err) {
      task.failures++
      task.lastError = err instanceof Error ? err.message : String(err)
      console.error(`[scheduler] task ${task.def.id} failed:`, task.lastError)
    } finally {
      task.lastRun = this.now()
      task.running = false
    }
  }
}
