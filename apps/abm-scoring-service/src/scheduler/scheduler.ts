import pLimit from "p-limit";
import { Clock } from "../cache/ttlCache";
import { errorMessage } from "../utils/errors";

// ============================================================================
// TYPES
// ============================================================================

export type TaskArgs = Record<string, unknown>;

export type TaskFn = (args: TaskArgs) => unknown;

interface ScheduledTask {
  id: string;
  fn: TaskFn;
  /** Seconds between runs */
  interval: number;
  args: TaskArgs;
  addedAt: number;
  /** Epoch ms of the last successful run, 0 = never */
  lastRun: number;
  /** Epoch ms of the last dispatch, success or not */
  lastAttempt: number;
  running: boolean;
  errorCount: number;
  runCount: number;
}

/** Task view exposed to the admin API */
export interface TaskStatus {
  task_id: string;
  interval: number;
  args: TaskArgs;
  last_run: number;
  last_run_formatted: string;
  next_run: string;
  running: boolean;
  error_count: number;
  run_count: number;
}

export interface SchedulerStatus {
  running: boolean;
  tasks: TaskStatus[];
  in_flight: number;
}

export interface SchedulerOptions {
  /** Loop wake-up period */
  tickMs?: number;
  /** Max tasks executing at once */
  maxConcurrency?: number;
  clock?: Clock;
}

// ============================================================================
// SCHEDULER
// ============================================================================

/**
 * Runs registered tasks at fixed intervals without blocking the caller.
 * Each due task is dispatched as its own job on a bounded pool; a failing task
 * only bumps its error count.
 */
export class Scheduler {
  private readonly tasks = new Map<string, ScheduledTask>();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly limit: pLimit.Limit;
  private readonly tickMs: number;
  private readonly clock: Clock;
  private timer: NodeJS.Timeout | null = null;

  constructor(options: SchedulerOptions = {}) {
    this.tickMs = options.tickMs ?? 1000;
    this.clock = options.clock ?? Date.now;
    this.limit = pLimit(Math.max(1, options.maxConcurrency ?? 4));
    console.log(`[scheduler] Initialized (tick ${this.tickMs}ms)`);
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /**
   * Register a task. Returns false if the id is taken or the interval is not positive.
   */
  addTask(taskId: string, fn: TaskFn, intervalSeconds: number, args: TaskArgs = {}): boolean {
    if (this.tasks.has(taskId)) {
      console.warn(`[scheduler] Task ${taskId} already exists`);
      return false;
    }
    if (!(intervalSeconds > 0)) {
      console.warn(`[scheduler] Task ${taskId} rejected: interval must be positive, got ${intervalSeconds}`);
      return false;
    }

    this.tasks.set(taskId, {
      id: taskId,
      fn,
      interval: intervalSeconds,
      args: { ...args },
      addedAt: this.clock(),
      lastRun: 0,
      lastAttempt: 0,
      running: false,
      errorCount: 0,
      runCount: 0,
    });

    console.log(`[scheduler] Added task ${taskId} with interval ${intervalSeconds}s`);
    return true;
  }

  removeTask(taskId: string): boolean {
    if (!this.tasks.delete(taskId)) {
      console.warn(`[scheduler] Task ${taskId} does not exist`);
      return false;
    }
    console.log(`[scheduler] Removed task ${taskId}`);
    return true;
  }

  /**
   * Change a live task's interval and/or merge new arguments into its bound args
   */
  updateTask(taskId: string, update: { intervalSeconds?: number; args?: TaskArgs }): boolean {
    const task = this.tasks.get(taskId);
    if (!task) {
      console.warn(`[scheduler] Task ${taskId} does not exist`);
      return false;
    }
    if (update.intervalSeconds !== undefined && !(update.intervalSeconds > 0)) {
      console.warn(`[scheduler] Task ${taskId} update rejected: interval must be positive`);
      return false;
    }

    if (update.intervalSeconds !== undefined) {
      task.interval = update.intervalSeconds;
    }
    if (update.args) {
      task.args = { ...task.args, ...update.args };
    }

    console.log(`[scheduler] Updated task ${taskId}`);
    return true;
  }

  getTaskStatus(taskId: string): TaskStatus | null {
    const task = this.tasks.get(taskId);
    return task ? this.toStatus(task) : null;
  }

  getAllTasks(): TaskStatus[] {
    return [...this.tasks.values()].map(task => this.toStatus(task));
  }

  status(): SchedulerStatus {
    return {
      running: this.isRunning,
      tasks: this.getAllTasks(),
      in_flight: this.inFlight.size,
    };
  }

  start(): boolean {
    if (this.timer) {
      console.warn("[scheduler] Scheduler is already running");
      return false;
    }

    this.timer = setInterval(() => {
      this.dispatchDue();
    }, this.tickMs);
    this.timer.unref();

    console.log("[scheduler] Scheduler started");
    return true;
  }

  /**
   * Stop the loop. Jobs already dispatched keep running; use drain() to wait for them.
   */
  stop(): boolean {
    if (!this.timer) {
      console.warn("[scheduler] Scheduler is not running");
      return false;
    }

    clearInterval(this.timer);
    this.timer = null;

    console.log(`[scheduler] Scheduler stopped (${this.inFlight.size} job(s) still in flight)`);
    return true;
  }

  /**
   * Wait for in-flight jobs, at most timeoutMs. Resolves true if they all finished.
   */
  async drain(timeoutMs: number = 5000): Promise<boolean> {
    if (this.inFlight.size === 0) return true;

    let timeout: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>(resolve => {
      timeout = setTimeout(() => resolve(false), timeoutMs);
    });
    const settled = Promise.all([...this.inFlight]).then(() => true);

    try {
      return await Promise.race([settled, expired]);
    } finally {
      clearTimeout(timeout);
    }
  }

  /**
   * One loop iteration: dispatch every due task and wait for those jobs to finish
   */
  async tick(): Promise<void> {
    await Promise.all(this.dispatchDue());
  }

  private dispatchDue(): Promise<void>[] {
    const now = this.clock();
    const jobs: Promise<void>[] = [];

    for (const task of this.tasks.values()) {
      const since = task.lastAttempt || task.addedAt;
      if (now - since < task.interval * 1000) continue;

      // Compare-and-set: the event loop makes this check+flip indivisible
      if (task.running) continue;
      task.running = true;
      task.lastAttempt = now;

      const job = this.limit(() => this.runTask(task));
      this.inFlight.add(job);
      void job.finally(() => this.inFlight.delete(job));
      jobs.push(job);
    }

    return jobs;
  }

  private async runTask(task: ScheduledTask): Promise<void> {
    console.log(`[scheduler] Running task ${task.id}`);
    try {
      await task.fn(task.args);
      task.lastRun = this.clock();
      task.runCount += 1;
    } catch (error) {
      task.errorCount += 1;
      console.error(`[scheduler] Error running task ${task.id}: ${errorMessage(error)}`, {
        error_count: task.errorCount,
      });
    } finally {
      task.running = false;
    }
  }

  private toStatus(task: ScheduledTask): TaskStatus {
    const nextRun = (task.lastAttempt || task.addedAt) + task.interval * 1000;
    return {
      task_id: task.id,
      interval: task.interval,
      args: { ...task.args },
      last_run: task.lastRun,
      last_run_formatted: task.lastRun > 0 ? new Date(task.lastRun).toISOString() : "Never",
      next_run: new Date(nextRun).toISOString(),
      running: task.running,
      error_count: task.errorCount,
      run_count: task.runCount,
    };
  }
}
