/**
 * =============================================================================
 * QUEUE SERVICE - Async Processing of Route Calculations
 * =============================================================================
 *
 * In-memory task queue with polling workers:
 * - Priority ordering, delayed jobs, concurrency limit
 * - Live per-task state (PENDING → RUNNING → SUCCESS | FAILURE, or REVOKED)
 * - Thrown errors are retried with exponential backoff up to maxAttempts
 * - A processor returning `{ ok: false }` is a terminal FAILURE, never retried
 * - Revoke is best effort: it removes a task that has not started; a running
 *   task is left alone because processors have no cancellation point
 * - A revoke for an id not yet submitted is remembered until that id arrives,
 *   up to maxRetainedTasks ids (oldest forgotten first)
 *
 * Task state lives only in this process. After a restart every old task id
 * reads as PENDING.
 * =============================================================================
 */

import { v4 as uuidv4 } from 'uuid';
import { TaskState, TERMINAL_TASK_STATES } from '../../core/constants';
import { errorMessage } from '../../core/errors/AppError';
import { logger } from './logger.service';

// =============================================================================
// TYPES
// =============================================================================

export interface QueueJob<T = unknown> {
  id: string;
  type: string;
  data: T;
  priority: number;
  attempts: number;
  maxAttempts: number;
  createdAt: number;
  processAfter?: number;
  error?: string;
}

/**
 * Explicit outcome of a processor run
 */
export type ProcessorResult<R = unknown> =
  | { ok: true; value: R }
  | { ok: false; error: string };

export type JobProcessor<R = unknown> = (job: QueueJob) => Promise<ProcessorResult<R>>;

export interface AddJobOptions {
  /** Reserve the task id up front (e.g. to persist it before submitting) */
  id?: string;
  priority?: number;
  delay?: number;
  maxAttempts?: number;
}

export interface TaskRecord {
  id: string;
  queueName: string;
  state: TaskState;
  createdAt: number;
  startedAt?: number;
  finishedAt?: number;
  result?: unknown;
  error?: string;
}

export type RevokeOutcome = 'revoked' | 'running' | 'finished' | 'unknown';

export interface QueueStats {
  queues: { name: string; pending: number; processing: number }[];
  totalPending: number;
  totalProcessing: number;
  pendingRevokes: number;
  states: Record<TaskState, number>;
}

/**
 * Live status of a task, read at query time (never persisted)
 */
export interface StatusProvider {
  query(taskId: string): TaskState;
}

/**
 * Submission side of the queue
 */
export interface TaskDispatcher {
  add<T>(queueName: string, type: string, data: T, options?: AddJobOptions): Promise<string>;
  revoke(taskId: string): RevokeOutcome;
}

export interface QueueOptions {
  concurrency?: number;
  pollInterval?: number;   // ms
  autoStart?: boolean;
  maxRetainedTasks?: number;
}

// =============================================================================
// IN-MEMORY QUEUE
// =============================================================================

export class InMemoryQueue implements StatusProvider, TaskDispatcher {
  private queues: Map<string, QueueJob[]> = new Map();
  private processors: Map<string, JobProcessor> = new Map();
  private processing: Set<string> = new Set();
  private tasks: Map<string, TaskRecord> = new Map();
  // Revokes that arrived before their task, in arrival order
  private revokedIds: Set<string> = new Set();
  private isRunning: boolean = false;
  private processInterval: ReturnType<typeof setInterval> | null = null;

  // Configuration
  private readonly concurrency: number;
  private readonly pollInterval: number;
  private readonly maxRetainedTasks: number;

  constructor(options: QueueOptions = {}) {
    this.concurrency = options.concurrency ?? 2;
    this.pollInterval = options.pollInterval ?? 100;
    this.maxRetainedTasks = options.maxRetainedTasks ?? 10000;
    if (options.autoStart ?? true) {
      this.start();
    }
  }

  /**
   * Add a job to the queue
   */
  async add<T>(
    queueName: string,
    type: string,
    data: T,
    options?: AddJobOptions
  ): Promise<string> {
    const id = options?.id ?? uuidv4();
    if (this.tasks.has(id)) {
      throw new Error(`Task id already in use: ${id}`);
    }

    const now = Date.now();

    // Revoked before it was even submitted: never runs
    if (this.revokedIds.delete(id)) {
      this.recordTask({ id, queueName, state: TaskState.REVOKED, createdAt: now, finishedAt: now });
      logger.info(`Job ${id} was revoked before submission (${queueName})`);
      return id;
    }

    const job: QueueJob<T> = {
      id,
      type,
      data,
      priority: options?.priority ?? 0,
      attempts: 0,
      maxAttempts: options?.maxAttempts ?? 3,
      createdAt: now,
      processAfter: options?.delay ? now + options.delay : undefined
    };

    let queue = this.queues.get(queueName);
    if (!queue) {
      queue = [];
      this.queues.set(queueName, queue);
    }

    // Insert by priority (higher priority first)
    const insertIndex = queue.findIndex(j => j.priority < job.priority);
    if (insertIndex === -1) {
      queue.push(job);
    } else {
      queue.splice(insertIndex, 0, job);
    }

    this.recordTask({ id, queueName, state: TaskState.PENDING, createdAt: now });
    logger.debug(`Job ${job.id} added to queue ${queueName} (type: ${type})`);

    return job.id;
  }

  /**
   * Register a processor for a queue
   */
  process(queueName: string, processor: JobProcessor): void {
    this.processors.set(queueName, processor);
    logger.info(`Processor registered for queue: ${queueName}`);
  }

  /**
   * Current state of a task. Unknown ids read as PENDING.
   */
  query(taskId: string): TaskState {
    const task = this.tasks.get(taskId);
    if (task) return task.state;
    if (this.revokedIds.has(taskId)) return TaskState.REVOKED;
    return TaskState.PENDING;
  }

  /**
   * Full record of a task (result, error, timings)
   */
  getTask(taskId: string): TaskRecord | undefined {
    const task = this.tasks.get(taskId);
    return task && { ...task };
  }

  /**
   * Best-effort cancellation
   */
  revoke(taskId: string): RevokeOutcome {
    const task = this.tasks.get(taskId);

    if (!task) {
      // Remember it in case the submission arrives later
      this.rememberRevoke(taskId);
      logger.info(`Revoke requested for unknown task ${taskId}`);
      return 'unknown';
    }

    if (TERMINAL_TASK_STATES.has(task.state)) {
      return 'finished';
    }

    if (this.processing.has(taskId)) {
      logger.warn(`Task ${taskId} is already running and cannot be interrupted`);
      return 'running';
    }

    const queue = this.queues.get(task.queueName);
    if (queue) {
      const idx = queue.findIndex(j => j.id === taskId);
      if (idx !== -1) queue.splice(idx, 1);
    }

    this.finishTask(taskId, TaskState.REVOKED);
    logger.info(`Task ${taskId} revoked before start (${task.queueName})`);
    return 'revoked';
  }

  /**
   * Start processing jobs
   */
  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    this.processInterval = setInterval(() => this.tick(), this.pollInterval);
    logger.info('🚀 Queue processor started');
  }

  /**
   * Stop processing jobs (running jobs finish on their own)
   */
  stop(): void {
    this.isRunning = false;
    if (this.processInterval) {
      clearInterval(this.processInterval);
      this.processInterval = null;
    }
    logger.info('⏹️ Queue processor stopped');
  }

  /**
   * Process tick - check for jobs to process
   */
  private tick(): void {
    this.runDue().catch(error => {
      logger.error(`Queue tick failed: ${errorMessage(error)}`);
    });
  }

  /**
   * Start every due job the concurrency limit allows and wait for them
   */
  async runDue(): Promise<void> {
    const started: Promise<void>[] = [];

    for (const [queueName, queue] of this.queues) {
      const processor = this.processors.get(queueName);
      if (!processor) continue;

      for (const job of [...queue]) {
        // Respect concurrency limit
        if (this.processing.size >= this.concurrency) break;
        if (this.processing.has(job.id)) continue;
        if (job.processAfter && Date.now() < job.processAfter) continue;

        this.processing.add(job.id);
        started.push(this.processJob(queueName, job, processor));
      }
    }

    await Promise.all(started);
  }

  /**
   * Process a single job
   */
  private async processJob(
    queueName: string,
    job: QueueJob,
    processor: JobProcessor
  ): Promise<void> {
    job.attempts++;
    this.updateTask(job.id, { state: TaskState.RUNNING, startedAt: Date.now() });

    try {
      const outcome = await processor(job);
      this.removeFromQueue(queueName, job);

      if (outcome.ok) {
        this.finishTask(job.id, TaskState.SUCCESS, { result: outcome.value });
        logger.debug(`Job ${job.id} completed (${queueName})`);
      } else {
        // Reported failure: terminal, no retry
        job.error = outcome.error;
        this.finishTask(job.id, TaskState.FAILURE, { error: outcome.error });
        logger.error(`Job ${job.id} failed: ${outcome.error}`);
      }
    } catch (error) {
      const message = errorMessage(error);
      job.error = message;

      if (job.attempts >= job.maxAttempts) {
        this.removeFromQueue(queueName, job);
        this.finishTask(job.id, TaskState.FAILURE, { error: message });
        logger.error(`Job ${job.id} failed permanently: ${message}`);
      } else {
        // Schedule retry with exponential backoff
        job.processAfter = Date.now() + Math.pow(2, job.attempts) * 1000;
        this.updateTask(job.id, { state: TaskState.PENDING, error: message });
        logger.warn(`Job ${job.id} failed, retry ${job.attempts}/${job.maxAttempts}`);
      }
    } finally {
      this.processing.delete(job.id);
    }
  }

  private removeFromQueue(queueName: string, job: QueueJob): void {
    const queue = this.queues.get(queueName);
    if (!queue) return;
    const idx = queue.indexOf(job);
    if (idx !== -1) queue.splice(idx, 1);
  }

  private recordTask(task: TaskRecord): void {
    this.tasks.set(task.id, task);
    this.pruneTasks();
  }

  private updateTask(taskId: string, updates: Partial<Omit<TaskRecord, 'id' | 'queueName'>>): void {
    const task = this.tasks.get(taskId);
    if (task) {
      this.tasks.set(taskId, { ...task, ...updates });
    }
  }

  private finishTask(
    taskId: string,
    state: TaskState,
    extra: Pick<TaskRecord, 'result' | 'error'> = {}
  ): void {
    this.updateTask(taskId, { state, finishedAt: Date.now(), ...extra });
  }

  /**
   * Forget the oldest finished tasks once the retention cap is exceeded
   */
  private pruneTasks(): void {
    if (this.tasks.size <= this.maxRetainedTasks) return;

    for (const [id, task] of this.tasks) {
      if (this.tasks.size <= this.maxRetainedTasks) break;
      if (TERMINAL_TASK_STATES.has(task.state)) {
        this.tasks.delete(id);
      }
    }
  }

  private rememberRevoke(taskId: string): void {
    this.revokedIds.delete(taskId);
    this.revokedIds.add(taskId);

    for (const id of this.revokedIds) {
      if (this.revokedIds.size <= this.maxRetainedTasks) break;
      this.revokedIds.delete(id);
    }
  }

  /**
   * Get queue stats
   */
  getStats(): QueueStats {
    const queueStats = Array.from(this.queues.entries()).map(([name, jobs]) => ({
      name,
      pending: jobs.filter(j => !this.processing.has(j.id)).length,
      processing: jobs.filter(j => this.processing.has(j.id)).length
    }));

    const states: Record<TaskState, number> = {
      [TaskState.PENDING]: 0,
      [TaskState.RUNNING]: 0,
      [TaskState.SUCCESS]: 0,
      [TaskState.FAILURE]: 0,
      [TaskState.REVOKED]: 0
    };
    for (const task of this.tasks.values()) {
      states[task.state]++;
    }

    return {
      queues: queueStats,
      totalPending: queueStats.reduce((sum, q) => sum + q.pending, 0),
      totalProcessing: this.processing.size,
      pendingRevokes: this.revokedIds.size,
      states
    };
  }

  isProcessing(): boolean {
    return this.isRunning;
  }
}
