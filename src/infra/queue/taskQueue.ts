import { randomUUID } from "node:crypto";
import { isDeepStrictEqual } from "node:util";
import pLimit from "p-limit";
import {
  isRetryable,
  OperationError,
  OperationResult,
  toOperationError,
} from "../../domain/errors.js";
import { AppLogger, createLogger } from "../../utils/logger.js";
import { sleep as defaultSleep, Sleep } from "../../utils/time.js";

export interface RetryPolicy {
  /** Total tries including the first one. */
  maxAttempts: number;
  backoffMs: number;
}

export interface TaskSpec<TName extends string, TArgs> {
  name: TName;
  args: TArgs;
  /**
   * Submissions under one key run one after another. A submission whose args
   * equal the latest in-flight one for its key shares that outcome instead.
   */
  idempotencyKey?: string;
}

export interface TaskContext {
  taskId: string;
  attempt: number;
}

export type TaskHandler<TArgs> = (
  args: TArgs,
  context: TaskContext,
) => Promise<OperationResult<unknown>>;

export type TaskOutcome =
  | { status: "succeeded"; taskId: string; name: string; attempts: number }
  | {
      status: "failed";
      taskId: string;
      name: string;
      attempts: number;
      error: OperationError;
    };

export interface TaskQueueOptions {
  concurrency: number;
  retry: RetryPolicy;
  sleep?: Sleep;
  logger?: AppLogger;
  /** Most recent failed outcomes kept for `getFailures()`; defaults to 100. */
  maxRetainedFailures?: number;
}

export interface TaskQueueStats {
  pending: number;
  succeeded: number;
  failed: number;
}

/**
 * In-process work queue. Each attempt occupies one worker slot; a task
 * waiting out its backoff does not. The retry policy is applied here, so
 * handlers only report what happened.
 */
export class TaskQueue<TTasks extends Record<string, unknown>> {
  private readonly handlers: { [K in keyof TTasks]?: TaskHandler<TTasks[K]> } = {};

  private readonly pending = new Map<string, Promise<TaskOutcome>>();

  private readonly inFlightByKey = new Map<string, KeyedTask>();

  private readonly failures: TaskOutcome[] = [];

  private readonly maxRetainedFailures: number;

  private succeeded = 0;

  private failed = 0;

  private readonly limit: ReturnType<typeof pLimit>;

  private readonly sleep: Sleep;

  private readonly logger: AppLogger;

  constructor(private readonly options: TaskQueueOptions) {
    if (!Number.isInteger(options.retry.maxAttempts) || options.retry.maxAttempts < 1) {
      throw new Error("retry.maxAttempts must be a positive integer.");
    }
    this.limit = pLimit(options.concurrency);
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger ?? createLogger("task-queue");
    this.maxRetainedFailures = options.maxRetainedFailures ?? 100;
  }

  register<K extends keyof TTasks & string>(name: K, handler: TaskHandler<TTasks[K]>): void {
    this.handlers[name] = handler;
  }

  /** Schedules a task and returns its outcome; the promise never rejects. */
  submit<K extends keyof TTasks & string>(spec: TaskSpec<K, TTasks[K]>): Promise<TaskOutcome> {
    const key = spec.idempotencyKey;
    const previous = key ? this.inFlightByKey.get(key) : undefined;
    if (previous && previous.name === spec.name && isDeepStrictEqual(previous.args, spec.args)) {
      this.logger.debug(`Coalescing ${spec.name} with in-flight task for ${key}`);
      return previous.outcome;
    }

    const taskId = randomUUID();
    const outcome = previous
      ? previous.outcome.then(() => this.track(taskId, spec))
      : this.track(taskId, spec);
    this.pending.set(taskId, outcome);
    if (key) {
      this.inFlightByKey.set(key, { taskId, name: spec.name, args: spec.args, outcome });
    }
    return outcome;
  }

  /** Resolves once every submitted task, including retries, has settled. */
  async onIdle(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all([...this.pending.values()]);
    }
  }

  getFailures(): TaskOutcome[] {
    return [...this.failures];
  }

  getStats(): TaskQueueStats {
    return {
      pending: this.pending.size,
      succeeded: this.succeeded,
      failed: this.failed,
    };
  }

  private async track<K extends keyof TTasks & string>(
    taskId: string,
    spec: TaskSpec<K, TTasks[K]>,
  ): Promise<TaskOutcome> {
    try {
      const outcome = await this.execute(taskId, spec);
      if (outcome.status === "succeeded") {
        this.succeeded += 1;
      } else {
        this.failed += 1;
        this.failures.push(outcome);
        if (this.failures.length > this.maxRetainedFailures) {
          this.failures.splice(0, this.failures.length - this.maxRetainedFailures);
        }
        this.logger.error(
          `Task ${spec.name} (${taskId}) failed after ${outcome.attempts} attempt(s): ${outcome.error.message}`,
        );
      }
      return outcome;
    } finally {
      this.pending.delete(taskId);
      const key = spec.idempotencyKey;
      if (key && this.inFlightByKey.get(key)?.taskId === taskId) {
        this.inFlightByKey.delete(key);
      }
    }
  }

  private async execute<K extends keyof TTasks & string>(
    taskId: string,
    spec: TaskSpec<K, TTasks[K]>,
  ): Promise<TaskOutcome> {
    const handler = this.handlers[spec.name];
    if (!handler) {
      return {
        status: "failed",
        taskId,
        name: spec.name,
        attempts: 0,
        error: { kind: "validation", message: `No handler registered for task ${spec.name}.` },
      };
    }

    const { maxAttempts, backoffMs } = this.options.retry;
    for (let attempt = 1; ; attempt += 1) {
      const result = await this.limit(() => runAttempt(handler, spec.args, { taskId, attempt }));
      if (result.ok) {
        return { status: "succeeded", taskId, name: spec.name, attempts: attempt };
      }

      if (!isRetryable(result.error) || attempt >= maxAttempts) {
        return { status: "failed", taskId, name: spec.name, attempts: attempt, error: result.error };
      }

      this.logger.warn(
        `Task ${spec.name} (${taskId}) attempt ${attempt}/${maxAttempts} failed: ${result.error.message}. Retrying in ${backoffMs} ms.`,
      );
      await this.sleep(backoffMs);
    }
  }
}

interface KeyedTask {
  taskId: string;
  name: string;
  args: unknown;
  outcome: Promise<TaskOutcome>;
}

async function runAttempt<TArgs>(
  handler: TaskHandler<TArgs>,
  args: TArgs,
  context: TaskContext,
): Promise<OperationResult<unknown>> {
  try {
    return await handler(args, context);
  } catch (error) {
    return { ok: false, error: toOperationError(error) };
  }
}
