import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export interface TaskOptions {
  /** Retries after the first attempt. */
  maxRetries: number;
  /** Skip the job while one with the same name is still running. */
  unique?: boolean;
}

export type TaskHandler = () => Promise<void>;

/**
 * In-process job runner. A job that throws is retried with exponential backoff
 * and jitter until `maxRetries` is exhausted, then logged and dropped.
 */
@Injectable()
export class TaskQueueService implements OnApplicationShutdown {
  private readonly logger = new Logger(TaskQueueService.name);
  private readonly inFlight = new Map<Promise<void>, string>();
  private readonly sleepers = new Set<() => void>();
  private shuttingDown = false;
  private readonly initialBackoffMs: number;
  private readonly maxBackoffMs: number;

  constructor(config: ConfigService) {
    this.initialBackoffMs = this.getIntConfig(config, 'TASK_INITIAL_BACKOFF_MS', 1000);
    this.maxBackoffMs = this.getIntConfig(config, 'TASK_MAX_BACKOFF_MS', 600000);
  }

  enqueue(name: string, handler: TaskHandler, options: TaskOptions): void {
    if (this.shuttingDown) {
      this.logger.warn(`task:skip name=${name} reason=shutting-down`);
      return;
    }
    if (options.unique && [...this.inFlight.values()].includes(name)) {
      this.logger.log(`task:skip name=${name} reason=already-running`);
      return;
    }
    const job: Promise<void> = this.runWithRetries(name, handler, options)
      .catch((error: unknown) => {
        this.logger.error(`task:give-up name=${name} err=${this.messageOf(error)}`);
      })
      .finally(() => {
        this.inFlight.delete(job);
      });
    this.inFlight.set(job, name);
  }

  async runWithRetries(name: string, handler: TaskHandler, options: TaskOptions): Promise<void> {
    for (let attempt = 0; ; attempt++) {
      try {
        await handler();
        return;
      } catch (error) {
        if (attempt >= options.maxRetries || this.shuttingDown) throw error;
        const retryIn = this.backoffWithJitter(attempt);
        this.logger.warn(
          `task:retry name=${name} attempt=${attempt + 1}/${options.maxRetries + 1} err=${this.messageOf(error)} retryInMs=${retryIn}`,
        );
        await this.sleep(retryIn);
        if (this.shuttingDown) throw error;
      }
    }
  }

  /** Resolves once no job is running, including jobs enqueued while waiting. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight.keys()]);
    }
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  /** Running handlers finish; jobs waiting to retry give up at once. */
  async onApplicationShutdown(): Promise<void> {
    this.shuttingDown = true;
    if (this.inFlight.size > 0) {
      this.logger.log(`waiting for ${this.inFlight.size} task(s) before shutdown`);
    }
    for (const wake of [...this.sleepers]) wake();
    await this.drain();
  }

  private backoffWithJitter(attempt: number): number {
    const exp = Math.min(this.maxBackoffMs, this.initialBackoffMs * Math.pow(2, attempt));
    const jitter = Math.floor(Math.random() * Math.floor(exp * 0.2));
    return Math.min(this.maxBackoffMs, exp + jitter);
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        this.sleepers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      this.sleepers.add(wake);
    });
  }

  private messageOf(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }

  private getIntConfig(config: ConfigService, key: string, def: number): number {
    const v = config.get<string | number>(key);
    if (v === undefined || v === '') return def;
    const n = Number(v);
    return Number.isFinite(n) ? n : def;
  }
}
