import { Pool } from 'pg';
import { Logger } from 'pino';
import { getDatabase } from '../config/database';
import { createContextLogger } from '../utils/logger';
import { withAdvisoryLock } from '../utils/pg-lock';
import { retry, RetryOptions } from '../utils/retry';

export enum JobStatus {
  IDLE = 'IDLE',
  RUNNING = 'RUNNING',
  SUCCESS = 'SUCCESS',
  FAILED = 'FAILED',
  STOPPED = 'STOPPED',
}

export interface JobConfig {
  name: string;
  enabled?: boolean;
  intervalSeconds?: number;
  enableRetry?: boolean;
  retryOptions?: RetryOptions;
  /** One instance across the fleet runs the job at a time */
  enableAdvisoryLock?: boolean;
}

/**
 * Base class for background jobs: interval scheduling, overlap guard,
 * retry and a Postgres advisory lock.
 */
export abstract class JobExecutor {
  protected config: Required<JobConfig>;
  protected status: JobStatus = JobStatus.IDLE;
  protected intervalId: NodeJS.Timeout | null = null;
  protected jobLogger: Logger;
  private runningExecution: Promise<void> | null = null;

  constructor(config: JobConfig, private poolProvider: () => Pool = getDatabase) {
    this.config = {
      name: config.name,
      enabled: config.enabled ?? true,
      intervalSeconds: config.intervalSeconds ?? 300,
      enableRetry: config.enableRetry ?? true,
      retryOptions: config.retryOptions ?? {
        maxAttempts: 3,
        delayMs: 5000,
        backoffMultiplier: 2,
        maxDelayMs: 60000,
      },
      enableAdvisoryLock: config.enableAdvisoryLock ?? true,
    };

    this.jobLogger = createContextLogger({ context: this.config.name });
  }

  protected get pool(): Pool {
    return this.poolProvider();
  }

  start(): void {
    if (!this.config.enabled) {
      this.jobLogger.info('Job disabled via configuration');
      return;
    }

    if (this.intervalId) {
      this.jobLogger.warn('Job already running');
      return;
    }

    this.jobLogger.info(
      { intervalSeconds: this.config.intervalSeconds, retry: this.config.enableRetry },
      'Starting job'
    );

    this.intervalId = setInterval(() => {
      this.runOnce().catch((error: unknown) => {
        this.jobLogger.error({ err: error }, 'Error in scheduled job execution');
      });
    }, this.config.intervalSeconds * 1000);

    this.status = JobStatus.IDLE;
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.status = JobStatus.STOPPED;
      this.jobLogger.info('Job stopped');
    }
  }

  /**
   * One execution. Skipped while a previous one is still running; failures
   * are logged, not thrown.
   */
  async runOnce(): Promise<void> {
    if (this.status === JobStatus.RUNNING) {
      this.jobLogger.warn('Job already running, skipping execution');
      return;
    }

    const startTime = Date.now();
    this.status = JobStatus.RUNNING;

    try {
      this.runningExecution = this.executeJob();
      await this.runningExecution;
      this.status = JobStatus.SUCCESS;
      this.jobLogger.debug({ durationMs: Date.now() - startTime }, 'Job executed successfully');
    } catch (error) {
      this.status = JobStatus.FAILED;
      this.jobLogger.error({ err: error, durationMs: Date.now() - startTime }, 'Job execution failed');
    } finally {
      this.runningExecution = null;
    }
  }

  private async executeJob(): Promise<void> {
    const executeLocked = async () => {
      if (this.config.enableAdvisoryLock) {
        await withAdvisoryLock(this.pool, `job:${this.config.name}`, () => this.executeCore());
      } else {
        await this.executeCore();
      }
    };

    if (this.config.enableRetry) {
      await retry(executeLocked, this.config.retryOptions);
    } else {
      await executeLocked();
    }
  }

  protected abstract executeCore(): Promise<void>;

  getStatus(): { name: string; status: JobStatus; enabled: boolean } {
    return {
      name: this.config.name,
      status: this.status,
      enabled: this.config.enabled,
    };
  }

  /**
   * Wait for a running execution to finish (graceful shutdown)
   */
  async waitForCompletion(timeoutMs = 30000): Promise<void> {
    if (!this.runningExecution) {
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        this.runningExecution,
        new Promise<never>((_, reject) => {
          timer = setTimeout(() => reject(new Error('Job execution timeout during shutdown')), timeoutMs);
        }),
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
