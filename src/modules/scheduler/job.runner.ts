/**
 * Job Runner: per-job lock, timeout and execution history
 *
 * Protects against:
 * - a job overlapping itself (cron tick while a manual run is in flight)
 * - hanging runs (timeout)
 * - silent failures (every run is recorded)
 */

import { v4 as uuid } from 'uuid';
import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';

// ═══════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════

export type ExecutionStatus = 'RUNNING' | 'COMPLETED' | 'FAILED' | 'TIMEOUT';
export type ExecutionTrigger = 'cron' | 'manual';

export interface JobExecution {
  jobName: string;
  executionId: string;
  trigger: ExecutionTrigger;
  status: ExecutionStatus;
  startedAt: string;
  completedAt?: string;
  durationMs?: number;
  result?: unknown;
  error?: string;
}

export interface JobRunResult {
  ok: boolean;
  executionId: string;
  skipped?: boolean;
  skipReason?: 'LOCK_HELD';
  execution?: JobExecution;
}

export interface JobRunnerConfig {
  executionTimeoutMs?: number;
  historyLimit?: number;
  logger: Logger;
}

export const EXECUTION_TIMEOUT = 'EXECUTION_TIMEOUT';

// ═══════════════════════════════════════════════════════════════
// RUNNER
// ═══════════════════════════════════════════════════════════════

export class JobRunner {
  private readonly executionTimeoutMs: number;
  private readonly historyLimit: number;
  private readonly logger: Logger;
  private readonly locks = new Map<string, string>();
  private executions: JobExecution[] = [];

  constructor(config: JobRunnerConfig) {
    this.executionTimeoutMs = config.executionTimeoutMs ?? 600_000; // 10 minutes
    this.historyLimit = config.historyLimit ?? 200;
    this.logger = config.logger;
  }

  async run<T>(jobName: string, trigger: ExecutionTrigger, jobFn: () => Promise<T>): Promise<JobRunResult> {
    const executionId = uuid();

    if (this.locks.has(jobName)) {
      this.logger.warn({ jobName, executionId, heldBy: this.locks.get(jobName) }, '[Jobs] Lock held, skipping run');
      return { ok: false, executionId, skipped: true, skipReason: 'LOCK_HELD' };
    }
    this.locks.set(jobName, executionId);

    const started = Date.now();
    const execution: JobExecution = {
      jobName,
      executionId,
      trigger,
      status: 'RUNNING',
      startedAt: new Date(started).toISOString(),
    };
    this.record(execution);
    this.logger.info({ jobName, executionId, trigger }, '[Jobs] Job starting');

    try {
      execution.result = await this.withTimeout(jobFn);
      execution.status = 'COMPLETED';
      this.logger.info({ jobName, executionId, durationMs: Date.now() - started }, '[Jobs] Job completed');
    } catch (err) {
      const message = errorMessage(err);
      execution.status = message === EXECUTION_TIMEOUT ? 'TIMEOUT' : 'FAILED';
      execution.error = message;
      this.logger.error({ jobName, executionId, err: message }, '[Jobs] Job failed');
    } finally {
      execution.completedAt = new Date().toISOString();
      execution.durationMs = Date.now() - started;
      this.locks.delete(jobName);
    }

    return { ok: execution.status === 'COMPLETED', executionId, execution };
  }

  isLocked(jobName: string): boolean {
    return this.locks.has(jobName);
  }

  getHistory(jobName?: string, limit = 50): JobExecution[] {
    const filtered = jobName ? this.executions.filter((e) => e.jobName === jobName) : this.executions;
    return filtered.slice(-limit);
  }

  private record(execution: JobExecution): void {
    this.executions.push(execution);
    if (this.executions.length > this.historyLimit) {
      this.executions = this.executions.slice(-this.historyLimit);
    }
  }

  private withTimeout<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => reject(new Error(EXECUTION_TIMEOUT)), this.executionTimeoutMs);
      fn()
        .then(resolve, reject)
        .finally(() => clearTimeout(timer));
    });
  }
}
