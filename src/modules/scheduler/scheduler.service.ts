/**
 * Scheduler Service
 *
 * node-cron tasks in a named timezone; each tick goes through the JobRunner.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Logger } from '../../common/logger.js';
import type { DailyJobDefinition, JobName } from './daily.jobs.js';
import type { ExecutionTrigger, JobRunner, JobRunResult } from './job.runner.js';

export interface SchedulerOptions {
  jobs: Readonly<Record<JobName, DailyJobDefinition>>;
  runner: JobRunner;
  timezone: string;
  logger: Logger;
}

export interface ScheduledJobInfo {
  name: JobName;
  cron: string;
  timezone: string;
}

export class SchedulerService {
  private tasks: ScheduledTask[] = [];

  constructor(private readonly options: SchedulerOptions) {}

  start(): void {
    if (this.tasks.length > 0) return;
    const { jobs, timezone, logger } = this.options;

    for (const job of Object.values(jobs)) {
      const task = cron.schedule(
        job.cron,
        async () => {
          const result = await this.trigger(job.name, 'cron');
          if (!result.ok && !result.skipped) {
            logger.warn({ jobName: job.name, executionId: result.executionId }, '[Scheduler] Scheduled run did not complete');
          }
        },
        { timezone }
      );
      this.tasks.push(task);
      logger.info({ jobName: job.name, cron: job.cron, timezone }, '[Scheduler] Job scheduled');
    }
  }

  stop(): void {
    for (const task of this.tasks) task.stop();
    this.tasks = [];
    this.options.logger.info({}, '[Scheduler] Stopped');
  }

  trigger(name: JobName, trigger: ExecutionTrigger): Promise<JobRunResult> {
    const job = this.options.jobs[name];
    return this.options.runner.run(name, trigger, job.run);
  }

  describe(): ScheduledJobInfo[] {
    return Object.values(this.options.jobs).map((job) => ({
      name: job.name,
      cron: job.cron,
      timezone: this.options.timezone,
    }));
  }

  get isStarted(): boolean {
    return this.tasks.length > 0;
  }
}
