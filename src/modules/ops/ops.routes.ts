/**
 * OPS: Admin Operations Routes
 *
 * Endpoints:
 * - GET  /api/health               - liveness + schedule
 * - GET  /api/ops/jobs             - execution history (secured)
 * - POST /api/ops/jobs/:job/run    - run a daily job now (secured)
 */

import type { FastifyInstance } from 'fastify';
import { AppError } from '../../common/errors.js';
import { isJobName } from '../scheduler/daily.jobs.js';
import type { JobRunner } from '../scheduler/job.runner.js';
import type { SchedulerService } from '../scheduler/scheduler.service.js';
import { opsAuthHook } from './ops.auth.js';

export interface OpsRoutesDeps {
  scheduler: Pick<SchedulerService, 'describe' | 'trigger'>;
  runner: Pick<JobRunner, 'getHistory'>;
  secret: string | undefined;
  startedAt?: number;
}

export async function registerOpsRoutes(fastify: FastifyInstance, deps: OpsRoutesDeps): Promise<void> {
  const startedAt = deps.startedAt ?? Date.now();

  fastify.get('/api/health', async () => ({
    ok: true,
    uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
    jobs: deps.scheduler.describe(),
    timestamp: new Date().toISOString(),
  }));

  await fastify.register(async (secured) => {
    secured.addHook('preHandler', opsAuthHook(deps.secret));

    /**
     * GET /api/ops/jobs?job=daily-feargreed&limit=20
     */
    secured.get<{ Querystring: { job?: string; limit?: string } }>('/api/ops/jobs', async (req) => {
      const { job, limit } = req.query;
      const parsedLimit = Number(limit ?? 50);
      return {
        ok: true,
        data: deps.runner.getHistory(job, Number.isInteger(parsedLimit) && parsedLimit > 0 ? parsedLimit : 50),
      };
    });

    /**
     * POST /api/ops/jobs/:job/run
     * Runs the job right away; answers 409 when the same job is already running.
     */
    secured.post<{ Params: { job: string } }>('/api/ops/jobs/:job/run', async (req, reply) => {
      const { job } = req.params;
      if (!isJobName(job)) {
        throw new AppError('JOB_NOT_FOUND', `Unknown job '${job}'`, 404);
      }

      const result = await deps.scheduler.trigger(job, 'manual');
      if (result.skipped) {
        return reply.status(409).send({ ok: false, error: 'JOB_RUNNING', message: `Job '${job}' is already running` });
      }
      return reply.status(result.ok ? 200 : 500).send({ ok: result.ok, data: result.execution });
    });
  });
}
