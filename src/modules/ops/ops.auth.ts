/**
 * OPS: Bearer-secret guard for admin endpoints.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from '../../common/errors.js';

/**
 * @throws AppError 500 when no secret is configured, 401 on a wrong token
 */
export function requireOpsAuth(req: FastifyRequest, secret: string | undefined): void {
  if (!secret) {
    throw new AppError('OPS_NOT_CONFIGURED', 'OPS_CRON_SECRET is not configured', 500);
  }

  const auth = String(req.headers.authorization ?? '');
  if (auth !== `Bearer ${secret}`) {
    throw new AppError('UNAUTHORIZED', 'Invalid ops secret', 401);
  }
}

export function opsAuthHook(secret: string | undefined) {
  return async (req: FastifyRequest): Promise<void> => {
    requireOpsAuth(req, secret);
  };
}
