/**
 * Invocation-scoped chart files.
 *
 * Every file handed out by a scope is removed when the scope's callback
 * settles, whichever way it settles. Names carry a uuid so a manual command
 * and a scheduled job running at the same time never share a path.
 */

import { rm } from 'node:fs/promises';
import path from 'node:path';
import { v4 as uuid } from 'uuid';
import type { Logger } from '../../common/logger.js';

export interface ArtifactScope {
  readonly id: string;
  /** Reserve a path for `name`; it will be deleted on scope exit */
  reserve(name: string): string;
  readonly files: readonly string[];
}

export interface ArtifactScopeOptions {
  dir: string;
  prefix: string;
  logger: Logger;
}

function safeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_');
}

export async function withArtifactScope<T>(
  options: ArtifactScopeOptions,
  fn: (scope: ArtifactScope) => Promise<T>
): Promise<T> {
  const id = uuid();
  const files: string[] = [];
  const scope: ArtifactScope = {
    id,
    files,
    reserve(name: string): string {
      const file = path.resolve(options.dir, `${safeName(options.prefix)}_${id}_${safeName(name)}.png`);
      files.push(file);
      return file;
    },
  };

  try {
    return await fn(scope);
  } finally {
    for (const file of files) {
      try {
        await rm(file, { force: true });
        options.logger.debug({ file, scope: id }, '[Charts] Removed chart file');
      } catch (err) {
        options.logger.error({ file, scope: id, err: err instanceof Error ? err.message : String(err) }, '[Charts] Failed to remove chart file');
      }
    }
  }
}
