import { existsSync } from 'node:fs';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { withArtifactScope } from '../chart.artifacts.js';

describe('withArtifactScope', () => {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };

  let dir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(path.join(os.tmpdir(), 'fg-charts-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should hand out unique, prefixed png paths inside the directory', async () => {
    const [first, second] = await withArtifactScope({ dir, prefix: 'components', logger }, async (scope) => [
      scope.reserve('market_momentum_sp500'),
      scope.reserve('put/call'),
    ]);

    expect(path.dirname(first)).toBe(dir);
    expect(path.basename(first)).toMatch(/^components_[0-9a-f-]{36}_market_momentum_sp500\.png$/);
    expect(path.basename(second)).toMatch(/_put_call\.png$/);
  });

  it('should give concurrent scopes distinct paths for the same name', async () => {
    const reserveOnce = () =>
      withArtifactScope({ dir, prefix: 'feargreed', logger }, async (scope) => scope.reserve('index'));

    const [a, b] = await Promise.all([reserveOnce(), reserveOnce()]);

    expect(a).not.toBe(b);
  });

  it('should delete every written file after the callback resolves', async () => {
    let written: string[] = [];

    const result = await withArtifactScope({ dir, prefix: 'feargreed', logger }, async (scope) => {
      const file = scope.reserve('index');
      await writeFile(file, 'png');
      expect(existsSync(file)).toBe(true);
      written = [...scope.files];
      return 'sent';
    });

    expect(result).toBe('sent');
    expect(written).toHaveLength(1);
    expect(existsSync(written[0])).toBe(false);
  });

  it('should delete files even when the callback throws', async () => {
    let written = '';

    await expect(
      withArtifactScope({ dir, prefix: 'components', logger }, async (scope) => {
        written = scope.reserve('junk_bond_demand');
        await writeFile(written, 'png');
        throw new Error('upload failed');
      })
    ).rejects.toThrow('upload failed');

    expect(written).not.toBe('');
    expect(existsSync(written)).toBe(false);
  });

  it('should tolerate reserved paths that were never written', async () => {
    await withArtifactScope({ dir, prefix: 'components', logger }, async (scope) => {
      scope.reserve('never_rendered');
    });

    expect(logger.error).not.toHaveBeenCalled();
  });
});
