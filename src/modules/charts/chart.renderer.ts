/**
 * Chart Renderer
 *
 * SVG -> PNG via sharp, written into the caller's artifact scope.
 */

import sharp from 'sharp';
import { errorMessage, RenderError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { fail, ok, type Result } from '../../common/result.js';
import type { ArtifactScope } from './chart.artifacts.js';
import { buildLineChartSvg, type ChartSpec } from './chart.svg.js';

export interface ChartArtifact {
  name: string;
  path: string;
}

export interface ChartRenderer {
  render(spec: ChartSpec, scope: ArtifactScope, name: string): Promise<Result<ChartArtifact, RenderError>>;
}

export class SharpChartRenderer implements ChartRenderer {
  constructor(private readonly logger: Logger) {}

  async render(spec: ChartSpec, scope: ArtifactScope, name: string): Promise<Result<ChartArtifact, RenderError>> {
    let svg: string;
    try {
      svg = buildLineChartSvg(spec);
    } catch (err) {
      const error = err instanceof RenderError ? err : new RenderError(errorMessage(err));
      this.logger.error({ chart: name, err: error.message }, '[Charts] Could not build chart');
      return fail(error);
    }

    const file = scope.reserve(name);
    try {
      const info = await sharp(Buffer.from(svg)).png().toFile(file);
      this.logger.info({ chart: name, file, width: info.width, height: info.height }, '[Charts] Chart rendered');
      return ok({ name, path: file });
    } catch (err) {
      this.logger.error({ chart: name, file, err: errorMessage(err) }, '[Charts] Rasterisation failed');
      return fail(new RenderError(`Could not rasterise '${spec.title}': ${errorMessage(err)}`));
    }
  }
}
