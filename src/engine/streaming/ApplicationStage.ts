import type { PlanarTileProjection } from '../../geo/PlanarTileProjection';
import { tileKeyId, type TileKey } from '../../geo/pyramid';
import type { DebugLogger } from './DebugLogger';
import type { OverlayIndex } from './OverlayIndex';
import { applyOverlayTreatment } from './overlayImage';
import type { TileCache } from './TileCache';
import type { FetchResult, OverlayTreatment, TileRenderer } from './types';

export const EXACT_FALLBACK_TINT = 0.7;
export const CORRESPONDING_FALLBACK_TINT = 0.5;

export type ApplyReport = {
  applied: TileKey[];
  ignored: TileKey[];
  fallbacks: number;
};

/** Turns drained fetch results into render entities and active cache entries. */
export class ApplicationStage<THandle> {
  private readonly _renderer: TileRenderer<THandle>;
  private readonly _overlays: OverlayIndex;
  private readonly _projection: PlanarTileProjection;
  private readonly _log: DebugLogger;

  constructor(
    renderer: TileRenderer<THandle>,
    overlays: OverlayIndex,
    projection: PlanarTileProjection,
    log: DebugLogger
  ) {
    this._renderer = renderer;
    this._overlays = overlays;
    this._projection = projection;
    this._log = log;
  }

  apply(cache: TileCache<THandle>, now: number): ApplyReport {
    const report: ApplyReport = { applied: [], ignored: [], fallbacks: 0 };
    for (const result of cache.results.drain()) {
      if (cache.stateOf(result.key) !== 'requested') {
        report.ignored.push(result.key);
        continue;
      }
      if (!result.image) report.fallbacks += 1;
      this.applyOne(cache, result, now);
      report.applied.push(result.key);
    }
    return report;
  }

  private applyOne(cache: TileCache<THandle>, result: FetchResult, now: number): void {
    const { key, image } = result;
    const treatment: OverlayTreatment = this._overlays.classify(key);
    const overlayVisual = treatment !== 'plain';

    let handle: THandle;
    if (image) {
      handle = this._renderer.createTileEntity(key, overlayVisual ? applyOverlayTreatment(image) : image);
    } else if (overlayVisual) {
      const tint = treatment === 'exact' ? EXACT_FALLBACK_TINT : CORRESPONDING_FALLBACK_TINT;
      handle = this._renderer.createOverlayFallbackEntity(key, tint);
    } else {
      handle = this._renderer.createFallbackEntity(key);
    }

    this._renderer.attachTileMetadata(handle, { key, lastUsed: now, treatment });
    if (treatment === 'exact') {
      const entry = this._overlays.entryFor(key);
      if (entry) this._renderer.attachOverlayMetadata(handle, entry);
    }

    cache.activate(key, handle, now, this._projection.tileCenter(key));
    this._log.debug(`applied ${treatment} tile ${tileKeyId(key)}${image ? '' : ' (fallback)'}`);
  }
}
