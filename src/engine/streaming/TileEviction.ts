import type { PlanarTileProjection } from '../../geo/PlanarTileProjection';
import { tileKeyId, type TileKey } from '../../geo/pyramid';
import type { DebugLogger } from './DebugLogger';
import type { OverlayIndex } from './OverlayIndex';
import type { ActiveTile, TileCache } from './TileCache';
import type { CameraState, OverlayTreatment, TileRenderer } from './types';

export type TileEvictionOptions = {
  /** Recency radius in tile widths at the tile's own zoom. */
  visibleDistance: number;
  overlayVisibleDistance: number;
  tileTimeoutSeconds: number;
  overlayTimeoutSeconds: number;
  sweepIntervalSeconds: number;
  sweepToleranceSeconds: number;
};

export type SweepReport = {
  ran: boolean;
  removed: TileKey[];
  pruned: TileKey[];
};

/**
 * Recency bookkeeping and the periodic timeout sweep. Corresponding tiles get
 * half the overlay timeout; exact overlay tiles are never swept.
 */
export class TileEviction<THandle> {
  private readonly _renderer: TileRenderer<THandle>;
  private readonly _overlays: OverlayIndex;
  private readonly _projection: PlanarTileProjection;
  private readonly _options: TileEvictionOptions;
  private readonly _log: DebugLogger;

  constructor(
    renderer: TileRenderer<THandle>,
    overlays: OverlayIndex,
    projection: PlanarTileProjection,
    options: TileEvictionOptions,
    log: DebugLogger
  ) {
    this._renderer = renderer;
    this._overlays = overlays;
    this._projection = projection;
    this._options = options;
    this._log = log;
  }

  updateVisible(cache: TileCache<THandle>, camera: CameraState, now: number): number {
    const { position } = camera;
    let touched = 0;
    for (const tile of cache.activeTiles()) {
      const threshold = this._overlays.isExact(tile.key)
        ? this._options.overlayVisibleDistance
        : this._options.visibleDistance;
      const distance = Math.hypot(
        tile.position.x - position.x,
        tile.position.y - position.y,
        tile.position.z - position.z
      );
      if (distance / this._projection.tileWorldSize(tile.key.zoom) < threshold) {
        tile.lastUsed = now;
        touched += 1;
      }
    }
    return touched;
  }

  sweep(cache: TileCache<THandle>, deltaSeconds: number, now: number): SweepReport {
    const counter = cache.advanceElapsed(deltaSeconds);
    if (counter % this._options.sweepIntervalSeconds > this._options.sweepToleranceSeconds) {
      return { ran: false, removed: [], pruned: [] };
    }

    const expired: ActiveTile<THandle>[] = [];
    for (const tile of cache.activeTiles()) {
      const treatment = this._overlays.classify(tile.key);
      if (treatment === 'exact') continue;
      if (now - tile.lastUsed > this.timeoutFor(treatment)) {
        expired.push(tile);
      }
    }

    const removed: TileKey[] = [];
    for (let i = expired.length - 1; i >= 0; i -= 1) {
      const tile = expired[i];
      if (!tile) continue;
      this._renderer.destroyEntity(tile.handle);
      cache.release(tile.key);
      removed.push(tile.key);
    }

    const pruned = cache.pruneRequested((key) => this._overlays.isExact(key));

    if (removed.length > 0 || pruned.length > 0) {
      this._log.debug(`sweep removed ${removed.length} tiles, pruned ${pruned.length} requests`);
      for (const key of removed) this._log.debug(`evicted ${tileKeyId(key)}`);
    }
    return { ran: true, removed, pruned };
  }

  timeoutFor(treatment: OverlayTreatment): number {
    switch (treatment) {
      case 'exact':
        return Number.POSITIVE_INFINITY;
      case 'corresponding':
        return this._options.overlayTimeoutSeconds / 2;
      case 'plain':
        return this._options.tileTimeoutSeconds;
    }
  }
}
