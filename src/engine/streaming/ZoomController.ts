import type { PlanarTileProjection } from '../../geo/PlanarTileProjection';
import { clampTileIndex, reprojectOrigin, tileKeyId, type TileKey } from '../../geo/pyramid';
import type { DebugLogger } from './DebugLogger';
import { visibleRangeForZoom } from './DemandScheduler';
import type { FetchPipeline } from './FetchPipeline';
import type { OverlayIndex } from './OverlayIndex';
import type { TileCache } from './TileCache';
import type { CameraState, HeightZoomThreshold, TileRenderer } from './types';

const MATCH_MARGIN = 1.0;
const COARSER_COMMIT_MARGIN = 3.0;
const PRELOAD_COARSER_RATIO = 1.7;
const PRELOAD_FINER_RATIO = 1.3;
const PRELOAD_RADIUS = 2;
const RETIRE_ACTIVE_FACTOR = 4;
const PRUNE_REQUESTED_FACTOR = 5;
const ZOOM_WINDOW = 2;

export type ZoomControllerOptions = {
  minZoom: number;
  maxZoom: number;
  heightThresholds: readonly HeightZoomThreshold[];
};

export type ZoomUpdate = {
  previousZoom: number;
  zoom: number;
  changed: boolean;
  candidate: number;
  /** Zooms preloaded this update, in dispatch order. */
  preloadZooms: number[];
  preloaded: TileKey[];
  retired: TileKey[];
  pruned: TileKey[];
};

/** Picks the target zoom from camera height and clears out tiles that no longer fit it. */
export class ZoomController<THandle> {
  private readonly _projection: PlanarTileProjection;
  private readonly _overlays: OverlayIndex;
  private readonly _pipeline: FetchPipeline;
  private readonly _renderer: TileRenderer<THandle>;
  private readonly _options: ZoomControllerOptions;
  private readonly _log: DebugLogger;

  constructor(
    projection: PlanarTileProjection,
    overlays: OverlayIndex,
    pipeline: FetchPipeline,
    renderer: TileRenderer<THandle>,
    options: ZoomControllerOptions,
    log: DebugLogger
  ) {
    this._projection = projection;
    this._overlays = overlays;
    this._pipeline = pipeline;
    this._renderer = renderer;
    this._options = options;
    this._log = log;
  }

  /** First threshold (highest first) the height clears by the match margin. */
  matchThreshold(height: number): HeightZoomThreshold | undefined {
    return this._options.heightThresholds.find((entry) => height >= entry.minHeight + MATCH_MARGIN);
  }

  /** Zoom to commit for this height; coarser moves need extra clearance. */
  resolveZoom(height: number, currentZoom: number): { candidate: number; zoom: number; matched?: HeightZoomThreshold } {
    const matched = this.matchThreshold(height);
    if (!matched) return { candidate: currentZoom, zoom: currentZoom };

    const candidate = matched.zoom;
    if (candidate < currentZoom && height < matched.minHeight + COARSER_COMMIT_MARGIN) {
      return { candidate, zoom: currentZoom, matched };
    }
    return { candidate, zoom: candidate, matched };
  }

  update(cache: TileCache<THandle>, camera: CameraState): ZoomUpdate {
    const height = camera.position.y;
    const previousZoom = cache.currentZoom;
    const { candidate, zoom, matched } = this.resolveZoom(height, previousZoom);
    const changed = zoom !== previousZoom;

    const preloadZooms = this.preloadZoomsFor(height, previousZoom, zoom, matched);
    const preloaded = preloadZooms.flatMap((target) => this.preload(cache, camera, target));

    let retired: TileKey[] = [];
    let pruned: TileKey[] = [];
    if (changed) {
      cache.currentZoom = zoom;
      const center = this._projection.worldToTile(camera.position.x, camera.position.z, zoom);
      const visibleRange = visibleRangeForZoom(zoom);
      retired = this.retireActive(cache, center, zoom, visibleRange);
      pruned = this.pruneRequested(cache, center, zoom, visibleRange);
      this._log.debug(
        `zoom ${previousZoom} -> ${zoom} at height ${height.toFixed(1)}: retired ${retired.length}, pruned ${pruned.length}`
      );
    }

    return { previousZoom, zoom, changed, candidate, preloadZooms, preloaded, retired, pruned };
  }

  // A switch preloads the outgoing and incoming zooms. Otherwise one neighbour,
  // measured from height 0 when no threshold matched.
  private preloadZoomsFor(
    height: number,
    previousZoom: number,
    zoom: number,
    matched: HeightZoomThreshold | undefined
  ): number[] {
    if (zoom !== previousZoom) return [previousZoom, zoom];

    const minHeight = matched?.minHeight ?? 0;
    let target: number | null = null;
    if (height > minHeight * PRELOAD_COARSER_RATIO) target = zoom - 1;
    else if (height < minHeight * PRELOAD_FINER_RATIO) target = zoom + 1;
    if (target === null) return [];

    const clamped = Math.max(this._options.minZoom, Math.min(this._options.maxZoom, target));
    return clamped === zoom ? [] : [clamped];
  }

  private preload(cache: TileCache<THandle>, camera: CameraState, zoom: number): TileKey[] {
    const center = this._projection.worldToTile(camera.position.x, camera.position.z, zoom);
    const out: TileKey[] = [];
    for (let dx = -PRELOAD_RADIUS; dx <= PRELOAD_RADIUS; dx += 1) {
      for (let dy = -PRELOAD_RADIUS; dy <= PRELOAD_RADIUS; dy += 1) {
        const key: TileKey = {
          x: clampTileIndex(center.x + dx, zoom),
          y: clampTileIndex(center.y + dy, zoom),
          zoom
        };
        if (cache.isClaimed(key)) continue;
        this._pipeline.dispatch(cache, key);
        out.push(key);
      }
    }
    if (out.length > 0) this._log.debug(`preloading ${out.length} tiles at zoom ${zoom}`);
    return out;
  }

  private outsideWindow(key: TileKey, center: { x: number; y: number }, zoom: number, margin: number): boolean {
    if (Math.abs(key.zoom - zoom) > ZOOM_WINDOW) return true;
    const origin = reprojectOrigin(key, zoom);
    return Math.abs(origin.x - center.x) > margin || Math.abs(origin.y - center.y) > margin;
  }

  private retireActive(
    cache: TileCache<THandle>,
    center: { x: number; y: number },
    zoom: number,
    visibleRange: number
  ): TileKey[] {
    const margin = visibleRange * RETIRE_ACTIVE_FACTOR;
    const retired: TileKey[] = [];
    for (const tile of cache.activeTiles()) {
      if (this._overlays.isExact(tile.key)) continue;
      if (!this.outsideWindow(tile.key, center, zoom, margin)) continue;
      this._renderer.destroyEntity(tile.handle);
      cache.release(tile.key);
      retired.push(tile.key);
      this._log.debug(`retired ${tileKeyId(tile.key)}`);
    }
    return retired;
  }

  private pruneRequested(
    cache: TileCache<THandle>,
    center: { x: number; y: number },
    zoom: number,
    visibleRange: number
  ): TileKey[] {
    const margin = visibleRange * PRUNE_REQUESTED_FACTOR;
    return cache.pruneRequested(
      (key) => this._overlays.isExact(key) || !this.outsideWindow(key, center, zoom, margin)
    );
  }
}
