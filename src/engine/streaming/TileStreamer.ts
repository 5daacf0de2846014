import type { Vec3 } from '../../geo/coords';
import { PlanarTileProjection } from '../../geo/PlanarTileProjection';
import { ApplicationStage, type ApplyReport } from './ApplicationStage';
import { createDebugLogger, type DebugLogger } from './DebugLogger';
import { DemandScheduler, visibleRangeForZoom, type ScheduleResult } from './DemandScheduler';
import { FetchPipeline } from './FetchPipeline';
import { normalizeTileStreamerOptions, type ResolvedTileStreamerOptions, type TileStreamerOptions } from './options';
import { OverlayIndex } from './OverlayIndex';
import { TileCache } from './TileCache';
import { TileEviction, type SweepReport } from './TileEviction';
import type { CameraState, TileImageSource, TileRenderer, TileStreamFrame } from './types';
import { ZoomController, type ZoomUpdate } from './ZoomController';

export type TickReport = {
  now: number;
  cameraValid: boolean;
  zoom: ZoomUpdate | null;
  schedule: ScheduleResult | null;
  applied: ApplyReport;
  touched: number;
  sweep: SweepReport;
};

export type TileStreamerDebugInfo = {
  zoom: number;
  centerTile: { x: number; y: number } | null;
  visibleRange: number;
  requested: number;
  pending: number;
  active: number;
  inflight: number;
  activeByZoom: Record<number, number>;
  overlayEntries: number;
  lastDispatched: number;
  lastEvicted: number;
};

/**
 * Per-frame driver for planar map tiles around a moving camera. Fetches run
 * on the event loop and land in the cache's result queue; everything else
 * happens inside `tick`.
 */
export class TileStreamer<THandle> {
  private readonly _options: ResolvedTileStreamerOptions;
  private readonly _renderer: TileRenderer<THandle>;
  private readonly _log: DebugLogger;
  private readonly _projection: PlanarTileProjection;
  private readonly _overlays: OverlayIndex;
  private readonly _cache: TileCache<THandle>;
  private readonly _pipeline: FetchPipeline;
  private readonly _zoom: ZoomController<THandle>;
  private readonly _scheduler: DemandScheduler;
  private readonly _application: ApplicationStage<THandle>;
  private readonly _eviction: TileEviction<THandle>;

  private _centerTile: { x: number; y: number } | null = null;
  private _lastDispatched = 0;
  private _lastEvicted = 0;
  private _disposed = false;

  constructor(source: TileImageSource, renderer: TileRenderer<THandle>, options?: TileStreamerOptions) {
    this._options = normalizeTileStreamerOptions(options);
    this._renderer = renderer;

    const o = this._options;
    this._log = createDebugLogger('TileStreamer', o.debug, o.logSink);

    this._projection = PlanarTileProjection.fromOptions({
      metersPerUnit: o.metersPerUnit,
      originLon: o.originLon,
      originLat: o.originLat,
      groundY: o.groundY
    });
    this._overlays = new OverlayIndex(o.overlayZoom, o.overlayEntries);
    this._cache = new TileCache<THandle>(o.initialZoom);

    this._pipeline = new FetchPipeline(source, this._log.child('FetchPipeline'));
    this._zoom = new ZoomController(
      this._projection,
      this._overlays,
      this._pipeline,
      renderer,
      { minZoom: o.minZoom, maxZoom: o.maxZoom, heightThresholds: o.heightThresholds },
      this._log.child('ZoomController')
    );
    this._scheduler = new DemandScheduler(
      this._projection,
      this._overlays,
      this._pipeline,
      this._log.child('DemandScheduler')
    );
    this._application = new ApplicationStage(renderer, this._overlays, this._projection, this._log.child('ApplicationStage'));
    this._eviction = new TileEviction(
      renderer,
      this._overlays,
      this._projection,
      {
        visibleDistance: o.visibleDistance,
        overlayVisibleDistance: o.overlayVisibleDistance,
        tileTimeoutSeconds: o.tileTimeoutSeconds,
        overlayTimeoutSeconds: o.overlayTimeoutSeconds,
        sweepIntervalSeconds: o.sweepIntervalSeconds,
        sweepToleranceSeconds: o.sweepToleranceSeconds
      },
      this._log.child('TileEviction')
    );
  }

  get options(): ResolvedTileStreamerOptions {
    return this._options;
  }

  get projection(): PlanarTileProjection {
    return this._projection;
  }

  get overlays(): OverlayIndex {
    return this._overlays;
  }

  get cache(): TileCache<THandle> {
    return this._cache;
  }

  get currentZoom(): number {
    return this._cache.currentZoom;
  }

  get debugInfo(): TileStreamerDebugInfo {
    const counts = this._cache.counts();
    const activeByZoom: Record<number, number> = {};
    for (const tile of this._cache.activeTiles()) {
      activeByZoom[tile.key.zoom] = (activeByZoom[tile.key.zoom] ?? 0) + 1;
    }
    return {
      zoom: this._cache.currentZoom,
      centerTile: this._centerTile ? { ...this._centerTile } : null,
      visibleRange: visibleRangeForZoom(this._cache.currentZoom),
      requested: counts.requested,
      pending: counts.pending,
      active: counts.active,
      inflight: this._pipeline.inflightCount,
      activeByZoom,
      overlayEntries: this._overlays.size,
      lastDispatched: this._lastDispatched,
      lastEvicted: this._lastEvicted
    };
  }

  tick(frame: TileStreamFrame): TickReport {
    if (this._disposed) {
      throw new Error('TileStreamer has been disposed.');
    }

    const now = frame.elapsedSeconds;
    const camera = isUsableCamera(frame.camera) ? frame.camera : null;

    let zoom: ZoomUpdate | null = null;
    let schedule: ScheduleResult | null = null;
    if (camera) {
      zoom = this._zoom.update(this._cache, camera);
      schedule = this._scheduler.schedule(this._cache, camera);
      this._centerTile = { ...schedule.center };
    } else if (frame.camera) {
      this._log.warn('camera state is not finite, skipping camera stages this tick');
    }

    const applied = this._application.apply(this._cache, now);
    const touched = camera ? this._eviction.updateVisible(this._cache, camera, now) : 0;
    const sweep = this._eviction.sweep(this._cache, frame.deltaSeconds, now);

    this._lastDispatched =
      (zoom?.preloaded.length ?? 0) + (schedule ? schedule.overlayDispatched.length + schedule.dispatched.length : 0);
    this._lastEvicted = (zoom?.retired.length ?? 0) + sweep.removed.length;

    return { now, cameraValid: camera !== null, zoom, schedule, applied, touched, sweep };
  }

  /** Resolves once every fetch started so far has queued its result. */
  settled(): Promise<void> {
    return this._pipeline.settled();
  }

  dispose(): void {
    if (this._disposed) return;
    this._disposed = true;
    const tiles = this._cache.activeTiles();
    for (const tile of tiles) {
      this._renderer.destroyEntity(tile.handle);
    }
    this._cache.clear();
    this._centerTile = null;
    this._log.debug(`disposed, destroyed ${tiles.length} entities`);
  }
}

function isFiniteVec3(v: Vec3): boolean {
  return Number.isFinite(v.x) && Number.isFinite(v.y) && Number.isFinite(v.z);
}

function isUsableCamera(camera: CameraState | null): camera is CameraState {
  return camera !== null && isFiniteVec3(camera.position) && isFiniteVec3(camera.forward);
}
