import type { Vec3 } from '../../geo/coords';
import type { PlanarTileProjection } from '../../geo/PlanarTileProjection';
import { clampTileIndex, tileKeyId, type TileKey } from '../../geo/pyramid';
import type { DebugLogger } from './DebugLogger';
import type { FetchPipeline } from './FetchPipeline';
import type { OverlayIndex } from './OverlayIndex';
import type { TileCache } from './TileCache';
import type { CameraState } from './types';

export type ScheduledCandidate = {
  key: TileKey;
  distance: number;
  adjustedDistance: number;
  overlay: boolean;
};

export type ScheduleResult = {
  zoom: number;
  center: { x: number; y: number };
  visibleRange: number;
  budget: number;
  candidates: ScheduledCandidate[];
  overlayDispatched: TileKey[];
  dispatched: TileKey[];
};

// Behind-camera cutoff, applied only past 1.5 visible ranges.
const FRUSTUM_MIN_DOT = -0.3;
const FRUSTUM_RANGE_FACTOR = 1.5;

export function visibleRangeForZoom(zoom: number): number {
  if (zoom >= 18) return 3;
  if (zoom >= 16) return 4;
  if (zoom >= 14) return 5;
  return 6;
}

export function concurrencyBudgetForZoom(zoom: number): number {
  if (zoom >= 17) return 8;
  if (zoom >= 15) return 10;
  return 12;
}

export class DemandScheduler {
  private readonly _projection: PlanarTileProjection;
  private readonly _overlays: OverlayIndex;
  private readonly _pipeline: FetchPipeline;
  private readonly _log: DebugLogger;

  constructor(projection: PlanarTileProjection, overlays: OverlayIndex, pipeline: FetchPipeline, log: DebugLogger) {
    this._projection = projection;
    this._overlays = overlays;
    this._pipeline = pipeline;
    this._log = log;
  }

  schedule<THandle>(cache: TileCache<THandle>, camera: CameraState): ScheduleResult {
    const zoom = cache.currentZoom;
    const visibleRange = visibleRangeForZoom(zoom);
    const budget = concurrencyBudgetForZoom(zoom);
    const center = this._projection.worldToTile(camera.position.x, camera.position.z, zoom);

    const overlayDispatched = this.dispatchNearbyOverlays(cache, center, zoom, visibleRange);
    const candidates = this.collectCandidates(camera, center, zoom, visibleRange);

    const dispatched: TileKey[] = [];
    for (const candidate of candidates) {
      if (dispatched.length >= budget) break;
      if (cache.isClaimed(candidate.key)) continue;
      this._pipeline.dispatch(cache, candidate.key);
      dispatched.push(candidate.key);
      this._log.debug(
        `loading ${candidate.overlay ? 'overlay-corresponding' : 'regular'} tile ${tileKeyId(candidate.key)}`
      );
    }

    return { zoom, center, visibleRange, budget, candidates, overlayDispatched, dispatched };
  }

  private dispatchNearbyOverlays<THandle>(
    cache: TileCache<THandle>,
    center: { x: number; y: number },
    zoom: number,
    visibleRange: number
  ): TileKey[] {
    const near = this._overlays.entriesNear(center, zoom, visibleRange);
    const dispatched: TileKey[] = [];
    for (const entry of near) {
      const key = this._overlays.entryKey(entry);
      if (cache.isClaimed(key)) continue;
      this._pipeline.dispatch(cache, key);
      dispatched.push(key);
      this._log.debug(`loading overlay tile "${entry.name}" ${tileKeyId(key)}`);
    }
    if (near.length > 0) {
      this._log.debug(`${near.length} overlay entries near camera, ${dispatched.length} dispatched`);
    }
    return dispatched;
  }

  private collectCandidates(
    camera: CameraState,
    center: { x: number; y: number },
    zoom: number,
    visibleRange: number
  ): ScheduledCandidate[] {
    const forward = normalize(camera.forward);
    const tileSize = this._projection.tileWorldSize(zoom);
    const list: ScheduledCandidate[] = [];

    for (let dx = -visibleRange; dx <= visibleRange; dx += 1) {
      for (let dy = -visibleRange; dy <= visibleRange; dy += 1) {
        const key: TileKey = {
          x: clampTileIndex(center.x + dx, zoom),
          y: clampTileIndex(center.y + dy, zoom),
          zoom
        };
        const distance = Math.abs(dx) + Math.abs(dy);
        const overlay = this._overlays.corresponds(key);
        const adjustedDistance = overlay ? Math.floor(distance / 2) : distance;

        const tileCenter = this._projection.tileCenter(key);
        const toTile = {
          x: tileCenter.x - camera.position.x,
          y: tileCenter.y - camera.position.y,
          z: tileCenter.z - camera.position.z
        };
        const length = Math.hypot(toTile.x, toTile.y, toTile.z);
        const dot = length > 0 ? (toTile.x * forward.x + toTile.y * forward.y + toTile.z * forward.z) / length : 1;
        const distanceInTiles = length / tileSize;
        if (dot < FRUSTUM_MIN_DOT && distanceInTiles > visibleRange * FRUSTUM_RANGE_FACTOR) {
          continue;
        }

        list.push({ key, distance, adjustedDistance, overlay });
      }
    }

    // Array.prototype.sort is stable, so ties keep enumeration order.
    list.sort((a, b) => a.adjustedDistance - b.adjustedDistance);
    return list;
  }
}

function normalize(v: Vec3): Vec3 {
  const len = Math.hypot(v.x, v.y, v.z);
  if (len <= 0 || !Number.isFinite(len)) return { x: 0, y: 0, z: 0 };
  return { x: v.x / len, y: v.y / len, z: v.z / len };
}
