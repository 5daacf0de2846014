import type { LogSink } from './DebugLogger';
import type { HeightZoomThreshold, OverlayEntry } from './types';

export type TileStreamerOptions = {
  originLon?: number;
  originLat?: number;
  metersPerUnit?: number;
  groundY?: number;
  minZoom?: number;
  maxZoom?: number;
  initialZoom?: number;
  overlayZoom?: number;
  overlayEntries?: readonly OverlayEntry[];
  heightThresholds?: readonly HeightZoomThreshold[];
  /** Camera-to-tile distance, in tile widths, that keeps a tile fresh. */
  visibleDistance?: number;
  overlayVisibleDistance?: number;
  tileTimeoutSeconds?: number;
  overlayTimeoutSeconds?: number;
  sweepIntervalSeconds?: number;
  sweepToleranceSeconds?: number;
  debug?: boolean;
  logSink?: LogSink;
};

export type ResolvedTileStreamerOptions = {
  originLon: number;
  originLat: number;
  metersPerUnit: number;
  groundY: number;
  minZoom: number;
  maxZoom: number;
  initialZoom: number;
  overlayZoom: number;
  overlayEntries: readonly OverlayEntry[];
  heightThresholds: readonly HeightZoomThreshold[];
  visibleDistance: number;
  overlayVisibleDistance: number;
  tileTimeoutSeconds: number;
  overlayTimeoutSeconds: number;
  sweepIntervalSeconds: number;
  sweepToleranceSeconds: number;
  debug: boolean;
  logSink: LogSink | undefined;
};

const MAX_SUPPORTED_ZOOM = 24;

// Render-unit camera heights, derived from the distance bands of the planar tile layer.
export const DEFAULT_HEIGHT_THRESHOLDS: readonly HeightZoomThreshold[] = [
  { minHeight: 11_900_000, zoom: 2 },
  { minHeight: 6_100_000, zoom: 3 },
  { minHeight: 2_600_000, zoom: 4 },
  { minHeight: 1_280_000, zoom: 5 },
  { minHeight: 640_000, zoom: 6 },
  { minHeight: 380_000, zoom: 7 },
  { minHeight: 250_600, zoom: 8 },
  { minHeight: 139_780, zoom: 9 },
  { minHeight: 68_985, zoom: 10 },
  { minHeight: 26_000, zoom: 11 },
  { minHeight: 13_200, zoom: 12 },
  { minHeight: 6_400, zoom: 13 },
  { minHeight: 2_600, zoom: 14 },
  { minHeight: 1_300, zoom: 15 },
  { minHeight: 660, zoom: 16 },
  { minHeight: 300, zoom: 17 },
  { minHeight: 150, zoom: 18 },
  { minHeight: 0, zoom: 19 }
];

export function normalizeTileStreamerOptions(options?: TileStreamerOptions): ResolvedTileStreamerOptions {
  const minZoom = requireZoom('minZoom', options?.minZoom ?? 0);
  const maxZoom = requireZoom('maxZoom', options?.maxZoom ?? 19);
  if (maxZoom < minZoom) {
    throw new Error(`Invalid maxZoom: ${maxZoom} is below minZoom ${minZoom}`);
  }

  const metersPerUnit = options?.metersPerUnit ?? 1;
  if (!Number.isFinite(metersPerUnit) || metersPerUnit <= 0) {
    throw new Error(`Invalid metersPerUnit: ${metersPerUnit}`);
  }

  const sweepIntervalSeconds = options?.sweepIntervalSeconds ?? 5;
  if (!Number.isFinite(sweepIntervalSeconds) || sweepIntervalSeconds <= 0) {
    throw new Error(`Invalid sweepIntervalSeconds: ${sweepIntervalSeconds}`);
  }

  return {
    originLon: options?.originLon ?? 0,
    originLat: options?.originLat ?? 0,
    metersPerUnit,
    groundY: options?.groundY ?? 0,
    minZoom,
    maxZoom,
    initialZoom: clampInt(requireZoom('initialZoom', options?.initialZoom ?? 15), minZoom, maxZoom),
    overlayZoom: requireZoom('overlayZoom', options?.overlayZoom ?? 17),
    overlayEntries: options?.overlayEntries ?? [],
    heightThresholds: normalizeHeightThresholds(options?.heightThresholds, minZoom, maxZoom),
    visibleDistance: requirePositive('visibleDistance', options?.visibleDistance ?? 30),
    overlayVisibleDistance: requirePositive('overlayVisibleDistance', options?.overlayVisibleDistance ?? 50),
    tileTimeoutSeconds: requirePositive('tileTimeoutSeconds', options?.tileTimeoutSeconds ?? 45),
    overlayTimeoutSeconds: requirePositive('overlayTimeoutSeconds', options?.overlayTimeoutSeconds ?? 180),
    sweepIntervalSeconds,
    sweepToleranceSeconds: Math.max(0, options?.sweepToleranceSeconds ?? 0.05),
    debug: options?.debug ?? false,
    logSink: options?.logSink
  };
}

export function normalizeHeightThresholds(
  thresholds: readonly HeightZoomThreshold[] | undefined,
  minZoom: number,
  maxZoom: number
): readonly HeightZoomThreshold[] {
  const source = thresholds ?? DEFAULT_HEIGHT_THRESHOLDS;
  if (source.length === 0) {
    throw new Error('Height thresholds require at least one entry.');
  }

  const out = source.map((entry) => {
    if (!Number.isFinite(entry.minHeight) || entry.minHeight < 0) {
      throw new Error(`Invalid height threshold: ${entry.minHeight}`);
    }
    const zoom = requireZoom('threshold zoom', entry.zoom);
    return { minHeight: entry.minHeight, zoom: clampInt(zoom, minZoom, maxZoom) };
  });
  out.sort((a, b) => b.minHeight - a.minHeight);
  return out;
}

function requireZoom(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > MAX_SUPPORTED_ZOOM) {
    throw new Error(`Invalid ${field}: ${value}`);
  }
  return value;
}

function requirePositive(field: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`Invalid ${field}: ${value}`);
  }
  return value;
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, Math.round(value)));
}
