export type Vec3 = { x: number; y: number; z: number };
export type LonLat = { lon: number; lat: number };
export type MercatorXY = { x: number; y: number };

export type GeoCoordinatorOptions = {
  metersPerUnit?: number;
};

const WEB_MERCATOR_R = 6378137.0;
const WEB_MERCATOR_MAX_LAT = 85.05112878;

export const WEB_MERCATOR_HALF_WORLD = Math.PI * WEB_MERCATOR_R;
export const WEB_MERCATOR_WORLD_SIZE = WEB_MERCATOR_HALF_WORLD * 2;

function degToRad(deg: number): number {
  return (deg * Math.PI) / 180;
}

function radToDeg(rad: number): number {
  return (rad * 180) / Math.PI;
}

function normalizeMetersPerUnit(value: number | undefined): number {
  const metersPerUnit = value ?? 1;
  if (!Number.isFinite(metersPerUnit) || metersPerUnit <= 0) {
    throw new Error(`Invalid metersPerUnit: ${metersPerUnit}`);
  }
  return metersPerUnit;
}

function clampWebMercatorLat(lat: number): number {
  return Math.max(-WEB_MERCATOR_MAX_LAT, Math.min(WEB_MERCATOR_MAX_LAT, lat));
}

function assertLonLat(value: LonLat, context: string): void {
  if (!Number.isFinite(value.lon) || value.lon < -180 || value.lon > 180) {
    throw new Error(`${context}: lon must be in [-180, 180], got ${value.lon}`);
  }
  if (!Number.isFinite(value.lat) || value.lat < -90 || value.lat > 90) {
    throw new Error(`${context}: lat must be in [-90, 90], got ${value.lat}`);
  }
}

/**
 * Web Mercator conversions between lon/lat, projected meters and slippy-map
 * tile indices. Render units relate to meters through `metersPerUnit`.
 */
export class GeoCoordinator {
  private readonly _metersPerUnit: number;

  constructor(options?: GeoCoordinatorOptions) {
    this._metersPerUnit = normalizeMetersPerUnit(options?.metersPerUnit);
  }

  get metersPerUnit(): number {
    return this._metersPerUnit;
  }

  lonLatToWebMercator(lon: number, lat: number): MercatorXY {
    assertLonLat({ lon, lat }, 'lonLatToWebMercator');
    const clampedLat = clampWebMercatorLat(lat);
    return {
      x: WEB_MERCATOR_R * degToRad(lon),
      y: WEB_MERCATOR_R * Math.log(Math.tan(Math.PI / 4 + degToRad(clampedLat) / 2))
    };
  }

  webMercatorToLonLat(x: number, y: number): LonLat {
    return {
      lon: radToDeg(x / WEB_MERCATOR_R),
      lat: radToDeg(2 * Math.atan(Math.exp(y / WEB_MERCATOR_R)) - Math.PI / 2)
    };
  }

  // Indices are not clamped here; callers decide how to treat the poles and the antimeridian.
  webMercatorToTile(x: number, y: number, zoom: number): { x: number; y: number } {
    const tileSize = WEB_MERCATOR_WORLD_SIZE / 2 ** zoom;
    return {
      x: Math.floor((x + WEB_MERCATOR_HALF_WORLD) / tileSize),
      y: Math.floor((WEB_MERCATOR_HALF_WORLD - y) / tileSize)
    };
  }

  tileToWebMercator(x: number, y: number, zoom: number): MercatorXY {
    const tileSize = WEB_MERCATOR_WORLD_SIZE / 2 ** zoom;
    return {
      x: -WEB_MERCATOR_HALF_WORLD + x * tileSize,
      y: WEB_MERCATOR_HALF_WORLD - y * tileSize
    };
  }

  tileSizeInMeters(zoom: number): number {
    return WEB_MERCATOR_WORLD_SIZE / 2 ** zoom;
  }
}
