import { GeoCoordinator, type LonLat, type MercatorXY, type Vec3 } from './coords';
import { clampTileIndex, type TileKey } from './pyramid';

export type PlanarTileProjectionOptions = {
  originLon?: number;
  originLat?: number;
  groundY?: number;
};

export type PlanarFrameOptions = PlanarTileProjectionOptions & {
  metersPerUnit?: number;
};

/**
 * Lays the Web Mercator plane onto the render XZ plane (y up): +X east, +Z
 * south, so tile y grows with render z. The origin lon/lat sits at render (0, 0).
 */
export class PlanarTileProjection {
  private readonly _geo: GeoCoordinator;
  private readonly _originMercator: MercatorXY;
  private readonly _groundY: number;

  constructor(geo: GeoCoordinator, options?: PlanarTileProjectionOptions) {
    this._geo = geo;
    this._originMercator = geo.lonLatToWebMercator(options?.originLon ?? 0, options?.originLat ?? 0);
    this._groundY = options?.groundY ?? 0;
  }

  static fromOptions(options?: PlanarFrameOptions): PlanarTileProjection {
    return new PlanarTileProjection(new GeoCoordinator({ metersPerUnit: options?.metersPerUnit }), options);
  }

  get geo(): GeoCoordinator {
    return this._geo;
  }

  get groundY(): number {
    return this._groundY;
  }

  worldToMercator(x: number, z: number): MercatorXY {
    return {
      x: this._originMercator.x + x * this._geo.metersPerUnit,
      y: this._originMercator.y - z * this._geo.metersPerUnit
    };
  }

  worldToLonLat(x: number, z: number): LonLat {
    const mercator = this.worldToMercator(x, z);
    return this._geo.webMercatorToLonLat(mercator.x, mercator.y);
  }

  worldToTile(x: number, z: number, zoom: number): { x: number; y: number } {
    const mercator = this.worldToMercator(x, z);
    const raw = this._geo.webMercatorToTile(mercator.x, mercator.y, zoom);
    return {
      x: clampTileIndex(raw.x, zoom),
      y: clampTileIndex(raw.y, zoom)
    };
  }

  tileWorldSize(zoom: number): number {
    return this._geo.tileSizeInMeters(zoom) / this._geo.metersPerUnit;
  }

  tileCenter(key: TileKey): Vec3 {
    const center = this._geo.tileToWebMercator(key.x + 0.5, key.y + 0.5, key.zoom);
    return {
      x: (center.x - this._originMercator.x) / this._geo.metersPerUnit,
      y: this._groundY,
      z: (this._originMercator.y - center.y) / this._geo.metersPerUnit
    };
  }
}
