import { describe, it, expect } from 'vitest';
import { GeoCoordinator, WEB_MERCATOR_HALF_WORLD, WEB_MERCATOR_WORLD_SIZE } from '../../geo/coords';
import { PlanarTileProjection } from '../../geo/PlanarTileProjection';

describe('GeoCoordinator', () => {
  it('should put lon/lat 0,0 at the mercator origin', () => {
    const geo = new GeoCoordinator();
    const mercator = geo.lonLatToWebMercator(0, 0);
    expect(mercator.x).toBeCloseTo(0, 6);
    expect(mercator.y).toBeCloseTo(0, 6);
  });

  it('should split the world into 2^zoom tiles per axis', () => {
    const geo = new GeoCoordinator();
    expect(geo.tileSizeInMeters(0)).toBe(WEB_MERCATOR_WORLD_SIZE);
    expect(geo.webMercatorToTile(0, 0, 1)).toEqual({ x: 1, y: 1 });
    expect(geo.webMercatorToTile(-1, 1, 1)).toEqual({ x: 0, y: 0 });
  });

  it('should place tile corners back on the mercator plane', () => {
    const geo = new GeoCoordinator();
    expect(geo.tileToWebMercator(0, 0, 3)).toEqual({ x: -WEB_MERCATOR_HALF_WORLD, y: WEB_MERCATOR_HALF_WORLD });
  });

  it('should reject a non-positive metersPerUnit', () => {
    expect(() => new GeoCoordinator({ metersPerUnit: 0 })).toThrow('Invalid metersPerUnit: 0');
  });

  it('should reject out of range longitudes', () => {
    const geo = new GeoCoordinator();
    expect(() => geo.lonLatToWebMercator(181, 0)).toThrow('lon must be in [-180, 180]');
  });
});

describe('PlanarTileProjection', () => {
  it('should grow tile y with render z', () => {
    const projection = PlanarTileProjection.fromOptions();
    expect(projection.worldToTile(1, 1, 1)).toEqual({ x: 1, y: 1 });
    expect(projection.worldToTile(-1, -1, 1)).toEqual({ x: 0, y: 0 });
  });

  it('should clamp tiles beyond the world edge', () => {
    const projection = PlanarTileProjection.fromOptions();
    expect(projection.worldToTile(1e9, -1e9, 2)).toEqual({ x: 3, y: 0 });
  });

  it('should scale tile size by metersPerUnit', () => {
    const projection = PlanarTileProjection.fromOptions({ metersPerUnit: 2 });
    expect(projection.tileWorldSize(1)).toBe(WEB_MERCATOR_HALF_WORLD / 2);
  });

  it('should place tile centers on the ground plane', () => {
    const projection = PlanarTileProjection.fromOptions({ groundY: -5 });
    const center = projection.tileCenter({ x: 0, y: 0, zoom: 1 });
    expect(center.x).toBeCloseTo(-WEB_MERCATOR_HALF_WORLD / 2, 3);
    expect(center.y).toBe(-5);
    expect(center.z).toBeCloseTo(-WEB_MERCATOR_HALF_WORLD / 2, 3);
  });

  it('should map a tile center back onto the same tile', () => {
    const projection = PlanarTileProjection.fromOptions({ originLon: 12.5, originLat: 41.9, metersPerUnit: 3 });
    const center = projection.tileCenter({ x: 17_500, y: 12_150, zoom: 15 });
    expect(projection.worldToTile(center.x, center.z, 15)).toEqual({ x: 17_500, y: 12_150 });
  });

  it('should read the origin back as lon/lat', () => {
    const projection = PlanarTileProjection.fromOptions({ originLon: 12.5, originLat: 41.9 });
    const lonLat = projection.worldToLonLat(0, 0);
    expect(lonLat.lon).toBeCloseTo(12.5, 9);
    expect(lonLat.lat).toBeCloseTo(41.9, 9);
  });
});
