import * as THREE from 'three';
import { describe, it, expect, vi } from 'vitest';
import { PlanarTileProjection } from '../../geo/PlanarTileProjection';
import { ThreeTileRenderer, toTextureRows } from '../../engine/render/ThreeTileRenderer';
import { solidImage } from '../fixtures/fakes';

const KEY = { x: 200, y: 200, zoom: 15 };

describe('ThreeTileRenderer', () => {
  it('should lay image tiles flat on the ground at the tile center', () => {
    const renderer = new ThreeTileRenderer({ groundY: 2 });
    const projection = PlanarTileProjection.fromOptions({ groundY: 2 });
    const mesh = renderer.createTileEntity(KEY, solidImage(2, 2, [1, 2, 3, 255]));

    const center = projection.tileCenter(KEY);
    expect(mesh.parent).toBe(renderer.root);
    expect(mesh.position.x).toBeCloseTo(center.x, 6);
    expect(mesh.position.y).toBeCloseTo(2 + 15 * 0.001, 9);
    expect(mesh.position.z).toBeCloseTo(center.z, 6);
    expect(mesh.renderOrder).toBe(17);

    const size = projection.tileWorldSize(15);
    expect(mesh.geometry.parameters.width).toBe(size);
    const positions = mesh.geometry.getAttribute('position');
    expect(positions.getY(0)).toBeCloseTo(0, 6);
    expect(positions.getZ(0)).toBeCloseTo(Math.fround(-size / 2), 6);
  });

  it('should upload image pixels as an sRGB data texture', () => {
    const renderer = new ThreeTileRenderer();
    const mesh = renderer.createTileEntity(KEY, solidImage(2, 2, [1, 2, 3, 255]));

    expect(mesh.material.map).toBeInstanceOf(THREE.DataTexture);
    expect(mesh.material.map?.colorSpace).toBe(THREE.SRGBColorSpace);
  });

  it('should color fallbacks flat and overlay fallbacks by tint', () => {
    const renderer = new ThreeTileRenderer({ fallbackColor: 0x336699 });
    const plain = renderer.createFallbackEntity(KEY);
    const overlay = renderer.createOverlayFallbackEntity(KEY, 0.7);

    expect(plain.material.map).toBeNull();
    expect(plain.material.color.getHexString()).toBe('336699');
    expect(overlay.material.transparent).toBe(true);
    expect(overlay.material.side).toBe(THREE.DoubleSide);
    expect(renderer.meshCount).toBe(2);
  });

  it('should name and tag tiles by treatment', () => {
    const renderer = new ThreeTileRenderer();
    const proxy = renderer.createFallbackEntity(KEY);
    renderer.attachTileMetadata(proxy, { key: KEY, lastUsed: 4, treatment: 'corresponding' });
    expect(proxy.name).toBe('Overlay Tile Proxy 15/200/200');
    expect(proxy.userData).toMatchObject({ tileKey: '15/200/200', zoom: 15, lastUsed: 4, treatment: 'corresponding' });

    const exactKey = { x: 1608, y: 1600, zoom: 18 };
    const exact = renderer.createFallbackEntity(exactKey);
    renderer.attachTileMetadata(exact, { key: exactKey, lastUsed: 4, treatment: 'exact' });
    renderer.attachOverlayMetadata(exact, { x: 1608, y: 1600, name: 'Keep', metadata: { owner: 'survey' } });
    expect(exact.name).toBe('Overlay Tile Keep');
    expect(exact.userData.overlay).toEqual({ name: 'Keep', x: 1608, y: 1600, owner: 'survey' });
  });

  it('should detach and dispose everything on destroy', () => {
    const renderer = new ThreeTileRenderer();
    const mesh = renderer.createTileEntity(KEY, solidImage(2, 2, [1, 2, 3, 255]));
    const geometryDisposed = vi.fn();
    const materialDisposed = vi.fn();
    const textureDisposed = vi.fn();
    mesh.geometry.addEventListener('dispose', geometryDisposed);
    mesh.material.addEventListener('dispose', materialDisposed);
    mesh.material.map?.addEventListener('dispose', textureDisposed);

    renderer.destroyEntity(mesh);

    expect(renderer.meshCount).toBe(0);
    expect(mesh.parent).toBeNull();
    expect(geometryDisposed).toHaveBeenCalledTimes(1);
    expect(materialDisposed).toHaveBeenCalledTimes(1);
    expect(textureDisposed).toHaveBeenCalledTimes(1);
  });
});

describe('toTextureRows', () => {
  it('should put the top image row last', () => {
    const data = new Uint8ClampedArray([255, 0, 0, 255, 0, 0, 255, 255]);
    const rows = toTextureRows({ width: 1, height: 2, data });
    expect([...rows]).toEqual([0, 0, 255, 255, 255, 0, 0, 255]);
  });
});
