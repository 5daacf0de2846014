import * as THREE from 'three';
import { PlanarTileProjection, type PlanarFrameOptions } from '../../geo/PlanarTileProjection';
import { tileKeyId, type TileKey } from '../../geo/pyramid';
import type { OverlayEntry, TileImage, TileMetadata, TileRenderer } from '../streaming/types';

export type TileMesh = THREE.Mesh<THREE.PlaneGeometry, THREE.MeshBasicMaterial>;

export type ThreeTileRendererOptions = PlanarFrameOptions & {
  fallbackColor?: THREE.ColorRepresentation;
  /** Per-zoom lift above `groundY` so finer tiles draw over coarser ones. */
  zoomOffset?: number;
};

const DEFAULT_FALLBACK_COLOR = 0x7a3b3b;
const DEFAULT_ZOOM_OFFSET = 0.001;

/**
 * Builds flat textured planes on the XZ ground plane for the tile streamer.
 * Every mesh lives under `root`; add that group to a scene once.
 */
export class ThreeTileRenderer implements TileRenderer<TileMesh> {
  readonly root = new THREE.Group();

  private readonly _projection: PlanarTileProjection;
  private readonly _fallbackColor: THREE.Color;
  private readonly _zoomOffset: number;

  constructor(options?: ThreeTileRendererOptions) {
    this._projection = PlanarTileProjection.fromOptions(options);
    this._fallbackColor = new THREE.Color(options?.fallbackColor ?? DEFAULT_FALLBACK_COLOR);
    this._zoomOffset = options?.zoomOffset ?? DEFAULT_ZOOM_OFFSET;
    this.root.name = 'Tile Streamer';
  }

  get meshCount(): number {
    return this.root.children.length;
  }

  createTileEntity(key: TileKey, image: TileImage): TileMesh {
    const texture = new THREE.DataTexture(toTextureRows(image), image.width, image.height, THREE.RGBAFormat);
    texture.colorSpace = THREE.SRGBColorSpace;
    texture.magFilter = THREE.LinearFilter;
    texture.minFilter = THREE.LinearFilter;
    texture.needsUpdate = true;

    const material = new THREE.MeshBasicMaterial({ map: texture, color: 0xffffff });
    return this.createTileShell(key, material);
  }

  createFallbackEntity(key: TileKey): TileMesh {
    const material = new THREE.MeshBasicMaterial({ color: this._fallbackColor.clone() });
    return this.createTileShell(key, material);
  }

  createOverlayFallbackEntity(key: TileKey, tintIntensity: number): TileMesh {
    const color = new THREE.Color().setRGB(0.1, tintIntensity, 0.3, THREE.SRGBColorSpace);
    const material = new THREE.MeshBasicMaterial({
      color,
      transparent: true,
      opacity: 0.9,
      side: THREE.DoubleSide
    });
    return this.createTileShell(key, material);
  }

  destroyEntity(mesh: TileMesh): void {
    this.root.remove(mesh);
    mesh.geometry.dispose();
    mesh.material.map?.dispose();
    mesh.material.dispose();
  }

  attachTileMetadata(mesh: TileMesh, metadata: TileMetadata): void {
    const id = tileKeyId(metadata.key);
    mesh.userData.tileKey = id;
    mesh.userData.zoom = metadata.key.zoom;
    mesh.userData.lastUsed = metadata.lastUsed;
    mesh.userData.treatment = metadata.treatment;
    mesh.name = metadata.treatment === 'corresponding' ? `Overlay Tile Proxy ${id}` : `Tile ${id}`;
  }

  attachOverlayMetadata(mesh: TileMesh, entry: OverlayEntry): void {
    mesh.userData.overlay = { name: entry.name, x: entry.x, y: entry.y, ...entry.metadata };
    mesh.name = `Overlay Tile ${entry.name}`;
  }

  private createTileShell(key: TileKey, material: THREE.MeshBasicMaterial): TileMesh {
    const size = this._projection.tileWorldSize(key.zoom);
    const geometry = new THREE.PlaneGeometry(size, size, 1, 1);
    // XY plane onto XZ with the top edge facing north (-Z).
    geometry.rotateX(-Math.PI / 2);

    const mesh = new THREE.Mesh(geometry, material);
    const center = this._projection.tileCenter(key);
    mesh.position.set(center.x, center.y + key.zoom * this._zoomOffset, center.z);
    mesh.renderOrder = 2 + key.zoom;

    this.root.add(mesh);
    return mesh;
  }
}

// DataTexture rows start at v = 0, the south edge after rotation; tile images start at the north.
export function toTextureRows(image: TileImage): Uint8Array {
  const rowBytes = image.width * 4;
  const out = new Uint8Array(rowBytes * image.height);
  for (let row = 0; row < image.height; row += 1) {
    const src = image.data.subarray(row * rowBytes, (row + 1) * rowBytes);
    out.set(src, (image.height - 1 - row) * rowBytes);
  }
  return out;
}
