import type { Vec3 } from '../../geo/coords';
import type { TileKey } from '../../geo/pyramid';

/** Decoded RGBA8 pixels, row-major from the top-left corner. */
export type TileImage = {
  width: number;
  height: number;
  data: Uint8ClampedArray;
};

export type CameraState = {
  position: Vec3;
  forward: Vec3;
};

export type TileStreamFrame = {
  camera: CameraState | null;
  deltaSeconds: number;
  elapsedSeconds: number;
};

export type OverlayEntry = {
  x: number;
  y: number;
  name: string;
  metadata?: Readonly<Record<string, unknown>>;
};

export type OverlayTreatment = 'exact' | 'corresponding' | 'plain';

export type TileMetadata = {
  key: TileKey;
  lastUsed: number;
  treatment: OverlayTreatment;
};

export type FetchResult = {
  key: TileKey;
  image: TileImage | null;
};

export interface TileImageSource {
  fetchTileImage(key: TileKey): Promise<TileImage>;
}

/**
 * Render-side lifecycle. Handles are opaque to the streaming core; it only
 * hands them back for metadata and destruction.
 */
export interface TileRenderer<THandle> {
  createTileEntity(key: TileKey, image: TileImage): THandle;
  createFallbackEntity(key: TileKey): THandle;
  createOverlayFallbackEntity(key: TileKey, tintIntensity: number): THandle;
  destroyEntity(handle: THandle): void;
  attachTileMetadata(handle: THandle, metadata: TileMetadata): void;
  attachOverlayMetadata(handle: THandle, entry: OverlayEntry): void;
}

export type HeightZoomThreshold = {
  minHeight: number;
  zoom: number;
};
