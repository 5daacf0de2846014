import type { TileImage } from './types';

export const OVERLAY_DARKEN_FACTOR = 0.2;
export const OVERLAY_BORDER_RATIO = 0.03;
export const OVERLAY_BORDER_MIN_PX = 1;
export const OVERLAY_BORDER_MAX_PX = 5;
export const OVERLAY_BORDER_RGBA: readonly [number, number, number, number] = [40, 40, 40, 150];

export function overlayBorderWidth(width: number): number {
  const raw = Math.floor(width * OVERLAY_BORDER_RATIO);
  return Math.max(OVERLAY_BORDER_MIN_PX, Math.min(OVERLAY_BORDER_MAX_PX, raw));
}

/**
 * Marks overlay imagery: RGB darkened by 20%, then a thin dark border
 * alpha-blended over the edges. Alpha is kept as is. Returns a new image.
 */
export function applyOverlayTreatment(image: TileImage): TileImage {
  const { width, height } = image;
  const data = new Uint8ClampedArray(image.data);
  const keep = 1 - OVERLAY_DARKEN_FACTOR;
  const border = overlayBorderWidth(width);
  const [borderR, borderG, borderB, borderA] = OVERLAY_BORDER_RGBA;
  const alpha = borderA / 255;

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const i = (y * width + x) * 4;
      let r = Math.floor((data[i] ?? 0) * keep);
      let g = Math.floor((data[i + 1] ?? 0) * keep);
      let b = Math.floor((data[i + 2] ?? 0) * keep);

      const onBorder = x < border || x >= width - border || y < border || y >= height - border;
      if (onBorder) {
        r = Math.floor((1 - alpha) * r + alpha * borderR);
        g = Math.floor((1 - alpha) * g + alpha * borderG);
        b = Math.floor((1 - alpha) * b + alpha * borderB);
      }

      data[i] = r;
      data[i + 1] = g;
      data[i + 2] = b;
    }
  }

  return { width, height, data };
}
