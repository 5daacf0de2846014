import * as THREE from 'three';
import type { TileKey } from '../../geo/pyramid';
import type { TileImage, TileImageSource } from '../streaming/types';

export type TileYType = 'xyz' | 'tms';

export type ImageLoader = (url: string) => Promise<TileImage>;

export type UrlTemplateTileSourceOptions = {
  urlTemplate: string;
  subdomains?: readonly string[] | string;
  yType?: TileYType;
  loadImage?: ImageLoader;
};

const DEFAULT_SUBDOMAINS: readonly string[] = ['a', 'b', 'c'];

/** XYZ/TMS raster tiles from a `{z}/{x}/{y}` URL template with optional `{s}` sharding. */
export class UrlTemplateTileSource implements TileImageSource {
  private readonly _urlTemplate: string;
  private readonly _subdomains: readonly string[];
  private readonly _yType: TileYType;
  private readonly _loadImage: ImageLoader;

  constructor(options: UrlTemplateTileSourceOptions) {
    const template = options.urlTemplate.trim();
    if (template.length === 0) {
      throw new Error('Invalid urlTemplate: empty');
    }
    this._urlTemplate = template;
    this._subdomains = normalizeSubdomains(options.subdomains);
    this._yType = options.yType ?? 'xyz';
    this._loadImage = options.loadImage ?? loadImageWithCanvas;
  }

  get subdomains(): readonly string[] {
    return this._subdomains;
  }

  buildUrl(key: TileKey): string {
    const n = 2 ** key.zoom;
    const y = this._yType === 'tms' ? n - 1 - key.y : key.y;
    return this._urlTemplate
      .replace('{z}', String(key.zoom))
      .replace('{x}', String(key.x))
      .replace('{y}', String(y))
      .replace('{s}', this.pickSubdomain(key));
  }

  fetchTileImage(key: TileKey): Promise<TileImage> {
    return this._loadImage(this.buildUrl(key));
  }

  private pickSubdomain(key: TileKey): string {
    if (this._subdomains.length === 0) {
      return '';
    }
    const idx = Math.abs(key.x + key.y + key.zoom) % this._subdomains.length;
    return this._subdomains[idx] ?? '';
  }
}

/** Browser loader: decodes through an `<img>` and reads the pixels back from a 2D canvas. */
export async function loadImageWithCanvas(url: string): Promise<TileImage> {
  const loader = new THREE.ImageLoader();
  loader.setCrossOrigin('anonymous');
  const image = await loader.loadAsync(url);

  const canvas = document.createElement('canvas');
  canvas.width = image.naturalWidth;
  canvas.height = image.naturalHeight;
  const ctx = canvas.getContext('2d');
  if (!ctx) {
    throw new Error(`2D canvas unavailable while decoding ${url}`);
  }
  ctx.drawImage(image, 0, 0);
  const pixels = ctx.getImageData(0, 0, canvas.width, canvas.height);
  return { width: pixels.width, height: pixels.height, data: pixels.data };
}

export function normalizeSubdomains(input: readonly string[] | string | undefined): readonly string[] {
  if (typeof input === 'string') {
    const trimmed = input.trim();
    if (trimmed.length === 0) {
      return DEFAULT_SUBDOMAINS;
    }
    const rangeMatch = /^(\d+)\s*-\s*(\d+)$/.exec(trimmed);
    if (rangeMatch) {
      const start = Number(rangeMatch[1]);
      const end = Number(rangeMatch[2]);
      if (Number.isInteger(start) && Number.isInteger(end) && end >= start) {
        const out: string[] = [];
        for (let i = start; i <= end; i += 1) out.push(String(i));
        return out;
      }
    }
    const split = trimmed
      .split(',')
      .map((x) => x.trim())
      .filter((x) => x.length > 0);
    if (split.length > 1) {
      return split;
    }
    if (trimmed.length > 1 && !trimmed.includes(',')) {
      return trimmed.split('');
    }
    return split.length > 0 ? split : DEFAULT_SUBDOMAINS;
  }

  if (input) {
    const out = input.map((x) => x.trim()).filter((x) => x.length > 0);
    return out.length > 0 ? out : DEFAULT_SUBDOMAINS;
  }

  return DEFAULT_SUBDOMAINS;
}
