export type TileKey = Readonly<{
  x: number;
  y: number;
  zoom: number;
}>;

export function tileKey(x: number, y: number, zoom: number): TileKey {
  return { x, y, zoom };
}

export function tileKeyId(key: TileKey): string {
  return `${key.zoom}/${key.x}/${key.y}`;
}

export function sameTile(a: TileKey, b: TileKey): boolean {
  return a.x === b.x && a.y === b.y && a.zoom === b.zoom;
}

export function maxTileIndex(zoom: number): number {
  return 2 ** zoom - 1;
}

export function clampTileIndex(value: number, zoom: number): number {
  return Math.max(0, Math.min(maxTileIndex(zoom), value));
}

/**
 * Many-to-one: every finer tile inside the coarse tile lands on the same key.
 * Uses division rather than `>>` so indices past 2^31 stay correct.
 */
export function reprojectToCoarser(key: TileKey, targetZoom: number): TileKey {
  const div = 2 ** (key.zoom - targetZoom);
  return {
    x: Math.floor(key.x / div),
    y: Math.floor(key.y / div),
    zoom: targetZoom
  };
}

/** One-to-4^d: the full block of finer tiles covered by `key`, row by row. */
export function reprojectToFiner(key: TileKey, targetZoom: number): TileKey[] {
  const span = 2 ** (targetZoom - key.zoom);
  const startX = key.x * span;
  const startY = key.y * span;
  const out: TileKey[] = [];
  for (let y = startY; y < startY + span; y += 1) {
    for (let x = startX; x < startX + span; x += 1) {
      out.push({ x, y, zoom: targetZoom });
    }
  }
  return out;
}

export function reproject(key: TileKey, targetZoom: number): TileKey[] {
  if (targetZoom === key.zoom) return [key];
  if (targetZoom < key.zoom) return [reprojectToCoarser(key, targetZoom)];
  return reprojectToFiner(key, targetZoom);
}

/**
 * Single representative of `key` at `targetZoom`: the coarse parent, or the
 * first (north-west) tile of the finer block.
 */
export function reprojectOrigin(key: TileKey, targetZoom: number): TileKey {
  if (targetZoom <= key.zoom) return reprojectToCoarser(key, targetZoom);
  const span = 2 ** (targetZoom - key.zoom);
  return { x: key.x * span, y: key.y * span, zoom: targetZoom };
}

export function manhattanDistance(a: { x: number; y: number }, b: { x: number; y: number }): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}
