import {
  manhattanDistance,
  reprojectOrigin,
  reprojectToCoarser,
  type TileKey
} from '../../geo/pyramid';
import type { OverlayEntry, OverlayTreatment } from './types';

const NEAR_RANGE_MULTIPLIER = 3;

function entryId(x: number, y: number): string {
  return `${x}/${y}`;
}

/**
 * Persistent tiles pinned at a single overlay zoom, plus the cross-zoom
 * lookups the scheduler, application stage and eviction sweep share.
 */
export class OverlayIndex {
  readonly overlayZoom: number;

  private readonly _entries = new Map<string, OverlayEntry>();
  // Coarser-zoom footprints of all entries, rebuilt lazily after edits.
  private readonly _coarserFootprints = new Map<number, Set<string>>();

  constructor(overlayZoom: number, entries?: readonly OverlayEntry[]) {
    this.overlayZoom = overlayZoom;
    if (entries) this.setEntries(entries);
  }

  get size(): number {
    return this._entries.size;
  }

  entries(): OverlayEntry[] {
    return [...this._entries.values()];
  }

  setEntries(entries: readonly OverlayEntry[]): void {
    this._entries.clear();
    for (const entry of entries) {
      this.assertEntry(entry);
      this._entries.set(entryId(entry.x, entry.y), entry);
    }
    this._coarserFootprints.clear();
  }

  addEntry(entry: OverlayEntry): void {
    this.assertEntry(entry);
    this._entries.set(entryId(entry.x, entry.y), entry);
    this._coarserFootprints.clear();
  }

  removeEntry(x: number, y: number): boolean {
    const removed = this._entries.delete(entryId(x, y));
    if (removed) this._coarserFootprints.clear();
    return removed;
  }

  entryKey(entry: OverlayEntry): TileKey {
    return { x: entry.x, y: entry.y, zoom: this.overlayZoom };
  }

  isExact(key: TileKey): boolean {
    return key.zoom === this.overlayZoom && this._entries.has(entryId(key.x, key.y));
  }

  entryFor(key: TileKey): OverlayEntry | undefined {
    if (key.zoom !== this.overlayZoom) return undefined;
    return this._entries.get(entryId(key.x, key.y));
  }

  corresponds(key: TileKey): boolean {
    if (this._entries.size === 0) return false;
    if (key.zoom === this.overlayZoom) {
      return this._entries.has(entryId(key.x, key.y));
    }
    if (key.zoom > this.overlayZoom) {
      const parent = reprojectToCoarser(key, this.overlayZoom);
      return this._entries.has(entryId(parent.x, parent.y));
    }
    return this.coarserFootprint(key.zoom).has(entryId(key.x, key.y));
  }

  classify(key: TileKey): OverlayTreatment {
    if (this.isExact(key)) return 'exact';
    if (key.zoom !== this.overlayZoom && this.corresponds(key)) return 'corresponding';
    return 'plain';
  }

  /** Entries whose footprint at `zoom` lies within `visibleRange * 3` (Manhattan) of the camera tile. */
  entriesNear(cameraTile: { x: number; y: number }, zoom: number, visibleRange: number): OverlayEntry[] {
    const limit = visibleRange * NEAR_RANGE_MULTIPLIER;
    const out: OverlayEntry[] = [];
    for (const entry of this._entries.values()) {
      const projected = reprojectOrigin(this.entryKey(entry), zoom);
      if (manhattanDistance(projected, cameraTile) <= limit) {
        out.push(entry);
      }
    }
    return out;
  }

  private coarserFootprint(zoom: number): Set<string> {
    let footprint = this._coarserFootprints.get(zoom);
    if (!footprint) {
      footprint = new Set<string>();
      for (const entry of this._entries.values()) {
        const parent = reprojectToCoarser(this.entryKey(entry), zoom);
        footprint.add(entryId(parent.x, parent.y));
      }
      this._coarserFootprints.set(zoom, footprint);
    }
    return footprint;
  }

  private assertEntry(entry: OverlayEntry): void {
    if (!Number.isInteger(entry.x) || !Number.isInteger(entry.y) || entry.x < 0 || entry.y < 0) {
      throw new Error(`Invalid overlay entry "${entry.name}": (${entry.x}, ${entry.y})`);
    }
  }
}
