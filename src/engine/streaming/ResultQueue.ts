import { tileKeyId, type TileKey } from '../../geo/pyramid';
import type { FetchResult, TileImage } from './types';

/**
 * Hand-off point between fetch completions and the update loop. Every push and
 * drain runs to completion on the event loop, so the swap in `drain` is the
 * whole critical section.
 */
export class ResultQueue {
  private _items: FetchResult[] = [];
  private readonly _pendingIds = new Set<string>();

  get size(): number {
    return this._items.length;
  }

  push(key: TileKey, image: TileImage | null): void {
    this._items.push({ key, image });
    this._pendingIds.add(tileKeyId(key));
  }

  has(id: string): boolean {
    return this._pendingIds.has(id);
  }

  drain(): FetchResult[] {
    const drained = this._items;
    this._items = [];
    this._pendingIds.clear();
    return drained;
  }
}
