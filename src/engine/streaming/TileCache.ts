import type { Vec3 } from '../../geo/coords';
import { tileKeyId, type TileKey } from '../../geo/pyramid';
import { ResultQueue } from './ResultQueue';

export type RequestedTile = {
  state: 'requested';
  key: TileKey;
};

export type ActiveTile<THandle> = {
  state: 'active';
  key: TileKey;
  handle: THandle;
  lastUsed: number;
  position: Vec3;
};

export type TileEntry<THandle> = RequestedTile | ActiveTile<THandle>;

export type TileStateName = 'unrequested' | 'requested' | 'active';

/**
 * The one mutable store of the streaming pipeline: per-key tile state, the
 * fetch result queue, the zoom the scheduler targets and the sweep counter.
 * Absent keys are unrequested.
 */
export class TileCache<THandle> {
  readonly results = new ResultQueue();

  private readonly _entries = new Map<string, TileEntry<THandle>>();
  private _currentZoom: number;
  private _elapsedCounter = 0;

  constructor(initialZoom: number) {
    this._currentZoom = initialZoom;
  }

  get currentZoom(): number {
    return this._currentZoom;
  }

  set currentZoom(zoom: number) {
    this._currentZoom = zoom;
  }

  get elapsedCounter(): number {
    return this._elapsedCounter;
  }

  advanceElapsed(deltaSeconds: number): number {
    if (Number.isFinite(deltaSeconds) && deltaSeconds > 0) {
      this._elapsedCounter += deltaSeconds;
    }
    return this._elapsedCounter;
  }

  stateOf(key: TileKey): TileStateName {
    return this._entries.get(tileKeyId(key))?.state ?? 'unrequested';
  }

  get(key: TileKey): TileEntry<THandle> | undefined {
    return this._entries.get(tileKeyId(key));
  }

  /** Requested, active, or sitting in the result queue. */
  isClaimed(key: TileKey): boolean {
    const id = tileKeyId(key);
    return this._entries.has(id) || this.results.has(id);
  }

  markRequested(key: TileKey): void {
    this._entries.set(tileKeyId(key), { state: 'requested', key });
  }

  activate(key: TileKey, handle: THandle, lastUsed: number, position: Vec3): ActiveTile<THandle> {
    const entry: ActiveTile<THandle> = { state: 'active', key, handle, lastUsed, position };
    this._entries.set(tileKeyId(key), entry);
    return entry;
  }

  release(key: TileKey): TileEntry<THandle> | undefined {
    const id = tileKeyId(key);
    const entry = this._entries.get(id);
    this._entries.delete(id);
    return entry;
  }

  activeTiles(): ActiveTile<THandle>[] {
    const out: ActiveTile<THandle>[] = [];
    for (const entry of this._entries.values()) {
      if (entry.state === 'active') out.push(entry);
    }
    return out;
  }

  requestedKeys(): TileKey[] {
    const out: TileKey[] = [];
    for (const entry of this._entries.values()) {
      if (entry.state === 'requested') out.push(entry.key);
    }
    return out;
  }

  /** Drops requested entries the predicate rejects; active entries are untouched. */
  pruneRequested(keep: (key: TileKey) => boolean): TileKey[] {
    const dropped: TileKey[] = [];
    for (const [id, entry] of this._entries) {
      if (entry.state !== 'requested' || keep(entry.key)) continue;
      this._entries.delete(id);
      dropped.push(entry.key);
    }
    return dropped;
  }

  counts(): { requested: number; active: number; pending: number } {
    let requested = 0;
    let active = 0;
    for (const entry of this._entries.values()) {
      if (entry.state === 'active') active += 1;
      else requested += 1;
    }
    return { requested, active, pending: this.results.size };
  }

  clear(): void {
    this._entries.clear();
    this.results.drain();
    this._elapsedCounter = 0;
  }
}
