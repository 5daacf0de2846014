import { tileKeyId, type TileKey } from '../../geo/pyramid';
import type { DebugLogger } from './DebugLogger';
import type { TileCache } from './TileCache';
import type { TileImageSource } from './types';

/**
 * Claims a key and starts its fetch. The claim is never rolled back: a failed
 * key resolves to a fallback entity instead of being fetched again.
 */
export class FetchPipeline {
  private readonly _source: TileImageSource;
  private readonly _log: DebugLogger;
  private readonly _inflight = new Set<Promise<void>>();
  private _dispatchedCount = 0;

  constructor(source: TileImageSource, log: DebugLogger) {
    this._source = source;
    this._log = log;
  }

  get inflightCount(): number {
    return this._inflight.size;
  }

  get dispatchedCount(): number {
    return this._dispatchedCount;
  }

  dispatch<THandle>(cache: TileCache<THandle>, key: TileKey): void {
    cache.markRequested(key);
    this._dispatchedCount += 1;

    const task = this.run(cache, key);
    this._inflight.add(task);
    void task.then(() => {
      this._inflight.delete(task);
    });
  }

  /** Resolves once every fetch dispatched so far has queued its result. */
  async settled(): Promise<void> {
    while (this._inflight.size > 0) {
      await Promise.all([...this._inflight]);
    }
  }

  private async run<THandle>(cache: TileCache<THandle>, key: TileKey): Promise<void> {
    try {
      const image = await this._source.fetchTileImage(key);
      cache.results.push(key, image);
    } catch (error) {
      this._log.warn(`fetch failed for ${tileKeyId(key)}, using fallback`, error);
      cache.results.push(key, null);
    }
  }
}
