import { describe, it, expect } from 'vitest';
import { PlanarTileProjection } from '../../geo/PlanarTileProjection';
import { sameTile, type TileKey } from '../../geo/pyramid';
import { ApplicationStage } from '../../engine/streaming/ApplicationStage';
import { createDebugLogger } from '../../engine/streaming/DebugLogger';
import { OverlayIndex } from '../../engine/streaming/OverlayIndex';
import { TileCache } from '../../engine/streaming/TileCache';
import { FakeRenderer, solidImage, type FakeEntity } from '../fixtures/fakes';

const ENTRY = { x: 1608, y: 1600, name: 'Keep', metadata: { owner: 'survey' } };
const EXACT = { x: 1608, y: 1600, zoom: 18 };
const CORRESPONDING = { x: 201, y: 200, zoom: 15 };
const PLAIN = { x: 199, y: 200, zoom: 15 };

function setup() {
  const projection = PlanarTileProjection.fromOptions();
  const overlays = new OverlayIndex(18, [ENTRY]);
  const renderer = new FakeRenderer();
  const stage = new ApplicationStage(renderer, overlays, projection, createDebugLogger('test', false));
  const cache = new TileCache<FakeEntity>(15);
  return { projection, renderer, stage, cache };
}

function entityFor(renderer: FakeRenderer, key: TileKey): FakeEntity | undefined {
  return renderer.created.find((entity) => sameTile(entity.key, key));
}

describe('ApplicationStage', () => {
  it('should pass plain images through untouched', () => {
    const { renderer, stage, cache } = setup();
    const image = solidImage(4, 4, [100, 150, 200, 255]);
    cache.markRequested(PLAIN);
    cache.results.push(PLAIN, image);

    const report = stage.apply(cache, 12);

    expect(report.applied).toEqual([PLAIN]);
    const entity = entityFor(renderer, PLAIN);
    expect(entity?.kind).toBe('image');
    expect(entity?.image).toBe(image);
    expect(entity?.metadata).toEqual({ key: PLAIN, lastUsed: 12, treatment: 'plain' });
    expect(entity?.overlay).toBeNull();
  });

  it('should darken and border overlay images', () => {
    const { renderer, stage, cache } = setup();
    cache.markRequested(EXACT);
    cache.markRequested(CORRESPONDING);
    cache.results.push(EXACT, solidImage(4, 4, [100, 150, 200, 255]));
    cache.results.push(CORRESPONDING, solidImage(4, 4, [100, 150, 200, 255]));

    stage.apply(cache, 1);

    const exact = entityFor(renderer, EXACT);
    expect(exact?.image?.data[0]).toBe(56);
    expect(exact?.image?.data[(1 * 4 + 1) * 4]).toBe(80);
    expect(exact?.overlay).toBe(ENTRY);
    expect(exact?.metadata?.treatment).toBe('exact');

    const corresponding = entityFor(renderer, CORRESPONDING);
    expect(corresponding?.image?.data[0]).toBe(56);
    expect(corresponding?.overlay).toBeNull();
    expect(corresponding?.metadata?.treatment).toBe('corresponding');
  });

  it('should pick fallbacks by treatment when the fetch failed', () => {
    const { renderer, stage, cache } = setup();
    for (const key of [EXACT, CORRESPONDING, PLAIN]) {
      cache.markRequested(key);
      cache.results.push(key, null);
    }

    const report = stage.apply(cache, 5);

    expect(report.fallbacks).toBe(3);
    expect(entityFor(renderer, EXACT)).toMatchObject({ kind: 'overlay-fallback', tint: 0.7 });
    expect(entityFor(renderer, EXACT)?.overlay).toBe(ENTRY);
    expect(entityFor(renderer, CORRESPONDING)).toMatchObject({ kind: 'overlay-fallback', tint: 0.5 });
    expect(entityFor(renderer, PLAIN)).toMatchObject({ kind: 'fallback', tint: null });
  });

  it('should activate the key at its tile center', () => {
    const { projection, renderer, stage, cache } = setup();
    cache.markRequested(PLAIN);
    cache.results.push(PLAIN, null);

    stage.apply(cache, 7);

    const entry = cache.get(PLAIN);
    expect(entry?.state).toBe('active');
    if (entry?.state !== 'active') return;
    expect(entry.handle).toBe(entityFor(renderer, PLAIN));
    expect(entry.lastUsed).toBe(7);
    expect(entry.position).toEqual(projection.tileCenter(PLAIN));
  });

  it('should ignore results for keys that are no longer requested', () => {
    const { renderer, stage, cache } = setup();
    const stray = { x: 5, y: 5, zoom: 15 };
    cache.results.push(stray, null);
    cache.markRequested(PLAIN);
    cache.results.push(PLAIN, null);
    cache.results.push(PLAIN, null);

    const report = stage.apply(cache, 0);

    expect(report.applied).toEqual([PLAIN]);
    expect(report.ignored).toEqual([stray, PLAIN]);
    expect(renderer.created).toHaveLength(1);
    expect(cache.results.size).toBe(0);
  });
});
