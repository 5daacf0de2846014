import { describe, it, expect, vi } from 'vitest';
import { normalizeSubdomains, UrlTemplateTileSource } from '../../engine/sources/UrlTemplateTileSource';
import { solidImage } from '../fixtures/fakes';

const TEMPLATE = 'https://{s}.tiles.test/{z}/{x}/{y}.png';

describe('UrlTemplateTileSource', () => {
  it('should expand xyz templates with a stable subdomain', () => {
    const source = new UrlTemplateTileSource({ urlTemplate: TEMPLATE, loadImage: vi.fn() });
    expect(source.buildUrl({ x: 3, y: 5, zoom: 4 })).toBe('https://a.tiles.test/4/3/5.png');
    expect(source.buildUrl({ x: 3, y: 6, zoom: 4 })).toBe('https://b.tiles.test/4/3/6.png');
  });

  it('should flip y for tms sources', () => {
    const source = new UrlTemplateTileSource({ urlTemplate: TEMPLATE, yType: 'tms', loadImage: vi.fn() });
    expect(source.buildUrl({ x: 3, y: 5, zoom: 4 })).toBe('https://a.tiles.test/4/3/10.png');
  });

  it('should delegate loading to the injected loader', async () => {
    const image = solidImage(1, 1, [1, 2, 3, 255]);
    const loadImage = vi.fn(async (_url: string) => image);
    const source = new UrlTemplateTileSource({ urlTemplate: TEMPLATE, subdomains: '1-4', loadImage });

    await expect(source.fetchTileImage({ x: 1, y: 1, zoom: 1 })).resolves.toBe(image);
    expect(loadImage).toHaveBeenCalledWith('https://4.tiles.test/1/1/1.png');
  });

  it('should reject an empty template', () => {
    expect(() => new UrlTemplateTileSource({ urlTemplate: '  ' })).toThrow('Invalid urlTemplate: empty');
  });
});

describe('normalizeSubdomains', () => {
  it('should accept lists, comma strings, ranges and letter runs', () => {
    expect(normalizeSubdomains(['x', ' y ', ''])).toEqual(['x', 'y']);
    expect(normalizeSubdomains('a, b')).toEqual(['a', 'b']);
    expect(normalizeSubdomains('1-4')).toEqual(['1', '2', '3', '4']);
    expect(normalizeSubdomains('abc')).toEqual(['a', 'b', 'c']);
    expect(normalizeSubdomains('t')).toEqual(['t']);
  });

  it('should fall back to a, b, c', () => {
    expect(normalizeSubdomains(undefined)).toEqual(['a', 'b', 'c']);
    expect(normalizeSubdomains([])).toEqual(['a', 'b', 'c']);
    expect(normalizeSubdomains(' ')).toEqual(['a', 'b', 'c']);
  });
});
