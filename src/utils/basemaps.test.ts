import { describe, expect, it } from 'vitest';
import { buildRasterStyle, getBasemap } from './basemaps';

describe('basemaps', () => {
  it('looks up basemaps by id and falls back to the street map', () => {
    expect(getBasemap('dark').label).toBe('Dark Mode');
    expect(getBasemap('satellite').label).toBe('Satellite Hybrid');
    expect(getBasemap('unknown').id).toBe('street');
  });

  it('builds a single raster layer style', () => {
    const basemap = getBasemap('street');
    const style = buildRasterStyle(basemap);

    expect(style.version).toBe(8);
    expect(style.sources).toEqual({
      basemap: {
        type: 'raster',
        tiles: ['https://tile.openstreetmap.org/{z}/{x}/{y}.png'],
        tileSize: 256,
        attribution: '&copy; OpenStreetMap contributors',
      },
    });
    expect(style.layers).toEqual([{ id: 'basemap', type: 'raster', source: 'basemap' }]);
  });
});
