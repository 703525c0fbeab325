import type { StyleSpecification } from 'maplibre-gl';

export type BasemapId = 'street' | 'dark' | 'satellite';

export interface Basemap {
  id: BasemapId;
  label: string;
  tiles: string[];
  attribution: string;
}

export const BASEMAPS: readonly Basemap[] = [
  {
    id: 'street',
    label: 'Street Map',
    tiles: ['https://tile.openstreetmap.org/{z}/{x}/{y}.png'],
    attribution: '&copy; OpenStreetMap contributors',
  },
  {
    id: 'dark',
    label: 'Dark Mode',
    tiles: [
      'https://a.basemaps.cartocdn.com/dark_all/{z}/{x}/{y}.png',
      'https://b.basemaps.cartocdn.com/dark_all/{z}/{x}/{y}.png',
    ],
    attribution: '&copy; OpenStreetMap contributors &copy; CARTO',
  },
  {
    id: 'satellite',
    label: 'Satellite Hybrid',
    tiles: ['https://mt1.google.com/vt/lyrs=y&x={x}&y={y}&z={z}'],
    attribution: 'Google',
  },
];

export const DEFAULT_BASEMAP: BasemapId = 'street';

export const getBasemap = (id: string): Basemap =>
  BASEMAPS.find((basemap) => basemap.id === id) ?? BASEMAPS[0];

/** Single raster source style, enough for MapLibre to draw a tiled basemap. */
export const buildRasterStyle = (basemap: Basemap): StyleSpecification => ({
  version: 8,
  sources: {
    basemap: {
      type: 'raster',
      tiles: basemap.tiles,
      tileSize: 256,
      attribution: basemap.attribution,
    },
  },
  layers: [{ id: 'basemap', type: 'raster', source: 'basemap' }],
});
