import React, { useEffect, useMemo, useState } from 'react';
import Map, { NavigationControl } from 'react-map-gl/maplibre';
import DeckGL from '@deck.gl/react';
import { ScatterplotLayer } from '@deck.gl/layers';
import { Layers, X } from 'lucide-react';
import 'maplibre-gl/dist/maplibre-gl.css';
import type { Centroid, LegendItem, MarkerDescriptor } from '../models/PowerPlant';
import { FUEL_COLOR_RGB } from '../utils/plantPresentation';
import { BASEMAPS, DEFAULT_BASEMAP, buildRasterStyle, getBasemap, type BasemapId } from '../utils/basemaps';
import LegendFooter from './LegendFooter';

const COUNTRY_ZOOM = 5;
const WORLD_VIEW = { longitude: 0, latitude: 20, zoom: 1.5 };
const MARKER_OPACITY = 180;

interface MapViewProps {
  markers: MarkerDescriptor[];
  centroid: Centroid | null;
  legend: LegendItem[];
  loading: boolean;
}

const MapView: React.FC<MapViewProps> = ({ markers, centroid, legend, loading }) => {
  const [basemapId, setBasemapId] = useState<BasemapId>(DEFAULT_BASEMAP);
  const [hoverInfo, setHoverInfo] = useState<MarkerDescriptor | null>(null);
  const [pinnedMarker, setPinnedMarker] = useState<MarkerDescriptor | null>(null);

  useEffect(() => {
    setHoverInfo(null);
    setPinnedMarker(null);
  }, [markers]);

  const mapStyle = useMemo(() => buildRasterStyle(getBasemap(basemapId)), [basemapId]);

  // A new object here re-centres DeckGL; an empty selection falls back to the world view
  const initialViewState = useMemo(
    () =>
      centroid
        ? { longitude: centroid.lon, latitude: centroid.lat, zoom: COUNTRY_ZOOM, pitch: 0, bearing: 0 }
        : { ...WORLD_VIEW, pitch: 0, bearing: 0 },
    [centroid]
  );

  const layers = useMemo(
    () => [
      new ScatterplotLayer<MarkerDescriptor>({
        id: 'power-plants',
        data: markers,
        pickable: true,
        stroked: true,
        filled: true,
        radiusUnits: 'pixels',
        getRadius: 6,
        lineWidthMinPixels: 1,
        getPosition: (d) => [d.lon, d.lat],
        getFillColor: (d): [number, number, number, number] => {
          const [r, g, b] = FUEL_COLOR_RGB[d.colorKey];
          return [r, g, b, MARKER_OPACITY];
        },
        getLineColor: (d) => FUEL_COLOR_RGB[d.colorKey],
        onHover: (info) => {
          setHoverInfo(info.object ?? null);
        },
        onClick: (info) => {
          if (info.object) {
            setPinnedMarker(info.object);
          }
        },
      }),
    ],
    [markers]
  );

  const shownMarker = pinnedMarker ?? hoverInfo;

  return (
    <div className="map-view">
      {loading && (
        <div className="loading-indicator">
          <div className="loading-spinner"></div>
          <div className="loading-text">Loading power plants...</div>
        </div>
      )}

      <div className="map-container">
        <DeckGL
          initialViewState={initialViewState}
          controller={true}
          layers={layers}
          getCursor={({ isHovering }) => (isHovering ? 'pointer' : 'grab')}
        >
          <Map mapStyle={mapStyle}>
            <NavigationControl position="top-right" />
          </Map>
        </DeckGL>
      </div>

      <div className="basemap-switcher">
        <Layers size={16} aria-hidden="true" />
        <select
          value={basemapId}
          onChange={(e) => setBasemapId(getBasemap(e.target.value).id)}
          aria-label="Basemap"
        >
          {BASEMAPS.map((basemap) => (
            <option key={basemap.id} value={basemap.id}>
              {basemap.label}
            </option>
          ))}
        </select>
      </div>

      <LegendFooter items={legend} />

      {shownMarker && (
        <div className="info-panel">
          {pinnedMarker && (
            <button
              className="close-button"
              onClick={() => {
                setPinnedMarker(null);
                setHoverInfo(null);
              }}
              aria-label="Close details"
            >
              <X size={16} />
            </button>
          )}
          <h3>{shownMarker.label}</h3>
          <p>Capacity: {shownMarker.capacityDisplay}</p>
          <p>Fuel: {shownMarker.fuel}</p>
          <p>
            Coordinates: {shownMarker.lat.toFixed(4)}, {shownMarker.lon.toFixed(4)}
          </p>
        </div>
      )}
    </div>
  );
};

export default MapView;
