import { colorForCategory, type RgbColor } from './categories.js';
import { DEFAULT_CENTER, EMPTY_MAP_HINT } from './locale.js';
import type { Coordinates, Pin } from './types.js';

const DEFAULT_ZOOM = 12;
const MAP_STYLE = 'mapbox://styles/mapbox/streets-v12';

export interface MapViewOptions {
  heatmap?: boolean;
  centerOnDefault?: boolean;
}

export interface MapPoint extends Coordinates {
  name: string;
  category: string;
  description: string;
  color: RgbColor;
}

export interface HeatmapLayer {
  type: 'heatmap';
  points: MapPoint[];
  aggregation: 'MEAN';
  radiusPixels: number;
}

export interface ScatterplotLayer {
  type: 'scatterplot';
  points: MapPoint[];
  radius: number;
  radiusMinPixels: number;
  radiusMaxPixels: number;
  pickable: boolean;
}

export type MapLayer = HeatmapLayer | ScatterplotLayer;

export interface MapTooltip {
  html: string;
  style: Record<string, string>;
}

export type MapView =
  | { status: 'empty'; hint: string; center: Coordinates; zoom: number }
  | {
      status: 'ready';
      center: Coordinates;
      zoom: number;
      pitch: number;
      mapStyle: string;
      layers: MapLayer[];
      tooltip: MapTooltip;
    };

export const MAP_TOOLTIP: MapTooltip = {
  html: '<b>{name}</b><br/>Category: {category}<br/>{description}',
  style: { backgroundColor: '#0f172a', color: 'white' },
};

export function meanCenter(pins: readonly Coordinates[]): Coordinates {
  if (pins.length === 0) {
    return { ...DEFAULT_CENTER };
  }

  const sum = pins.reduce((acc, pin) => ({ lat: acc.lat + pin.lat, lon: acc.lon + pin.lon }), { lat: 0, lon: 0 });
  return { lat: sum.lat / pins.length, lon: sum.lon / pins.length };
}

function toMapPoint(pin: Pin): MapPoint {
  return {
    lat: pin.lat,
    lon: pin.lon,
    name: pin.name,
    category: pin.category,
    description: pin.description,
    color: colorForCategory(pin.category),
  };
}

/**
 * Describe what the map renderer should draw. The renderer itself is external;
 * this only decides layers, colors and the initial viewport.
 */
export function buildMapView(pins: readonly Pin[], options: MapViewOptions = {}): MapView {
  if (pins.length === 0) {
    return { status: 'empty', hint: EMPTY_MAP_HINT, center: { ...DEFAULT_CENTER }, zoom: DEFAULT_ZOOM };
  }

  const points = pins.map(toMapPoint);
  const layers: MapLayer[] = [];

  if (options.heatmap) {
    layers.push({ type: 'heatmap', points, aggregation: 'MEAN', radiusPixels: 60 });
  }

  layers.push({
    type: 'scatterplot',
    points,
    radius: 50,
    radiusMinPixels: 5,
    radiusMaxPixels: 60,
    pickable: true,
  });

  return {
    status: 'ready',
    center: options.centerOnDefault ? { ...DEFAULT_CENTER } : meanCenter(pins),
    zoom: DEFAULT_ZOOM,
    pitch: 0,
    mapStyle: MAP_STYLE,
    layers,
    tooltip: MAP_TOOLTIP,
  };
}
