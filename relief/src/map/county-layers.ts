/**
 * Source and layer definitions for the county relief.
 *
 * Every value the map draws comes from the prepared feature properties:
 * height is `logPop × elevationScale` and color is the RGB of `fillColor`.
 * Extrusions ignore color alpha, so the constant `fillColor` alpha is
 * folded into the layer opacity instead.
 */
import type {
  ExpressionSpecification,
  FillExtrusionLayerSpecification,
  GeoJSONSourceSpecification,
  LineLayerSpecification,
} from 'maplibre-gl';
import type { CountyCollection, ViewSettings } from '../types/county';
import { baseMapVisibility, type Visibility } from './basemaps';

export const COUNTY_SOURCE_ID = 'counties';
export const EXTRUSION_LAYER_ID = 'county-extrusion';
export const OUTLINE_LAYER_ID = 'county-outline';

export const HIGHLIGHT_COLOR = 'rgb(255, 255, 0)';
export const OUTLINE_COLOR = `rgba(255, 255, 255, ${40 / 255})`;

/** Alpha channel of every prepared `fillColor` */
export const FILL_ALPHA = 200;

export function countySource(data: CountyCollection): GeoJSONSourceSpecification {
  return {
    type: 'geojson',
    data,
    // Lets feature-state address counties by FIPS
    promoteId: 'fips',
  };
}

export function extrusionHeight(elevationScale: number): ExpressionSpecification {
  return ['*', ['get', 'logPop'], elevationScale];
}

export function extrusionColor(): ExpressionSpecification {
  const fill: ExpressionSpecification = ['get', 'fillColor'];
  return [
    'case',
    ['boolean', ['feature-state', 'hover'], false],
    HIGHLIGHT_COLOR,
    ['rgb', ['at', 0, fill], ['at', 1, fill], ['at', 2, fill]],
  ];
}

export function extrusionOpacity(opacity: number): number {
  return (opacity * FILL_ALPHA) / 255;
}

export function extrusionLayer(settings: ViewSettings): FillExtrusionLayerSpecification {
  return {
    id: EXTRUSION_LAYER_ID,
    type: 'fill-extrusion',
    source: COUNTY_SOURCE_ID,
    paint: {
      'fill-extrusion-color': extrusionColor(),
      'fill-extrusion-height': extrusionHeight(settings.elevationScale),
      'fill-extrusion-base': 0,
      'fill-extrusion-opacity': extrusionOpacity(settings.opacity),
    },
  };
}

function visibility(on: boolean): Visibility {
  return on ? 'visible' : 'none';
}

export function outlineLayer(settings: ViewSettings): LineLayerSpecification {
  return {
    id: OUTLINE_LAYER_ID,
    type: 'line',
    source: COUNTY_SOURCE_ID,
    layout: { visibility: visibility(settings.wireframe) },
    paint: {
      'line-color': OUTLINE_COLOR,
      'line-width': 1,
    },
  };
}

/** The subset of the MapLibre map that settings changes touch */
export interface SettingsTarget {
  setPaintProperty(layerId: string, name: string, value: unknown): unknown;
  setLayoutProperty(layerId: string, name: string, value: unknown): unknown;
  setPitch(pitch: number): unknown;
}

/**
 * Push visual settings onto an already-initialized map.
 * Only properties that differ from `previous` are touched.
 */
export function applySettings(map: SettingsTarget, settings: ViewSettings, previous?: ViewSettings): void {
  if (!previous || previous.elevationScale !== settings.elevationScale) {
    map.setPaintProperty(EXTRUSION_LAYER_ID, 'fill-extrusion-height', extrusionHeight(settings.elevationScale));
  }
  if (!previous || previous.opacity !== settings.opacity) {
    map.setPaintProperty(EXTRUSION_LAYER_ID, 'fill-extrusion-opacity', extrusionOpacity(settings.opacity));
  }
  if (!previous || previous.wireframe !== settings.wireframe) {
    map.setLayoutProperty(OUTLINE_LAYER_ID, 'visibility', visibility(settings.wireframe));
  }
  if (!previous || previous.baseMap !== settings.baseMap) {
    for (const [layerId, value] of baseMapVisibility(settings.baseMap)) {
      map.setLayoutProperty(layerId, 'visibility', value);
    }
  }
  if (!previous || previous.pitch !== settings.pitch) {
    map.setPitch(settings.pitch);
  }
}
