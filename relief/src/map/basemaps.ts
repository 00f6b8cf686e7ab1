import type { StyleSpecification, RasterSourceSpecification, RasterLayerSpecification } from 'maplibre-gl';
import type { BaseMapStyle } from '../types/county';

function cartoTiles(path: string): string[] {
  return ['a', 'b', 'c'].map((s) => `https://${s}.basemaps.cartocdn.com/${path}/{z}/{x}/{y}@2x.png`);
}

const CARTO_ATTRIBUTION = '&copy; OpenStreetMap &copy; CARTO';

export const BASE_MAP_SOURCES: Record<BaseMapStyle, RasterSourceSpecification> = {
  dark: {
    type: 'raster',
    tiles: cartoTiles('dark_all'),
    tileSize: 256,
    attribution: CARTO_ATTRIBUTION,
  },
  light: {
    type: 'raster',
    tiles: cartoTiles('light_all'),
    tileSize: 256,
    attribution: CARTO_ATTRIBUTION,
  },
  satellite: {
    type: 'raster',
    tiles: ['https://server.arcgisonline.com/ArcGIS/rest/services/World_Imagery/MapServer/tile/{z}/{y}/{x}'],
    tileSize: 256,
    attribution: 'Tiles &copy; Esri',
  },
  road: {
    type: 'raster',
    tiles: cartoTiles('rastertiles/voyager'),
    tileSize: 256,
    attribution: CARTO_ATTRIBUTION,
  },
};

export function baseMapLayerId(style: BaseMapStyle): string {
  return `basemap-${style}`;
}

/**
 * One style holding every base map, with only the selected one visible.
 * Switching is a visibility change, so county layers survive it.
 */
export function createBaseStyle(selected: BaseMapStyle): StyleSpecification {
  const styles = Object.keys(BASE_MAP_SOURCES).filter(isKnownStyle);

  return {
    version: 8,
    sources: Object.fromEntries(styles.map((style) => [`basemap-${style}`, BASE_MAP_SOURCES[style]])),
    layers: styles.map((style) => rasterLayer(style, style === selected)),
  };
}

function rasterLayer(style: BaseMapStyle, visible: boolean): RasterLayerSpecification {
  return {
    id: baseMapLayerId(style),
    type: 'raster',
    source: `basemap-${style}`,
    minzoom: 0,
    maxzoom: 19,
    layout: { visibility: visible ? 'visible' : 'none' },
  };
}

export type Visibility = 'visible' | 'none';

export function baseMapVisibility(selected: BaseMapStyle): Array<[string, Visibility]> {
  return Object.keys(BASE_MAP_SOURCES)
    .filter(isKnownStyle)
    .map((style): [string, Visibility] => [baseMapLayerId(style), style === selected ? 'visible' : 'none']);
}

function isKnownStyle(key: string): key is BaseMapStyle {
  return key in BASE_MAP_SOURCES;
}
