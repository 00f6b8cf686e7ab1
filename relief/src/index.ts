export { parseCountyCollection, createArtifactLoader, fetchCountyCollection, ArtifactError } from './data/artifact';
export type { ArtifactLoader } from './data/artifact';

export {
  countySource,
  extrusionLayer,
  outlineLayer,
  extrusionHeight,
  extrusionColor,
  extrusionOpacity,
  applySettings,
} from './map/county-layers';
export type { SettingsTarget } from './map/county-layers';

export { createBaseStyle, BASE_MAP_SOURCES } from './map/basemaps';
export { renderCountyTooltip, escapeHtml } from './map/tooltip';
export { CONTROLS, DEFAULT_SETTINGS, INITIAL_VIEW, clampToControl } from './settings';

export type { CountyCollection, CountyFeature, CountyProperties, ViewSettings, BaseMapStyle } from './types/county';
