import type { BaseMapStyle, ViewSettings } from './types/county';

export interface RangeControl {
  label: string;
  min: number;
  max: number;
  step: number;
  hint?: string;
}

export const CONTROLS = {
  elevationScale: {
    label: 'Elevation Scale',
    min: 1000,
    max: 80000,
    step: 1000,
    hint: 'Multiplier for county extrusion height (based on log₁₀ population)',
  },
  pitch: {
    label: 'Pitch (tilt)',
    min: 0,
    max: 60,
    step: 5,
  },
  opacity: {
    label: 'Opacity',
    min: 0.1,
    max: 1.0,
    step: 0.05,
  },
} satisfies Record<'elevationScale' | 'pitch' | 'opacity', RangeControl>;

export const BASE_MAP_OPTIONS: Array<{ label: string; value: BaseMapStyle }> = [
  { label: 'Dark', value: 'dark' },
  { label: 'Light', value: 'light' },
  { label: 'Satellite', value: 'satellite' },
  { label: 'Road', value: 'road' },
];

export const DEFAULT_SETTINGS: ViewSettings = {
  elevationScale: 20000,
  pitch: 45,
  opacity: 0.85,
  baseMap: 'dark',
  wireframe: true,
};

export interface InitialView {
  center: [number, number];
  zoom: number;
  bearing: number;
  minZoom: number;
  maxZoom: number;
}

export const INITIAL_VIEW: InitialView = {
  center: [-96.0, 38.5],
  zoom: 3.8,
  bearing: 0,
  minZoom: 2,
  maxZoom: 15,
};

export const ARTIFACT_URL = '/data/us-counties/counties.geojson';

export function isBaseMapStyle(value: string): value is BaseMapStyle {
  return BASE_MAP_OPTIONS.some((option) => option.value === value);
}

/** Clamp a control value into its range and snap it to the step grid. */
export function clampToControl(control: RangeControl, value: number): number {
  const clamped = Math.min(control.max, Math.max(control.min, value));
  const steps = Math.round((clamped - control.min) / control.step);
  // Avoid 0.30000000000000004-style drift on fractional steps
  return Number((control.min + steps * control.step).toFixed(6));
}
