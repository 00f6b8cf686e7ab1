import { useEffect, useRef, useState } from 'react';
import maplibregl from 'maplibre-gl';
import { createBaseStyle } from '../map/basemaps';
import {
  COUNTY_SOURCE_ID,
  EXTRUSION_LAYER_ID,
  applySettings,
  countySource,
  extrusionLayer,
  outlineLayer,
} from '../map/county-layers';
import { renderCountyTooltip } from '../map/tooltip';
import { INITIAL_VIEW } from '../settings';
import type { CountyCollection, ViewSettings } from '../types/county';

interface CountyMapViewProps {
  data: CountyCollection;
  settings: ViewSettings;
}

export function CountyMapView({ data, settings }: CountyMapViewProps) {
  // Callback ref so the map is created once the container is mounted
  const [mapContainer, setMapContainer] = useState<HTMLDivElement | null>(null);
  const map = useRef<maplibregl.Map | null>(null);
  const [mapLoaded, setMapLoaded] = useState(false);

  // Latest settings for the load handler; last applied settings for diffing
  const settingsRef = useRef(settings);
  settingsRef.current = settings;
  const applied = useRef<ViewSettings | null>(null);

  useEffect(() => {
    if (map.current || !mapContainer) return;

    const initial = settingsRef.current;
    const instance = new maplibregl.Map({
      container: mapContainer,
      style: createBaseStyle(initial.baseMap),
      center: INITIAL_VIEW.center,
      zoom: INITIAL_VIEW.zoom,
      bearing: INITIAL_VIEW.bearing,
      pitch: initial.pitch,
      minZoom: INITIAL_VIEW.minZoom,
      maxZoom: INITIAL_VIEW.maxZoom,
      maxPitch: 60,
    });
    map.current = instance;

    instance.addControl(new maplibregl.NavigationControl({ visualizePitch: true }), 'bottom-right');

    instance.on('error', (e) => {
      console.error('Map error:', e.error);
    });

    const popup = new maplibregl.Popup({ closeButton: false, closeOnClick: false, offset: 8 });
    let hoveredId: string | number | null = null;

    const clearHover = () => {
      if (hoveredId !== null) {
        instance.setFeatureState({ source: COUNTY_SOURCE_ID, id: hoveredId }, { hover: false });
        hoveredId = null;
      }
      popup.remove();
      instance.getCanvas().style.cursor = '';
    };

    instance.on('load', () => {
      const current = settingsRef.current;
      instance.addSource(COUNTY_SOURCE_ID, countySource(data));
      instance.addLayer(extrusionLayer(current));
      instance.addLayer(outlineLayer(current));
      applied.current = current;

      instance.on('mousemove', EXTRUSION_LAYER_ID, (e) => {
        const feature = e.features?.[0];
        if (!feature || feature.id === undefined) return;

        if (hoveredId !== feature.id) {
          clearHover();
          hoveredId = feature.id;
          instance.setFeatureState({ source: COUNTY_SOURCE_ID, id: hoveredId }, { hover: true });
        }

        instance.getCanvas().style.cursor = 'pointer';
        popup.setLngLat(e.lngLat).setHTML(renderCountyTooltip(feature.properties)).addTo(instance);
      });

      instance.on('mouseleave', EXTRUSION_LAYER_ID, clearHover);

      setMapLoaded(true);
    });

    return () => {
      popup.remove();
      instance.remove();
      map.current = null;
      applied.current = null;
      setMapLoaded(false);
    };
  }, [mapContainer, data]);

  useEffect(() => {
    if (!map.current || !mapLoaded) return;
    applySettings(map.current, settings, applied.current ?? undefined);
    applied.current = settings;
  }, [settings, mapLoaded]);

  return <div ref={setMapContainer} style={{ width: '100%', height: '100%' }} />;
}
