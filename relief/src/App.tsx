import { useState } from 'react';
import 'maplibre-gl/dist/maplibre-gl.css';
import { Header } from './components/Header';
import { CountyMapView } from './components/CountyMapView';
import { ControlPanel } from './components/ControlPanel';
import { Legend } from './components/Legend';
import { Attribution } from './components/Attribution';
import { createArtifactLoader } from './data/artifact';
import { useCountyData } from './hooks/useCountyData';
import { ARTIFACT_URL, DEFAULT_SETTINGS } from './settings';
import type { ViewSettings } from './types/county';

interface AppProps {
  artifactUrl?: string;
}

export function App({ artifactUrl = ARTIFACT_URL }: AppProps) {
  // One loader per app session
  const [loader] = useState(() => createArtifactLoader(artifactUrl));
  const { data, loading, error } = useCountyData(loader);
  const [settings, setSettings] = useState<ViewSettings>(DEFAULT_SETTINGS);

  if (error) {
    return (
      <div style={styles.message}>
        <p>Could not load county data.</p>
        <p style={styles.detail}>{error}</p>
        <p style={styles.detail}>Run `npm run data` to prepare it, then reload.</p>
      </div>
    );
  }

  if (loading || !data) {
    return <div style={styles.message}>Loading counties…</div>;
  }

  return (
    <div style={{ width: '100%', height: '100%', position: 'relative' }}>
      <Header />
      <div style={{ position: 'absolute', top: 41, left: 0, right: 0, bottom: 0 }}>
        <CountyMapView data={data} settings={settings} />
        <ControlPanel settings={settings} onChange={setSettings} />
        <Legend countyCount={data.features.length} />
        <Attribution />
      </div>
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  message: {
    padding: 20,
    color: 'white',
    background: '#1a1a1a',
    height: '100%',
    fontFamily: 'system-ui, sans-serif',
  },
  detail: {
    fontSize: 12,
    opacity: 0.7,
  },
};
