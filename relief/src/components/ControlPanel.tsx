import { BASE_MAP_OPTIONS, CONTROLS, clampToControl, isBaseMapStyle, type RangeControl } from '../settings';
import type { ViewSettings } from '../types/county';

interface ControlPanelProps {
  settings: ViewSettings;
  onChange: (settings: ViewSettings) => void;
}

type RangeKey = keyof typeof CONTROLS;

export function ControlPanel({ settings, onChange }: ControlPanelProps) {
  const update = <K extends keyof ViewSettings>(key: K, value: ViewSettings[K]) => {
    onChange({ ...settings, [key]: value });
  };

  const renderRange = (key: RangeKey, control: RangeControl, format: (value: number) => string) => {
    const id = `control-${key}`;
    return (
      <div style={styles.field}>
        <label htmlFor={id} style={styles.label}>
          <span>{control.label}</span>
          <span style={styles.value}>{format(settings[key])}</span>
        </label>
        <input
          id={id}
          type="range"
          min={control.min}
          max={control.max}
          step={control.step}
          value={settings[key]}
          onChange={(e) => update(key, clampToControl(control, Number(e.target.value)))}
          style={styles.slider}
        />
        {control.hint && <div style={styles.hint}>{control.hint}</div>}
      </div>
    );
  };

  return (
    <aside style={styles.panel}>
      <div style={styles.heading}>Controls</div>

      {renderRange('elevationScale', CONTROLS.elevationScale, (v) => v.toLocaleString('en-US'))}
      {renderRange('pitch', CONTROLS.pitch, (v) => `${v}°`)}
      {renderRange('opacity', CONTROLS.opacity, (v) => v.toFixed(2))}

      <div style={styles.field}>
        <label htmlFor="control-baseMap" style={styles.label}>
          <span>Base Map</span>
        </label>
        <select
          id="control-baseMap"
          style={styles.select}
          value={settings.baseMap}
          onChange={(e) => {
            if (isBaseMapStyle(e.target.value)) update('baseMap', e.target.value);
          }}
        >
          {BASE_MAP_OPTIONS.map((opt) => (
            <option key={opt.value} value={opt.value}>
              {opt.label}
            </option>
          ))}
        </select>
      </div>

      <button
        type="button"
        style={{
          ...styles.toggleButton,
          background: settings.wireframe ? 'rgba(77, 175, 74, 0.3)' : 'rgba(255,255,255,0.1)',
          borderColor: settings.wireframe ? '#4daf4a' : 'rgba(255,255,255,0.2)',
        }}
        aria-pressed={settings.wireframe}
        onClick={() => update('wireframe', !settings.wireframe)}
      >
        Wireframe {settings.wireframe ? 'On' : 'Off'}
      </button>
    </aside>
  );
}

const styles: Record<string, React.CSSProperties> = {
  panel: {
    position: 'absolute',
    top: 16,
    right: 16,
    width: 240,
    background: 'rgba(0, 0, 0, 0.85)',
    backdropFilter: 'blur(8px)',
    color: 'white',
    padding: '14px 16px',
    borderRadius: 8,
    fontFamily: 'system-ui, sans-serif',
    fontSize: 12,
    display: 'flex',
    flexDirection: 'column',
    gap: 14,
  },
  heading: {
    fontWeight: 'bold',
    fontSize: 13,
  },
  field: {
    display: 'flex',
    flexDirection: 'column',
    gap: 6,
  },
  label: {
    display: 'flex',
    justifyContent: 'space-between',
    opacity: 0.9,
  },
  value: {
    fontVariantNumeric: 'tabular-nums',
    opacity: 0.7,
  },
  slider: {
    width: '100%',
    accentColor: '#4daf4a',
    cursor: 'pointer',
  },
  hint: {
    fontSize: 10,
    opacity: 0.5,
  },
  select: {
    background: 'rgba(255,255,255,0.1)',
    border: '1px solid rgba(255,255,255,0.2)',
    borderRadius: 4,
    color: 'white',
    padding: '6px 8px',
    fontSize: 12,
    cursor: 'pointer',
  },
  toggleButton: {
    border: '1px solid',
    borderRadius: 4,
    color: 'white',
    padding: '6px 10px',
    fontSize: 12,
    cursor: 'pointer',
  },
};
