/** Stops of the population color ramp, by population percentile */
export const RAMP_STOPS: Array<{ quantile: number; color: string }> = [
  { quantile: 0, color: 'rgb(30, 60, 150)' },
  { quantile: 0.25, color: 'rgb(30, 200, 255)' },
  { quantile: 0.5, color: 'rgb(130, 255, 155)' },
  { quantile: 0.75, color: 'rgb(255, 200, 50)' },
  { quantile: 1, color: 'rgb(255, 70, 0)' },
];

export function rampGradient(): string {
  const stops = RAMP_STOPS.map(({ quantile, color }) => `${color} ${quantile * 100}%`);
  return `linear-gradient(to right, ${stops.join(', ')})`;
}

interface LegendProps {
  countyCount: number;
}

export function Legend({ countyCount }: LegendProps) {
  return (
    <div style={styles.legend}>
      <div style={styles.title}>Population percentile</div>
      <div style={{ ...styles.bar, background: rampGradient() }} />
      <div style={styles.labels}>
        {RAMP_STOPS.map(({ quantile }) => (
          <span key={quantile}>{Math.round(quantile * 100)}</span>
        ))}
      </div>
      <div style={styles.note}>Height: log₁₀ population</div>
      <div style={styles.note}>{countyCount.toLocaleString('en-US')} counties</div>
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  legend: {
    position: 'absolute',
    bottom: 40,
    left: 16,
    width: 200,
    background: 'rgba(0,0,0,0.8)',
    color: 'white',
    padding: '12px 16px',
    borderRadius: 8,
    fontFamily: 'system-ui, sans-serif',
    fontSize: 11,
  },
  title: {
    fontWeight: 'bold',
    marginBottom: 8,
  },
  bar: {
    height: 10,
    borderRadius: 2,
  },
  labels: {
    display: 'flex',
    justifyContent: 'space-between',
    marginTop: 4,
    opacity: 0.7,
  },
  note: {
    marginTop: 6,
    opacity: 0.6,
  },
};
