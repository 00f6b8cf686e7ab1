export function Attribution() {
  return (
    <div style={styles.footer}>
      Population: US Census Bureau, ACS 5-year (B01003_001E) · Boundaries: US Census cartographic
      files via Plotly datasets
    </div>
  );
}

const styles: Record<string, React.CSSProperties> = {
  footer: {
    position: 'absolute',
    bottom: 8,
    left: 16,
    color: 'rgba(255,255,255,0.6)',
    fontFamily: 'system-ui, sans-serif',
    fontSize: 10,
    pointerEvents: 'none',
  },
};
