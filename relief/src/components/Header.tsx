export function Header() {
  return (
    <header style={styles.header}>
      <div style={styles.brand}>
        <span style={styles.brandName}>Relief</span>
        <span style={styles.brandTagline}>US County Population</span>
      </div>
      <span style={styles.source}>ACS 5-year estimates</span>
    </header>
  );
}

const styles: Record<string, React.CSSProperties> = {
  header: {
    display: 'flex',
    alignItems: 'center',
    justifyContent: 'space-between',
    height: 41,
    boxSizing: 'border-box',
    padding: '8px 16px',
    background: '#1a1a1a',
    borderBottom: '1px solid #333',
    color: 'white',
    fontFamily: 'system-ui, sans-serif',
    flexShrink: 0,
  },
  brand: {
    display: 'flex',
    alignItems: 'baseline',
    gap: 12,
  },
  brandName: {
    fontSize: 18,
    fontWeight: 600,
    letterSpacing: '-0.02em',
  },
  brandTagline: {
    fontSize: 12,
    opacity: 0.6,
  },
  source: {
    fontSize: 11,
    opacity: 0.5,
  },
};
