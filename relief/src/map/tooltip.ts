const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

function readString(props: Record<string, unknown>, key: string): string {
  const value = props[key];
  return typeof value === 'string' || typeof value === 'number' ? String(value) : '';
}

/**
 * Hover tooltip for a county. Properties arrive from rendered features,
 * so nothing about their shape is assumed.
 */
export function renderCountyTooltip(props: Record<string, unknown>): string {
  const name = escapeHtml(readString(props, 'countyName'));
  const fips = escapeHtml(readString(props, 'fips'));
  const population = escapeHtml(readString(props, 'populationFormatted'));

  return `
    <div style="font-family: system-ui, sans-serif; font-size: 12px;">
      <strong>${name}</strong><br/>
      FIPS: ${fips}<br/>
      Population: ${population}
    </div>
  `;
}
