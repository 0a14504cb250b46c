/** K/M/B abbreviation at the 1e3/1e6/1e9 thresholds, one decimal. */
export function formatGdp(value: number): string {
  if (value >= 1_000_000_000) return `${(value / 1_000_000_000).toFixed(1)}B`;
  if (value >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
  if (value >= 1_000) return `${(value / 1_000).toFixed(1)}K`;
  return String(value);
}

const pad = (n: number) => String(n).padStart(2, '0');

/** `YYYY-MM-DD HH:MM:SS UTC` */
export function formatReportTimestamp(at: Date): string {
  const date = `${at.getUTCFullYear()}-${pad(at.getUTCMonth() + 1)}-${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}:${pad(at.getUTCMinutes())}:${pad(at.getUTCSeconds())}`;
  return `${date} ${time} UTC`;
}

/**
 * flagcdn serves SVG flags by default; the same flag exists as an 80px PNG
 * under /w80/. Other URLs pass through unchanged.
 */
export function toRasterFlagUrl(url: string): string {
  if (url.includes('flagcdn.com') && url.endsWith('.svg')) {
    return url.replace('.svg', '.png').replace('flagcdn.com/', 'flagcdn.com/w80/');
  }
  return url;
}

export type SummaryEntry = {
  name: string;
  estimatedGdp: string | null;
  flagUrl: string | null;
};

export function formatEntryLine(rank: number, entry: SummaryEntry): string {
  if (entry.estimatedGdp === null) return `${rank}. ${entry.name} - N/A`;
  return `${rank}. ${entry.name} - $${formatGdp(Number(entry.estimatedGdp))}`;
}
