/**
 * Command line and environment options for the county population pipeline.
 */

export const DEFAULT_ACS_YEAR = 2024;
export const DEFAULT_MAX_AGE_HOURS = 24;

export const DEFAULT_OUTPUT_DIR = new URL(
  '../../../../../relief/public/data/us-counties',
  import.meta.url
).pathname;

export interface PipelineOptions {
  year: number;
  outputDir: string;
  /** Ignore cached upstream records and fetch again */
  refresh: boolean;
  /** Skip the SQLite cache entirely */
  useCache: boolean;
  maxAgeHours: number;
  censusApiKey?: string;
  timeoutMs: number;
}

export const USAGE = [
  'Usage: county-population [options]',
  'Options:',
  `  --year <n>        ACS 5-year vintage (default: ${DEFAULT_ACS_YEAR})`,
  '  --out <dir>       Output directory (default: relief/public/data/us-counties)',
  '  --refresh         Fetch again even when cached records are fresh',
  `  --max-age <h>     Cache freshness window in hours (default: ${DEFAULT_MAX_AGE_HOURS})`,
  '  --no-cache        Do not read or write the source cache',
  'Environment:',
  '  CENSUS_API_KEY    Census Bureau API key (optional)',
].join('\n');

function parsePositiveInt(flag: string, value: string | undefined): number {
  const n = value === undefined ? NaN : Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new Error(`${flag} expects a positive integer, got ${value ?? 'nothing'}\n\n${USAGE}`);
  }
  return n;
}

export function parseArgs(
  args: string[],
  env: Record<string, string | undefined> = {}
): PipelineOptions {
  const result: PipelineOptions = {
    year: DEFAULT_ACS_YEAR,
    outputDir: DEFAULT_OUTPUT_DIR,
    refresh: false,
    useCache: true,
    maxAgeHours: DEFAULT_MAX_AGE_HOURS,
    censusApiKey: env.CENSUS_API_KEY || undefined,
    timeoutMs: 60_000,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--year':
        result.year = parsePositiveInt(arg, args[++i]);
        break;
      case '--out': {
        const dir = args[++i];
        if (!dir) throw new Error(`--out expects a directory\n\n${USAGE}`);
        result.outputDir = dir;
        break;
      }
      case '--refresh':
        result.refresh = true;
        break;
      case '--max-age':
        result.maxAgeHours = parsePositiveInt(arg, args[++i]);
        break;
      case '--no-cache':
        result.useCache = false;
        break;
      default:
        throw new Error(`Unknown option: ${arg}\n\n${USAGE}`);
    }
  }

  return result;
}
