/**
 * US county population preparation pipeline.
 *
 * Fetches county boundaries and ACS total population, joins them by FIPS and
 * writes the artifacts the relief viewer loads.
 *
 * Usage:
 *   npm run pipeline:counties -w strata -- [--year 2024] [--refresh]
 */

import { openCache, type SourceCache } from '../../core/cache.js';
import { parseArgs } from './lib/options.js';
import { runPipeline } from './lib/pipeline.js';

async function main() {
  console.log('='.repeat(70));
  console.log('US County Population - Data Preparation');
  console.log('='.repeat(70));

  const options = parseArgs(process.argv.slice(2), process.env);
  const cache: SourceCache | null = options.useCache ? await openCache() : null;

  try {
    const result = await runPipeline(options, cache);

    console.log(`\n${'='.repeat(70)}`);
    console.log('SUCCESS: Data preparation complete');
    console.log('='.repeat(70));
    console.log(`\n${result.matched.toLocaleString()} counties written to ${options.outputDir}`);
    console.log('Next: npm run serve');
  } finally {
    cache?.close();
  }
}

main().catch(err => {
  console.error('Error:', err instanceof Error ? err.message : err);
  if (err instanceof Error) console.error(err.stack);
  process.exit(1);
});
