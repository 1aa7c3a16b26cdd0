/**
 * DCF valuation CLI
 * Values each ticker under the base, optimistic and pessimistic scenarios
 *
 * Usage: npx tsx scripts/dcf_analyze.ts --tickers NVDA AAPL [--source=file] [--no-cache] [--json]
 */

import '../src/core/load_env';
import { analyzeTickers } from '../src/analysis/analyze';
import { CliUsageError, USAGE, parseCliArgs, type CliArgs } from '../src/cli/args';
import { getConfig } from '../src/core/config';
import { closeDatabase } from '../src/data/db';
import { createProvider } from '../src/providers/registry';
import { renderAnalysis, renderJson } from '../src/report/console';
import { createChildLogger } from '../src/utils/logger';

const logger = createChildLogger('dcf_analyze');

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(`${error.message}\n${USAGE}`);
      return 2;
    }
    throw error;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  const config = getConfig();
  const provider = createProvider(args.source ?? undefined, {
    dataDir: args.dataDir ?? undefined,
  });
  logger.info(
    { tickers: args.tickers, source: provider.name, useCache: args.useCache },
    'Starting DCF analysis'
  );

  try {
    const analyses = await analyzeTickers(
      args.tickers,
      provider,
      { useCache: args.useCache, policy: config.policy },
      args.json ? undefined : (analysis) => console.log(`\n${renderAnalysis(analysis)}`)
    );

    if (args.json) {
      console.log(renderJson(analyses));
    }

    logger.info({ requests: provider.getRequestCount() }, 'DCF analysis finished');
    return analyses.every((a) => a.status === 'failed') ? 1 : 0;
  } finally {
    provider.close();
    closeDatabase();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error({ error }, 'DCF analysis aborted');
    process.exitCode = 1;
  });
