#!/usr/bin/env npx tsx
/**
 * Collection CLI
 *
 * Runs one collection pass over the configured sources and writes the
 * intermediate data file for report generation.
 *
 * Usage:
 *   npx tsx cli/collect.ts
 *   npx tsx cli/collect.ts --config ./config/sources.json --output ./data
 *
 * Options:
 *   --config, -c   Source configuration (JSON, default: config/sources.json)
 *   --output, -o   Directory for the data file (default: output.dataDir from the config)
 *   --quiet, -q    Only log warnings and errors
 *   --help, -h     Show this help message
 *
 * Exit codes: 0 after a completed run (even if some sources failed),
 * 1 for an invalid configuration or an unexpected failure.
 */

import { CollectionRun } from '../lib/collection-run';
import { readConfigFile, type CollectorConfig } from '../lib/config';
import { ConfigurationError, errorMessage } from '../lib/errors';
import { createLogger } from '../lib/logger';
import { toReportPayload, writeReportPayload } from '../lib/report-payload';

// ============================================================================
// Argument Parsing
// ============================================================================

interface CliArgs {
  config: string;
  output?: string;
  quiet: boolean;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const result: CliArgs = {
    config: 'config/sources.json',
    output: undefined,
    quiet: false,
    help: false
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--config':
      case '-c':
        result.config = args[++i] || result.config;
        break;
      case '--output':
      case '-o':
        result.output = args[++i];
        break;
      case '--quiet':
      case '-q':
        result.quiet = true;
        break;
      case '--help':
      case '-h':
        result.help = true;
        break;
      default:
        console.error(`Ignoring unknown argument: ${arg}`);
        break;
    }
  }

  return result;
}

function showHelp() {
  console.log(`
Competitive Intelligence Collector

Usage:
  npx tsx cli/collect.ts [options]

Examples:
  npx tsx cli/collect.ts                                # config/sources.json → data/
  npx tsx cli/collect.ts -c ./my-sources.json -o ./out  # custom config and output
  npx tsx cli/collect.ts -q                             # warnings and errors only

Options:
  -c, --config <path>   Source configuration file (default: config/sources.json)
  -o, --output <dir>    Directory for the data file (default: output.dataDir)
  -q, --quiet           Only log warnings and errors
  -h, --help            Show this help message
`);
}

// ============================================================================
// Main
// ============================================================================

async function main() {
  const args = parseArgs(process.argv);

  if (args.help) {
    showHelp();
    return;
  }

  const logger = createLogger({ level: args.quiet ? 'warn' : 'info' });

  let config: CollectorConfig;
  try {
    config = await readConfigFile(args.config);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  // Ctrl-C stops pending sources; finished ones are still written
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('🛑 Interrupted, finishing with the sources collected so far');
    controller.abort();
  });

  const run = CollectionRun.fromConfig(config, { logger });
  const result = await run.execute(config.sources, { signal: controller.signal });

  const outputDir = args.output ?? config.output.dataDir;
  const filePath = await writeReportPayload(outputDir, toReportPayload(result));

  const { totals } = result.metrics;
  logger.info(`💾 Data written to: ${filePath}`);
  if (!args.quiet) {
    console.error(`\n--- Summary ---`);
    console.error(`Sources: ${totals.sourcesSucceeded}/${totals.sourcesAttempted} succeeded`);
    console.error(`Articles: ${totals.totalArticles}`);
    console.error(`Rejected: ${totals.rejected}, duplicates: ${totals.duplicates}`);
    for (const source of result.metrics.sources.filter(entry => !entry.success)) {
      console.error(`  ✗ ${source.source}: ${source.error?.message ?? 'unknown error'}`);
    }
  }
}

main().catch(error => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
