import { loadConfig } from './config.js';
import { createScrapeContext } from './context.js';
import { scrapeAll, scrapeWithDetails } from './pipeline/scrape.js';
import { DEFAULT_LIMIT } from './server/params.js';
import { ConsoleLogger, RunLogger } from './utils/logger.js';

interface CliArgs {
  source: string;
  limit: number;
  details: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    source: 'all',
    limit: DEFAULT_LIMIT,
    details: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--source' && argv[i + 1]) {
      args.source = argv[i + 1];
      i += 1;
      continue;
    }
    if (arg === '--limit' && argv[i + 1]) {
      const parsed = Number(argv[i + 1]);
      if (Number.isFinite(parsed) && parsed > 0) {
        args.limit = Math.floor(parsed);
      }
      i += 1;
      continue;
    }
    if (arg === '--details') {
      args.details = true;
    }
  }

  return args;
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const runLogger = config.logFile ? new RunLogger(config.logFile, 'Scrape run') : undefined;
  if (runLogger) {
    await runLogger.init();
  }

  const ctx = createScrapeContext(config, runLogger ?? new ConsoleLogger('scrape'));
  try {
    const jobs =
      args.source === 'all'
        ? await scrapeAll(ctx, args.limit, args.details)
        : await scrapeWithDetails(ctx, args.source, args.limit, args.details);
    process.stdout.write(`${JSON.stringify(jobs, null, 2)}\n`);
  } finally {
    await runLogger?.close();
  }
}

main().catch((error) => {
  console.error(`Scrape failed: ${String(error)}`);
  process.exitCode = 1;
});
