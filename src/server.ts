import { loadConfig } from './config.js';
import { createScrapeContext } from './context.js';
import { createApp } from './server/app.js';
import { ConsoleLogger, RunLogger } from './utils/logger.js';
import type { Logger } from './utils/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  let logger: Logger = new ConsoleLogger('api');
  if (config.logFile) {
    const runLogger = new RunLogger(config.logFile, 'Job scraper API');
    await runLogger.init();
    logger = runLogger;
  }

  const app = createApp(createScrapeContext(config, logger));
  app.listen(config.port, () => {
    logger.info(`Job scraper API listening on http://localhost:${config.port}`).catch((error: unknown) => {
      console.error(`Logging failed: ${String(error)}`);
    });
  });
}

main().catch((error) => {
  console.error(`Job scraper API failed to start: ${String(error)}`);
  process.exitCode = 1;
});
