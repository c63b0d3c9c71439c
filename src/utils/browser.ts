import { chromium } from 'playwright';
import type { RenderConfig, RenderWaits } from '../config.js';
import { FetchError } from '../errors.js';
import { ConcurrencyGate } from './concurrency.js';
import { logSafely } from './logger.js';
import type { Logger } from './logger.js';

/** The slice of Playwright's `Page` a render pass drives. */
export interface RenderPage {
  setDefaultNavigationTimeout(timeout: number): void;
  goto(url: string, options: { waitUntil: 'domcontentloaded' }): Promise<unknown>;
  waitForTimeout(timeout: number): Promise<void>;
  waitForSelector(selector: string, options: { state: 'attached'; timeout: number }): Promise<unknown>;
  evaluate(script: string): Promise<unknown>;
  content(): Promise<string>;
}

export interface RenderBrowser {
  newContext(options: {
    userAgent: string;
    viewport: { width: number; height: number };
  }): Promise<{ newPage(): Promise<RenderPage> }>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<RenderBrowser>;

const LAUNCH_ARGS = [
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-blink-features=AutomationControlled',
];

export const launchChromium: BrowserLauncher = () =>
  chromium.launch({
    headless: true,
    args: LAUNCH_ARGS,
  });

/**
 * Rendered-mode fetcher. Each call owns a fresh browser that is closed before
 * the call returns, whatever happens in between.
 */
export class BrowserRenderer {
  private readonly gate: ConcurrencyGate;

  constructor(
    private readonly config: RenderConfig,
    private readonly logger: Logger,
    private readonly launch: BrowserLauncher = launchChromium,
  ) {
    this.gate = new ConcurrencyGate(config.maxConcurrentSessions);
  }

  async render(url: string, waits: RenderWaits = this.config.listing): Promise<string> {
    return this.gate.run(() => this.renderInSession(url, waits));
  }

  private async renderInSession(url: string, waits: RenderWaits): Promise<string> {
    let browser: RenderBrowser | undefined;
    try {
      browser = await this.launch();
      const context = await browser.newContext({
        userAgent: this.config.userAgent,
        viewport: { width: 1920, height: 1080 },
      });
      const page = await context.newPage();
      page.setDefaultNavigationTimeout(this.config.navigationTimeoutMs);

      await this.logger.info(`Rendering ${url}`);
      await page.goto(url, { waitUntil: 'domcontentloaded' });
      await page.waitForTimeout(waits.initialWaitMs);
      await this.waitForContent(page, url, waits.readySelectors);
      await page.waitForTimeout(this.config.settleMs);

      // One bottom-and-back pass triggers lazy-loaded listings.
      await page.evaluate('window.scrollTo(0, document.body.scrollHeight)');
      await page.waitForTimeout(this.config.scrollBottomMs);
      await page.evaluate('window.scrollTo(0, 0)');
      await page.waitForTimeout(this.config.scrollTopMs);

      const html = await page.content();
      await this.logger.info(`Rendered ${url} (${html.length} bytes)`);
      return html;
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(`Rendering ${url} failed: ${String(error)}`, url);
    } finally {
      if (browser) {
        await browser.close().catch(async (closeError: unknown) => {
          await logSafely(this.logger.warn(`Closing browser for ${url} failed: ${String(closeError)}`));
        });
      }
    }
  }

  private async waitForContent(page: RenderPage, url: string, selectors: string[]): Promise<void> {
    for (const selector of selectors) {
      try {
        await page.waitForSelector(selector, { state: 'attached', timeout: this.config.contentTimeoutMs });
        return;
      } catch {
        // Try the next, looser selector.
      }
    }
    await logSafely(this.logger.warn(`No ready selector matched on ${url}; continuing with current DOM`));
  }
}
