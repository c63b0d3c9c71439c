export interface RenderWaits {
  /** Fixed delay after navigation, before looking for content. */
  initialWaitMs: number;
  /** CSS selectors tried in order; the first that appears ends the content wait. */
  readySelectors: string[];
}

export interface RenderConfig {
  listing: RenderWaits;
  detail: RenderWaits;
  navigationTimeoutMs: number;
  contentTimeoutMs: number;
  settleMs: number;
  scrollBottomMs: number;
  scrollTopMs: number;
  maxConcurrentSessions: number;
  userAgent: string;
}

export interface AppConfig {
  port: number;
  logFile?: string;
  httpTimeoutMs: number;
  detailConcurrency: number;
  render: RenderConfig;
}

const READY_SELECTORS = ["a[href*='/job/']", 'main'];

export const DEFAULT_CONFIG: AppConfig = {
  port: 8000,
  httpTimeoutMs: 20000,
  detailConcurrency: 1,
  render: {
    listing: { initialWaitMs: 15000, readySelectors: READY_SELECTORS },
    detail: { initialWaitMs: 10000, readySelectors: READY_SELECTORS },
    navigationTimeoutMs: 30000,
    contentTimeoutMs: 20000,
    settleMs: 5000,
    scrollBottomMs: 2000,
    scrollTopMs: 1000,
    maxConcurrentSessions: 2,
    userAgent:
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  },
};

function readInt(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < min) {
    return fallback;
  }
  return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const defaults = DEFAULT_CONFIG;
  const logFile = env.LOG_FILE?.trim();

  const render: RenderConfig = Object.freeze({
    ...defaults.render,
    listing: Object.freeze({
      ...defaults.render.listing,
      initialWaitMs: readInt(env.RENDER_INITIAL_WAIT_MS, defaults.render.listing.initialWaitMs),
    }),
    detail: Object.freeze({
      ...defaults.render.detail,
      initialWaitMs: readInt(env.RENDER_DETAIL_WAIT_MS, defaults.render.detail.initialWaitMs),
    }),
    contentTimeoutMs: readInt(env.RENDER_CONTENT_TIMEOUT_MS, defaults.render.contentTimeoutMs),
    settleMs: readInt(env.RENDER_SETTLE_MS, defaults.render.settleMs),
    maxConcurrentSessions: readInt(env.RENDER_MAX_SESSIONS, defaults.render.maxConcurrentSessions, 1),
  });

  return Object.freeze({
    port: readInt(env.PORT, defaults.port, 1),
    logFile: logFile ? logFile : undefined,
    httpTimeoutMs: readInt(env.HTTP_TIMEOUT_MS, defaults.httpTimeoutMs, 1),
    detailConcurrency: readInt(env.DETAIL_CONCURRENCY, defaults.detailConcurrency, 1),
    render,
  });
}
