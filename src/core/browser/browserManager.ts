import { chromium, firefox, webkit, type BrowserType, type LaunchOptions } from 'playwright';
import type { BrowserConfig, BrowserKind } from '../../types/schema';
import { ExtractionError, errorMessage, isExtractionError } from '../errors';
import defaultLogger, { Logger } from '../../utils/logger';
import { PlaywrightSession, type BrowserSession, type PageHandle } from './pageHandle';

export type LaunchStrategy = {
  kind: BrowserKind;
  launch: () => Promise<BrowserSession>;
};

type LaunchAttempt =
  | { ok: true; session: BrowserSession }
  | { ok: false; kind: BrowserKind; error: unknown };

const ENGINES: Record<BrowserKind, BrowserType> = { chromium, firefox, webkit };

export function playwrightStrategies(cfg: BrowserConfig, logger: Logger = defaultLogger): LaunchStrategy[] {
  const opts: LaunchOptions = {
    headless: cfg.headless,
    slowMo: cfg.slowMo,
    timeout: cfg.launchTimeout,
    ...(cfg.executablePath !== undefined ? { executablePath: cfg.executablePath } : {}),
  };
  const pageOptions = cfg.userAgent !== undefined ? { userAgent: cfg.userAgent } : {};
  return cfg.engines.map((kind) => ({
    kind,
    launch: async () => new PlaywrightSession(kind, await ENGINES[kind].launch(opts), pageOptions, logger),
  }));
}

function attempt(strategy: LaunchStrategy): Promise<LaunchAttempt> {
  return strategy.launch().then(
    (session): LaunchAttempt => ({ ok: true, session }),
    (error: unknown): LaunchAttempt => ({ ok: false, kind: strategy.kind, error })
  );
}

/** Automatically dismisses alert/confirm/prompt/beforeunload so automation never blocks on them. */
export function registerDialogAutoDismiss(page: PageHandle, logger: Logger = defaultLogger): void {
  page.onDialog(async (dialog) => {
    logger.info('Dialog detected', { type: dialog.type, message: dialog.message });
    await dialog.dismiss();
  });
}

export class BrowserManager {
  private strategies: LaunchStrategy[];

  constructor(
    private cfg: BrowserConfig,
    strategies?: LaunchStrategy[],
    private logger: Logger = defaultLogger.child({ name: 'browser' })
  ) {
    this.strategies = strategies ?? playwrightStrategies(cfg, this.logger);
  }

  /** Tries each engine in order; the first to launch is used for the whole request. */
  async launch(): Promise<BrowserSession> {
    let lastFailure: LaunchAttempt | null = null;
    for (const strategy of this.strategies) {
      this.logger.info('Launching browser', { kind: strategy.kind });
      const result = await attempt(strategy);
      if (result.ok) {
        this.logger.info('Browser launched', { kind: strategy.kind });
        return result.session;
      }
      this.logger.warn('Browser launch failed', { kind: result.kind, error: errorMessage(result.error) });
      lastFailure = result;
    }
    const cause = lastFailure && !lastFailure.ok ? errorMessage(lastFailure.error) : 'no browser engines configured';
    throw new ExtractionError('BrowserUnavailable', `Failed to launch any browser engine: ${cause}`);
  }

  async navigate(page: PageHandle, url: string): Promise<void> {
    this.logger.info('Navigating', { url });
    try {
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.cfg.navigationTimeout });
    } catch (err) {
      if (!this.cfg.relaxedRetry || !isExtractionError(err, 'NavigationTimeout')) throw err;
      this.logger.warn('Navigation timed out, retrying with a looser wait condition', {
        url,
        timeout: this.cfg.relaxedNavigationTimeout,
      });
      await page.goto(url, { waitUntil: 'commit', timeout: this.cfg.relaxedNavigationTimeout });
    }
    this.logger.info('Navigation successful', { url: page.url() });
  }

  /**
   * Launches, opens one page, navigates to `url` and hands the page to `fn`.
   * Page and browser are closed however `fn` exits.
   */
  async withPage<T>(url: string, fn: (page: PageHandle) => Promise<T>): Promise<T> {
    const session = await this.launch();
    let page: PageHandle | null = null;
    try {
      page = await session.newPage();
      registerDialogAutoDismiss(page, this.logger);
      await this.navigate(page, url);
      return await fn(page);
    } finally {
      await this.cleanup(session, page);
    }
  }

  private async cleanup(session: BrowserSession, page: PageHandle | null): Promise<void> {
    if (page) {
      await page.close().catch((err: unknown) => this.logger.warn('Page close failed', { error: errorMessage(err) }));
    }
    await session.close().catch((err: unknown) => this.logger.warn('Browser close failed', { error: errorMessage(err) }));
    this.logger.info('Browser closed', { kind: session.kind });
  }
}
