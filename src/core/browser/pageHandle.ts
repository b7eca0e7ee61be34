import { errors, type Browser, type Dialog, type Locator, type Page } from 'playwright';
import type { BrowserKind } from '../../types/schema';
import { ExtractionError, errorMessage } from '../errors';
import defaultLogger, { Logger } from '../../utils/logger';

export type WaitCondition = 'commit' | 'domcontentloaded' | 'load' | 'networkidle';

export interface DialogEvent {
  type: string;
  message: string;
  dismiss(): Promise<void>;
}

export type DialogHandler = (dialog: DialogEvent) => Promise<void>;

export interface ClickableElement {
  innerText(): Promise<string>;
  click(): Promise<void>;
}

/**
 * The live page a single request works on. Everything the pipeline does to a page
 * goes through here, so stages can be exercised against an in-memory page.
 */
export interface PageHandle {
  url(): string;
  /** Throws `NavigationTimeout` or `NavigationFailed`. */
  goto(url: string, opts: { waitUntil: WaitCondition; timeout: number }): Promise<void>;
  onDialog(handler: DialogHandler): void;
  scrollHeight(): Promise<number>;
  scrollByViewport(): Promise<void>;
  pause(ms: number): Promise<void>;
  /** Visibility of the first element matching `selector`. */
  isVisible(selector: string): Promise<boolean>;
  click(selector: string): Promise<void>;
  /** Full-page PNG written to `path`. */
  screenshot(path: string): Promise<void>;
  /** Waits for the first match to be visible, then returns every match. */
  clickables(selector: string, timeoutMs: number): Promise<ClickableElement[]>;
  close(): Promise<void>;
}

export interface BrowserSession {
  readonly kind: BrowserKind;
  newPage(): Promise<PageHandle>;
  close(): Promise<void>;
}

const ELEMENT_ACTION_TIMEOUT = 5000;

function clickableFrom(locator: Locator): ClickableElement {
  return {
    innerText: () => locator.innerText({ timeout: ELEMENT_ACTION_TIMEOUT }),
    click: () => locator.click({ timeout: ELEMENT_ACTION_TIMEOUT }),
  };
}

export class PlaywrightPageHandle implements PageHandle {
  constructor(private page: Page, private logger: Logger = defaultLogger) {}

  url(): string {
    return this.page.url();
  }

  async goto(url: string, opts: { waitUntil: WaitCondition; timeout: number }): Promise<void> {
    try {
      await this.page.goto(url, opts);
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        throw new ExtractionError('NavigationTimeout', 'Page navigation timed out.', { cause: err });
      }
      throw new ExtractionError('NavigationFailed', `Page navigation failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  onDialog(handler: DialogHandler): void {
    this.page.on('dialog', (dialog: Dialog) => {
      const event: DialogEvent = {
        type: dialog.type(),
        message: dialog.message(),
        dismiss: () => dialog.dismiss(),
      };
      handler(event).catch((err: unknown) => {
        this.logger.warn('Dialog handler failed', { error: errorMessage(err) });
      });
    });
  }

  scrollHeight(): Promise<number> {
    return this.page.evaluate(() => document.body.scrollHeight);
  }

  async scrollByViewport(): Promise<void> {
    await this.page.evaluate(() => window.scrollBy(0, window.innerHeight));
  }

  pause(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  click(selector: string): Promise<void> {
    return this.page.locator(selector).first().click({ timeout: ELEMENT_ACTION_TIMEOUT });
  }

  async screenshot(path: string): Promise<void> {
    await this.page.screenshot({ path, fullPage: true, type: 'png' });
  }

  async clickables(selector: string, timeoutMs: number): Promise<ClickableElement[]> {
    const candidates = this.page.locator(selector);
    await candidates.first().waitFor({ state: 'visible', timeout: timeoutMs });
    const count = await candidates.count();
    return Array.from({ length: count }, (_, i) => clickableFrom(candidates.nth(i)));
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

export class PlaywrightSession implements BrowserSession {
  constructor(
    readonly kind: BrowserKind,
    private browser: Browser,
    private options: { userAgent?: string } = {},
    private logger: Logger = defaultLogger
  ) {}

  async newPage(): Promise<PageHandle> {
    const page = await this.browser.newPage(
      this.options.userAgent !== undefined ? { userAgent: this.options.userAgent } : {}
    );
    page.on('pageerror', (error: Error) => this.logger.debug('Page error', { error }));
    return new PlaywrightPageHandle(page, this.logger);
  }

  close(): Promise<void> {
    return this.browser.close();
  }
}
