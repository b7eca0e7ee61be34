import type { StabilizerConfig } from '../../types/schema';
import type { StabilizationState } from '../../types/extraction';
import type { PageHandle } from '../browser/pageHandle';
import { errorMessage } from '../errors';
import defaultLogger, { Logger } from '../../utils/logger';

export class PageStabilizer {
  constructor(
    private cfg: StabilizerConfig,
    private logger: Logger = defaultLogger.child({ name: 'stabilizer' })
  ) {}

  /**
   * Scrolls one viewport at a time until the document height stops growing or the
   * attempt ceiling is reached. A page that errors mid-scroll is left as it is.
   */
  async settle(page: PageHandle): Promise<StabilizationState> {
    const state: StabilizationState = { scrollHeight: 0, attemptCount: 0, popupsClosed: 0, converged: false };
    try {
      state.scrollHeight = await page.scrollHeight();
      while (state.attemptCount < this.cfg.maxScrollAttempts) {
        await page.scrollByViewport();
        await page.pause(this.cfg.settleDelayMs);
        state.attemptCount++;
        const height = await page.scrollHeight();
        if (height === state.scrollHeight) {
          state.converged = true;
          break;
        }
        state.scrollHeight = height;
      }
    } catch (err) {
      this.logger.warn('Scrolling interrupted', { error: errorMessage(err), attempts: state.attemptCount });
    }
    this.logger.info(state.converged ? 'Reached the end of the page' : 'Stopped scrolling', {
      scrollHeight: state.scrollHeight,
      attempts: state.attemptCount,
    });
    return state;
  }

  /** Returns how many popups were closed. A selector that cannot be found or clicked is skipped. */
  async dismissPopups(page: PageHandle, maxPasses: number = this.cfg.maxPopupPasses): Promise<number> {
    let closed = 0;
    for (let pass = 1; pass <= maxPasses; pass++) {
      let closedThisPass = 0;
      for (const selector of this.cfg.popupSelectors) {
        try {
          if (!(await page.isVisible(selector))) continue;
          await page.click(selector);
          closedThisPass++;
          this.logger.info('Closed popup', { selector });
          await page.pause(this.cfg.popupCloseDelayMs);
        } catch (err) {
          this.logger.debug('Popup selector skipped', { selector, error: errorMessage(err) });
        }
      }
      closed += closedThisPass;
      if (closedThisPass === 0) break;
      this.logger.debug('Popup pass completed', { pass, closed: closedThisPass });
    }
    return closed;
  }

  async stabilize(page: PageHandle, popupPasses?: number): Promise<StabilizationState> {
    const popupsClosed = await this.dismissPopups(page, popupPasses);
    const state = await this.settle(page);
    return { ...state, popupsClosed };
  }
}
