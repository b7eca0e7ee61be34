import type { MatcherConfig } from '../../types/schema';
import type { ClickableElement, PageHandle } from '../browser/pageHandle';
import { errorMessage } from '../errors';
import { similarity } from '../../utils/similarity';
import defaultLogger, { Logger } from '../../utils/logger';

export interface MatchCandidate {
  element: ClickableElement;
  observedText: string;
  similarityScore: number;
}

export interface MatchOutcome {
  clicked: boolean;
  best: MatchCandidate | null;
  scanned: number;
}

/** Highest score wins; on a tie the earlier element stays. Zero scores never win. */
export function pickBest(candidates: readonly MatchCandidate[]): MatchCandidate | null {
  let best: MatchCandidate | null = null;
  for (const candidate of candidates) {
    if (candidate.similarityScore > (best?.similarityScore ?? 0)) best = candidate;
  }
  return best;
}

export class FuzzyElementMatcher {
  constructor(
    private cfg: MatcherConfig,
    private logger: Logger = defaultLogger.child({ name: 'matcher' })
  ) {}

  /**
   * Scores every clickable element on the page against `label`. Recomputed on each
   * call since element references go stale once the DOM changes.
   */
  async scoreCandidates(page: PageHandle, label: string): Promise<MatchCandidate[]> {
    const elements = await page.clickables(this.cfg.clickableSelector, this.cfg.visibilityTimeoutMs);
    const scored: MatchCandidate[] = [];
    for (const [index, element] of elements.entries()) {
      try {
        const observedText = (await element.innerText()).trim();
        const similarityScore = similarity(observedText, label);
        this.logger.debug('Scored candidate', { index, text: observedText, score: similarityScore });
        scored.push({ element, observedText, similarityScore });
      } catch (err) {
        this.logger.debug('Could not read candidate text', { index, error: errorMessage(err) });
      }
    }
    return scored;
  }

  /** Clicks the best match if it reaches the threshold; otherwise clicks nothing. */
  async clickBestMatch(page: PageHandle, label: string): Promise<MatchOutcome> {
    let scored: MatchCandidate[];
    try {
      scored = await this.scoreCandidates(page, label);
    } catch (err) {
      this.logger.warn('No clickable elements became visible', { label, error: errorMessage(err) });
      return { clicked: false, best: null, scanned: 0 };
    }

    const best = pickBest(scored);
    const outcome: MatchOutcome = { clicked: false, best, scanned: scored.length };
    if (!best || best.similarityScore < this.cfg.threshold) {
      this.logger.info('No candidate reached the threshold', {
        label,
        bestScore: best?.similarityScore ?? 0,
        threshold: this.cfg.threshold,
      });
      return outcome;
    }

    try {
      await best.element.click();
    } catch (err) {
      this.logger.warn('Click on best candidate failed', { text: best.observedText, error: errorMessage(err) });
      return outcome;
    }
    this.logger.info('Clicked best candidate', { text: best.observedText, score: best.similarityScore });
    await page.pause(this.cfg.postClickDelayMs);
    return { ...outcome, clicked: true };
  }
}
