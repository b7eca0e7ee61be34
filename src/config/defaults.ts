import type { PipelineConfig } from '../types/schema';

export const DEFAULT_POPUP_SELECTORS = [
  'button.close',
  'button[aria-label="Close"]',
  '.modal-close',
  '.popup-close',
  '.close-button',
  '.dialog-close',
  'button[data-dismiss="modal"]',
];

export const DEFAULT_LABEL_BLACKLIST = [
  'cookie',
  'settings',
  'privacy',
  'consent',
  'dismiss',
  'view job',
  'viewjob',
  'get started',
  'reviews',
];

export const DEFAULT_FALLBACK_LABELS = [
  'Read More',
  'See More',
  'View Full Description',
  'Expand Details',
  'Show More',
];

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  browser: {
    engines: ['webkit', 'chromium', 'firefox'],
    headless: true,
    slowMo: 0,
    launchTimeout: 30000,
    navigationTimeout: 60000,
    relaxedRetry: true,
    relaxedNavigationTimeout: 90000,
  },
  stabilizer: {
    maxScrollAttempts: 10,
    settleDelayMs: 1000,
    popupSelectors: DEFAULT_POPUP_SELECTORS,
    maxPopupPasses: 3,
    popupCloseDelayMs: 1000,
  },
  initialPopupPasses: 2,
  vision: {
    contrastFactor: 2,
    upscaleFactor: 1.5,
    thresholdCutoff: 150,
    language: 'eng',
  },
  planner: {
    blacklist: DEFAULT_LABEL_BLACKLIST,
    fallbackLabels: DEFAULT_FALLBACK_LABELS,
    noCandidateSentinel: 'no button found',
  },
  matcher: {
    clickableSelector: "button, a, [role='button']",
    threshold: 0.7,
    visibilityTimeoutMs: 10000,
    postClickDelayMs: 2000,
  },
  synthesizer: {
    maxWords: 5000,
  },
  markup: {
    apiBaseUrl: 'https://www.linkedin.com/jobs-guest/jobs/api/jobPosting',
    requestTimeoutMs: 30000,
    maxChars: 10000,
    userAgent: 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0 Safari/537.36',
  },
};
