export type OutputFormat = 'json' | 'jsonl';
export type OutputTarget = { directory: string; filename?: string; format?: OutputFormat };

export type BrowserKind = 'chromium' | 'firefox' | 'webkit';

export const BROWSER_KINDS: readonly BrowserKind[] = ['chromium', 'firefox', 'webkit'];

export interface BrowserConfig {
  engines: BrowserKind[];     // launch order, first success wins
  headless: boolean;
  slowMo: number;
  launchTimeout: number;
  navigationTimeout: number;
  relaxedRetry: boolean;
  relaxedNavigationTimeout: number;
  userAgent?: string;
  executablePath?: string;
}

export interface StabilizerConfig {
  maxScrollAttempts: number;
  settleDelayMs: number;
  popupSelectors: string[];
  maxPopupPasses: number;
  popupCloseDelayMs: number;
}

export interface VisionConfig {
  contrastFactor: number;
  upscaleFactor: number;
  thresholdCutoff: number;
  language: string;
  langPath?: string;
  tempDir?: string;
}

export interface PlannerConfig {
  blacklist: string[];
  fallbackLabels: string[];
  noCandidateSentinel: string;
}

export interface MatcherConfig {
  clickableSelector: string;
  threshold: number;
  visibilityTimeoutMs: number;
  postClickDelayMs: number;
}

export interface SynthesizerConfig {
  maxWords: number;
}

export interface MarkupConfig {
  apiBaseUrl: string;
  requestTimeoutMs: number;
  maxChars: number;
  userAgent: string;
}

export interface PipelineConfig {
  browser: BrowserConfig;
  stabilizer: StabilizerConfig;
  initialPopupPasses: number;
  vision: VisionConfig;
  planner: PlannerConfig;
  matcher: MatcherConfig;
  synthesizer: SynthesizerConfig;
  markup: MarkupConfig;
}
