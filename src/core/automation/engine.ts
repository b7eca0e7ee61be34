import type { PipelineConfig } from '../../types/schema';
import type { ExtractionRequest, StructuredRecord } from '../../types/extraction';
import { DEFAULT_PIPELINE_CONFIG } from '../../config/defaults';
import { BrowserManager, type LaunchStrategy } from '../browser/browserManager';
import type { PageHandle } from '../browser/pageHandle';
import { PageStabilizer } from '../stabilization/stabilizer';
import { VisualTextExtractor } from '../vision/visualTextExtractor';
import { TesseractOcrEngine, type OcrEngine } from '../vision/ocr';
import { createOcrPreprocessor, type ImagePreprocessor } from '../vision/preprocess';
import { createOpenAiClient, type LlmClient, type LlmClientFactory } from '../llm/client';
import { ExpansionPlanner } from '../planning/expansionPlanner';
import { FuzzyElementMatcher } from '../elements/fuzzyMatcher';
import { StructuredDataSynthesizer } from '../synthesis/synthesizer';
import { routeUrl } from '../routing/router';
import { JobPostingApiClient, type HtmlFetcher } from '../routing/linkedin';
import { ExtractionError, toErrorRecord } from '../errors';
import defaultLogger, { Logger } from '../../utils/logger';

/** Collaborators that reach outside the process; tests swap these for in-memory fakes. */
export interface EngineDependencies {
  createLlmClient: LlmClientFactory;
  launchStrategies: LaunchStrategy[];
  ocr: OcrEngine;
  preprocess: ImagePreprocessor;
  fetchHtml: HtmlFetcher;
  tempDir: string;
}

export class ExtractionEngine {
  private logger: Logger;

  constructor(
    private config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
    private deps: Partial<EngineDependencies> = {},
    logger: Logger = defaultLogger
  ) {
    this.logger = logger.child({ name: 'engine' });
  }

  /** Runs one request end to end. Never throws: every failure comes back as an error record. */
  async run(request: ExtractionRequest): Promise<StructuredRecord> {
    const startedAt = Date.now();
    this.logger.info('Starting extraction', { url: request.url });
    let record: StructuredRecord;
    try {
      const llm = (this.deps.createLlmClient ?? createOpenAiClient)(request.llmCredentials);
      const route = routeUrl(request.url);
      record =
        route.kind === 'markup'
          ? await this.runMarkup(route.jobId, llm)
          : await this.runVisual(route.url, llm);
    } catch (err) {
      record = toErrorRecord(err);
    }

    if (record.status === 'error') {
      this.logger.error('Extraction failed', { url: request.url, kind: record.kind, error: record.error });
    } else {
      this.logger.info('Extraction finished', { url: request.url, ms: Date.now() - startedAt });
    }
    return record;
  }

  private async runMarkup(jobId: string, llm: LlmClient): Promise<StructuredRecord> {
    const api = new JobPostingApiClient(this.config.markup, this.deps.fetchHtml, this.logger.child({ name: 'markup' }));
    const text = await api.fetchPostingText(jobId);
    return this.synthesizer(llm).synthesize(text, 'markup');
  }

  private async runVisual(url: string, llm: LlmClient): Promise<StructuredRecord> {
    const browser = new BrowserManager(
      this.config.browser,
      this.deps.launchStrategies,
      this.logger.child({ name: 'browser' })
    );
    const text = await browser.withPage(url, (page) => this.observeAndExpand(page, llm));
    // Browser is already closed here; structuring needs only the text.
    return this.synthesizer(llm).synthesize(text, 'screenshot');
  }

  /** stabilize → read → ask for the expand control → click it → stabilize → read again. */
  private async observeAndExpand(page: PageHandle, llm: LlmClient): Promise<string> {
    const stabilizer = new PageStabilizer(this.config.stabilizer, this.logger.child({ name: 'stabilizer' }));
    const vision = this.visualTextExtractor();

    await stabilizer.stabilize(page, this.config.initialPopupPasses);
    const initial = await vision.extract(page);
    if (!initial.trim()) {
      throw new ExtractionError('EmptyExtraction', 'Initial text extraction failed.');
    }

    const planner = new ExpansionPlanner(llm, this.config.planner, this.logger.child({ name: 'planner' }));
    const label = await planner.propose(initial);
    if (label === null) return initial;

    const matcher = new FuzzyElementMatcher(this.config.matcher, this.logger.child({ name: 'matcher' }));
    const outcome = await matcher.clickBestMatch(page, label);
    if (!outcome.clicked) return initial;

    await stabilizer.settle(page);
    const expanded = await vision.extract(page);
    if (!expanded.trim()) {
      this.logger.warn('Text after expansion was empty, keeping the first read');
      return initial;
    }
    return expanded;
  }

  private visualTextExtractor(): VisualTextExtractor {
    const { vision } = this.config;
    return new VisualTextExtractor(
      this.deps.ocr ?? new TesseractOcrEngine(vision),
      this.deps.preprocess ?? createOcrPreprocessor(vision),
      this.deps.tempDir ?? vision.tempDir,
      this.logger.child({ name: 'vision' })
    );
  }

  private synthesizer(llm: LlmClient): StructuredDataSynthesizer {
    return new StructuredDataSynthesizer(llm, this.config.synthesizer, this.logger.child({ name: 'synthesizer' }));
  }
}

/** One-shot helper around a fresh engine. */
export function extractJob(
  request: ExtractionRequest,
  config: PipelineConfig = DEFAULT_PIPELINE_CONFIG,
  deps: Partial<EngineDependencies> = {}
): Promise<StructuredRecord> {
  return new ExtractionEngine(config, deps).run(request);
}
