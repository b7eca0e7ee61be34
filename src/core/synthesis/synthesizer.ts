import type { SynthesizerConfig } from '../../types/schema';
import type { StructuredRecord } from '../../types/extraction';
import type { LlmClient } from '../llm/client';
import { ExtractionError, errorRecord, successRecord, toErrorRecord } from '../errors';
import { repairJson } from './jsonRepair';
import defaultLogger, { Logger } from '../../utils/logger';

export type SynthesisSource = 'screenshot' | 'markup';

export function truncateWords(text: string, maxWords: number): { text: string; truncated: boolean } {
  const words = text.split(/\s+/).filter(Boolean);
  if (words.length <= maxWords) return { text, truncated: false };
  return { text: words.slice(0, maxWords).join(' '), truncated: true };
}

const PROMPTS: Record<SynthesisSource, (content: string) => string> = {
  screenshot: (content) => `Extract the job information from the text below, which was read from a screenshot of a job posting.
Include all details: do not summarize or leave out any listed responsibilities, requirements or benefits.

Job posting content:

${content}

Respond with one strictly valid JSON object only, with no commentary or formatting outside the object.`,

  markup: (content) => `Provide all the details from the job description below without leaving anything out.

Job posting content:
${content}

Respond with one strictly valid JSON object only, with no commentary or formatting outside the object.`,
};

export class StructuredDataSynthesizer {
  constructor(
    private llm: LlmClient,
    private cfg: SynthesizerConfig,
    private logger: Logger = defaultLogger.child({ name: 'synthesizer' })
  ) {}

  buildPrompt(text: string, source: SynthesisSource): string {
    return PROMPTS[source](text);
  }

  /** Always returns a record; a failed model call or unparseable reply becomes an error record. */
  async synthesize(text: string, source: SynthesisSource = 'screenshot'): Promise<StructuredRecord> {
    if (!text.trim()) {
      return errorRecord('EmptyExtraction', 'No text content available to structure.');
    }

    const { text: content, truncated } = truncateWords(text, this.cfg.maxWords);
    if (truncated) this.logger.info('Text truncated to fit the word budget', { maxWords: this.cfg.maxWords });

    let response: string;
    try {
      response = await this.llm.complete(this.buildPrompt(content, source));
    } catch (err) {
      this.logger.error('Structuring call failed', err);
      return toErrorRecord(err);
    }

    const repaired = repairJson(response);
    if (!repaired) {
      this.logger.warn('Could not parse model output as JSON', { preview: response.slice(0, 200) });
      return toErrorRecord(new ExtractionError('JSONParseFailure', 'Failed to parse JSON response.'));
    }
    this.logger.info('Structured record produced', { stage: repaired.stage, fields: Object.keys(repaired.data).length });
    return successRecord(repaired.data);
  }
}
