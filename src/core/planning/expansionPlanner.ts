import type { PlannerConfig } from '../../types/schema';
import type { LlmClient } from '../llm/client';
import { errorMessage, isExtractionError } from '../errors';
import defaultLogger, { Logger } from '../../utils/logger';

const BULLET_LINE = /^\s*[*•-]\s*(.+?)\s*$/;
const TRAILING_DECORATION = /\s*(?:—>|->|→|—|–)+\s*$/;
const WRAPPING_MARKS = /^["'`*_]+|["'`*_]+$/g;

export function isBlacklisted(label: string, blacklist: readonly string[]): boolean {
  const lower = label.toLowerCase();
  return blacklist.some((term) => lower.includes(term.toLowerCase()));
}

/** Labels from `*`, `•` or `-` bullet lines, in order, with arrow/dash tails removed. */
export function parseBulletLabels(response: string): string[] {
  const labels: string[] = [];
  for (const line of response.split(/\r?\n/)) {
    const match = BULLET_LINE.exec(line);
    if (!match) continue;
    const label = match[1].replace(TRAILING_DECORATION, '').replace(WRAPPING_MARKS, '').trim();
    if (label) labels.push(label);
  }
  return labels;
}

/** First line that is exactly one of the known expand captions, ignoring case. */
export function matchFallbackLabel(response: string, vocabulary: readonly string[]): string | null {
  const known = new Set(vocabulary.map((v) => v.toLowerCase()));
  for (const line of response.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed && known.has(trimmed.toLowerCase())) return trimmed;
  }
  return null;
}

export class ExpansionPlanner {
  constructor(
    private llm: LlmClient,
    private cfg: PlannerConfig,
    private logger: Logger = defaultLogger.child({ name: 'planner' })
  ) {}

  buildPrompt(text: string): string {
    return [
      'The following text was read from a job listing page.',
      'List, as bullet points, only the phrases or button captions that might expand the job description.',
      'Rules:',
      "- Write every occurrence on its own bullet, even when the same caption appears twice.",
      `- Include captions such as ${this.cfg.fallbackLabels.map((l) => `'${l}'`).join(', ')} or similar.`,
      '- Do not include buttons for cookies, settings, privacy or anything unrelated to the description.',
      '- Put captions that clearly mention the job description first.',
      '- Return only the captions, without explanation.',
      `- If nothing can expand the description, answer "${this.cfg.noCandidateSentinel}" without a bullet point.`,
      '',
      'Page text:',
      text,
    ].join('\n');
  }

  /** Bullet candidates that survive the blacklist, in the order the model gave them. */
  candidates(response: string): string[] {
    return parseBulletLabels(response).filter(
      (label) => !isBlacklisted(label, this.cfg.blacklist) && !this.isNoCandidateAnswer(label)
    );
  }

  private isNoCandidateAnswer(text: string): boolean {
    return text.toLowerCase().includes(this.cfg.noCandidateSentinel.toLowerCase());
  }

  selectLabel(response: string): string | null {
    const [first] = this.candidates(response);
    if (first !== undefined) return first;

    const fallback = matchFallbackLabel(response, this.cfg.fallbackLabels);
    if (fallback && !isBlacklisted(fallback, this.cfg.blacklist)) return fallback;

    if (this.isNoCandidateAnswer(response)) {
      this.logger.info('Model reported no expand control');
    }
    return null;
  }

  /** The most likely "show full description" caption, or `null`. Model failures count as "none". */
  async propose(text: string): Promise<string | null> {
    let response: string;
    try {
      response = await this.llm.complete(this.buildPrompt(text));
    } catch (err) {
      this.logger.warn('Label proposal failed', {
        kind: isExtractionError(err) ? err.kind : 'LLMCommunicationError',
        error: errorMessage(err),
      });
      return null;
    }
    const label = this.selectLabel(response);
    if (label) this.logger.info('Expand label detected', { label });
    else this.logger.info('No valid expand label detected');
    return label;
  }
}
