import axios from 'axios';
import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import type { MarkupConfig } from '../../types/schema';
import { ExtractionError, errorMessage } from '../errors';
import defaultLogger, { Logger } from '../../utils/logger';

export type HtmlFetcher = (url: string, cfg: MarkupConfig) => Promise<string>;

export const axiosFetcher: HtmlFetcher = async (url, cfg) => {
  const res = await axios.get<string>(url, {
    timeout: cfg.requestTimeoutMs,
    responseType: 'text',
    headers: { 'User-Agent': cfg.userAgent, Accept: 'text/html' },
  });
  return res.data;
};

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    const piece = node.data.trim();
    if (piece) out.push(piece);
    return;
  }
  if (isTag(node) && SKIPPED_TAGS.has(node.name)) return;
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, out);
  }
}

/** Text of every node in `nodes`, one line per text run. */
function linesOf(nodes: readonly AnyNode[]): string {
  const out: string[] = [];
  for (const node of nodes) collectText(node, out);
  return out.join('\n');
}

/**
 * Description markup plus the criteria list (seniority, employment type, ...).
 * Pages without either fall back to the whole document's text.
 */
export function extractPostingText(html: string, maxChars: number): string {
  const $ = cheerio.load(html);
  const sections: string[] = [];

  const markup = $('section.show-more-less-html').first().find('div[class*="show-more-less-html__markup"]').first();
  if (markup.length) sections.push(linesOf(markup.toArray()));

  const criteria = $('ul.description__job-criteria-list').first();
  if (criteria.length) sections.push(linesOf(criteria.toArray()));

  const text = sections.length ? sections.join('\n') : linesOf($.root().toArray());
  return text.slice(0, maxChars);
}

export class JobPostingApiClient {
  constructor(
    private cfg: MarkupConfig,
    private fetchHtml: HtmlFetcher = axiosFetcher,
    private logger: Logger = defaultLogger.child({ name: 'markup' })
  ) {}

  postingUrl(jobId: string): string {
    return `${this.cfg.apiBaseUrl.replace(/\/+$/, '')}/${encodeURIComponent(jobId)}`;
  }

  async fetchPostingText(jobId: string): Promise<string> {
    const url = this.postingUrl(jobId);
    this.logger.info('Fetching job posting', { jobId, url });
    let html: string;
    try {
      html = await this.fetchHtml(url, this.cfg);
    } catch (err) {
      throw new ExtractionError('FetchFailed', `Failed to fetch job posting ${jobId}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    const text = extractPostingText(html, this.cfg.maxChars);
    this.logger.info('Job posting parsed', { jobId, chars: text.length });
    return text;
  }
}
