import OpenAI from 'openai';
import type { LlmCredentials } from '../../types/extraction';
import { ExtractionError, errorMessage } from '../errors';

export interface LlmClient {
  complete(prompt: string): Promise<string>;
}

export type LlmClientFactory = (credentials: Readonly<LlmCredentials>) => LlmClient;

/** Chat-completions client; works against OpenAI or any compatible endpoint (Groq, vLLM, ...). */
export class OpenAiLlmClient implements LlmClient {
  private client: OpenAI;

  constructor(private credentials: Readonly<LlmCredentials>, private maxTokens = 3000) {
    this.client = new OpenAI({
      apiKey: credentials.apiKey,
      ...(credentials.baseUrl !== undefined ? { baseURL: credentials.baseUrl } : {}),
    });
  }

  async complete(prompt: string): Promise<string> {
    let content: string | null | undefined;
    try {
      const res = await this.client.chat.completions.create({
        model: this.credentials.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: this.maxTokens,
        ...(this.credentials.temperature !== undefined ? { temperature: this.credentials.temperature } : {}),
      });
      content = res.choices[0]?.message?.content;
    } catch (err) {
      throw new ExtractionError('LLMCommunicationError', `LLM invocation error: ${errorMessage(err)}`, { cause: err });
    }
    if (content == null) {
      throw new ExtractionError('LLMCommunicationError', 'LLM invocation error: the model returned no content');
    }
    return content;
  }
}

export const createOpenAiClient: LlmClientFactory = (credentials) => new OpenAiLlmClient(credentials);
