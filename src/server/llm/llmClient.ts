/**
 * Language-model completion client
 *
 * One prompt in, one text completion out. Provider is chosen by config:
 * - google:   Gemini through @google/genai
 * - openai:   OpenAI chat completions
 * - deepseek: DeepSeek through its OpenAI-compatible endpoint
 *
 * No retries: a failed call surfaces as ExternalCallError.
 */

import { GoogleGenAI } from '@google/genai';
import OpenAI from 'openai';
import type { ParserConfig } from '../../config/env';
import { DEEPSEEK_BASE_URL, type ProviderName } from '../../config/models';
import { ExternalCallError, errorMessage } from '../errors';
import { createLogger } from '../utils/logger';

const log = createLogger('LLM');

export interface CompletionClient {
  readonly provider: ProviderName;
  readonly model: string;
  complete(prompt: string): Promise<string>;
}

const API_KEY_VARIABLE: Record<ProviderName, string> = {
  google: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
  deepseek: 'DEEPSEEK_API_KEY',
};

function requireApiKey(config: Readonly<ParserConfig>): string {
  const apiKey = config.apiKeys[config.provider];
  if (!apiKey) {
    throw new ExternalCallError('Model API', `${API_KEY_VARIABLE[config.provider]} is not set`);
  }
  return apiKey;
}

class GeminiCompletionClient implements CompletionClient {
  readonly provider = 'google' as const;
  private client: GoogleGenAI | null = null;

  constructor(private readonly config: Readonly<ParserConfig>) {}

  get model(): string {
    return this.config.model;
  }

  // Lazy client - the key is checked at call time, not at startup
  private getClient(): GoogleGenAI {
    if (!this.client) {
      this.client = new GoogleGenAI({ apiKey: requireApiKey(this.config) });
    }
    return this.client;
  }

  async complete(prompt: string): Promise<string> {
    const client = this.getClient();
    try {
      const response = await client.models.generateContent({
        model: this.model,
        contents: prompt,
      });
      return response.text ?? '';
    } catch (error) {
      throw new ExternalCallError('Model API', `Gemini API call failed: ${errorMessage(error)}`, { cause: error });
    }
  }
}

class OpenAICompatibleClient implements CompletionClient {
  private client: OpenAI | null = null;

  constructor(
    readonly provider: 'openai' | 'deepseek',
    private readonly config: Readonly<ParserConfig>
  ) {}

  get model(): string {
    return this.config.model;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const apiKey = requireApiKey(this.config);
      this.client =
        this.provider === 'deepseek'
          ? new OpenAI({ apiKey, baseURL: DEEPSEEK_BASE_URL })
          : new OpenAI({ apiKey });
    }
    return this.client;
  }

  async complete(prompt: string): Promise<string> {
    const client = this.getClient();
    try {
      const completion = await client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: 0,
      });
      return completion.choices[0]?.message.content ?? '';
    } catch (error) {
      throw new ExternalCallError('Model API', `${this.provider} API call failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}

export function createCompletionClient(config: Readonly<ParserConfig>): CompletionClient {
  log.info(`Provider: ${config.provider}, Model: ${config.model}`);
  switch (config.provider) {
    case 'google':
      return new GeminiCompletionClient(config);
    case 'openai':
    case 'deepseek':
      return new OpenAICompatibleClient(config.provider, config);
  }
}
