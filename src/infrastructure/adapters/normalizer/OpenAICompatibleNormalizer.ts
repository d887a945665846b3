import OpenAI from 'openai';
import { NormalizationError } from '../../../domain/errors.js';
import { NormalizerPort } from '../../../application/ports/NormalizerPort.js';

export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        messages: Array<{ role: 'user'; content: string }>;
        temperature: number;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export interface NormalizerConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export const buildNormalizationPrompt = (rawCsv: string, cardLabel: string): string => `
You are a financial transaction normalizer.
Given raw CSV data from a credit card statement, return only valid transaction rows in CSV format with the headers:
transaction_date, description, amount, category, card

Requirements:
- Dates must be ISO format: YYYY-MM-DD
- Amount must be numeric, no currency symbols
- Card must be set to: ${cardLabel}
- No introductory/explanatory text. Just CSV output.

Here is the raw data:
${rawCsv}
`;

export const createChatClient = (config: NormalizerConfig): ChatCompletionsClient =>
  new OpenAI({
    baseURL: config.baseUrl,
    apiKey: config.apiKey,
    timeout: config.timeoutMs,
    maxRetries: 0, // a failed file is retried by re-dropping it
  });

/**
 * Sends the statement to an OpenAI-compatible chat endpoint (Ollama's /v1 by
 * default) and hands back the reply untouched.
 */
export class OpenAICompatibleNormalizer implements NormalizerPort {
  constructor(
    private readonly client: ChatCompletionsClient,
    private readonly model: string,
  ) {}

  async normalize(rawText: string, cardLabel: string): Promise<string> {
    let content: string | null | undefined;

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: buildNormalizationPrompt(rawText, cardLabel) }],
        temperature: 0,
      });
      content = response.choices[0]?.message.content;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new NormalizationError(`Normalizer request failed: ${reason}`, { cause: error });
    }

    if (!content || !content.trim()) {
      throw new NormalizationError('Normalizer returned an empty response');
    }

    return content;
  }
}
