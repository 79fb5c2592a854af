import OpenAI from 'openai';
import type { Response, ResponseCreateParamsNonStreaming } from 'openai/resources/responses/responses';

export interface OpenAiClientConfig {
  client?: OpenAI;
  apiKey?: string;
  defaultModel?: string;
}

/**
 * Shared plumbing for prompts answered with the Responses API web-search tool.
 * Answers come back as free text that is expected, but not guaranteed, to be
 * a JSON object.
 */
export abstract class OpenAiWebSearchClient {
  private readonly client: OpenAI;
  private readonly model: string;
  private lastResponseId?: string;

  constructor(config: OpenAiClientConfig = {}) {
    const apiKey = config.client ? undefined : config.apiKey ?? process.env.OPENAI_API_KEY;

    if (!config.client && !apiKey) {
      throw new Error('OPENAI_API_KEY is required to instantiate an OpenAI lookup client');
    }

    this.client = config.client ?? new OpenAI({ apiKey });
    this.model = config.defaultModel ?? process.env.OPENAI_MODEL ?? 'gpt-4o';
  }

  protected async search(prompt: string, maxOutputTokens: number): Promise<string> {
    const payload: ResponseCreateParamsNonStreaming = {
      model: this.model,
      max_output_tokens: maxOutputTokens,
      tools: [{ type: 'web_search_preview' }],
      input: [{ role: 'user', content: prompt }]
    };

    const response = await this.client.responses.create(payload);
    this.lastResponseId = response.id;

    return this.extractText(response);
  }

  private extractText(response: Response): string {
    if (response.output_text) {
      return response.output_text;
    }

    for (const item of response.output ?? []) {
      const contentItems =
        (item as { content?: Array<{ type: string; text?: string | null }> }).content ?? [];

      for (const piece of contentItems) {
        if (piece.type === 'output_text' && piece.text) {
          return piece.text;
        }
      }
    }

    throw new Error('OpenAI response missing text content');
  }

  getLastResponseId(): string | undefined {
    return this.lastResponseId;
  }
}
