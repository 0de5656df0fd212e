import { IChatCompletionClient } from '../../core/interfaces/IChatCompletionClient.js';
import { IHttpClient, HttpResponse } from '../../core/interfaces/IHttpClient.js';
import { ChatCompletionRequest } from '../../core/entities/Model.js';
import {
  ConfigurationMissingError,
  TransportError,
  UpstreamStatusError,
  errorMessage,
} from '../../core/errors.js';

export const COMPLETION_TIMEOUT_MS = 60_000;
export const MODEL_LIST_TIMEOUT_MS = 10_000;

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl: string;
}

/**
 * OpenAI-compatible API client (`/chat/completions`, `/models`).
 * Throws ConfigurationMissingError, UpstreamStatusError or TransportError; callers classify.
 */
export class OpenAIApiClient implements IChatCompletionClient {
  private baseUrl: string;

  constructor(
    private httpClient: IHttpClient,
    private options: OpenAIClientOptions
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
  }

  isConfigured(): boolean {
    return this.options.apiKey.length > 0;
  }

  async createChatCompletion(request: ChatCompletionRequest): Promise<string> {
    const headers = this.authHeaders();
    const response = await this.httpClient.request(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: { ...headers, 'Content-Type': 'application/json' },
      body: JSON.stringify(request),
      timeoutMs: COMPLETION_TIMEOUT_MS,
    });

    const data = await readJson(response);
    const content = firstChoiceContent(data);
    if (content === undefined) {
      throw new TransportError('Completion response has no choices[0].message.content');
    }
    return content;
  }

  async listModels(): Promise<unknown[]> {
    if (!this.isConfigured()) {
      return [];
    }
    const response = await this.httpClient.request(`${this.baseUrl}/models`, {
      method: 'GET',
      headers: this.authHeaders(),
      timeoutMs: MODEL_LIST_TIMEOUT_MS,
    });

    const data = await readJson(response);
    if (isRecord(data) && Array.isArray(data.data)) {
      return data.data;
    }
    return [];
  }

  private authHeaders(): Record<string, string> {
    if (!this.isConfigured()) {
      throw new ConfigurationMissingError('OPENAI_API_KEY');
    }
    return { Authorization: `Bearer ${this.options.apiKey}` };
  }
}

async function readJson(response: HttpResponse): Promise<unknown> {
  let body: string;
  try {
    body = await response.text();
  } catch (error) {
    throw new TransportError(`Failed to read response body: ${errorMessage(error)}`, error);
  }

  if (!response.ok) {
    throw new UpstreamStatusError(response.status, response.statusText, body);
  }

  try {
    return JSON.parse(body);
  } catch (error) {
    throw new TransportError(`Malformed JSON response: ${errorMessage(error)}`, error);
  }
}

function firstChoiceContent(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices) || data.choices.length === 0) {
    return undefined;
  }
  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) {
    return undefined;
  }
  const content = choice.message.content;
  return typeof content === 'string' ? content : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
