/**
 * Text generator backed by an OpenAI-compatible chat completions endpoint.
 */

import type { ConversationEntry, TextGenerator } from '../../domain/stream/collaborators.js';
import { TransientCollaboratorError } from '../../domain/stream/errors.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
}

export interface OpenAITextGeneratorOptions {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  /** Upper bound for one HTTP request */
  requestTimeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/**
 * Pull the first choice's message content out of a completions response.
 */
export function extractCompletionText(body: unknown): string | null {
  if (!isRecord(body) || !Array.isArray(body.choices) || body.choices.length === 0) {
    return null;
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return null;
  }
  return typeof first.message.content === 'string' ? first.message.content : null;
}

export class OpenAITextGenerator implements TextGenerator {
  private fetchImpl: typeof fetch;

  constructor(private options: OpenAITextGeneratorOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * The prompt already carries the recent history, so it is sent as a
   * single user message.
   */
  async complete(prompt: string, _history: readonly ConversationEntry[]): Promise<string> {
    const request: ChatCompletionRequest = {
      model: this.options.model,
      messages: [{ role: 'user', content: prompt }],
      temperature: this.options.temperature,
      max_tokens: this.options.maxTokens,
    };

    const headers: Record<string, string> = { 'Content-Type': 'application/json' };
    if (this.options.apiKey) {
      headers.Authorization = `Bearer ${this.options.apiKey}`;
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.options.baseUrl}/chat/completions`, {
        method: 'POST',
        headers,
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.options.requestTimeoutMs ?? 60_000),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientCollaboratorError('generator', `Completion request failed: ${message}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => response.statusText);
      const message = `Completion request failed: ${response.status} ${detail}`;
      if (response.status === 429 || response.status >= 500) {
        throw new TransientCollaboratorError('generator', message, response.status);
      }
      throw new Error(message);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new TransientCollaboratorError('generator', 'Completion response was not valid JSON', response.status);
    }

    const text = extractCompletionText(body);
    if (text === null) {
      throw new TransientCollaboratorError('generator', 'Completion response had no message content', response.status);
    }
    return text;
  }
}
