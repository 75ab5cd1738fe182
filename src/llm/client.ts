/**
 * Language model clients
 * One interface over Ollama, OpenAI-compatible and Gemini backends
 */

import { GoogleGenerativeAI } from '@google/generative-ai';
import OpenAI from 'openai';
import { z } from 'zod';
import type { GeminiConfig, LLMConfig, LLMProvider, OllamaConfig, OpenAIConfig } from '../config';

/**
 * LLM completion options
 */
export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * Result of a provider health check
 */
export interface ConnectionStatus {
  connected: boolean;
  provider: LLMProvider;
  model: string;
  modelAvailable: boolean;
  models?: string[];
  error?: string;
}

/**
 * Abstract interface for LLM clients
 */
export interface LLMClient {
  readonly provider: LLMProvider;
  readonly model: string;

  /**
   * Complete a prompt and return the response text
   */
  complete(prompt: string, options?: CompletionOptions): Promise<string>;

  /**
   * Check that the provider is reachable and the model is usable
   */
  testConnection(): Promise<ConnectionStatus>;
}

export class LLMClientError extends Error {
  constructor(
    message: string,
    public statusCode?: number
  ) {
    super(message);
    this.name = 'LLMClientError';
  }
}

const DEFAULT_TEMPERATURE = 0.7;
const DEFAULT_MAX_TOKENS = 2048;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

const ollamaGenerateSchema = z.object({
  response: z.string(),
});

const ollamaTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() })).default([]),
});

/**
 * Local models served by Ollama over its HTTP API
 */
export class OllamaClient implements LLMClient {
  readonly provider = 'ollama' as const;
  readonly model: string;
  private baseUrl: string;
  private timeoutMs: number;

  constructor(config: Pick<OllamaConfig, 'model' | 'baseUrl' | 'timeoutMs'>) {
    this.model = config.model;
    this.baseUrl = config.baseUrl;
    this.timeoutMs = config.timeoutMs;
  }

  private async post(path: string, body: unknown): Promise<unknown> {
    return this.send(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  private async send(path: string, init: RequestInit = {}): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${path}`, {
        ...init,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      if (isTimeout(error)) {
        throw new LLMClientError(`Ollama request timed out after ${this.timeoutMs}ms`);
      }
      throw new LLMClientError(`Ollama request failed: ${errorMessage(error)}`);
    }

    if (!response.ok) {
      const body = await response.text().catch(() => '');
      throw new LLMClientError(
        `Ollama returned ${response.status}: ${body.slice(0, 200)}`,
        response.status,
      );
    }

    return response.json();
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    const raw = await this.post('/api/generate', {
      model: this.model,
      prompt,
      stream: false,
      options: {
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        top_p: 0.9,
        num_predict: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      },
    });

    const parsed = ollamaGenerateSchema.safeParse(raw);
    if (!parsed.success || !parsed.data.response) {
      throw new LLMClientError('LLM returned empty response');
    }
    return parsed.data.response;
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      const parsed = ollamaTagsSchema.safeParse(await this.send('/api/tags'));
      const models = parsed.success ? parsed.data.models.map((m) => m.name) : [];
      return {
        connected: true,
        provider: this.provider,
        model: this.model,
        models,
        modelAvailable: models.some((name) => name.includes(this.model)),
      };
    } catch (error) {
      return {
        connected: false,
        provider: this.provider,
        model: this.model,
        modelAvailable: false,
        error: errorMessage(error),
      };
    }
  }
}

/**
 * OpenAI chat completions (or any server speaking the same API)
 */
export class OpenAIClient implements LLMClient {
  readonly provider = 'openai' as const;
  readonly model: string;
  private client: OpenAI;

  constructor(config: Pick<OpenAIConfig, 'apiKey' | 'model' | 'baseUrl' | 'timeoutMs'>) {
    this.model = config.model;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: options.temperature ?? DEFAULT_TEMPERATURE,
        max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
      });

      const text = response.choices[0]?.message.content;
      if (!text) {
        throw new LLMClientError('LLM returned empty response');
      }
      return text;
    } catch (error) {
      if (error instanceof LLMClientError) {
        throw error;
      }
      if (error instanceof OpenAI.APIError) {
        throw new LLMClientError(`OpenAI API error: ${error.message}`, error.status);
      }
      throw new LLMClientError(`OpenAI API error: ${errorMessage(error)}`);
    }
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      await this.client.models.list();
      return {
        connected: true,
        provider: this.provider,
        model: this.model,
        modelAvailable: true,
      };
    } catch (error) {
      return {
        connected: false,
        provider: this.provider,
        model: this.model,
        modelAvailable: false,
        error: errorMessage(error),
      };
    }
  }
}

/**
 * Google Gemini LLM client using the official SDK
 */
export class GeminiClient implements LLMClient {
  readonly provider = 'gemini' as const;
  readonly model: string;
  private genAI: GoogleGenerativeAI;
  private timeoutMs: number;

  constructor(config: Pick<GeminiConfig, 'apiKey' | 'model' | 'timeoutMs'>) {
    this.genAI = new GoogleGenerativeAI(config.apiKey);
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
  }

  /**
   * Complete a simple prompt
   */
  async complete(prompt: string, options: CompletionOptions = {}): Promise<string> {
    try {
      const model = this.genAI.getGenerativeModel(
        {
          model: this.model,
          generationConfig: {
            temperature: options.temperature ?? DEFAULT_TEMPERATURE,
            maxOutputTokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
          },
        },
        { timeout: this.timeoutMs },
      );

      const result = await model.generateContent(prompt);
      const text = result.response.text();

      if (!text) {
        throw new LLMClientError('LLM returned empty response');
      }

      return text;
    } catch (error) {
      if (error instanceof LLMClientError) {
        throw error;
      }
      throw new LLMClientError(`Gemini API error: ${errorMessage(error)}`);
    }
  }

  async testConnection(): Promise<ConnectionStatus> {
    try {
      const model = this.genAI.getGenerativeModel({ model: this.model }, { timeout: this.timeoutMs });
      await model.countTokens('ping');
      return {
        connected: true,
        provider: this.provider,
        model: this.model,
        modelAvailable: true,
      };
    } catch (error) {
      return {
        connected: false,
        provider: this.provider,
        model: this.model,
        modelAvailable: false,
        error: errorMessage(error),
      };
    }
  }
}

/**
 * Create an LLM client from configuration
 */
export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'openai':
      return new OpenAIClient(config);
    case 'gemini':
      return new GeminiClient(config);
    case 'ollama':
      return new OllamaClient(config);
  }
}
