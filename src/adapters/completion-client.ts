import axios, { AxiosError, AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';
import type { Logger } from 'pino';
import {
  ChatMessage,
  CompletionFailure,
  CompletionProvider,
  CompletionResult
} from '../types/index.js';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { createLogger } from '../logger.js';

/**
 * The slice of an axios instance the client needs
 */
export interface HttpTransport {
  get(url: string, config?: AxiosRequestConfig): Promise<AxiosResponse<unknown>>;
  post(url: string, data: unknown, config?: AxiosRequestConfig): Promise<AxiosResponse<unknown>>;
}

export interface CompletionClientOptions {
  apiKey: string;
  baseUrl?: string;
  preferredModel?: string;
  fallbackModels?: string[];
  requestTimeout?: number;
  probeTimeout?: number;
  http?: HttpTransport;
  logger?: Logger;
}

interface CompletionPayload {
  model: string;
  messages: ChatMessage[];
  max_tokens: number;
  temperature: number;
  top_p: number;
}

type AttemptOutcome =
  | { type: 'response'; response: AxiosResponse<unknown> }
  | { type: 'transport'; error: AxiosError };

const MODEL_REJECTION_MARKERS = ['decommissioned', 'not found'];

// Non-2xx statuses are outcomes to inspect, not exceptions
const acceptAnyStatus = (): boolean => true;

/**
 * Client for an OpenAI-compatible chat-completion endpoint.
 *
 * Owns the active model: chosen once by `selectActiveModel()` at startup and
 * swapped to the first fallback once, when the service first rejects a model
 * as decommissioned. Failures come back as values.
 */
export class RemoteCompletionClient implements CompletionProvider {
  static readonly MAX_ATTEMPTS = 3;
  static readonly TEMPERATURE = 0.3;
  static readonly TOP_P = 0.9;

  private activeModel: string;
  private substituted = false;
  private readonly preferredModel: string;
  private readonly fallbackModels: readonly string[];
  private readonly requestTimeout: number;
  private readonly probeTimeout: number;
  private readonly http: HttpTransport;
  private readonly logger: Logger;

  constructor(options: CompletionClientOptions) {
    const defaults = DEFAULT_CONFIG.api;

    this.preferredModel = options.preferredModel || defaults.preferredModel;
    this.fallbackModels = [...(options.fallbackModels ?? defaults.fallbackModels)];
    if (this.fallbackModels.length === 0) {
      throw new ConfigurationError('At least one fallback model is required');
    }

    this.activeModel = this.preferredModel;
    this.requestTimeout = options.requestTimeout ?? defaults.requestTimeout;
    this.probeTimeout = options.probeTimeout ?? defaults.probeTimeout;
    this.logger = (options.logger ?? createLogger({ name: 'completion-client' }))
      .child({ component: 'completion-client' });

    this.http = options.http ?? axios.create({
      baseURL: options.baseUrl || defaults.baseUrl,
      headers: {
        Authorization: `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json'
      }
    });
  }

  /**
   * The model identifier used by the next completion request
   */
  get model(): string {
    return this.activeModel;
  }

  /**
   * Probe the model listing once and settle on a model.
   * Falls back through the configured list when the preferred model is not
   * served, and to the first fallback when the listing is unavailable.
   */
  async selectActiveModel(): Promise<string> {
    const available = await this.listModels();

    if (available && available.includes(this.preferredModel)) {
      this.activeModel = this.preferredModel;
      this.logger.info({ model: this.activeModel }, 'Using preferred model');
      return this.activeModel;
    }

    if (available) {
      this.logger.warn({ model: this.preferredModel }, 'Preferred model not listed, trying fallbacks');
      const fallback = this.fallbackModels.find(model => available.includes(model));
      if (fallback) {
        this.activeModel = fallback;
        this.logger.warn({ model: fallback }, 'Using fallback model');
        return this.activeModel;
      }
    }

    this.activeModel = this.fallbackModels[0];
    this.logger.warn({ model: this.activeModel }, 'Using default fallback model');
    return this.activeModel;
  }

  async complete(messages: ChatMessage[], maxTokens: number): Promise<CompletionResult> {
    const payload: CompletionPayload = {
      model: this.activeModel,
      messages,
      max_tokens: maxTokens,
      temperature: RemoteCompletionClient.TEMPERATURE,
      top_p: RemoteCompletionClient.TOP_P
    };

    for (let attempt = 1; attempt <= RemoteCompletionClient.MAX_ATTEMPTS; attempt++) {
      const outcome = await this.send(payload);

      if (outcome.type === 'transport') {
        this.logger.debug({ attempt, error: outcome.error.message }, 'Completion request failed');
        if (attempt === RemoteCompletionClient.MAX_ATTEMPTS) {
          return { ok: false, error: { kind: 'network', cause: outcome.error.message } };
        }
        continue;
      }

      const { status, data } = outcome.response;

      if (status === 200) {
        const content = extractContent(data);
        if (content === undefined) {
          this.logger.error({ status, body: data }, 'Completion response had no message content');
          return { ok: false, error: { kind: 'api', status, message: 'malformed response' } };
        }
        return { ok: true, text: content.trim() };
      }

      const message = extractErrorMessage(data);

      if (status === 400 && isModelRejection(message)) {
        payload.model = this.substituteFallback(payload.model);
        continue;
      }

      this.logger.error({ status, body: data }, 'Completion API error');
      return { ok: false, error: { kind: 'api', status, message } };
    }

    return { ok: false, error: { kind: 'exhausted' } };
  }

  private async send(payload: CompletionPayload): Promise<AttemptOutcome> {
    try {
      const response = await this.http.post('/chat/completions', payload, {
        timeout: this.requestTimeout,
        validateStatus: acceptAnyStatus
      });
      return { type: 'response', response };
    } catch (error) {
      if (!isAxiosError(error)) {
        throw error;
      }
      // A transport configured to throw on non-2xx still carries the response
      if (error.response) {
        return { type: 'response', response: error.response };
      }
      return { type: 'transport', error };
    }
  }

  /**
   * The only write to the active model after startup, made once. Later
   * rejections keep retrying the first fallback.
   */
  private substituteFallback(rejectedModel: string): string {
    const fallback = this.fallbackModels[0];
    if (!this.substituted) {
      this.logger.warn({ model: rejectedModel, fallback }, 'Model decommissioned, switching to fallback');
      this.activeModel = fallback;
      this.substituted = true;
    }
    return fallback;
  }

  private async listModels(): Promise<string[] | null> {
    try {
      const response = await this.http.get('/models', {
        timeout: this.probeTimeout,
        validateStatus: acceptAnyStatus
      });
      if (response.status !== 200) {
        this.logger.warn({ status: response.status }, 'Model listing unavailable');
        return null;
      }
      return extractModelIds(response.data);
    } catch (error) {
      if (!isAxiosError(error)) {
        throw error;
      }
      this.logger.warn({ error: error.message }, 'Model listing request failed');
      return null;
    }
  }
}

/**
 * Render a failure the way it is shown to the user
 */
export function describeFailure(failure: CompletionFailure): string {
  switch (failure.kind) {
    case 'api':
      return `API Error: ${failure.status}`;
    case 'network':
      return `Network Error: ${failure.cause}`;
    case 'exhausted':
      return 'API Error: Failed after retries';
  }
}

export function resultText(result: CompletionResult): string {
  return result.ok ? result.text : describeFailure(result.error);
}

function isModelRejection(message: string): boolean {
  return MODEL_REJECTION_MARKERS.some(marker => message.includes(marker));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractContent(data: unknown): string | undefined {
  if (!isRecord(data) || !Array.isArray(data.choices)) {
    return undefined;
  }
  const first: unknown = data.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return undefined;
  }
  const content = first.message.content;
  return typeof content === 'string' ? content : undefined;
}

function extractErrorMessage(data: unknown): string {
  if (!isRecord(data) || !isRecord(data.error)) {
    return '';
  }
  const message = data.error.message;
  return typeof message === 'string' ? message : '';
}

function extractModelIds(data: unknown): string[] {
  if (!isRecord(data) || !Array.isArray(data.data)) {
    return [];
  }
  const ids: string[] = [];
  for (const entry of data.data) {
    if (isRecord(entry) && typeof entry.id === 'string') {
      ids.push(entry.id);
    }
  }
  return ids;
}
