/**
 * LLM Service
 *
 * Chat-completions transport for the classifier: one provider class for every
 * OpenAI-compatible endpoint (presets supply URL, default model and API key
 * variable), wrapped in a service that retries failed requests with
 * exponential backoff and tracks token usage.
 */

import type { ProviderName, ResolvedProvider, TransportConfig } from '../../types/index.js';
import { errors, isFileOrganizerError } from '../../utils/errors.js';
import logger from '../../utils/logger.js';
import type { Transport } from '../classifier/dispatcher.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Completion request parameters
 */
export interface CompletionRequest {
  prompt: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Completion response
 */
export interface CompletionResponse {
  content: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  model: string;
  finishReason: 'stop' | 'length' | 'error';
}

/**
 * LLM provider interface
 */
export interface LLMProvider {
  name: string;
  model: string;
  generateCompletion(request: CompletionRequest): Promise<CompletionResponse>;
}

/**
 * Token usage tracking
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  requests: number;
}

/**
 * LLM service options
 */
export interface LLMServiceOptions extends Partial<TransportConfig> {
  /** Output token limit per request */
  maxTokens?: number;
}

export interface ProviderPreset {
  apiUrl: string;
  model: string;
  /** Environment variable that overrides the configured API key */
  apiKeyEnv: string;
}

// ============================================================================
// PROVIDER PRESETS
// ============================================================================

export const PROVIDER_PRESETS: Record<ProviderName, ProviderPreset> = {
  deepseek: {
    apiUrl: 'https://api.deepseek.com/chat/completions',
    model: 'deepseek-chat',
    apiKeyEnv: 'DEEPSEEK_API_KEY',
  },
  siliconflow: {
    apiUrl: 'https://api.siliconflow.cn/v1/chat/completions',
    model: 'deepseek-ai/DeepSeek-V3',
    apiKeyEnv: 'SILICONFLOW_API_KEY',
  },
  aliyun: {
    apiUrl: 'https://dashscope.aliyuncs.com/compatible-mode/v1/chat/completions',
    model: 'qwen-plus',
    apiKeyEnv: 'DASHSCOPE_API_KEY',
  },
  github: {
    apiUrl: 'https://models.inference.ai.azure.com/chat/completions',
    model: 'gpt-4o',
    apiKeyEnv: 'GITHUB_TOKEN',
  },
  openai: {
    apiUrl: 'https://api.openai.com/v1/chat/completions',
    model: 'gpt-4o-mini',
    apiKeyEnv: 'OPENAI_API_KEY',
  },
};

export const PROVIDER_NAMES: readonly ProviderName[] = ['deepseek', 'siliconflow', 'aliyun', 'github', 'openai'];

export function isProviderName(value: string): value is ProviderName {
  return Object.prototype.hasOwnProperty.call(PROVIDER_PRESETS, value);
}

const DEFAULTS = {
  maxAttempts: 3,
  initialDelay: 1000,
  timeout: 180_000,
  maxTokens: 8192,
};

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Validate and normalise an API URL.
 * Returns the cleaned URL or throws on invalid input.
 */
export function normalizeApiUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw errors.invalidArgument(`Invalid API URL: "${url}". Must be an absolute URL (e.g. http://localhost:8000/v1/chat/completions).`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw errors.invalidArgument(`Unsupported protocol in API URL: "${parsed.protocol}". Only http and https are allowed.`);
  }

  return parsed.toString().replace(/\/+$/, '');
}

/**
 * Failures that another attempt will not fix: anything the provider or the
 * model sent back as unusable JSON.
 */
export function isRetryableError(error: unknown): boolean {
  if (isFileOrganizerError(error) && error.code === 'MALFORMED_RESPONSE') {
    return false;
  }
  const message = error instanceof Error ? error.message : String(error);
  return !message.includes('JSON');
}

interface ChatCompletionBody {
  choices: Array<{ message?: { content?: string | null }; finish_reason?: string | null }>;
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
  model?: string;
  error?: unknown;
}

function isChatCompletionBody(data: unknown): data is ChatCompletionBody {
  return typeof data === 'object' && data !== null && 'choices' in data && Array.isArray(data.choices);
}

function readErrorField(data: unknown): unknown {
  if (typeof data === 'object' && data !== null && 'error' in data) {
    return data.error;
  }
  return undefined;
}

// ============================================================================
// CHAT COMPLETIONS PROVIDER
// ============================================================================

/**
 * Provider for OpenAI-compatible /chat/completions endpoints
 */
export class ChatCompletionsProvider implements LLMProvider {
  name: string;
  model: string;

  private apiKey: string;
  private apiUrl: string;
  private timeout: number;

  constructor(settings: ResolvedProvider, timeout = DEFAULTS.timeout) {
    this.name = settings.name;
    this.model = settings.modelName;
    this.apiKey = settings.apiKey;
    this.apiUrl = normalizeApiUrl(settings.apiUrl);
    this.timeout = timeout;
  }

  async generateCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    let response: Response;
    try {
      response = await fetch(this.apiUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.model,
          messages: [{ role: 'user', content: request.prompt }],
          max_tokens: request.maxTokens ?? DEFAULTS.maxTokens,
          temperature: request.temperature ?? 0.3,
        }),
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw errors.transportFailed(`Request to ${this.name} failed: ${reason}`, undefined, error);
    }

    let body: string;
    try {
      body = await response.text();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw errors.transportFailed(`Reading the response from ${this.name} failed: ${reason}`, response.status, error);
    }

    if (!response.ok) {
      throw errors.transportFailed(`API request failed with status ${response.status}: ${body}`, response.status);
    }

    let data: unknown;
    try {
      data = JSON.parse(body);
    } catch {
      throw errors.malformedResponse(`${this.name} returned a response body that is not JSON`);
    }

    const apiError = readErrorField(data);
    if (apiError !== undefined && apiError !== null) {
      throw errors.transportFailed(`API returned an error: ${JSON.stringify(apiError)}`, response.status);
    }

    if (!isChatCompletionBody(data) || data.choices.length === 0) {
      throw errors.malformedResponse(`${this.name} returned no completion choices`);
    }

    const choice = data.choices[0];
    const inputTokens = data.usage?.prompt_tokens ?? 0;
    const outputTokens = data.usage?.completion_tokens ?? 0;

    return {
      content: choice.message?.content ?? '',
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: data.usage?.total_tokens ?? inputTokens + outputTokens,
      },
      model: data.model ?? this.model,
      finishReason: choice.finish_reason === 'stop' ? 'stop' : choice.finish_reason === 'length' ? 'length' : 'error',
    };
  }
}

// ============================================================================
// MOCK PROVIDER (for testing)
// ============================================================================

export type MockResponder = (request: CompletionRequest) => string | Promise<string>;

/**
 * Mock provider for testing
 */
export class MockLLMProvider implements LLMProvider {
  name = 'mock';
  model = 'mock-model';

  private responses: Map<string, string> = new Map();
  private defaultResponse = '{"other": []}';
  private responder: MockResponder | null = null;
  public callHistory: CompletionRequest[] = [];
  public failCount = 0;
  public failWith: () => Error = () => errors.transportFailed('Mock failure', 500);
  private currentFailCount = 0;

  setResponse(promptContains: string, response: string): void {
    this.responses.set(promptContains, response);
  }

  setDefaultResponse(response: string): void {
    this.defaultResponse = response;
  }

  /** Compute replies from the request instead of fixed strings */
  setResponder(responder: MockResponder): void {
    this.responder = responder;
  }

  async generateCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    this.callHistory.push(request);

    if (this.currentFailCount < this.failCount) {
      this.currentFailCount++;
      throw this.failWith();
    }

    let content = this.defaultResponse;
    if (this.responder) {
      content = await this.responder(request);
    } else {
      for (const [key, value] of this.responses) {
        if (request.prompt.includes(key)) {
          content = value;
          break;
        }
      }
    }

    const inputTokens = Math.ceil(request.prompt.length / 4);
    const outputTokens = Math.ceil(content.length / 4);

    return {
      content,
      usage: { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens },
      model: this.model,
      finishReason: 'stop',
    };
  }

  reset(): void {
    this.callHistory = [];
    this.failCount = 0;
    this.currentFailCount = 0;
    this.responder = null;
    this.responses.clear();
  }
}

// ============================================================================
// LLM SERVICE
// ============================================================================

/**
 * LLM Service - retrying transport used by the classification engine
 */
export class LLMService implements Transport {
  private provider: LLMProvider;
  private options: Required<LLMServiceOptions>;
  private tokenUsage: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0, requests: 0 };

  constructor(provider: LLMProvider, options: LLMServiceOptions = {}) {
    this.provider = provider;
    this.options = {
      maxAttempts: options.maxAttempts ?? DEFAULTS.maxAttempts,
      initialDelay: options.initialDelay ?? DEFAULTS.initialDelay,
      timeout: options.timeout ?? DEFAULTS.timeout,
      maxTokens: options.maxTokens ?? DEFAULTS.maxTokens,
    };
  }

  /**
   * Get the provider name
   */
  getProviderName(): string {
    return this.provider.name;
  }

  getModel(): string {
    return this.provider.model;
  }

  /**
   * Get current token usage
   */
  getTokenUsage(): TokenUsage {
    return { ...this.tokenUsage };
  }

  /**
   * Transport entry point: the reply text for a prompt
   */
  async invoke(prompt: string): Promise<string> {
    const response = await this.complete({ prompt, maxTokens: this.options.maxTokens });
    if (response.finishReason === 'length') {
      logger.warning('Model reply was cut off at the token limit; the JSON may be incomplete');
    }
    return response.content;
  }

  /**
   * Generate a completion, retrying transient failures.
   * Waits initialDelay * 2^attempt between attempts.
   */
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const { maxAttempts, initialDelay } = this.options;
    let lastError: unknown = null;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      try {
        logger.debug(`LLM request attempt ${attempt + 1}/${maxAttempts}`);
        const response = await this.provider.generateCompletion(request);
        this.updateTracking(response);
        return response;
      } catch (error) {
        lastError = error;

        if (!isRetryableError(error)) {
          throw error;
        }

        if (attempt < maxAttempts - 1) {
          const delay = initialDelay * 2 ** attempt;
          const reason = error instanceof Error ? error.message : String(error);
          logger.warning(`LLM request failed (attempt ${attempt + 1}), retrying in ${delay}ms: ${reason}`);
          await this.sleep(delay);
        }
      }
    }

    throw errors.retriesExhausted(maxAttempts, lastError);
  }

  /**
   * Update tracking after a successful request
   */
  private updateTracking(response: CompletionResponse): void {
    this.tokenUsage.inputTokens += response.usage.inputTokens;
    this.tokenUsage.outputTokens += response.usage.outputTokens;
    this.tokenUsage.totalTokens += response.usage.totalTokens;
    this.tokenUsage.requests++;
  }

  /**
   * Sleep helper
   */
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Create an LLM service for a resolved provider
 */
export function createLLMService(settings: ResolvedProvider, options: LLMServiceOptions = {}): LLMService {
  const provider = new ChatCompletionsProvider(settings, options.timeout ?? DEFAULTS.timeout);
  return new LLMService(provider, options);
}

/**
 * Create an LLM service with a mock provider (for testing)
 */
export function createMockLLMService(options: LLMServiceOptions = {}): { service: LLMService; provider: MockLLMProvider } {
  const provider = new MockLLMProvider();
  const service = new LLMService(provider, options);
  return { service, provider };
}
