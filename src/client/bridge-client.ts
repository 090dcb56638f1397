import type { ChatCompletionRequest } from '../types/index.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, getConfig } from '../infrastructure/config/app-config.js';
import { getDefaultLogger, type Logger } from '../infrastructure/utils/logger.js';
import { AuthenticationError, InternalServerError, mapError, toAPIError } from '../shared/errors/index.js';
import { createFetchTransport, type Transport, type TransportResponse } from './transport.js';
import { Messages } from './messages.js';

export interface BridgeClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  defaultHeaders?: Record<string, string>;
  transport?: Transport;
  logger?: Logger;
  /** Structural check of each request before it is mapped. Defaults to true. */
  validateRequests?: boolean;
}

export interface PostOptions {
  stream: boolean;
  signal?: AbortSignal;
}

export interface UpstreamCall {
  response: TransportResponse;
  /** Aborts the request, including a body still being read. */
  controller: AbortController;
  /** Detaches from the caller's signal. Call once the response is consumed. */
  release: () => void;
}

/**
 * Messages-style client for a ChatCompletion-style upstream.
 */
export class BridgeClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly logger: Logger;
  readonly validateRequests: boolean;
  readonly messages: Messages;

  private readonly apiKey: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly transport: Transport;

  constructor(options: BridgeClientOptions) {
    if (!options.apiKey) {
      throw new AuthenticationError('API key not configured');
    }

    this.apiKey = options.apiKey;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.transport = options.transport ?? createFetchTransport();
    this.logger = options.logger ?? getDefaultLogger();
    this.validateRequests = options.validateRequests ?? true;
    this.messages = new Messages(this);
  }

  /**
   * Client configured from the environment (`OPENAI_API_KEY`,
   * `OPENAI_BASE_URL`, `BRIDGE_TIMEOUT_MS`, `BRIDGE_VALIDATE_REQUESTS`).
   */
  static fromEnv(overrides: Partial<BridgeClientOptions> = {}): BridgeClient {
    const config = getConfig();
    const apiKey = overrides.apiKey ?? config.upstream.apiKey;
    if (!apiKey) {
      throw new AuthenticationError('OPENAI_API_KEY is not configured');
    }

    return new BridgeClient({
      baseUrl: config.upstream.baseUrl,
      timeoutMs: config.upstream.timeoutMs,
      validateRequests: config.features.validateRequests,
      ...overrides,
      apiKey
    });
  }

  protected getHeaders(stream: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      ...this.defaultHeaders,
      'Authorization': `Bearer ${this.apiKey}`,
      'Content-Type': 'application/json'
    };
    if (stream) {
      headers['Accept'] = 'text/event-stream';
    }
    return headers;
  }

  /**
   * POST a ChatCompletion request. The timeout covers the wait for response
   * headers only; a streaming body may take longer. Non-2xx statuses throw
   * the mapped APIError.
   */
  async post(path: string, body: ChatCompletionRequest, options: PostOptions): Promise<UpstreamCall> {
    const url = `${this.baseUrl}${path}`;
    const controller = new AbortController();
    const { signal } = options;
    let release = (): void => undefined;

    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else if (signal) {
      const onAbort = (): void => controller.abort(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
      release = () => signal.removeEventListener('abort', onAbort);
    }

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const endTimer = this.logger.timer('upstream_request');
    let response: TransportResponse;
    try {
      response = await this.transport(url, {
        method: 'POST',
        headers: this.getHeaders(options.stream),
        body: JSON.stringify(body),
        signal: controller.signal
      });
    } catch (error) {
      release();
      this.logger.error('Upstream request failed', error, { url, timedOut, module: 'bridge-client' });
      throw timedOut ? new InternalServerError(`Request timed out after ${this.timeoutMs}ms`) : toAPIError(error);
    } finally {
      clearTimeout(timer);
      endTimer();
    }

    if (!response.ok) {
      const errorBody = await this.readErrorBody(response);
      release();
      this.logger.warn('Upstream returned error status', { url, status: response.status, module: 'bridge-client' });
      throw mapError(response.status, errorBody);
    }

    return { response, controller, release };
  }

  private async readErrorBody(response: TransportResponse): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      this.logger.debug('Error response body is not JSON', {
        status: response.status,
        reason: error instanceof Error ? error.message : String(error),
        module: 'bridge-client'
      });
      return undefined;
    }
  }
}
