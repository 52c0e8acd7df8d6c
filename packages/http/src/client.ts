import { getLogger } from '@lkr-rates/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import type { FormFields, HttpClientConfig, HttpRequestOptions } from './types.js';
import { HttpError, ResponseParseError, ResponseValidationError, TimeoutError } from './types.js';

type JsonRequestOptions = Omit<HttpRequestOptions, 'method' | 'body' | 'responseType'>;

export class HttpClient {
  private readonly baseUrl: string;
  private readonly defaultHeaders: Record<string, string>;
  private readonly providerName: string;
  private readonly timeout: number;
  private readonly logger: ReturnType<typeof getLogger>;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  private closePromise?: Promise<void>;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.baseUrl = config.baseUrl;
    this.providerName = config.providerName;
    this.defaultHeaders = {
      Accept: 'application/json',
      'User-Agent': 'lkr-rates/0.1.0',
      ...config.defaultHeaders,
    };
    this.timeout = config.timeout ?? 10000;

    this.logger = getLogger(`HttpClient:${config.providerName}`);

    this.agent = new Agent({
      keepAliveTimeout: 10000,
      keepAliveMaxTimeout: 60000,
      pipelining: 1,
    });

    this.effects = {
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(`HTTP client initialized - BaseUrl: ${config.baseUrl}, Timeout: ${this.timeout}ms`);
  }

  /**
   * GET a JSON document validated against a schema
   */
  async get<T>(
    endpoint: string,
    options: JsonRequestOptions & { schema: ZodType<T, ZodTypeDef, unknown> }
  ): Promise<Result<T, Error>>;
  /**
   * GET a JSON document without validation
   */
  async get(endpoint: string, options?: JsonRequestOptions): Promise<Result<unknown, Error>>;
  async get(endpoint: string, options: JsonRequestOptions = {}): Promise<Result<unknown, Error>> {
    return this.request(endpoint, { ...options, method: 'GET', responseType: 'json' });
  }

  /**
   * GET an HTML or plain-text body
   */
  async getText(endpoint: string, options: Omit<JsonRequestOptions, 'schema'> = {}): Promise<Result<string, Error>> {
    const result = await this.request(endpoint, { ...options, method: 'GET', responseType: 'text' });
    return result.map(String);
  }

  /**
   * POST url-encoded form fields and return the response body as text
   */
  async postForm(
    endpoint: string,
    fields: FormFields,
    options: Omit<JsonRequestOptions, 'schema'> = {}
  ): Promise<Result<string, Error>> {
    const result = await this.request(endpoint, {
      ...options,
      body: HttpUtils.encodeFormFields(fields),
      headers: { 'Content-Type': 'application/x-www-form-urlencoded', ...options.headers },
      method: 'POST',
      responseType: 'text',
    });
    return result.map(String);
  }

  /**
   * Make a single HTTP request bounded by a timeout. Callers own any fallback.
   */
  async request(endpoint: string, options: HttpRequestOptions = {}): Promise<Result<unknown, Error>> {
    const url = HttpUtils.buildUrl(this.baseUrl, endpoint);
    const method = options.method ?? 'GET';
    const timeout = options.timeout ?? this.timeout;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const startTime = this.effects.now();

    try {
      this.effects.log('debug', `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Method: ${method}`);

      const response = await this.effects.fetch(url, {
        // eslint-disable-next-line unicorn/no-null -- 'fetch' requires null for empty body, not undefined
        body: options.body ?? null,
        headers: { ...this.defaultHeaders, ...options.headers },
        method,
        signal: controller.signal,
      });

      const text = await response.text();

      if (!response.ok) {
        return err(
          new HttpError(`HTTP ${response.status}: ${HttpUtils.truncatePayload(text, 200)}`, response.status, text)
        );
      }

      this.effects.log(
        'debug',
        `HTTP ${response.status} from ${HttpUtils.sanitizeUrl(url)} in ${this.effects.now() - startTime}ms`
      );

      if (options.responseType === 'text') {
        return ok(text);
      }

      return this.decodeJson(text, endpoint, options.schema);
    } catch (error) {
      let failure = error instanceof Error ? error : new Error(String(error));
      if (failure.name === 'AbortError') {
        failure = new TimeoutError(`Request timeout after ${timeout}ms`, timeout);
      }

      this.effects.log('warn', `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Error: ${failure.message}`, {
        method,
        providerName: this.providerName,
      });
      return err(failure);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Closes the undici agent so keep-alive sockets do not hold the process open.
   * Idempotent.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = this.agent.close().then(() => {
        this.logger.debug('HTTP agent closed');
      });
    }
    return this.closePromise;
  }

  private decodeJson(text: string, endpoint: string, schema: ZodType<unknown> | undefined): Result<unknown, Error> {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return err(
        new ResponseParseError(
          `Response is not valid JSON: ${message}`,
          this.providerName,
          HttpUtils.truncatePayload(text)
        )
      );
    }

    if (!schema) {
      return ok(data);
    }

    const parseResult = schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');
    const truncatedPayload = HttpUtils.truncatePayload(text);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      { endpoint, providerName: this.providerName, truncatedPayload }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.providerName,
        endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }
}
