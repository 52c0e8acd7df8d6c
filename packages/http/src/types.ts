import type { ZodType } from 'zod';

export type FormFields = Record<string, string | readonly string[]>;

export interface HttpClientConfig {
  baseUrl: string;
  defaultHeaders?: Record<string, string> | undefined;
  providerName: string;
  timeout?: number | undefined;
}

export interface HttpRequestOptions {
  body?: string | undefined;
  headers?: Record<string, string> | undefined;
  method?: 'GET' | 'POST' | undefined;
  responseType?: 'json' | 'text' | undefined;
  schema?: ZodType<unknown> | undefined;
  timeout?: number | undefined;
}

export class HttpError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public responseBody: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class TimeoutError extends Error {
  constructor(
    message: string,
    public timeoutMs: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Body could not be decoded as JSON
 */
export class ResponseParseError extends Error {
  constructor(
    message: string,
    public providerName: string,
    public truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseParseError';
  }
}

export class ResponseValidationError extends Error {
  constructor(
    message: string,
    public providerName: string,
    public endpoint: string,
    public validationIssues: { message: string; path: string }[],
    public truncatedPayload: string
  ) {
    super(message);
    this.name = 'ResponseValidationError';
  }
}
