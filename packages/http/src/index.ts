export { HttpClient } from './client.js';
export { buildUrl, sanitizeUrl } from './core/http-utils.js';
export type { HttpEffects } from './core/types.js';
export {
  HttpError,
  ResponseParseError,
  ResponseValidationError,
  TimeoutError,
  type FormFields,
  type HttpClientConfig,
  type HttpRequestOptions,
} from './types.js';
