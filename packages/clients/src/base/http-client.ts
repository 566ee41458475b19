import { getErrorMessage, type ILogger, logger } from '@valuescope/shared';

export type HttpRequestErrorKind = 'http' | 'network' | 'timeout' | 'invalid-json';

interface HttpRequestErrorOptions {
  status?: number;
  body?: unknown;
  cause?: unknown;
}

export class HttpRequestError extends Error {
  readonly kind: HttpRequestErrorKind;
  readonly status?: number;
  /** Parsed error body (JSON value or text), when the server sent one */
  readonly body?: unknown;

  constructor(message: string, kind: HttpRequestErrorKind, options: HttpRequestErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'HttpRequestError';
    this.kind = kind;
    this.status = options.status;
    this.body = options.body;
  }
}

export interface JsonHttpClientOptions {
  baseUrl: string;
  /** Abort a request (including its body) after this many ms; no limit when omitted */
  timeoutMs?: number;
  headers?: Record<string, string>;
  logger?: ILogger;
}

const ERROR_MESSAGE_FIELDS = ['message', 'error', 'detail'] as const;

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

/**
 * Pick a human readable message out of an error body
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (body && typeof body === 'object') {
    for (const field of ERROR_MESSAGE_FIELDS) {
      const message = nonEmptyString(Reflect.get(body, field));
      if (message) return message;
    }
    return undefined;
  }
  return nonEmptyString(body);
}

function parseJson(text: string): { ok: true; value: unknown } | { ok: false; error: unknown } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, error };
  }
}

/**
 * Minimal GET-only JSON client bound to one base URL.
 * Paths resolve relative to the base, so `snapshots/AAPL` under
 * `http://host/api` becomes `http://host/api/snapshots/AAPL`.
 */
export class JsonHttpClient {
  readonly baseUrl: string;
  private readonly timeoutMs?: number;
  private readonly headers: Record<string, string>;
  private readonly logger: ILogger;

  constructor(options: JsonHttpClientOptions) {
    this.baseUrl = options.baseUrl.endsWith('/') ? options.baseUrl : `${options.baseUrl}/`;
    this.timeoutMs = options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : undefined;
    this.headers = { Accept: 'application/json', ...options.headers };
    this.logger = (options.logger ?? logger).child({ component: 'http-client' });
  }

  resolve(path: string): string {
    return new URL(path.replace(/^\/+/, ''), this.baseUrl).toString();
  }

  /**
   * GET a JSON document. The body comes back unvalidated; callers parse it with a schema.
   */
  async getJson(path: string): Promise<unknown> {
    const url = this.resolve(path);
    const controller = this.timeoutMs ? new AbortController() : undefined;
    let timedOut = false;
    const timer = controller
      ? setTimeout(() => {
          timedOut = true;
          controller.abort();
        }, this.timeoutMs)
      : undefined;

    try {
      const response = await fetch(url, { headers: this.headers, signal: controller?.signal });
      const text = await response.text();

      if (!response.ok) {
        throw this.toHttpError(response, text);
      }

      const parsed = parseJson(text);
      if (!parsed.ok) {
        throw new HttpRequestError('Invalid JSON response', 'invalid-json', {
          status: response.status,
          cause: parsed.error,
        });
      }
      return parsed.value;
    } catch (error) {
      if (error instanceof HttpRequestError) throw error;
      if (timedOut) {
        throw new HttpRequestError(`Request timed out after ${this.timeoutMs}ms`, 'timeout', { cause: error });
      }
      throw new HttpRequestError(getErrorMessage(error), 'network', { cause: error });
    } finally {
      clearTimeout(timer);
    }
  }

  private toHttpError(response: Response, text: string): HttpRequestError {
    let body: unknown;
    if (text.trim().length > 0) {
      const parsed = parseJson(text);
      if (parsed.ok) {
        body = parsed.value;
      } else {
        this.logger.debug('Received non-JSON error response body', { status: response.status });
        body = text;
      }
    }

    const message = extractErrorMessage(body) ?? (response.statusText || `HTTP ${response.status}`);
    return new HttpRequestError(message, 'http', { status: response.status, body });
  }
}
