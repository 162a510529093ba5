import http from "node:http";
import https from "node:https";
import { Readable } from "node:stream";

import axios, { type AxiosInstance, type AxiosResponse } from "axios";

import { LogFetchError } from "../core/errors.js";

import type { LogUrl } from "./url-resolver.js";

// =============================================================================
// TYPES
// =============================================================================

export type LogResponse = {
  status: number;
  statusText: string;
  body: Readable;
};

export type LogRequestOptions = {
  signal: AbortSignal;
};

// Resolves once response headers arrive; the body is consumed by the caller.
// Any status is returned as-is; only transport failures reject.
export interface LogTransport {
  get(url: LogUrl, options: LogRequestOptions): Promise<LogResponse>;
}

export type LogHttpClientOptions = {
  userAgent?: string;
  maxRedirects?: number;
  maxFreeSocketsPerHost?: number;
};

const DEFAULT_USER_AGENT = "prsweep";
const DEFAULT_MAX_REDIRECTS = 5;
const DEFAULT_MAX_FREE_SOCKETS = 4;

// =============================================================================
// ERRORS
// =============================================================================

export class TransportError extends LogFetchError {
  constructor(detail: string, cause?: unknown) {
    super(`HTTP request failed: ${detail}`, cause);
    this.name = "TransportError";
  }
}

export class HttpStatusError extends LogFetchError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
    public readonly url: string,
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = "HttpStatusError";
  }
}

export class StreamReadError extends LogFetchError {
  constructor(detail: string, cause?: unknown) {
    super(`Failed to read line: ${detail}`, cause);
    this.name = "StreamReadError";
  }
}

// =============================================================================
// AXIOS TRANSPORT
// =============================================================================

export function createLogHttpClient(options: LogHttpClientOptions = {}): AxiosInstance {
  const maxFreeSockets = options.maxFreeSocketsPerHost ?? DEFAULT_MAX_FREE_SOCKETS;

  return axios.create({
    responseType: "stream",
    maxRedirects: options.maxRedirects ?? DEFAULT_MAX_REDIRECTS,
    validateStatus: () => true,
    headers: {
      "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT,
      Accept: "text/plain, */*",
    },
    httpAgent: new http.Agent({ keepAlive: true, maxFreeSockets }),
    httpsAgent: new https.Agent({ keepAlive: true, maxFreeSockets }),
  });
}

export class AxiosLogTransport implements LogTransport {
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client = client ?? createLogHttpClient();
  }

  async get(url: LogUrl, options: LogRequestOptions): Promise<LogResponse> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.client.get<unknown>(url, {
        responseType: "stream",
        signal: options.signal,
      });
    } catch (err) {
      throw new TransportError(describeTransportFailure(err, options.signal), err);
    }

    const body = response.data;
    if (!(body instanceof Readable)) {
      throw new TransportError(`response from ${url} did not include a body stream`);
    }

    return { status: response.status, statusText: response.statusText, body };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeTransportFailure(error: unknown, signal: AbortSignal): string {
  if (signal.aborted) {
    const reason: unknown = signal.reason;
    return reason instanceof Error ? reason.message : "request aborted";
  }

  if (axios.isAxiosError(error)) {
    return error.code ? `${error.code}: ${error.message}` : error.message;
  }

  return error instanceof Error ? error.message : String(error);
}
