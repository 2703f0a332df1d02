import axios, { type AxiosInstance } from 'axios';
import { UpstreamTransportError } from './errors';

export type HeaderMap = Record<string, string | string[]>;

export interface OutboundRequest {
  method: string;
  url: string;
  headers: HeaderMap;
  body?: Buffer;
}

export interface UpstreamResponse {
  status: number;
  headers: HeaderMap;
  body: Buffer;
}

/**
 * Sends one request upstream. Resolves for every HTTP status and rejects with
 * UpstreamTransportError when no response arrived.
 */
export interface UpstreamClient {
  send(request: OutboundRequest, signal?: AbortSignal): Promise<UpstreamResponse>;
}

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 180_000;

export class AxiosUpstreamClient implements UpstreamClient {
  private http: AxiosInstance;

  constructor(timeoutMs: number = DEFAULT_UPSTREAM_TIMEOUT_MS) {
    this.http = axios.create({
      timeout: timeoutMs,
      responseType: 'arraybuffer',
      // Statuses are relayed, never thrown.
      validateStatus: () => true,
      // Keep the body byte-for-byte; content-encoding is relayed with it.
      decompress: false,
      maxRedirects: 0,
    });
  }

  async send(request: OutboundRequest, signal?: AbortSignal): Promise<UpstreamResponse> {
    try {
      const response = await this.http.request<ArrayBuffer>({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        signal,
      });

      return {
        status: response.status,
        headers: toHeaderMap(response.headers),
        body: Buffer.from(response.data),
      };
    } catch (err: unknown) {
      throw toTransportError(err);
    }
  }
}

function toHeaderMap(headers: object): HeaderMap {
  const result: HeaderMap = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      result[name] = value;
    } else if (typeof value === 'number' || typeof value === 'boolean') {
      result[name] = String(value);
    } else if (Array.isArray(value)) {
      result[name] = value.map((item) => String(item));
    }
  }
  return result;
}

function toTransportError(err: unknown): UpstreamTransportError {
  if (axios.isCancel(err)) {
    return new UpstreamTransportError('Upstream request cancelled', 'cancelled');
  }
  if (axios.isAxiosError(err)) {
    const timedOut = err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT';
    return new UpstreamTransportError(err.message, timedOut ? 'timeout' : 'transport');
  }
  const message = err instanceof Error ? err.message : String(err);
  return new UpstreamTransportError(message);
}
