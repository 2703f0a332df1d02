import type { APIKeyRotator } from './APIKeyRotator';
import { UpstreamTransportError, type TransportFailure } from './errors';
import type { KeyRateLimiter } from './KeyRateLimiter';
import type { HeaderMap, UpstreamClient, UpstreamResponse } from './UpstreamClient';

export type KeyPlacement =
  | { type: 'header'; name: string; prefix: string }
  | { type: 'query'; name: string };

export interface InboundRequest {
  method: string;
  /** Path below the target URL, including any query string. */
  path: string;
  headers: Record<string, string | string[] | undefined>;
  body?: Buffer;
}

export type ForwardOutcome =
  | { kind: 'response'; response: UpstreamResponse }
  | { kind: 'rate_limited'; retryAfterMs: number }
  | { kind: 'upstream_error'; reason: TransportFailure; message: string };

export interface RequestForwarderOptions {
  targetUrl: string;
  keyPlacement: KeyPlacement;
  rotator: APIKeyRotator;
  limiter: KeyRateLimiter;
  upstream: UpstreamClient;
}

export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'host',
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'content-length',
]);

/**
 * Headers that must not cross the gateway: the fixed hop-by-hop set plus any
 * header the message itself names in `Connection`.
 */
export function hopByHopHeaders(headers: Record<string, string | string[] | undefined>): Set<string> {
  const names = new Set(HOP_BY_HOP_HEADERS);
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() !== 'connection' || value === undefined) {
      continue;
    }
    const tokens = Array.isArray(value) ? value.join(',') : value;
    for (const token of tokens.split(',')) {
      const trimmed = token.trim().toLowerCase();
      if (trimmed.length > 0) {
        names.add(trimmed);
      }
    }
  }
  return names;
}

export class RequestForwarder {
  private targetUrl: string;
  private keyPlacement: KeyPlacement;
  private rotator: APIKeyRotator;
  private limiter: KeyRateLimiter;
  private upstream: UpstreamClient;

  constructor(options: RequestForwarderOptions) {
    this.targetUrl = options.targetUrl.replace(/\/+$/, '');
    this.keyPlacement = options.keyPlacement;
    this.rotator = options.rotator;
    this.limiter = options.limiter;
    this.upstream = options.upstream;
  }

  /**
   * Forwards a request with the first key that still has quota. Tries each
   * configured key at most once and never contacts upstream when all are
   * saturated. A failed upstream call is not retried with another key.
   */
  async forward(request: InboundRequest, signal?: AbortSignal): Promise<ForwardOutcome> {
    const apiKey = this.admitKey();
    if (apiKey === undefined) {
      return { kind: 'rate_limited', retryAfterMs: this.limiter.msUntilAvailable() };
    }

    try {
      const response = await this.upstream.send(
        {
          method: request.method,
          url: this.buildUrl(request.path, apiKey),
          headers: this.buildHeaders(request.headers, apiKey),
          body: request.body,
        },
        signal
      );
      return { kind: 'response', response };
    } catch (err: unknown) {
      if (err instanceof UpstreamTransportError) {
        return { kind: 'upstream_error', reason: err.reason, message: err.message };
      }
      const message = err instanceof Error ? err.message : String(err);
      return { kind: 'upstream_error', reason: 'transport', message };
    }
  }

  private admitKey(): string | undefined {
    for (let attempt = 0; attempt < this.rotator.size; attempt++) {
      const candidate = this.rotator.getNextKey();
      if (this.limiter.tryAdmit(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  private buildUrl(path: string, apiKey: string): string {
    const relative = path.startsWith('/') ? path : `/${path}`;
    if (this.keyPlacement.type !== 'query') {
      return this.targetUrl + relative;
    }
    const url = new URL(this.targetUrl + relative);
    url.searchParams.set(this.keyPlacement.name, apiKey);
    return url.toString();
  }

  private buildHeaders(inbound: InboundRequest['headers'], apiKey: string): HeaderMap {
    const placement = this.keyPlacement;
    const credentialHeader = placement.type === 'header' ? placement.name.toLowerCase() : undefined;
    const headers: HeaderMap = {};
    const skipped = hopByHopHeaders(inbound);

    for (const [name, value] of Object.entries(inbound)) {
      const lower = name.toLowerCase();
      if (value === undefined || skipped.has(lower) || lower === credentialHeader) {
        continue;
      }
      headers[name] = value;
    }

    if (placement.type === 'header') {
      headers[placement.name] = `${placement.prefix}${apiKey}`;
    }
    return headers;
  }
}
