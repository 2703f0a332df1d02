import express from 'express';
import http from 'http';
import type { AddressInfo } from 'net';
import { v4 as uuidv4 } from 'uuid';
import { APIKeyRotator } from './APIKeyRotator';
import { KeyRateLimiter } from './KeyRateLimiter';
import { hopByHopHeaders, RequestForwarder, type ForwardOutcome } from './RequestForwarder';
import type { GatewaySettings } from './settings';
import { AxiosUpstreamClient, type UpstreamClient } from './UpstreamClient';

export interface ProxyServerDeps {
  upstream?: UpstreamClient;
  now?: () => number;
}

const MAX_BODY_SIZE = '10mb';

export class ProxyServer {
  private settings: GatewaySettings;
  private keyRotator: APIKeyRotator;
  private limiter: KeyRateLimiter;
  private forwarder: RequestForwarder;
  private server: http.Server | null = null;

  constructor(settings: GatewaySettings, deps: ProxyServerDeps = {}) {
    this.settings = settings;
    const { upstream } = settings;
    this.keyRotator = new APIKeyRotator(upstream.api_keys);
    this.limiter = new KeyRateLimiter(upstream.api_keys, { limit: upstream.rate_limit, now: deps.now });
    this.forwarder = new RequestForwarder({
      targetUrl: upstream.base_url,
      keyPlacement: upstream.key_placement,
      rotator: this.keyRotator,
      limiter: this.limiter,
      upstream: deps.upstream ?? new AxiosUpstreamClient(upstream.timeout_ms),
    });
  }

  createApp(): express.Express {
    const app = express();
    app.disable('x-powered-by');

    app.get('/health', (_req, res) => {
      res.json({ status: 'ok', keys: this.keyRotator.size });
    });

    app.use('/proxy', express.raw({ type: () => true, limit: MAX_BODY_SIZE }), (req, res, next) => {
      this.handleProxy(req, res).catch(next);
    });

    return app;
  }

  async start(): Promise<AddressInfo> {
    const { host, port } = this.settings.server;
    const server = http.createServer(this.createApp());
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error(`Unexpected listen address: ${String(address)}`);
    }
    console.log(
      `[ProxyServer] Forwarding http://${host}:${address.port}/proxy to ${this.settings.upstream.base_url} ` +
        `with ${this.keyRotator.size} key(s), ${this.settings.upstream.rate_limit} req/min each`
    );
    return address;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async handleProxy(req: express.Request, res: express.Response) {
    const requestId = headerValue(req.headers['x-request-id']) ?? uuidv4();
    res.setHeader('X-Request-Id', requestId);

    // Abort the upstream call if the caller goes away first. The quota unit stays spent.
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    const outcome = await this.forwarder.forward(
      {
        method: req.method,
        path: req.url,
        headers: req.headers,
        body: Buffer.isBuffer(req.body) && req.body.length > 0 ? req.body : undefined,
      },
      controller.signal
    );

    this.writeOutcome(requestId, req, res, outcome);
  }

  private writeOutcome(requestId: string, req: express.Request, res: express.Response, outcome: ForwardOutcome) {
    switch (outcome.kind) {
      case 'response': {
        const { status, headers, body } = outcome.response;
        const skipped = hopByHopHeaders(headers);
        // The gateway's request id stays authoritative so it matches the log lines.
        skipped.add('x-request-id');
        for (const [name, value] of Object.entries(headers)) {
          if (!skipped.has(name.toLowerCase())) {
            res.setHeader(name, value);
          }
        }
        res.status(status).end(body);
        return;
      }
      case 'rate_limited': {
        const retryAfterSeconds = Math.ceil(outcome.retryAfterMs / 1000);
        console.warn(`[ProxyServer] ${requestId} ${req.method} ${req.originalUrl}: all API keys rate limited`);
        res.setHeader('Retry-After', String(retryAfterSeconds));
        res.status(429).json({
          error: 'rate_limit_exceeded',
          message: `All API keys have reached their limit of ${this.settings.upstream.rate_limit} requests per minute`,
          retry_after_seconds: retryAfterSeconds,
        });
        return;
      }
      case 'upstream_error': {
        if (outcome.reason === 'cancelled') {
          console.log(`[ProxyServer] ${requestId} client disconnected, upstream request cancelled`);
          return;
        }
        console.error(`[ProxyServer] ${requestId} upstream request failed (${outcome.reason}):`, outcome.message);
        const timedOut = outcome.reason === 'timeout';
        res.status(timedOut ? 504 : 502).json({
          error: timedOut ? 'upstream_timeout' : 'upstream_unreachable',
          message: `Error contacting the target API: ${outcome.message}`,
        });
        return;
      }
    }
  }
}

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.trim().length > 0 ? first.trim() : undefined;
}
