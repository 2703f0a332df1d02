export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type TransportFailure = 'transport' | 'timeout' | 'cancelled';

/**
 * Raised by an upstream client when no HTTP response came back at all.
 * A response with a 4xx/5xx status is not a transport failure.
 */
export class UpstreamTransportError extends Error {
  readonly reason: TransportFailure;

  constructor(message: string, reason: TransportFailure = 'transport') {
    super(message);
    this.name = 'UpstreamTransportError';
    this.reason = reason;
  }
}
