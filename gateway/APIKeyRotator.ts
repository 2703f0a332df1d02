import { ConfigurationError } from './errors';

export class APIKeyRotator {
  private keys: readonly string[];
  private index: number = 0;
  private issued: number = 0;

  constructor(keys: readonly string[]) {
    if (keys.length === 0) {
      throw new ConfigurationError('APIKeyRotator needs at least one API key');
    }
    this.keys = keys;
  }

  // Runs to completion on the event loop, so concurrent requests never share a slot.
  getNextKey(): string {
    const key = this.keys[this.index];
    this.index = (this.index + 1) % this.keys.length;
    this.issued++;
    return key;
  }

  get size(): number {
    return this.keys.length;
  }

  get cursor(): number {
    return this.index;
  }

  get slotsIssued(): number {
    return this.issued;
  }
}

/** Log-safe form of a key: only the last four characters survive. */
export function maskKey(key: string): string {
  return key.length <= 4 ? '****' : `****${key.slice(-4)}`;
}
