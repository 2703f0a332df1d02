import fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { DEFAULT_RATE_LIMIT } from './KeyRateLimiter';
import { DEFAULT_UPSTREAM_TIMEOUT_MS } from './UpstreamClient';

const KeyPlacementSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('header'),
    name: z.string().min(1).default('Authorization'),
    prefix: z.string().default('Bearer '),
  }),
  z.object({
    type: z.literal('query'),
    name: z.string().min(1).default('key'),
  }),
]);

export const SettingsSchema = z.object({
  server: z
    .object({
      host: z.string().min(1).default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(8000),
    })
    .default({}),
  upstream: z.object({
    base_url: z.string({ required_error: 'TARGET_API_URL is not set' }).url('Target API URL must be a valid URL'),
    api_keys: z
      .array(z.string().min(1), { required_error: 'API_KEYS is not set' })
      .min(1, 'At least one API key is required'),
    rate_limit: z.number().int().positive().default(DEFAULT_RATE_LIMIT),
    timeout_ms: z.number().int().positive().default(DEFAULT_UPSTREAM_TIMEOUT_MS),
    key_placement: KeyPlacementSchema.default({ type: 'header' }),
  }),
});

export type GatewaySettings = z.infer<typeof SettingsSchema>;

export type Env = Record<string, string | undefined>;

export interface LoadSettingsOptions {
  /** settings.json location; skipped when the file does not exist. */
  settingsPath?: string;
  env?: Env;
}

/**
 * Reads settings.json, applies environment overrides and validates the result.
 * Throws ConfigurationError when the gateway cannot start with what it found.
 */
export function loadSettings(options: LoadSettingsOptions = {}): GatewaySettings {
  const env = options.env ?? process.env;
  const file = options.settingsPath ? readSettingsFile(options.settingsPath) : {};

  const raw = {
    server: { ...asRecord(file.server), ...serverOverrides(env) },
    upstream: { ...asRecord(file.upstream), ...upstreamOverrides(env) },
  };

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid gateway settings: ${details}`);
  }
  return parsed.data;
}

function readSettingsFile(settingsPath: string): Record<string, unknown> {
  if (!fs.existsSync(settingsPath)) {
    return {};
  }
  const settingsData = fs.readFileSync(settingsPath, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(settingsData);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Could not parse ${settingsPath}: ${message}`);
  }
  return asRecord(data);
}

function serverOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.HOST) overrides.host = env.HOST;
  if (env.PORT) overrides.port = Number(env.PORT);
  return overrides;
}

function upstreamOverrides(env: Env): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.TARGET_API_URL) overrides.base_url = env.TARGET_API_URL;
  if (env.API_KEYS !== undefined) overrides.api_keys = parseKeyList(env.API_KEYS);
  if (env.RATE_LIMIT) overrides.rate_limit = Number(env.RATE_LIMIT);
  if (env.UPSTREAM_TIMEOUT_MS) overrides.timeout_ms = Number(env.UPSTREAM_TIMEOUT_MS);
  if (env.KEY_PLACEMENT) {
    overrides.key_placement = env.KEY_NAME
      ? { type: env.KEY_PLACEMENT, name: env.KEY_NAME }
      : { type: env.KEY_PLACEMENT };
  }
  return overrides;
}

/** API_KEYS holds keys separated by ';'. */
export function parseKeyList(value: string): string[] {
  return value
    .split(';')
    .map((key) => key.trim())
    .filter((key) => key.length > 0);
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}
