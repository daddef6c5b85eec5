import { Value } from '@sinclair/typebox/value';
import { ConfigSchema, type Config } from './config.js';
import type { ApiKeys } from './types.js';

export type Env = Readonly<Record<string, string | undefined>>;

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

function readKey(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInteger(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  return Number.isInteger(value) ? value : undefined;
}

/**
 * Load API keys from environment variables.
 * Blank values count as missing.
 */
export function loadApiKeys(env: Env = process.env): ApiKeys {
  return {
    pexelsApiKey: readKey(env, 'PEXELS_API_KEY'),
    unsplashAccessKey: readKey(env, 'UNSPLASH_ACCESS_KEY'),
    pixabayApiKey: readKey(env, 'PIXABAY_API_KEY'),
  };
}

/**
 * Load server configuration from environment variables.
 *
 * Values that are missing or fail the schema (out of range, not a number)
 * fall back to the schema defaults via Value.Cast.
 */
export function loadConfig(env: Env = process.env): Config {
  const attribution = env.ENABLE_ATTRIBUTION_LINKS?.trim().toLowerCase();

  const parsed: Partial<Config> = {
    enableAttributionLinks: attribution ? TRUTHY.has(attribution) : undefined,
    requestTimeoutMs: readInteger(env, 'STOCK_IMAGES_TIMEOUT_MS'),
    networkRetries: readInteger(env, 'STOCK_IMAGES_NETWORK_RETRIES'),
    retryDelayMs: readInteger(env, 'STOCK_IMAGES_RETRY_DELAY_MS'),
  };

  // Drop unset keys so Cast fills them from defaults
  const present = Object.fromEntries(
    Object.entries(parsed).filter(([, value]) => value !== undefined)
  );

  return Value.Cast(ConfigSchema, present);
}
