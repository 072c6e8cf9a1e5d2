import type { GrossConfig } from '../types/stripe';

export const DEFAULT_API_URL = 'https://api.stripe.com';
export const DEFAULT_HTTP_TIMEOUT_MS = 15 * 1000;
export const DEFAULT_SECRET_TIMEOUT_MS = 5 * 1000;
export const DEFAULT_LOCALE = 'en-US';
export const SECRET_TOOL_COMMAND = 'secret-tool';

const positiveNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return value && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const nonEmpty = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export const loadGrossConfig = (
  env: NodeJS.ProcessEnv = process.env,
): GrossConfig => ({
  apiKeyOverride: nonEmpty(env.STRIPE_API_KEY),
  secretArn: nonEmpty(env.STRIPE_API_KEY_SECRET_ARN),
  secretService: nonEmpty(env.STRIPE_SECRET_SERVICE) ?? 'stripe',
  secretType: nonEmpty(env.STRIPE_SECRET_TYPE) ?? 'api-key',
  apiUrl: (nonEmpty(env.STRIPE_API_URL) ?? DEFAULT_API_URL).replace(/\/+$/, ''),
  httpTimeoutMs: positiveNumber(
    env.STRIPE_HTTP_TIMEOUT_MS,
    DEFAULT_HTTP_TIMEOUT_MS,
  ),
  secretTimeoutMs: positiveNumber(
    env.STRIPE_SECRET_TIMEOUT_MS,
    DEFAULT_SECRET_TIMEOUT_MS,
  ),
  locale: nonEmpty(env.STRIPE_GROSS_LOCALE) ?? DEFAULT_LOCALE,
});
