import type { StripeMode } from '../types/stripe';

export const environments: Record<
  StripeMode,
  { dashboardUrl: string; label?: string }
> = {
  live: {
    dashboardUrl: 'https://dashboard.stripe.com',
  },

  test: {
    dashboardUrl: 'https://dashboard.stripe.com/test',
    label: 'test',
  },
};

const TEST_KEY_PREFIXES = ['sk_test_', 'rk_test_'];

export const modeForApiKey = (apiKey: string): StripeMode =>
  TEST_KEY_PREFIXES.some((prefix) => apiKey.startsWith(prefix))
    ? 'test'
    : 'live';
