export type AcceptedTransactionType = 'charge' | 'payment';

export type StripeMode = 'live' | 'test';

export interface BalanceTransaction {
  id: string;
  amount: number; // signed, minor units
  currency: string; // lower-case ISO code as returned by Stripe
  type: string;
  created: number; // epoch seconds
}

export interface BalanceTransactionPage {
  data: BalanceTransaction[];
  hasMore: boolean;
}

export interface DayRange {
  gte: number;
  lte: number;
}

// Upper-case currency code -> summed minor units
export type CurrencyTotals = Record<string, number>;

export interface GrossConfig {
  apiKeyOverride?: string;
  secretArn?: string;
  secretService: string;
  secretType: string;
  apiUrl: string;
  httpTimeoutMs: number;
  secretTimeoutMs: number;
  locale: string;
}

export interface RenderContext {
  mode: StripeMode;
  dashboardUrl: string;
  locale: string;
  secretService: string;
  secretType: string;
}
